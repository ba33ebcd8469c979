import { TriggerOutcome, skipped } from "@/contracts/globals";
import {
    Commission,
    CommissionPaymentSnapshot,
    CommissionStatus,
    DriverAccountBalance,
} from "@/contracts/interfaces/commission.interface";
import finanzasRepository from "@/repositories/mongo-finanzas.repository";
import { FinanzasRepository } from "@/repositories/finanzas.repository";
import { sumAmounts } from "@/utils/money";

export interface CommissionReconciliation {
    commission_id: string;
    status: CommissionStatus;
    total_paid: number;
    balance: DriverAccountBalance;
}

export type ReconcileOutcome = TriggerOutcome<CommissionReconciliation>;

/**
 * PAID cuando lo abonado cubre el monto (incluye el límite exacto),
 * PARTIAL con abonos por debajo del monto, GENERATED sin abonos.
 */
export const resolveCommissionStatus = (total_paid: number, amount: number): CommissionStatus => {
    if (total_paid >= (amount || 0)) return "PAID";
    if (total_paid > 0) return "PARTIAL";
    return "GENERATED";
};

export const outstandingBalance = (commissions: Commission[]): number =>
    sumAmounts(
        commissions
            .filter((commission) => (commission.status ?? "GENERATED") !== "PAID")
            .map((commission) => commission.amount)
    );

export class CommissionReconcilerService {
    constructor(private readonly repository: FinanzasRepository = finanzasRepository) {}

    private async recomputeBalance(repository: FinanzasRepository, driver_id: string): Promise<DriverAccountBalance> {
        const commissions = await repository.findCommissionsByDriver(driver_id);
        return repository.upsertDriverBalance(driver_id, outstandingBalance(commissions));
    }

    /**
     * Recalcula el estado de la comisión abonada y el estado de cuenta del conductor.
     * Ambas escrituras van en una sola transacción; cada evento vuelve a sumar todo.
     */
    public async reconcile_commission_payment({
        commission_payment
    }: {
        commission_payment_id: string;
        commission_payment: CommissionPaymentSnapshot;
    }): Promise<ReconcileOutcome> {
        const commission_id = commission_payment.commission_id;
        if (!commission_id) return skipped("missing_commission");

        return this.repository.runInTransaction<ReconcileOutcome>(async (repository) => {
            const commission = await repository.findCommission(commission_id);
            if (!commission) return skipped("missing_commission");

            const payments = await repository.findCommissionPayments(commission_id);
            const total_paid = sumAmounts(payments.map((payment) => payment.amount));
            const status = resolveCommissionStatus(total_paid, commission.amount);

            await repository.updateCommissionStatus(commission_id, status);
            const balance = await this.recomputeBalance(repository, commission.driver_id);

            return { status: "applied", result: { commission_id, status, total_paid, balance } };
        });
    }

    /**
     * Vuelve a derivar el estado de cada comisión no pagada del conductor desde sus abonos
     * y después el estado de cuenta. Repara abonos cuyo evento de creación se perdió.
     */
    public async recompute_driver_balance({ driver_id }: { driver_id: string }): Promise<DriverAccountBalance> {
        return this.repository.runInTransaction(async (repository) => {
            const commissions = await repository.findCommissionsByDriver(driver_id);
            const settled: Commission[] = [];

            for (const commission of commissions) {
                if (commission.status === "PAID") {
                    settled.push(commission);
                    continue;
                }
                const payments = await repository.findCommissionPayments(commission._id);
                const status = resolveCommissionStatus(sumAmounts(payments.map((payment) => payment.amount)), commission.amount);
                if (status !== commission.status) {
                    await repository.updateCommissionStatus(commission._id, status);
                }
                settled.push({ ...commission, status });
            }

            return repository.upsertDriverBalance(driver_id, outstandingBalance(settled));
        });
    }
}
