import { TriggerOutcome, skipped } from "@/contracts/globals";
import { Commission } from "@/contracts/interfaces/commission.interface";
import { PaymentSnapshot } from "@/contracts/interfaces/payment.interface";
import finanzasRepository from "@/repositories/mongo-finanzas.repository";
import { FinanzasRepository } from "@/repositories/finanzas.repository";
import { FINANZAS_RULES } from "@/utils/constants";
import { round2, toAmount } from "@/utils/money";

export type CommissionOutcome = TriggerOutcome<Commission>;

export const computeCommissionAmount = (base_amount: number, percentage: number): number =>
    round2((base_amount * percentage) / 100);

export class CommissionGeneratorService {
    constructor(private readonly repository: FinanzasRepository = finanzasRepository) {}

    /**
     * Genera la comisión del conductor para pagos cobrados directamente (DIRECT_*).
     * Cadena: asignación -> conductor_vehículo -> conductor. Un eslabón faltante
     * omite la comisión.
     */
    public async generate_commission_for_payment({
        payment_id,
        payment
    }: {
        payment_id: string;
        payment: PaymentSnapshot;
    }): Promise<CommissionOutcome> {
        if (!payment.payment_method_id) return skipped("missing_payment_method");
        if (!payment.assignment_id) return skipped("missing_assignment");

        const method = await this.repository.findPaymentMethod(payment.payment_method_id);
        const code = (method?.code ?? "").toUpperCase();
        if (!code.startsWith(FINANZAS_RULES.DIRECT_METHOD_PREFIX)) return skipped("not_direct_method");

        const assignment = await this.repository.findAssignment(payment.assignment_id);
        if (!assignment) return skipped("missing_assignment");
        if (!assignment.driver_vehicle_link_id) return skipped("missing_driver_link");

        const link = await this.repository.findDriverVehicleLink(assignment.driver_vehicle_link_id);
        if (!link) return skipped("missing_driver_link");
        if (!link.driver_id) return skipped("missing_driver");

        const existing = await this.repository.findCommissionByPayment(payment_id);
        if (existing) return skipped("already_generated");

        const base_amount = toAmount(payment.total_amount);
        const percentage = FINANZAS_RULES.COMMISSION_PERCENTAGE;

        const commission = await this.repository.insertCommission({
            payment_id,
            assignment_id: payment.assignment_id,
            driver_id: link.driver_id,
            base_amount,
            percentage,
            amount: computeCommissionAmount(base_amount, percentage),
            status: "GENERATED",
        });

        if (!commission) return skipped("already_generated");
        return { status: "applied", result: commission };
    }
}
