import {
    Commission,
    CommissionPayment,
    CommissionStatus,
    DriverAccountBalance,
} from "@/contracts/interfaces/commission.interface";
import finanzasRepository from "@/repositories/mongo-finanzas.repository";
import { FinanzasRepository } from "@/repositories/finanzas.repository";
import { CommissionReconcilerService } from "@/services/commission_reconciler.service";
import { ResponseError } from "@/utils/errors";
import { FINANZAS_RULES } from "@/utils/constants";
import { round2, sumAmounts } from "@/utils/money";

const cleanText = (value?: string | null): string | null => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
};

export class CommissionsService {
    private reconcilerService: CommissionReconcilerService;

    constructor(private readonly repository: FinanzasRepository = finanzasRepository) {
        this.reconcilerService = new CommissionReconcilerService(repository);
    }

    /**
     * Registra un abono contra una comisión con deuda pendiente.
     * El estado de la comisión y el estado de cuenta se recalculan en el disparador.
     */
    public async register_commission_payment({
        commission_id,
        amount,
        reference,
        notes
    }: {
        commission_id: string;
        amount: number;
        reference?: string | null;
        notes?: string | null;
    }): Promise<CommissionPayment> {
        try {
            const rounded = round2(amount);
            if (!(rounded > 0)) throw new ResponseError(400, "El monto debe ser mayor a 0");

            return await this.repository.runInTransaction(async (repository) => {
                const commission = await repository.findCommission(commission_id);
                if (!commission) throw new ResponseError(404, "Comisión no encontrada");

                const payments = await repository.findCommissionPayments(commission_id);
                const pending = round2(commission.amount - sumAmounts(payments.map((payment) => payment.amount)));
                if (commission.status === "PAID" || pending <= 0) {
                    throw new ResponseError(409, "La comisión no tiene deuda pendiente");
                }
                if (round2(pending - rounded) < -FINANZAS_RULES.DEBT_TOLERANCE) {
                    throw new ResponseError(400, `El monto excede la deuda pendiente (${pending})`);
                }

                return repository.insertCommissionPayment({
                    commission_id,
                    amount: rounded,
                    reference: cleanText(reference),
                    notes: cleanText(notes),
                });
            });
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            console.error(`Error al registrar abono de la comisión ${commission_id}:`, error);
            throw new ResponseError(500, "No se pudo registrar el abono");
        }
    }

    public async get_commission_payments({ commission_id }: { commission_id: string }): Promise<CommissionPayment[]> {
        try {
            const commission = await this.repository.findCommission(commission_id);
            if (!commission) throw new ResponseError(404, "Comisión no encontrada");

            return await this.repository.findCommissionPayments(commission_id);
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            console.error(`Error al listar abonos de la comisión ${commission_id}:`, error);
            throw new ResponseError(500, "No se pudo obtener el historial de abonos");
        }
    }

    public async list_driver_commissions({
        driver_id,
        status
    }: {
        driver_id: string;
        status?: CommissionStatus;
    }): Promise<Commission[]> {
        try {
            return await this.repository.findCommissionsByDriver(driver_id, status);
        } catch (error) {
            console.error(`Error al listar comisiones del conductor ${driver_id}:`, error);
            throw new ResponseError(500, "No se pudo obtener las comisiones");
        }
    }

    /**
     * Sin registro de estado de cuenta el conductor no debe nada
     */
    public async get_driver_balance({
        driver_id
    }: {
        driver_id: string;
    }): Promise<DriverAccountBalance | { driver_id: string; balance: number; updated_at: null }> {
        try {
            const balance = await this.repository.findDriverBalance(driver_id);
            return balance ?? { driver_id, balance: 0, updated_at: null };
        } catch (error) {
            console.error(`Error al obtener estado de cuenta del conductor ${driver_id}:`, error);
            throw new ResponseError(500, "No se pudo obtener el estado de cuenta");
        }
    }

    public async recompute_driver_balance({ driver_id }: { driver_id: string }): Promise<DriverAccountBalance> {
        try {
            return await this.reconcilerService.recompute_driver_balance({ driver_id });
        } catch (error) {
            if (error instanceof ResponseError) throw error;
            console.error(`Error al recalcular estado de cuenta del conductor ${driver_id}:`, error);
            throw new ResponseError(500, "No se pudo recalcular el estado de cuenta");
        }
    }
}
