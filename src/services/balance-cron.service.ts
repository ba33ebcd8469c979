import dayjs from "dayjs";
import finanzasRepository from "@/repositories/mongo-finanzas.repository";
import { FinanzasRepository } from "@/repositories/finanzas.repository";
import { CommissionReconcilerService } from "@/services/commission_reconciler.service";
import { FINANZAS_RULES } from "@/utils/constants";

export interface BalanceSweepResult {
    checked: number;
    recomputed: number;
    failed: number;
}

/**
 * Recalcula estados de cuenta desactualizados.
 * Cubre abonos cuyo evento de creación se perdió con el watcher caído.
 */
export class BalanceCronService {
    private reconcilerService: CommissionReconcilerService;

    constructor(private readonly repository: FinanzasRepository = finanzasRepository) {
        this.reconcilerService = new CommissionReconcilerService(repository);
    }

    public async recompute_stale_balances({ now = new Date() }: { now?: Date } = {}): Promise<BalanceSweepResult> {
        const cutoff = dayjs(now).subtract(FINANZAS_RULES.BALANCE_STALE_HOURS, "hour").toDate();
        const driverIds = await this.repository.findDriversWithStaleBalance(cutoff);

        let recomputed = 0;
        let failed = 0;

        for (const driver_id of driverIds) {
            try {
                await this.reconcilerService.recompute_driver_balance({ driver_id });
                recomputed++;
            } catch (error) {
                // Un conductor fallido no detiene el resto del barrido
                failed++;
                console.error(`❌ Error al recalcular estado de cuenta del conductor ${driver_id}:`, error);
            }
        }

        return { checked: driverIds.length, recomputed, failed };
    }
}
