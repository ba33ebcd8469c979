import * as cron from "node-cron";
import { BalanceCronService } from "@/services/balance-cron.service";
import { GLOBAL_ENV } from "@/utils/constants";

/**
 * Barrido periódico de estados de cuenta de conductores
 */
export class BalanceCron {
    private balanceService: BalanceCronService;
    private cronJob: cron.ScheduledTask | null = null;

    constructor(balanceService: BalanceCronService = new BalanceCronService()) {
        this.balanceService = balanceService;
    }

    /**
     * Por defecto cada hora en el minuto 0 ('0 * * * *')
     */
    public start(): void {
        this.cronJob = cron.schedule(GLOBAL_ENV.BALANCE_SWEEP_CRON, async () => {
            try {
                await this.runNow();
            } catch (error) {
                console.error("❌ Error en cron job de estados de cuenta:", error);
            }
        }, {
            timezone: GLOBAL_ENV.CRON_TIMEZONE
        });

        console.log(`✅ Cron job de estados de cuenta iniciado (${GLOBAL_ENV.BALANCE_SWEEP_CRON})`);
    }

    public async runNow(): Promise<void> {
        console.log("⏰ Recalculando estados de cuenta desactualizados...");
        const { checked, recomputed, failed } = await this.balanceService.recompute_stale_balances();
        console.log(`✅ Estados de cuenta: ${recomputed}/${checked} recalculados, ${failed} fallidos`);
    }

    public stop(): void {
        if (this.cronJob) {
            this.cronJob.stop();
            this.cronJob = null;
            console.log("🛑 Cron job de estados de cuenta detenido");
        }
    }
}
