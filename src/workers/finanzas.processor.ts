import { FinanzasJobData, FinanzasJobType, finanzasJobId } from '@/queues/finanzas.queue';
import { CommissionGeneratorService, CommissionOutcome } from '@/services/commission_generator.service';
import { CommissionReconcilerService, ReconcileOutcome } from '@/services/commission_reconciler.service';
import { ReceiptIssuerService, ReceiptOutcome } from '@/services/receipt_issuer.service';

export type FinanzasJobOutcome = ReceiptOutcome | CommissionOutcome | ReconcileOutcome;

export interface FinanzasHandlers {
    receiptIssuer: ReceiptIssuerService;
    commissionGenerator: CommissionGeneratorService;
    commissionReconciler: CommissionReconcilerService;
}

/**
 * Despacha cada trabajo a su handler y deja constancia del resultado.
 * Las omisiones se registran pero no se reintentan; los errores se propagan
 * para que BullMQ reintente.
 */
export class FinanzasProcessor {
    private handlers: FinanzasHandlers;

    constructor(handlers?: Partial<FinanzasHandlers>) {
        this.handlers = {
            receiptIssuer: handlers?.receiptIssuer ?? new ReceiptIssuerService(),
            commissionGenerator: handlers?.commissionGenerator ?? new CommissionGeneratorService(),
            commissionReconciler: handlers?.commissionReconciler ?? new CommissionReconcilerService(),
        };
    }

    private dispatch(job: FinanzasJobData): Promise<FinanzasJobOutcome> {
        switch (job.type) {
            case FinanzasJobType.ISSUE_RECEIPT:
                return this.handlers.receiptIssuer.issue_receipt_for_payment(job.data);

            case FinanzasJobType.GENERATE_COMMISSION:
                return this.handlers.commissionGenerator.generate_commission_for_payment(job.data);

            case FinanzasJobType.RECONCILE_COMMISSION:
                return this.handlers.commissionReconciler.reconcile_commission_payment(job.data);
        }
    }

    public async process(job: FinanzasJobData): Promise<FinanzasJobOutcome> {
        const jobId = finanzasJobId(job);
        const outcome = await this.dispatch(job);

        switch (outcome.status) {
            case 'applied':
                console.log(`✅ ${jobId} aplicado`);
                break;
            case 'flagged':
                console.warn(`⚠️ ${jobId} marcado como inconsistente: ${outcome.result.inconsistency}`);
                break;
            case 'skipped':
                console.warn(`⏭️ ${jobId} omitido: ${outcome.reason}`);
                break;
        }

        return outcome;
    }
}
