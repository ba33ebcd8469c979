import { Queue } from 'bullmq';
import RedisConnection from '@/config/redis.config';
import { CommissionPaymentSnapshot } from '@/contracts/interfaces/commission.interface';
import { PaymentSnapshot } from '@/contracts/interfaces/payment.interface';

export const FINANZAS_QUEUE_NAME = 'finanzas-queue';

// Tipos de trabajos disparados por la creación de documentos
export enum FinanzasJobType {
    ISSUE_RECEIPT = 'issue_receipt',
    GENERATE_COMMISSION = 'generate_commission',
    RECONCILE_COMMISSION = 'reconcile_commission',
}

export type FinanzasJobData =
    | { type: FinanzasJobType.ISSUE_RECEIPT; data: { payment_id: string; payment: PaymentSnapshot } }
    | { type: FinanzasJobType.GENERATE_COMMISSION; data: { payment_id: string; payment: PaymentSnapshot } }
    | {
          type: FinanzasJobType.RECONCILE_COMMISSION;
          data: { commission_payment_id: string; commission_payment: CommissionPaymentSnapshot };
      };

/**
 * Id determinístico: un evento reentregado para el mismo documento
 * no se encola dos veces mientras BullMQ conserve el trabajo.
 */
export const finanzasJobId = (job: FinanzasJobData): string => {
    const sourceId = job.type === FinanzasJobType.RECONCILE_COMMISSION
        ? job.data.commission_payment_id
        : job.data.payment_id;
    return `${job.type}-${sourceId}`;
};

class FinanzasQueue {
    private static instance: FinanzasQueue;
    private queue: Queue<FinanzasJobData> | null = null;

    private constructor() {}

    public static getInstance(): FinanzasQueue {
        if (!FinanzasQueue.instance) {
            FinanzasQueue.instance = new FinanzasQueue();
        }
        return FinanzasQueue.instance;
    }

    public initialize(): Queue<FinanzasJobData> {
        if (this.queue) {
            return this.queue;
        }

        const connectionOptions = RedisConnection.getInstance().getConnectionOptions();

        this.queue = new Queue<FinanzasJobData>(FINANZAS_QUEUE_NAME, {
            connection: connectionOptions,
            defaultJobOptions: {
                attempts: 3,
                backoff: {
                    type: 'exponential',
                    delay: 2000,
                },
                removeOnComplete: {
                    age: 24 * 3600,
                    count: 1000,
                },
                removeOnFail: {
                    age: 7 * 24 * 3600,
                },
            },
        });

        this.queue.on('error', (error) => {
            console.error('❌ Error en la cola de finanzas:', error);
        });

        console.log('✅ Cola de finanzas inicializada');
        return this.queue;
    }

    public getQueue(): Queue<FinanzasJobData> {
        if (!this.queue) {
            return this.initialize();
        }
        return this.queue;
    }

    public async addJob(job: FinanzasJobData): Promise<void> {
        const jobId = finanzasJobId(job);
        await this.getQueue().add(job.type, job, { jobId });
        console.log(`📥 Trabajo de finanzas encolado: ${jobId}`);
    }

    public async close(): Promise<void> {
        if (this.queue) {
            await this.queue.close();
            this.queue = null;
            console.log('🔌 Cola de finanzas cerrada');
        }
    }
}

export default FinanzasQueue;
