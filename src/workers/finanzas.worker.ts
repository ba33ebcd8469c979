import { Worker, Job } from 'bullmq';
import RedisConnection from '@/config/redis.config';
import { FINANZAS_QUEUE_NAME, FinanzasJobData } from '@/queues/finanzas.queue';
import { GLOBAL_ENV } from '@/utils/constants';
import { FinanzasJobOutcome, FinanzasProcessor } from '@/workers/finanzas.processor';

class FinanzasWorker {
    private static instance: FinanzasWorker;
    private worker: Worker<FinanzasJobData, FinanzasJobOutcome> | null = null;
    private processor = new FinanzasProcessor();

    private constructor() {}

    public static getInstance(): FinanzasWorker {
        if (!FinanzasWorker.instance) {
            FinanzasWorker.instance = new FinanzasWorker();
        }
        return FinanzasWorker.instance;
    }

    public initialize(): Worker<FinanzasJobData, FinanzasJobOutcome> {
        if (this.worker) {
            return this.worker;
        }

        const connectionOptions = RedisConnection.getInstance().getConnectionOptions();

        this.worker = new Worker<FinanzasJobData, FinanzasJobOutcome>(
            FINANZAS_QUEUE_NAME,
            async (job: Job<FinanzasJobData, FinanzasJobOutcome>) => {
                return await this.processor.process(job.data);
            },
            {
                connection: connectionOptions,
                concurrency: GLOBAL_ENV.FINANZAS_WORKER_CONCURRENCY,
            }
        );

        this.worker.on('failed', (job, err) => {
            console.error(`❌ Trabajo de finanzas fallido: ${job?.id} (intento ${job?.attemptsMade ?? 0})`, err);
        });

        this.worker.on('error', (error) => {
            console.error('❌ Error en el worker de finanzas:', error);
        });

        console.log('✅ Worker de finanzas inicializado');
        return this.worker;
    }

    public async close(): Promise<void> {
        if (this.worker) {
            await this.worker.close();
            this.worker = null;
            console.log('🔌 Worker de finanzas cerrado');
        }
    }
}

export default FinanzasWorker;
