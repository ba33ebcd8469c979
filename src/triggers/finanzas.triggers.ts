import { mongo } from "mongoose";
import commissionPaymentModel, { CommissionPaymentRecord } from "@/models/commission_payment.model";
import paymentModel, { PaymentRecord } from "@/models/payment.model";
import { CommissionPaymentSnapshot } from "@/contracts/interfaces/commission.interface";
import { PaymentSnapshot } from "@/contracts/interfaces/payment.interface";
import FinanzasQueue, { FinanzasJobData, FinanzasJobType } from "@/queues/finanzas.queue";
import { WithId, toCommissionPayment, toPayment } from "@/repositories/finanzas.mappers";

type InsertEvent<T extends mongo.Document> = mongo.ChangeStreamInsertDocument<WithId<T>>;

const RESTART_DELAY_MS = 5000;

export const paymentSnapshot = (doc: WithId<PaymentRecord>): PaymentSnapshot => {
    const { _id, created_at, ...snapshot } = toPayment(doc);
    return snapshot;
};

export const commissionPaymentSnapshot = (doc: WithId<CommissionPaymentRecord>): CommissionPaymentSnapshot => {
    const { _id, created_at, ...snapshot } = toCommissionPayment(doc);
    return snapshot;
};

/**
 * Un pago creado dispara dos trabajos independientes: recibo y comisión
 */
export const jobsForPaymentInsert = (event: InsertEvent<PaymentRecord>): FinanzasJobData[] => {
    const payment_id = event.documentKey._id.toString();
    const payment = paymentSnapshot(event.fullDocument);
    return [
        { type: FinanzasJobType.ISSUE_RECEIPT, data: { payment_id, payment } },
        { type: FinanzasJobType.GENERATE_COMMISSION, data: { payment_id, payment } },
    ];
};

export const jobsForCommissionPaymentInsert = (event: InsertEvent<CommissionPaymentRecord>): FinanzasJobData[] => [
    {
        type: FinanzasJobType.RECONCILE_COMMISSION,
        data: {
            commission_payment_id: event.documentKey._id.toString(),
            commission_payment: commissionPaymentSnapshot(event.fullDocument),
        },
    },
];

interface Watched<T extends mongo.Document> {
    name: string;
    open: (resumeAfter?: mongo.ResumeToken) => mongo.ChangeStream<WithId<T>, InsertEvent<T>>;
    stream: mongo.ChangeStream<WithId<T>, InsertEvent<T>> | null;
    resumeToken?: mongo.ResumeToken;
    restartTimer: NodeJS.Timeout | null;
    pending: Promise<void>;
}

/**
 * Disparadores "documento creado" sobre change streams de MongoDB.
 * Cada inserción se convierte en trabajos de la cola de finanzas.
 */
export class FinanzasTriggers {
    private static instance: FinanzasTriggers;
    private running = false;

    private payments: Watched<PaymentRecord> = {
        name: "payments",
        stream: null,
        restartTimer: null,
        pending: Promise.resolve(),
        open: (resumeAfter) =>
            paymentModel.watch<WithId<PaymentRecord>, InsertEvent<PaymentRecord>>(
                [{ $match: { operationType: "insert" } }],
                { resumeAfter }
            ),
    };

    private commissionPayments: Watched<CommissionPaymentRecord> = {
        name: "commission_payments",
        stream: null,
        restartTimer: null,
        pending: Promise.resolve(),
        open: (resumeAfter) =>
            commissionPaymentModel.watch<WithId<CommissionPaymentRecord>, InsertEvent<CommissionPaymentRecord>>(
                [{ $match: { operationType: "insert" } }],
                { resumeAfter }
            ),
    };

    private constructor() {}

    public static getInstance(): FinanzasTriggers {
        if (!FinanzasTriggers.instance) {
            FinanzasTriggers.instance = new FinanzasTriggers();
        }
        return FinanzasTriggers.instance;
    }

    private async enqueue(jobs: FinanzasJobData[]): Promise<void> {
        const queue = FinanzasQueue.getInstance();
        for (const job of jobs) {
            await queue.addJob(job);
        }
    }

    private watch<T extends mongo.Document>(target: Watched<T>, toJobs: (event: InsertEvent<T>) => FinanzasJobData[]): void {
        const stream = target.open(target.resumeToken);
        target.stream = stream;

        // Los eventos se encolan en orden; el token solo avanza cuando todos sus trabajos
        // quedaron en la cola. Si el encolado falla se reabre desde el último token encolado.
        stream.on("change", (event) => {
            target.pending = target.pending
                .then(async () => {
                    if (target.stream !== stream) return;
                    await this.enqueue(toJobs(event));
                    target.resumeToken = event._id;
                })
                .catch((error: unknown) => {
                    console.error(`❌ No se pudo encolar el evento de ${target.name} ${event.documentKey._id.toString()}:`, error);
                    if (target.stream === stream) this.restart(target, toJobs);
                });
        });

        stream.on("error", (error) => {
            console.error(`❌ Error en el disparador de ${target.name}:`, error);
            this.restart(target, toJobs);
        });
    }

    private restart<T extends mongo.Document>(target: Watched<T>, toJobs: (event: InsertEvent<T>) => FinanzasJobData[]): void {
        if (!this.running || target.restartTimer) return;
        const closing = target.stream;
        target.stream = null;
        closing?.close().catch((error: unknown) => {
            console.error(`❌ Error al cerrar el disparador de ${target.name}:`, error);
        });
        target.restartTimer = setTimeout(() => {
            target.restartTimer = null;
            if (!this.running) return;
            console.log(`🔄 Reabriendo disparador de ${target.name} desde el último evento`);
            this.watch(target, toJobs);
        }, RESTART_DELAY_MS);
    }

    private async close<T extends mongo.Document>(target: Watched<T>): Promise<void> {
        if (target.restartTimer) clearTimeout(target.restartTimer);
        target.restartTimer = null;
        const closing = target.stream;
        target.stream = null;
        await closing?.close();
        await target.pending;
    }

    public start(): void {
        if (this.running) return;
        this.running = true;

        this.watch(this.payments, jobsForPaymentInsert);
        this.watch(this.commissionPayments, jobsForCommissionPaymentInsert);
        console.log("✅ Disparadores de pagos y abonos de comisión iniciados");
    }

    public async stop(): Promise<void> {
        this.running = false;
        await this.close(this.payments);
        await this.close(this.commissionPayments);
        console.log("🛑 Disparadores detenidos");
    }
}
