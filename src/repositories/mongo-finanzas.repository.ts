import mongoose, { ClientSession, FilterQuery, Types } from "mongoose";
import assignmentModel, { AssignmentRecord } from "@/models/assignment.model";
import commissionModel, { CommissionRecord } from "@/models/commission.model";
import commissionPaymentModel, { CommissionPaymentRecord } from "@/models/commission_payment.model";
import counterModel from "@/models/counter.model";
import driverAccountBalanceModel, { DriverAccountBalanceRecord } from "@/models/driver_account_balance.model";
import driverVehicleLinkModel, { DriverVehicleLinkRecord } from "@/models/driver_vehicle_link.model";
import paymentModel, { PaymentRecord } from "@/models/payment.model";
import paymentMethodModel from "@/models/payment_method.model";
import receiptModel, { ReceiptRecord } from "@/models/receipt.model";
import { Assignment, DriverVehicleLink } from "@/contracts/interfaces/assignment.interface";
import {
    Commission,
    CommissionDraft,
    CommissionPayment,
    CommissionStatus,
    DriverAccountBalance,
    NewCommissionPayment,
} from "@/contracts/interfaces/commission.interface";
import { NewPayment, Payment, PaymentMethod } from "@/contracts/interfaces/payment.interface";
import { Receipt, ReceiptDraft } from "@/contracts/interfaces/receipt.interface";
import { FinanzasRepository } from "@/repositories/finanzas.repository";
import {
    WithId,
    idToString,
    toBalance,
    toCommission,
    toCommissionPayment,
    toPayment,
    toReceipt,
} from "@/repositories/finanzas.mappers";
import { ResponseError } from "@/utils/errors";

const OBJECT_ID_PATTERN = /^[a-f\d]{24}$/i;

const toObjectId = (id: string | undefined | null): Types.ObjectId | null =>
    id && OBJECT_ID_PATTERN.test(id) ? new Types.ObjectId(id) : null;

const requireObjectId = (id: string, field: string): Types.ObjectId => {
    const objectId = toObjectId(id);
    if (!objectId) throw new ResponseError(400, `${field} no es un id válido`);
    return objectId;
};

const isDuplicateKeyError = (error: unknown): boolean =>
    error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

/**
 * Implementación sobre MongoDB.
 * Con `session` todas las operaciones participan de esa transacción.
 */
export class MongoFinanzasRepository implements FinanzasRepository {
    constructor(private readonly session: ClientSession | null = null) {}

    public async findPaymentMethod(id: string): Promise<PaymentMethod | null> {
        const _id = toObjectId(id);
        if (!_id) return null;
        const doc = await paymentMethodModel.findById(_id).session(this.session).lean();
        if (!doc) return null;
        return { _id: doc._id.toString(), code: doc.code ?? "", name: doc.name };
    }

    public async findAssignment(id: string): Promise<Assignment | null> {
        const _id = toObjectId(id);
        if (!_id) return null;
        const doc = await assignmentModel.findById(_id).session(this.session).lean<WithId<AssignmentRecord>>();
        if (!doc) return null;
        return { _id: doc._id.toString(), driver_vehicle_link_id: idToString(doc.driver_vehicle_link_id) };
    }

    public async findDriverVehicleLink(id: string): Promise<DriverVehicleLink | null> {
        const _id = toObjectId(id);
        if (!_id) return null;
        const doc = await driverVehicleLinkModel.findById(_id).session(this.session).lean<WithId<DriverVehicleLinkRecord>>();
        if (!doc) return null;
        return {
            _id: doc._id.toString(),
            driver_id: idToString(doc.driver_id),
            vehicle_id: idToString(doc.vehicle_id),
        };
    }

    public async insertPayment(input: NewPayment): Promise<Payment> {
        const [doc] = await paymentModel.create(
            [
                {
                    payment_method_id: requireObjectId(input.payment_method_id, "payment_method_id"),
                    assignment_id: requireObjectId(input.assignment_id, "assignment_id"),
                    total_amount: input.total_amount,
                    issue_receipt: input.issue_receipt ?? false,
                    receipt_type_code: input.receipt_type_code,
                    issuer_fiscal_id: input.issuer_fiscal_id,
                    receiving_company_id: input.receiving_company_id
                        ? requireObjectId(input.receiving_company_id, "receiving_company_id")
                        : undefined,
                    receiving_user_id: input.receiving_user_id
                        ? requireObjectId(input.receiving_user_id, "receiving_user_id")
                        : undefined,
                    currency: input.currency,
                },
            ],
            { session: this.session }
        );
        return toPayment(doc.toObject<WithId<PaymentRecord>>());
    }

    public async findPayment(id: string): Promise<Payment | null> {
        const _id = toObjectId(id);
        if (!_id) return null;
        const doc = await paymentModel.findById(_id).session(this.session).lean<WithId<PaymentRecord>>();
        return doc ? toPayment(doc) : null;
    }

    public async flagPaymentInconsistency(payment_id: string, marker: string): Promise<void> {
        await paymentModel.updateOne(
            { _id: requireObjectId(payment_id, "payment_id") },
            { $set: { inconsistency: marker } },
            { session: this.session }
        );
    }

    public async findReceiptByPayment(payment_id: string): Promise<Receipt | null> {
        const _id = toObjectId(payment_id);
        if (!_id) return null;
        const doc = await receiptModel.findOne({ payment_id: _id }).session(this.session).lean<WithId<ReceiptRecord>>();
        return doc ? toReceipt(doc) : null;
    }

    public async nextReceiptNumber(series: string): Promise<number> {
        const counter = await counterModel.findOneAndUpdate(
            { _id: series },
            { $inc: { seq: 1 } },
            { new: true, upsert: true, session: this.session }
        ).lean();
        if (!counter) throw new Error(`No se pudo incrementar la serie ${series}`);
        return counter.seq;
    }

    /**
     * El filtro nunca coincide con un recibo existente (todos tienen `issued_at`),
     * así que el upsert siempre intenta insertar y el índice único de `payment_id`
     * rechaza el duplicado. `$$NOW` es la hora del servidor de base de datos.
     */
    public async insertReceipt(draft: ReceiptDraft): Promise<Receipt | null> {
        const payment_id = requireObjectId(draft.payment_id, "payment_id");
        try {
            const result = await receiptModel.updateOne(
                { payment_id, issued_at: { $exists: false } },
                [
                    {
                        $set: {
                            receipt_type: { $literal: draft.receipt_type },
                            issuer_fiscal_id: { $literal: draft.issuer_fiscal_id },
                            receiving_company_id: { $literal: toObjectId(draft.receiving_company_id) },
                            receiving_user_id: { $literal: toObjectId(draft.receiving_user_id) },
                            series: { $literal: draft.series },
                            number: { $literal: draft.number },
                            total: { $literal: draft.total },
                            currency: { $literal: draft.currency },
                            issued_at: "$$NOW",
                        },
                    },
                ],
                { upsert: true, session: this.session }
            );
            if (!result.upsertedId) return null;
            const doc = await receiptModel.findById(result.upsertedId).session(this.session).lean<WithId<ReceiptRecord>>();
            return doc ? toReceipt(doc) : null;
        } catch (error) {
            if (isDuplicateKeyError(error)) return null;
            throw error;
        }
    }

    public async findCommission(id: string): Promise<Commission | null> {
        const _id = toObjectId(id);
        if (!_id) return null;
        const doc = await commissionModel.findById(_id).session(this.session).lean<WithId<CommissionRecord>>();
        return doc ? toCommission(doc) : null;
    }

    public async findCommissionByPayment(payment_id: string): Promise<Commission | null> {
        const _id = toObjectId(payment_id);
        if (!_id) return null;
        const doc = await commissionModel.findOne({ payment_id: _id }).session(this.session).lean<WithId<CommissionRecord>>();
        return doc ? toCommission(doc) : null;
    }

    public async insertCommission(draft: CommissionDraft): Promise<Commission | null> {
        const payment_id = requireObjectId(draft.payment_id, "payment_id");
        try {
            const result = await commissionModel.updateOne(
                { payment_id, created_at: { $exists: false } },
                [
                    {
                        $set: {
                            assignment_id: { $literal: requireObjectId(draft.assignment_id, "assignment_id") },
                            driver_id: { $literal: requireObjectId(draft.driver_id, "driver_id") },
                            base_amount: { $literal: draft.base_amount },
                            percentage: { $literal: draft.percentage },
                            amount: { $literal: draft.amount },
                            status: { $literal: draft.status ?? "GENERATED" },
                            created_at: "$$NOW",
                        },
                    },
                ],
                { upsert: true, session: this.session }
            );
            if (!result.upsertedId) return null;
            const doc = await commissionModel.findById(result.upsertedId).session(this.session).lean<WithId<CommissionRecord>>();
            return doc ? toCommission(doc) : null;
        } catch (error) {
            if (isDuplicateKeyError(error)) return null;
            throw error;
        }
    }

    public async findCommissionsByDriver(driver_id: string, status?: CommissionStatus): Promise<Commission[]> {
        const _id = toObjectId(driver_id);
        if (!_id) return [];
        const filter: FilterQuery<CommissionRecord> = { driver_id: _id };
        if (status) {
            // Una comisión sin estado cuenta como GENERATED
            filter.status = status === "GENERATED" ? { $in: ["GENERATED", null] } : status;
        }
        const docs = await commissionModel.find(filter)
            .sort({ created_at: -1 })
            .session(this.session)
            .lean<WithId<CommissionRecord>[]>();
        return docs.map(toCommission);
    }

    public async updateCommissionStatus(id: string, status: CommissionStatus): Promise<void> {
        await commissionModel.updateOne(
            { _id: requireObjectId(id, "commission_id") },
            { $set: { status }, $currentDate: { updated_at: true } },
            { session: this.session }
        );
    }

    public async insertCommissionPayment(input: NewCommissionPayment): Promise<CommissionPayment> {
        const [doc] = await commissionPaymentModel.create(
            [
                {
                    commission_id: requireObjectId(input.commission_id, "commission_id"),
                    amount: input.amount,
                    reference: input.reference ?? null,
                    notes: input.notes ?? null,
                },
            ],
            { session: this.session }
        );
        return toCommissionPayment(doc.toObject<WithId<CommissionPaymentRecord>>());
    }

    public async findCommissionPayments(commission_id: string): Promise<CommissionPayment[]> {
        const _id = toObjectId(commission_id);
        if (!_id) return [];
        const docs = await commissionPaymentModel.find({ commission_id: _id })
            .sort({ created_at: -1 })
            .session(this.session)
            .lean<WithId<CommissionPaymentRecord>[]>();
        return docs.map(toCommissionPayment);
    }

    public async findDriverBalance(driver_id: string): Promise<DriverAccountBalance | null> {
        const _id = toObjectId(driver_id);
        if (!_id) return null;
        const doc = await driverAccountBalanceModel.findOne({ driver_id: _id })
            .session(this.session)
            .lean<WithId<DriverAccountBalanceRecord>>();
        return doc ? toBalance(doc) : null;
    }

    public async upsertDriverBalance(driver_id: string, balance: number): Promise<DriverAccountBalance> {
        const doc = await driverAccountBalanceModel.findOneAndUpdate(
            { driver_id: requireObjectId(driver_id, "driver_id") },
            { $set: { balance }, $currentDate: { updated_at: true } },
            { new: true, upsert: true, session: this.session }
        ).lean<WithId<DriverAccountBalanceRecord>>();
        if (!doc) throw new Error(`No se pudo actualizar el estado de cuenta del conductor ${driver_id}`);
        return toBalance(doc);
    }

    public async findDriversWithStaleBalance(cutoff: Date): Promise<string[]> {
        const balances = await driverAccountBalanceModel.find({})
            .select("driver_id updated_at")
            .session(this.session)
            .lean<WithId<DriverAccountBalanceRecord>[]>();
        const withCommissions: Types.ObjectId[] = await commissionModel.distinct("driver_id").session(this.session);
        const recentPayments = await commissionPaymentModel.aggregate<{ _id: Types.ObjectId; last_payment_at: Date }>([
            { $match: { created_at: { $gte: cutoff } } },
            { $lookup: { from: "commissions", localField: "commission_id", foreignField: "_id", as: "commission" } },
            { $unwind: "$commission" },
            { $group: { _id: "$commission.driver_id", last_payment_at: { $max: "$created_at" } } },
        ]).session(this.session);

        const updatedAt = new Map(balances.map((doc) => [doc.driver_id.toString(), doc.updated_at]));
        const driverIds = new Set<string>();

        for (const doc of balances) {
            if (doc.updated_at.getTime() < cutoff.getTime()) driverIds.add(doc.driver_id.toString());
        }
        for (const id of withCommissions) {
            if (!updatedAt.has(id.toString())) driverIds.add(id.toString());
        }
        for (const { _id, last_payment_at } of recentPayments) {
            const balanceAt = updatedAt.get(_id.toString());
            if (!balanceAt || balanceAt.getTime() < last_payment_at.getTime()) driverIds.add(_id.toString());
        }
        return [...driverIds];
    }

    public async runInTransaction<T>(work: (repository: FinanzasRepository) => Promise<T>): Promise<T> {
        if (this.session) return work(this);
        // connection.transaction reintenta ante conflictos de escritura
        return mongoose.connection.transaction((session) => work(new MongoFinanzasRepository(session)));
    }
}

export default new MongoFinanzasRepository();
