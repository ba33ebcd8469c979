import { ReceiptTypeCode, RECEIPT_TYPE_CODES } from "@/contracts/interfaces/payment.interface";
import { MongoIdRef } from "@/utils/constants";
import mongoose, { Schema, Types } from "mongoose";

export interface ReceiptRecord {
    payment_id: Types.ObjectId;
    receipt_type: ReceiptTypeCode;
    issuer_fiscal_id: string;
    receiving_company_id: Types.ObjectId | null;
    receiving_user_id: Types.ObjectId | null;
    series: string;
    number: string;
    total: number;
    currency: string;
    issued_at: Date;
}

const ReceiptSchema: Schema = new Schema<ReceiptRecord>({
    payment_id: { type: MongoIdRef, ref: "Payment", required: true },
    receipt_type: { type: String, enum: [...RECEIPT_TYPE_CODES], required: true },
    issuer_fiscal_id: { type: String, required: true },
    receiving_company_id: { type: MongoIdRef, ref: "Company", default: null },
    receiving_user_id: { type: MongoIdRef, ref: "User", default: null },

    series: { type: String, required: true },
    number: { type: String, required: true },

    total: { type: Number, required: true },
    currency: { type: String, required: true },

    issued_at: { type: Date, required: true }
});

// Un recibo por pago
ReceiptSchema.index({ payment_id: 1 }, { unique: true });
ReceiptSchema.index({ series: 1, number: 1 }, { unique: true });

export default mongoose.model<ReceiptRecord>("Receipt", ReceiptSchema, "receipts");
