import { MongoIdRef } from "@/utils/constants";
import mongoose, { Schema, Types } from "mongoose";

export interface PaymentRecord {
    payment_method_id: Types.ObjectId;
    assignment_id: Types.ObjectId;
    total_amount: number;
    issue_receipt?: boolean;
    receipt_type_code?: string;
    issuer_fiscal_id?: string;
    receiving_company_id?: Types.ObjectId;
    receiving_user_id?: Types.ObjectId;
    currency?: string;
    inconsistency?: string;
    created_at: Date;
}

const PaymentSchema: Schema = new Schema<PaymentRecord>({
    payment_method_id: { type: MongoIdRef, ref: "PaymentMethod", required: true },
    assignment_id: { type: MongoIdRef, ref: "Assignment", required: true },
    total_amount: { type: Number, required: true },

    issue_receipt: { type: Boolean, required: false, default: false },
    receipt_type_code: { type: String, required: false },
    issuer_fiscal_id: { type: String, required: false },
    receiving_company_id: { type: MongoIdRef, ref: "Company", required: false },
    receiving_user_id: { type: MongoIdRef, ref: "User", required: false },
    currency: { type: String, required: false },

    // Solo lo escribe el emisor de recibos
    inconsistency: { type: String, required: false },

    created_at: { type: Date, default: Date.now }
});

PaymentSchema.index({ assignment_id: 1 });
PaymentSchema.index({ inconsistency: 1 }, { sparse: true });

export default mongoose.model<PaymentRecord>("Payment", PaymentSchema, "payments");
