import { MongoIdRef } from "@/utils/constants";
import mongoose, { Schema, Types } from "mongoose";

export interface CommissionPaymentRecord {
    commission_id: Types.ObjectId;
    amount: number;
    reference?: string | null;
    notes?: string | null;
    created_at: Date;
}

const CommissionPaymentSchema: Schema = new Schema<CommissionPaymentRecord>({
    commission_id: { type: MongoIdRef, ref: "Commission", required: true },
    amount: { type: Number, required: true },
    reference: { type: String, default: null },
    notes: { type: String, default: null },
    created_at: { type: Date, default: Date.now }
});

CommissionPaymentSchema.index({ commission_id: 1, created_at: -1 });

export default mongoose.model<CommissionPaymentRecord>("CommissionPayment", CommissionPaymentSchema, "commission_payments");
