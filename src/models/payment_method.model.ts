import mongoose, { Schema } from "mongoose";

export interface PaymentMethodRecord {
    code: string;
    name?: string;
}

const PaymentMethodSchema: Schema = new Schema<PaymentMethodRecord>({
    code: { type: String, required: true, uppercase: true, trim: true },
    name: { type: String, required: false }
});

PaymentMethodSchema.index({ code: 1 }, { unique: true });

export default mongoose.model<PaymentMethodRecord>("PaymentMethod", PaymentMethodSchema, "payment_methods");
