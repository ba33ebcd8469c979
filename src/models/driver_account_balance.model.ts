import { MongoIdRef } from "@/utils/constants";
import mongoose, { Schema, Types } from "mongoose";

export interface DriverAccountBalanceRecord {
    driver_id: Types.ObjectId;
    balance: number;
    updated_at: Date;
}

const DriverAccountBalanceSchema: Schema = new Schema<DriverAccountBalanceRecord>({
    driver_id: { type: MongoIdRef, ref: "User", required: true },
    balance: { type: Number, required: true, default: 0 },
    updated_at: { type: Date, required: true }
});

DriverAccountBalanceSchema.index({ driver_id: 1 }, { unique: true });
DriverAccountBalanceSchema.index({ updated_at: 1 });

export default mongoose.model<DriverAccountBalanceRecord>("DriverAccountBalance", DriverAccountBalanceSchema, "driver_account_balances");
