import { CommissionStatus, COMMISSION_STATUSES } from "@/contracts/interfaces/commission.interface";
import { MongoIdRef } from "@/utils/constants";
import mongoose, { Schema, Types } from "mongoose";

export interface CommissionRecord {
    payment_id: Types.ObjectId;
    assignment_id: Types.ObjectId;
    driver_id: Types.ObjectId;
    base_amount: number;
    percentage: number;
    amount: number;
    status?: CommissionStatus;
    created_at: Date;
    updated_at?: Date;
}

const CommissionSchema: Schema = new Schema<CommissionRecord>({
    payment_id: { type: MongoIdRef, ref: "Payment", required: true },
    assignment_id: { type: MongoIdRef, ref: "Assignment", required: true },
    driver_id: { type: MongoIdRef, ref: "User", required: true },

    base_amount: { type: Number, required: true },
    percentage: { type: Number, required: true },
    amount: { type: Number, required: true },

    status: { type: String, enum: [...COMMISSION_STATUSES], default: "GENERATED" },

    created_at: { type: Date, required: true },
    updated_at: { type: Date, required: false }
});

// Una comisión por pago
CommissionSchema.index({ payment_id: 1 }, { unique: true });
CommissionSchema.index({ driver_id: 1, created_at: -1 });

export default mongoose.model<CommissionRecord>("Commission", CommissionSchema, "commissions");
