import { MongoIdRef } from "@/utils/constants";
import mongoose, { Schema, Types } from "mongoose";

export interface AssignmentRecord {
    driver_vehicle_link_id?: Types.ObjectId;
    created_at: Date;
}

const AssignmentSchema: Schema = new Schema<AssignmentRecord>({
    driver_vehicle_link_id: { type: MongoIdRef, ref: "DriverVehicleLink", required: false },
    created_at: { type: Date, default: Date.now }
});

export default mongoose.model<AssignmentRecord>("Assignment", AssignmentSchema, "assignments");
