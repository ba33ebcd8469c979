import { MongoIdRef } from "@/utils/constants";
import mongoose, { Schema, Types } from "mongoose";

export interface DriverVehicleLinkRecord {
    driver_id?: Types.ObjectId;
    vehicle_id?: Types.ObjectId;
    created_at: Date;
}

const DriverVehicleLinkSchema: Schema = new Schema<DriverVehicleLinkRecord>({
    driver_id: { type: MongoIdRef, ref: "User", required: false },
    vehicle_id: { type: MongoIdRef, ref: "Vehicle", required: false },
    created_at: { type: Date, default: Date.now }
});

DriverVehicleLinkSchema.index({ driver_id: 1 });

export default mongoose.model<DriverVehicleLinkRecord>("DriverVehicleLink", DriverVehicleLinkSchema, "driver_vehicle_links");
