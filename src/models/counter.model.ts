import mongoose, { Schema } from "mongoose";

/**
 * Secuencia por serie de recibos (_id = serie)
 */
export interface CounterRecord {
    _id: string;
    seq: number;
}

const CounterSchema: Schema = new Schema<CounterRecord>({
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 }
});

export default mongoose.model<CounterRecord>("Counter", CounterSchema, "counters");
