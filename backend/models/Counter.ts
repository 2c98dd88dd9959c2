import mongoose, { Schema } from 'mongoose';

export interface CounterRecord {
  name: string;
  seq: number;
}

/**
 * Sequence documents backing the numeric student and instructor ids
 */
const counterSchema = new Schema<CounterRecord>({
  name: {
    type: String,
    required: true
  },
  seq: {
    type: Number,
    default: 0
  }
}, { versionKey: false });

counterSchema.index({ name: 1 }, { unique: true });

export default mongoose.model<CounterRecord>('Counter', counterSchema);
