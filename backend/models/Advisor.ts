import mongoose, { Schema } from 'mongoose';
import type { AdvisorRecord } from '../types';

const advisorSchema = new Schema<AdvisorRecord>({
  studentId: {
    type: Number,
    required: true
  },
  instructorId: {
    type: Number,
    default: null
  },
  startDate: {
    type: String,
    required: true
  },
  endDate: {
    type: String,
    default: null
  }
}, { id: false, versionKey: false });

// History is keyed by start date; the open interval is the current advisor
advisorSchema.index({ studentId: 1, startDate: 1 }, { unique: true });
advisorSchema.index({ instructorId: 1 });

export default mongoose.model<AdvisorRecord>('Advisor', advisorSchema);
