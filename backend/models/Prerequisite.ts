import mongoose, { Schema } from 'mongoose';
import type { PrerequisiteRecord } from '../types';

const prerequisiteSchema = new Schema<PrerequisiteRecord>({
  courseId: {
    type: String,
    required: true,
    trim: true
  },
  prereqId: {
    type: String,
    default: null,
    trim: true
  }
}, { id: false, versionKey: false });

// Dangling edges (prereqId null) may repeat for one course, so only live edges are unique
prerequisiteSchema.index(
  { courseId: 1, prereqId: 1 },
  { unique: true, partialFilterExpression: { prereqId: { $type: 'string' } } }
);
prerequisiteSchema.index({ prereqId: 1 });

export default mongoose.model<PrerequisiteRecord>('Prerequisite', prerequisiteSchema);
