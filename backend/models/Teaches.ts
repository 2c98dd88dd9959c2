import mongoose, { Schema } from 'mongoose';
import { SEMESTERS, type TeachesRecord } from '../types';

const teachesSchema = new Schema<TeachesRecord>({
  instructorId: {
    type: Number,
    required: true
  },
  courseId: {
    type: String,
    required: true,
    trim: true
  },
  sectionId: {
    type: String,
    required: true,
    trim: true
  },
  semester: {
    type: String,
    enum: [...SEMESTERS],
    required: true
  },
  year: {
    type: Number,
    required: true
  }
}, { id: false, versionKey: false });

teachesSchema.index(
  { instructorId: 1, courseId: 1, sectionId: 1, semester: 1, year: 1 },
  { unique: true }
);
teachesSchema.index({ courseId: 1, sectionId: 1, semester: 1, year: 1 });

export default mongoose.model<TeachesRecord>('Teaches', teachesSchema);
