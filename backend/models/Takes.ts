import mongoose, { Schema } from 'mongoose';
import { LETTER_GRADES, SEMESTERS, type TakesRecord } from '../types';

const takesSchema = new Schema<TakesRecord>({
  studentId: {
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
  },
  cancelled: {
    type: Boolean,
    default: false
  },
  grade: {
    type: String,
    enum: [...LETTER_GRADES, null],
    default: null
  },
  enrollmentDate: {
    type: String,
    required: true
  }
}, { id: false, versionKey: false });

// One row per student per section; cancelling flips the flag instead of deleting
takesSchema.index(
  { studentId: 1, courseId: 1, sectionId: 1, semester: 1, year: 1 },
  { unique: true }
);

// Roster and prerequisite lookups
takesSchema.index({ courseId: 1, sectionId: 1, semester: 1, year: 1, cancelled: 1 });
takesSchema.index({ studentId: 1, courseId: 1, cancelled: 1 });

export default mongoose.model<TakesRecord>('Takes', takesSchema);
