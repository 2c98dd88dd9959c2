import mongoose, { Schema } from 'mongoose';
import { STUDENT_STATUSES, type StudentRecord } from '../types';

const studentSchema = new Schema<StudentRecord>({
  id: {
    type: Number,
    required: true,
    min: 1
  },
  firstName: {
    type: String,
    required: true,
    trim: true,
    maxlength: 25
  },
  lastName: {
    type: String,
    required: true,
    trim: true,
    maxlength: 25
  },
  departmentName: {
    type: String,
    required: true,
    trim: true
  },
  major: {
    type: String,
    default: null,
    trim: true
  },
  totalCredits: {
    type: Number,
    default: 0,
    min: 0
  },
  email: {
    type: String,
    required: true,
    trim: true,
    maxlength: 60
  },
  enrollmentDate: {
    type: String,
    required: true
  },
  status: {
    type: String,
    enum: [...STUDENT_STATUSES],
    default: 'Active',
    required: true
  }
}, { id: false, versionKey: false });

studentSchema.index({ id: 1 }, { unique: true });
studentSchema.index({ email: 1 }, { unique: true });

// Restrict checks on department delete
studentSchema.index({ departmentName: 1 });

export default mongoose.model<StudentRecord>('Student', studentSchema);
