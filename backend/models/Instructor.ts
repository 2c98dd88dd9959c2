import mongoose, { Schema } from 'mongoose';
import { ACADEMIC_RANKS, type InstructorRecord } from '../types';

const instructorSchema = new Schema<InstructorRecord>({
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
  rank: {
    type: String,
    enum: [...ACADEMIC_RANKS],
    required: true
  },
  salary: {
    type: Number,
    required: true,
    min: 0
  },
  email: {
    type: String,
    required: true,
    trim: true,
    maxlength: 60
  },
  hireDate: {
    type: String,
    required: true
  },
  office: {
    type: String,
    default: null,
    maxlength: 20
  }
}, { id: false, versionKey: false });

instructorSchema.index({ id: 1 }, { unique: true });
instructorSchema.index({ email: 1 }, { unique: true });
instructorSchema.index({ departmentName: 1 });

export default mongoose.model<InstructorRecord>('Instructor', instructorSchema);
