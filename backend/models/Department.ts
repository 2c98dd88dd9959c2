import mongoose, { Schema } from 'mongoose';
import type { DepartmentRecord } from '../types';

const departmentSchema = new Schema<DepartmentRecord>({
  name: {
    type: String,
    required: true,
    trim: true,
    maxlength: 50
  },
  phone: {
    type: String,
    default: null,
    maxlength: 20
  },
  budget: {
    type: Number,
    required: true,
    min: 0
  },
  building: {
    type: String,
    default: null,
    maxlength: 50
  },
  dean: {
    type: String,
    default: null,
    maxlength: 100
  }
}, { id: false, versionKey: false });

departmentSchema.index({ name: 1 }, { unique: true });

export default mongoose.model<DepartmentRecord>('Department', departmentSchema);
