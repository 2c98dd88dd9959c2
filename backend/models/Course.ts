import mongoose, { Schema } from 'mongoose';
import type { CourseRecord } from '../types';

const courseSchema = new Schema<CourseRecord>({
  courseId: {
    type: String,
    required: true,
    uppercase: true,
    trim: true,
    maxlength: 10
  },
  title: {
    type: String,
    required: true,
    trim: true,
    maxlength: 100
  },
  credits: {
    type: Number,
    required: true,
    min: 1,
    max: 4
  },
  departmentName: {
    type: String,
    required: true,
    trim: true
  },
  description: {
    type: String,
    default: null
  }
}, { id: false, versionKey: false });

courseSchema.index({ courseId: 1 }, { unique: true });
courseSchema.index({ departmentName: 1 });

export default mongoose.model<CourseRecord>('Course', courseSchema);
