import mongoose, { Schema } from 'mongoose';
import { SEMESTERS, type SectionRecord } from '../types';

const sectionSchema = new Schema<SectionRecord>({
  courseId: {
    type: String,
    required: true,
    trim: true
  },
  sectionId: {
    type: String,
    required: true,
    trim: true,
    maxlength: 8
  },
  semester: {
    type: String,
    enum: [...SEMESTERS],
    required: true
  },
  year: {
    type: Number,
    required: true,
    min: 1702,
    max: 2099
  },
  timeSlot: {
    type: String,
    required: true
  },
  room: {
    type: String,
    default: null,
    maxlength: 15
  },
  capacity: {
    type: Number,
    required: true,
    min: 1
  },
  enrolled: {
    type: Number,
    default: 0,
    min: 0
  }
}, { id: false, versionKey: false });

sectionSchema.index(
  { courseId: 1, sectionId: 1, semester: 1, year: 1 },
  { unique: true }
);
sectionSchema.index({ semester: 1, year: 1 });

export default mongoose.model<SectionRecord>('Section', sectionSchema);
