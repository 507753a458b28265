import mongoose, { Schema } from 'mongoose';
import { ENROLLMENT_STATUSES } from '../schemas/entity.schemas';

export const EnrollmentSchema = new Schema(
  {
    enrollmentId: { type: String, required: true },
    studentId: { type: String, required: true },
    courseId: { type: String, required: true },
    enrollmentDate: { type: Date },
    status: { type: String, enum: ENROLLMENT_STATUSES, default: 'active' },
    progress: { type: Number, min: 0, max: 100, default: 0 },
    completionDate: { type: Date, default: null },
  },
  {
    collection: 'enrollments',
    versionKey: false,
    autoIndex: false,
  }
);

EnrollmentSchema.index({ enrollmentId: 1 }, { unique: true });
// A student enrolls in a course at most once
EnrollmentSchema.index({ studentId: 1, courseId: 1 }, { unique: true });
EnrollmentSchema.index({ enrollmentDate: 1 });

export const EnrollmentModel = mongoose.models.Enrollment || mongoose.model('Enrollment', EnrollmentSchema);
