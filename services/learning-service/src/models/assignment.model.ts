import mongoose, { Schema } from 'mongoose';

export const AssignmentSchema = new Schema(
  {
    assignmentId: { type: String, required: true },
    courseId: { type: String, required: true },
    title: { type: String, required: true },
    description: { type: String },
    dueDate: { type: Date },
    maxPoints: { type: Number, min: 1 },
    instructions: { type: String },
    createdAt: { type: Date },
  },
  {
    collection: 'assignments',
    versionKey: false,
    autoIndex: false,
  }
);

AssignmentSchema.index({ assignmentId: 1 }, { unique: true });
AssignmentSchema.index({ courseId: 1 });
AssignmentSchema.index({ dueDate: 1 });

export const AssignmentModel = mongoose.models.Assignment || mongoose.model('Assignment', AssignmentSchema);
