import mongoose, { Schema } from 'mongoose';

export const SubmissionSchema = new Schema(
  {
    submissionId: { type: String, required: true },
    assignmentId: { type: String, required: true },
    studentId: { type: String, required: true },
    submissionDate: { type: Date },
    content: { type: String },
    grade: { type: Number, min: 0, max: 100, default: null },
    feedback: { type: String, default: null },
    gradedDate: { type: Date, default: null },
  },
  {
    collection: 'submissions',
    versionKey: false,
    autoIndex: false,
  }
);

SubmissionSchema.index({ submissionId: 1 }, { unique: true });
SubmissionSchema.index({ studentId: 1, assignmentId: 1 });

export const SubmissionModel = mongoose.models.Submission || mongoose.model('Submission', SubmissionSchema);
