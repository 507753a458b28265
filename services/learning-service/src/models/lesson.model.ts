import mongoose, { Schema } from 'mongoose';

export const LessonSchema = new Schema(
  {
    lessonId: { type: String, required: true },
    courseId: { type: String, required: true },
    title: { type: String, required: true },
    content: { type: String },
    videoUrl: { type: String },
    duration: { type: Number, min: 0 },
    order: { type: Number, required: true, min: 1 },
    materials: { type: [String], default: [] },
    createdAt: { type: Date },
  },
  {
    collection: 'lessons',
    versionKey: false,
    autoIndex: false,
  }
);

LessonSchema.index({ lessonId: 1 }, { unique: true });
LessonSchema.index({ courseId: 1 });
// One lesson per position within a course
LessonSchema.index({ courseId: 1, order: 1 }, { unique: true });

export const LessonModel = mongoose.models.Lesson || mongoose.model('Lesson', LessonSchema);
