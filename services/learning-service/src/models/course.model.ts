import mongoose, { Schema } from 'mongoose';
import { COURSE_LEVELS } from '../schemas/entity.schemas';

export const CourseSchema = new Schema(
  {
    courseId: { type: String, required: true },
    title: { type: String, required: true, trim: true },
    description: { type: String },
    instructorId: { type: String, required: true },
    category: { type: String, trim: true },
    level: { type: String, enum: COURSE_LEVELS },
    duration: { type: Number, min: 0 },
    price: { type: Number, min: 0 },
    tags: { type: [String], default: [] },
    createdAt: { type: Date },
    updatedAt: { type: Date },
    isPublished: { type: Boolean, default: false },
  },
  {
    collection: 'courses',
    versionKey: false,
    autoIndex: false,
  }
);

CourseSchema.index({ courseId: 1 }, { unique: true });
CourseSchema.index({ title: 1 });
CourseSchema.index({ category: 1 });
CourseSchema.index({ instructorId: 1 });
CourseSchema.index({ title: 'text', description: 'text' });

export const courseJsonSchema = {
  $jsonSchema: {
    bsonType: 'object',
    required: ['courseId', 'title', 'instructorId'],
    properties: {
      courseId: { bsonType: 'string' },
      title: { bsonType: 'string' },
      instructorId: { bsonType: 'string' },
      level: { enum: [...COURSE_LEVELS] },
    },
  },
};

export const CourseModel = mongoose.models.Course || mongoose.model('Course', CourseSchema);
