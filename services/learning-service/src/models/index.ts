import type { Collection, Schema, mongo } from 'mongoose';
import type { CollectionName } from '../schemas/entity.schemas';
import { UserModel, UserSchema, userJsonSchema } from './user.model';
import { CourseModel, CourseSchema, courseJsonSchema } from './course.model';
import { LessonModel, LessonSchema } from './lesson.model';
import { AssignmentModel, AssignmentSchema } from './assignment.model';
import { EnrollmentModel, EnrollmentSchema } from './enrollment.model';
import { SubmissionModel, SubmissionSchema } from './submission.model';

/**
 * The parts of a mongoose model the document store drives directly.
 */
export interface ManagedModel {
  readonly collection: Collection;
  createCollection(options?: mongo.CreateCollectionOptions): Promise<unknown>;
  syncIndexes(): Promise<unknown>;
}

export interface CollectionDefinition {
  name: CollectionName;
  schema: Schema;
  model: ManagedModel;
  /** Human-readable key, unique within the collection */
  displayIdField: string;
  validator?: mongo.Document;
}

export const collectionDefinitions: Record<CollectionName, CollectionDefinition> = {
  users: { name: 'users', schema: UserSchema, model: UserModel, displayIdField: 'userId', validator: userJsonSchema },
  courses: { name: 'courses', schema: CourseSchema, model: CourseModel, displayIdField: 'courseId', validator: courseJsonSchema },
  lessons: { name: 'lessons', schema: LessonSchema, model: LessonModel, displayIdField: 'lessonId' },
  assignments: { name: 'assignments', schema: AssignmentSchema, model: AssignmentModel, displayIdField: 'assignmentId' },
  enrollments: { name: 'enrollments', schema: EnrollmentSchema, model: EnrollmentModel, displayIdField: 'enrollmentId' },
  submissions: { name: 'submissions', schema: SubmissionSchema, model: SubmissionModel, displayIdField: 'submissionId' },
};

export interface IndexSpec {
  fields: Record<string, unknown>;
  unique: boolean;
  name: string;
}

/**
 * Index declarations of a collection, named the way the server names them.
 */
export function indexSpecsOf(collection: CollectionName): IndexSpec[] {
  return collectionDefinitions[collection].schema.indexes().map(([fields, options]) => ({
    fields,
    unique: options.unique === true,
    name: Object.entries(fields)
      .map(([field, direction]) => `${field}_${String(direction)}`)
      .join('_'),
  }));
}
