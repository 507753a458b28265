import logger from '@eduhub/shared/config/logger';
import { enrolledStudentSchema, type EnrolledStudent } from '../schemas/analytics.schemas';
import { DuplicateKeyError } from '../store/errors';
import type { Pipeline } from '../store';
import { errorMessage, logOperationFailure, type ServiceContext } from './context';
import { DISPLAY_ID_PREFIXES } from './displayId';

export type RegistrationResult =
  | { status: 'enrolled'; id: string; enrollmentId: string }
  | { status: 'already-enrolled'; enrollmentId: string }
  | { status: 'failed'; reason: string };

export class EnrollmentService {
  constructor(private readonly ctx: ServiceContext) {}

  /**
   * Enrolls a student. Registering an existing (student, course) pair is a
   * no-op that reports the existing enrollment.
   */
  async registerStudentForCourse(studentId: string, courseId: string): Promise<RegistrationResult> {
    try {
      const existing = await this.findExisting(studentId, courseId);
      if (existing) {
        return { status: 'already-enrolled', enrollmentId: existing };
      }

      const { id, displayId } = await this.ctx.ids.insert({
        collection: 'enrollments',
        field: 'enrollmentId',
        prefix: DISPLAY_ID_PREFIXES.enrollment,
        build: (enrollmentId) => ({
          enrollmentId,
          studentId,
          courseId,
          enrollmentDate: this.ctx.clock(),
          status: 'active',
          progress: 0,
          completionDate: null,
        }),
      });
      logger.info('Student enrolled', { studentId, courseId, enrollmentId: displayId, service: 'learning-service' });
      return { status: 'enrolled', id, enrollmentId: displayId };
    } catch (error) {
      // a concurrent registration of the same pair won the race
      if (error instanceof DuplicateKeyError && error.isOn('studentId', 'courseId')) {
        return this.resolveLostRace(studentId, courseId, error);
      }
      logOperationFailure('registerStudentForCourse', error, { studentId, courseId });
      return { status: 'failed', reason: errorMessage(error) };
    }
  }

  private async resolveLostRace(
    studentId: string,
    courseId: string,
    duplicate: DuplicateKeyError
  ): Promise<RegistrationResult> {
    try {
      const winner = await this.findExisting(studentId, courseId);
      if (winner) {
        return { status: 'already-enrolled', enrollmentId: winner };
      }
      logOperationFailure('registerStudentForCourse', duplicate, { studentId, courseId });
      return { status: 'failed', reason: errorMessage(duplicate) };
    } catch (error) {
      logOperationFailure('registerStudentForCourse', error, { studentId, courseId });
      return { status: 'failed', reason: errorMessage(error) };
    }
  }

  /** Reaching 100 completes the enrollment */
  async updateEnrollmentProgress(enrollmentId: string, progress: number): Promise<number> {
    if (!Number.isFinite(progress) || progress < 0 || progress > 100) {
      logOperationFailure('updateEnrollmentProgress', new RangeError('Progress must be between 0 and 100'), {
        enrollmentId,
        progress,
      });
      return 0;
    }

    const set: Record<string, unknown> = { progress };
    if (progress >= 100) {
      set.status = 'completed';
      set.completionDate = this.ctx.clock();
    }

    try {
      const result = await this.ctx.store.updateOne('enrollments', { enrollmentId }, { $set: set });
      return result.modifiedCount;
    } catch (error) {
      logOperationFailure('updateEnrollmentProgress', error, { enrollmentId, progress });
      return 0;
    }
  }

  async removeEnrollment(enrollmentId: string): Promise<number> {
    try {
      return await this.ctx.store.deleteOne('enrollments', { enrollmentId });
    } catch (error) {
      logOperationFailure('removeEnrollment', error, { enrollmentId });
      return 0;
    }
  }

  async findEnrolledStudentsInCourse(courseId: string): Promise<EnrolledStudent[]> {
    const pipeline: Pipeline = [
      { $match: { courseId } },
      { $lookup: { from: 'users', localField: 'studentId', foreignField: 'userId', as: 'student' } },
      { $unwind: '$student' },
      {
        $project: {
          _id: 0,
          enrollmentId: 1,
          enrollmentDate: 1,
          status: 1,
          progress: 1,
          student: {
            userId: '$student.userId',
            firstName: '$student.firstName',
            lastName: '$student.lastName',
            email: '$student.email',
          },
        },
      },
      { $sort: { enrollmentId: 1 } },
    ];
    const docs = await this.ctx.store.aggregate('enrollments', pipeline);
    return docs.map((doc) => enrolledStudentSchema.parse(doc));
  }

  private async findExisting(studentId: string, courseId: string): Promise<string | null> {
    const doc = await this.ctx.store.findOne('enrollments', { studentId, courseId });
    const enrollmentId = doc?.enrollmentId;
    return typeof enrollmentId === 'string' ? enrollmentId : null;
  }
}
