import { assignmentSchema, parseEntity, type Assignment } from '../schemas/entity.schemas';
import { DAY_MS, logOperationFailure, type ServiceContext } from './context';
import { DISPLAY_ID_PREFIXES } from './displayId';

export type CreateAssignmentInput = {
  title: string;
  description?: string;
  dueDate?: Date;
  maxPoints?: number;
  instructions?: string;
};

export class AssignmentService {
  constructor(private readonly ctx: ServiceContext) {}

  /** Due in 14 days and worth 100 points unless given */
  async createAssignment(
    courseId: string,
    input: CreateAssignmentInput
  ): Promise<{ id: string; assignmentId: string } | null> {
    try {
      const now = this.ctx.clock();
      const { id, displayId } = await this.ctx.ids.insert({
        collection: 'assignments',
        field: 'assignmentId',
        prefix: DISPLAY_ID_PREFIXES.assignment,
        build: (assignmentId) => ({
          assignmentId,
          courseId,
          title: input.title,
          description: input.description ?? '',
          dueDate: input.dueDate ?? new Date(now.getTime() + 14 * DAY_MS),
          maxPoints: input.maxPoints ?? 100,
          instructions: input.instructions ?? '',
          createdAt: now,
        }),
      });
      return { id, assignmentId: displayId };
    } catch (error) {
      logOperationFailure('createAssignment', error, { courseId });
      return null;
    }
  }

  async getAssignmentsDueNextWeek(): Promise<Assignment[]> {
    const now = this.ctx.clock();
    const weekAhead = new Date(now.getTime() + 7 * DAY_MS);
    const docs = await this.ctx.store.find(
      'assignments',
      { dueDate: { $gte: now, $lte: weekAhead } },
      { sort: { dueDate: 1 } }
    );
    return docs.map((doc) => parseEntity(assignmentSchema, doc));
  }

  /** New submissions start ungraded */
  async submitAssignment(
    assignmentId: string,
    studentId: string,
    content: string
  ): Promise<{ id: string; submissionId: string } | null> {
    try {
      const { id, displayId } = await this.ctx.ids.insert({
        collection: 'submissions',
        field: 'submissionId',
        prefix: DISPLAY_ID_PREFIXES.submission,
        build: (submissionId) => ({
          submissionId,
          assignmentId,
          studentId,
          submissionDate: this.ctx.clock(),
          content,
          grade: null,
          feedback: null,
          gradedDate: null,
        }),
      });
      return { id, submissionId: displayId };
    } catch (error) {
      logOperationFailure('submitAssignment', error, { assignmentId, studentId });
      return null;
    }
  }

  async updateAssignmentGrade(submissionId: string, grade: number, feedback?: string): Promise<number> {
    if (!Number.isFinite(grade) || grade < 0 || grade > 100) {
      logOperationFailure('updateAssignmentGrade', new RangeError('Grade must be between 0 and 100'), {
        submissionId,
        grade,
      });
      return 0;
    }

    const set: Record<string, unknown> = { grade, gradedDate: this.ctx.clock() };
    if (feedback !== undefined) {
      set.feedback = feedback;
    }
    try {
      const result = await this.ctx.store.updateOne('submissions', { submissionId }, { $set: set });
      return result.modifiedCount;
    } catch (error) {
      logOperationFailure('updateAssignmentGrade', error, { submissionId });
      return 0;
    }
  }
}
