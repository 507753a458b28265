import type { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@eduhub/shared/utils/asyncHandler';
import { errorResponse, successResponse } from '@eduhub/shared/utils/responseBuilder';
import type { AssignmentService } from '../services/assignment.service';

export const createAssignmentSchema = z.object({
  courseId: z.string().min(1),
  title: z.string().min(1),
  description: z.string().optional(),
  dueDate: z.coerce.date().optional(),
  maxPoints: z.number().positive().optional(),
  instructions: z.string().optional(),
});

const assignmentIdParamsSchema = z.object({
  assignmentId: z.string().min(1),
});

const submitSchema = z.object({
  studentId: z.string().min(1),
  content: z.string().min(1),
});

const submissionIdParamsSchema = z.object({
  submissionId: z.string().min(1),
});

export const gradeSchema = z.object({
  grade: z.number().min(0).max(100),
  feedback: z.string().optional(),
});

export class AssignmentsController {
  constructor(private readonly assignmentService: AssignmentService) {}

  createAssignment = asyncHandler(async (req: Request, res: Response) => {
    const { courseId, ...input } = createAssignmentSchema.parse(req.body);
    const created = await this.assignmentService.createAssignment(courseId, input);
    if (!created) {
      return errorResponse(res, { statusCode: 409, message: 'Assignment could not be created' });
    }
    return successResponse(res, { statusCode: 201, message: 'Assignment created successfully', data: created });
  });

  listDueNextWeek = asyncHandler(async (_req: Request, res: Response) => {
    const assignments = await this.assignmentService.getAssignmentsDueNextWeek();
    return successResponse(res, { message: 'Upcoming assignments retrieved successfully', data: assignments });
  });

  submit = asyncHandler(async (req: Request, res: Response) => {
    const { assignmentId } = assignmentIdParamsSchema.parse(req.params);
    const { studentId, content } = submitSchema.parse(req.body);
    const created = await this.assignmentService.submitAssignment(assignmentId, studentId, content);
    if (!created) {
      return errorResponse(res, { statusCode: 409, message: 'Submission could not be saved' });
    }
    return successResponse(res, { statusCode: 201, message: 'Submission received', data: created });
  });

  grade = asyncHandler(async (req: Request, res: Response) => {
    const { submissionId } = submissionIdParamsSchema.parse(req.params);
    const { grade, feedback } = gradeSchema.parse(req.body);
    const modified = await this.assignmentService.updateAssignmentGrade(submissionId, grade, feedback);
    return successResponse(res, { message: 'Grade recorded', data: { modified } });
  });
}
