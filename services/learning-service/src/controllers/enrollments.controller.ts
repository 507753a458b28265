import type { Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError } from '@eduhub/shared/config/errorHandler';
import { asyncHandler } from '@eduhub/shared/utils/asyncHandler';
import { errorResponse, successResponse } from '@eduhub/shared/utils/responseBuilder';
import type { EnrollmentService } from '../services/enrollment.service';

export const enrollSchema = z.object({
  studentId: z.string().min(1),
  courseId: z.string().min(1),
});

export const enrollmentIdParamsSchema = z.object({
  enrollmentId: z.string().min(1),
});

export const progressSchema = z.object({
  progress: z.number().min(0).max(100),
});

export class EnrollmentsController {
  constructor(private readonly enrollmentService: EnrollmentService) {}

  enroll = asyncHandler(async (req: Request, res: Response) => {
    const { studentId, courseId } = enrollSchema.parse(req.body);
    const result = await this.enrollmentService.registerStudentForCourse(studentId, courseId);

    switch (result.status) {
      case 'enrolled':
        return successResponse(res, { statusCode: 201, message: 'Student enrolled successfully', data: result });
      case 'already-enrolled':
        return successResponse(res, { message: 'Student is already enrolled', data: result });
      case 'failed':
        return errorResponse(res, { statusCode: 409, message: 'Enrollment failed', errors: [result.reason] });
    }
  });

  updateProgress = asyncHandler(async (req: Request, res: Response) => {
    const { enrollmentId } = enrollmentIdParamsSchema.parse(req.params);
    const { progress } = progressSchema.parse(req.body);
    const modified = await this.enrollmentService.updateEnrollmentProgress(enrollmentId, progress);
    return successResponse(res, { message: 'Progress updated', data: { modified } });
  });

  remove = asyncHandler(async (req: Request, res: Response) => {
    const { enrollmentId } = enrollmentIdParamsSchema.parse(req.params);
    const deleted = await this.enrollmentService.removeEnrollment(enrollmentId);
    if (deleted === 0) {
      throw new NotFoundError('Enrollment', enrollmentId);
    }
    return successResponse(res, { message: 'Enrollment removed', data: { deleted } });
  });
}
