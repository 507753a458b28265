import type { Request, Response } from 'express';
import { asyncHandler } from '@eduhub/shared/utils/asyncHandler';
import { successResponse } from '@eduhub/shared/utils/responseBuilder';
import type { AnalyticsService } from '../services/analytics.service';

export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  courseStatistics = asyncHandler(async (_req: Request, res: Response) => {
    const data = await this.analyticsService.getCourseEnrollmentStatistics();
    return successResponse(res, { message: 'Course enrollment statistics retrieved successfully', data });
  });

  studentPerformance = asyncHandler(async (_req: Request, res: Response) => {
    const data = await this.analyticsService.getStudentPerformanceAnalysis();
    return successResponse(res, { message: 'Student performance retrieved successfully', data });
  });

  instructors = asyncHandler(async (_req: Request, res: Response) => {
    const data = await this.analyticsService.getInstructorAnalytics();
    return successResponse(res, { message: 'Instructor analytics retrieved successfully', data });
  });

  advanced = asyncHandler(async (_req: Request, res: Response) => {
    const data = await this.analyticsService.getAdvancedAnalytics();
    return successResponse(res, { message: 'Advanced analytics retrieved successfully', data });
  });
}
