import type { Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError } from '@eduhub/shared/config/errorHandler';
import { asyncHandler } from '@eduhub/shared/utils/asyncHandler';
import { errorResponse, successResponse } from '@eduhub/shared/utils/responseBuilder';
import type { UserService } from '../services/user.service';

export const userIdParamsSchema = z.object({
  userId: z.string().min(1),
});

export const registerStudentSchema = z.object({
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  email: z.string().email(),
  bio: z.string().optional(),
  skills: z.array(z.string()).optional(),
});

export const profileUpdateSchema = z
  .object({
    bio: z.string().optional(),
    skills: z.array(z.string()).optional(),
    avatar: z.string().optional(),
  })
  .refine((value) => Object.values(value).some((field) => field !== undefined), {
    message: 'At least one profile field is required',
  });

const recentQuerySchema = z.object({
  months: z.coerce.number().int().positive().max(120).default(6),
});

export class UsersController {
  constructor(private readonly userService: UserService) {}

  registerStudent = asyncHandler(async (req: Request, res: Response) => {
    const body = registerStudentSchema.parse(req.body);
    const created = await this.userService.registerNewStudent(body);
    if (!created) {
      return errorResponse(res, { statusCode: 409, message: 'Student could not be registered' });
    }
    return successResponse(res, { statusCode: 201, message: 'Student registered successfully', data: created });
  });

  /** Accepts a full user document, including its display ID and role */
  createUser = asyncHandler(async (req: Request, res: Response) => {
    const result = await this.userService.validateAndInsertUser(req.body);
    if (!result.success) {
      return errorResponse(res, { statusCode: 400, message: 'User rejected', errors: result.errors });
    }
    return successResponse(res, { statusCode: 201, message: 'User created successfully', data: { id: result.id } });
  });

  listActiveStudents = asyncHandler(async (_req: Request, res: Response) => {
    const students = await this.userService.findAllActiveStudents();
    return successResponse(res, { message: 'Active students retrieved successfully', data: students });
  });

  listRecentUsers = asyncHandler(async (req: Request, res: Response) => {
    const { months } = recentQuerySchema.parse(req.query);
    const users = await this.userService.getUsersJoinedRecently(months);
    return successResponse(res, { message: 'Recent users retrieved successfully', data: users });
  });

  getUser = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userIdParamsSchema.parse(req.params);
    const user = await this.userService.getUserById(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }
    return successResponse(res, { message: 'User retrieved successfully', data: user });
  });

  updateProfile = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userIdParamsSchema.parse(req.params);
    const update = profileUpdateSchema.parse(req.body);
    const modified = await this.userService.updateUserProfile(userId, update);
    return successResponse(res, { message: 'Profile updated', data: { modified } });
  });

  deactivate = asyncHandler(async (req: Request, res: Response) => {
    const { userId } = userIdParamsSchema.parse(req.params);
    const modified = await this.userService.deactivateUser(userId);
    return successResponse(res, { message: 'User deactivated', data: { modified } });
  });
}
