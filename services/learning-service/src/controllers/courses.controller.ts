import type { Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError } from '@eduhub/shared/config/errorHandler';
import { asyncHandler } from '@eduhub/shared/utils/asyncHandler';
import { errorResponse, successResponse } from '@eduhub/shared/utils/responseBuilder';
import { COURSE_LEVELS, type Course } from '../schemas/entity.schemas';
import type { CourseService } from '../services/course.service';
import type { EnrollmentService } from '../services/enrollment.service';
import type { LessonService } from '../services/lesson.service';

export const courseIdParamsSchema = z.object({
  courseId: z.string().min(1),
});

const lessonParamsSchema = courseIdParamsSchema.extend({
  lessonId: z.string().min(1),
});

export const createCourseSchema = z.object({
  title: z.string().min(1),
  instructorId: z.string().min(1),
  description: z.string().optional(),
  category: z.string().optional(),
  level: z.enum(COURSE_LEVELS).optional(),
  duration: z.number().nonnegative().optional(),
  price: z.number().nonnegative().optional(),
  tags: z.array(z.string()).optional(),
});

const updateCourseSchema = createCourseSchema.omit({ instructorId: true }).partial();

const tagsBodySchema = z.object({
  tags: z.array(z.string().min(1)).min(1),
});

const searchQuerySchema = z
  .object({
    title: z.string().min(1).optional(),
    text: z.string().min(1).optional(),
    category: z.string().min(1).optional(),
    tags: z
      .string()
      .optional()
      .transform((value) => (value ? value.split(',').map((item) => item.trim()).filter(Boolean) : undefined)),
    minPrice: z.coerce.number().nonnegative().optional(),
    maxPrice: z.coerce.number().nonnegative().optional(),
  })
  .refine((query) => (query.minPrice === undefined) === (query.maxPrice === undefined), {
    message: 'minPrice and maxPrice must be given together',
  });

export const addLessonSchema = z.object({
  title: z.string().min(1),
  content: z.string().optional(),
  videoUrl: z.string().optional(),
  duration: z.number().nonnegative().optional(),
  materials: z.array(z.string()).optional(),
});

export class CoursesController {
  constructor(
    private readonly courseService: CourseService,
    private readonly lessonService: LessonService,
    private readonly enrollmentService: EnrollmentService
  ) {}

  createCourse = asyncHandler(async (req: Request, res: Response) => {
    const body = createCourseSchema.parse(req.body);
    const created = await this.courseService.createNewCourse(body);
    if (!created) {
      return errorResponse(res, { statusCode: 409, message: 'Course could not be created' });
    }
    return successResponse(res, { statusCode: 201, message: 'Course created successfully', data: created });
  });

  /** One filter per request, checked in the order title, text, category, tags, price */
  searchCourses = asyncHandler(async (req: Request, res: Response) => {
    const query = searchQuerySchema.parse(req.query);
    let courses: Course[];
    if (query.title) {
      courses = await this.courseService.searchCoursesByTitle(query.title);
    } else if (query.text) {
      courses = await this.courseService.searchCoursesByText(query.text);
    } else if (query.category) {
      courses = await this.courseService.getCoursesByCategory(query.category);
    } else if (query.tags) {
      courses = await this.courseService.findCoursesWithTags(query.tags);
    } else if (query.minPrice !== undefined && query.maxPrice !== undefined) {
      courses = await this.courseService.findCoursesByPriceRange(query.minPrice, query.maxPrice);
    } else {
      return errorResponse(res, { statusCode: 400, message: 'A search filter is required' });
    }
    return successResponse(res, { message: 'Courses retrieved successfully', data: courses });
  });

  getCourse = asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamsSchema.parse(req.params);
    const course = await this.courseService.getCourseById(courseId);
    if (!course) {
      throw new NotFoundError('Course', courseId);
    }
    return successResponse(res, { message: 'Course retrieved successfully', data: course });
  });

  getCourseDetails = asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamsSchema.parse(req.params);
    const details = await this.courseService.getCourseWithInstructorDetails(courseId);
    if (!details) {
      throw new NotFoundError('Course', courseId);
    }
    return successResponse(res, { message: 'Course details retrieved successfully', data: details });
  });

  updateCourse = asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamsSchema.parse(req.params);
    const update = updateCourseSchema.parse(req.body);
    const modified = await this.courseService.updateCourse(courseId, update);
    return successResponse(res, { message: 'Course updated', data: { modified } });
  });

  publishCourse = asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamsSchema.parse(req.params);
    const modified = await this.courseService.markCourseAsPublished(courseId);
    return successResponse(res, { message: 'Course published', data: { modified } });
  });

  addTags = asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamsSchema.parse(req.params);
    const { tags } = tagsBodySchema.parse(req.body);
    const modified = await this.courseService.addTagsToCourse(courseId, tags);
    return successResponse(res, { message: 'Tags added', data: { modified } });
  });

  addLesson = asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamsSchema.parse(req.params);
    const body = addLessonSchema.parse(req.body);
    const created = await this.lessonService.addLessonToCourse(courseId, body);
    if (!created) {
      return errorResponse(res, { statusCode: 409, message: 'Lesson could not be added' });
    }
    return successResponse(res, { statusCode: 201, message: 'Lesson added successfully', data: created });
  });

  listLessons = asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamsSchema.parse(req.params);
    const lessons = await this.lessonService.getLessonsForCourse(courseId);
    return successResponse(res, { message: 'Lessons retrieved successfully', data: lessons });
  });

  deleteLesson = asyncHandler(async (req: Request, res: Response) => {
    const { lessonId } = lessonParamsSchema.parse(req.params);
    const deleted = await this.lessonService.deleteLessonFromCourse(lessonId);
    if (deleted === 0) {
      throw new NotFoundError('Lesson', lessonId);
    }
    return successResponse(res, { message: 'Lesson deleted', data: { deleted } });
  });

  listEnrolledStudents = asyncHandler(async (req: Request, res: Response) => {
    const { courseId } = courseIdParamsSchema.parse(req.params);
    const students = await this.enrollmentService.findEnrolledStudentsInCourse(courseId);
    return successResponse(res, { message: 'Enrolled students retrieved successfully', data: students });
  });
}
