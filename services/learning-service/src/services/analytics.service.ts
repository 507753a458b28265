import { logPerformance } from '@eduhub/shared/config/logger';
import { performance } from 'perf_hooks';
import type { z } from 'zod';
import {
  advancedAnalyticsSchema,
  categoryPopularitySchema,
  courseEnrollmentStatsSchema,
  engagementSchema,
  instructorAnalyticsSchema,
  monthlyTrendSchema,
  studentPerformanceSchema,
  type AdvancedAnalytics,
  type CourseEnrollmentStats,
  type InstructorAnalytics,
  type StudentPerformance,
} from '../schemas/analytics.schemas';
import type { CollectionName } from '../schemas/entity.schemas';
import type { Pipeline } from '../store';
import type { ServiceContext } from './context';

const fullName = (path: string) => ({ $concat: [`${path}.firstName`, ' ', `${path}.lastName`] });
const enrollmentCount = { $size: '$enrollments' };

const joinEnrollments = {
  $lookup: { from: 'enrollments', localField: 'courseId', foreignField: 'courseId', as: 'enrollments' },
};

/**
 * Read-only reports over the six collections. Failures propagate to the caller.
 */
export class AnalyticsService {
  constructor(private readonly ctx: ServiceContext) {}

  /** Per category: course count, enrollments, average price; busiest first */
  async getCourseEnrollmentStatistics(): Promise<CourseEnrollmentStats[]> {
    return this.run('courses', courseEnrollmentStatsSchema, [
      joinEnrollments,
      {
        $group: {
          _id: '$category',
          totalCourses: { $sum: 1 },
          totalEnrollments: { $sum: enrollmentCount },
          avgPrice: { $avg: '$price' },
          courses: {
            $push: { courseId: '$courseId', title: '$title', enrollmentCount, price: '$price' },
          },
        },
      },
      { $sort: { totalEnrollments: -1 } },
      {
        $project: {
          _id: 0,
          category: '$_id',
          totalCourses: 1,
          totalEnrollments: 1,
          avgPrice: 1,
          courses: 1,
        },
      },
    ]);
  }

  /**
   * Per student: average grade over graded submissions only, submission
   * count and the distinct courses submitted to; best average first.
   */
  async getStudentPerformanceAnalysis(): Promise<StudentPerformance[]> {
    return this.run('submissions', studentPerformanceSchema, [
      { $lookup: { from: 'assignments', localField: 'assignmentId', foreignField: 'assignmentId', as: 'assignment' } },
      { $unwind: '$assignment' },
      { $lookup: { from: 'users', localField: 'studentId', foreignField: 'userId', as: 'student' } },
      { $unwind: '$student' },
      {
        $group: {
          _id: '$studentId',
          studentName: { $first: fullName('$student') },
          averageGrade: { $avg: '$grade' },
          totalSubmissions: { $sum: 1 },
          coursesParticipated: { $addToSet: '$assignment.courseId' },
        },
      },
      { $addFields: { coursesCount: { $size: '$coursesParticipated' } } },
      { $sort: { averageGrade: -1 } },
      {
        $project: {
          _id: 0,
          studentId: '$_id',
          studentName: 1,
          averageGrade: 1,
          totalSubmissions: 1,
          coursesParticipated: 1,
          coursesCount: 1,
        },
      },
    ]);
  }

  /** Revenue is price × enrollments, summed over the instructor's courses */
  async getInstructorAnalytics(): Promise<InstructorAnalytics[]> {
    const revenue = { $multiply: ['$price', enrollmentCount] };
    return this.run('courses', instructorAnalyticsSchema, [
      { $lookup: { from: 'users', localField: 'instructorId', foreignField: 'userId', as: 'instructor' } },
      { $unwind: '$instructor' },
      joinEnrollments,
      {
        $group: {
          _id: '$instructorId',
          instructorName: { $first: fullName('$instructor') },
          totalCourses: { $sum: 1 },
          totalStudents: { $sum: enrollmentCount },
          totalRevenue: { $sum: revenue },
          courses: { $push: { title: '$title', enrollments: enrollmentCount, revenue } },
        },
      },
      { $sort: { totalRevenue: -1 } },
      {
        $project: {
          _id: 0,
          instructorId: '$_id',
          instructorName: 1,
          totalCourses: 1,
          totalStudents: 1,
          totalRevenue: 1,
          courses: 1,
        },
      },
    ]);
  }

  async getAdvancedAnalytics(): Promise<AdvancedAnalytics> {
    const monthlyTrends = await this.run('enrollments', monthlyTrendSchema, [
      {
        $group: {
          _id: { year: { $year: '$enrollmentDate' }, month: { $month: '$enrollmentDate' } },
          enrollments: { $sum: 1 },
          active: { $sum: { $cond: [{ $eq: ['$status', 'active'] }, 1, 0] } },
          completed: { $sum: { $cond: [{ $eq: ['$status', 'completed'] }, 1, 0] } },
        },
      },
      { $sort: { '_id.year': 1, '_id.month': 1 } },
      { $project: { _id: 0, year: '$_id.year', month: '$_id.month', enrollments: 1, active: 1, completed: 1 } },
    ]);
    const popularCategories = await this.run('courses', categoryPopularitySchema, [
      joinEnrollments,
      { $group: { _id: '$category', totalEnrollments: { $sum: enrollmentCount }, courseCount: { $sum: 1 } } },
      { $sort: { totalEnrollments: -1 } },
      { $project: { _id: 0, category: '$_id', totalEnrollments: 1, courseCount: 1 } },
    ]);
    const engagement = await this.run('enrollments', engagementSchema, [
      { $group: { _id: '$status', count: { $sum: 1 }, avgProgress: { $avg: '$progress' } } },
      { $sort: { _id: 1 } },
      { $project: { _id: 0, status: '$_id', count: 1, avgProgress: 1 } },
    ]);

    return advancedAnalyticsSchema.parse({ monthlyTrends, popularCategories, engagement });
  }

  private async run<S extends z.ZodTypeAny>(
    collection: CollectionName,
    schema: S,
    pipeline: Pipeline
  ): Promise<z.infer<S>[]> {
    const started = performance.now();
    const docs = await this.ctx.store.aggregate(collection, pipeline);
    logPerformance(`aggregate:${collection}`, performance.now() - started, 'ms', {
      stages: pipeline.length,
      results: docs.length,
    });
    return docs.map((doc): z.infer<S> => schema.parse(doc));
  }
}
