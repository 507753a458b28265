import { z } from 'zod';
import { COURSE_LEVELS, ENROLLMENT_STATUSES } from './entity.schemas';

/*
 * Shapes of the joined read models and analytics reports. Group keys can be
 * null when the grouped field is missing, and averages over nothing are null.
 */

export const courseWithInstructorSchema = z.object({
  courseId: z.string(),
  title: z.string(),
  description: z.string().optional(),
  category: z.string().optional(),
  level: z.enum(COURSE_LEVELS).optional(),
  duration: z.number().optional(),
  price: z.number().optional(),
  tags: z.array(z.string()).optional(),
  instructor: z.object({
    firstName: z.string(),
    lastName: z.string(),
    email: z.string(),
    bio: z.string().nullish(),
  }),
});

export const enrolledStudentSchema = z.object({
  enrollmentId: z.string(),
  enrollmentDate: z.date().optional(),
  status: z.enum(ENROLLMENT_STATUSES).optional(),
  progress: z.number().optional(),
  student: z.object({
    userId: z.string(),
    firstName: z.string(),
    lastName: z.string(),
    email: z.string(),
  }),
});

export const courseEnrollmentStatsSchema = z.object({
  category: z.string().nullable(),
  totalCourses: z.number(),
  totalEnrollments: z.number(),
  avgPrice: z.number().nullable(),
  courses: z.array(
    z.object({
      courseId: z.string(),
      title: z.string(),
      enrollmentCount: z.number(),
      price: z.number().nullish(),
    })
  ),
});

export const studentPerformanceSchema = z.object({
  studentId: z.string().nullable(),
  studentName: z.string().nullable(),
  averageGrade: z.number().nullable(),
  totalSubmissions: z.number(),
  coursesParticipated: z.array(z.string()),
  coursesCount: z.number(),
});

export const instructorAnalyticsSchema = z.object({
  instructorId: z.string().nullable(),
  instructorName: z.string().nullable(),
  totalCourses: z.number(),
  totalStudents: z.number(),
  totalRevenue: z.number(),
  courses: z.array(
    z.object({
      title: z.string(),
      enrollments: z.number(),
      revenue: z.number().nullable(),
    })
  ),
});

export const monthlyTrendSchema = z.object({
  year: z.number().nullable(),
  month: z.number().nullable(),
  enrollments: z.number(),
  active: z.number(),
  completed: z.number(),
});

export const categoryPopularitySchema = z.object({
  category: z.string().nullable(),
  totalEnrollments: z.number(),
  courseCount: z.number(),
});

export const engagementSchema = z.object({
  status: z.string().nullable(),
  count: z.number(),
  avgProgress: z.number().nullable(),
});

export const advancedAnalyticsSchema = z.object({
  monthlyTrends: z.array(monthlyTrendSchema),
  popularCategories: z.array(categoryPopularitySchema),
  engagement: z.array(engagementSchema),
});

export type CourseWithInstructor = z.infer<typeof courseWithInstructorSchema>;
export type EnrolledStudent = z.infer<typeof enrolledStudentSchema>;
export type CourseEnrollmentStats = z.infer<typeof courseEnrollmentStatsSchema>;
export type StudentPerformance = z.infer<typeof studentPerformanceSchema>;
export type InstructorAnalytics = z.infer<typeof instructorAnalyticsSchema>;
export type MonthlyTrend = z.infer<typeof monthlyTrendSchema>;
export type CategoryPopularity = z.infer<typeof categoryPopularitySchema>;
export type Engagement = z.infer<typeof engagementSchema>;
export type AdvancedAnalytics = z.infer<typeof advancedAnalyticsSchema>;
