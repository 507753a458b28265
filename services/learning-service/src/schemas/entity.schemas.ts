import { z } from 'zod';

/**
 * Document shapes for the six collections.
 *
 * Each schema lists the fields the platform relies on; documents may carry
 * extra fields, and `_id` is assigned by the store. The store validates every
 * insert, and every updated document, against the schema of its collection.
 */

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const USER_ROLES = ['student', 'instructor'] as const;
export const COURSE_LEVELS = ['beginner', 'intermediate', 'advanced'] as const;
export const ENROLLMENT_STATUSES = ['active', 'completed', 'dropped'] as const;

export type UserRole = (typeof USER_ROLES)[number];
export type CourseLevel = (typeof COURSE_LEVELS)[number];
export type EnrollmentStatus = (typeof ENROLLMENT_STATUSES)[number];

const displayId = () => z.string().min(1);

export const profileSchema = z.object({
  bio: z.string().optional(),
  avatar: z.string().optional(),
  skills: z.array(z.string()).optional(),
});

export const userSchema = z.object({
  userId: displayId(),
  email: z.string().regex(EMAIL_PATTERN, 'Invalid email format'),
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  role: z.enum(USER_ROLES, { errorMap: () => ({ message: "Role must be 'student' or 'instructor'" }) }),
  dateJoined: z.date().optional(),
  profile: profileSchema.optional(),
  isActive: z.boolean().optional(),
});

export const courseSchema = z.object({
  courseId: displayId(),
  title: z.string().min(1),
  description: z.string().optional(),
  instructorId: displayId(),
  category: z.string().optional(),
  level: z.enum(COURSE_LEVELS).optional(),
  duration: z.number().nonnegative().optional(),
  price: z.number().nonnegative().optional(),
  tags: z.array(z.string()).optional(),
  createdAt: z.date().optional(),
  updatedAt: z.date().optional(),
  isPublished: z.boolean().optional(),
});

export const lessonSchema = z.object({
  lessonId: displayId(),
  courseId: displayId(),
  title: z.string().min(1),
  content: z.string().optional(),
  videoUrl: z.string().optional(),
  duration: z.number().nonnegative().optional(),
  order: z.number().int().min(1),
  materials: z.array(z.string()).optional(),
  createdAt: z.date().optional(),
});

export const assignmentSchema = z.object({
  assignmentId: displayId(),
  courseId: displayId(),
  title: z.string().min(1),
  description: z.string().optional(),
  dueDate: z.date().optional(),
  maxPoints: z.number().positive().optional(),
  instructions: z.string().optional(),
  createdAt: z.date().optional(),
});

export const enrollmentSchema = z.object({
  enrollmentId: displayId(),
  studentId: displayId(),
  courseId: displayId(),
  enrollmentDate: z.date().optional(),
  status: z.enum(ENROLLMENT_STATUSES).optional(),
  progress: z.number().min(0).max(100).optional(),
  completionDate: z.date().nullable().optional(),
});

export const submissionSchema = z.object({
  submissionId: displayId(),
  assignmentId: displayId(),
  studentId: displayId(),
  submissionDate: z.date().optional(),
  content: z.string().optional(),
  grade: z.number().min(0).max(100).nullable().optional(),
  feedback: z.string().nullable().optional(),
  gradedDate: z.date().nullable().optional(),
});

export type UserProfile = z.infer<typeof profileSchema>;
export type User = z.infer<typeof userSchema>;
export type Course = z.infer<typeof courseSchema>;
export type Lesson = z.infer<typeof lessonSchema>;
export type Assignment = z.infer<typeof assignmentSchema>;
export type Enrollment = z.infer<typeof enrollmentSchema>;
export type Submission = z.infer<typeof submissionSchema>;

export const entitySchemas = {
  users: userSchema,
  courses: courseSchema,
  lessons: lessonSchema,
  assignments: assignmentSchema,
  enrollments: enrollmentSchema,
  submissions: submissionSchema,
} as const;

export type CollectionName = keyof typeof entitySchemas;

export const COLLECTION_NAMES: readonly CollectionName[] = [
  'users',
  'courses',
  'lessons',
  'assignments',
  'enrollments',
  'submissions',
];

export function isCollectionName(value: string): value is CollectionName {
  return COLLECTION_NAMES.some((name) => name === value);
}

const formatIssue = (issue: z.ZodIssue): string => {
  const path = issue.path.join('.');
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `Missing required field: ${path}`;
  }
  return `${path}: ${issue.message}`;
};

/**
 * Returns the list of violations for a document, empty when it is valid.
 */
export function validateEntity(collection: CollectionName, doc: unknown): string[] {
  const result = entitySchemas[collection].safeParse(doc);
  return result.success ? [] : result.error.issues.map(formatIssue);
}

/**
 * Parses a stored document into its entity type, keeping `_id` and extra fields.
 */
export function parseEntity<S extends z.AnyZodObject>(
  schema: S,
  doc: Record<string, unknown>
): z.infer<S> & Record<string, unknown> {
  const parsed: z.infer<S> = schema.parse(doc);
  return { ...doc, ...parsed };
}
