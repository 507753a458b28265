import vocabulary from '../data/sample-vocabulary.json';
import {
  COURSE_LEVELS,
  ENROLLMENT_STATUSES,
  type Assignment,
  type Course,
  type Enrollment,
  type Lesson,
  type Submission,
  type User,
} from '../schemas/entity.schemas';
import { DISPLAY_ID_PREFIXES, avatarUrl, formatDisplayId } from '../services/displayId';
import { RandomPicker, type RandomSource } from './random';

export interface SampleCounts {
  users: number;
  courses: number;
  lessons: number;
  assignments: number;
  enrollments: number;
  submissions: number;
}

export interface SampleDataset {
  users: User[];
  courses: Course[];
  lessons: Lesson[];
  assignments: Assignment[];
  enrollments: Enrollment[];
  submissions: Submission[];
}

export interface GeneratorOptions {
  random?: RandomSource;
  now?: Date;
}

/** Attempts per enrollment slot to find an unused (student, course) pair */
export const ENROLLMENT_PAIR_ATTEMPTS = 50;

const instructorShare = (users: number): number => (users === 0 ? 0 : Math.max(1, Math.floor(users / 4)));

/**
 * Generates a referentially consistent fixture set. Pure apart from the
 * injected random source and clock.
 *
 * Enrollment slots that find no free (student, course) pair within
 * ENROLLMENT_PAIR_ATTEMPTS are skipped, as are submission slots whose
 * assignment belongs to a course nobody is enrolled in. Skipped slots leave
 * gaps in the display ID sequence.
 */
export function generateSampleData(counts: SampleCounts, options: GeneratorOptions = {}): SampleDataset {
  const rng = new RandomPicker(options.random);
  const now = options.now ?? new Date();

  const users = generateUsers(rng, now, counts.users);
  const instructors = users.filter((user) => user.role === 'instructor');
  const students = users.filter((user) => user.role === 'student');
  const courses = generateCourses(rng, now, counts.courses, instructors);
  const lessons = generateLessons(rng, now, counts.lessons, courses);
  const assignments = generateAssignments(rng, now, counts.assignments, courses);
  const enrollments = generateEnrollments(rng, now, counts.enrollments, students, courses);
  const submissions = generateSubmissions(rng, now, counts.submissions, assignments, enrollments);

  return { users, courses, lessons, assignments, enrollments, submissions };
}

function generateUsers(rng: RandomPicker, now: Date, count: number): User[] {
  const instructorCount = instructorShare(count);

  return Array.from({ length: count }, (_, index): User => {
    const isInstructor = index < instructorCount;
    const firstName = rng.pick(vocabulary.givenNames);
    const lastName = rng.pick(vocabulary.familyNames);
    const sequence = isInstructor ? index + 1 : index - instructorCount + 1;
    const userId = formatDisplayId(
      isInstructor ? DISPLAY_ID_PREFIXES.instructor : DISPLAY_ID_PREFIXES.student,
      sequence
    );
    const focus = rng.pick(isInstructor ? vocabulary.instructorFocus : vocabulary.studentFocus);

    return {
      userId,
      // the index suffix keeps emails unique when names repeat
      email: `${firstName}.${lastName}${index + 1}@${rng.pick(vocabulary.emailDomains)}`.toLowerCase(),
      firstName,
      lastName,
      role: isInstructor ? 'instructor' : 'student',
      dateJoined: isInstructor ? rng.daysAgo(now, 90, 900) : rng.daysAgo(now, 10, 450),
      profile: {
        bio: isInstructor
          ? `Experienced instructor specializing in ${focus}.`
          : `Student passionate about ${focus}.`,
        avatar: avatarUrl(isInstructor ? 'instructor' : 'student', sequence),
        skills: isInstructor ? rng.sample(vocabulary.skills, rng.int(4, 7)) : rng.sample(vocabulary.skills, rng.int(2, 5)),
      },
      isActive: true,
    };
  });
}

function generateCourses(rng: RandomPicker, now: Date, count: number, instructors: User[]): Course[] {
  if (instructors.length === 0) {
    return [];
  }
  const titles = vocabulary.courseTitles.slice(0, Math.min(count, vocabulary.courseTitles.length));

  return titles.map((title, index): Course => ({
    courseId: formatDisplayId(DISPLAY_ID_PREFIXES.course, index + 1),
    title,
    description: `Learn ${title.toLowerCase()} from the ground up with hands-on projects.`,
    instructorId: rng.pick(instructors).userId,
    category: rng.pick(vocabulary.categories),
    level: rng.pick(COURSE_LEVELS),
    duration: rng.int(30, 90),
    price: rng.int(120, 480),
    tags: title
      .split(' ')
      .filter((word) => word.length > 3)
      .map((word) => word.toLowerCase()),
    createdAt: rng.daysAgo(now, 10, 220),
    updatedAt: rng.daysAgo(now, 1, 50),
    isPublished: rng.coin(),
  }));
}

function generateLessons(rng: RandomPicker, now: Date, count: number, courses: Course[]): Lesson[] {
  if (courses.length === 0) {
    return [];
  }
  const nextOrder = new Map<string, number>();

  return Array.from({ length: count }, (_, index): Lesson => {
    const course = rng.pick(courses);
    const order = (nextOrder.get(course.courseId) ?? 0) + 1;
    nextOrder.set(course.courseId, order);
    const topic = rng.pick(vocabulary.lessonTopics);
    const lessonId = formatDisplayId(DISPLAY_ID_PREFIXES.lesson, index + 1);

    return {
      lessonId,
      courseId: course.courseId,
      title: `${topic} - Part ${order}`,
      content: `This lesson covers ${topic.toLowerCase()} for ${course.title}.`,
      videoUrl: `https://videos.example.com/${lessonId.toLowerCase()}.mp4`,
      duration: rng.int(25, 55),
      order,
      materials: ['notes.pdf', 'code.zip'],
      createdAt: rng.daysAgo(now, 1, 200),
    };
  });
}

function generateAssignments(rng: RandomPicker, now: Date, count: number, courses: Course[]): Assignment[] {
  if (courses.length === 0) {
    return [];
  }

  return Array.from({ length: count }, (_, index): Assignment => {
    const course = rng.pick(courses);
    const kind = rng.pick(vocabulary.assignmentTypes);

    return {
      assignmentId: formatDisplayId(DISPLAY_ID_PREFIXES.assignment, index + 1),
      courseId: course.courseId,
      title: `${kind}: ${course.title}`,
      description: `${kind} for ${course.title}.`,
      dueDate: rng.daysAhead(now, 14, 45),
      maxPoints: rng.pick([70, 85, 100]),
      instructions: 'Submit your work before the due date. Include all source files.',
      createdAt: rng.daysAgo(now, 1, 60),
    };
  });
}

function generateEnrollments(
  rng: RandomPicker,
  now: Date,
  count: number,
  students: User[],
  courses: Course[]
): Enrollment[] {
  if (students.length === 0 || courses.length === 0) {
    return [];
  }
  const taken = new Set<string>();
  const enrollments: Enrollment[] = [];

  for (let slot = 0; slot < count; slot++) {
    for (let attempt = 0; attempt < ENROLLMENT_PAIR_ATTEMPTS; attempt++) {
      const student = rng.pick(students);
      const course = rng.pick(courses);
      const pair = `${student.userId}|${course.courseId}`;
      if (taken.has(pair)) {
        continue;
      }
      taken.add(pair);

      const status = rng.pick(ENROLLMENT_STATUSES);
      enrollments.push({
        enrollmentId: formatDisplayId(DISPLAY_ID_PREFIXES.enrollment, slot + 1),
        studentId: student.userId,
        courseId: course.courseId,
        enrollmentDate: rng.daysAgo(now, 7, 90),
        status,
        progress: rng.int(15, 100),
        completionDate: rng.coin() ? rng.daysAgo(now, 0, 6) : null,
      });
      break;
    }
  }

  return enrollments;
}

function generateSubmissions(
  rng: RandomPicker,
  now: Date,
  count: number,
  assignments: Assignment[],
  enrollments: Enrollment[]
): Submission[] {
  if (assignments.length === 0) {
    return [];
  }
  const submissions: Submission[] = [];

  for (let slot = 0; slot < count; slot++) {
    const assignment = rng.pick(assignments);
    const candidates = enrollments.filter((enrollment) => enrollment.courseId === assignment.courseId);
    if (candidates.length === 0) {
      continue;
    }
    const enrollment = rng.pick(candidates);
    const graded = rng.coin();

    submissions.push({
      submissionId: formatDisplayId(DISPLAY_ID_PREFIXES.submission, slot + 1),
      assignmentId: assignment.assignmentId,
      studentId: enrollment.studentId,
      submissionDate: rng.daysAgo(now, 1, 30),
      content: 'Solution attached with source files and a short write-up.',
      grade: graded ? rng.int(55, 100) : null,
      feedback: graded ? rng.pick(vocabulary.feedback) : null,
      gradedDate: graded ? rng.daysAgo(now, 0, 5) : null,
    });
  }

  return submissions;
}
