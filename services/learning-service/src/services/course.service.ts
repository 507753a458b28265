import logger from '@eduhub/shared/config/logger';
import { courseSchema, parseEntity, type Course, type CourseLevel } from '../schemas/entity.schemas';
import { courseWithInstructorSchema, type CourseWithInstructor } from '../schemas/analytics.schemas';
import type { Pipeline } from '../store';
import { logOperationFailure, type ServiceContext } from './context';
import { DISPLAY_ID_PREFIXES } from './displayId';

export type CreateCourseInput = {
  title: string;
  instructorId: string;
  description?: string;
  category?: string;
  level?: CourseLevel;
  duration?: number;
  price?: number;
  tags?: string[];
};

export type CourseUpdate = Partial<Omit<CreateCourseInput, 'instructorId'>> & { isPublished?: boolean };

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export class CourseService {
  constructor(private readonly ctx: ServiceContext) {}

  /**
   * Creates an unpublished course. The instructor reference is not checked.
   */
  async createNewCourse(input: CreateCourseInput): Promise<{ id: string; courseId: string } | null> {
    try {
      const now = this.ctx.clock();
      const { id, displayId } = await this.ctx.ids.insert({
        collection: 'courses',
        field: 'courseId',
        prefix: DISPLAY_ID_PREFIXES.course,
        build: (courseId) => ({
          ...input,
          courseId,
          tags: input.tags ?? [],
          createdAt: now,
          updatedAt: now,
          isPublished: false,
        }),
      });
      logger.info('Course created', { courseId: displayId, service: 'learning-service' });
      return { id, courseId: displayId };
    } catch (error) {
      logOperationFailure('createNewCourse', error, { title: input.title });
      return null;
    }
  }

  async getCourseById(courseId: string): Promise<Course | null> {
    const doc = await this.ctx.store.findOne('courses', { courseId });
    return doc ? parseEntity(courseSchema, doc) : null;
  }

  async getCourseWithInstructorDetails(courseId: string): Promise<CourseWithInstructor | null> {
    const pipeline: Pipeline = [
      { $match: { courseId } },
      { $lookup: { from: 'users', localField: 'instructorId', foreignField: 'userId', as: 'instructor' } },
      { $unwind: '$instructor' },
      {
        $project: {
          _id: 0,
          courseId: 1,
          title: 1,
          description: 1,
          category: 1,
          level: 1,
          duration: 1,
          price: 1,
          tags: 1,
          instructor: {
            firstName: '$instructor.firstName',
            lastName: '$instructor.lastName',
            email: '$instructor.email',
            bio: '$instructor.profile.bio',
          },
        },
      },
    ];
    const [doc] = await this.ctx.store.aggregate('courses', pipeline);
    return doc ? courseWithInstructorSchema.parse(doc) : null;
  }

  async getCoursesByCategory(category: string): Promise<Course[]> {
    return this.findCourses({ category });
  }

  /** Case-insensitive substring match; the term is matched literally */
  async searchCoursesByTitle(term: string): Promise<Course[]> {
    return this.findCourses({ title: { $regex: escapeRegex(term), $options: 'i' } });
  }

  /** Keyword search over the title/description text index */
  async searchCoursesByText(text: string): Promise<Course[]> {
    return this.findCourses({ $text: { $search: text } });
  }

  async findCoursesByPriceRange(min: number, max: number): Promise<Course[]> {
    return this.findCourses({ price: { $gte: min, $lte: max } }, { price: 1 });
  }

  async findCoursesWithTags(tags: string[]): Promise<Course[]> {
    return this.findCourses({ tags: { $in: tags } });
  }

  async markCourseAsPublished(courseId: string): Promise<number> {
    return this.update(courseId, { isPublished: true });
  }

  /** Set union: tags already present are not added again */
  async addTagsToCourse(courseId: string, tags: string[]): Promise<number> {
    try {
      const result = await this.ctx.store.updateOne(
        'courses',
        { courseId },
        { $addToSet: { tags: { $each: tags } }, $set: { updatedAt: this.ctx.clock() } }
      );
      return result.modifiedCount;
    } catch (error) {
      logOperationFailure('addTagsToCourse', error, { courseId });
      return 0;
    }
  }

  /** Partial update; fields left undefined are untouched */
  async updateCourse(courseId: string, update: CourseUpdate): Promise<number> {
    const fields = Object.fromEntries(Object.entries(update).filter(([, value]) => value !== undefined));
    if (Object.keys(fields).length === 0) {
      return 0;
    }
    return this.update(courseId, fields);
  }

  private async update(courseId: string, fields: Record<string, unknown>): Promise<number> {
    try {
      const result = await this.ctx.store.updateOne(
        'courses',
        { courseId },
        { $set: { ...fields, updatedAt: this.ctx.clock() } }
      );
      return result.modifiedCount;
    } catch (error) {
      logOperationFailure('updateCourse', error, { courseId });
      return 0;
    }
  }

  private async findCourses(filter: Record<string, unknown>, sort: Record<string, 1 | -1> = { courseId: 1 }): Promise<Course[]> {
    const docs = await this.ctx.store.find('courses', filter, { sort });
    return docs.map((doc) => parseEntity(courseSchema, doc));
  }
}
