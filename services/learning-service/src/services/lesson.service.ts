import { lessonSchema, parseEntity, type Lesson } from '../schemas/entity.schemas';
import { logOperationFailure, type ServiceContext } from './context';
import { DISPLAY_ID_PREFIXES } from './displayId';

export type AddLessonInput = {
  title: string;
  content?: string;
  videoUrl?: string;
  duration?: number;
  materials?: string[];
};

export class LessonService {
  constructor(private readonly ctx: ServiceContext) {}

  /**
   * Appends a lesson after the course's current last lesson. Both the
   * display ID and the order are re-read on each retry.
   */
  async addLessonToCourse(
    courseId: string,
    input: AddLessonInput
  ): Promise<{ id: string; lessonId: string; order: number } | null> {
    let order = 0;
    try {
      const { id, displayId } = await this.ctx.ids.insert({
        collection: 'lessons',
        field: 'lessonId',
        prefix: DISPLAY_ID_PREFIXES.lesson,
        retryOn: [['courseId', 'order']],
        build: async (lessonId) => {
          order = (await this.lastOrder(courseId)) + 1;
          return {
            lessonId,
            courseId,
            title: input.title,
            content: input.content ?? '',
            videoUrl: input.videoUrl ?? '',
            duration: input.duration ?? 0,
            order,
            materials: input.materials ?? [],
            createdAt: this.ctx.clock(),
          };
        },
      });
      return { id, lessonId: displayId, order };
    } catch (error) {
      logOperationFailure('addLessonToCourse', error, { courseId });
      return null;
    }
  }

  async getLessonsForCourse(courseId: string): Promise<Lesson[]> {
    const docs = await this.ctx.store.find('lessons', { courseId }, { sort: { order: 1 } });
    return docs.map((doc) => parseEntity(lessonSchema, doc));
  }

  async deleteLessonFromCourse(lessonId: string): Promise<number> {
    try {
      return await this.ctx.store.deleteOne('lessons', { lessonId });
    } catch (error) {
      logOperationFailure('deleteLessonFromCourse', error, { lessonId });
      return 0;
    }
  }

  private async lastOrder(courseId: string): Promise<number> {
    const last = await this.ctx.store.findOne('lessons', { courseId }, { sort: { order: -1 }, projection: { order: 1 } });
    const value = last?.order;
    return typeof value === 'number' ? value : 0;
  }
}
