import { Router } from 'express';
import { validateRequest } from '@eduhub/shared/middlewares/validateRequest';
import {
  addLessonSchema,
  courseIdParamsSchema,
  createCourseSchema,
  type CoursesController,
} from '../controllers/courses.controller';

export function createCoursesRoutes(controller: CoursesController): Router {
  const router = Router();

  router.post('/', validateRequest({ body: createCourseSchema }), controller.createCourse);
  router.get('/search', controller.searchCourses);

  router.get('/:courseId', controller.getCourse);
  router.get('/:courseId/details', controller.getCourseDetails);
  router.patch('/:courseId', controller.updateCourse);
  router.post('/:courseId/publish', controller.publishCourse);
  router.post('/:courseId/tags', controller.addTags);

  router.get('/:courseId/lessons', controller.listLessons);
  router.post(
    '/:courseId/lessons',
    validateRequest({ params: courseIdParamsSchema, body: addLessonSchema }),
    controller.addLesson
  );
  router.delete('/:courseId/lessons/:lessonId', controller.deleteLesson);

  router.get('/:courseId/students', controller.listEnrolledStudents);

  return router;
}
