import { Router } from 'express';
import { validateRequest } from '@eduhub/shared/middlewares/validateRequest';
import { enrollSchema, progressSchema, type EnrollmentsController } from '../controllers/enrollments.controller';

export function createEnrollmentsRoutes(controller: EnrollmentsController): Router {
  const router = Router();

  router.post('/', validateRequest({ body: enrollSchema }), controller.enroll);
  router.patch('/:enrollmentId/progress', validateRequest({ body: progressSchema }), controller.updateProgress);
  router.delete('/:enrollmentId', controller.remove);

  return router;
}
