import { Router } from 'express';
import { validateRequest } from '@eduhub/shared/middlewares/validateRequest';
import { createAssignmentSchema, gradeSchema, type AssignmentsController } from '../controllers/assignments.controller';

export function createAssignmentsRoutes(controller: AssignmentsController): Router {
  const router = Router();

  router.post('/', validateRequest({ body: createAssignmentSchema }), controller.createAssignment);
  router.get('/due-next-week', controller.listDueNextWeek);
  router.post('/:assignmentId/submissions', controller.submit);

  return router;
}

export function createSubmissionsRoutes(controller: AssignmentsController): Router {
  const router = Router();

  router.patch('/:submissionId/grade', validateRequest({ body: gradeSchema }), controller.grade);

  return router;
}
