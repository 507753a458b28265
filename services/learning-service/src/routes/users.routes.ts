import { Router } from 'express';
import { validateRequest } from '@eduhub/shared/middlewares/validateRequest';
import { registerStudentSchema, type UsersController } from '../controllers/users.controller';

export function createUsersRoutes(controller: UsersController): Router {
  const router = Router();

  router.post('/students', validateRequest({ body: registerStudentSchema }), controller.registerStudent);
  router.post('/', controller.createUser);

  router.get('/students/active', controller.listActiveStudents);
  router.get('/recent', controller.listRecentUsers);
  router.get('/:userId', controller.getUser);

  router.patch('/:userId/profile', controller.updateProfile);
  router.post('/:userId/deactivate', controller.deactivate);

  return router;
}
