import { Router } from 'express';
import { validateRequest } from '@eduhub/shared/middlewares/validateRequest';
import { explainSchema, exportSchema, seedSchema, type AdminController } from '../controllers/admin.controller';

export function createAdminRoutes(controller: AdminController): Router {
  const router = Router();

  router.get('/info', controller.info);
  router.get('/stats', controller.stats);
  router.post('/explain', validateRequest({ body: explainSchema }), controller.explain);
  router.get('/slow-queries', controller.slowQueries);

  router.post('/seed', validateRequest({ body: seedSchema }), controller.seed);
  router.post('/export', validateRequest({ body: exportSchema }), controller.exportData);

  return router;
}
