import { Router } from 'express';
import type { AnalyticsController } from '../controllers/analytics.controller';

export function createAnalyticsRoutes(controller: AnalyticsController): Router {
  const router = Router();

  router.get('/courses', controller.courseStatistics);
  router.get('/students', controller.studentPerformance);
  router.get('/instructors', controller.instructors);
  router.get('/advanced', controller.advanced);

  return router;
}
