import express from 'express';
import timeout from 'connect-timeout';
import type { Express } from 'express';
import { globalErrorHandler } from '@eduhub/shared/middlewares/globalErrorHandler';
import { requestIdMiddleware } from '@eduhub/shared/middlewares/requestId';
import logger from '@eduhub/shared/config/logger';
import type { LearningServiceConfig } from './config/env';
import type { DocumentStore } from './store';
import { createServiceContext, type Clock } from './services/context';
import { UserService } from './services/user.service';
import { CourseService } from './services/course.service';
import { LessonService } from './services/lesson.service';
import { EnrollmentService } from './services/enrollment.service';
import { AssignmentService } from './services/assignment.service';
import { AnalyticsService } from './services/analytics.service';
import { DatabaseService } from './services/database.service';
import { SeedService } from './services/seed.service';
import { ExportService, type ExportSink } from './services/export.service';
import { UsersController } from './controllers/users.controller';
import { CoursesController } from './controllers/courses.controller';
import { EnrollmentsController } from './controllers/enrollments.controller';
import { AssignmentsController } from './controllers/assignments.controller';
import { AnalyticsController } from './controllers/analytics.controller';
import { AdminController } from './controllers/admin.controller';
import { createUsersRoutes } from './routes/users.routes';
import { createCoursesRoutes } from './routes/courses.routes';
import { createEnrollmentsRoutes } from './routes/enrollments.routes';
import { createAssignmentsRoutes, createSubmissionsRoutes } from './routes/assignments.routes';
import { createAnalyticsRoutes } from './routes/analytics.routes';
import { createAdminRoutes } from './routes/admin.routes';

export type AppDependencies = {
  store: DocumentStore;
  config: LearningServiceConfig;
  clock?: Clock;
  exportSink?: ExportSink;
};

export function createApp({ store, config, clock, exportSink }: AppDependencies): Express {
  const app: Express = express();

  app.use(requestIdMiddleware);
  app.use(express.json({ limit: '5mb' }));
  app.use(express.urlencoded({ extended: true, limit: '5mb' }));

  app.use(timeout(config.REQUEST_TIMEOUT));

  // Timeout handler - must be after timeout middleware
  app.use((req, _res, next) => {
    if (!req.timedout) next();
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'learning-service',
      store: store.name,
      timestamp: new Date().toISOString(),
    });
  });

  const ctx = createServiceContext(store, { maxAttempts: config.DISPLAY_ID_MAX_ATTEMPTS, clock });
  const userService = new UserService(ctx);
  const courseService = new CourseService(ctx);
  const lessonService = new LessonService(ctx);
  const enrollmentService = new EnrollmentService(ctx);
  const assignmentService = new AssignmentService(ctx);
  const assignmentsController = new AssignmentsController(assignmentService);

  app.use('/api/users', createUsersRoutes(new UsersController(userService)));
  app.use('/api/courses', createCoursesRoutes(new CoursesController(courseService, lessonService, enrollmentService)));
  app.use('/api/enrollments', createEnrollmentsRoutes(new EnrollmentsController(enrollmentService)));
  app.use('/api/assignments', createAssignmentsRoutes(assignmentsController));
  app.use('/api/submissions', createSubmissionsRoutes(assignmentsController));
  app.use('/api/analytics', createAnalyticsRoutes(new AnalyticsController(new AnalyticsService(ctx))));
  app.use(
    '/api/admin',
    createAdminRoutes(
      new AdminController(new DatabaseService(ctx), new SeedService(ctx), new ExportService(ctx, exportSink), {
        counts: {
          users: config.SEED_USERS,
          courses: config.SEED_COURSES,
          lessons: config.SEED_LESSONS,
          assignments: config.SEED_ASSIGNMENTS,
          enrollments: config.SEED_ENROLLMENTS,
          submissions: config.SEED_SUBMISSIONS,
        },
        exportPath: config.EXPORT_PATH,
      })
    )
  );

  app.get('/', (_req, res) => {
    res.json({
      message: 'Learning Service Running',
      endpoints: {
        users: '/api/users',
        courses: '/api/courses',
        enrollments: '/api/enrollments',
        assignments: '/api/assignments',
        analytics: '/api/analytics',
        admin: '/api/admin',
        health: '/health',
      },
    });
  });

  app.use(globalErrorHandler);

  logger.info('Learning Service routes initialized', { service: 'learning-service' });
  return app;
}
