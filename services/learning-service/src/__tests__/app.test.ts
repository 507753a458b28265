/**
 * Learning Service HTTP API
 * Routes exercised end to end against the in-memory store
 */

import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app';
import { loadLearningServiceConfig } from '../config/env';
import type { ExportSink } from '../services/export.service';
import { MemoryDocumentStore } from '../store';

const NOW = new Date('2024-06-01T12:00:00Z');

describe('Learning Service API', () => {
  let app: Express;
  let written: Map<string, string>;

  beforeEach(async () => {
    const config = loadLearningServiceConfig({ STORE_DRIVER: 'memory', MONGO_DB_NAME: 'test_db', NODE_ENV: 'test' });
    const store = new MemoryDocumentStore({ dbName: config.MONGO_DB_NAME });
    await store.ensureCollections();
    written = new Map();
    const exportSink: ExportSink = {
      async write(destination, contents) {
        written.set(destination, contents);
      },
    };
    app = createApp({ store, config, clock: () => NOW, exportSink });
  });

  const registerAda = () =>
    request(app)
      .post('/api/users/students')
      .send({ firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.org' });

  it('reports health with the store name', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', service: 'learning-service', store: 'test_db' });
  });

  it('echoes the request ID header', async () => {
    const res = await request(app).get('/health').set('X-Request-ID', 'req-test-1');

    expect(res.headers['x-request-id']).toBe('req-test-1');
  });

  describe('users', () => {
    it('registers a student and rejects the same email again', async () => {
      const first = await registerAda();
      expect(first.status).toBe(201);
      expect(first.body.data.userId).toBe('STU_001');

      const second = await registerAda();
      expect(second.status).toBe(409);
      expect(second.body).toMatchObject({ success: false, message: 'Student could not be registered' });
    });

    it('validates the registration body', async () => {
      const res = await request(app)
        .post('/api/users/students')
        .send({ firstName: 'Ada', lastName: 'Lovelace', email: 'not-an-email' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Validation error');
      expect(res.body.errors[0].field).toBe('email');
    });

    it('returns the validation messages of a rejected user document', async () => {
      const res = await request(app).post('/api/users').send({ userId: 'INST_001', email: 'grace@example.org' });

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual([
        'Missing required field: firstName',
        'Missing required field: lastName',
        'Missing required field: role',
      ]);
    });

    it('returns 404 for an unknown user', async () => {
      const res = await request(app).get('/api/users/STU_404');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ success: false, message: 'User not found: STU_404' });
    });

    it('keeps a deactivated student retrievable but out of the active list', async () => {
      await registerAda();

      await request(app).post('/api/users/STU_001/deactivate').expect(200);

      const user = await request(app).get('/api/users/STU_001');
      expect(user.body.data.isActive).toBe(false);
      const active = await request(app).get('/api/users/students/active');
      expect(active.body.data).toEqual([]);
    });
  });

  describe('courses and enrollments', () => {
    beforeEach(async () => {
      await registerAda();
      await request(app)
        .post('/api/courses')
        .send({ title: 'Web Basics', instructorId: 'INST_001', category: 'Programming', price: 120 })
        .expect(201);
    });

    it('requires a search filter', async () => {
      const res = await request(app).get('/api/courses/search');

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('A search filter is required');
    });

    it('finds courses by title', async () => {
      const res = await request(app).get('/api/courses/search').query({ title: 'web' });

      expect(res.body.data.map((course: { courseId: string }) => course.courseId)).toEqual(['COURSE_001']);
    });

    it('appends lessons in order', async () => {
      await request(app).post('/api/courses/COURSE_001/lessons').send({ title: 'Setup' }).expect(201);
      await request(app).post('/api/courses/COURSE_001/lessons').send({ title: 'Layout' }).expect(201);

      const res = await request(app).get('/api/courses/COURSE_001/lessons');
      expect(res.body.data.map((lesson: { title: string; order: number }) => [lesson.title, lesson.order])).toEqual([
        ['Setup', 1],
        ['Layout', 2],
      ]);
    });

    it('enrolls once and completes the enrollment at 100 percent', async () => {
      const enrolled = await request(app).post('/api/enrollments').send({ studentId: 'STU_001', courseId: 'COURSE_001' });
      expect(enrolled.status).toBe(201);
      expect(enrolled.body.data).toMatchObject({ status: 'enrolled', enrollmentId: 'ENROLL_001' });

      const again = await request(app).post('/api/enrollments').send({ studentId: 'STU_001', courseId: 'COURSE_001' });
      expect(again.status).toBe(200);
      expect(again.body.message).toBe('Student is already enrolled');

      await request(app).patch('/api/enrollments/ENROLL_001/progress').send({ progress: 100 }).expect(200);

      const analytics = await request(app).get('/api/analytics/advanced');
      expect(analytics.body.data.engagement).toEqual([{ status: 'completed', count: 1, avgProgress: 100 }]);
      expect(analytics.body.data.monthlyTrends).toEqual([{ year: 2024, month: 6, enrollments: 1, active: 0, completed: 1 }]);
    });

    it('lists enrolled students with their details', async () => {
      await request(app).post('/api/enrollments').send({ studentId: 'STU_001', courseId: 'COURSE_001' });

      const res = await request(app).get('/api/courses/COURSE_001/students');

      expect(res.body.data).toEqual([
        {
          enrollmentId: 'ENROLL_001',
          enrollmentDate: NOW.toISOString(),
          status: 'active',
          progress: 0,
          student: { userId: 'STU_001', firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.org' },
        },
      ]);
    });

    it('returns 404 when removing an unknown enrollment', async () => {
      const res = await request(app).delete('/api/enrollments/ENROLL_404');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Enrollment not found: ENROLL_404');
    });
  });

  describe('admin', () => {
    it('seeds the database reproducibly', async () => {
      const body = { users: 8, courses: 3, lessons: 5, assignments: 4, enrollments: 6, submissions: 5, seed: 9 };

      const first = await request(app).post('/api/admin/seed').send(body);
      const second = await request(app).post('/api/admin/seed').send(body);

      expect(first.status).toBe(201);
      expect(first.body.data.users).toBe(8);
      expect(first.body.data.courses).toBe(3);
      expect(second.body.data).toEqual(first.body.data);
    });

    it('exports to the configured path', async () => {
      await registerAda();

      const res = await request(app).post('/api/admin/export').send({});

      expect(res.status).toBe(200);
      expect(res.body.data.destination).toBe('sample_data.json');
      expect(res.body.data.counts.users).toBe(1);
      expect(JSON.parse(written.get('sample_data.json') ?? '{}').users[0].userId).toBe('STU_001');
    });

    it.each([['../outside.json'], ['/tmp/outside.json']])('refuses a client-chosen export path %s', async (path) => {
      const res = await request(app).post('/api/admin/export').send({ path });

      expect(res.status).toBe(400);
      expect(written.size).toBe(0);
    });

    it('rejects a seed request above the user bound', async () => {
      const res = await request(app).post('/api/admin/seed').send({ users: 5000000 });

      expect(res.status).toBe(400);
      expect(res.body.errors[0].field).toBe('users');
    });

    it('rejects an explain filter with an unsupported operator', async () => {
      const res = await request(app)
        .post('/api/admin/explain')
        .send({ collection: 'users', filter: { $where: 'sleep(1000)' } });

      expect(res.status).toBe(400);
      expect(res.body.errors).toEqual([{ field: 'filter', message: 'Unsupported query operator: $where' }]);
    });

    it('rejects an unsupported operator nested under a field', async () => {
      const res = await request(app)
        .post('/api/admin/explain')
        .send({ collection: 'users', filter: { $or: [{ role: 'student' }, { email: { $function: {} } }] } });

      expect(res.status).toBe(400);
      expect(res.body.errors[0].message).toBe('Unsupported query operator: $function');
    });

    it('rejects an explain request for an unknown collection', async () => {
      const res = await request(app).post('/api/admin/explain').send({ collection: 'grades', filter: {} });

      expect(res.status).toBe(400);
      expect(res.body.errors[0].field).toBe('collection');
    });

    it('explains an indexed query', async () => {
      const res = await request(app)
        .post('/api/admin/explain')
        .send({ collection: 'users', filter: { role: 'student' } });

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ stage: 'IXSCAN', indexName: 'role_1' });
    });
  });
});
