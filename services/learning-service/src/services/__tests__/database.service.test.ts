/**
 * Database Service
 * Query plans, query timings and collection statistics
 */

import { DAY_MS } from '../context';
import { DatabaseService } from '../database.service';
import { NOW, createTestContext } from './fixtures';

describe('DatabaseService', () => {
  let ctx: ReturnType<typeof createTestContext>;
  let database: DatabaseService;

  beforeEach(async () => {
    ctx = createTestContext();
    database = new DatabaseService(ctx);
    await ctx.store.ensureCollections();
    await ctx.store.insertMany('courses', [
      { courseId: 'COURSE_001', title: 'Intro Course', instructorId: 'INST_001', category: 'Programming' },
      { courseId: 'COURSE_002', title: 'Web Basics', instructorId: 'INST_001', category: 'Design' },
    ]);
    await ctx.store.insertMany('enrollments', [
      { enrollmentId: 'ENROLL_001', studentId: 'STU_001', courseId: 'COURSE_001', enrollmentDate: new Date(NOW.getTime() - 5 * DAY_MS) },
      { enrollmentId: 'ENROLL_002', studentId: 'STU_002', courseId: 'COURSE_001', enrollmentDate: new Date(NOW.getTime() - 40 * DAY_MS) },
    ]);
    await ctx.store.insertMany('assignments', [
      { assignmentId: 'ASSIGN_001', courseId: 'COURSE_001', title: 'Quiz', dueDate: new Date(NOW.getTime() + 3 * DAY_MS) },
      { assignmentId: 'ASSIGN_002', courseId: 'COURSE_001', title: 'Project', dueDate: new Date(NOW.getTime() + 20 * DAY_MS) },
    ]);
  });

  it('explains which index a filter uses', async () => {
    await expect(database.analyzeQueryPerformance('courses', { category: 'Programming' })).resolves.toMatchObject({
      collection: 'courses',
      stage: 'IXSCAN',
      indexName: 'category_1',
      nReturned: 1,
    });
    await expect(database.analyzeQueryPerformance('courses', { price: { $gt: 10 } })).resolves.toMatchObject({
      stage: 'COLLSCAN',
      indexName: null,
      nReturned: 0,
    });
  });

  it('times the representative queries', async () => {
    const timings = await database.optimizeSlowQueries();

    expect(timings.map(({ name, collection, resultCount }) => ({ name, collection, resultCount }))).toEqual([
      { name: 'courses by title pattern', collection: 'courses', resultCount: 1 },
      { name: 'enrollments in the last 30 days', collection: 'enrollments', resultCount: 1 },
      { name: 'assignments due within 7 days', collection: 'assignments', resultCount: 1 },
    ]);
    expect(timings.every((timing) => timing.durationMs >= 0)).toBe(true);
  });

  it('reports statistics for all six collections', async () => {
    const stats = await database.getCollectionStatistics();

    expect(stats.map((entry) => [entry.collection, entry.count, entry.nindexes])).toEqual([
      ['users', 0, 4],
      ['courses', 2, 6],
      ['lessons', 0, 4],
      ['assignments', 2, 4],
      ['enrollments', 2, 4],
      ['submissions', 0, 3],
    ]);
  });

  it('reads collection statistics one collection at a time', async () => {
    const stats = ctx.store.stats.bind(ctx.store);
    let inFlight = 0;
    let maxInFlight = 0;
    jest.spyOn(ctx.store, 'stats').mockImplementation(async (collection) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setImmediate(resolve));
      inFlight -= 1;
      return stats(collection);
    });

    await database.getCollectionStatistics();

    expect(maxInFlight).toBe(1);
  });

  it('describes the database', async () => {
    const info = await database.retrieveDatabaseInfo();

    expect(info.name).toBe('test_db');
    expect(info.collections).toContainEqual({ name: 'courses', count: 2 });
  });
});
