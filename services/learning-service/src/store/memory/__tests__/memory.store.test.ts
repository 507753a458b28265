/**
 * In-memory document store
 * Validation, unique indexes, updates and diagnostics
 */

import { DuplicateKeyError, SchemaValidationError } from '../../errors';
import { MemoryDocumentStore } from '../memory.store';

const student = (n: number, email = `student${n}@example.org`) => ({
  userId: `STU_00${n}`,
  email,
  firstName: 'Test',
  lastName: `Student${n}`,
  role: 'student',
  isActive: true,
});

describe('MemoryDocumentStore', () => {
  let store: MemoryDocumentStore;

  beforeEach(async () => {
    store = new MemoryDocumentStore({ dbName: 'test_db' });
    await store.ensureCollections();
  });

  it('assigns an ObjectId and returns it as a hex string', async () => {
    const id = await store.insertOne('users', student(1));

    expect(id).toMatch(/^[0-9a-f]{24}$/);
    const stored = await store.findOne('users', { userId: 'STU_001' });
    expect(stored?.email).toBe('student1@example.org');
  });

  it('rejects documents that fail validation', async () => {
    await expect(store.insertOne('users', { ...student(1), role: 'admin' })).rejects.toThrow(SchemaValidationError);
    await expect(store.insertOne('users', { userId: 'STU_009' })).rejects.toThrow(
      'Missing required field: email'
    );
    expect(await store.countDocuments('users')).toBe(0);
  });

  it('reports the violated unique index', async () => {
    await store.insertOne('users', student(1));

    const error = await store.insertOne('users', student(2, 'student1@example.org')).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error instanceof DuplicateKeyError && error.isOn('email')).toBe(true);
  });

  it('enforces compound unique indexes', async () => {
    const lesson = { lessonId: 'LESSON_001', courseId: 'COURSE_001', title: 'Intro', order: 1 };
    await store.insertOne('lessons', lesson);

    await expect(store.insertOne('lessons', { ...lesson, lessonId: 'LESSON_002' })).rejects.toThrow(
      'Duplicate key error in lessons: courseId, order'
    );
    await expect(
      store.insertOne('lessons', { ...lesson, lessonId: 'LESSON_003', courseId: 'COURSE_002' })
    ).resolves.toMatch(/^[0-9a-f]{24}$/);
  });

  it('keeps documents inserted before the first failure of insertMany', async () => {
    await expect(store.insertMany('users', [student(1), student(2), student(3, 'student1@example.org')])).rejects.toThrow(
      DuplicateKeyError
    );
    expect(await store.countDocuments('users')).toBe(2);
  });

  it('reports zero modifications when an update changes nothing', async () => {
    await store.insertOne('users', student(1));

    expect(await store.updateOne('users', { userId: 'STU_001' }, { $set: { isActive: true } })).toEqual({
      matchedCount: 1,
      modifiedCount: 0,
    });
    expect(await store.updateOne('users', { userId: 'STU_001' }, { $set: { isActive: false } })).toEqual({
      matchedCount: 1,
      modifiedCount: 1,
    });
    expect(await store.updateOne('users', { userId: 'STU_404' }, { $set: { isActive: false } })).toEqual({
      matchedCount: 0,
      modifiedCount: 0,
    });
  });

  it('validates documents after an update', async () => {
    await store.insertOne('users', student(1));

    await expect(store.updateOne('users', { userId: 'STU_001' }, { $set: { role: 'guest' } })).rejects.toThrow(
      SchemaValidationError
    );
    expect((await store.findOne('users', { userId: 'STU_001' }))?.role).toBe('student');
  });

  it('returns copies that do not alias stored documents', async () => {
    await store.insertOne('users', { ...student(1), profile: { skills: ['React'] } });

    const first = await store.findOne('users', { userId: 'STU_001' });
    if (first && typeof first.profile === 'object' && first.profile !== null) {
      Object.assign(first.profile, { skills: [] });
    }

    const again = await store.findOne('users', { userId: 'STU_001' });
    expect(again?.profile).toEqual({ skills: ['React'] });
  });

  it('sorts, skips, limits and projects finds', async () => {
    await store.insertMany('users', [student(3), student(1), student(2)]);

    const page = await store.find('users', {}, { sort: { userId: -1 }, skip: 1, limit: 1, projection: { userId: 1, _id: 0 } });

    expect(page).toEqual([{ userId: 'STU_002' }]);
  });

  it('deletes one or many documents', async () => {
    await store.insertMany('users', [student(1), student(2), student(3)]);

    expect(await store.deleteOne('users', { userId: 'STU_001' })).toBe(1);
    expect(await store.deleteOne('users', { userId: 'STU_001' })).toBe(0);
    expect(await store.deleteMany('users', { role: 'student' })).toBe(2);
  });

  it('explains index and collection scans', async () => {
    await store.insertMany('users', [student(1), student(2)]);

    const byRole = await store.explain('users', { role: 'student' });
    expect(byRole).toMatchObject({ stage: 'IXSCAN', indexName: 'role_1', nReturned: 2 });

    const byName = await store.explain('users', { firstName: 'Test' });
    expect(byName).toMatchObject({ stage: 'COLLSCAN', indexName: null, totalDocsExamined: 2 });
  });

  it('reports collection statistics and database info', async () => {
    await store.insertOne('users', student(1));

    const stats = await store.stats('users');
    expect(stats.count).toBe(1);
    expect(stats.nindexes).toBe(4);
    expect(stats.avgObjSize).toBe(stats.size);

    const info = await store.databaseInfo();
    expect(info.name).toBe('test_db');
    expect(info.collections).toContainEqual({ name: 'users', count: 1 });
    expect(info.collections).toHaveLength(6);
  });
});
