/**
 * Display ID allocation
 * Formatting, next-number reads and retry on collision
 */

import { DisplayIdCollisionError, DuplicateKeyError } from '../../store/errors';
import { MemoryDocumentStore } from '../../store/memory/memory.store';
import { DisplayIdAllocator, formatDisplayId, parseDisplaySequence } from '../displayId';
import { RacingStore } from './fixtures';

const student = (userId: string) => ({
  userId,
  email: 'ada@example.org',
  firstName: 'Ada',
  lastName: 'Lovelace',
  role: 'student',
});

describe('formatDisplayId / parseDisplaySequence', () => {
  it('pads sequences to three digits', () => {
    expect(formatDisplayId('STU_', 7)).toBe('STU_007');
    expect(formatDisplayId('SUB_', 1234)).toBe('SUB_1234');
  });

  it('parses only IDs with the given prefix and a numeric suffix', () => {
    expect(parseDisplaySequence('STU_', 'STU_012')).toBe(12);
    expect(parseDisplaySequence('STU_', 'INST_001')).toBeNull();
    expect(parseDisplaySequence('COURSE_', 'COURSE_12a')).toBeNull();
  });
});

describe('DisplayIdAllocator', () => {
  it('starts at 001 for an empty collection', async () => {
    const allocator = new DisplayIdAllocator(new MemoryDocumentStore());

    await expect(allocator.nextId('courses', 'courseId', 'COURSE_')).resolves.toBe('COURSE_001');
  });

  it('continues from the numeric maximum', async () => {
    const store = new MemoryDocumentStore();
    for (const courseId of ['COURSE_999', 'COURSE_1000', 'COURSE_draft']) {
      await store.insertOne('courses', { courseId, title: 'Course', instructorId: 'INST_001' });
    }
    const allocator = new DisplayIdAllocator(store);

    await expect(allocator.nextId('courses', 'courseId', 'COURSE_')).resolves.toBe('COURSE_1001');
  });

  it('retries with a fresh number when a concurrent writer takes the ID', async () => {
    const store = new RacingStore('users', (doc, race) => ({ ...doc, email: `rival${race}@example.org` }));
    const allocator = new DisplayIdAllocator(store);
    const build = jest.fn(student);

    const allocation = await allocator.insert({ collection: 'users', field: 'userId', prefix: 'STU_', build });

    expect(allocation.displayId).toBe('STU_002');
    expect(build.mock.calls).toEqual([['STU_001'], ['STU_002']]);
    expect(await store.countDocuments('users')).toBe(2);
  });

  it('gives up after the configured number of attempts', async () => {
    const store = new RacingStore('users', (doc, race) => ({ ...doc, email: `rival${race}@example.org` }), 10);
    const allocator = new DisplayIdAllocator(store, 3);

    const attempt = allocator.insert({ collection: 'users', field: 'userId', prefix: 'STU_', build: student });

    await expect(attempt).rejects.toThrow(DisplayIdCollisionError);
    await expect(attempt).rejects.toThrow('Could not allocate a unique STU_ id in users after 3 attempts');
    expect(await store.countDocuments('users')).toBe(3);
  });

  it('does not retry collisions on other unique fields', async () => {
    const store = new MemoryDocumentStore();
    await store.insertOne('users', student('STU_001'));
    const allocator = new DisplayIdAllocator(store);
    const build = jest.fn(student);

    await expect(allocator.insert({ collection: 'users', field: 'userId', prefix: 'STU_', build })).rejects.toThrow(
      DuplicateKeyError
    );
    expect(build).toHaveBeenCalledTimes(1);
  });
});
