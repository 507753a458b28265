/**
 * Seed Service
 * Replacing collection contents with a generated fixture set
 */

import { seededRandom } from '../../generator/random';
import { generateSampleData, type SampleCounts } from '../../generator/sampleData';
import { SeedService } from '../seed.service';
import { NOW, createTestContext } from './fixtures';

const counts: SampleCounts = { users: 12, courses: 5, lessons: 10, assignments: 6, enrollments: 15, submissions: 12 };

describe('SeedService', () => {
  it('inserts the generated dataset and reports per-collection counts', async () => {
    const ctx = createTestContext();
    const seeds = new SeedService(ctx);
    const expected = generateSampleData(counts, { random: seededRandom(3), now: NOW });

    const summary = await seeds.seedDatabase(counts, { random: seededRandom(3) });

    expect(summary).toEqual({
      users: expected.users.length,
      courses: expected.courses.length,
      lessons: expected.lessons.length,
      assignments: expected.assignments.length,
      enrollments: expected.enrollments.length,
      submissions: expected.submissions.length,
    });
    expect(await ctx.store.countDocuments('users')).toBe(12);
    expect(await ctx.store.countDocuments('enrollments')).toBe(expected.enrollments.length);
  });

  it('clears existing documents first', async () => {
    const ctx = createTestContext();
    await ctx.store.insertOne('users', {
      userId: 'STU_999',
      email: 'leftover@example.org',
      firstName: 'Left',
      lastName: 'Over',
      role: 'student',
    });

    await new SeedService(ctx).seedDatabase(counts, { random: seededRandom(3) });

    expect(await ctx.store.findOne('users', { userId: 'STU_999' })).toBeNull();
  });
});
