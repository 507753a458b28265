/**
 * Export Service
 * JSON export through a sink and re-import into a fresh store
 */

import { Types } from 'mongoose';
import { seededRandom } from '../../generator/random';
import { ExportService, toSerializable, type ExportSink } from '../export.service';
import { SeedService } from '../seed.service';
import { createTestContext } from './fixtures';

class CapturingSink implements ExportSink {
  readonly files = new Map<string, string>();

  async write(destination: string, contents: string): Promise<void> {
    this.files.set(destination, contents);
  }
}

const counts = { users: 8, courses: 3, lessons: 6, assignments: 4, enrollments: 10, submissions: 8 };

describe('toSerializable', () => {
  it('turns ObjectIds and Dates into strings', () => {
    const id = new Types.ObjectId('65f0c0ffee0123456789abcd');

    expect(toSerializable({ _id: id, at: new Date('2024-01-02T03:04:05Z'), tags: ['a'], grade: null })).toEqual({
      _id: '65f0c0ffee0123456789abcd',
      at: '2024-01-02T03:04:05.000Z',
      tags: ['a'],
      grade: null,
    });
  });
});

describe('ExportService', () => {
  it('writes every collection as indented JSON', async () => {
    const ctx = createTestContext();
    await new SeedService(ctx).seedDatabase(counts, { random: seededRandom(11) });
    const sink = new CapturingSink();

    const summary = await new ExportService(ctx, sink).exportSampleData('out/sample.json');

    const contents = sink.files.get('out/sample.json') ?? '';
    expect(contents.startsWith('{\n  "users": [\n')).toBe(true);
    expect(Object.keys(JSON.parse(contents))).toEqual([
      'users',
      'courses',
      'lessons',
      'assignments',
      'enrollments',
      'submissions',
    ]);
    expect(summary.users).toBe(8);
    expect(summary.courses).toBe(3);
  });

  it('restores exported documents into another store', async () => {
    const source = createTestContext();
    await new SeedService(source).seedDatabase(counts, { random: seededRandom(11) });
    const sink = new CapturingSink();
    const exported = await new ExportService(source, sink).exportSampleData('sample.json');

    const target = createTestContext();
    const imported = await new ExportService(target, sink).importSampleData(JSON.parse(sink.files.get('sample.json') ?? '{}'));

    expect(imported).toEqual(exported);
    const original = await source.store.findOne('enrollments', { enrollmentId: 'ENROLL_001' });
    const restored = await target.store.findOne('enrollments', { enrollmentId: 'ENROLL_001' });
    expect(restored?.enrollmentDate).toBeInstanceOf(Date);
    expect(restored?._id).toBeInstanceOf(Types.ObjectId);
    expect(toSerializable(restored)).toEqual(toSerializable(original));
  });

  it('appends instead of clearing when asked', async () => {
    const ctx = createTestContext();
    const service = new ExportService(ctx, new CapturingSink());
    const user = (userId: string) => ({
      userId,
      email: `${userId.toLowerCase()}@example.org`,
      firstName: 'Test',
      lastName: 'User',
      role: 'student',
    });

    await service.importSampleData({ users: [user('STU_001')], unrelated: [] });
    await service.importSampleData({ users: [user('STU_002')] }, { clear: false });

    expect(await ctx.store.countDocuments('users')).toBe(2);
  });

  it('rejects a payload that is not a map of document arrays', async () => {
    const service = new ExportService(createTestContext(), new CapturingSink());

    await expect(service.importSampleData({ users: 'not-an-array' })).rejects.toThrow();
  });
});
