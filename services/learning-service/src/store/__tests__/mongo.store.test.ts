/**
 * MongoDocumentStore
 * Update validation that runs before anything reaches the server
 */

import { Types } from 'mongoose';
import { SchemaValidationError } from '../errors';
import { MongoDocumentStore } from '../mongo.store';

describe('MongoDocumentStore.updateOne', () => {
  const enrollment = {
    _id: new Types.ObjectId(),
    enrollmentId: 'ENROLL_001',
    studentId: 'STU_001',
    courseId: 'COURSE_001',
    enrollmentDate: new Date('2024-06-01T12:00:00Z'),
    status: 'active',
    progress: 0,
    completionDate: null,
  };

  it('rejects an update that would leave progress out of range', async () => {
    const store = new MongoDocumentStore();
    jest.spyOn(store, 'findOne').mockResolvedValue(enrollment);

    await expect(
      store.updateOne('enrollments', { enrollmentId: 'ENROLL_001' }, { $set: { progress: 150 } })
    ).rejects.toBeInstanceOf(SchemaValidationError);
  });

  it('reports no match without sending an update', async () => {
    const store = new MongoDocumentStore();
    jest.spyOn(store, 'findOne').mockResolvedValue(null);

    await expect(
      store.updateOne('enrollments', { enrollmentId: 'ENROLL_404' }, { $set: { progress: 10 } })
    ).resolves.toEqual({ matchedCount: 0, modifiedCount: 0 });
  });
});
