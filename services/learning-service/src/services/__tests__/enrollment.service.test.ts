/**
 * Enrollment Service
 * Idempotent registration, progress tracking and the student roster
 */

import { EnrollmentService } from '../enrollment.service';
import { NOW, RacingStore, createTestContext } from './fixtures';

describe('EnrollmentService', () => {
  it('treats re-registering the same pair as a no-op', async () => {
    const ctx = createTestContext();
    const enrollments = new EnrollmentService(ctx);

    await expect(enrollments.registerStudentForCourse('STU_001', 'COURSE_001')).resolves.toMatchObject({
      status: 'enrolled',
      enrollmentId: 'ENROLL_001',
    });
    await expect(enrollments.registerStudentForCourse('STU_001', 'COURSE_001')).resolves.toEqual({
      status: 'already-enrolled',
      enrollmentId: 'ENROLL_001',
    });
    expect(await ctx.store.countDocuments('enrollments', { studentId: 'STU_001', courseId: 'COURSE_001' })).toBe(1);

    const stored = await ctx.store.findOne('enrollments', { enrollmentId: 'ENROLL_001' });
    expect(stored).toMatchObject({ status: 'active', progress: 0, completionDate: null, enrollmentDate: NOW });
  });

  it('reports the winning enrollment when a concurrent registration lands first', async () => {
    const store = new RacingStore('enrollments', (doc) => ({ ...doc, enrollmentId: 'ENROLL_050' }));
    const enrollments = new EnrollmentService(createTestContext(store));

    await expect(enrollments.registerStudentForCourse('STU_001', 'COURSE_001')).resolves.toEqual({
      status: 'already-enrolled',
      enrollmentId: 'ENROLL_050',
    });
    expect(await store.countDocuments('enrollments')).toBe(1);
  });

  it('reports a failure when the lookup after a lost race fails', async () => {
    const store = new RacingStore('enrollments', (doc) => ({ ...doc, enrollmentId: 'ENROLL_050' }));
    const enrollments = new EnrollmentService(createTestContext(store));
    const findOne = jest.spyOn(store, 'findOne');
    // first lookup sees no enrollment, the one after the duplicate fails
    findOne.mockResolvedValueOnce(null).mockRejectedValueOnce(new Error('connection reset'));

    await expect(enrollments.registerStudentForCourse('STU_001', 'COURSE_001')).resolves.toEqual({
      status: 'failed',
      reason: 'connection reset',
    });
  });

  it('reports a failure for a document the store rejects', async () => {
    const enrollments = new EnrollmentService(createTestContext());

    await expect(enrollments.registerStudentForCourse('', 'COURSE_001')).resolves.toMatchObject({ status: 'failed' });
  });

  it('completes an enrollment when progress reaches 100', async () => {
    const ctx = createTestContext();
    const enrollments = new EnrollmentService(ctx);
    await enrollments.registerStudentForCourse('STU_001', 'COURSE_001');

    expect(await enrollments.updateEnrollmentProgress('ENROLL_001', 50)).toBe(1);
    expect(await ctx.store.findOne('enrollments', { enrollmentId: 'ENROLL_001' })).toMatchObject({
      status: 'active',
      progress: 50,
      completionDate: null,
    });

    expect(await enrollments.updateEnrollmentProgress('ENROLL_001', 100)).toBe(1);
    expect(await ctx.store.findOne('enrollments', { enrollmentId: 'ENROLL_001' })).toMatchObject({
      status: 'completed',
      progress: 100,
      completionDate: NOW,
    });
  });

  it('returns 0 for a progress value the store rejects', async () => {
    const enrollments = new EnrollmentService(createTestContext());
    await enrollments.registerStudentForCourse('STU_001', 'COURSE_001');

    expect(await enrollments.updateEnrollmentProgress('ENROLL_001', 150)).toBe(0);
  });

  it.each([[150], [-1], [Number.NaN]])('rejects progress %p without writing', async (progress) => {
    const ctx = createTestContext();
    const enrollments = new EnrollmentService(ctx);
    await enrollments.registerStudentForCourse('STU_001', 'COURSE_001');
    const updateOne = jest.spyOn(ctx.store, 'updateOne');

    expect(await enrollments.updateEnrollmentProgress('ENROLL_001', progress)).toBe(0);
    expect(updateOne).not.toHaveBeenCalled();
  });

  it('removes an enrollment', async () => {
    const enrollments = new EnrollmentService(createTestContext());
    await enrollments.registerStudentForCourse('STU_001', 'COURSE_001');

    expect(await enrollments.removeEnrollment('ENROLL_001')).toBe(1);
    expect(await enrollments.removeEnrollment('ENROLL_001')).toBe(0);
  });

  it('lists enrolled students with their user details', async () => {
    const ctx = createTestContext();
    const enrollments = new EnrollmentService(ctx);
    await ctx.store.insertMany('users', [
      { userId: 'STU_001', email: 'ada@example.org', firstName: 'Ada', lastName: 'Lovelace', role: 'student' },
      { userId: 'STU_002', email: 'alan@example.org', firstName: 'Alan', lastName: 'Turing', role: 'student' },
    ]);
    await enrollments.registerStudentForCourse('STU_002', 'COURSE_001');
    await enrollments.registerStudentForCourse('STU_001', 'COURSE_001');
    await enrollments.registerStudentForCourse('STU_404', 'COURSE_001');
    await enrollments.registerStudentForCourse('STU_001', 'COURSE_002');

    const roster = await enrollments.findEnrolledStudentsInCourse('COURSE_001');

    expect(roster).toEqual([
      {
        enrollmentId: 'ENROLL_001',
        enrollmentDate: NOW,
        status: 'active',
        progress: 0,
        student: { userId: 'STU_002', firstName: 'Alan', lastName: 'Turing', email: 'alan@example.org' },
      },
      {
        enrollmentId: 'ENROLL_002',
        enrollmentDate: NOW,
        status: 'active',
        progress: 0,
        student: { userId: 'STU_001', firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.org' },
      },
    ]);
  });
});
