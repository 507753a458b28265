/**
 * Assignment Service
 * Due dates, submissions and grading
 */

import { AssignmentService } from '../assignment.service';
import { DAY_MS } from '../context';
import { NOW, createTestContext } from './fixtures';

const daysFromNow = (days: number) => new Date(NOW.getTime() + days * DAY_MS);

describe('AssignmentService', () => {
  let ctx: ReturnType<typeof createTestContext>;
  let assignments: AssignmentService;

  beforeEach(() => {
    ctx = createTestContext();
    assignments = new AssignmentService(ctx);
  });

  it('defaults the due date and points', async () => {
    await expect(assignments.createAssignment('COURSE_001', { title: 'Essay' })).resolves.toMatchObject({
      assignmentId: 'ASSIGN_001',
    });

    expect(await ctx.store.findOne('assignments', { assignmentId: 'ASSIGN_001' })).toMatchObject({
      courseId: 'COURSE_001',
      dueDate: daysFromNow(14),
      maxPoints: 100,
      createdAt: NOW,
    });
  });

  it('lists assignments due within the next seven days, soonest first', async () => {
    for (const [title, days] of [
      ['Later', 10],
      ['Edge', 7],
      ['Overdue', -1],
      ['Soon', 3],
    ] as const) {
      await assignments.createAssignment('COURSE_001', { title, dueDate: daysFromNow(days) });
    }

    const due = await assignments.getAssignmentsDueNextWeek();

    expect(due.map((assignment) => assignment.title)).toEqual(['Soon', 'Edge']);
  });

  it('stores new submissions ungraded', async () => {
    await expect(assignments.submitAssignment('ASSIGN_001', 'STU_001', 'My answer')).resolves.toMatchObject({
      submissionId: 'SUB_001',
    });

    expect(await ctx.store.findOne('submissions', { submissionId: 'SUB_001' })).toMatchObject({
      assignmentId: 'ASSIGN_001',
      studentId: 'STU_001',
      submissionDate: NOW,
      grade: null,
      feedback: null,
      gradedDate: null,
    });
  });

  it('grades a submission', async () => {
    await assignments.submitAssignment('ASSIGN_001', 'STU_001', 'My answer');

    expect(await assignments.updateAssignmentGrade('SUB_001', 92, 'Well argued')).toBe(1);
    expect(await ctx.store.findOne('submissions', { submissionId: 'SUB_001' })).toMatchObject({
      grade: 92,
      feedback: 'Well argued',
      gradedDate: NOW,
    });
  });

  it('rejects grades outside 0 to 100 without writing', async () => {
    await assignments.submitAssignment('ASSIGN_001', 'STU_001', 'My answer');

    expect(await assignments.updateAssignmentGrade('SUB_001', 105)).toBe(0);
    expect(await assignments.updateAssignmentGrade('SUB_001', -1)).toBe(0);
    expect((await ctx.store.findOne('submissions', { submissionId: 'SUB_001' }))?.grade).toBeNull();
    expect(await assignments.updateAssignmentGrade('SUB_404', 80)).toBe(0);
  });
});
