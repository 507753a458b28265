/**
 * Filter evaluation
 * Operator semantics of the in-memory query engine
 */

import { UnsupportedOperatorError } from '../../errors';
import { matchesFilter } from '../query';

describe('matchesFilter', () => {
  const course = {
    courseId: 'COURSE_001',
    title: 'Modern Web Development',
    description: 'Build responsive applications with modern tooling',
    price: 199,
    tags: ['modern', 'development'],
    isPublished: false,
    createdAt: new Date('2024-03-10T00:00:00Z'),
    instructor: { profile: { skills: ['React', 'Node.js'] } },
  };

  it('matches plain equality and array membership', () => {
    expect(matchesFilter(course, { courseId: 'COURSE_001' })).toBe(true);
    expect(matchesFilter(course, { tags: 'modern' })).toBe(true);
    expect(matchesFilter(course, { tags: 'sql' })).toBe(false);
  });

  it('treats a missing field as equal to null', () => {
    expect(matchesFilter(course, { category: null })).toBe(true);
    expect(matchesFilter(course, { category: { $exists: false } })).toBe(true);
    expect(matchesFilter(course, { price: { $exists: true } })).toBe(true);
  });

  it('applies range operators only within the same type', () => {
    expect(matchesFilter(course, { price: { $gte: 150, $lte: 200 } })).toBe(true);
    expect(matchesFilter(course, { price: { $gt: 199 } })).toBe(false);
    expect(matchesFilter(course, { price: { $gt: '100' } })).toBe(false);
    expect(matchesFilter(course, { createdAt: { $lt: new Date('2024-04-01T00:00:00Z') } })).toBe(true);
  });

  it('supports $in, $nin and $ne', () => {
    expect(matchesFilter(course, { tags: { $in: ['sql', 'development'] } })).toBe(true);
    expect(matchesFilter(course, { tags: { $nin: ['modern'] } })).toBe(false);
    expect(matchesFilter(course, { isPublished: { $ne: true } })).toBe(true);
  });

  it('matches regular expressions with options', () => {
    expect(matchesFilter(course, { title: { $regex: 'web', $options: 'i' } })).toBe(true);
    expect(matchesFilter(course, { title: { $regex: 'web' } })).toBe(false);
    expect(matchesFilter(course, { title: /^Modern/ })).toBe(true);
  });

  it('descends into nested documents and arrays', () => {
    expect(matchesFilter(course, { 'instructor.profile.skills': 'React' })).toBe(true);
    expect(matchesFilter(course, { tags: { $size: 2 } })).toBe(true);
  });

  it('combines clauses with $and, $or and $nor', () => {
    expect(matchesFilter(course, { $or: [{ price: 10 }, { courseId: 'COURSE_001' }] })).toBe(true);
    expect(matchesFilter(course, { $and: [{ price: 199 }, { isPublished: true }] })).toBe(false);
    expect(matchesFilter(course, { $nor: [{ price: 10 }] })).toBe(true);
  });

  it('runs $text searches against the text-indexed fields', () => {
    const ctx = { textFields: ['title', 'description'] };
    expect(matchesFilter(course, { $text: { $search: 'applications' } }, ctx)).toBe(true);
    expect(matchesFilter(course, { $text: { $search: 'sql web' } }, ctx)).toBe(true);
    expect(matchesFilter(course, { $text: { $search: 'web -responsive' } }, ctx)).toBe(false);
  });

  it('rejects $text without a text index and unknown operators', () => {
    expect(() => matchesFilter(course, { $text: { $search: 'web' } })).toThrow(UnsupportedOperatorError);
    expect(() => matchesFilter(course, { price: { $near: 1 } })).toThrow('Unsupported operator: $near');
  });
});
