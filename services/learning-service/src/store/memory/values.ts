import { Types } from 'mongoose';
import { isDeepStrictEqual } from 'util';
import { isPlainObject, isRecord } from '@eduhub/shared/utils/typeGuards';
import type { Document } from '../types';

/**
 * Value helpers shared by the in-memory query, update and aggregation code.
 */

export const isObjectId = (value: unknown): value is Types.ObjectId => value instanceof Types.ObjectId;

/**
 * Reads a dotted path. Arrays along the path are not traversed;
 * use `collectPathValues` for query semantics.
 */
export function getPath(doc: unknown, path: string): unknown {
  let current: unknown = doc;
  for (const segment of path.split('.')) {
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      current = current[Number(segment)];
    } else if (isPlainObject(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Every value a path can resolve to, descending into arrays of sub-documents
 * the way query predicates do (`profile.skills`, `materials.0`, `items.name`).
 */
export function collectPathValues(doc: unknown, path: string): unknown[] {
  const [head, ...rest] = path.split('.');
  if (Array.isArray(doc)) {
    if (/^\d+$/.test(head)) {
      return rest.length === 0 ? [doc[Number(head)]] : collectPathValues(doc[Number(head)], rest.join('.'));
    }
    return doc.flatMap((item) => (isPlainObject(item) ? collectPathValues(item, path) : []));
  }
  if (!isPlainObject(doc)) {
    return [undefined];
  }
  const value = doc[head];
  return rest.length === 0 ? [value] : collectPathValues(value, rest.join('.'));
}

export function setPath(doc: Document, path: string, value: unknown): void {
  const segments = path.split('.');
  const last = segments.pop();
  if (last === undefined) {
    return;
  }
  let current: Record<string, unknown> = doc;
  for (const segment of segments) {
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[last] = value;
}

export function unsetPath(doc: Document, path: string): void {
  const segments = path.split('.');
  const last = segments.pop();
  if (last === undefined) {
    return;
  }
  const parent = segments.length === 0 ? doc : getPath(doc, segments.join('.'));
  if (isPlainObject(parent)) {
    delete parent[last];
  }
}

/**
 * Deep copy that keeps Dates and ObjectIds as instances.
 * ObjectIds are immutable and shared.
 */
export function cloneValue(value: unknown): unknown {
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (isObjectId(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => cloneValue(item));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]): [string, unknown] => [key, cloneValue(item)]));
  }
  return value;
}

export function cloneDocument(doc: Document): Document {
  return Object.fromEntries(Object.entries(doc).map(([key, value]): [string, unknown] => [key, cloneValue(value)]));
}

/**
 * Cross-type sort order: null < numbers < strings < objects < arrays < ObjectId < booleans < dates
 */
function typeRank(value: unknown): number {
  if (value === null || value === undefined) return 1;
  if (typeof value === 'number' || typeof value === 'bigint') return 2;
  if (typeof value === 'string') return 3;
  if (value instanceof Date) return 9;
  if (isObjectId(value)) return 7;
  if (Array.isArray(value)) return 5;
  if (typeof value === 'boolean') return 8;
  if (value instanceof RegExp) return 11;
  return 4;
}

/** Range operators only compare values of the same type bracket */
export const sameTypeBracket = (a: unknown, b: unknown): boolean => typeRank(a) === typeRank(b);

export function compareValues(a: unknown, b: unknown): number {
  const rankA = typeRank(a);
  const rankB = typeRank(b);
  if (rankA !== rankB) {
    return rankA < rankB ? -1 : 1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (a instanceof Date && b instanceof Date) {
    return Math.sign(a.getTime() - b.getTime());
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (isObjectId(a) && isObjectId(b)) {
    const hexA = a.toHexString();
    const hexB = b.toHexString();
    return hexA === hexB ? 0 : hexA < hexB ? -1 : 1;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    for (let i = 0; i < Math.min(a.length, b.length); i++) {
      const cmp = compareValues(a[i], b[i]);
      if (cmp !== 0) return cmp;
    }
    return Math.sign(a.length - b.length);
  }
  if (isRecord(a) && isRecord(b)) {
    const entriesA = Object.entries(a);
    const entriesB = Object.entries(b);
    for (let i = 0; i < Math.min(entriesA.length, entriesB.length); i++) {
      const [keyA, valueA] = entriesA[i];
      const [keyB, valueB] = entriesB[i];
      if (keyA !== keyB) return keyA < keyB ? -1 : 1;
      const cmp = compareValues(valueA, valueB);
      if (cmp !== 0) return cmp;
    }
    return Math.sign(entriesA.length - entriesB.length);
  }
  return 0;
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  if ((a === null || a === undefined) && (b === null || b === undefined)) {
    return true;
  }
  if (isObjectId(a) && isObjectId(b)) {
    return a.equals(b);
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return isDeepStrictEqual(a, b);
}

/**
 * Stable string key for grouping and set membership.
 */
export function canonicalKey(value: unknown): string {
  if (value === undefined || value === null) return 'null';
  if (value instanceof Date) return `date:${value.toISOString()}`;
  if (isObjectId(value)) return `oid:${value.toHexString()}`;
  if (Array.isArray(value)) return `[${value.map(canonicalKey).join(',')}]`;
  if (isRecord(value)) {
    return `{${Object.entries(value)
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalKey(item)}`)
      .join(',')}}`;
  }
  return `${typeof value}:${String(value)}`;
}

export const isNumeric = (value: unknown): value is number => typeof value === 'number' && !Number.isNaN(value);
