import { isPlainObject, isRecord } from '@eduhub/shared/utils/typeGuards';
import { UnsupportedOperatorError } from '../errors';
import type { Document, Filter } from '../types';
import { collectPathValues, compareValues, sameTypeBracket, valuesEqual } from './values';

export interface QueryContext {
  /** Fields covered by the collection's text index */
  textFields: readonly string[];
}

const NO_TEXT_INDEX: QueryContext = { textFields: [] };

/**
 * Evaluates a filter against one document.
 */
export function matchesFilter(doc: Document, filter: Filter, ctx: QueryContext = NO_TEXT_INDEX): boolean {
  return Object.entries(filter).every(([key, condition]) => {
    switch (key) {
      case '$and':
        return filterList(key, condition).every((sub) => matchesFilter(doc, sub, ctx));
      case '$or':
        return filterList(key, condition).some((sub) => matchesFilter(doc, sub, ctx));
      case '$nor':
        return !filterList(key, condition).some((sub) => matchesFilter(doc, sub, ctx));
      case '$text':
        return matchesText(doc, condition, ctx);
      default:
        if (key.startsWith('$')) {
          throw new UnsupportedOperatorError(key);
        }
        return matchesCondition(collectPathValues(doc, key), condition);
    }
  });
}

/** Operators the filter evaluator understands, at any depth. */
export const FILTER_OPERATORS: ReadonlySet<string> = new Set([
  '$and',
  '$or',
  '$nor',
  '$text',
  '$search',
  '$eq',
  '$ne',
  '$gt',
  '$gte',
  '$lt',
  '$lte',
  '$in',
  '$nin',
  '$exists',
  '$size',
  '$regex',
  '$options',
]);

/**
 * Every `$`-prefixed key in the filter that the evaluator does not support.
 */
export function unsupportedOperators(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.flatMap(unsupportedOperators);
  }
  if (!isPlainObject(value)) {
    return [];
  }
  return Object.entries(value).flatMap(([key, nested]) => [
    ...(key.startsWith('$') && !FILTER_OPERATORS.has(key) ? [key] : []),
    ...unsupportedOperators(nested),
  ]);
}

function filterList(operator: string, operand: unknown): Filter[] {
  if (!Array.isArray(operand) || operand.length === 0) {
    throw new UnsupportedOperatorError(operator, 'expects a non-empty array');
  }
  return operand.map((item) => {
    if (!isRecord(item)) {
      throw new UnsupportedOperatorError(operator, 'array entries must be objects');
    }
    return item;
  });
}

const isOperatorObject = (value: unknown): value is Record<string, unknown> =>
  isPlainObject(value) && Object.keys(value).length > 0 && Object.keys(value).every((key) => key.startsWith('$'));

/** Candidate values plus the elements of any array among them */
const expand = (values: unknown[]): unknown[] =>
  values.flatMap((value) => (Array.isArray(value) ? [value, ...value] : [value]));

function equalsAny(values: unknown[], operand: unknown): boolean {
  return expand(values).some((value) => valuesEqual(value, operand));
}

function regexMatchesAny(values: unknown[], pattern: RegExp): boolean {
  return expand(values).some((value) => typeof value === 'string' && pattern.test(value));
}

function matchesCondition(values: unknown[], condition: unknown): boolean {
  if (condition instanceof RegExp) {
    return regexMatchesAny(values, condition);
  }
  if (isOperatorObject(condition)) {
    return Object.entries(condition).every(([operator, operand]) =>
      applyOperator(values, operator, operand, condition)
    );
  }
  return equalsAny(values, condition);
}

function compareAny(values: unknown[], operand: unknown, accept: (cmp: number) => boolean): boolean {
  return expand(values).some(
    (value) => value !== undefined && sameTypeBracket(value, operand) && accept(compareValues(value, operand))
  );
}

function toRegExp(pattern: unknown, options: unknown): RegExp {
  if (pattern instanceof RegExp) {
    return typeof options === 'string' ? new RegExp(pattern.source, options) : pattern;
  }
  if (typeof pattern !== 'string') {
    throw new UnsupportedOperatorError('$regex', 'pattern must be a string or RegExp');
  }
  return new RegExp(pattern, typeof options === 'string' ? options : '');
}

function inList(operator: string, operand: unknown): unknown[] {
  if (!Array.isArray(operand)) {
    throw new UnsupportedOperatorError(operator, 'expects an array');
  }
  return operand;
}

function applyOperator(
  values: unknown[],
  operator: string,
  operand: unknown,
  siblings: Record<string, unknown>
): boolean {
  switch (operator) {
    case '$eq':
      return equalsAny(values, operand);
    case '$ne':
      return !equalsAny(values, operand);
    case '$gt':
      return compareAny(values, operand, (cmp) => cmp > 0);
    case '$gte':
      return compareAny(values, operand, (cmp) => cmp >= 0);
    case '$lt':
      return compareAny(values, operand, (cmp) => cmp < 0);
    case '$lte':
      return compareAny(values, operand, (cmp) => cmp <= 0);
    case '$in':
      return inList(operator, operand).some((item) =>
        item instanceof RegExp ? regexMatchesAny(values, item) : equalsAny(values, item)
      );
    case '$nin':
      return !inList(operator, operand).some((item) =>
        item instanceof RegExp ? regexMatchesAny(values, item) : equalsAny(values, item)
      );
    case '$exists':
      return values.some((value) => value !== undefined) === Boolean(operand);
    case '$size':
      return values.some((value) => Array.isArray(value) && value.length === operand);
    case '$regex':
      return regexMatchesAny(values, toRegExp(operand, siblings.$options));
    case '$options':
      // consumed by $regex
      return true;
    default:
      throw new UnsupportedOperatorError(operator);
  }
}

const stem = (word: string): string => (word.length > 3 && word.endsWith('s') ? word.slice(0, -1) : word);

const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean)
    .map(stem);

/**
 * `$text: { $search }` over the text-indexed fields: any positive term matches,
 * a `-term` excludes.
 */
function matchesText(doc: Document, condition: unknown, ctx: QueryContext): boolean {
  if (ctx.textFields.length === 0) {
    throw new UnsupportedOperatorError('$text', 'text index required for $text query');
  }
  if (!isRecord(condition) || typeof condition.$search !== 'string') {
    throw new UnsupportedOperatorError('$text', '$search must be a string');
  }

  const words = new Set(
    ctx.textFields.flatMap((field) =>
      collectPathValues(doc, field).flatMap((value) => (typeof value === 'string' ? tokenize(value) : []))
    )
  );

  const rawTerms = condition.$search.split(/\s+/).filter(Boolean);
  const excluded = rawTerms.filter((term) => term.startsWith('-')).flatMap((term) => tokenize(term.slice(1)));
  const included = rawTerms.filter((term) => !term.startsWith('-')).flatMap(tokenize);

  if (excluded.some((term) => words.has(term))) {
    return false;
  }
  return included.some((term) => words.has(term));
}
