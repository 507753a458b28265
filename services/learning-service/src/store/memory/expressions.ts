import { isPlainObject } from '@eduhub/shared/utils/typeGuards';
import { UnsupportedOperatorError } from '../errors';
import type { Document } from '../types';
import { compareValues, getPath, isNumeric, isObjectId, valuesEqual } from './values';

/**
 * Aggregation expression evaluation: `$field.path` references, literals,
 * object and array construction, and the operators the analytics use.
 */
export function evaluateExpression(expr: unknown, doc: Document): unknown {
  if (typeof expr === 'string') {
    if (expr === '$$ROOT') {
      return doc;
    }
    return expr.startsWith('$') ? getPath(doc, expr.slice(1)) : expr;
  }
  if (Array.isArray(expr)) {
    return expr.map((item) => evaluateExpression(item, doc));
  }
  if (!isPlainObject(expr)) {
    return expr;
  }

  const keys = Object.keys(expr);
  if (keys.length === 1 && keys[0].startsWith('$')) {
    const operator = keys[0];
    return evaluateOperator(operator, expr[operator], doc);
  }

  return Object.fromEntries(keys.map((key): [string, unknown] => [key, evaluateExpression(expr[key], doc)]));
}

const isNullish = (value: unknown): value is null | undefined => value === null || value === undefined;

function argumentList(operator: string, operand: unknown, doc: Document, arity?: number): unknown[] {
  const args = Array.isArray(operand) ? operand : [operand];
  if (arity !== undefined && args.length !== arity) {
    throw new UnsupportedOperatorError(operator, `expects ${arity} argument(s)`);
  }
  return args.map((arg) => evaluateExpression(arg, doc));
}

function toDate(operator: string, value: unknown): Date | null {
  if (isNullish(value)) {
    return null;
  }
  if (value instanceof Date) {
    return value;
  }
  throw new UnsupportedOperatorError(operator, 'argument must be a date');
}

function arithmetic(operator: string, args: unknown[], combine: (values: number[]) => number): number | null {
  if (args.some(isNullish)) {
    return null;
  }
  const numbers = args.map((arg) => {
    if (!isNumeric(arg)) {
      throw new UnsupportedOperatorError(operator, 'only numeric arguments are supported');
    }
    return arg;
  });
  return combine(numbers);
}

const truthy = (value: unknown): boolean => !(value === false || value === 0 || isNullish(value));

function evaluateOperator(operator: string, operand: unknown, doc: Document): unknown {
  switch (operator) {
    case '$literal':
      return operand;

    case '$size': {
      const [value] = argumentList(operator, operand, doc, 1);
      if (!Array.isArray(value)) {
        throw new UnsupportedOperatorError(operator, 'the argument must be an array');
      }
      return value.length;
    }

    case '$concat': {
      const parts = argumentList(operator, operand, doc);
      if (parts.some(isNullish)) {
        return null;
      }
      return parts
        .map((part) => {
          if (typeof part !== 'string') {
            throw new UnsupportedOperatorError(operator, 'only supports strings');
          }
          return part;
        })
        .join('');
    }

    case '$add':
      return arithmetic(operator, argumentList(operator, operand, doc), (values) => values.reduce((sum, v) => sum + v, 0));
    case '$multiply':
      return arithmetic(operator, argumentList(operator, operand, doc), (values) =>
        values.reduce((product, v) => product * v, 1)
      );
    case '$subtract':
      return arithmetic(operator, argumentList(operator, operand, doc, 2), ([a, b]) => a - b);
    case '$divide':
      return arithmetic(operator, argumentList(operator, operand, doc, 2), ([a, b]) => {
        if (b === 0) {
          throw new UnsupportedOperatorError(operator, "can't divide by zero");
        }
        return a / b;
      });

    case '$round': {
      const [value, places = 0] = argumentList(operator, operand, doc);
      if (isNullish(value)) return null;
      if (!isNumeric(value) || !isNumeric(places)) {
        throw new UnsupportedOperatorError(operator, 'only numeric arguments are supported');
      }
      const factor = 10 ** places;
      return Math.round(value * factor) / factor;
    }

    case '$ifNull': {
      const args = argumentList(operator, operand, doc);
      const found = args.find((arg) => !isNullish(arg));
      return found === undefined ? args[args.length - 1] ?? null : found;
    }

    case '$cond': {
      const [condition, whenTrue, whenFalse] = isPlainObject(operand)
        ? [operand.if, operand.then, operand.else]
        : Array.isArray(operand)
          ? operand
          : [];
      return truthy(evaluateExpression(condition, doc))
        ? evaluateExpression(whenTrue, doc)
        : evaluateExpression(whenFalse, doc);
    }

    case '$eq': {
      const [a, b] = argumentList(operator, operand, doc, 2);
      return valuesEqual(a, b);
    }
    case '$ne': {
      const [a, b] = argumentList(operator, operand, doc, 2);
      return !valuesEqual(a, b);
    }
    case '$gt': {
      const [a, b] = argumentList(operator, operand, doc, 2);
      return compareValues(a, b) > 0;
    }
    case '$gte': {
      const [a, b] = argumentList(operator, operand, doc, 2);
      return compareValues(a, b) >= 0;
    }
    case '$lt': {
      const [a, b] = argumentList(operator, operand, doc, 2);
      return compareValues(a, b) < 0;
    }
    case '$lte': {
      const [a, b] = argumentList(operator, operand, doc, 2);
      return compareValues(a, b) <= 0;
    }

    case '$and':
      return argumentList(operator, operand, doc).every(truthy);
    case '$or':
      return argumentList(operator, operand, doc).some(truthy);
    case '$not': {
      const [value] = argumentList(operator, operand, doc, 1);
      return !truthy(value);
    }

    // Date parts are taken in UTC
    case '$year': {
      const date = toDate(operator, evaluateExpression(operand, doc));
      return date ? date.getUTCFullYear() : null;
    }
    case '$month': {
      const date = toDate(operator, evaluateExpression(operand, doc));
      return date ? date.getUTCMonth() + 1 : null;
    }
    case '$dayOfMonth': {
      const date = toDate(operator, evaluateExpression(operand, doc));
      return date ? date.getUTCDate() : null;
    }

    case '$toString': {
      const value = evaluateExpression(operand, doc);
      if (isNullish(value)) return null;
      if (value instanceof Date) return value.toISOString();
      if (isObjectId(value)) return value.toHexString();
      return String(value);
    }

    default:
      throw new UnsupportedOperatorError(operator);
  }
}
