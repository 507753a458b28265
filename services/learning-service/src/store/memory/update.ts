import { isPlainObject, isRecord } from '@eduhub/shared/utils/typeGuards';
import { UnsupportedOperatorError } from '../errors';
import type { Document, UpdateSpec } from '../types';
import { cloneDocument, cloneValue, getPath, isNumeric, setPath, unsetPath, valuesEqual } from './values';

function eachOperand(value: unknown): unknown[] {
  if (isPlainObject(value) && Array.isArray(value.$each)) {
    return value.$each;
  }
  return [value];
}

function arrayAt(doc: Document, path: string, operator: string): unknown[] {
  const current = getPath(doc, path);
  if (current === undefined || current === null) {
    return [];
  }
  if (!Array.isArray(current)) {
    throw new UnsupportedOperatorError(operator, `field '${path}' is not an array`);
  }
  return current;
}

/**
 * Returns a new document with the update operators applied.
 */
export function applyUpdate(original: Document, update: UpdateSpec): Document {
  const doc = cloneDocument(original);

  for (const [operator, fields] of Object.entries(update)) {
    if (!isRecord(fields)) {
      throw new UnsupportedOperatorError(operator, 'expects an object of field paths');
    }

    for (const [path, value] of Object.entries(fields)) {
      if (path === '_id' || path.startsWith('_id.')) {
        throw new UnsupportedOperatorError(operator, "the '_id' field is immutable");
      }

      switch (operator) {
        case '$set':
          setPath(doc, path, cloneValue(value));
          break;
        case '$unset':
          unsetPath(doc, path);
          break;
        case '$inc': {
          const current = getPath(doc, path) ?? 0;
          if (!isNumeric(current) || !isNumeric(value)) {
            throw new UnsupportedOperatorError(operator, `cannot increment non-numeric field '${path}'`);
          }
          setPath(doc, path, current + value);
          break;
        }
        case '$push':
          setPath(doc, path, [...arrayAt(doc, path, operator), ...eachOperand(value).map(cloneValue)]);
          break;
        case '$addToSet': {
          const items = [...arrayAt(doc, path, operator)];
          for (const candidate of eachOperand(value)) {
            if (!items.some((item) => valuesEqual(item, candidate))) {
              items.push(cloneValue(candidate));
            }
          }
          setPath(doc, path, items);
          break;
        }
        default:
          throw new UnsupportedOperatorError(operator);
      }
    }
  }

  return doc;
}
