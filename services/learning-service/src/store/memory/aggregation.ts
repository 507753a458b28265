import { isPlainObject } from '@eduhub/shared/utils/typeGuards';
import { UnsupportedOperatorError } from '../errors';
import type { Document, GroupStage, LookupStage, PipelineStage, SortSpec, UnwindStage } from '../types';
import { evaluateExpression } from './expressions';
import { matchesFilter, type QueryContext } from './query';
import {
  canonicalKey,
  cloneDocument,
  collectPathValues,
  compareValues,
  getPath,
  isNumeric,
  setPath,
  valuesEqual,
} from './values';

/** Resolves a `$lookup` target; undefined when the collection does not exist */
export type CollectionResolver = (name: string) => Document[] | undefined;

/**
 * Stable multi-key sort in the document database's cross-type order.
 */
export function sortDocuments(documents: Document[], spec: SortSpec): Document[] {
  const keys = Object.entries(spec);
  return documents
    .map((doc, index) => ({ doc, index }))
    .sort((a, b) => {
      for (const [path, direction] of keys) {
        const cmp = compareValues(getPath(a.doc, path), getPath(b.doc, path));
        if (cmp !== 0) {
          return cmp * direction;
        }
      }
      return a.index - b.index;
    })
    .map(({ doc }) => doc);
}

/**
 * Applies an inclusion or exclusion projection, with computed fields on inclusion.
 */
export function projectDocument(doc: Document, spec: Record<string, unknown>): Document {
  const entries = Object.entries(spec);
  const isExclusion = entries.every(([, value]) => value === 0 || value === false);

  if (isExclusion) {
    const result = cloneDocument(doc);
    for (const [path] of entries) {
      const parts = path.split('.');
      const last = parts.pop();
      const parent = parts.length === 0 ? result : getPath(result, parts.join('.'));
      if (last !== undefined && isPlainObject(parent)) {
        delete parent[last];
      }
    }
    return result;
  }

  const result: Document = {};
  const excludeId = entries.some(([path, value]) => path === '_id' && (value === 0 || value === false));
  if (!excludeId && doc._id !== undefined) {
    result._id = doc._id;
  }

  for (const [path, value] of entries) {
    if (value === 0 || value === false) {
      continue;
    }
    if (value === 1 || value === true) {
      const included = getPath(doc, path);
      if (included !== undefined) {
        setPath(result, path, included);
      }
    } else {
      setPath(result, path, evaluateExpression(value, doc));
    }
  }
  return result;
}

/**
 * In-memory aggregation pipeline executor.
 */
export class AggregationExecutor {
  constructor(
    private readonly resolveCollection: CollectionResolver,
    private readonly queryContext: QueryContext = { textFields: [] }
  ) {}

  execute(pipeline: PipelineStage[], documents: Document[]): Document[] {
    return pipeline.reduce<Document[]>((current, stage) => this.executeStage(stage, current), documents);
  }

  private executeStage(stage: PipelineStage, documents: Document[]): Document[] {
    if ('$match' in stage) {
      return documents.filter((doc) => matchesFilter(doc, stage.$match, this.queryContext));
    }
    if ('$lookup' in stage) {
      return this.executeLookup(stage, documents);
    }
    if ('$unwind' in stage) {
      return this.executeUnwind(stage, documents);
    }
    if ('$group' in stage) {
      return this.executeGroup(stage, documents);
    }
    if ('$addFields' in stage) {
      return this.executeAddFields(stage.$addFields, documents);
    }
    if ('$set' in stage) {
      return this.executeAddFields(stage.$set, documents);
    }
    if ('$project' in stage) {
      return documents.map((doc) => projectDocument(doc, stage.$project));
    }
    if ('$sort' in stage) {
      return sortDocuments(documents, stage.$sort);
    }
    if ('$limit' in stage) {
      return documents.slice(0, stage.$limit);
    }
    if ('$skip' in stage) {
      return documents.slice(stage.$skip);
    }
    if ('$count' in stage) {
      return documents.length === 0 ? [] : [{ [stage.$count]: documents.length }];
    }
    throw new UnsupportedOperatorError(Object.keys(stage).join(', ') || 'empty stage');
  }

  /**
   * Left outer join. Foreign documents are matched by equality of the foreign
   * field against the local value, or any element of it when it is an array.
   * A missing local field matches foreign documents whose field is missing or null.
   */
  private executeLookup(stage: LookupStage, documents: Document[]): Document[] {
    const { from, localField, foreignField, as } = stage.$lookup;
    const foreign = this.resolveCollection(from) ?? [];

    return documents.map((doc) => {
      const local = getPath(doc, localField);
      const localValues = Array.isArray(local) ? local : [local];
      const matches = foreign.filter((candidate) =>
        collectPathValues(candidate, foreignField).some((foreignValue) => {
          const candidates = Array.isArray(foreignValue) ? foreignValue : [foreignValue];
          return candidates.some((value) => localValues.some((localValue) => valuesEqual(value, localValue)));
        })
      );
      const joined = cloneDocument(doc);
      setPath(joined, as, matches.map(cloneDocument));
      return joined;
    });
  }

  private executeUnwind(stage: UnwindStage, documents: Document[]): Document[] {
    const options = typeof stage.$unwind === 'string' ? { path: stage.$unwind } : stage.$unwind;
    const preserve = options.preserveNullAndEmptyArrays === true;
    if (!options.path.startsWith('$')) {
      throw new UnsupportedOperatorError('$unwind', 'path must start with $');
    }
    const path = options.path.slice(1);

    return documents.flatMap((doc) => {
      const value = getPath(doc, path);
      if (Array.isArray(value)) {
        if (value.length === 0) {
          return preserve ? [cloneWithout(doc, path)] : [];
        }
        return value.map((item) => {
          const copy = cloneDocument(doc);
          setPath(copy, path, item);
          return copy;
        });
      }
      if (value === undefined || value === null) {
        return preserve ? [cloneDocument(doc)] : [];
      }
      // A scalar is treated as a single-element array
      return [cloneDocument(doc)];
    });
  }

  private executeGroup(stage: GroupStage, documents: Document[]): Document[] {
    const { _id: keyExpression, ...accumulators } = stage.$group;
    const groups = new Map<string, { key: unknown; docs: Document[] }>();

    for (const doc of documents) {
      const key = evaluateExpression(keyExpression, doc) ?? null;
      const id = canonicalKey(key);
      const bucket = groups.get(id);
      if (bucket) {
        bucket.docs.push(doc);
      } else {
        groups.set(id, { key, docs: [doc] });
      }
    }

    return [...groups.values()].map(({ key, docs }) => {
      const result: Document = { _id: key };
      for (const [field, spec] of Object.entries(accumulators)) {
        result[field] = this.accumulate(field, spec, docs);
      }
      return result;
    });
  }

  private accumulate(field: string, spec: unknown, docs: Document[]): unknown {
    if (!isPlainObject(spec) || Object.keys(spec).length !== 1) {
      throw new UnsupportedOperatorError('$group', `field '${field}' must specify one accumulator`);
    }
    const [[operator, expression]] = Object.entries(spec);
    const values = docs.map((doc) => evaluateExpression(expression, doc));

    switch (operator) {
      case '$sum':
        // Non-numeric values are ignored
        return values.filter(isNumeric).reduce((sum, value) => sum + value, 0);
      case '$avg': {
        const numbers = values.filter(isNumeric);
        return numbers.length === 0 ? null : numbers.reduce((sum, value) => sum + value, 0) / numbers.length;
      }
      case '$first':
        return values.length > 0 ? values[0] ?? null : null;
      case '$last':
        return values.length > 0 ? values[values.length - 1] ?? null : null;
      case '$min':
      case '$max': {
        const present = values.filter((value) => value !== undefined && value !== null);
        if (present.length === 0) {
          return null;
        }
        const direction = operator === '$min' ? -1 : 1;
        return present.reduce((best, value) => (compareValues(value, best) * direction > 0 ? value : best));
      }
      case '$push':
        return values.filter((value) => value !== undefined);
      case '$addToSet': {
        const seen = new Map<string, unknown>();
        for (const value of values) {
          if (value !== undefined && !seen.has(canonicalKey(value))) {
            seen.set(canonicalKey(value), value);
          }
        }
        return [...seen.values()];
      }
      default:
        throw new UnsupportedOperatorError(operator);
    }
  }

  private executeAddFields(fields: Record<string, unknown>, documents: Document[]): Document[] {
    return documents.map((doc) => {
      const result = cloneDocument(doc);
      for (const [path, expression] of Object.entries(fields)) {
        setPath(result, path, evaluateExpression(expression, doc));
      }
      return result;
    });
  }
}

function cloneWithout(doc: Document, path: string): Document {
  const copy = cloneDocument(doc);
  const parts = path.split('.');
  const last = parts.pop();
  const parent = parts.length === 0 ? copy : getPath(copy, parts.join('.'));
  if (last !== undefined && isPlainObject(parent)) {
    delete parent[last];
  }
  return copy;
}
