import type { CollectionName } from '../schemas/entity.schemas';

/**
 * A stored record. Values are plain data: primitives, Dates, ObjectIds,
 * arrays and nested objects.
 */
export type Document = Record<string, unknown>;

/** Query filter in the document database's operator syntax */
export type Filter = Record<string, unknown>;

/** Update spec using `$set`, `$unset`, `$inc`, `$push`, `$addToSet` */
export type UpdateSpec = Record<string, unknown>;

export type SortDirection = 1 | -1;
export type SortSpec = Record<string, SortDirection>;

export type Projection = Record<string, 0 | 1 | boolean>;

export interface FindOptions {
  sort?: SortSpec;
  skip?: number;
  limit?: number;
  projection?: Projection;
}

export interface UpdateResult {
  matchedCount: number;
  modifiedCount: number;
}

export interface LookupStage {
  $lookup: { from: string; localField: string; foreignField: string; as: string };
}

export interface UnwindStage {
  $unwind: string | { path: string; preserveNullAndEmptyArrays?: boolean };
}

export interface GroupStage {
  $group: { _id: unknown } & Record<string, unknown>;
}

export type PipelineStage =
  | { $match: Filter }
  | LookupStage
  | UnwindStage
  | GroupStage
  | { $addFields: Record<string, unknown> }
  | { $set: Record<string, unknown> }
  | { $project: Record<string, unknown> }
  | { $sort: SortSpec }
  | { $limit: number }
  | { $skip: number }
  | { $count: string };

export type Pipeline = PipelineStage[];

export interface ExplainSummary {
  collection: CollectionName;
  /** Winning plan's leaf stage, e.g. IXSCAN or COLLSCAN */
  stage: string;
  indexName: string | null;
  totalDocsExamined: number;
  totalKeysExamined: number;
  nReturned: number;
  executionTimeMillis: number;
}

export interface CollectionStats {
  collection: CollectionName;
  count: number;
  size: number;
  avgObjSize: number;
  nindexes: number;
}

export interface DatabaseInfo {
  name: string;
  collections: { name: string; count: number }[];
}

/**
 * Storage collaborator. Implemented by the MongoDB driver store and by the
 * in-process engine used for tests and offline runs.
 */
export interface DocumentStore {
  readonly name: string;
  ensureCollections(): Promise<void>;
  listCollections(): Promise<string[]>;
  find(collection: CollectionName, filter?: Filter, options?: FindOptions): Promise<Document[]>;
  findOne(collection: CollectionName, filter: Filter, options?: FindOptions): Promise<Document | null>;
  /** Returns the generated `_id` as a hex string */
  insertOne(collection: CollectionName, doc: Document): Promise<string>;
  insertMany(collection: CollectionName, docs: Document[]): Promise<string[]>;
  updateOne(collection: CollectionName, filter: Filter, update: UpdateSpec): Promise<UpdateResult>;
  deleteOne(collection: CollectionName, filter: Filter): Promise<number>;
  deleteMany(collection: CollectionName, filter?: Filter): Promise<number>;
  countDocuments(collection: CollectionName, filter?: Filter): Promise<number>;
  aggregate(collection: CollectionName, pipeline: Pipeline): Promise<Document[]>;
  explain(collection: CollectionName, filter: Filter): Promise<ExplainSummary>;
  stats(collection: CollectionName): Promise<CollectionStats>;
  databaseInfo(): Promise<DatabaseInfo>;
  close(): Promise<void>;
}
