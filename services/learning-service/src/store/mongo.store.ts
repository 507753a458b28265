import mongoose, { mongo } from 'mongoose';
import { logDatabaseOperation } from '@eduhub/shared/config/logger';
import { disconnectMongo } from '@eduhub/shared/databases/mongo/connection';
import { isRecord } from '@eduhub/shared/utils/typeGuards';
import { COLLECTION_NAMES, validateEntity, type CollectionName } from '../schemas/entity.schemas';
import { collectionDefinitions, indexSpecsOf } from '../models';
import { DuplicateKeyError, SchemaValidationError } from './errors';
import { applyUpdate } from './memory/update';
import type {
  CollectionStats,
  DatabaseInfo,
  Document,
  DocumentStore,
  ExplainSummary,
  Filter,
  FindOptions,
  Pipeline,
  UpdateResult,
  UpdateSpec,
} from './types';

const toMongo = (value: Record<string, unknown>): mongo.Document => value;

const numberAt = (source: unknown, key: string): number => {
  if (!isRecord(source)) return 0;
  const value = source[key];
  return typeof value === 'number' ? value : 0;
};

/**
 * Leaf of the winning plan (IXSCAN / COLLSCAN / TEXT_MATCH ...).
 * Newer servers nest the classic plan under `queryPlan`.
 */
function leafStage(plan: unknown): { stage: string; indexName: string | null } {
  let current: unknown = isRecord(plan) && isRecord(plan.queryPlan) ? plan.queryPlan : plan;
  while (isRecord(current) && isRecord(current.inputStage)) {
    current = current.inputStage;
  }
  if (!isRecord(current)) {
    return { stage: 'UNKNOWN', indexName: null };
  }
  return {
    stage: typeof current.stage === 'string' ? current.stage : 'UNKNOWN',
    indexName: typeof current.indexName === 'string' ? current.indexName : null,
  };
}

/**
 * Document store backed by the MongoDB collections of the mongoose models.
 */
export class MongoDocumentStore implements DocumentStore {
  constructor(private readonly connection: typeof mongoose = mongoose) {}

  get name(): string {
    return this.connection.connection.name;
  }

  private db(): mongo.Db {
    const { db } = this.connection.connection;
    if (!db) {
      throw new Error('MongoDB not initialized. Call initMongo() first.');
    }
    return db;
  }

  private collection(name: CollectionName): mongo.Collection {
    return collectionDefinitions[name].model.collection;
  }

  /**
   * Creates each collection with its server-side validator and syncs the
   * index declarations of its schema.
   */
  async ensureCollections(): Promise<void> {
    for (const name of COLLECTION_NAMES) {
      const definition = collectionDefinitions[name];
      await definition.model.createCollection(definition.validator ? { validator: definition.validator } : {});
      await definition.model.syncIndexes();
      logDatabaseOperation('ensureCollection', name, { indexes: indexSpecsOf(name).length });
    }
  }

  async listCollections(): Promise<string[]> {
    const collections = await this.db().listCollections({}, { nameOnly: true }).toArray();
    return collections.map((info) => info.name).sort();
  }

  async find(collection: CollectionName, filter: Filter = {}, options: FindOptions = {}): Promise<Document[]> {
    const cursor = this.collection(collection).find(toMongo(filter));
    if (options.sort) cursor.sort(options.sort);
    if (options.skip) cursor.skip(options.skip);
    if (options.limit) cursor.limit(options.limit);
    if (options.projection) cursor.project(options.projection);
    return cursor.toArray();
  }

  async findOne(collection: CollectionName, filter: Filter, options: FindOptions = {}): Promise<Document | null> {
    const [first] = await this.find(collection, filter, { ...options, limit: 1 });
    return first ?? null;
  }

  async insertOne(collection: CollectionName, doc: Document): Promise<string> {
    this.assertValid(collection, doc);
    try {
      const result = await this.collection(collection).insertOne(toMongo({ ...doc }));
      logDatabaseOperation('insertOne', collection);
      return String(result.insertedId);
    } catch (error) {
      throw this.translateError(collection, error);
    }
  }

  async insertMany(collection: CollectionName, docs: Document[]): Promise<string[]> {
    if (docs.length === 0) {
      return [];
    }
    docs.forEach((doc) => this.assertValid(collection, doc));
    try {
      const result = await this.collection(collection).insertMany(docs.map((doc) => toMongo({ ...doc })));
      logDatabaseOperation('insertMany', collection, { inserted: result.insertedCount });
      return Object.values(result.insertedIds).map((id) => String(id));
    } catch (error) {
      throw this.translateError(collection, error);
    }
  }

  /**
   * The matched document is updated in memory and validated first, so only
   * users and courses rely on their server-side validators.
   */
  async updateOne(collection: CollectionName, filter: Filter, update: UpdateSpec): Promise<UpdateResult> {
    const current = await this.findOne(collection, filter);
    if (!current) {
      return { matchedCount: 0, modifiedCount: 0 };
    }
    this.assertValid(collection, applyUpdate(current, update));
    try {
      const result = await this.collection(collection).updateOne(toMongo({ _id: current._id }), toMongo(update));
      logDatabaseOperation('updateOne', collection, { modified: result.modifiedCount });
      return { matchedCount: result.matchedCount, modifiedCount: result.modifiedCount };
    } catch (error) {
      throw this.translateError(collection, error);
    }
  }

  async deleteOne(collection: CollectionName, filter: Filter): Promise<number> {
    const result = await this.collection(collection).deleteOne(toMongo(filter));
    logDatabaseOperation('deleteOne', collection);
    return result.deletedCount;
  }

  async deleteMany(collection: CollectionName, filter: Filter = {}): Promise<number> {
    const result = await this.collection(collection).deleteMany(toMongo(filter));
    logDatabaseOperation('deleteMany', collection, { deleted: result.deletedCount });
    return result.deletedCount;
  }

  async countDocuments(collection: CollectionName, filter: Filter = {}): Promise<number> {
    return this.collection(collection).countDocuments(toMongo(filter));
  }

  async aggregate(collection: CollectionName, pipeline: Pipeline): Promise<Document[]> {
    const stages: mongo.Document[] = pipeline.map((stage) => ({ ...stage }));
    return this.collection(collection).aggregate(stages).toArray();
  }

  async explain(collection: CollectionName, filter: Filter): Promise<ExplainSummary> {
    const plan = await this.collection(collection).find(toMongo(filter)).explain('executionStats');
    const executionStats = plan.executionStats;
    const queryPlanner: unknown = plan.queryPlanner;
    const { stage, indexName } = leafStage(isRecord(queryPlanner) ? queryPlanner.winningPlan : undefined);

    return {
      collection,
      stage,
      indexName,
      totalDocsExamined: numberAt(executionStats, 'totalDocsExamined'),
      totalKeysExamined: numberAt(executionStats, 'totalKeysExamined'),
      nReturned: numberAt(executionStats, 'nReturned'),
      executionTimeMillis: numberAt(executionStats, 'executionTimeMillis'),
    };
  }

  async stats(collection: CollectionName): Promise<CollectionStats> {
    const [result] = await this.collection(collection)
      .aggregate([{ $collStats: { storageStats: {} } }])
      .toArray();
    const storage = isRecord(result) ? result.storageStats : undefined;
    return {
      collection,
      count: numberAt(storage, 'count'),
      size: numberAt(storage, 'size'),
      avgObjSize: numberAt(storage, 'avgObjSize'),
      nindexes: numberAt(storage, 'nindexes'),
    };
  }

  async databaseInfo(): Promise<DatabaseInfo> {
    const names = await this.listCollections();
    const collections: DatabaseInfo['collections'] = [];
    for (const name of names) {
      collections.push({ name, count: await this.db().collection(name).countDocuments() });
    }
    return { name: this.db().databaseName, collections };
  }

  async close(): Promise<void> {
    await disconnectMongo();
  }

  private assertValid(collection: CollectionName, doc: Document): void {
    const messages = validateEntity(collection, doc);
    if (messages.length > 0) {
      throw new SchemaValidationError(collection, messages);
    }
  }

  /**
   * Maps E11000 to DuplicateKeyError. Bulk errors may only name the index,
   * so the key fields are recovered from the schema's index declarations.
   */
  private translateError(collection: CollectionName, error: unknown): unknown {
    if (!(error instanceof mongo.MongoServerError) || error.code !== 11000) {
      return error;
    }
    const keyPattern: unknown = error.keyPattern;
    const keyValue: unknown = error.keyValue;
    if (isRecord(keyPattern)) {
      return new DuplicateKeyError(collection, Object.keys(keyPattern), isRecord(keyValue) ? keyValue : {});
    }
    const indexName = /index: (\S+)/.exec(error.message)?.[1];
    const spec = indexSpecsOf(collection).find((candidate) => candidate.name === indexName);
    return new DuplicateKeyError(collection, spec ? Object.keys(spec.fields) : []);
  }
}
