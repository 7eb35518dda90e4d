/**
 * MongoDB backend over a mongoose connection.
 *
 * One collection per record kind, with the record id doubling as `_id`.
 * Uniqueness is backed by unique indexes created on connect and checked
 * up front so violations read the same as on the other engines.
 */
import type { Logger } from "../../core/types.js";
import { GroupedRowSchema, type GroupedRow } from "../../models/queries.js";
import type { FieldValues, StoredRecord } from "../../models/schemas.js";
import { BackendKind } from "../backend.js";
import {
  assertReferences,
  assertUnique,
  mergePatch,
  type MatchCounter,
} from "../integrity.js";
import {
  COLLECTIONS,
  RECORD_KINDS,
  REFERENCES,
  UNIQUE_CONSTRAINTS,
  dependentsOf,
  type EntityKind,
  type RecordKind,
  type ScalarMatch,
} from "../registry.js";
import {
  StoreBackend,
  type CollectionQuery,
  type RecordStore,
} from "../store-backend.js";
import {
  connectMongo,
  type Document,
  type DocumentCollection,
  type DocumentConnector,
  type DocumentDatabase,
  type Filter,
} from "./driver.js";
import {
  avgScorePerClassPipeline,
  findPipeline,
  groupPipeline,
  studentsPerClassPipeline,
  subjectsPerClassPipeline,
  teachersPerClassPipeline,
} from "./pipelines.js";

export interface MongoBackendOptions {
  connectionString: string;
  databaseName: string;
  logger?: Logger;
  /** Replaces the driver binding; used by tests. */
  connector?: DocumentConnector;
}

export class MongoBackend extends StoreBackend {
  readonly kind = BackendKind.MongoDB;
  private connectionString: string;
  private databaseName: string;
  private connector: DocumentConnector;
  private db: DocumentDatabase | null = null;

  constructor(options: MongoBackendOptions) {
    super(options.logger);
    this.connectionString = options.connectionString;
    this.databaseName = options.databaseName;
    this.connector = options.connector ?? connectMongo;
  }

  protected async open(): Promise<void> {
    this.db = await this.connector(this.connectionString, this.databaseName);
    await this.createIndexes(this.db);
  }

  protected async close(): Promise<void> {
    const db = this.db;
    this.db = null;
    if (db) await db.close();
  }

  protected records(): MongoRecordStore {
    if (!this.db) throw new Error("MongoDB database handle is not open");
    return new MongoRecordStore(this.db);
  }

  private async createIndexes(db: DocumentDatabase): Promise<void> {
    for (const kind of RECORD_KINDS) {
      const coll = db.collection(COLLECTIONS[kind]);
      for (const constraint of UNIQUE_CONSTRAINTS[kind]) {
        const keys: Record<string, 1> = {};
        const partial: Document = {};
        for (const field of constraint.fields) {
          keys[field] = 1;
          partial[field] = { $type: "string" };
        }
        if (constraint.activeOnly) partial.isActive = true;
        await coll.createIndex(keys, {
          name: constraint.name,
          unique: true,
          partialFilterExpression: partial,
        });
      }
      for (const rule of REFERENCES[kind]) {
        await coll.createIndex(
          { [rule.field]: 1 },
          { name: `${COLLECTIONS[kind]}_${rule.field}_idx` },
        );
      }
    }
    this.logger.info(`MongoDB indexes ensured on ${this.databaseName}`);
  }

  // ------------------------------------------------------------------
  // Queries
  // ------------------------------------------------------------------

  protected async findRecords(
    kind: RecordKind,
    query: CollectionQuery,
  ): Promise<FieldValues[]> {
    return this.records().collection(kind).aggregate(findPipeline(query));
  }

  protected async groupRecords(
    kind: RecordKind,
    groupBy: string[],
    query: CollectionQuery,
  ): Promise<GroupedRow[]> {
    const rows = await this.records()
      .collection(kind)
      .aggregate(groupPipeline(groupBy, query));
    return rows.map((row) => GroupedRowSchema.parse(row));
  }

  protected studentsPerClass(classId?: string): Promise<Document[]> {
    return this.records()
      .collection("classEnrollment")
      .aggregate(studentsPerClassPipeline(classId));
  }

  protected avgScorePerClass(classId?: string): Promise<Document[]> {
    return this.records()
      .collection("score")
      .aggregate(avgScorePerClassPipeline(classId));
  }

  protected teachersPerClass(classId?: string): Promise<Document[]> {
    return this.records()
      .collection("teacherAssignment")
      .aggregate(teachersPerClassPipeline(classId));
  }

  protected subjectsPerClass(classId?: string): Promise<Document[]> {
    return this.records()
      .collection("teacherAssignment")
      .aggregate(subjectsPerClassPipeline(classId));
  }
}

// ---------------------------------------------------------------------------
// Record store
// ---------------------------------------------------------------------------

export class MongoRecordStore implements RecordStore, MatchCounter {
  private db: DocumentDatabase;

  constructor(db: DocumentDatabase) {
    this.db = db;
  }

  collection(kind: RecordKind): DocumentCollection {
    return this.db.collection(COLLECTIONS[kind]);
  }

  async count(
    kind: RecordKind,
    match: ScalarMatch,
    excludeId?: string,
  ): Promise<number> {
    const filter: Filter<Document> = { ...match };
    if (excludeId !== undefined) filter._id = { $ne: excludeId };
    return this.collection(kind).countDocuments(filter);
  }

  async insert(kind: RecordKind, record: StoredRecord): Promise<FieldValues> {
    await assertReferences(this, kind, record);
    await assertUnique(this, kind, record);
    await this.collection(kind).insertOne({ _id: record.id, ...record });
    return record;
  }

  async find(kind: RecordKind, id: string): Promise<FieldValues | null> {
    const doc = await this.collection(kind).findOne({ _id: id });
    return doc ? withoutObjectId(doc) : null;
  }

  async update(
    kind: EntityKind,
    id: string,
    patch: FieldValues,
    updatedAt: Date,
  ): Promise<FieldValues | null> {
    const current = await this.find(kind, id);
    if (!current) return null;
    const merged = mergePatch(kind, current, patch, updatedAt);
    await assertUnique(this, kind, merged, id);
    const result = await this.collection(kind).replaceOne(
      { _id: id },
      { _id: id, ...merged },
    );
    return result.matchedCount > 0 ? merged : null;
  }

  async remove(kind: EntityKind, id: string): Promise<boolean> {
    const result = await this.collection(kind).deleteOne({ _id: id });
    if (result.deletedCount === 0) return false;

    for (const { kind: dependent, rule } of dependentsOf(kind)) {
      const coll = this.collection(dependent);
      if (rule.onDelete === "cascade") {
        await coll.deleteMany({ [rule.field]: id });
      } else {
        await coll.updateMany(
          { [rule.field]: id },
          { $set: { [rule.field]: null, updatedAt: new Date() } },
        );
      }
    }
    return true;
  }
}

function withoutObjectId(doc: Document): FieldValues {
  const { _id, ...fields } = doc;
  return fields;
}
