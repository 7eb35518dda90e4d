/**
 * PostgreSQL backend using postgres-js.
 *
 * Uniqueness, references and cascades are enforced by the schema; the store
 * only rewrites constraint errors so they read like the other engines.
 */
import { MissingReferenceError } from "../../core/exceptions.js";
import type { Logger } from "../../core/types.js";
import { GroupedRowSchema, type GroupedRow } from "../../models/queries.js";
import type { FieldValues, StoredRecord } from "../../models/schemas.js";
import { BackendKind } from "../backend.js";
import {
  LABELS,
  REFERENCES,
  type EntityKind,
  type RecordKind,
} from "../registry.js";
import {
  StoreBackend,
  type CollectionQuery,
  type RecordStore,
} from "../store-backend.js";
import {
  createPostgresPool,
  type SqlExecutor,
  type SqlPool,
  type SqlPoolFactory,
  type SqlRow,
} from "./pool.js";
import { SCHEMA_SQL } from "./schema.js";
import {
  avgScorePerClassStatement,
  deleteStatement,
  findStatement,
  groupStatement,
  insertStatement,
  selectByIdStatement,
  studentsPerClassStatement,
  subjectsPerClassStatement,
  teachersPerClassStatement,
  updateStatement,
  type Statement,
} from "./statements.js";
import { TABLES, fromRow, isUuid, translateError } from "./tables.js";

export interface PostgresBackendOptions {
  connectionString: string;
  maxConnections: number;
  logger?: Logger;
  /** Replaces the postgres-js binding; used by tests. */
  poolFactory?: SqlPoolFactory;
}

export class PostgresBackend extends StoreBackend {
  readonly kind = BackendKind.PostgreSQL;
  private connectionString: string;
  private maxConnections: number;
  private poolFactory: SqlPoolFactory;
  private pool: SqlPool | null = null;

  constructor(options: PostgresBackendOptions) {
    super(options.logger);
    this.connectionString = options.connectionString;
    this.maxConnections = options.maxConnections;
    this.poolFactory = options.poolFactory ?? createPostgresPool;
  }

  protected async open(): Promise<void> {
    this.pool = this.poolFactory(this.connectionString, this.maxConnections);
    await this.pool.executeScript(SCHEMA_SQL);
    this.logger.info("PostgreSQL schema ensured");
  }

  protected async close(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    if (pool) await pool.close();
  }

  private connection(): SqlPool {
    if (!this.pool) throw new Error("PostgreSQL pool is not open");
    return this.pool;
  }

  protected records(): PostgresRecordStore {
    return new PostgresRecordStore(this.connection());
  }

  /** Bulk calls run item by item on one reserved connection. */
  protected withBulkStore<T>(fn: (store: RecordStore) => Promise<T>): Promise<T> {
    return this.connection().withConnection((conn) => fn(new PostgresRecordStore(conn)));
  }

  private run(statement: Statement): Promise<SqlRow[]> {
    return this.connection().query(statement.text, statement.params);
  }

  // ------------------------------------------------------------------
  // Queries
  // ------------------------------------------------------------------

  protected async findRecords(
    kind: RecordKind,
    query: CollectionQuery,
  ): Promise<FieldValues[]> {
    const table = TABLES[kind];
    const rows = await this.run(findStatement(table, query));
    return rows.map((row) => fromRow(table, row));
  }

  protected async groupRecords(
    kind: RecordKind,
    groupBy: string[],
    query: CollectionQuery,
  ): Promise<GroupedRow[]> {
    const rows = await this.run(groupStatement(TABLES[kind], groupBy, query));
    return rows.map((row) => {
      const group: Record<string, unknown> = {};
      for (const field of groupBy) group[field] = row[field];
      return GroupedRowSchema.parse({ group, count: row.count });
    });
  }

  protected studentsPerClass(classId?: string): Promise<unknown[]> {
    return this.aggregate(classId, studentsPerClassStatement);
  }

  protected avgScorePerClass(classId?: string): Promise<unknown[]> {
    return this.aggregate(classId, avgScorePerClassStatement);
  }

  protected teachersPerClass(classId?: string): Promise<unknown[]> {
    return this.aggregate(classId, teachersPerClassStatement);
  }

  protected subjectsPerClass(classId?: string): Promise<unknown[]> {
    return this.aggregate(classId, subjectsPerClassStatement);
  }

  private async aggregate(
    classId: string | undefined,
    build: (classId?: string) => Statement,
  ): Promise<unknown[]> {
    // A class id that is not a UUID cannot match anything.
    if (classId !== undefined && !isUuid(classId)) return [];
    return this.run(build(classId));
  }
}

// ---------------------------------------------------------------------------
// Record store
// ---------------------------------------------------------------------------

export class PostgresRecordStore implements RecordStore {
  private executor: SqlExecutor;

  constructor(executor: SqlExecutor) {
    this.executor = executor;
  }

  private async run(kind: RecordKind, statement: Statement): Promise<SqlRow[]> {
    try {
      return await this.executor.query(statement.text, statement.params);
    } catch (err) {
      throw translateError(TABLES[kind], err);
    }
  }

  async insert(kind: RecordKind, record: StoredRecord): Promise<FieldValues> {
    for (const rule of REFERENCES[kind]) {
      const value = record[rule.field];
      if (typeof value === "string" && !isUuid(value)) {
        throw new MissingReferenceError(LABELS[rule.target].toLowerCase(), value);
      }
    }
    const table = TABLES[kind];
    const rows = await this.run(kind, insertStatement(table, record));
    return rows.length > 0 ? fromRow(table, rows[0]) : record;
  }

  async find(kind: RecordKind, id: string): Promise<FieldValues | null> {
    if (!isUuid(id)) return null;
    const table = TABLES[kind];
    const rows = await this.run(kind, selectByIdStatement(table, id));
    return rows.length > 0 ? fromRow(table, rows[0]) : null;
  }

  async update(
    kind: EntityKind,
    id: string,
    patch: FieldValues,
    updatedAt: Date,
  ): Promise<FieldValues | null> {
    if (!isUuid(id)) return null;
    const table = TABLES[kind];
    const rows = await this.run(kind, updateStatement(table, id, patch, updatedAt));
    return rows.length > 0 ? fromRow(table, rows[0]) : null;
  }

  async remove(kind: EntityKind, id: string): Promise<boolean> {
    if (!isUuid(id)) return false;
    const rows = await this.run(kind, deleteStatement(TABLES[kind], id));
    return rows.length > 0;
  }
}
