/**
 * Narrow view of postgres-js used by `PostgresBackend`.
 *
 * All statements are raw SQL with `$n` placeholders. `PostgresPool` binds the
 * interface to a real pool; tests bind it to an in-memory table set.
 */
import postgres from "postgres";

export type SqlValue = string | number | boolean | Date | null | string[];
export type SqlRow = Record<string, unknown>;

export interface SqlExecutor {
  /** Run one statement and return its rows (empty for statements without RETURNING). */
  query(text: string, params?: SqlValue[]): Promise<SqlRow[]>;
}

export interface SqlPool extends SqlExecutor {
  /** Run a multi-statement script without parameters. */
  executeScript(script: string): Promise<void>;
  /** Hold one connection for the duration of `fn`. */
  withConnection<T>(fn: (conn: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export type SqlPoolFactory = (
  connectionString: string,
  maxConnections: number,
) => SqlPool;

class ClientExecutor implements SqlExecutor {
  protected sql: postgres.Sql;

  constructor(sql: postgres.Sql) {
    this.sql = sql;
  }

  async query(text: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    const rows = await this.sql.unsafe(text, params);
    return [...rows];
  }
}

export class PostgresPool extends ClientExecutor implements SqlPool {
  constructor(connectionString: string, maxConnections: number) {
    super(postgres(connectionString, { max: maxConnections }));
  }

  async executeScript(script: string): Promise<void> {
    await this.sql.unsafe(script);
  }

  async withConnection<T>(fn: (conn: SqlExecutor) => Promise<T>): Promise<T> {
    const reserved = await this.sql.reserve();
    try {
      return await fn(new ClientExecutor(reserved));
    } finally {
      reserved.release();
    }
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }
}

export const createPostgresPool: SqlPoolFactory = (connectionString, maxConnections) =>
  new PostgresPool(connectionString, maxConnections);
