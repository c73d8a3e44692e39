/**
 * Session / unit-of-work management.
 *
 * `run()` is the only way to reach the database after startup: one call, one
 * pooled connection, one transaction. It commits when the callback resolves,
 * rolls back when it throws, and returns the connection on every path.
 */
import {
  BackendConnectionError,
  StorageError,
  TaskOrbitError,
} from "../core/exceptions.js";
import type { BackendKind, TableNames } from "../core/types.js";
import type { Logger } from "../logger.js";
import type { Connection, DatabaseBackend, Row, SqlValue } from "./backend.js";
import type { Dialect } from "./dialect.js";
import { ConnectionPool, DEFAULT_POOL, type PoolOptions } from "./pool.js";

/** What an operation sees of its unit of work. */
export interface Session {
  readonly kind: BackendKind;
  readonly dialect: Dialect;
  /** Quoted physical name of an application table. */
  table(name: keyof TableNames): string;
  /** Current time according to the injected clock. */
  now(): Date;
  execute(sql: string, params?: SqlValue[]): Promise<number>;
  query(sql: string, params?: SqlValue[]): Promise<Row[]>;
  queryOne(sql: string, params?: SqlValue[]): Promise<Row | null>;
}

export interface SessionManagerOptions {
  tables: TableNames;
  logger: Logger;
  /** Log every statement, whatever the logger's own level. */
  echo?: boolean;
  pool?: Partial<PoolOptions>;
  clock?: () => Date;
}

class TransactionSession implements Session {
  readonly kind: BackendKind;
  readonly dialect: Dialect;

  constructor(
    private conn: Connection,
    backend: DatabaseBackend,
    private tables: TableNames,
    private clock: () => Date,
    private echo: Logger | null,
  ) {
    this.kind = backend.kind;
    this.dialect = backend.dialect;
  }

  table(name: keyof TableNames): string {
    return this.dialect.quote(this.tables[name]);
  }

  now(): Date {
    return this.clock();
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    this.echo?.debug({ sql, params: params.length }, "execute");
    return this.conn.execute(sql, params);
  }

  async query(sql: string, params: SqlValue[] = []): Promise<Row[]> {
    this.echo?.debug({ sql, params: params.length }, "query");
    return this.conn.query(sql, params);
  }

  async queryOne(sql: string, params: SqlValue[] = []): Promise<Row | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }
}

export class SessionManager {
  private readonly pool: ConnectionPool;
  private readonly tables: TableNames;
  private readonly log: Logger;
  private readonly echo: boolean;
  private readonly clock: () => Date;

  constructor(
    private backend: DatabaseBackend,
    options: SessionManagerOptions,
  ) {
    const requested = { ...DEFAULT_POOL, ...options.pool };
    this.pool = new ConnectionPool({
      size: Math.min(requested.size, backend.maxConnections),
      acquireTimeoutMs: requested.acquireTimeoutMs,
    });
    this.tables = options.tables;
    this.log = options.logger;
    this.echo = options.echo ?? false;
    this.clock = options.clock ?? (() => new Date());
  }

  get poolSize(): number {
    return this.pool.size;
  }

  /**
   * Run `fn` as one unit of work.
   *
   * @param operation Name used in log lines and `StorageError`.
   */
  async run<T>(operation: string, fn: (session: Session) => Promise<T>): Promise<T> {
    await this.pool.acquire();
    try {
      let conn: Connection;
      try {
        conn = await this.backend.acquire();
      } catch (err) {
        throw this.translate(operation, err);
      }
      try {
        return await this.transaction(operation, conn, fn);
      } finally {
        await this.release(operation, conn);
      }
    } finally {
      this.pool.release();
    }
  }

  private async transaction<T>(
    operation: string,
    conn: Connection,
    fn: (session: Session) => Promise<T>,
  ): Promise<T> {
    const { dialect } = this.backend;
    const session = new TransactionSession(
      conn,
      this.backend,
      this.tables,
      this.clock,
      this.echo ? this.log.child({ operation }, { level: "debug" }) : null,
    );

    try {
      await conn.execute(dialect.begin);
    } catch (err) {
      throw this.translate(operation, err);
    }

    try {
      const result = await fn(session);
      await conn.execute(dialect.commit);
      return result;
    } catch (err) {
      await this.rollback(operation, conn);
      throw this.translate(operation, err);
    }
  }

  private async rollback(operation: string, conn: Connection): Promise<void> {
    try {
      await conn.execute(this.backend.dialect.rollback);
    } catch (err) {
      this.log.error({ operation, backend: this.backend.kind, err }, "rollback failed");
    }
  }

  private async release(operation: string, conn: Connection): Promise<void> {
    try {
      await conn.release();
    } catch (err) {
      this.log.error({ operation, backend: this.backend.kind, err }, "connection release failed");
    }
  }

  /**
   * Typed errors pass through untouched and unlogged. Anything else came
   * from the driver: log it with context, hand back a generic error.
   */
  private translate(operation: string, err: unknown): TaskOrbitError {
    if (err instanceof TaskOrbitError) return err;
    const backend = this.backend.kind;
    this.log.error({ operation, backend, err }, "storage operation failed");
    if (this.backend.dialect.isConnectionError(err)) {
      return new BackendConnectionError(backend, "connection lost", { cause: err });
    }
    return new StorageError(operation, { cause: err });
  }
}
