/**
 * PostgreSQL database backend using postgres-js.
 *
 * The connection string never names a schema; the working schema is bound
 * per checkout through the dialect prelude (`SET search_path`).
 */
import postgres from "postgres";
import type { Connection, DatabaseBackend, Row, SqlValue } from "./backend.js";
import { postgresDialect } from "./dialect.js";
import { DRIVER_TIMEOUTS } from "./pool.js";

class PostgresConnection implements Connection {
  constructor(private reserved: postgres.ReservedSql) {}

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    const result = await this.reserved.unsafe(postgresDialect.placeholders(sql), params);
    return result.count;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<Row[]> {
    const rows = await this.reserved.unsafe(postgresDialect.placeholders(sql), params);
    return [...rows];
  }

  async release(): Promise<void> {
    this.reserved.release();
  }
}

export class PostgresBackend implements DatabaseBackend {
  readonly kind = "postgresql";
  readonly dialect = postgresDialect;
  readonly maxConnections: number;
  readonly target: string;
  private sql: postgres.Sql;
  private workingSchema: string | null = null;

  constructor(connectionString: string, opts: { target: string; maxConnections: number }) {
    this.target = opts.target;
    this.maxConnections = opts.maxConnections;
    this.sql = postgres(connectionString, {
      max: opts.maxConnections,
      connect_timeout: DRIVER_TIMEOUTS.connectMs / 1000,
      idle_timeout: DRIVER_TIMEOUTS.idleMs / 1000,
      onnotice: () => {},
    });
  }

  async ping(): Promise<void> {
    await this.sql.unsafe("SELECT 1");
  }

  async acquire(): Promise<Connection> {
    const reserved = await this.sql.reserve();
    try {
      for (const statement of this.dialect.prelude(this.workingSchema)) {
        await reserved.unsafe(statement);
      }
    } catch (err) {
      reserved.release();
      throw err;
    }
    return new PostgresConnection(reserved);
  }

  setWorkingSchema(schema: string | null): void {
    this.workingSchema = schema;
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: DRIVER_TIMEOUTS.connectMs / 1000 });
  }
}
