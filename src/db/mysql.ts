/**
 * MySQL database backend using mysql2.
 *
 * The pool connects to the configured database; the application schema is
 * selected per checkout with `USE`.
 */
import {
  createPool,
  type Pool,
  type PoolConnection,
  type ResultSetHeader,
  type RowDataPacket,
} from "mysql2/promise";
import type { Connection, DatabaseBackend, Row, SqlValue } from "./backend.js";
import { mysqlDialect } from "./dialect.js";
import { DRIVER_TIMEOUTS } from "./pool.js";

class MySQLConnection implements Connection {
  constructor(private conn: PoolConnection) {}

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    const [result] = await this.conn.query<ResultSetHeader>(sql, params);
    return result.affectedRows;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<Row[]> {
    const [rows] = await this.conn.query<RowDataPacket[]>(sql, params);
    return rows;
  }

  async release(): Promise<void> {
    this.conn.release();
  }
}

export class MySQLBackend implements DatabaseBackend {
  readonly kind = "mysql";
  readonly dialect = mysqlDialect;
  readonly maxConnections: number;
  readonly target: string;
  private pool: Pool;
  private workingSchema: string | null = null;

  constructor(uri: string, opts: { target: string; maxConnections: number }) {
    this.target = opts.target;
    this.maxConnections = opts.maxConnections;
    this.pool = createPool({
      uri,
      connectionLimit: opts.maxConnections,
      waitForConnections: true,
      queueLimit: opts.maxConnections * 4,
      connectTimeout: DRIVER_TIMEOUTS.connectMs,
      idleTimeout: DRIVER_TIMEOUTS.idleMs,
      timezone: "Z",
    });
  }

  async ping(): Promise<void> {
    const conn = await this.pool.getConnection();
    try {
      await conn.ping();
    } finally {
      conn.release();
    }
  }

  async acquire(): Promise<Connection> {
    const conn = await this.pool.getConnection();
    try {
      for (const statement of this.dialect.prelude(this.workingSchema)) {
        await conn.query(statement);
      }
    } catch (err) {
      conn.release();
      throw err;
    }
    return new MySQLConnection(conn);
  }

  setWorkingSchema(schema: string | null): void {
    this.workingSchema = schema;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
