/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import type { Connection, DatabaseBackend, Row, SqlValue } from "./backend.js";
import { SQLITE_LOWER_FUNCTION, sqliteDialect } from "./dialect.js";
import { DRIVER_TIMEOUTS } from "./pool.js";

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null;
}

/** better-sqlite3 binds neither booleans nor dates. */
function bindable(params: SqlValue[]): Array<string | number | null> {
  return params.map((p) => {
    if (typeof p === "boolean") return p ? 1 : 0;
    if (p instanceof Date) return p.toISOString();
    return p;
  });
}

class SQLiteConnection implements Connection {
  constructor(private db: Database.Database) {}

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    return this.db.prepare(sql).run(...bindable(params)).changes;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<Row[]> {
    return this.db.prepare(sql).all(...bindable(params)).filter(isRow);
  }

  async release(): Promise<void> {
    // The single handle stays open until the backend closes.
  }
}

/**
 * One handle per database file: SQLite serialises writers anyway, so the
 * session manager caps checkouts at one.
 */
export class SQLiteBackend implements DatabaseBackend {
  readonly kind = "sqlite";
  readonly dialect = sqliteDialect;
  readonly maxConnections = 1;
  readonly path: string;
  private db: Database.Database | null = null;

  constructor(path: string) {
    this.path = path;
  }

  get target(): string {
    return `sqlite:${this.path}`;
  }

  /** The driver creates the file here, on first use. */
  private open(): Database.Database {
    if (!this.db) {
      const db = new Database(this.path, { timeout: DRIVER_TIMEOUTS.sqliteBusyMs });
      db.pragma("journal_mode = WAL");
      db.pragma("foreign_keys = ON");
      db.function(SQLITE_LOWER_FUNCTION, { deterministic: true }, (value: unknown) =>
        typeof value === "string" ? value.toLowerCase() : value,
      );
      this.db = db;
    }
    return this.db;
  }

  async ping(): Promise<void> {
    this.open().prepare("SELECT 1").get();
  }

  async acquire(): Promise<Connection> {
    return new SQLiteConnection(this.open());
  }

  setWorkingSchema(): void {
    // Tables are told apart by prefix; there is no schema to bind.
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }
}
