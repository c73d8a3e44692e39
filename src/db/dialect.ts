/**
 * Per-engine SQL knobs: identifier quoting, placeholders, DDL, transaction
 * statements and driver error classification.
 */
import type { BackendKind, TableNames } from "../core/types.js";
import { DRIVER_TIMEOUTS } from "./pool.js";

export interface Statement {
  sql: string;
  params: string[];
}

export interface Dialect {
  readonly kind: BackendKind;
  /** Quote one identifier. */
  quote(identifier: string): string;
  /** Rewrite `?` placeholders into the driver's own style. */
  placeholders(sql: string): string;
  /** Appended to a SELECT that reads a row about to be mutated. */
  readonly lockClause: string;
  /** Unicode-aware lower-casing of a SQL expression. */
  lower(expr: string): string;
  readonly begin: string;
  readonly commit: string;
  readonly rollback: string;
  /** Run on every connection right after checkout. */
  prelude(workingSchema: string | null): string[];
  /** Create the tables and indexes, each statement idempotent. */
  createTables(tables: TableNames, schema: string | null): string[];
  tableExists(table: string, schema: string | null): Statement;
  schemaExists(schema: string): Statement;
  createSchema(schema: string): string;
  isPermissionDenied(err: unknown): boolean;
  isConnectionError(err: unknown): boolean;
  isUniqueViolation(err: unknown): boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "string" || typeof code === "number" ? String(code) : undefined;
}

function errno(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("errno" in err)) return undefined;
  return typeof err.errno === "number" ? err.errno : undefined;
}

const SOCKET_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "EPIPE",
]);

function doubled(quote: string) {
  return (identifier: string) =>
    `${quote}${identifier.split(quote).join(quote + quote)}${quote}`;
}

/** `?` → `$1, $2, …`, leaving quoted text alone. */
export function toNumberedPlaceholders(sql: string): string {
  let out = "";
  let n = 0;
  let quote: string | null = null;
  for (const ch of sql) {
    if (quote) {
      if (ch === quote) quote = null;
      out += ch;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      out += ch;
    } else if (ch === "?") {
      out += `$${++n}`;
    } else {
      out += ch;
    }
  }
  return out;
}

/** Escape `%`, `_` and the escape character itself for `LIKE … ESCAPE '!'`. */
export function escapeLike(text: string): string {
  return text.replace(/[!%_]/g, (ch) => `!${ch}`);
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

const sqliteQuote = doubled('"');

/** SQLite's own LOWER() folds ASCII only; the backend registers this one. */
export const SQLITE_LOWER_FUNCTION = "taskorbit_lower";

export const sqliteDialect: Dialect = {
  kind: "sqlite",
  quote: sqliteQuote,
  placeholders: (sql) => sql,
  lockClause: "",
  lower: (expr) => `${SQLITE_LOWER_FUNCTION}(${expr})`,
  begin: "BEGIN IMMEDIATE",
  commit: "COMMIT",
  rollback: "ROLLBACK",
  prelude: () => [],
  createTables({ user, task }) {
    const u = sqliteQuote(user);
    const t = sqliteQuote(task);
    return [
      `CREATE TABLE IF NOT EXISTS ${u} (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL UNIQUE,
        hashed_password TEXT NOT NULL,
        active INTEGER NOT NULL DEFAULT 1,
        created_at TEXT NOT NULL,
        updated_at TEXT,
        last_login_at TEXT
      )`,
      `CREATE TABLE IF NOT EXISTS ${t} (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        user_id TEXT NOT NULL REFERENCES ${u}(id) ON DELETE CASCADE,
        title TEXT NOT NULL,
        content TEXT,
        completed INTEGER NOT NULL DEFAULT 0,
        completed_at TEXT,
        deadline TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT
      )`,
      `CREATE INDEX IF NOT EXISTS ${sqliteQuote(`${task}_owner_created`)} ON ${t} (user_id, created_at)`,
    ];
  },
  tableExists: (table) => ({
    sql: "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
    params: [table],
  }),
  schemaExists: () => {
    throw new Error("SQLite has no schemas");
  },
  createSchema: () => {
    throw new Error("SQLite has no schemas");
  },
  isPermissionDenied: (err) => {
    const code = errorCode(err);
    return code === "SQLITE_PERM" || code === "SQLITE_READONLY" || code === "SQLITE_AUTH";
  },
  isConnectionError: (err) => {
    const code = errorCode(err);
    return code === "SQLITE_CANTOPEN" || code === "SQLITE_NOTADB" || code === "SQLITE_IOERR";
  },
  isUniqueViolation: (err) => errorCode(err) === "SQLITE_CONSTRAINT_UNIQUE",
};

// ---------------------------------------------------------------------------
// PostgreSQL
// ---------------------------------------------------------------------------

const pgQuote = doubled('"');

const PG_CONNECTION_CODES = new Set([
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
  "CONNECT_TIMEOUT",
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
  "08000",
  "08003",
  "08006",
]);

export const postgresDialect: Dialect = {
  kind: "postgresql",
  quote: pgQuote,
  placeholders: toNumberedPlaceholders,
  lockClause: " FOR UPDATE",
  lower: (expr) => `LOWER(${expr})`,
  begin: "BEGIN ISOLATION LEVEL READ COMMITTED",
  commit: "COMMIT",
  rollback: "ROLLBACK",
  prelude: (schema) => [
    `SET statement_timeout = ${DRIVER_TIMEOUTS.statementMs}`,
    ...(schema ? [`SET search_path TO ${pgQuote(schema)}`] : []),
  ],
  createTables({ user, task }, schema) {
    const q = (name: string) => (schema ? `${pgQuote(schema)}.${pgQuote(name)}` : pgQuote(name));
    return [
      `CREATE TABLE IF NOT EXISTS ${q(user)} (
        id VARCHAR(36) PRIMARY KEY,
        name VARCHAR(255) NOT NULL UNIQUE,
        hashed_password VARCHAR(255) NOT NULL,
        active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ,
        last_login_at TIMESTAMPTZ
      )`,
      `CREATE TABLE IF NOT EXISTS ${q(task)} (
        id VARCHAR(36) PRIMARY KEY,
        seq BIGSERIAL NOT NULL,
        user_id VARCHAR(36) NOT NULL REFERENCES ${q(user)}(id) ON DELETE CASCADE,
        title VARCHAR(255) NOT NULL,
        content TEXT,
        completed BOOLEAN NOT NULL DEFAULT FALSE,
        completed_at TIMESTAMPTZ,
        deadline TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ
      )`,
      `CREATE INDEX IF NOT EXISTS ${pgQuote(`${task}_owner_created`)} ON ${q(task)} (user_id, created_at)`,
    ];
  },
  tableExists: (table, schema) => ({
    sql: "SELECT table_name FROM information_schema.tables WHERE table_schema = ? AND table_name = ?",
    params: [schema ?? "public", table],
  }),
  schemaExists: (schema) => ({
    sql: "SELECT nspname FROM pg_catalog.pg_namespace WHERE nspname = ?",
    params: [schema],
  }),
  createSchema: (schema) => `CREATE SCHEMA IF NOT EXISTS ${pgQuote(schema)}`,
  isPermissionDenied: (err) => errorCode(err) === "42501",
  isUniqueViolation: (err) => errorCode(err) === "23505",
  isConnectionError: (err) => {
    const code = errorCode(err);
    return code !== undefined && (PG_CONNECTION_CODES.has(code) || SOCKET_CODES.has(code));
  },
};

// ---------------------------------------------------------------------------
// MySQL
// ---------------------------------------------------------------------------

const mysqlQuote = doubled("`");

const MYSQL_CONNECTION_CODES = new Set([
  "PROTOCOL_CONNECTION_LOST",
  "PROTOCOL_SEQUENCE_TIMEOUT",
  "ER_CON_COUNT_ERROR",
  "ER_SERVER_SHUTDOWN",
]);

// ER_DBACCESS_DENIED_ERROR, ER_ACCESS_DENIED_ERROR, ER_TABLEACCESS_DENIED_ERROR
const MYSQL_DENIED_ERRNOS = new Set([1044, 1045, 1142]);

export const mysqlDialect: Dialect = {
  kind: "mysql",
  quote: mysqlQuote,
  placeholders: (sql) => sql,
  lockClause: " FOR UPDATE",
  lower: (expr) => `LOWER(${expr})`,
  begin: "START TRANSACTION",
  commit: "COMMIT",
  rollback: "ROLLBACK",
  prelude: (schema) => [
    "SET SESSION TRANSACTION ISOLATION LEVEL READ COMMITTED",
    `SET SESSION max_execution_time = ${DRIVER_TIMEOUTS.statementMs}`,
    ...(schema ? [`USE ${mysqlQuote(schema)}`] : []),
  ],
  createTables({ user, task }, schema) {
    const q = (name: string) => (schema ? `${mysqlQuote(schema)}.${mysqlQuote(name)}` : mysqlQuote(name));
    return [
      `CREATE TABLE IF NOT EXISTS ${q(user)} (
        id CHAR(36) NOT NULL PRIMARY KEY,
        name VARCHAR(255) NOT NULL UNIQUE,
        hashed_password VARCHAR(255) NOT NULL,
        active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at DATETIME(3) NOT NULL,
        updated_at DATETIME(3) NULL,
        last_login_at DATETIME(3) NULL
      ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4`,
      `CREATE TABLE IF NOT EXISTS ${q(task)} (
        id CHAR(36) NOT NULL PRIMARY KEY,
        seq BIGINT NOT NULL AUTO_INCREMENT UNIQUE,
        user_id CHAR(36) NOT NULL,
        title VARCHAR(255) NOT NULL,
        content TEXT NULL,
        completed BOOLEAN NOT NULL DEFAULT FALSE,
        completed_at DATETIME(3) NULL,
        deadline DATETIME(3) NULL,
        created_at DATETIME(3) NOT NULL,
        updated_at DATETIME(3) NULL,
        KEY ${mysqlQuote(`${task}_owner_created`)} (user_id, created_at),
        FOREIGN KEY (user_id) REFERENCES ${q(user)}(id) ON DELETE CASCADE
      ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4`,
    ];
  },
  tableExists: (table, schema) => ({
    sql: "SELECT TABLE_NAME FROM information_schema.TABLES WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ?",
    params: [schema ?? "", table],
  }),
  schemaExists: (schema) => ({
    sql: "SELECT SCHEMA_NAME FROM information_schema.SCHEMATA WHERE SCHEMA_NAME = ?",
    params: [schema],
  }),
  createSchema: (schema) => `CREATE DATABASE IF NOT EXISTS ${mysqlQuote(schema)}`,
  isPermissionDenied: (err) => {
    const n = errno(err);
    return n !== undefined && MYSQL_DENIED_ERRNOS.has(n);
  },
  isConnectionError: (err) => {
    const code = errorCode(err);
    return code !== undefined && (MYSQL_CONNECTION_CODES.has(code) || SOCKET_CODES.has(code));
  },
  // ER_DUP_ENTRY
  isUniqueViolation: (err) => errno(err) === 1062,
};

export function dialectFor(kind: BackendKind): Dialect {
  switch (kind) {
    case "sqlite":
      return sqliteDialect;
    case "postgresql":
      return postgresDialect;
    case "mysql":
      return mysqlDialect;
  }
}
