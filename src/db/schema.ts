/**
 * Schema and table setup. Safe to run on every start: it only ever creates
 * what is missing and never drops or truncates.
 */
import type { DbConfig } from "../config.js";
import {
  BackendConnectionError,
  SchemaSetupError,
  TaskOrbitError,
} from "../core/exceptions.js";
import type { TableNames } from "../core/types.js";
import type { Logger } from "../logger.js";
import type { Connection, DatabaseBackend } from "./backend.js";

export interface SchemaReport {
  /** Namespace holding the tables; null for file backends. */
  schema: string | null;
  tables: TableNames;
  created: string[];
  existing: string[];
}

/** Physical table names for `config`, fixed for the process lifetime. */
export function tableNames(config: DbConfig): TableNames {
  if (config.type === "sqlite") {
    return { user: `${config.prefix}user`, task: `${config.prefix}task` };
  }
  return { user: "user", task: "task" };
}

export function schemaName(config: DbConfig): string | null {
  return config.type === "sqlite" ? null : config.schema;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function hasRows(conn: Connection, stmt: { sql: string; params: string[] }): Promise<boolean> {
  const rows = await conn.query(stmt.sql, stmt.params);
  return rows.length > 0;
}

/**
 * The role may not be allowed to create the schema: an operator usually
 * provisions it beforehand. Only a schema that is both missing and
 * uncreatable is an error.
 */
async function ensureNamespace(
  backend: DatabaseBackend,
  conn: Connection,
  schema: string,
  log: Logger,
): Promise<void> {
  const { dialect } = backend;
  if (await hasRows(conn, dialect.schemaExists(schema))) {
    log.debug({ schema }, "schema already present");
    return;
  }
  try {
    await conn.execute(dialect.createSchema(schema));
    log.info({ schema }, "schema created");
  } catch (err) {
    if (dialect.isPermissionDenied(err) && (await hasRows(conn, dialect.schemaExists(schema)))) {
      log.info({ schema }, "schema provisioned externally");
      return;
    }
    throw new SchemaSetupError(`cannot create schema ${schema}: ${describe(err)}`, { cause: err });
  }
}

export async function ensureSchema(
  backend: DatabaseBackend,
  config: DbConfig,
  log: Logger,
): Promise<SchemaReport> {
  const tables = tableNames(config);
  const schema = schemaName(config);
  const { dialect } = backend;
  const report: SchemaReport = { schema, tables, created: [], existing: [] };

  // Bind nothing while setting up: DDL below is schema-qualified.
  backend.setWorkingSchema(null);
  let conn: Connection;
  try {
    conn = await backend.acquire();
  } catch (err) {
    throw new BackendConnectionError(backend.kind, describe(err), { cause: err });
  }
  try {
    if (schema !== null) await ensureNamespace(backend, conn, schema, log);

    for (const table of [tables.user, tables.task]) {
      const exists = await hasRows(conn, dialect.tableExists(table, schema));
      (exists ? report.existing : report.created).push(table);
    }
    for (const statement of dialect.createTables(tables, schema)) {
      await conn.execute(statement);
    }
  } catch (err) {
    if (err instanceof TaskOrbitError) throw err;
    if (dialect.isConnectionError(err)) {
      throw new BackendConnectionError(backend.kind, describe(err), { cause: err });
    }
    throw new SchemaSetupError(describe(err), { cause: err });
  } finally {
    await conn.release();
  }

  backend.setWorkingSchema(schema);
  for (const table of report.created) log.info({ table, schema }, "table created");
  for (const table of report.existing) log.info({ table, schema }, "table already present");
  return report;
}
