import Database from "better-sqlite3";
import { join } from "node:path";
import { describe, expect, test } from "vitest";

import { resolveConfig } from "../src/config.js";
import { BackendConnectionError, SchemaSetupError } from "../src/core/exceptions.js";
import type { Connection, DatabaseBackend, Row, SqlValue } from "../src/db/backend.js";
import { postgresDialect } from "../src/db/dialect.js";
import { createBackend } from "../src/db/factory.js";
import { ensureSchema } from "../src/db/schema.js";
import { makeTmpDir, silentLogger, sqliteConfig } from "./fixtures.js";

function tablesIn(path: string): string[] {
  const db = new Database(path, { readonly: true });
  try {
    return db
      .prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite!_%' ESCAPE '!' ORDER BY name",
      )
      .all()
      .map((row) => (typeof row === "object" && row !== null && "name" in row ? row.name : null))
      .filter((name): name is string => typeof name === "string");
  } finally {
    db.close();
  }
}

describe("ensureSchema on SQLite", () => {
  test("creates prefixed tables and reports them", async () => {
    const dir = makeTmpDir();
    const config = resolveConfig(sqliteConfig(dir));
    const backend = createBackend(config);

    const report = await ensureSchema(backend, config, silentLogger());
    await backend.close();

    expect(report).toEqual({
      schema: null,
      tables: { user: "to_user", task: "to_task" },
      created: ["to_user", "to_task"],
      existing: [],
    });
    expect(tablesIn(join(dir, "test.db"))).toEqual(["to_task", "to_user"]);
  });

  test("a second run changes nothing", async () => {
    const dir = makeTmpDir();
    const config = resolveConfig(sqliteConfig(dir));
    const first = createBackend(config);
    await ensureSchema(first, config, silentLogger());
    await first.close();

    const second = createBackend(config);
    const report = await ensureSchema(second, config, silentLogger());
    await second.close();

    expect(report.created).toEqual([]);
    expect(report.existing).toEqual(["to_user", "to_task"]);
    expect(tablesIn(join(dir, "test.db"))).toEqual(["to_task", "to_user"]);
  });

  test("two prefixes share one file", async () => {
    const dir = makeTmpDir();
    for (const prefix of ["a_", "b_"]) {
      const config = resolveConfig(sqliteConfig(dir, prefix));
      const backend = createBackend(config);
      await ensureSchema(backend, config, silentLogger());
      await backend.close();
    }
    expect(tablesIn(join(dir, "test.db"))).toEqual(["a_task", "a_user", "b_task", "b_user"]);
  });
});

type Responder = (sql: string, params: SqlValue[]) => Row[] | Error;

/** Records every statement; answers queries through `respond`. */
class RecordingConnection implements Connection {
  readonly statements: string[] = [];
  released = false;

  constructor(private respond: Responder) {}

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    this.statements.push(sql);
    const answer = this.respond(sql, params);
    if (answer instanceof Error) throw answer;
    return 0;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<Row[]> {
    this.statements.push(sql);
    const answer = this.respond(sql, params);
    if (answer instanceof Error) throw answer;
    return answer;
  }

  async release(): Promise<void> {
    this.released = true;
  }
}

class FakePostgresBackend implements DatabaseBackend {
  readonly kind = "postgresql";
  readonly dialect = postgresDialect;
  readonly target = "postgres://***@fake:5432/tasks";
  readonly maxConnections = 1;
  workingSchema: string | null | undefined = undefined;

  constructor(readonly conn: RecordingConnection) {}

  async ping(): Promise<void> {}

  async acquire(): Promise<Connection> {
    return this.conn;
  }

  setWorkingSchema(schema: string | null): void {
    this.workingSchema = schema;
  }

  async close(): Promise<void> {}
}

function denied(): Error {
  return Object.assign(new Error("permission denied for database tasks"), { code: "42501" });
}

const PG_CONFIG = resolveConfig({
  type: "postgresql",
  host: "fake",
  user: "app",
  password: "test-secret",
  name: "tasks",
});

describe("ensureSchema on a server backend", () => {
  test("creates a missing schema, then the tables, then binds the schema", async () => {
    const conn = new RecordingConnection(() => []);
    const backend = new FakePostgresBackend(conn);

    const report = await ensureSchema(backend, PG_CONFIG, silentLogger());

    expect(report.schema).toBe("taskorbit");
    expect(report.created).toEqual(["user", "task"]);
    expect(conn.statements[0]).toContain("pg_namespace");
    expect(conn.statements[1]).toBe('CREATE SCHEMA IF NOT EXISTS "taskorbit"');
    expect(conn.statements.slice(-3)).toEqual(postgresDialect.createTables(report.tables, "taskorbit"));
    expect(conn.released).toBe(true);
    expect(backend.workingSchema).toBe("taskorbit");
  });

  test("an existing schema is not created again", async () => {
    const conn = new RecordingConnection((sql) =>
      sql.includes("pg_namespace") ? [{ nspname: "taskorbit" }] : [],
    );
    await ensureSchema(new FakePostgresBackend(conn), PG_CONFIG, silentLogger());
    expect(conn.statements.some((sql) => sql.startsWith("CREATE SCHEMA"))).toBe(false);
  });

  test("an existing table is reported as existing", async () => {
    const conn = new RecordingConnection((sql, params) =>
      sql.includes("information_schema.tables") && params[1] === "user" ? [{ table_name: "user" }] : [],
    );
    const report = await ensureSchema(new FakePostgresBackend(conn), PG_CONFIG, silentLogger());
    expect(report.existing).toEqual(["user"]);
    expect(report.created).toEqual(["task"]);
  });

  test("tolerates a denied CREATE SCHEMA when the schema was provisioned", async () => {
    let lookups = 0;
    const conn = new RecordingConnection((sql) => {
      if (sql.includes("pg_namespace")) {
        lookups++;
        return lookups === 1 ? [] : [{ nspname: "taskorbit" }];
      }
      if (sql.startsWith("CREATE SCHEMA")) return denied();
      return [];
    });
    const backend = new FakePostgresBackend(conn);

    const report = await ensureSchema(backend, PG_CONFIG, silentLogger());

    expect(report.schema).toBe("taskorbit");
    expect(report.created).toEqual(["user", "task"]);
    expect(backend.workingSchema).toBe("taskorbit");
  });

  test("a denied CREATE SCHEMA for a missing schema is fatal", async () => {
    const conn = new RecordingConnection((sql) =>
      sql.startsWith("CREATE SCHEMA") ? denied() : [],
    );
    const backend = new FakePostgresBackend(conn);

    const attempt = ensureSchema(backend, PG_CONFIG, silentLogger());
    await expect(attempt).rejects.toBeInstanceOf(SchemaSetupError);
    await expect(attempt).rejects.toThrow(
      'Schema setup failed: cannot create schema taskorbit: permission denied for database tasks',
    );
    expect(conn.released).toBe(true);
    expect(backend.workingSchema).toBe(null);
  });

  test("a dropped connection during setup is a connection error", async () => {
    const conn = new RecordingConnection((sql) =>
      sql.startsWith("CREATE TABLE")
        ? Object.assign(new Error("Connection terminated"), { code: "CONNECTION_CLOSED" })
        : [],
    );
    const attempt = ensureSchema(new FakePostgresBackend(conn), PG_CONFIG, silentLogger());
    await expect(attempt).rejects.toBeInstanceOf(BackendConnectionError);
  });

  test("any other DDL failure is a schema setup error", async () => {
    const conn = new RecordingConnection((sql) =>
      sql.startsWith("CREATE INDEX")
        ? Object.assign(new Error("syntax error"), { code: "42601" })
        : [],
    );
    const attempt = ensureSchema(new FakePostgresBackend(conn), PG_CONFIG, silentLogger());
    await expect(attempt).rejects.toThrow("Schema setup failed: syntax error");
  });
});
