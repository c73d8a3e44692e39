import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, test } from "vitest";

import {
  applyEnvOverrides,
  loadConfig,
  readConfigFile,
  resolveConfig,
  unknownKeys,
} from "../src/config.js";
import { ConfigValidationError } from "../src/core/exceptions.js";
import { makeTmpDir } from "./fixtures.js";

function fieldOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigValidationError) return err.field;
    throw err;
  }
  throw new Error("expected ConfigValidationError");
}

const PG = {
  type: "postgresql",
  host: "db.internal",
  user: "app",
  password: "test-secret",
  name: "tasks",
};

describe("resolveConfig: sqlite", () => {
  test("accepts a complete mapping and freezes it", () => {
    const config = resolveConfig({ type: "sqlite", host: "./data", name: "test.db", prefix: "to_" });
    expect(config).toEqual({
      type: "sqlite",
      host: "./data",
      name: "test.db",
      prefix: "to_",
      echo: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  test("defaults host to the working directory and prefix to taskorbit_", () => {
    const config = resolveConfig({ type: "sqlite", name: "test.db" });
    expect(config).toEqual({
      type: "sqlite",
      host: process.cwd(),
      name: "test.db",
      prefix: "taskorbit_",
      echo: false,
    });
  });

  test("requires a file name", () => {
    expect(fieldOf(() => resolveConfig({ type: "sqlite", host: "." }))).toBe("name");
  });

  test("rejects a prefix that is not an identifier", () => {
    expect(fieldOf(() => resolveConfig({ type: "sqlite", name: "a.db", prefix: "to-" }))).toBe(
      "prefix",
    );
  });
});

describe("resolveConfig: server backends", () => {
  test("postgresql defaults port and schema", () => {
    expect(resolveConfig(PG)).toEqual({
      ...PG,
      port: 5432,
      schema: "taskorbit",
      echo: false,
    });
  });

  test("mysql takes a port string and uses the database as schema", () => {
    const config = resolveConfig({ ...PG, type: "mysql", port: "3307" });
    expect(config).toEqual({
      ...PG,
      type: "mysql",
      port: 3307,
      schema: "tasks",
      echo: false,
    });
  });

  test.each(["host", "user", "password", "name"])("names missing %s", (key) => {
    const raw: Record<string, unknown> = { ...PG };
    delete raw[key];
    expect(fieldOf(() => resolveConfig(raw))).toBe(key);
  });

  test("rejects an empty password", () => {
    expect(fieldOf(() => resolveConfig({ ...PG, password: "" }))).toBe("password");
  });

  test("rejects a non-numeric port", () => {
    expect(fieldOf(() => resolveConfig({ ...PG, port: "abc" }))).toBe("port");
  });

  test("rejects a port out of range", () => {
    expect(fieldOf(() => resolveConfig({ ...PG, port: 70000 }))).toBe("port");
  });

  test("rejects a schema with upper-case letters", () => {
    expect(fieldOf(() => resolveConfig({ ...PG, schema: "Tasks" }))).toBe("schema");
  });

  test("parses echo from strings", () => {
    const config = resolveConfig({ ...PG, echo: "yes" });
    expect(config.echo).toBe(true);
    expect(fieldOf(() => resolveConfig({ ...PG, echo: "maybe" }))).toBe("echo");
  });
});

describe("resolveConfig: shape", () => {
  test("rejects an unknown backend type", () => {
    const err = (() => {
      try {
        resolveConfig({ type: "oracle", name: "x" });
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(ConfigValidationError);
    expect(err).toMatchObject({
      field: "type",
      message: 'Invalid configuration field "type": must be one of sqlite, postgresql, mysql',
    });
  });

  test("rejects a missing type", () => {
    expect(fieldOf(() => resolveConfig({ name: "x" }))).toBe("type");
  });

  test("rejects something that is not a mapping", () => {
    expect(fieldOf(() => resolveConfig(["sqlite"]))).toBe("config");
    expect(fieldOf(() => resolveConfig(null))).toBe("config");
  });
});

describe("unknownKeys", () => {
  test("lists keys the backend kind does not use", () => {
    expect(unknownKeys({ type: "sqlite", name: "a.db", colour: "blue", user: "x" })).toEqual([
      "colour",
      "user",
    ]);
  });

  test("server kinds ignore prefix", () => {
    expect(unknownKeys({ ...PG, prefix: "to_" })).toEqual(["prefix"]);
  });
});

describe("applyEnvOverrides", () => {
  test("set variables win, empty ones are skipped", () => {
    const merged = applyEnvOverrides(
      { type: "postgresql", host: "db", password: "from-file" },
      { DB_HOST: "prod-db", DB_PORT: "6543", DB_USER: "", DB_PASS: "test-secret" },
    );
    expect(merged).toEqual({
      type: "postgresql",
      host: "prod-db",
      port: "6543",
      password: "test-secret",
    });
  });

  test("DB_PASS wins over DB_PASSWORD", () => {
    const merged = applyEnvOverrides({}, { DB_PASSWORD: "first", DB_PASS: "second" });
    expect(merged).toEqual({ password: "second" });
  });

  test("does not touch its input", () => {
    const raw = { host: "db" };
    applyEnvOverrides(raw, { DB_HOST: "other" });
    expect(raw).toEqual({ host: "db" });
  });
});

describe("readConfigFile / loadConfig", () => {
  test("reads a db section and layers the environment on top", () => {
    const dir = makeTmpDir();
    const path = join(dir, "taskorbit.json");
    writeFileSync(path, JSON.stringify({ db: { type: "sqlite", host: dir, name: "a.db", extra: 1 } }));

    const { config, ignored } = loadConfig({ path, env: { DB_PREFIX: "app_" } });
    expect(config).toEqual({ type: "sqlite", host: dir, name: "a.db", prefix: "app_", echo: false });
    expect(ignored).toEqual(["extra"]);
  });

  test("keys may sit at top level", () => {
    const dir = makeTmpDir();
    const path = join(dir, "flat.json");
    writeFileSync(path, JSON.stringify({ type: "sqlite", name: "flat.db" }));
    expect(readConfigFile(path)).toEqual({ type: "sqlite", name: "flat.db" });
  });

  test("the in-memory mapping wins over the file", () => {
    const dir = makeTmpDir();
    const path = join(dir, "taskorbit.json");
    writeFileSync(path, JSON.stringify({ type: "sqlite", host: dir, name: "file.db" }));
    const { config } = loadConfig({ path, raw: { name: "memory.db" } });
    expect(config).toMatchObject({ name: "memory.db" });
  });

  test("reports unreadable and malformed files on the config field", () => {
    const dir = makeTmpDir();
    const broken = join(dir, "broken.json");
    writeFileSync(broken, "{ not json");
    expect(fieldOf(() => readConfigFile(broken))).toBe("config");
    expect(fieldOf(() => readConfigFile(join(dir, "missing.json")))).toBe("config");
  });

  test("a db section must be a mapping", () => {
    const dir = makeTmpDir();
    const path = join(dir, "bad-db.json");
    writeFileSync(path, JSON.stringify({ db: "sqlite" }));
    expect(fieldOf(() => readConfigFile(path))).toBe("db");
  });
});
