/**
 * Configuration loading and validation.
 *
 * A configuration document is a flat mapping (`type`, `host`, `port`, `user`,
 * `password`, `name`, `schema` / `prefix`, `echo`), read from a JSON file or
 * passed in memory, with `DB_*` environment variables layered on top.
 */
import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigValidationError } from "./core/exceptions.js";
import type { BackendKind } from "./core/types.js";

// ---------------------------------------------------------------------------
// Resolved configuration
// ---------------------------------------------------------------------------

export interface SqliteConfig {
  readonly type: "sqlite";
  /** Directory holding the database file. */
  readonly host: string;
  /** Database file name. */
  readonly name: string;
  /** Prepended to every table name. */
  readonly prefix: string;
  readonly echo: boolean;
}

export interface ServerConfig<K extends "postgresql" | "mysql"> {
  readonly type: K;
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly name: string;
  /** Namespace holding every application table. */
  readonly schema: string;
  readonly echo: boolean;
}

export type PostgresConfig = ServerConfig<"postgresql">;
export type MySQLConfig = ServerConfig<"mysql">;
export type DbConfig = SqliteConfig | PostgresConfig | MySQLConfig;

export const BACKEND_KINDS = ["sqlite", "postgresql", "mysql"] as const;

export const DEFAULT_PORTS = { postgresql: 5432, mysql: 3306 } as const;
export const DEFAULT_PREFIX = "taskorbit_";
export const DEFAULT_PG_SCHEMA = "taskorbit";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const required = z
  .string({ required_error: "is required", invalid_type_error: "must be a string" })
  .min(1, "is required");

const identifier = z
  .string({ invalid_type_error: "must be a string" })
  .regex(/^[a-z_][a-z0-9_]*$/, "must be a lower-case SQL identifier")
  .max(48, "must be at most 48 characters");

const port = z
  .union([
    z.number({ invalid_type_error: "must be an integer" }),
    z.string().regex(/^\d+$/, "must be an integer").transform(Number),
  ])
  .pipe(z.number().int("must be an integer").min(1).max(65535));

const TRUTHY = ["true", "1", "yes", "on"];
const FALSY = ["false", "0", "no", "off"];

const echo = z
  .union([
    z.boolean(),
    z
      .string()
      .toLowerCase()
      .refine((v) => TRUTHY.includes(v) || FALSY.includes(v), "must be a boolean")
      .transform((v) => TRUTHY.includes(v)),
  ])
  .default(false);

const BackendKindSchema = z.enum(BACKEND_KINDS);

const SqliteSchema = z.object({
  type: z.literal("sqlite"),
  host: z.string({ invalid_type_error: "must be a string" }).min(1, "must not be empty").optional(),
  name: required,
  prefix: identifier.default(DEFAULT_PREFIX),
  echo,
});

const ServerSchema = z.object({
  type: z.enum(["postgresql", "mysql"]),
  host: required,
  port: port.optional(),
  user: required,
  password: required,
  name: required,
  schema: identifier.optional(),
  echo,
});

const KNOWN_KEYS: Record<BackendKind, readonly string[]> = {
  sqlite: Object.keys(SqliteSchema.shape),
  postgresql: Object.keys(ServerSchema.shape),
  mysql: Object.keys(ServerSchema.shape),
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstIssue(error: z.ZodError): ConfigValidationError {
  const issue = error.issues[0];
  if (!issue) return new ConfigValidationError("config", "invalid");
  const field = issue.path.length > 0 ? issue.path.join(".") : "config";
  return new ConfigValidationError(field, issue.message);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate a raw mapping into an immutable configuration.
 *
 * @throws {ConfigValidationError} naming the first invalid field.
 */
export function resolveConfig(raw: unknown): DbConfig {
  if (!isRecord(raw)) {
    throw new ConfigValidationError("config", "must be a mapping");
  }

  const kind = BackendKindSchema.safeParse(raw.type);
  if (!kind.success) {
    throw new ConfigValidationError(
      "type",
      `must be one of ${BACKEND_KINDS.join(", ")}`,
    );
  }

  if (kind.data === "sqlite") {
    const parsed = SqliteSchema.safeParse(raw);
    if (!parsed.success) throw firstIssue(parsed.error);
    const { host, name, prefix, echo } = parsed.data;
    return Object.freeze({
      type: "sqlite",
      host: host ?? process.cwd(),
      name,
      prefix,
      echo,
    } satisfies SqliteConfig);
  }

  const parsed = ServerSchema.safeParse(raw);
  if (!parsed.success) throw firstIssue(parsed.error);
  const c = parsed.data;
  const common = {
    host: c.host,
    user: c.user,
    password: c.password,
    name: c.name,
    echo: c.echo,
  };

  if (c.type === "postgresql") {
    return Object.freeze({
      type: "postgresql",
      port: c.port ?? DEFAULT_PORTS.postgresql,
      schema: c.schema ?? DEFAULT_PG_SCHEMA,
      ...common,
    } satisfies PostgresConfig);
  }

  // A MySQL "schema" is a database; by default the one we connect to.
  return Object.freeze({
    type: "mysql",
    port: c.port ?? DEFAULT_PORTS.mysql,
    schema: c.schema ?? c.name,
    ...common,
  } satisfies MySQLConfig);
}

/**
 * Keys of `raw` the resolver ignores for its backend kind. Warning about them
 * is the caller's job.
 */
export function unknownKeys(raw: Record<string, unknown>): string[] {
  const kind = BackendKindSchema.safeParse(raw.type);
  const known: readonly string[] = kind.success
    ? KNOWN_KEYS[kind.data]
    : [...new Set([...KNOWN_KEYS.sqlite, ...KNOWN_KEYS.postgresql])];
  return Object.keys(raw).filter((key) => !known.includes(key));
}

/** Read a JSON configuration document. Keys may sit at top level or under `db`. */
export function readConfigFile(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch {
    throw new ConfigValidationError("config", `cannot read file ${path}`);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch {
    throw new ConfigValidationError("config", `${path} is not valid JSON`);
  }

  if (!isRecord(doc)) {
    throw new ConfigValidationError("config", `${path} must hold a mapping`);
  }
  if ("db" in doc) {
    const section = doc.db;
    if (!isRecord(section)) {
      throw new ConfigValidationError("db", "must be a mapping");
    }
    return section;
  }
  return doc;
}

const ENV_KEYS: ReadonlyArray<[string, string]> = [
  ["DB_TYPE", "type"],
  ["DB_HOST", "host"],
  ["DB_PORT", "port"],
  ["DB_USER", "user"],
  ["DB_PASSWORD", "password"],
  ["DB_PASS", "password"],
  ["DB_NAME", "name"],
  ["DB_SCHEMA", "schema"],
  ["DB_PREFIX", "prefix"],
  ["DB_ECHO", "echo"],
];

/** Overlay `DB_*` variables on a raw mapping; set variables win. */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Record<string, string | undefined>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  for (const [variable, key] of ENV_KEYS) {
    const value = env[variable];
    if (value !== undefined && value !== "") merged[key] = value;
  }
  return merged;
}

export interface LoadedConfig {
  config: DbConfig;
  /** Keys present in the source but not used. */
  ignored: string[];
}

/**
 * Build the process configuration from a file and/or mapping plus the
 * environment. The mapping wins over the file, the environment over both.
 */
export function loadConfig(opts: {
  path?: string;
  raw?: Record<string, unknown>;
  env?: Record<string, string | undefined>;
}): LoadedConfig {
  const fromFile = opts.path ? readConfigFile(opts.path) : {};
  const merged = applyEnvOverrides({ ...fromFile, ...opts.raw }, opts.env ?? {});
  return { config: resolveConfig(merged), ignored: unknownKeys(merged) };
}
