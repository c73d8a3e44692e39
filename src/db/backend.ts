/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL with `?` placeholders and no ORM. A backend
 * hands out physical connections; transactions and pooling limits live in
 * the session manager on top of it.
 */
import type { BackendKind } from "../core/types.js";
import type { Dialect } from "./dialect.js";

export type SqlValue = string | number | boolean | Date | null;
export type Row = Record<string, unknown>;

/** One checked-out physical connection. */
export interface Connection {
  /** Execute a write statement; resolves with the number of affected rows. */
  execute(sql: string, params?: SqlValue[]): Promise<number>;

  /** Run a SELECT and return all matching rows. */
  query(sql: string, params?: SqlValue[]): Promise<Row[]>;

  /** Give the connection back to the driver. */
  release(): Promise<void>;
}

export interface DatabaseBackend {
  readonly kind: BackendKind;
  readonly dialect: Dialect;
  /** Where the backend points, with credentials removed. Safe to log. */
  readonly target: string;
  /** Upper bound on connections the driver will open at once. */
  readonly maxConnections: number;

  /** Round-trip a trivial statement to prove the database is reachable. */
  ping(): Promise<void>;

  /** Check out a connection with the dialect prelude already applied. */
  acquire(): Promise<Connection>;

  /** Schema every later checkout resolves unqualified names in. */
  setWorkingSchema(schema: string | null): void;

  /** Close the pool / release resources. */
  close(): Promise<void>;
}
