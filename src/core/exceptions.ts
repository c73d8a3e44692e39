/**
 * Error taxonomy for the persistence core.
 *
 * Client-facing errors are expected control flow and are never logged as
 * exceptions. Everything else is logged once, at the session boundary.
 */
import type { BackendKind } from "./types.js";

export abstract class TaskOrbitError extends Error {
  /** The caller may retry the same operation later. */
  abstract readonly retryable: boolean;
  /** Safe to show to the end user verbatim. */
  abstract readonly clientFacing: boolean;
}

export class ConfigValidationError extends TaskOrbitError {
  readonly retryable = false;
  readonly clientFacing = false;
  field: string;

  constructor(field: string, message?: string) {
    super(
      message
        ? `Invalid configuration field "${field}": ${message}`
        : `Invalid configuration field "${field}"`,
    );
    this.name = "ConfigValidationError";
    this.field = field;
  }
}

export class BackendConnectionError extends TaskOrbitError {
  readonly retryable = true;
  readonly clientFacing = false;
  backend: BackendKind;

  constructor(backend: BackendKind, message?: string, options?: ErrorOptions) {
    super(
      message
        ? `Cannot reach ${backend} database: ${message}`
        : `Cannot reach ${backend} database`,
      options,
    );
    this.name = "BackendConnectionError";
    this.backend = backend;
  }
}

export class PoolExhaustedError extends TaskOrbitError {
  readonly retryable = true;
  readonly clientFacing = false;
  waitedMs: number;

  constructor(size: number, waitedMs: number) {
    super(`No pooled connection free after ${waitedMs}ms (pool size ${size})`);
    this.name = "PoolExhaustedError";
    this.waitedMs = waitedMs;
  }
}

export class SchemaSetupError extends TaskOrbitError {
  readonly retryable = false;
  readonly clientFacing = false;

  constructor(message: string, options?: ErrorOptions) {
    super(`Schema setup failed: ${message}`, options);
    this.name = "SchemaSetupError";
  }
}

export class NotFoundError extends TaskOrbitError {
  readonly retryable = false;
  readonly clientFacing = true;
  entity: string;

  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
    this.entity = entity;
  }
}

export class ValidationError extends TaskOrbitError {
  readonly retryable = false;
  readonly clientFacing = true;
  field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/** Wraps an unexpected driver failure. The cause stays attached for logs only. */
export class StorageError extends TaskOrbitError {
  readonly retryable = true;
  readonly clientFacing = false;
  operation: string;

  constructor(operation: string, options?: ErrorOptions) {
    super(`Storage failure during ${operation}`, options);
    this.name = "StorageError";
    this.operation = operation;
  }
}

export interface ClientFailure {
  status: number;
  error: string;
  message: string;
  retryable: boolean;
}

/** Translate any error into what a web layer may send back. */
export function toClientFailure(err: unknown): ClientFailure {
  if (err instanceof NotFoundError) {
    return { status: 404, error: err.name, message: err.message, retryable: false };
  }
  if (err instanceof ValidationError) {
    return { status: 400, error: err.name, message: err.message, retryable: false };
  }
  if (err instanceof BackendConnectionError || err instanceof PoolExhaustedError) {
    return {
      status: 503,
      error: "ServiceUnavailable",
      message: "The service is temporarily unavailable",
      retryable: true,
    };
  }
  return {
    status: 500,
    error: "SomethingWentWrong",
    message: "Something went wrong",
    retryable: err instanceof TaskOrbitError ? err.retryable : false,
  };
}
