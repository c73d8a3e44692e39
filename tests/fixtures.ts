/**
 * Shared test fixtures: temp dirs, a stepping clock, a capturing logger and
 * a pre-configured SQLite orbit.
 */
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { TaskOrbit } from "../src/index.js";
import { createLogger, type Logger, type LogLevel } from "../src/logger.js";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "taskorbit-test-"));
}

export const EPOCH = Date.parse("2024-01-01T00:00:00.000Z");

/** Each call returns the next second, starting at `EPOCH`. */
export function steppingClock(start = EPOCH, stepMs = 1000): () => Date {
  let t = start;
  return () => {
    const now = new Date(t);
    t += stepMs;
    return now;
  };
}

export interface CapturedLogger {
  logger: Logger;
  lines(): Array<Record<string, unknown>>;
}

/** A logger whose JSON lines are kept in memory. */
export function captureLogger(level: LogLevel = "debug"): CapturedLogger {
  const raw: string[] = [];
  const logger = createLogger({
    level,
    destination: { write: (msg: string) => void raw.push(msg) },
  });
  return {
    logger,
    lines: () =>
      raw
        .map((line): unknown => JSON.parse(line))
        .filter((entry): entry is Record<string, unknown> => typeof entry === "object" && entry !== null),
  };
}

export function silentLogger(): Logger {
  return createLogger({ level: "silent" });
}

export function sqliteConfig(dir: string, prefix = "to_"): Record<string, unknown> {
  return { type: "sqlite", host: dir, name: "test.db", prefix };
}

export async function makeOrbit(
  dir: string = makeTmpDir(),
  opts: { clock?: () => Date; logger?: Logger } = {},
): Promise<TaskOrbit> {
  return TaskOrbit.open({
    config: sqliteConfig(dir),
    env: {},
    logger: opts.logger ?? silentLogger(),
    clock: opts.clock ?? steppingClock(),
    pool: { acquireTimeoutMs: 2_000 },
  });
}
