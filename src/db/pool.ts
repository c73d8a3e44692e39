/**
 * Bounded checkout gate in front of every backend's connections.
 *
 * Waiters queue FIFO; one that is not served within the acquire timeout is
 * dropped from the queue and rejected with `PoolExhaustedError`.
 */
import { PoolExhaustedError } from "../core/exceptions.js";

export interface PoolOptions {
  /** Maximum concurrently checked-out connections. */
  size: number;
  /** How long a checkout may wait for a free slot. */
  acquireTimeoutMs: number;
}

/** Conservative defaults shared by every backend. */
export const DEFAULT_POOL: PoolOptions = {
  size: 5,
  acquireTimeoutMs: 5_000,
};

/** Finite driver-side limits; no wait on a lost connection is unbounded. */
export const DRIVER_TIMEOUTS = {
  connectMs: 10_000,
  idleMs: 30_000,
  statementMs: 30_000,
  sqliteBusyMs: 5_000,
} as const;

interface Waiter {
  grant: () => void;
  timer: NodeJS.Timeout;
}

export class ConnectionPool {
  private available: number;
  private readonly waiters: Waiter[] = [];
  readonly size: number;
  readonly acquireTimeoutMs: number;

  constructor(options: PoolOptions = DEFAULT_POOL) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${options.size}`);
    }
    this.size = options.size;
    this.available = options.size;
    this.acquireTimeoutMs = options.acquireTimeoutMs;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }

    const started = Date.now();
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(waiter.timer);
          resolve();
        },
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          reject(new PoolExhaustedError(this.size, Date.now() - started));
        }, this.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot straight to the next waiter.
      next.grant();
    } else if (this.available < this.size) {
      this.available++;
    }
  }

  get availableSlots(): number {
    return this.available;
  }

  get queueLength(): number {
    return this.waiters.length;
  }
}
