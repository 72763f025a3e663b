/**
 * Concurrency primitives for outbound fetches and worker pools.
 * Everything here is in-process; no shared state across processes.
 */

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

/** Counting semaphore; waiters are served in arrival order. */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    // Permit passes directly to the next waiter.
    if (next) next();
    else this.available = Math.min(this.capacity, this.available + 1);
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

export interface HostPoolOptions {
  maxConnections: number;
  maxPerHost: number;
}

/**
 * Connection caps: a total limit plus a limit per host.
 * The per-host permit is taken first so one busy host cannot hold total slots while queued.
 */
export class HostPool {
  private readonly total: Semaphore;
  private readonly perHost = new Map<string, Semaphore>();

  constructor(private readonly options: HostPoolOptions) {
    this.total = new Semaphore(options.maxConnections);
  }

  get active(): number {
    return this.total.inUse;
  }

  /** Hosts with work running or queued. Idle hosts are forgotten. */
  get hostCount(): number {
    return this.perHost.size;
  }

  async run<T>(host: string, fn: () => Promise<T>): Promise<T> {
    let hostSem = this.perHost.get(host);
    if (!hostSem) {
      hostSem = new Semaphore(this.options.maxPerHost);
      this.perHost.set(host, hostSem);
    }
    const sem = hostSem;
    try {
      return await sem.run(() => this.total.run(fn));
    } finally {
      if (sem.inUse === 0 && sem.pending === 0 && this.perHost.get(host) === sem) {
        this.perHost.delete(host);
      }
    }
  }
}

export interface TokenBucketOptions {
  ratePerSecond: number;
  now?: Clock;
  sleep?: Sleep;
}

/**
 * Rate limiter releasing one permit every 1000/rate ms.
 * Callers queue on a promise chain, so permits go out FIFO and nobody is dropped.
 */
export class TokenBucket {
  private readonly intervalMs: number;
  private readonly now: Clock;
  private readonly sleep: Sleep;
  private nextAt = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: TokenBucketOptions) {
    if (!(options.ratePerSecond > 0)) {
      throw new RangeError(`ratePerSecond must be > 0, got ${options.ratePerSecond}`);
    }
    this.intervalMs = 1000 / options.ratePerSecond;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  take(): Promise<void> {
    const turn = this.tail.then(async () => {
      const now = this.now();
      const wait = this.nextAt - now;
      if (wait > 0) await this.sleep(wait);
      this.nextAt = Math.max(now, this.nextAt) + this.intervalMs;
    });
    this.tail = turn;
    return turn;
  }
}

export interface PoolOptions {
  concurrency: number;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 * Results come back in input order. The first worker rejection rejects the pool.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;
  const lanes = Math.max(1, Math.min(options.concurrency, items.length));

  const lane = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item, index);
    }
  };

  await Promise.all(Array.from({ length: lanes }, lane));
  return results;
}
