import { CancelledError, LockTimeoutError } from './errors.js';

export type Release = () => void;

export type AcquireOptions = {
  /** Give up with `LockTimeoutError` after waiting this long. */
  timeoutMs?: number;
  /** Aborting before the lock is granted rejects with `CancelledError`. */
  signal?: AbortSignal;
};

type Waiter = { grant: () => void };

/** One exclusive FIFO lock per key. Keys never contend with each other. */
export class KeyedMutex {
  private readonly held = new Set<string>();
  private readonly queues = new Map<string, Waiter[]>();

  acquire(key: string, opts: AcquireOptions = {}): Promise<Release> {
    if (opts.signal?.aborted) return Promise.reject(new CancelledError(key));
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<Release>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const remove = () => {
        const q = this.queues.get(key);
        if (!q) return;
        const i = q.indexOf(waiter);
        if (i >= 0) q.splice(i, 1);
        if (q.length === 0) this.queues.delete(key);
      };
      const cleanup = () => {
        if (timer) clearTimeout(timer);
        opts.signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = () => { remove(); cleanup(); reject(new CancelledError(key)); };
      const waiter: Waiter = { grant: () => { cleanup(); resolve(this.releaser(key)); } };

      const timeoutMs = opts.timeoutMs;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => { remove(); cleanup(); reject(new LockTimeoutError(key, timeoutMs)); }, timeoutMs);
      }
      opts.signal?.addEventListener('abort', onAbort, { once: true });
      const q = this.queues.get(key) ?? [];
      q.push(waiter);
      this.queues.set(key, q);
    });
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const q = this.queues.get(key);
      const next = q?.shift();
      if (q && q.length === 0) this.queues.delete(key);
      // Ownership passes straight to the next waiter
      if (next) next.grant();
      else this.held.delete(key);
    };
  }

  async runExclusive<T>(key: string, fn: () => Promise<T>, opts?: AcquireOptions): Promise<T> {
    const release = await this.acquire(key, opts);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  waiting(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }
}
