export type Release = () => void;

export class GateAbortedError extends Error {
  constructor() {
    super('generation gate wait aborted');
    this.name = 'GateAbortedError';
  }
}

/**
 * Counting semaphore around the model. One permit per generation call; waiters are served in arrival order.
 */
export class GenerationGate {
  readonly size: number;
  private available: number;
  private waiters: Array<(release: Release) => void> = [];

  constructor(size = 1) {
    this.size = Math.max(1, Math.floor(size));
    this.available = this.size;
  }

  get pending() {
    return this.waiters.length;
  }

  get free() {
    return this.available;
  }

  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) return Promise.reject(new GateAbortedError());
    if (this.available > 0) {
      this.available -= 1;
      return Promise.resolve(this.makeRelease());
    }
    return new Promise<Release>((resolve, reject) => {
      const waiter = (release: Release) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(release);
      };
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new GateAbortedError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private makeRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // hand the permit straight over
        next(this.makeRelease());
      } else {
        this.available += 1;
      }
    };
  }
}
