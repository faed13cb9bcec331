/**
 * Rejects as soon as `signal` aborts, otherwise settles with `work`.
 * `work` keeps running; its late outcome is observed by the race and ignored.
 */
export function abortable<T>(
  work: Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) {
    // observe the abandoned promise so its rejection is not reported as unhandled
    void work.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Aborted');
}

/**
 * One FIFO queue per key: `runExclusive` calls sharing a key never overlap,
 * calls on different keys run freely.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(
    key: string,
    fn: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    // later callers wait for us and for everyone queued before us
    const tail = previous.then(() => held);
    this.tails.set(key, tail);
    // the chain never rejects; drop the key once the whole queue has drained
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    try {
      await abortable(previous, signal);
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
