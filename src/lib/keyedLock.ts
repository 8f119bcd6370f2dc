export class LockTimeoutError extends Error {
  constructor(
    public readonly key: string,
    public readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for lock "${key}"`);
    this.name = "LockTimeoutError";
  }
}

function waitWithTimeout(pending: Promise<void>, key: string, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new LockTimeoutError(key, timeoutMs)), timeoutMs);
  });

  return Promise.race([pending, timeout]).finally(() => {
    clearTimeout(timer);
  });
}

/**
 * In-process FIFO mutex per key. Holders run one at a time per key; a waiter
 * that cannot get in within `timeoutMs` gets `LockTimeoutError` and leaves the
 * queue without ever running its task.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, timeoutMs: number, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await waitWithTimeout(previous, key, timeoutMs);
    } catch (error) {
      // Our place in the queue stays until the holder ahead of us is done.
      release();
      void tail.then(() => this.forget(key, tail));
      throw error;
    }

    try {
      return await task();
    } finally {
      release();
      this.forget(key, tail);
    }
  }

  private forget(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
