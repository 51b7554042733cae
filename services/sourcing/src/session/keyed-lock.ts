/**
 * Per-key promise chain: work submitted under the same key runs one at a
 * time, in submission order. Different keys never wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    // The chain continues whether `fn` succeeds or fails
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with queued or running work */
  pending(): number {
    return this.tails.size;
  }
}
