/**
 * One-shot completions correlating an outbound request with its server ack.
 */

interface PendingEntry<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Outstanding requests keyed by id. Every entry is removed when it is
 * resolved, rejected or timed out, whichever comes first.
 */
export class PendingRequests<T> {
  private entries: Map<string, PendingEntry<T>> = new Map();
  private promises: Map<string, Promise<T>> = new Map();

  /**
   * Register a completion. Registering an id that is still pending returns
   * the existing promise, so concurrent callers share one ack.
   */
  register(id: string, timeoutMs: number, onTimeout: () => Error): Promise<T> {
    const existing = this.promises.get(id);
    if (existing) {
      return existing;
    }

    const promise = new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.entries.get(id)?.timer === timer) {
          this.entries.delete(id);
          this.promises.delete(id);
          reject(onTimeout());
        }
      }, timeoutMs);
      this.entries.set(id, { resolve, reject, timer });
    });
    this.promises.set(id, promise);
    return promise;
  }

  /**
   * Complete a pending request. Returns false if nothing was waiting.
   */
  resolve(id: string, value: T): boolean {
    const entry = this.take(id);
    if (!entry) return false;
    entry.resolve(value);
    return true;
  }

  /**
   * Fail a pending request. Returns false if nothing was waiting.
   */
  reject(id: string, error: Error): boolean {
    const entry = this.take(id);
    if (!entry) return false;
    entry.reject(error);
    return true;
  }

  /**
   * Fail everything still outstanding.
   */
  rejectAll(error: Error): number {
    const ids = Array.from(this.entries.keys());
    for (const id of ids) {
      this.reject(id, error);
    }
    return ids.length;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  size(): number {
    return this.entries.size;
  }

  private take(id: string): PendingEntry<T> | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    clearTimeout(entry.timer);
    this.entries.delete(id);
    this.promises.delete(id);
    return entry;
  }
}
