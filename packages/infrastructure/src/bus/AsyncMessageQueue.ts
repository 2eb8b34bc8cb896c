type Waiter<T> = (item: T | null) => void;

/**
 * FIFO with awaitable, cancellable takes. At most one item is handed to each
 * waiter; items pushed with no waiter are buffered.
 */
export class AsyncMessageQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  get size(): number {
    return this.items.length;
  }

  take(timeoutMs: number, signal: AbortSignal): Promise<T | null> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (signal.aborted) return Promise.resolve(null);

    return new Promise<T | null>((resolve) => {
      const settle: Waiter<T> = (item) => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        resolve(item);
      };
      const withdraw = (): void => {
        const index = this.waiters.indexOf(settle);
        if (index >= 0) this.waiters.splice(index, 1);
        settle(null);
      };
      const onAbort = (): void => withdraw();
      const timer = setTimeout(withdraw, timeoutMs);
      signal.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(settle);
    });
  }
}
