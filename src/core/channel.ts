/**
 * Single-producer, single-consumer queue between a watcher and the loop that
 * owns it. The producer pushes and eventually closes; the consumer awaits
 * `receive()`, which resolves `undefined` once the channel is closed and empty.
 */
export class EventChannel<T> {
  private readonly queue: T[] = [];
  private waiter: ((value: T | undefined) => void) | undefined;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    if (this.closed) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(value);
      return;
    }
    this.queue.push(value);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(undefined);
  }

  receive(): Promise<T | undefined> {
    if (this.queue.length > 0) return Promise.resolve(this.queue.shift());
    if (this.closed) return Promise.resolve(undefined);
    if (this.waiter) {
      return Promise.reject(new Error('EventChannel already has a pending receive'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Wait `windowMs`, then discard and return everything queued meanwhile. */
  async drain(windowMs: number): Promise<T[]> {
    if (windowMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, windowMs));
    }
    return this.queue.splice(0, this.queue.length);
  }
}
