/**
 * Unbounded single-consumer channel. Producers push results as their work
 * settles; the consumer awaits them one at a time in arrival order.
 */
export class CompletionChannel<T> {
  private buffered: Array<{ value: T }> = [];
  private waiters: Array<(value: T) => void> = [];
  private closed = false;

  push(value: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
    } else {
      this.buffered.push({ value });
    }
  }

  next(): Promise<T> {
    const item = this.buffered.shift();
    if (item) {
      return Promise.resolve(item.value);
    }
    if (this.closed) {
      return Promise.reject(new Error('Channel closed'));
    }
    return new Promise<T>(resolve => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Drop buffered values and ignore later pushes
   */
  close(): void {
    this.closed = true;
    this.buffered = [];
  }

  get size(): number {
    return this.buffered.length;
  }
}
