// Line Queue - push-based buffer exposed as an async iterator
// Producers push from event callbacks; the consumer pulls one item at a time

interface PendingRead<T> {
  resolve(result: IteratorResult<T>): void;
  reject(error: unknown): void;
}

export interface LineQueueOptions {
  /** Buffered items at which the producer is asked to pause */
  highWaterMark?: number;
  onPause?(): void;
  onResume?(): void;
}

export const DEFAULT_HIGH_WATER_MARK = 1000;

export class LineQueue<T extends object> implements AsyncIterableIterator<T> {
  private readonly buffered: T[] = [];
  private readonly pending: PendingRead<T>[] = [];
  private readonly highWaterMark: number;
  private readonly lowWaterMark: number;
  private ended = false;
  private paused = false;
  private failure?: Error;

  constructor(private readonly options: LineQueueOptions = {}) {
    this.highWaterMark = Math.max(1, options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK);
    this.lowWaterMark = Math.floor(this.highWaterMark / 2);
  }

  push(item: T): void {
    if (this.ended) return;
    const reader = this.pending.shift();
    if (reader) {
      reader.resolve({ value: item, done: false });
      return;
    }

    this.buffered.push(item);
    if (!this.paused && this.buffered.length >= this.highWaterMark) {
      this.paused = true;
      this.options.onPause?.();
    }
  }

  /**
   * No more items. Buffered items are still delivered; a failure is raised
   * to the consumer after them.
   */
  end(failure?: Error): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = failure;

    for (const reader of this.pending.splice(0)) {
      if (failure) {
        reader.reject(failure);
      } else {
        reader.resolve({ value: undefined, done: true });
      }
    }
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.buffered.shift();
    if (item !== undefined) {
      if (this.paused && this.buffered.length <= this.lowWaterMark) {
        this.resume();
      }
      return Promise.resolve({ value: item, done: false });
    }
    if (this.ended) {
      if (this.failure) {
        const failure = this.failure;
        this.failure = undefined;
        return Promise.reject(failure);
      }
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  return(): Promise<IteratorResult<T>> {
    this.buffered.length = 0;
    this.end();
    if (this.paused) {
      this.resume();
    }
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private resume(): void {
    this.paused = false;
    this.options.onResume?.();
  }
}
