import { BoundedQueue } from '../events/bounded-queue';

/**
 * 여러 생산 루프가 밀어 넣고 하나의 소비자가 for await 로 꺼내는 채널.
 * 소비자가 느리면 가장 오래된 항목부터 버린다. signal 이 abort 되면 대기 중인 소비자가 곧바로 끝난다.
 */
export class ObservationChannel<T> implements AsyncIterable<T> {
  private readonly queue: BoundedQueue<T>;
  private waiter: (() => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(capacity: number, signal?: AbortSignal) {
    this.queue = new BoundedQueue<T>(capacity);
    if (signal?.aborted) {
      this.closed = true;
    } else {
      signal?.addEventListener('abort', () => this.close(), { once: true });
    }
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) {
      return;
    }
    if (this.queue.pushDropOldest(item) !== undefined) {
      this.droppedCount += 1;
    }
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = this.queue.shift();
      if (item !== undefined) {
        yield item;
        continue;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
