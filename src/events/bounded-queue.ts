/**
 * 고정 용량 FIFO. 가득 찬 상태에서의 처리 방식은 호출 측이 고른다.
 */
export class BoundedQueue<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /** 공간이 없으면 false 를 돌려주고 아무것도 넣지 않는다. */
  tryPush(item: T): boolean {
    if (this.isFull) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  /** 가득 차 있으면 가장 오래된 항목을 밀어내고 그 항목을 돌려준다. */
  pushDropOldest(item: T): T | undefined {
    let evicted: T | undefined;
    if (this.isFull) {
      evicted = this.items.shift();
    }
    this.items.push(item);
    return evicted;
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  toArray(): T[] {
    return [...this.items];
  }

  clear(): void {
    this.items = [];
  }
}
