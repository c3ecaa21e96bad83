/**
 * 키마다 독립된 promise 체인을 두고 같은 키의 작업을 순서대로 실행한다.
 * 서로 다른 키의 작업은 서로를 기다리지 않는다.
 */
export class KeyedSerialExecutor {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => task());
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  /** 아직 끝나지 않은 체인이 있는 키 수. */
  get activeKeys(): number {
    return this.tails.size;
  }

  /** 현재까지 등록된 모든 작업이 끝날 때까지 기다린다. */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all([...this.tails.values()]);
    }
  }
}
