import { randomUUID } from 'crypto';
import { Logger, type OnApplicationShutdown } from '@nestjs/common';
import { abortableSleep } from '../common/abortable-sleep';
import type { OverflowPolicy } from '../config/monitor.config';
import { BoundedQueue } from './bounded-queue';
import {
  eventLinkId,
  type EventHistoryQuery,
  type TopologyEvent,
  type TopologyEventDraft,
} from './events.types';

export interface EventBusOptions {
  historySize: number;
  subscriberBufferSize: number;
  overflowPolicy: OverflowPolicy;
  /** 애플리케이션 종료 시 버퍼를 비우는 데 허용할 최대 시간. */
  closeGraceMs?: number;
}

export type EventHandler = (event: TopologyEvent) => void | Promise<void>;

export type SubscriptionCloseReason = 'unsubscribed' | 'overflow' | 'bus_closed';

export interface SubscribeOptions {
  name?: string;
  filter?: (event: TopologyEvent) => boolean;
  onClose?: (reason: SubscriptionCloseReason) => void;
}

export interface SubscriptionStats {
  id: string;
  name: string;
  pending: number;
  delivered: number;
  dropped: number;
}

/**
 * 구독자 한 명분의 버퍼와 전달 루프.
 * 핸들러가 느리거나 실패해도 다른 구독자와 publish 쪽에는 영향이 없다.
 */
export class Subscription {
  readonly id = randomUUID();
  private readonly queue: BoundedQueue<TopologyEvent>;
  private pumping = false;
  private idleWaiters: Array<() => void> = [];
  private closeReason: SubscriptionCloseReason | null = null;
  private deliveredCount = 0;
  private droppedCount = 0;

  constructor(
    readonly name: string,
    private readonly handler: EventHandler,
    private readonly overflowPolicy: OverflowPolicy,
    bufferSize: number,
    private readonly filter: ((event: TopologyEvent) => boolean) | undefined,
    private readonly onClose: ((reason: SubscriptionCloseReason) => void) | undefined,
    private readonly detach: (subscription: Subscription) => void,
    private readonly logger: Logger,
  ) {
    this.queue = new BoundedQueue<TopologyEvent>(bufferSize);
  }

  get pending(): number {
    return this.queue.size;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get delivered(): number {
    return this.deliveredCount;
  }

  get closed(): boolean {
    return this.closeReason !== null;
  }

  /** 버스가 호출한다. 필터에 걸리지 않는 이벤트는 조용히 건너뛴다. */
  offer(event: TopologyEvent): void {
    if (this.closed || (this.filter && !this.filter(event))) {
      return;
    }

    if (this.overflowPolicy === 'disconnect') {
      if (!this.queue.tryPush(event)) {
        this.logger.warn(`Subscriber ${this.name} fell ${this.queue.capacity} events behind; disconnecting`);
        this.close('overflow');
        return;
      }
    } else if (this.queue.pushDropOldest(event) !== undefined) {
      this.droppedCount += 1;
    }

    this.schedule();
  }

  close(reason: SubscriptionCloseReason = 'unsubscribed'): void {
    if (this.closed) {
      return;
    }
    this.closeReason = reason;
    this.queue.clear();
    this.detach(this);
    this.resolveIdle();
    if (this.onClose) {
      try {
        this.onClose(reason);
      } catch (error) {
        this.logger.warn(`onClose callback for ${this.name} failed: ${describe(error)}`);
      }
    }
  }

  /** 버퍼가 비고 진행 중인 전달이 끝나면 resolve 된다. */
  whenIdle(): Promise<void> {
    if (this.closed || (!this.pumping && this.queue.size === 0)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  stats(): SubscriptionStats {
    return {
      id: this.id,
      name: this.name,
      pending: this.pending,
      delivered: this.deliveredCount,
      dropped: this.droppedCount,
    };
  }

  private schedule(): void {
    if (this.pumping) {
      return;
    }
    this.pumping = true;
    void this.pump();
  }

  private async pump(): Promise<void> {
    // publish 호출 스택 안에서 핸들러가 돌지 않도록 한 틱 양보한다.
    await Promise.resolve();
    try {
      while (!this.closed) {
        const event = this.queue.shift();
        if (event === undefined) {
          break;
        }
        try {
          await this.handler(event);
          this.deliveredCount += 1;
        } catch (error) {
          this.logger.warn(`Subscriber ${this.name} failed on event #${event.sequence}: ${describe(error)}`);
        }
      }
    } finally {
      this.pumping = false;
      this.resolveIdle();
    }
  }

  private resolveIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}

/**
 * 프로세스 단위 이벤트 버스. 전역 싱글턴이 아니라 생성/종료 시점이 분명한 객체로 다룬다.
 * publish 는 동기이며 어떤 구독자도 기다리지 않는다.
 */
export class EventBus implements OnApplicationShutdown {
  private readonly logger = new Logger(EventBus.name);
  private readonly history: BoundedQueue<TopologyEvent>;
  private readonly subscriptions = new Map<string, Subscription>();
  private sequence = 0;
  private closed = false;

  constructor(private readonly options: EventBusOptions) {
    this.history = new BoundedQueue<TopologyEvent>(options.historySize);
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /** 지금까지 publish 된 이벤트 수. */
  get eventCount(): number {
    return this.sequence;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  publish(draft: TopologyEventDraft): TopologyEvent {
    this.sequence += 1;
    const event: TopologyEvent = { ...draft, sequence: this.sequence };
    this.history.pushDropOldest(event);
    for (const subscription of [...this.subscriptions.values()]) {
      subscription.offer(event);
    }
    return event;
  }

  subscribe(handler: EventHandler, options: SubscribeOptions = {}): Subscription {
    if (this.closed) {
      throw new Error('Event bus is closed');
    }
    const subscription = new Subscription(
      options.name ?? `subscriber-${this.subscriptions.size + 1}`,
      handler,
      this.options.overflowPolicy,
      this.options.subscriberBufferSize,
      options.filter,
      options.onClose,
      (closed) => this.subscriptions.delete(closed.id),
      this.logger,
    );
    this.subscriptions.set(subscription.id, subscription);
    this.logger.debug(`Subscriber attached: ${subscription.name} (${this.subscriptions.size} total)`);
    return subscription;
  }

  /** 최근 이벤트를 오래된 순으로 돌려준다. limit 은 필터 적용 후 마지막 N 개. */
  getHistory(query: EventHistoryQuery = {}): TopologyEvent[] {
    const matches = this.history
      .toArray()
      .filter(
        (event) =>
          (query.event_type === undefined || event.event_type === query.event_type) &&
          (query.link_id === undefined || eventLinkId(event) === query.link_id),
      );
    if (query.limit !== undefined && query.limit >= 0) {
      return query.limit === 0 ? [] : matches.slice(-query.limit);
    }
    return matches;
  }

  subscriberStats(): SubscriptionStats[] {
    return [...this.subscriptions.values()].map((subscription) => subscription.stats());
  }

  /**
   * 새 구독을 막고, graceMs 동안 남은 버퍼가 전달되기를 기다린 뒤 모든 구독을 닫는다.
   */
  async close(graceMs = 0): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const subscriptions = [...this.subscriptions.values()];
    if (graceMs > 0 && subscriptions.length > 0) {
      const controller = new AbortController();
      const drained = await Promise.race([
        Promise.all(subscriptions.map((subscription) => subscription.whenIdle())).then(() => true),
        abortableSleep(graceMs, controller.signal).then(() => false),
      ]);
      controller.abort();
      if (!drained) {
        this.logger.warn(`Closing event bus with undelivered events after ${graceMs} ms`);
      }
    }

    subscriptions.forEach((subscription) => subscription.close('bus_closed'));
    this.subscriptions.clear();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.close(this.options.closeGraceMs ?? 0);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
