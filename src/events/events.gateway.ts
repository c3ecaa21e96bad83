import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
  type WsResponse,
} from '@nestjs/websockets';
import { TopologyStoreService } from '../topology/topology-store.service';
import { EventBus, type Subscription } from './event-bus';
import { parseEventTypeFilter } from './events.dto';

type TransportEvent = 'drain' | 'close';

/** engine.io 연결. writeBuffer 는 아직 전송 계층으로 넘어가지 못한 패킷이다. */
export interface EventStreamTransport {
  readonly writeBuffer: readonly unknown[];
  once(event: TransportEvent, listener: () => void): unknown;
  off(event: TransportEvent, listener: () => void): unknown;
}

/** 게이트웨이가 실제로 쓰는 socket.io 소켓의 일부. */
export interface EventStreamClient {
  id: string;
  handshake: { query: Record<string, unknown> };
  conn: EventStreamTransport;
  emit(event: string, ...args: unknown[]): unknown;
  disconnect(close?: boolean): unknown;
}

/**
 * WebSocket 게이트웨이: 접속 시 토폴로지 스냅샷을 한 번 보내고, 이후 이벤트를 소켓별 구독으로 중계한다.
 * 소켓마다 버스 구독이 따로 있어서 느린 클라이언트가 다른 클라이언트를 막지 않는다.
 * 전송 버퍼가 빌 때까지 다음 이벤트를 보내지 않으므로, 읽지 않는 클라이언트의 밀린 이벤트는
 * 구독 버퍼에 쌓이고 SUBSCRIBER_OVERFLOW_POLICY 를 따른다.
 */
@Injectable()
@WebSocketGateway({
  cors: { origin: '*' },
  namespace: 'ws/events',
})
export class EventsGateway implements OnGatewayConnection, OnGatewayDisconnect, OnModuleDestroy {
  private readonly logger = new Logger(EventsGateway.name);
  private readonly subscriptions = new Map<string, Subscription>();

  constructor(
    private readonly bus: EventBus,
    private readonly store: TopologyStoreService,
  ) {}

  /** 새 클라이언트가 붙으면 즉시 최신 토폴로지를 한번 푸시한다. */
  handleConnection(client: EventStreamClient): void {
    const types = parseEventTypeFilter(client.handshake.query.event_types);
    client.emit('initial-state', this.store.getTopology());

    const subscription = this.bus.subscribe(
      async (event) => {
        client.emit('topology-event', event);
        await waitForDrain(client.conn);
      },
      {
        name: `ws:${client.id}`,
        filter: types ? (event) => types.has(event.event_type) : undefined,
        onClose: (reason) => {
          this.subscriptions.delete(client.id);
          if (reason === 'overflow') {
            client.disconnect(true);
          }
        },
      },
    );
    this.subscriptions.set(client.id, subscription);
    this.logger.log(`Event stream client connected: ${client.id} (${this.subscriptions.size} connected)`);
  }

  handleDisconnect(client: EventStreamClient): void {
    this.subscriptions.get(client.id)?.close();
    this.logger.log(`Event stream client disconnected: ${client.id}`);
  }

  @SubscribeMessage('ping')
  handlePing(): WsResponse<{ timestamp: string }> {
    return { event: 'pong', data: { timestamp: new Date().toISOString() } };
  }

  get connectedClients(): number {
    return this.subscriptions.size;
  }

  /** 종료 시 구독을 정리한다. */
  onModuleDestroy(): void {
    [...this.subscriptions.values()].forEach((subscription) => subscription.close());
    this.subscriptions.clear();
  }
}

function waitForDrain(conn: EventStreamTransport): Promise<void> {
  if (conn.writeBuffer.length === 0) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    const done = () => {
      conn.off('drain', done);
      conn.off('close', done);
      resolve();
    };
    conn.once('drain', done);
    conn.once('close', done);
  });
}
