import { EventEmitter } from 'events';
import type { OverflowPolicy } from '../config/monitor.config';
import { TopologyStoreService } from '../topology/topology-store.service';
import { EventBus } from './event-bus';
import { EventsGateway, type EventStreamClient } from './events.gateway';
import type { TopologyEvent } from './events.types';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

/** reading 이 false 면 보낸 패킷이 writeBuffer 에 남아 drain 이 오지 않는다. */
class FakeTransport extends EventEmitter {
  writeBuffer: unknown[] = [];
  reading = true;

  resume(): void {
    this.reading = true;
    this.writeBuffer = [];
    this.emit('drain');
  }
}

function createClient(id: string, query: Record<string, unknown> = {}) {
  const emitted: Array<{ event: string; payload: unknown }> = [];
  const disconnect = jest.fn();
  const conn = new FakeTransport();
  const client: EventStreamClient = {
    id,
    handshake: { query },
    conn,
    emit: (event: string, ...args: unknown[]) => {
      emitted.push({ event, payload: args[0] });
      if (!conn.reading) {
        conn.writeBuffer.push(args[0]);
      }
      return true;
    },
    disconnect,
  };
  return { client, conn, emitted, disconnect };
}

function topologyEvents(emitted: Array<{ event: string; payload: unknown }>): TopologyEvent[] {
  return emitted
    .filter((entry) => entry.event === 'topology-event')
    .map((entry) => entry.payload)
    .filter((payload): payload is TopologyEvent => typeof payload === 'object' && payload !== null);
}

describe('EventsGateway', () => {
  let bus: EventBus;
  let store: TopologyStoreService;
  let gateway: EventsGateway;

  const setUp = async (subscriberBufferSize: number, overflowPolicy: OverflowPolicy) => {
    bus = new EventBus({ historySize: 50, subscriberBufferSize, overflowPolicy });
    store = new TopologyStoreService(bus, { linkState: { idleTimeoutMs: 5_000, sweepIntervalMs: 1_000 } });
    gateway = new EventsGateway(bus, store);
    await store.addNode({ id: 'leaf1' });
  };

  beforeEach(async () => {
    await setUp(16, 'drop-oldest');
  });

  afterEach(async () => {
    gateway.onModuleDestroy();
    await bus.close();
  });

  it('sends the topology snapshot first, then live events', async () => {
    const { client, emitted } = createClient('socket-1');

    gateway.handleConnection(client);
    await store.addNode({ id: 'leaf2' });
    await flush();

    expect(emitted[0].event).toBe('initial-state');
    expect(emitted[0].payload).toMatchObject({ nodes: [{ id: 'leaf1' }], links: [] });
    expect(topologyEvents(emitted).map((event) => event.event_type)).toEqual(['node_added']);
  });

  it('honours the event_types query filter', async () => {
    const { client, emitted } = createClient('socket-2', { event_types: 'link_added,link_removed' });

    gateway.handleConnection(client);
    await store.addNode({ id: 'leaf2' });
    await store.addLink({
      id: 'leaf1-leaf2',
      source_node_id: 'leaf1',
      target_node_id: 'leaf2',
      source_interface: 'e1',
      target_interface: 'e2',
    });
    await flush();

    expect(topologyEvents(emitted).map((event) => event.event_type)).toEqual(['link_added']);
  });

  it('releases the bus subscription on disconnect', () => {
    const { client } = createClient('socket-3');

    gateway.handleConnection(client);
    expect(bus.subscriberCount).toBe(1);
    expect(gateway.connectedClients).toBe(1);

    gateway.handleDisconnect(client);
    expect(bus.subscriberCount).toBe(0);
    expect(gateway.connectedClients).toBe(0);
  });

  it('treats all-unknown event_types as no filter', async () => {
    const { client, emitted } = createClient('socket-4', { event_types: 'bogus' });

    gateway.handleConnection(client);
    await store.addNode({ id: 'leaf2' });
    await flush();

    expect(topologyEvents(emitted).map((event) => event.event_type)).toEqual(['node_added']);
  });

  it('disconnects a client that stops reading once its buffer overflows', async () => {
    await setUp(4, 'disconnect');
    const { client, conn, emitted, disconnect } = createClient('slow-1');
    conn.reading = false;

    gateway.handleConnection(client);
    for (let index = 0; index < 10; index += 1) {
      await store.addNode({ id: `host${index}` });
      await flush();
    }

    expect(topologyEvents(emitted)).toHaveLength(1);
    expect(disconnect).toHaveBeenCalledWith(true);
    expect(bus.subscriberCount).toBe(0);
    expect(gateway.connectedClients).toBe(0);
  });

  it('drops the oldest events for a stalled client and delivers the rest once it drains', async () => {
    await setUp(4, 'drop-oldest');
    const { client, conn, emitted, disconnect } = createClient('slow-2');
    conn.reading = false;

    gateway.handleConnection(client);
    for (let index = 1; index <= 10; index += 1) {
      await store.addNode({ id: `host${index}` });
      await flush();
    }
    expect(bus.subscriberStats()[0]).toMatchObject({ pending: 4, dropped: 5 });

    conn.resume();
    await flush();

    const nodeIds = topologyEvents(emitted).map((event) => ('node_id' in event ? event.node_id : null));
    expect(nodeIds).toEqual(['host1', 'host7', 'host8', 'host9', 'host10']);
    expect(disconnect).not.toHaveBeenCalled();
  });

  it('answers ping with pong', () => {
    const response = gateway.handlePing();

    expect(response.event).toBe('pong');
    expect(typeof response.data.timestamp).toBe('string');
  });
});
