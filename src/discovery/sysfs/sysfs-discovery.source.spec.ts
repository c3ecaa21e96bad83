import type { RawObservation } from '../discovery.types';
import type { InterfaceCounterReader, InterfaceCounters } from './sysfs-counter.reader';
import { mapOperState } from './sysfs-counter.reader';
import { SysfsDiscoverySource } from './sysfs-discovery.source';

class FakeReader implements InterfaceCounterReader {
  readonly operStates = new Map<string, Array<'up' | 'down' | null>>();
  readonly counterReads: string[] = [];
  private bytes = 0;

  async listInterfaces() {
    return [
      { iface: 'lo', speedMbps: null },
      { iface: 'eth0', speedMbps: 1000 },
      { iface: 'eth1', speedMbps: null },
    ];
  }

  async readCounters(iface: string): Promise<InterfaceCounters> {
    this.counterReads.push(iface);
    this.bytes += 100;
    return { rxBytes: this.bytes, txBytes: this.bytes, rxPackets: 1, txPackets: 1 };
  }

  async readOperState(iface: string) {
    const queue = this.operStates.get(iface) ?? [];
    if (queue.length > 1) {
      return queue.shift() ?? null;
    }
    return queue[0] ?? null;
  }
}

async function collect(
  source: SysfsDiscoverySource,
  stopWhen: (observations: RawObservation[]) => boolean,
): Promise<RawObservation[]> {
  const controller = new AbortController();
  const observations: RawObservation[] = [];
  for await (const observation of source.observe(controller.signal)) {
    observations.push(observation);
    if (stopWhen(observations)) {
      controller.abort();
    }
  }
  return observations;
}

describe('mapOperState', () => {
  it('maps kernel operstates onto up/down signals', () => {
    expect(mapOperState('up\n')).toBe('up');
    expect(mapOperState('down')).toBe('down');
    expect(mapOperState('lowerlayerdown')).toBe('down');
    expect(mapOperState('unknown')).toBeNull();
  });
});

describe('SysfsDiscoverySource', () => {
  it('emits the initial status and then only changes', async () => {
    const reader = new FakeReader();
    reader.operStates.set('eth0', ['up', 'up', 'up', 'down']);
    const source = new SysfsDiscoverySource(reader, {
      pollIntervalMs: 1_000,
      linkStatusIntervalMs: 1,
      interfaces: ['eth0'],
    });

    const observations = await collect(
      source,
      (seen) => seen.filter((observation) => observation.kind === 'status').length === 2,
    );
    const statuses = observations.flatMap((observation) =>
      observation.kind === 'status' ? [`${observation.iface}:${observation.status}`] : [],
    );

    expect(statuses).toEqual(['eth0:up', 'eth0:down']);
  });

  it('polls counters for every monitored interface except lo', async () => {
    const reader = new FakeReader();
    const source = new SysfsDiscoverySource(reader, {
      pollIntervalMs: 1,
      linkStatusIntervalMs: 1_000,
      interfaces: [],
    });

    const observations = await collect(
      source,
      (seen) => seen.filter((observation) => observation.kind === 'counters').length >= 4,
    );
    const counters = observations.flatMap((observation) => (observation.kind === 'counters' ? [observation] : []));

    expect(new Set(counters.map((observation) => observation.iface))).toEqual(new Set(['eth0', 'eth1']));
    expect(reader.counterReads).not.toContain('lo');
    expect(counters.find((observation) => observation.iface === 'eth0')?.speedMbps).toBe(1000);
    expect(counters.find((observation) => observation.iface === 'eth1')?.speedMbps).toBeUndefined();
  });

  it('stops promptly when aborted', async () => {
    const reader = new FakeReader();
    const source = new SysfsDiscoverySource(reader, {
      pollIntervalMs: 60_000,
      linkStatusIntervalMs: 60_000,
      interfaces: [],
    });
    const controller = new AbortController();
    const iterator = source.observe(controller.signal)[Symbol.asyncIterator]();

    const first = await iterator.next();
    controller.abort();
    const drained: RawObservation[] = [];
    for (let result = await iterator.next(); !result.done; result = await iterator.next()) {
      drained.push(result.value);
    }

    expect(first.done).toBe(false);
    expect(drained.length).toBeLessThanOrEqual(2);
  });
});
