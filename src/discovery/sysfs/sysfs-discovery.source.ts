import { Logger } from '@nestjs/common';
import { abortableSleep } from '../../common/abortable-sleep';
import { systemClock, type Clock } from '../../common/clock';
import type { InterfaceStatus } from '../../topology/topology.types';
import { describeError } from '../backoff';
import type { DiscoverySource, RawObservation } from '../discovery.types';
import { ObservationChannel } from '../observation-channel';
import type { InterfaceCounterReader, MonitoredInterface } from './sysfs-counter.reader';

export interface SysfsSourceOptions {
  pollIntervalMs: number;
  linkStatusIntervalMs: number;
  /** 비어 있으면 lo 를 제외한 모든 인터페이스. */
  interfaces: string[];
  interfaceRefreshMs?: number;
  channelCapacity?: number;
}

const DEFAULT_INTERFACE_REFRESH_MS = 30_000;

/**
 * 로컬 인터페이스 관측 소스.
 * 카운터 폴러와 operstate 감시 루프가 독립적으로 돌면서 하나의 채널로 관측값을 내보낸다.
 */
export class SysfsDiscoverySource implements DiscoverySource {
  readonly name = 'sysfs' as const;
  private readonly logger = new Logger(SysfsDiscoverySource.name);
  private interfaces: MonitoredInterface[] = [];
  private interfacesLoadedAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly reader: InterfaceCounterReader,
    private readonly options: SysfsSourceOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  async *observe(signal: AbortSignal): AsyncGenerator<RawObservation> {
    const inner = new AbortController();
    const abortInner = () => inner.abort();
    signal.addEventListener('abort', abortInner, { once: true });
    if (signal.aborted) {
      inner.abort();
    }

    const channel = new ObservationChannel<RawObservation>(this.options.channelCapacity ?? 1024, inner.signal);
    await this.refreshInterfaces(true);
    this.logger.log(
      `Watching ${this.interfaces.length} interface(s): ${this.interfaces.map((entry) => entry.iface).join(', ') || '-'}`,
    );

    const loops = Promise.all([
      this.watchLinkStatus(channel, inner.signal),
      this.pollCounters(channel, inner.signal),
    ]).finally(() => channel.close());

    try {
      yield* channel;
    } finally {
      inner.abort();
      signal.removeEventListener('abort', abortInner);
      await loops;
    }
  }

  /** 초기 상태를 한 번 내보내고 이후에는 바뀔 때만 내보낸다. */
  private async watchLinkStatus(channel: ObservationChannel<RawObservation>, signal: AbortSignal): Promise<void> {
    const previous = new Map<string, InterfaceStatus>();
    while (!signal.aborted) {
      await this.refreshInterfaces(false);
      for (const { iface } of this.interfaces) {
        const status = await this.safeRead(() => this.reader.readOperState(iface), `operstate ${iface}`);
        if (!status || previous.get(iface) === status) {
          continue;
        }
        previous.set(iface, status);
        channel.push({ kind: 'status', iface, status, timestamp: this.clock() });
      }
      await abortableSleep(this.options.linkStatusIntervalMs, signal);
    }
  }

  private async pollCounters(channel: ObservationChannel<RawObservation>, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      for (const { iface, speedMbps } of this.interfaces) {
        const counters = await this.safeRead(() => this.reader.readCounters(iface), `counters ${iface}`);
        if (!counters) {
          continue;
        }
        channel.push({
          kind: 'counters',
          iface,
          ...counters,
          speedMbps: speedMbps ?? undefined,
          timestamp: this.clock(),
        });
      }
      await abortableSleep(this.options.pollIntervalMs, signal);
    }
  }

  private async refreshInterfaces(force: boolean): Promise<void> {
    const refreshMs = this.options.interfaceRefreshMs ?? DEFAULT_INTERFACE_REFRESH_MS;
    const now = this.clock();
    if (!force && now - this.interfacesLoadedAt < refreshMs) {
      return;
    }
    this.interfacesLoadedAt = now;
    const listed = await this.safeRead(() => this.reader.listInterfaces(), 'interface list');
    if (!listed) {
      return;
    }
    const wanted = new Set(this.options.interfaces);
    this.interfaces = listed.filter(
      (entry) => entry.iface !== 'lo' && (wanted.size === 0 || wanted.has(entry.iface)),
    );
  }

  /** 읽기 실패는 이번 주기만 건너뛴다. */
  private async safeRead<T>(read: () => Promise<T>, label: string): Promise<T | null> {
    try {
      return await read();
    } catch (error) {
      this.logger.debug(`Failed to read ${label}: ${describeError(error)}`);
      return null;
    }
  }
}
