import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { abortableSleep } from '../common/abortable-sleep';
import { CLOCK, systemClock, type Clock } from '../common/clock';
import { MONITOR_CONFIG, type MonitorConfig } from '../config/monitor.config';
import { TopologyStoreService, type MutationResult } from '../topology/topology-store.service';
import { UnknownEntityError } from '../topology/topology.errors';
import type { ChangeSource, TopologyLink } from '../topology/topology.types';
import { describeError, runWithReconnect } from './backoff';
import {
  DISCOVERY_SOURCES,
  type DiscoverySource,
  type DiscoverySourceName,
  type DiscoverySourceStatus,
  type ObservationOutcome,
  type RawCounterSample,
  type RawLinkStatus,
  type RawObservation,
} from './discovery.types';
import { ObservationNormalizer } from './observation-normalizer';

const SILENCE_CHECK_NAME = 'discovery-silence-check';

interface SourceState {
  running: boolean;
  observations: number;
  startedAt: number;
  lastObservationAt: number | null;
  silent: boolean;
  lastError: string | null;
}

/**
 * 설정으로 고른 Discovery Source 들을 각각 독립 작업으로 돌리고,
 * 관측값을 Normalizer → TopologyStore 로 흘려보낸다.
 */
@Injectable()
export class DiscoveryService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(DiscoveryService.name);
  private readonly normalizer = new ObservationNormalizer();
  private readonly controller = new AbortController();
  private readonly states = new Map<DiscoverySourceName, SourceState>();
  private tasks: Promise<void>[] = [];

  constructor(
    @Inject(DISCOVERY_SOURCES) private readonly sources: DiscoverySource[],
    private readonly store: TopologyStoreService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(MONITOR_CONFIG) private readonly config: MonitorConfig,
    @Optional() @Inject(CLOCK) private readonly clock: Clock = systemClock,
  ) {}

  /** 앱이 뜬 뒤 소스별 작업과 무응답 감시 타이머를 시작한다. */
  onApplicationBootstrap(): void {
    this.tasks = this.sources.map((source) => this.run(source));
    if (this.sources.length === 0) {
      return;
    }

    const { silenceGraceMs } = this.config.discovery;
    const interval = setInterval(() => {
      this.checkSilence();
      this.pruneBaselines();
    }, Math.max(1000, Math.floor(silenceGraceMs / 2)));
    this.schedulerRegistry.addInterval(SILENCE_CHECK_NAME, interval);
    this.logger.log(`Discovery sources started: ${this.sources.map((source) => source.name).join(', ')}`);
  }

  /** 모든 소스를 취소하고 SHUTDOWN_GRACE_MS 까지만 기다린다. */
  async onModuleDestroy(): Promise<void> {
    if (this.schedulerRegistry.doesExist('interval', SILENCE_CHECK_NAME)) {
      this.schedulerRegistry.deleteInterval(SILENCE_CHECK_NAME);
    }
    this.controller.abort();

    const timer = new AbortController();
    const finished = await Promise.race([
      Promise.all(this.tasks).then(() => true),
      abortableSleep(this.config.discovery.shutdownGraceMs, timer.signal).then(() => false),
    ]);
    timer.abort();
    if (!finished) {
      this.logger.warn(`Discovery sources did not stop within ${this.config.discovery.shutdownGraceMs} ms`);
    }
  }

  /**
   * 관측 하나를 스토어에 반영한다.
   * 링크를 찾지 못하거나 반영 도중 링크가 지워지면 unmapped 로 끝난다.
   */
  async apply(observation: RawObservation, source: ChangeSource): Promise<ObservationOutcome> {
    try {
      switch (observation.kind) {
        case 'counters':
          return await this.applyCounters(observation, source);
        case 'status': {
          const link = this.resolveLink(observation);
          if (!link) {
            return { status: 'unmapped', iface: observation.iface, linkId: observation.linkId };
          }
          return toOutcome(
            await this.store.applyInterfaceStatus(link.id, observation.status, {
              timestamp: observation.timestamp,
              source,
            }),
          );
        }
        case 'metrics':
          return toOutcome(
            await this.store.upsertMetrics(observation.linkId, observation.metrics, {
              timestamp: observation.timestamp,
              source,
            }),
          );
        case 'state':
          return toOutcome(
            await this.store.setState(observation.linkId, observation.state, {
              timestamp: observation.timestamp,
              source,
            }),
          );
      }
    } catch (error) {
      if (error instanceof UnknownEntityError) {
        return { status: 'unmapped', linkId: observation.linkId };
      }
      throw error;
    }
  }

  getStatus(): DiscoverySourceStatus[] {
    return this.sources.map((source) => {
      const state = this.states.get(source.name);
      return {
        name: source.name,
        running: state?.running ?? false,
        observations: state?.observations ?? 0,
        last_observation_at:
          state?.lastObservationAt != null ? new Date(state.lastObservationAt).toISOString() : null,
        silent: state?.silent ?? false,
        last_error: state?.lastError ?? null,
      };
    });
  }

  /**
   * UPSTREAM_SILENCE_GRACE_SECONDS 동안 관측이 없는 소스를 보고한다. 링크 state 는 건드리지 않는다.
   * 에이전트 푸시는 보낼 것이 없으면 조용한 것이 정상이라 제외한다.
   */
  checkSilence(now: number = this.clock()): DiscoverySourceName[] {
    const silent: DiscoverySourceName[] = [];
    for (const [name, state] of this.states) {
      if (name === 'agent' || !state.running) {
        continue;
      }
      const quietSince = state.lastObservationAt ?? state.startedAt;
      const isSilent = now - quietSince > this.config.discovery.silenceGraceMs;
      if (isSilent && !state.silent) {
        this.logger.warn(`No observations from ${name} for ${Math.round((now - quietSince) / 1000)} s`);
      } else if (!isSilent && state.silent) {
        this.logger.log(`Observations from ${name} resumed`);
      }
      state.silent = isSilent;
      if (isSilent) {
        silent.push(name);
      }
    }
    return silent;
  }

  /** 지워진 링크와 그 인터페이스의 카운터 기준선을 버린다. */
  pruneBaselines(): number {
    const keys = new Set<string>();
    for (const link of this.store.getLinks()) {
      keys.add(link.id);
      keys.add(ObservationNormalizer.keyFor({ iface: link.source_interface }));
      keys.add(ObservationNormalizer.keyFor({ iface: link.target_interface }));
    }
    const removed = this.normalizer.retain(keys);
    if (removed > 0) {
      this.logger.debug(`Dropped ${removed} counter baseline(s) for removed links`);
    }
    return removed;
  }

  private async run(source: DiscoverySource): Promise<void> {
    const state: SourceState = {
      running: true,
      observations: 0,
      startedAt: this.clock(),
      lastObservationAt: null,
      silent: false,
      lastError: null,
    };
    this.states.set(source.name, state);

    try {
      await runWithReconnect(
        async (signal) => {
          for await (const observation of source.observe(signal)) {
            state.observations += 1;
            state.lastObservationAt = this.clock();
            await this.applySafely(observation, source.name, state);
          }
        },
        {
          name: `${source.name} discovery`,
          policy: this.config.discovery.reconnect,
          signal: this.controller.signal,
          logger: this.logger,
          onDisconnect: (error) => {
            state.lastError = error === null ? null : describeError(error);
          },
        },
      );
    } finally {
      state.running = false;
    }
  }

  /** 관측 하나의 실패가 소스 작업을 멈추지 않도록 여기서 기록하고 넘어간다. */
  private async applySafely(observation: RawObservation, source: DiscoverySourceName, state: SourceState) {
    try {
      const outcome = await this.apply(observation, source);
      if (outcome.status === 'unmapped' && observation.kind !== 'counters') {
        this.logger.debug(`Unmapped ${observation.kind} observation from ${source}`);
      }
    } catch (error) {
      state.lastError = describeError(error);
      this.logger.warn(`Failed to apply ${observation.kind} observation from ${source}: ${state.lastError}`);
    }
  }

  private async applyCounters(sample: RawCounterSample, source: ChangeSource): Promise<ObservationOutcome> {
    const link = this.resolveLink(sample);
    if (!link) {
      return { status: 'unmapped', iface: sample.iface, linkId: sample.linkId };
    }
    const speedMbps = link.speed_mbps > 0 ? link.speed_mbps : sample.speedMbps ?? 0;
    const update = this.normalizer.normalize(sample, speedMbps);
    if (!update) {
      return { status: 'baseline', linkId: link.id };
    }
    return toOutcome(
      await this.store.upsertMetrics(link.id, update.metrics, { timestamp: update.timestamp, source }),
    );
  }

  private resolveLink(observation: RawCounterSample | RawLinkStatus): TopologyLink | undefined {
    if (observation.linkId) {
      return this.store.getLink(observation.linkId);
    }
    return this.store.findLinkByInterface(observation.iface);
  }
}

function toOutcome(result: MutationResult): ObservationOutcome {
  if (!result.applied) {
    return { status: 'stale', link: result.link };
  }
  return {
    status: 'applied',
    link: result.link,
    stateChanged: result.events.some((event) => event.event_type === 'link_state_change'),
  };
}
