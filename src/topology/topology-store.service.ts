import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { z } from 'zod';
import { CLOCK, systemClock, type Clock } from '../common/clock';
import { MONITOR_CONFIG, type MonitorConfig } from '../config/monitor.config';
import { EventBus } from '../events/event-bus';
import type { TopologyEvent } from '../events/events.types';
import { KeyedSerialExecutor } from './keyed-serial-executor';
import { INITIAL_LINK_STATE, hasTraffic, nextLinkState, type LinkTrigger } from './link-state-machine';
import { CreateLinkSchema, CreateNodeSchema, LinkMetricsSchema } from './topology.dto';
import {
  DuplicateEntityError,
  NodeInUseError,
  TopologyValidationError,
  UnknownEntityError,
} from './topology.errors';
import {
  LINK_STATES,
  MAX_CLOCK_SKEW_MS,
  emptyMetrics,
  type ChangeSource,
  type InterfaceStatus,
  type LinkFilter,
  type LinkMetrics,
  type LinkState,
  type TopologyLink,
  type TopologyNode,
  type TopologySnapshot,
  type TopologyStats,
} from './topology.types';

export type NodeSpec = z.input<typeof CreateNodeSchema>;
export type LinkSpec = z.input<typeof CreateLinkSchema>;
export type MetricsSpec = z.input<typeof LinkMetricsSchema>;

export interface MutationOptions {
  /** 관측 시각(ms). 생략하면 주입된 clock 의 현재 시각. 현재 시각 + MAX_CLOCK_SKEW_MS 를 넘으면 거기로 자른다. */
  timestamp?: number;
  source?: ChangeSource;
}

export interface MutationResult {
  /** false 면 last_updated 보다 오래된 setState 라서 무시된 것이다. */
  applied: boolean;
  link: TopologyLink;
  events: TopologyEvent[];
}

interface LinkRecord {
  link: TopologyLink;
  lastUpdatedMs: number;
  /** 마지막으로 트래픽이 관측된 시각. idle sweep 의 기준. */
  lastTrafficAt: number | null;
}

/**
 * 노드/링크 레코드의 유일한 소유자.
 * 링크 단위 변경은 KeyedSerialExecutor 로 직렬화되고, 상태 기계 평가와 이벤트 발행이 한 구간 안에서 끝난다.
 */
@Injectable()
export class TopologyStoreService {
  private readonly logger = new Logger(TopologyStoreService.name);
  private readonly nodes = new Map<string, TopologyNode>();
  private readonly links = new Map<string, LinkRecord>();
  private readonly interfaceIndex = new Map<string, string[]>();
  private readonly executor = new KeyedSerialExecutor();
  private readonly idleTimeoutMs: number;

  constructor(
    private readonly bus: EventBus,
    @Inject(MONITOR_CONFIG) config: Pick<MonitorConfig, 'linkState'>,
    @Optional() @Inject(CLOCK) private readonly clock: Clock = systemClock,
  ) {
    this.idleTimeoutMs = config.linkState.idleTimeoutMs;
  }

  async addNode(spec: NodeSpec, source: ChangeSource = 'api'): Promise<TopologyNode> {
    const input = parseOrThrow(CreateNodeSchema, spec);
    if (this.nodes.has(input.id)) {
      throw new DuplicateEntityError('node', input.id);
    }

    const node: TopologyNode = {
      id: input.id,
      label: input.label ?? input.id,
      type: input.type,
      status: input.status,
      platform: input.platform ?? null,
      metadata: { ...input.metadata },
    };
    this.nodes.set(node.id, node);
    this.bus.publish({
      event_type: 'node_added',
      node_id: node.id,
      node: copyNode(node),
      timestamp: this.isoNow(),
      source,
    });
    this.logger.log(`Node added: ${node.id} (${node.type})`);
    return copyNode(node);
  }

  /** 링크가 참조 중인 노드는 지우지 않는다. */
  async removeNode(nodeId: string, source: ChangeSource = 'api'): Promise<void> {
    if (!this.nodes.has(nodeId)) {
      throw new UnknownEntityError('node', nodeId);
    }
    const referencing = [...this.links.values()]
      .filter(({ link }) => link.source_node_id === nodeId || link.target_node_id === nodeId)
      .map(({ link }) => link.id);
    if (referencing.length > 0) {
      throw new NodeInUseError(nodeId, referencing);
    }

    this.nodes.delete(nodeId);
    this.bus.publish({ event_type: 'node_removed', node_id: nodeId, timestamp: this.isoNow(), source });
    this.logger.log(`Node removed: ${nodeId}`);
  }

  async addLink(spec: LinkSpec, source: ChangeSource = 'api'): Promise<TopologyLink> {
    const input = parseOrThrow(CreateLinkSchema, spec);
    return this.executor.run(input.id, () => {
      if (this.links.has(input.id)) {
        throw new DuplicateEntityError('link', input.id);
      }
      const missing = [input.source_node_id, input.target_node_id].filter((id) => !this.nodes.has(id));
      if (missing.length > 0) {
        throw new TopologyValidationError(`Link ${input.id} references unknown node(s): ${missing.join(', ')}`);
      }

      const now = this.clock();
      const link: TopologyLink = {
        id: input.id,
        source_node_id: input.source_node_id,
        target_node_id: input.target_node_id,
        source_interface: input.source_interface,
        target_interface: input.target_interface,
        state: INITIAL_LINK_STATE,
        metrics: emptyMetrics(),
        speed_mbps: input.speed_mbps,
        mtu: input.mtu,
        last_updated: new Date(now).toISOString(),
        metadata: { ...input.metadata },
      };
      this.links.set(link.id, { link, lastUpdatedMs: now, lastTrafficAt: null });
      this.indexInterfaces(link);
      this.bus.publish({
        event_type: 'link_added',
        link_id: link.id,
        link: copyLink(link),
        timestamp: link.last_updated,
        source,
      });
      this.logger.log(`Link added: ${link.id} (${link.source_node_id} <-> ${link.target_node_id})`);
      return copyLink(link);
    });
  }

  async removeLink(linkId: string, source: ChangeSource = 'api'): Promise<void> {
    await this.executor.run(linkId, () => {
      const record = this.requireRecord(linkId);
      this.links.delete(linkId);
      this.unindexInterfaces(record.link);
      this.bus.publish({ event_type: 'link_removed', link_id: linkId, timestamp: this.isoNow(), source });
      this.logger.log(`Link removed: ${linkId}`);
    });
  }

  /**
   * 메트릭 저장 → 상태 기계 평가 → metrics_update 발행 → (전이 시) link_state_change 발행.
   * 트래픽이 0 인 갱신은 곧바로 idle 로 내리지 않는다. 강등은 sweep 이 담당한다.
   * 관측은 시각이 last_updated 보다 이르더라도 반영하고, last_updated 는 뒤로 가지 않는다.
   */
  async upsertMetrics(linkId: string, spec: MetricsSpec, options: MutationOptions = {}): Promise<MutationResult> {
    const metrics = parseOrThrow(LinkMetricsSchema, spec);
    return this.executor.run(linkId, () => {
      const record = this.requireRecord(linkId);
      const timestamp = this.observedAt(record, options.timestamp);
      const source = options.source ?? 'api';

      record.link.metrics = { ...metrics };
      this.touch(record, timestamp);
      const traffic = hasTraffic(metrics);
      if (traffic) {
        record.lastTrafficAt = timestamp;
      }

      const events: TopologyEvent[] = [
        this.bus.publish({
          event_type: 'metrics_update',
          link_id: linkId,
          metrics: { ...record.link.metrics },
          timestamp: record.link.last_updated,
          source,
        }),
      ];
      if (traffic) {
        const change = this.transition(record, { type: 'traffic' }, source);
        if (change) {
          events.push(change);
        }
      }
      return { applied: true, link: copyLink(record.link), events };
    });
  }

  /**
   * 명시적 상태 지정. 같은 state 면 last_updated 만 갱신하고 이벤트는 없다.
   * 겹치는 지정은 시각 순서로 정리되어 last_updated 보다 이른 지정은 무시된다.
   */
  async setState(linkId: string, state: LinkState, options: MutationOptions = {}): Promise<MutationResult> {
    if (!LINK_STATES.includes(state)) {
      throw new TopologyValidationError(`Invalid link state: ${String(state)}`);
    }
    return this.executor.run(linkId, () => {
      const record = this.requireRecord(linkId);
      const timestamp = this.clampToNow(options.timestamp);
      if (this.isStale(record, timestamp)) {
        return { applied: false, link: copyLink(record.link), events: [] };
      }

      this.touch(record, timestamp);
      if (state === 'active') {
        record.lastTrafficAt = timestamp;
      }
      const change = this.transition(record, { type: 'override', state }, options.source ?? 'api');
      return { applied: true, link: copyLink(record.link), events: change ? [change] : [] };
    });
  }

  /** 인터페이스 operstate 또는 upstream 엔드포인트 삭제/재등장 신호. */
  async applyInterfaceStatus(
    linkId: string,
    status: InterfaceStatus,
    options: MutationOptions = {},
  ): Promise<MutationResult> {
    return this.executor.run(linkId, () => {
      const record = this.requireRecord(linkId);
      this.touch(record, this.observedAt(record, options.timestamp));
      const trigger: LinkTrigger = status === 'down' ? { type: 'interface_down' } : { type: 'interface_up' };
      const change = this.transition(record, trigger, options.source ?? 'api');
      return { applied: true, link: copyLink(record.link), events: change ? [change] : [] };
    });
  }

  /**
   * 마지막 트래픽 관측 후 idle timeout 이 지난 active 링크를 idle 로 내린다.
   * 후보 선정 뒤 각 링크의 직렬 구간 안에서 조건을 다시 확인한다.
   */
  async sweepIdle(now: number = this.clock()): Promise<string[]> {
    const candidates = [...this.links.values()]
      .filter((record) => this.isIdleExpired(record, now))
      .map((record) => record.link.id);

    const demoted: string[] = [];
    await Promise.all(
      candidates.map((linkId) =>
        this.executor.run(linkId, () => {
          const record = this.links.get(linkId);
          if (!record || !this.isIdleExpired(record, now)) {
            return;
          }
          this.touch(record, Math.max(record.lastUpdatedMs, now));
          if (this.transition(record, { type: 'idle_timeout' }, 'sweep')) {
            demoted.push(linkId);
          }
        }),
      ),
    );
    return demoted;
  }

  getTopology(): TopologySnapshot {
    return {
      nodes: [...this.nodes.values()].map(copyNode),
      links: [...this.links.values()].map(({ link }) => copyLink(link)),
      timestamp: this.isoNow(),
    };
  }

  getLinks(filter: LinkFilter = {}): TopologyLink[] {
    return [...this.links.values()]
      .map(({ link }) => link)
      .filter((link) => filter.state === undefined || link.state === filter.state)
      .filter(
        (link) =>
          filter.nodeId === undefined ||
          link.source_node_id === filter.nodeId ||
          link.target_node_id === filter.nodeId,
      )
      .map(copyLink);
  }

  getLink(linkId: string): TopologyLink | undefined {
    const record = this.links.get(linkId);
    return record ? copyLink(record.link) : undefined;
  }

  getNode(nodeId: string): TopologyNode | undefined {
    const node = this.nodes.get(nodeId);
    return node ? copyNode(node) : undefined;
  }

  /** 같은 이름의 인터페이스가 여러 링크에 걸려 있으면 먼저 등록된 링크가 이긴다. nodeId 로 좁힐 수 있다. */
  findLinkByInterface(iface: string, nodeId?: string): TopologyLink | undefined {
    const linkIds = this.interfaceIndex.get(iface) ?? [];
    for (const linkId of linkIds) {
      const record = this.links.get(linkId);
      if (!record) {
        continue;
      }
      const { link } = record;
      if (
        nodeId === undefined ||
        (link.source_node_id === nodeId && link.source_interface === iface) ||
        (link.target_node_id === nodeId && link.target_interface === iface)
      ) {
        return copyLink(link);
      }
    }
    return undefined;
  }

  /** 방향과 무관하게 두 노드를 잇는 첫 번째 링크. */
  findLinkBetween(nodeA: string, nodeB: string): TopologyLink | undefined {
    for (const { link } of this.links.values()) {
      if (
        (link.source_node_id === nodeA && link.target_node_id === nodeB) ||
        (link.source_node_id === nodeB && link.target_node_id === nodeA)
      ) {
        return copyLink(link);
      }
    }
    return undefined;
  }

  /** 노드 metadata.endpoint 가 endpointId 와 같거나, 노드 id 가 pod 이름과 같은 노드. */
  findNodeForEndpoint(endpointId: string, podName?: string): TopologyNode | undefined {
    for (const node of this.nodes.values()) {
      if (node.metadata.endpoint === endpointId || node.id === endpointId || (podName !== undefined && node.id === podName)) {
        return copyNode(node);
      }
    }
    return undefined;
  }

  getStats(): TopologyStats {
    const linkStates: Record<LinkState, number> = { active: 0, idle: 0, down: 0 };
    for (const { link } of this.links.values()) {
      linkStates[link.state] += 1;
    }
    return {
      node_count: this.nodes.size,
      link_count: this.links.size,
      link_states: linkStates,
    };
  }

  private transition(record: LinkRecord, trigger: LinkTrigger, source: ChangeSource): TopologyEvent | null {
    const oldState = record.link.state;
    const newState = nextLinkState(oldState, trigger);
    if (newState === oldState) {
      return null;
    }
    record.link.state = newState;
    this.logger.log(`Link ${record.link.id} state changed: ${oldState} -> ${newState} (${trigger.type})`);
    return this.bus.publish({
      event_type: 'link_state_change',
      link_id: record.link.id,
      old_state: oldState,
      new_state: newState,
      trigger: trigger.type,
      timestamp: record.link.last_updated,
      source,
    });
  }

  private isIdleExpired(record: LinkRecord, now: number): boolean {
    if (record.link.state !== 'active') {
      return false;
    }
    const reference = record.lastTrafficAt ?? record.lastUpdatedMs;
    return now - reference >= this.idleTimeoutMs;
  }

  private isStale(record: LinkRecord, timestamp: number): boolean {
    if (timestamp < record.lastUpdatedMs) {
      this.logger.debug(
        `Ignoring stale state write for ${record.link.id}: ${new Date(timestamp).toISOString()} < ${record.link.last_updated}`,
      );
      return true;
    }
    return false;
  }

  /** 미래 시각은 현재 시각 + MAX_CLOCK_SKEW_MS 로 자른다. */
  private clampToNow(timestamp: number | undefined): number {
    const now = this.clock();
    if (timestamp === undefined) {
      return now;
    }
    const limit = now + MAX_CLOCK_SKEW_MS;
    if (timestamp > limit) {
      this.logger.warn(`Clamping future timestamp ${new Date(timestamp).toISOString()} to ${new Date(limit).toISOString()}`);
      return limit;
    }
    return timestamp;
  }

  /** 관측 시각. 보낸 쪽 시계가 늦어도 last_updated 가 줄지 않게 한다. */
  private observedAt(record: LinkRecord, timestamp: number | undefined): number {
    return Math.max(record.lastUpdatedMs, this.clampToNow(timestamp));
  }

  private touch(record: LinkRecord, timestamp: number): void {
    record.lastUpdatedMs = timestamp;
    record.link.last_updated = new Date(timestamp).toISOString();
  }

  private requireRecord(linkId: string): LinkRecord {
    const record = this.links.get(linkId);
    if (!record) {
      throw new UnknownEntityError('link', linkId);
    }
    return record;
  }

  private indexInterfaces(link: TopologyLink): void {
    for (const iface of new Set([link.source_interface, link.target_interface])) {
      const linkIds = this.interfaceIndex.get(iface) ?? [];
      linkIds.push(link.id);
      this.interfaceIndex.set(iface, linkIds);
    }
  }

  private unindexInterfaces(link: TopologyLink): void {
    for (const iface of new Set([link.source_interface, link.target_interface])) {
      const remaining = (this.interfaceIndex.get(iface) ?? []).filter((id) => id !== link.id);
      if (remaining.length > 0) {
        this.interfaceIndex.set(iface, remaining);
      } else {
        this.interfaceIndex.delete(iface);
      }
    }
  }

  private isoNow(): string {
    return new Date(this.clock()).toISOString();
  }
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
      .join('; ');
    throw new TopologyValidationError(detail);
  }
  return result.data;
}

function copyNode(node: TopologyNode): TopologyNode {
  return { ...node, metadata: { ...node.metadata } };
}

function copyLink(link: TopologyLink): TopologyLink {
  return { ...link, metrics: copyMetrics(link.metrics), metadata: { ...link.metadata } };
}

function copyMetrics(metrics: LinkMetrics): LinkMetrics {
  return { ...metrics };
}
