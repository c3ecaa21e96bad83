import { Logger } from '@nestjs/common';
import { abortableSleep } from '../../common/abortable-sleep';
import { systemClock, type Clock } from '../../common/clock';
import type { ReconnectPolicy } from '../../config/monitor.config';
import type { TopologyStoreService } from '../../topology/topology-store.service';
import type { InterfaceStatus } from '../../topology/topology.types';
import { describeError, runWithReconnect } from '../backoff';
import type { DiscoverySource, RawObservation } from '../discovery.types';
import { ObservationChannel } from '../observation-channel';
import type { EndpointChange, EndpointWatch } from './cilium-endpoint.watch';
import type { EndpointRegistry } from './endpoint-registry';
import { flowEndpointId, GetFlowsResponseSchema, type HubbleFlow } from './flow.schema';
import type { FlowTranslator } from './flow-translator';
import type { FlowStreamClient } from './hubble-relay.client';

export type TopologyLookup = Pick<TopologyStoreService, 'findNodeForEndpoint' | 'findLinkBetween' | 'getLinks'>;

export interface HubbleSourceOptions {
  flushIntervalMs: number;
  reconnect: ReconnectPolicy;
  channelCapacity?: number;
}

/**
 * Hubble Relay flow 스트림과 CiliumEndpoint watch 를 합친 관측 소스.
 * flow 는 링크별 카운터로 누적했다가 flush 주기마다 카운터 샘플로 내보내고,
 * 엔드포인트 삭제/재등장은 그 노드에 걸린 링크의 status 관측이 된다.
 */
export class HubbleDiscoverySource implements DiscoverySource {
  readonly name = 'hubble' as const;
  private readonly logger = new Logger(HubbleDiscoverySource.name);
  private lostEvents = 0;
  private malformedFlows = 0;

  constructor(
    private readonly relay: FlowStreamClient,
    private readonly endpoints: EndpointWatch,
    private readonly registry: EndpointRegistry,
    private readonly translator: FlowTranslator,
    private readonly topology: TopologyLookup,
    private readonly options: HubbleSourceOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  get droppedFlows(): number {
    return this.malformedFlows;
  }

  get lostEventCount(): number {
    return this.lostEvents;
  }

  async *observe(signal: AbortSignal): AsyncGenerator<RawObservation> {
    const inner = new AbortController();
    const abortInner = () => inner.abort();
    signal.addEventListener('abort', abortInner, { once: true });
    if (signal.aborted) {
      inner.abort();
    }

    const capacity = this.options.channelCapacity ?? 1024;
    const observations = new ObservationChannel<RawObservation>(capacity, inner.signal);
    const flows = new ObservationChannel<HubbleFlow>(capacity * 4, inner.signal);

    const loops = Promise.all([
      this.streamRelay(flows, inner.signal),
      this.consumeFlows(flows),
      this.flushCounters(observations, inner.signal),
      this.watchEndpoints(observations, inner.signal),
    ]).finally(() => observations.close());

    try {
      yield* observations;
    } finally {
      inner.abort();
      signal.removeEventListener('abort', abortInner);
      await loops;
      this.relay.close();
    }
  }

  private async streamRelay(flows: ObservationChannel<HubbleFlow>, signal: AbortSignal): Promise<void> {
    await runWithReconnect(
      (connectSignal) => this.relay.streamFlows(connectSignal, (message) => this.acceptMessage(message, flows)),
      { name: 'Hubble Relay', policy: this.options.reconnect, signal, logger: this.logger },
    );
    flows.close();
  }

  private acceptMessage(message: unknown, flows: ObservationChannel<HubbleFlow>): void {
    const parsed = GetFlowsResponseSchema.safeParse(message);
    if (!parsed.success) {
      this.malformedFlows += 1;
      this.logger.warn(`Dropping malformed flow: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return;
    }
    if (parsed.data.lost_events) {
      this.lostEvents += parsed.data.lost_events.num_events_lost;
      this.logger.warn(`Hubble reported ${parsed.data.lost_events.num_events_lost} lost event(s)`);
    }
    if (parsed.data.flow) {
      flows.push(parsed.data.flow);
    }
  }

  private async consumeFlows(flows: ObservationChannel<HubbleFlow>): Promise<void> {
    for await (const flow of flows) {
      try {
        await this.recordFlow(flow);
      } catch (error) {
        this.logger.warn(`Failed to translate flow: ${describeError(error)}`);
      }
    }
  }

  /** flow 의 양 끝을 노드로 풀어 그 사이 링크에 누적한다. 풀리지 않으면 버린다. */
  async recordFlow(flow: HubbleFlow): Promise<boolean> {
    const sourceNode = await this.resolveNode(
      flowEndpointId(flow.source, flow.IP?.source),
      flow.source?.pod_name,
      flow.IP?.source,
    );
    const targetNode = await this.resolveNode(
      flowEndpointId(flow.destination, flow.IP?.destination),
      flow.destination?.pod_name,
      flow.IP?.destination,
    );
    if (!sourceNode || !targetNode || sourceNode === targetNode) {
      return false;
    }
    const link = this.topology.findLinkBetween(sourceNode, targetNode);
    if (!link) {
      return false;
    }
    // 응답 패킷은 목적지 쪽에서 출발한 것으로 센다.
    const from = flow.is_reply?.value ? targetNode : sourceNode;
    return this.translator.record(link, from, flow.verdict);
  }

  private async resolveNode(
    endpointId: string | null,
    podName: string | undefined,
    ip: string | undefined,
  ): Promise<string | null> {
    if (endpointId) {
      const direct = this.topology.findNodeForEndpoint(endpointId, podName || undefined);
      if (direct) {
        return direct.id;
      }
    }
    if (!ip) {
      return null;
    }
    const cachedEndpoint = await this.registry.endpointForIp(ip);
    if (!cachedEndpoint) {
      return null;
    }
    return this.registry.nodeForEndpoint(cachedEndpoint);
  }

  private async flushCounters(observations: ObservationChannel<RawObservation>, signal: AbortSignal): Promise<void> {
    while (await abortableSleep(this.options.flushIntervalMs, signal)) {
      this.translator.retain(new Set(this.topology.getLinks().map((link) => link.id)));
      for (const sample of this.translator.samples(this.clock())) {
        observations.push(sample);
      }
    }
  }

  private async watchEndpoints(observations: ObservationChannel<RawObservation>, signal: AbortSignal): Promise<void> {
    // 같은 엔드포인트의 ADDED/DELETED 순서를 지키도록 변경을 한 줄로 처리한다.
    let chain = Promise.resolve();
    await runWithReconnect(
      (connectSignal) =>
        this.endpoints.watch(connectSignal, (change) => {
          chain = chain
            .then(() => this.applyEndpointChange(change, observations))
            .catch((error: unknown) => {
              this.logger.warn(`Failed to apply endpoint change: ${describeError(error)}`);
            });
        }),
      { name: 'CiliumEndpoint watch', policy: this.options.reconnect, signal, logger: this.logger },
    );
    await chain;
  }

  async applyEndpointChange(change: EndpointChange, observations: ObservationChannel<RawObservation>): Promise<void> {
    const { endpoint } = change;
    const node = this.topology.findNodeForEndpoint(endpoint.id, endpoint.podName);

    if (change.type === 'DELETED') {
      await this.registry.forget(endpoint);
      if (node) {
        this.pushStatus(observations, node.id, endpoint.id, 'down');
      }
      return;
    }

    await this.registry.remember(endpoint, node?.id ?? null);
    if (node && endpoint.state === 'ready') {
      this.pushStatus(observations, node.id, endpoint.id, 'up');
    }
  }

  private pushStatus(
    observations: ObservationChannel<RawObservation>,
    nodeId: string,
    endpointId: string,
    status: InterfaceStatus,
  ): void {
    const timestamp = this.clock();
    for (const link of this.topology.getLinks({ nodeId })) {
      observations.push({ kind: 'status', iface: `endpoint:${endpointId}`, linkId: link.id, status, timestamp });
      if (status === 'down') {
        this.translator.forget(link.id);
      }
    }
  }
}
