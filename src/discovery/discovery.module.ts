import { Module } from '@nestjs/common';
import type { Cache } from 'cache-manager';
import { CACHE_TOKEN } from '../cache/cache.module';
import { MONITOR_CONFIG, type MonitorConfig } from '../config/monitor.config';
import { TopologyModule } from '../topology/topology.module';
import { TopologyStoreService } from '../topology/topology-store.service';
import { AgentEventsController } from './agent/agent-events.controller';
import { AgentGateway } from './agent/agent.gateway';
import { AgentPushSource } from './agent/agent-push.source';
import { DiscoveryService } from './discovery.service';
import { DISCOVERY_SOURCES, type DiscoverySource } from './discovery.types';
import { KubernetesEndpointWatch } from './hubble/cilium-endpoint.watch';
import { EndpointRegistry } from './hubble/endpoint-registry';
import { FlowTranslator } from './hubble/flow-translator';
import { HubbleDiscoverySource } from './hubble/hubble-discovery.source';
import { HubbleRelayClient } from './hubble/hubble-relay.client';
import { SysfsCounterReader } from './sysfs/sysfs-counter.reader';
import { SysfsDiscoverySource } from './sysfs/sysfs-discovery.source';

/** DISCOVERY_MODE 에 맞는 로컬/원격 소스 하나와 항상 켜져 있는 에이전트 푸시 소스. */
function createDiscoverySources(
  config: MonitorConfig,
  agent: AgentPushSource,
  store: TopologyStoreService,
  cache: Cache,
): DiscoverySource[] {
  const sources: DiscoverySource[] = [agent];
  if (!config.discovery.enabled) {
    return sources;
  }

  if (config.discovery.mode === 'hubble') {
    const { hubble, discovery } = config;
    sources.push(
      new HubbleDiscoverySource(
        new HubbleRelayClient(hubble.relayAddress, hubble.protoDir),
        new KubernetesEndpointWatch(hubble.namespace),
        new EndpointRegistry(cache, hubble.endpointCacheTtlMs),
        new FlowTranslator(hubble.flowBytesEstimate),
        store,
        { flushIntervalMs: hubble.flushIntervalMs, reconnect: discovery.reconnect },
      ),
    );
  } else {
    sources.push(
      new SysfsDiscoverySource(new SysfsCounterReader(), {
        pollIntervalMs: config.discovery.pollIntervalMs,
        linkStatusIntervalMs: config.discovery.linkStatusIntervalMs,
        interfaces: config.discovery.interfaces,
      }),
    );
  }
  return sources;
}

/**
 * Discovery Source 선택, 관측 반영 서비스, 에이전트 수신 채널(HTTP, /ws/agent)을 묶는 Nest 모듈.
 */
@Module({
  imports: [TopologyModule],
  providers: [
    {
      provide: AgentPushSource,
      useFactory: () => new AgentPushSource(),
    },
    {
      provide: DISCOVERY_SOURCES,
      inject: [MONITOR_CONFIG, AgentPushSource, TopologyStoreService, CACHE_TOKEN],
      useFactory: createDiscoverySources,
    },
    DiscoveryService,
    AgentGateway,
  ],
  controllers: [AgentEventsController],
  exports: [DiscoveryService, AgentGateway],
})
export class DiscoveryModule {}
