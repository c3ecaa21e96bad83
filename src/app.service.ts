import { Inject, Injectable, Optional } from '@nestjs/common';
import { CLOCK, systemClock, type Clock } from './common/clock';
import { MONITOR_CONFIG, type MonitorConfig } from './config/monitor.config';
import { AgentGateway } from './discovery/agent/agent.gateway';
import { DiscoveryService } from './discovery/discovery.service';
import { EventBus } from './events/event-bus';
import { EventsGateway } from './events/events.gateway';
import { TopologyStoreService } from './topology/topology-store.service';

/** 헬스 체크와 런타임 통계를 모은다. */
@Injectable()
export class AppService {
  private readonly startedAt: number;

  constructor(
    private readonly store: TopologyStoreService,
    private readonly bus: EventBus,
    private readonly discovery: DiscoveryService,
    private readonly eventsGateway: EventsGateway,
    private readonly agentGateway: AgentGateway,
    @Inject(MONITOR_CONFIG) private readonly config: MonitorConfig,
    @Optional() @Inject(CLOCK) private readonly clock: Clock = systemClock,
  ) {
    this.startedAt = this.clock();
  }

  getHealth() {
    const sources = this.discovery.getStatus();
    return {
      status: sources.some((source) => source.silent) ? 'degraded' : 'ok',
      timestamp: new Date(this.clock()).toISOString(),
      uptime_seconds: Math.floor((this.clock() - this.startedAt) / 1000),
      discovery_mode: this.config.discovery.enabled ? this.config.discovery.mode : 'disabled',
      topology: this.store.getStats(),
      events: {
        published: this.bus.eventCount,
        subscribers: this.bus.subscriberCount,
        subscriber_stats: this.bus.subscriberStats(),
        stream_clients: this.eventsGateway.connectedClients,
        connected_agents: this.agentGateway.connectedAgents,
      },
      discovery: sources,
    };
  }
}
