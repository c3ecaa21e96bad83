import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { MONITOR_CONFIG, type MonitorConfig } from '../config/monitor.config';
import { TopologyStoreService, type LinkSpec, type NodeSpec } from './topology-store.service';
import type { LinkState } from './topology.types';

interface DemoLink extends LinkSpec {
  initialState: LinkState;
}

const DEMO_NODES: NodeSpec[] = [
  { id: 'r1', label: 'R1', type: 'router', platform: 'srlinux' },
  { id: 'r2', label: 'R2', type: 'router', platform: 'ceos' },
  { id: 'r3', label: 'R3', type: 'router', platform: 'frr' },
  { id: 'sw1', label: 'SW1', type: 'switch' },
];

const DEMO_LINKS: DemoLink[] = [
  {
    id: 'r1-r2',
    source_node_id: 'r1',
    target_node_id: 'r2',
    source_interface: 'ethernet-1/1',
    target_interface: 'Ethernet1',
    speed_mbps: 10_000,
    initialState: 'active',
  },
  {
    id: 'r2-r3',
    source_node_id: 'r2',
    target_node_id: 'r3',
    source_interface: 'Ethernet2',
    target_interface: 'eth0',
    speed_mbps: 1_000,
    initialState: 'idle',
  },
  {
    id: 'r3-sw1',
    source_node_id: 'r3',
    target_node_id: 'sw1',
    source_interface: 'eth1',
    target_interface: 'eth1',
    speed_mbps: 1_000,
    initialState: 'active',
  },
  {
    id: 'sw1-r1',
    source_node_id: 'sw1',
    target_node_id: 'r1',
    source_interface: 'eth2',
    target_interface: 'ethernet-1/2',
    speed_mbps: 10_000,
    initialState: 'down',
  },
];

/** 고정 데모 토폴로지(라우터 3대, 스위치 1대, 링크 4개)를 스토어에 채운다. */
export async function seedDemoTopology(store: TopologyStoreService): Promise<void> {
  for (const node of DEMO_NODES) {
    await store.addNode(node, 'demo');
  }
  for (const { initialState, ...link } of DEMO_LINKS) {
    await store.addLink(link, 'demo');
    await store.setState(link.id, initialState, { source: 'demo' });
  }
}

/** DEMO_MODE 가 켜져 있으면 기동 시 데모 토폴로지를 만든다. */
@Injectable()
export class DemoTopologyLoader implements OnModuleInit {
  private readonly logger = new Logger(DemoTopologyLoader.name);

  constructor(
    private readonly store: TopologyStoreService,
    @Inject(MONITOR_CONFIG) private readonly config: MonitorConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.demoMode) {
      return;
    }
    await seedDemoTopology(this.store);
    const stats = this.store.getStats();
    this.logger.log(`Demo topology initialized: ${stats.node_count} nodes, ${stats.link_count} links`);
  }
}
