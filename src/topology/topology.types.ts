/**
 * 토폴로지 영역에서 사용되는 타입 정의 모음.
 * REST/Socket.IO 경계를 그대로 넘나들기 때문에 필드 이름은 wire 포맷(snake_case)을 따른다.
 */
export const LINK_STATES = ['active', 'idle', 'down'] as const;
export type LinkState = (typeof LINK_STATES)[number];

export const NODE_TYPES = ['router', 'switch', 'host', 'server', 'firewall', 'endpoint'] as const;
export type NodeType = (typeof NODE_TYPES)[number];

export const NODE_STATUSES = ['up', 'down'] as const;
export type NodeStatus = (typeof NODE_STATUSES)[number];

export type InterfaceStatus = 'up' | 'down';

/** 관측 시각이 서버 시각보다 이만큼(ms) 넘게 앞서면 미래 시각으로 본다. */
export const MAX_CLOCK_SKEW_MS = 5_000;

export interface LinkMetrics {
  rx_bps: number;
  tx_bps: number;
  rx_pps: number;
  tx_pps: number;
  rx_bytes_total: number;
  tx_bytes_total: number;
  utilization: number;
  latency_ms?: number | null;
  packet_loss?: number | null;
}

export interface TopologyNode {
  id: string;
  label: string;
  type: NodeType;
  status: NodeStatus;
  platform: string | null;
  metadata: Record<string, string>;
}

export interface TopologyLink {
  id: string;
  source_node_id: string;
  target_node_id: string;
  source_interface: string;
  target_interface: string;
  state: LinkState;
  metrics: LinkMetrics;
  speed_mbps: number;
  mtu: number;
  last_updated: string;
  metadata: Record<string, string>;
}

export interface TopologySnapshot {
  nodes: TopologyNode[];
  links: TopologyLink[];
  timestamp: string;
}

export interface LinkFilter {
  state?: LinkState;
  nodeId?: string;
}

/** 이벤트/변경을 일으킨 주체. */
export type ChangeSource = 'api' | 'agent' | 'sysfs' | 'hubble' | 'sweep' | 'demo';

export interface TopologyStats {
  node_count: number;
  link_count: number;
  link_states: Record<LinkState, number>;
}

export function emptyMetrics(): LinkMetrics {
  return {
    rx_bps: 0,
    tx_bps: 0,
    rx_pps: 0,
    tx_pps: 0,
    rx_bytes_total: 0,
    tx_bytes_total: 0,
    utilization: 0,
    latency_ms: null,
    packet_loss: null,
  };
}
