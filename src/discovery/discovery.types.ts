import type { InterfaceStatus, LinkMetrics, LinkState, TopologyLink } from '../topology/topology.types';

/** 누적 카운터 샘플. 속도는 Normalizer 가 직전 샘플과의 차이로 계산한다. */
export interface RawCounterSample {
  kind: 'counters';
  iface: string;
  linkId?: string;
  rxBytes: number;
  txBytes: number;
  rxPackets: number;
  txPackets: number;
  /** 인터페이스가 보고한 속도(Mbps). 링크에 speed_mbps 가 없을 때만 쓴다. */
  speedMbps?: number;
  timestamp: number;
}

export interface RawLinkStatus {
  kind: 'status';
  iface: string;
  linkId?: string;
  status: InterfaceStatus;
  timestamp: number;
}

/** 푸시 에이전트가 이미 정규화해서 보낸 메트릭. */
export interface RawMetricsReport {
  kind: 'metrics';
  linkId: string;
  metrics: LinkMetrics;
  timestamp: number;
}

/** 푸시 에이전트가 명시적으로 보낸 state. */
export interface RawStateReport {
  kind: 'state';
  linkId: string;
  state: LinkState;
  timestamp: number;
}

export type RawObservation = RawCounterSample | RawLinkStatus | RawMetricsReport | RawStateReport;

/**
 * 관측값 공급자. 로컬 폴링이든 원격 스트림이든 같은 모양으로 다룬다.
 * signal 이 abort 되면 iterator 는 유한 시간 안에 끝나야 한다.
 */
export interface DiscoverySource {
  readonly name: DiscoverySourceName;
  observe(signal: AbortSignal): AsyncIterable<RawObservation>;
}

export type DiscoverySourceName = 'sysfs' | 'hubble' | 'agent';

export const DISCOVERY_SOURCES = Symbol('LINK_MONITOR_DISCOVERY_SOURCES');

/** 관측 하나를 스토어에 반영한 결과. */
export type ObservationOutcome =
  | { status: 'applied'; link: TopologyLink; stateChanged: boolean }
  | { status: 'stale'; link: TopologyLink }
  | { status: 'baseline'; linkId: string }
  | { status: 'unmapped'; iface?: string; linkId?: string };

export interface DiscoverySourceStatus {
  name: DiscoverySourceName;
  running: boolean;
  observations: number;
  last_observation_at: string | null;
  silent: boolean;
  last_error: string | null;
}
