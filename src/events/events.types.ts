import type { LinkTriggerType } from '../topology/link-state-machine';
import type {
  ChangeSource,
  LinkMetrics,
  LinkState,
  TopologyLink,
  TopologyNode,
} from '../topology/topology.types';

export const EVENT_TYPES = [
  'link_state_change',
  'metrics_update',
  'node_added',
  'node_removed',
  'link_added',
  'link_removed',
] as const;
export type TopologyEventType = (typeof EVENT_TYPES)[number];

interface EventEnvelope {
  /** 버스가 publish 시점에 붙이는 단조 증가 번호. */
  sequence: number;
  timestamp: string;
  source: ChangeSource;
}

export interface LinkStateChangeEvent extends EventEnvelope {
  event_type: 'link_state_change';
  link_id: string;
  old_state: LinkState;
  new_state: LinkState;
  trigger: LinkTriggerType;
}

export interface MetricsUpdateEvent extends EventEnvelope {
  event_type: 'metrics_update';
  link_id: string;
  metrics: LinkMetrics;
}

export interface NodeAddedEvent extends EventEnvelope {
  event_type: 'node_added';
  node_id: string;
  node: TopologyNode;
}

export interface NodeRemovedEvent extends EventEnvelope {
  event_type: 'node_removed';
  node_id: string;
}

export interface LinkAddedEvent extends EventEnvelope {
  event_type: 'link_added';
  link_id: string;
  link: TopologyLink;
}

export interface LinkRemovedEvent extends EventEnvelope {
  event_type: 'link_removed';
  link_id: string;
}

export type TopologyEvent =
  | LinkStateChangeEvent
  | MetricsUpdateEvent
  | NodeAddedEvent
  | NodeRemovedEvent
  | LinkAddedEvent
  | LinkRemovedEvent;

type WithoutSequence<T> = T extends unknown ? Omit<T, 'sequence'> : never;

/** publish 에 넘기는 형태. sequence 는 버스가 채운다. */
export type TopologyEventDraft = WithoutSequence<TopologyEvent>;

export interface EventHistoryQuery {
  event_type?: TopologyEventType;
  link_id?: string;
  limit?: number;
}

export function eventLinkId(event: TopologyEvent | TopologyEventDraft): string | undefined {
  return 'link_id' in event ? event.link_id : undefined;
}
