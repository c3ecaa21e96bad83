import { z } from 'zod';
import { EntityIdSchema, LinkMetricsSchema, LinkStateSchema } from '../../topology/topology.dto';
import { TopologyValidationError } from '../../topology/topology.errors';
import { MAX_CLOCK_SKEW_MS } from '../../topology/topology.types';
import type { RawMetricsReport, RawStateReport } from '../discovery.types';

/** ISO-8601 문자열 또는 epoch ms. 생략하면 수신 시각. */
const AgentTimestampSchema = z.union([z.string().datetime({ offset: true }), z.number().nonnegative()]).optional();

const LinkStateChangeAgentEventSchema = z.object({
  event_type: z.literal('link_state_change'),
  link_id: EntityIdSchema,
  old_state: LinkStateSchema.optional(),
  new_state: LinkStateSchema,
  timestamp: AgentTimestampSchema,
});

const MetricsUpdateAgentEventSchema = z.object({
  event_type: z.literal('metrics_update'),
  link_id: EntityIdSchema,
  metrics: LinkMetricsSchema,
  timestamp: AgentTimestampSchema,
});

/** 에이전트가 보낼 수 있는 이벤트는 상태 변경과 메트릭 갱신 두 가지뿐이다. */
export const AgentEventSchema = z.discriminatedUnion('event_type', [
  LinkStateChangeAgentEventSchema,
  MetricsUpdateAgentEventSchema,
]);

export const AgentEventBatchSchema = z.array(z.unknown()).min(1).max(1000);

export type AgentEvent = z.infer<typeof AgentEventSchema>;
export type AgentObservation = RawStateReport | RawMetricsReport;

/** 검증 실패는 TopologyValidationError(400) 로 바꿔 던진다. */
export function parseAgentEvent(raw: unknown): AgentEvent {
  const result = AgentEventSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new TopologyValidationError(`Invalid agent event: ${path}${issue?.message ?? 'invalid payload'}`);
  }
  return result.data;
}

/** 수신 시각보다 MAX_CLOCK_SKEW_MS 넘게 앞선 timestamp 는 TopologyValidationError(400). */
export function toAgentObservation(event: AgentEvent, receivedAt: number): AgentObservation {
  const timestamp =
    typeof event.timestamp === 'string'
      ? Date.parse(event.timestamp)
      : event.timestamp ?? receivedAt;
  if (timestamp > receivedAt + MAX_CLOCK_SKEW_MS) {
    throw new TopologyValidationError(
      `Invalid agent event: timestamp: ${new Date(timestamp).toISOString()} is ahead of server time by more than ${MAX_CLOCK_SKEW_MS} ms`,
    );
  }

  if (event.event_type === 'link_state_change') {
    return { kind: 'state', linkId: event.link_id, state: event.new_state, timestamp };
  }
  return { kind: 'metrics', linkId: event.link_id, metrics: event.metrics, timestamp };
}
