import { z } from 'zod';

/** proto-loader 가 enums: String 으로 풀어도 모르는 값은 숫자로 남는다. */
const EnumValueSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const TimestampSchema = z.object({
  seconds: z.number(),
  nanos: z.number().default(0),
});

export const FlowEndpointSchema = z.object({
  ID: z.number().default(0),
  identity: z.number().default(0),
  namespace: z.string().default(''),
  labels: z.array(z.string()).default([]),
  pod_name: z.string().default(''),
});

export const FlowSchema = z.object({
  time: TimestampSchema.nullish(),
  verdict: EnumValueSchema.default('VERDICT_UNKNOWN'),
  IP: z
    .object({
      source: z.string().default(''),
      destination: z.string().default(''),
    })
    .nullish(),
  source: FlowEndpointSchema.nullish(),
  destination: FlowEndpointSchema.nullish(),
  node_name: z.string().default(''),
  traffic_direction: EnumValueSchema.default('TRAFFIC_DIRECTION_UNKNOWN'),
  is_reply: z.object({ value: z.boolean() }).nullish(),
});

export const GetFlowsResponseSchema = z.object({
  flow: FlowSchema.nullish(),
  lost_events: z.object({ num_events_lost: z.number().default(0) }).nullish(),
  node_name: z.string().default(''),
});

export type FlowEndpoint = z.infer<typeof FlowEndpointSchema>;
export type HubbleFlow = z.infer<typeof FlowSchema>;

/** 엔드포인트 식별자: namespace/pod 가 있으면 그것, 없으면 IP. */
export function flowEndpointId(endpoint: FlowEndpoint | null | undefined, ip: string | undefined): string | null {
  if (endpoint && endpoint.namespace && endpoint.pod_name) {
    return `${endpoint.namespace}/${endpoint.pod_name}`;
  }
  return ip ? ip : null;
}
