import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';
import { LINK_STATES, NODE_STATUSES, NODE_TYPES } from './topology.types';

export const EntityIdSchema = z.string().trim().min(1).max(128);
const MetadataSchema = z.record(z.string()).default({});

export const LinkStateSchema = z.enum(LINK_STATES);

export const CreateNodeSchema = z.object({
  id: EntityIdSchema,
  label: z.string().trim().min(1).optional(),
  type: z.enum(NODE_TYPES).default('router'),
  status: z.enum(NODE_STATUSES).default('up'),
  platform: z.string().min(1).nullable().optional(),
  metadata: MetadataSchema,
});

/** 노드 생성 DTO */
export class CreateNodeDto extends createZodDto(CreateNodeSchema) {}

export const CreateLinkSchema = z.object({
  id: EntityIdSchema,
  source_node_id: EntityIdSchema,
  target_node_id: EntityIdSchema,
  source_interface: z.string().trim().min(1),
  target_interface: z.string().trim().min(1),
  speed_mbps: z.number().nonnegative().default(0),
  mtu: z.number().int().positive().default(1500),
  metadata: MetadataSchema,
});

/** 링크 생성 DTO */
export class CreateLinkDto extends createZodDto(CreateLinkSchema) {}

export const LinkMetricsSchema = z.object({
  rx_bps: z.number().nonnegative().default(0),
  tx_bps: z.number().nonnegative().default(0),
  rx_pps: z.number().nonnegative().default(0),
  tx_pps: z.number().nonnegative().default(0),
  rx_bytes_total: z.number().nonnegative().default(0),
  tx_bytes_total: z.number().nonnegative().default(0),
  utilization: z.number().min(0).max(1).default(0),
  latency_ms: z.number().nonnegative().nullable().optional(),
  packet_loss: z.number().min(0).max(100).nullable().optional(),
});

/** 링크 메트릭 갱신 DTO (PUT /links/:id/metrics 본문) */
export class LinkMetricsDto extends createZodDto(LinkMetricsSchema) {}

export const SetLinkStateQuerySchema = z.object({
  state: LinkStateSchema,
});

export class SetLinkStateQueryDto extends createZodDto(SetLinkStateQuerySchema) {}

export const ListLinksQuerySchema = z.object({
  state: LinkStateSchema.optional(),
  node_id: EntityIdSchema.optional(),
});

/** 링크 목록 필터 DTO */
export class ListLinksQueryDto extends createZodDto(ListLinksQuerySchema) {}
