import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';
import { EVENT_TYPES } from './events.types';

export const EventTypeSchema = z.enum(EVENT_TYPES);

export const EventHistoryQuerySchema = z.object({
  event_type: EventTypeSchema.optional(),
  link_id: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(0).max(1000).default(100),
});

/** 이벤트 히스토리 조회 필터 DTO */
export class EventHistoryQueryDto extends createZodDto(EventHistoryQuerySchema) {}

/** "a,b" 문자열이나 반복 쿼리 파라미터를 이벤트 타입 목록으로 바꾼다. 모르는 값은 버리고, 아는 값이 하나도 없으면 필터 없음(null). */
export function parseEventTypeFilter(raw: unknown): Set<z.infer<typeof EventTypeSchema>> | null {
  const values = (Array.isArray(raw) ? raw : [raw])
    .filter((value): value is string => typeof value === 'string')
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  if (values.length === 0) {
    return null;
  }

  const types = new Set<z.infer<typeof EventTypeSchema>>();
  for (const value of values) {
    const parsed = EventTypeSchema.safeParse(value);
    if (parsed.success) {
      types.add(parsed.data);
    }
  }
  return types.size > 0 ? types : null;
}
