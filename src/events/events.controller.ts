import { Controller, Get, Query } from '@nestjs/common';
import { EventBus } from './event-bus';
import { EventHistoryQueryDto } from './events.dto';

/** 최근 이벤트 히스토리 조회. */
@Controller('events')
export class EventsController {
  constructor(private readonly bus: EventBus) {}

  /** GET /events/history?event_type=&link_id=&limit= */
  @Get('history')
  getHistory(@Query() query: EventHistoryQueryDto) {
    const events = this.bus.getHistory(query);
    return {
      events,
      count: events.length,
    };
  }
}
