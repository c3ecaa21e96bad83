import { Body, Controller, HttpCode, Inject, Logger, Optional, Post } from '@nestjs/common';
import { CLOCK, systemClock, type Clock } from '../../common/clock';
import { TopologyValidationError, UnknownEntityError } from '../../topology/topology.errors';
import { describeError } from '../backoff';
import { DiscoveryService } from '../discovery.service';
import type { ObservationOutcome } from '../discovery.types';
import { AgentEventBatchSchema, parseAgentEvent, toAgentObservation } from './agent-events';

interface BatchResult {
  link_id: string | null;
  processed: boolean;
  state_changed?: boolean;
  status?: ObservationOutcome['status'];
  error?: string;
}

/** 에이전트가 HTTP 로 보내는 이벤트 수신. */
@Controller('events')
export class AgentEventsController {
  private readonly logger = new Logger(AgentEventsController.name);

  constructor(
    private readonly discovery: DiscoveryService,
    @Optional() @Inject(CLOCK) private readonly clock: Clock = systemClock,
  ) {}

  /** POST /events: 본문은 판별 유니온이라 파이프 대신 여기서 검증한다. */
  @Post()
  @HttpCode(200)
  async submit(@Body() body: unknown) {
    const event = parseAgentEvent(body);
    const outcome = await this.discovery.apply(toAgentObservation(event, this.clock()), 'agent');
    if (outcome.status === 'unmapped') {
      throw new UnknownEntityError('link', event.link_id);
    }
    return {
      status: outcome.status,
      link_id: event.link_id,
      state_changed: outcome.status === 'applied' && outcome.stateChanged,
      link: 'link' in outcome ? outcome.link : null,
    };
  }

  /** POST /events/batch: 이벤트별로 따로 처리하고 결과를 모아 돌려준다. */
  @Post('batch')
  @HttpCode(200)
  async submitBatch(@Body() body: unknown) {
    const parsed = AgentEventBatchSchema.safeParse(body);
    if (!parsed.success) {
      throw new TopologyValidationError('Batch body must be a non-empty array of at most 1000 events');
    }

    const results: BatchResult[] = [];
    for (const raw of parsed.data) {
      results.push(await this.processOne(raw));
    }
    return {
      processed: results.filter((result) => result.processed).length,
      failed: results.filter((result) => !result.processed).length,
      results,
    };
  }

  private async processOne(raw: unknown): Promise<BatchResult> {
    let linkId: string | null = null;
    try {
      const event = parseAgentEvent(raw);
      linkId = event.link_id;
      const outcome = await this.discovery.apply(toAgentObservation(event, this.clock()), 'agent');
      if (outcome.status === 'unmapped') {
        return { link_id: linkId, processed: false, error: `Link not found: ${linkId}` };
      }
      return {
        link_id: linkId,
        processed: true,
        status: outcome.status,
        state_changed: outcome.status === 'applied' && outcome.stateChanged,
      };
    } catch (error) {
      this.logger.warn(`Rejected agent event${linkId ? ` for ${linkId}` : ''}: ${describeError(error)}`);
      return { link_id: linkId, processed: false, error: describeError(error) };
    }
  }
}
