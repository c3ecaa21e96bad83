import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
  type WsResponse,
} from '@nestjs/websockets';
import { CLOCK, systemClock, type Clock } from '../../common/clock';
import { describeError } from '../backoff';
import { parseAgentEvent, toAgentObservation } from './agent-events';
import { AgentPushSource } from './agent-push.source';

export interface AgentAck {
  status: 'ok' | 'error';
  message: string;
}

/** 에이전트 소켓 중 게이트웨이가 쓰는 부분. */
export interface AgentClient {
  id: string;
}

/**
 * 에이전트가 agent-event 프레임으로 밀어 넣는 이벤트를 받아 AgentPushSource 로 넘긴다.
 * 프레임마다 agent-ack 로 결과를 돌려준다.
 */
@Injectable()
@WebSocketGateway({
  cors: { origin: '*' },
  namespace: 'ws/agent',
})
export class AgentGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(AgentGateway.name);
  private readonly clients = new Set<string>();

  constructor(
    private readonly source: AgentPushSource,
    @Optional() @Inject(CLOCK) private readonly clock: Clock = systemClock,
  ) {}

  handleConnection(client: AgentClient): void {
    this.clients.add(client.id);
    this.logger.log(`Agent connected: ${client.id} (${this.clients.size} connected)`);
  }

  handleDisconnect(client: AgentClient): void {
    this.clients.delete(client.id);
    this.logger.log(`Agent disconnected: ${client.id}`);
  }

  @SubscribeMessage('agent-event')
  handleAgentEvent(@MessageBody() payload: unknown): WsResponse<AgentAck> {
    return { event: 'agent-ack', data: this.accept(payload) };
  }

  get connectedAgents(): number {
    return this.clients.size;
  }

  private accept(payload: unknown): AgentAck {
    try {
      const event = parseAgentEvent(payload);
      if (!this.source.submit(toAgentObservation(event, this.clock()))) {
        return { status: 'error', message: 'Agent ingestion is not running' };
      }
      return { status: 'ok', message: `Accepted ${event.event_type} for ${event.link_id}` };
    } catch (error) {
      this.logger.warn(`Rejected agent frame: ${describeError(error)}`);
      return { status: 'error', message: describeError(error) };
    }
  }
}
