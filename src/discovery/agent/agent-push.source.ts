import { Logger } from '@nestjs/common';
import type { DiscoverySource, RawObservation } from '../discovery.types';
import { ObservationChannel } from '../observation-channel';
import type { AgentObservation } from './agent-events';

/**
 * /ws/agent 로 들어온 에이전트 이벤트를 관측 스트림으로 바꾸는 소스.
 * observe 가 돌고 있을 때만 이벤트를 받는다.
 */
export class AgentPushSource implements DiscoverySource {
  readonly name = 'agent' as const;
  private readonly logger = new Logger(AgentPushSource.name);
  private channel: ObservationChannel<RawObservation> | null = null;

  constructor(private readonly capacity = 1024) {}

  get isAccepting(): boolean {
    return this.channel !== null && !this.channel.isClosed;
  }

  /** 채널에 넣었으면 true. 소스가 멈춰 있으면 false. */
  submit(observation: AgentObservation): boolean {
    if (!this.channel || this.channel.isClosed) {
      return false;
    }
    this.channel.push(observation);
    return true;
  }

  async *observe(signal: AbortSignal): AsyncGenerator<RawObservation> {
    const channel = new ObservationChannel<RawObservation>(this.capacity, signal);
    this.channel = channel;
    this.logger.log('Accepting agent push events');
    try {
      yield* channel;
    } finally {
      channel.close();
      if (this.channel === channel) {
        this.channel = null;
      }
    }
  }
}
