import { Module } from '@nestjs/common';
import { TopologyModule } from '../topology/topology.module';
import { EventsController } from './events.controller';
import { EventsGateway } from './events.gateway';

/**
 * 이벤트 히스토리 REST 와 /ws/events 팬아웃 게이트웨이를 묶는 Nest 모듈.
 */
@Module({
  imports: [TopologyModule],
  providers: [EventsGateway],
  controllers: [EventsController],
  exports: [EventsGateway],
})
export class EventsModule {}
