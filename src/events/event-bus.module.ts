import { Global, Module } from '@nestjs/common';
import { MONITOR_CONFIG, type MonitorConfig } from '../config/monitor.config';
import { EventBus } from './event-bus';

/** 프로세스 단위 EventBus 를 설정값으로 만들어 전역에 제공한다. 종료 시 버스가 스스로 버퍼를 비운다. */
@Global()
@Module({
  providers: [
    {
      provide: EventBus,
      inject: [MONITOR_CONFIG],
      useFactory: (config: MonitorConfig) =>
        new EventBus({ ...config.events, closeGraceMs: config.discovery.shutdownGraceMs }),
    },
  ],
  exports: [EventBus],
})
export class EventBusModule {}
