import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { CacheModule } from './cache/cache.module';
import { MonitorConfigModule } from './config/monitor-config.module';
import { DiscoveryModule } from './discovery/discovery.module';
import { EventBusModule } from './events/event-bus.module';
import { EventsModule } from './events/events.module';
import { TopologyModule } from './topology/topology.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    ScheduleModule.forRoot(),
    MonitorConfigModule,
    CacheModule,
    EventBusModule,
    TopologyModule,
    EventsModule,
    DiscoveryModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
