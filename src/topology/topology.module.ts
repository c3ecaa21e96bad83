import { Module } from '@nestjs/common';
import { DemoTopologyLoader } from './demo-topology';
import { IdleSweepService } from './idle-sweep.service';
import { LinksController } from './links.controller';
import { TopologyController } from './topology.controller';
import { TopologyStoreService } from './topology-store.service';

/**
 * 토폴로지 스토어, idle sweep, 데모 부트스트랩과 REST 컨트롤러를 묶는 Nest 모듈.
 */
@Module({
  providers: [TopologyStoreService, IdleSweepService, DemoTopologyLoader],
  controllers: [TopologyController, LinksController],
  exports: [TopologyStoreService],
})
export class TopologyModule {}
