import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { MONITOR_CONFIG, type MonitorConfig } from '../config/monitor.config';
import { TopologyStoreService } from './topology-store.service';

const SWEEP_INTERVAL_NAME = 'link-idle-sweep';

/**
 * IDLE_SWEEP_INTERVAL_MS 마다 idle timeout 이 지난 active 링크를 강등한다.
 * sweep 주기와 timeout 은 서로 독립이다.
 */
@Injectable()
export class IdleSweepService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(IdleSweepService.name);
  private running = false;

  constructor(
    private readonly store: TopologyStoreService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(MONITOR_CONFIG) private readonly config: MonitorConfig,
  ) {}

  /** 모듈 초기화 시 sweep 타이머를 등록한다. */
  onModuleInit(): void {
    const { sweepIntervalMs, idleTimeoutMs } = this.config.linkState;
    const interval = setInterval(() => {
      this.tick().catch((error) => this.logger.error('Idle sweep failed', error));
    }, sweepIntervalMs);
    this.schedulerRegistry.addInterval(SWEEP_INTERVAL_NAME, interval);
    this.logger.log(`Idle sweep every ${sweepIntervalMs} ms (timeout ${idleTimeoutMs} ms)`);
  }

  /** 종료 시 타이머를 정리한다. */
  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', SWEEP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SWEEP_INTERVAL_NAME);
    }
  }

  /** 이전 tick 이 끝나지 않았으면 이번 tick 은 건너뛴다. */
  async tick(now?: number): Promise<string[]> {
    if (this.running) {
      return [];
    }
    this.running = true;
    try {
      const demoted = await this.store.sweepIdle(now);
      if (demoted.length > 0) {
        this.logger.debug(`Idle sweep demoted ${demoted.length} link(s): ${demoted.join(', ')}`);
      }
      return demoted;
    } finally {
      this.running = false;
    }
  }
}
