import { Global, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  MONITOR_CONFIG,
  MonitorEnvSchema,
  isTestEnvironment,
  parseMonitorConfig,
  type MonitorConfig,
} from './monitor.config';

/**
 * 환경 변수를 한 번 검증해서 MONITOR_CONFIG 토큰으로 노출하는 전역 모듈.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: MONITOR_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): MonitorConfig => {
        const env: Record<string, string | undefined> = {};
        for (const key of Object.keys(MonitorEnvSchema.shape)) {
          env[key] = configService.get<string>(key);
        }
        const isTest = isTestEnvironment({
          NODE_ENV: configService.get<string>('NODE_ENV'),
          JEST_WORKER_ID: process.env.JEST_WORKER_ID,
        });
        const config = parseMonitorConfig(env, { isTest });
        Logger.log(
          `Discovery ${config.discovery.enabled ? config.discovery.mode : 'disabled'}, ` +
            `idle timeout ${config.linkState.idleTimeoutMs} ms, sweep every ${config.linkState.sweepIntervalMs} ms`,
          'MonitorConfig',
        );
        return config;
      },
    },
  ],
  exports: [MONITOR_CONFIG],
})
export class MonitorConfigModule {}
