import type { LogLevel } from '@nestjs/common';
import { join } from 'path';
import { z } from 'zod';

export const MONITOR_CONFIG = Symbol('LINK_MONITOR_CONFIG');

const LOG_LEVEL_ORDER: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/** "true"/"1"/"yes" 계열 문자열을 boolean 으로 해석한다. */
const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === '') {
        return fallback;
      }
      return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
    });

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/**
 * 환경 변수 스키마. 키 이름이 그대로 ConfigService 조회 키가 된다.
 */
export const MonitorEnvSchema = z.object({
  PORT: positiveInt(8000),
  LOG_LEVEL: z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('log'),
  DISCOVERY_MODE: z.enum(['sysfs', 'hubble']).default('sysfs'),
  DISCOVERY_ENABLED: booleanFlag(true),
  HUBBLE_RELAY_ADDR: z.string().min(1).default('hubble-relay:4245'),
  HUBBLE_PROTO_DIR: z.string().min(1).optional(),
  HUBBLE_FLUSH_INTERVAL_MS: positiveInt(1000),
  HUBBLE_FLOW_BYTES_ESTIMATE: positiveInt(1500),
  CILIUM_NAMESPACE: z.string().min(1).optional(),
  ENDPOINT_CACHE_TTL_MS: positiveInt(900_000),
  LINK_MONITOR_REDIS_URL: z.string().url().optional(),
  IDLE_TIMEOUT_SECONDS: z.coerce.number().positive().default(5),
  IDLE_SWEEP_INTERVAL_MS: positiveInt(1000),
  POLL_INTERVAL_MS: positiveInt(100),
  LINK_STATUS_INTERVAL_MS: positiveInt(250),
  INTERFACES: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    ),
  DEMO_MODE: booleanFlag(false),
  EVENT_HISTORY_SIZE: positiveInt(100),
  SUBSCRIBER_BUFFER_SIZE: positiveInt(256),
  SUBSCRIBER_OVERFLOW_POLICY: z.enum(['drop-oldest', 'disconnect']).default('drop-oldest'),
  RECONNECT_INITIAL_DELAY_MS: positiveInt(500),
  RECONNECT_MAX_DELAY_MS: positiveInt(30_000),
  UPSTREAM_SILENCE_GRACE_SECONDS: z.coerce.number().positive().default(30),
  SHUTDOWN_GRACE_MS: positiveInt(2000),
});

export type MonitorEnv = z.infer<typeof MonitorEnvSchema>;
export type DiscoveryMode = MonitorEnv['DISCOVERY_MODE'];
export type OverflowPolicy = MonitorEnv['SUBSCRIBER_OVERFLOW_POLICY'];

export interface ReconnectPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export interface MonitorConfig {
  port: number;
  logLevel: LogLevel;
  discovery: {
    mode: DiscoveryMode;
    enabled: boolean;
    pollIntervalMs: number;
    linkStatusIntervalMs: number;
    interfaces: string[];
    silenceGraceMs: number;
    shutdownGraceMs: number;
    reconnect: ReconnectPolicy;
  };
  hubble: {
    relayAddress: string;
    protoDir: string;
    flushIntervalMs: number;
    flowBytesEstimate: number;
    namespace?: string;
    endpointCacheTtlMs: number;
  };
  linkState: {
    idleTimeoutMs: number;
    sweepIntervalMs: number;
  };
  events: {
    historySize: number;
    subscriberBufferSize: number;
    overflowPolicy: OverflowPolicy;
  };
  demoMode: boolean;
  redisUrl?: string;
}

/**
 * 원시 환경 변수 맵을 검증하고 서비스 전체에서 쓰는 MonitorConfig 로 변환한다.
 * 잘못된 값이 있으면 ZodError 를 그대로 던진다.
 */
export function parseMonitorConfig(
  env: Record<string, string | undefined>,
  options: { isTest?: boolean; cwd?: string } = {},
): MonitorConfig {
  const parsed = MonitorEnvSchema.parse(env);
  const cwd = options.cwd ?? process.cwd();

  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    discovery: {
      mode: parsed.DISCOVERY_MODE,
      enabled: parsed.DISCOVERY_ENABLED && !options.isTest,
      pollIntervalMs: parsed.POLL_INTERVAL_MS,
      linkStatusIntervalMs: parsed.LINK_STATUS_INTERVAL_MS,
      interfaces: parsed.INTERFACES,
      silenceGraceMs: parsed.UPSTREAM_SILENCE_GRACE_SECONDS * 1000,
      shutdownGraceMs: parsed.SHUTDOWN_GRACE_MS,
      reconnect: {
        initialDelayMs: parsed.RECONNECT_INITIAL_DELAY_MS,
        maxDelayMs: Math.max(parsed.RECONNECT_MAX_DELAY_MS, parsed.RECONNECT_INITIAL_DELAY_MS),
        factor: 2,
      },
    },
    hubble: {
      relayAddress: parsed.HUBBLE_RELAY_ADDR,
      protoDir: parsed.HUBBLE_PROTO_DIR ?? join(cwd, 'proto'),
      flushIntervalMs: parsed.HUBBLE_FLUSH_INTERVAL_MS,
      flowBytesEstimate: parsed.HUBBLE_FLOW_BYTES_ESTIMATE,
      namespace: parsed.CILIUM_NAMESPACE,
      endpointCacheTtlMs: parsed.ENDPOINT_CACHE_TTL_MS,
    },
    linkState: {
      idleTimeoutMs: Math.round(parsed.IDLE_TIMEOUT_SECONDS * 1000),
      sweepIntervalMs: parsed.IDLE_SWEEP_INTERVAL_MS,
    },
    events: {
      historySize: parsed.EVENT_HISTORY_SIZE,
      subscriberBufferSize: parsed.SUBSCRIBER_BUFFER_SIZE,
      overflowPolicy: parsed.SUBSCRIBER_OVERFLOW_POLICY,
    },
    demoMode: parsed.DEMO_MODE,
    redisUrl: parsed.LINK_MONITOR_REDIS_URL,
  };
}

/** 최소 로그 레벨부터 error 까지의 Nest LogLevel 목록을 만든다. */
export function resolveLogLevels(level: LogLevel): LogLevel[] {
  const index = LOG_LEVEL_ORDER.indexOf(level);
  return LOG_LEVEL_ORDER.slice(0, index < 0 ? 3 : index + 1);
}

export function isTestEnvironment(env: Record<string, string | undefined> = process.env): boolean {
  return env.NODE_ENV === 'test' || env.JEST_WORKER_ID !== undefined;
}
