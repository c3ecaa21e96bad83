import type { Logger } from '@nestjs/common';
import { abortableSleep } from '../common/abortable-sleep';
import type { ReconnectPolicy } from '../config/monitor.config';

/** attempt 번째(0부터) 재시도 전 대기 시간. maxDelayMs 를 넘지 않는다. */
export function computeBackoffDelay(policy: ReconnectPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.factor, Math.max(0, attempt));
  return Math.min(delay, policy.maxDelayMs);
}

export interface ReconnectOptions {
  name: string;
  policy: ReconnectPolicy;
  signal: AbortSignal;
  logger: Pick<Logger, 'log' | 'warn'>;
  /** 연결이 끊길 때마다 호출된다. 상태 보고용. */
  onDisconnect?: (error: unknown) => void;
  now?: () => number;
}

/**
 * connect 가 끝나거나 실패하면 지수 백오프 후 다시 연결한다. signal 이 abort 될 때만 반환한다.
 * maxDelayMs 보다 오래 유지된 연결이 끊기면 백오프를 처음부터 다시 센다.
 */
export async function runWithReconnect(
  connect: (signal: AbortSignal) => Promise<void>,
  options: ReconnectOptions,
): Promise<void> {
  const { name, policy, signal, logger } = options;
  const now = options.now ?? Date.now;
  let attempt = 0;

  while (!signal.aborted) {
    const startedAt = now();
    let failure: unknown = null;
    try {
      await connect(signal);
    } catch (error) {
      failure = error;
    }
    if (signal.aborted) {
      return;
    }

    if (now() - startedAt > policy.maxDelayMs) {
      attempt = 0;
    }
    const delay = computeBackoffDelay(policy, attempt);
    attempt += 1;
    options.onDisconnect?.(failure);
    logger.warn(
      failure === null
        ? `${name} stream ended; reconnecting in ${delay} ms`
        : `${name} unavailable (${describeError(failure)}); reconnecting in ${delay} ms`,
    );
    await abortableSleep(delay, signal);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
