import type { LinkMetrics } from '../topology/topology.types';
import type { RawCounterSample } from './discovery.types';

export interface MetricsUpdate {
  key: string;
  metrics: LinkMetrics;
  timestamp: number;
}

interface Baseline {
  rxBytes: number;
  txBytes: number;
  rxPackets: number;
  txPackets: number;
  timestamp: number;
}

/**
 * 누적 카운터 샘플을 속도(bps/pps)와 이용률로 바꾼다.
 * 키마다 직전 샘플을 기준선으로 들고 있으며, 카운터가 줄어들면(리셋/wraparound) 기준선만 다시 잡는다.
 */
export class ObservationNormalizer {
  private readonly baselines = new Map<string, Baseline>();

  static keyFor(sample: Pick<RawCounterSample, 'iface' | 'linkId'>): string {
    return sample.linkId ?? `iface:${sample.iface}`;
  }

  /** 기준선이 없거나 갱신만 한 경우 null. */
  normalize(sample: RawCounterSample, speedMbps: number): MetricsUpdate | null {
    const key = ObservationNormalizer.keyFor(sample);
    const previous = this.baselines.get(key);
    const current: Baseline = {
      rxBytes: sample.rxBytes,
      txBytes: sample.txBytes,
      rxPackets: sample.rxPackets,
      txPackets: sample.txPackets,
      timestamp: sample.timestamp,
    };

    if (!previous) {
      this.baselines.set(key, current);
      return null;
    }

    const elapsedSeconds = (current.timestamp - previous.timestamp) / 1000;
    if (elapsedSeconds <= 0) {
      return null;
    }

    const deltas = {
      rxBytes: current.rxBytes - previous.rxBytes,
      txBytes: current.txBytes - previous.txBytes,
      rxPackets: current.rxPackets - previous.rxPackets,
      txPackets: current.txPackets - previous.txPackets,
    };
    this.baselines.set(key, current);
    if (Object.values(deltas).some((delta) => delta < 0)) {
      return null;
    }

    const rxBps = (deltas.rxBytes * 8) / elapsedSeconds;
    const txBps = (deltas.txBytes * 8) / elapsedSeconds;
    return {
      key,
      timestamp: current.timestamp,
      metrics: {
        rx_bps: rxBps,
        tx_bps: txBps,
        rx_pps: deltas.rxPackets / elapsedSeconds,
        tx_pps: deltas.txPackets / elapsedSeconds,
        rx_bytes_total: current.rxBytes,
        tx_bytes_total: current.txBytes,
        utilization: computeUtilization(Math.max(rxBps, txBps), speedMbps),
        latency_ms: null,
        packet_loss: null,
      },
    };
  }

  /** keys 에 없는 기준선을 버리고 버린 개수를 돌려준다. */
  retain(keys: ReadonlySet<string>): number {
    let removed = 0;
    for (const key of [...this.baselines.keys()]) {
      if (!keys.has(key)) {
        this.baselines.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get trackedKeys(): number {
    return this.baselines.size;
  }
}

/** 링크 속도를 모르면(0 이하) 0. 결과는 [0, 1] 로 자른다. */
export function computeUtilization(bitsPerSecond: number, speedMbps: number): number {
  if (!(speedMbps > 0)) {
    return 0;
  }
  return Math.min(1, Math.max(0, bitsPerSecond / (speedMbps * 1_000_000)));
}
