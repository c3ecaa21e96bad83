import type { RawCounterSample } from './discovery.types';
import { ObservationNormalizer, computeUtilization } from './observation-normalizer';

function sample(overrides: Partial<RawCounterSample>): RawCounterSample {
  return {
    kind: 'counters',
    iface: 'eth1',
    rxBytes: 0,
    txBytes: 0,
    rxPackets: 0,
    txPackets: 0,
    timestamp: 0,
    ...overrides,
  };
}

describe('ObservationNormalizer', () => {
  it('seeds the baseline on the first sample', () => {
    const normalizer = new ObservationNormalizer();

    expect(normalizer.normalize(sample({ rxBytes: 10_000 }), 1000)).toBeNull();
    expect(normalizer.trackedKeys).toBe(1);
  });

  it('derives rates from counter deltas', () => {
    const normalizer = new ObservationNormalizer();
    normalizer.normalize(sample({ rxBytes: 1_000, txBytes: 2_000, rxPackets: 10, txPackets: 20, timestamp: 1_000 }), 100);

    const update = normalizer.normalize(
      sample({ rxBytes: 126_000, txBytes: 64_500, rxPackets: 110, txPackets: 70, timestamp: 1_500 }),
      100,
    );

    expect(update).toEqual({
      key: 'iface:eth1',
      timestamp: 1_500,
      metrics: {
        rx_bps: 2_000_000,
        tx_bps: 1_000_000,
        rx_pps: 200,
        tx_pps: 100,
        rx_bytes_total: 126_000,
        tx_bytes_total: 64_500,
        utilization: 0.02,
        latency_ms: null,
        packet_loss: null,
      },
    });
  });

  it('reseeds silently when a counter goes backwards', () => {
    const normalizer = new ObservationNormalizer();
    normalizer.normalize(sample({ rxBytes: 4_294_967_000, timestamp: 0 }), 1000);

    expect(normalizer.normalize(sample({ rxBytes: 500, timestamp: 100 }), 1000)).toBeNull();

    const next = normalizer.normalize(sample({ rxBytes: 1_500, timestamp: 1_100 }), 1000);
    expect(next?.metrics.rx_bps).toBe(8_000);
    expect(next?.metrics.rx_bps).toBeGreaterThanOrEqual(0);
  });

  it('keeps the baseline when time does not advance', () => {
    const normalizer = new ObservationNormalizer();
    normalizer.normalize(sample({ rxBytes: 100, timestamp: 1_000 }), 0);

    expect(normalizer.normalize(sample({ rxBytes: 900, timestamp: 1_000 }), 0)).toBeNull();
    expect(normalizer.normalize(sample({ rxBytes: 900, timestamp: 900 }), 0)).toBeNull();

    const update = normalizer.normalize(sample({ rxBytes: 1_100, timestamp: 2_000 }), 0);
    expect(update?.metrics.rx_bps).toBe(8_000);
    expect(update?.metrics.utilization).toBe(0);
  });

  it('keys by link id when the sample carries one', () => {
    const normalizer = new ObservationNormalizer();
    normalizer.normalize(sample({ linkId: 'r1-r2', timestamp: 0 }), 0);

    expect(normalizer.normalize(sample({ linkId: 'r1-r2', rxBytes: 125, timestamp: 1_000 }), 0)?.key).toBe('r1-r2');
  });

  it('drops baselines whose keys are no longer retained', () => {
    const normalizer = new ObservationNormalizer();
    normalizer.normalize(sample({ linkId: 'r1-r2' }), 0);
    normalizer.normalize(sample({ iface: 'eth2' }), 0);

    expect(normalizer.retain(new Set(['r1-r2']))).toBe(1);
    expect(normalizer.trackedKeys).toBe(1);
    expect(normalizer.normalize(sample({ iface: 'eth2', rxBytes: 125, timestamp: 1_000 }), 0)).toBeNull();
  });
});

describe('computeUtilization', () => {
  it('clamps to [0, 1] and ignores unknown speeds', () => {
    expect(computeUtilization(5_000_000_000, 1000)).toBe(1);
    expect(computeUtilization(250_000_000, 1000)).toBe(0.25);
    expect(computeUtilization(1_000, 0)).toBe(0);
    expect(computeUtilization(1_000, -1)).toBe(0);
  });
});
