import type { TopologyLink } from '../../topology/topology.types';
import type { RawCounterSample } from '../discovery.types';

interface LinkCounters {
  rxBytes: number;
  txBytes: number;
  rxPackets: number;
  txPackets: number;
}

/**
 * Hubble flow 는 바이트 수를 싣지 않으므로 FORWARDED flow 하나를 패킷 1개, bytesPerFlow 바이트로 본다.
 * 링크별 누적 카운터를 들고 있다가 flush 때마다 카운터 샘플로 내보낸다.
 */
export class FlowTranslator {
  private readonly counters = new Map<string, LinkCounters>();

  constructor(private readonly bytesPerFlow: number) {}

  /** 링크의 source 노드에서 나간 flow 는 tx, 반대 방향은 rx. FORWARDED 외의 verdict 는 무시한다. */
  record(link: Pick<TopologyLink, 'id' | 'source_node_id'>, fromNodeId: string, verdict: string): boolean {
    if (verdict !== 'FORWARDED') {
      return false;
    }
    const counters = this.counters.get(link.id) ?? { rxBytes: 0, txBytes: 0, rxPackets: 0, txPackets: 0 };
    if (fromNodeId === link.source_node_id) {
      counters.txBytes += this.bytesPerFlow;
      counters.txPackets += 1;
    } else {
      counters.rxBytes += this.bytesPerFlow;
      counters.rxPackets += 1;
    }
    this.counters.set(link.id, counters);
    return true;
  }

  /** 추적 중인 모든 링크의 누적 카운터. 새 flow 가 없어도 내보내서 속도 0 이 관측되게 한다. */
  samples(timestamp: number): RawCounterSample[] {
    return [...this.counters.entries()].map(([linkId, counters]): RawCounterSample => ({
      kind: 'counters',
      iface: `hubble:${linkId}`,
      linkId,
      ...counters,
      timestamp,
    }));
  }

  forget(linkId: string): void {
    this.counters.delete(linkId);
  }

  /** 토폴로지에서 사라진 링크의 카운터를 버린다. */
  retain(linkIds: ReadonlySet<string>): void {
    for (const linkId of [...this.counters.keys()]) {
      if (!linkIds.has(linkId)) {
        this.counters.delete(linkId);
      }
    }
  }

  get trackedLinks(): number {
    return this.counters.size;
  }
}
