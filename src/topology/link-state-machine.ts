import type { LinkMetrics, LinkState } from './topology.types';

/** 링크 상태 전이를 일으킬 수 있는 트리거 집합. 이 외의 경로로는 state 가 바뀌지 않는다. */
export type LinkTrigger =
  | { type: 'traffic' }
  | { type: 'idle_timeout' }
  | { type: 'interface_down' }
  | { type: 'interface_up' }
  | { type: 'override'; state: LinkState };

export type LinkTriggerType = LinkTrigger['type'];

export const INITIAL_LINK_STATE: LinkState = 'idle';

/**
 * 현재 state 와 트리거로 다음 state 를 계산한다.
 * 전이가 없으면 current 를 그대로 돌려주므로 호출 측은 값 비교만으로 멱등성을 판단할 수 있다.
 *
 * - idle/down + traffic → active
 * - active + idle_timeout → idle
 * - any + interface_down → down
 * - down + interface_up → idle (트래픽이 다시 보이면 active)
 */
export function nextLinkState(current: LinkState, trigger: LinkTrigger): LinkState {
  switch (trigger.type) {
    case 'traffic':
      return current === 'idle' || current === 'down' ? 'active' : current;
    case 'idle_timeout':
      return current === 'active' ? 'idle' : current;
    case 'interface_down':
      return 'down';
    case 'interface_up':
      return current === 'down' ? 'idle' : current;
    case 'override':
      return trigger.state;
  }
}

export function hasTraffic(metrics: Pick<LinkMetrics, 'rx_bps' | 'tx_bps'>): boolean {
  return metrics.rx_bps > 0 || metrics.tx_bps > 0;
}
