import { TopologyValidationError } from '../../topology/topology.errors';
import { parseAgentEvent, toAgentObservation } from './agent-events';

const RECEIVED_AT = Date.parse('2026-03-01T12:00:00.000Z');

describe('agent events', () => {
  it('turns a state change into an explicit state observation', () => {
    const event = parseAgentEvent({
      event_type: 'link_state_change',
      link_id: 'r1-r2',
      old_state: 'active',
      new_state: 'down',
      timestamp: '2026-03-01T11:59:58.500Z',
    });

    expect(toAgentObservation(event, RECEIVED_AT)).toEqual({
      kind: 'state',
      linkId: 'r1-r2',
      state: 'down',
      timestamp: Date.parse('2026-03-01T11:59:58.500Z'),
    });
  });

  it('fills metric defaults and keeps epoch timestamps', () => {
    const event = parseAgentEvent({
      event_type: 'metrics_update',
      link_id: 'r1-r2',
      metrics: { rx_bps: 800, rx_pps: 1 },
      timestamp: RECEIVED_AT - 250,
    });

    expect(toAgentObservation(event, RECEIVED_AT)).toEqual({
      kind: 'metrics',
      linkId: 'r1-r2',
      metrics: {
        rx_bps: 800,
        tx_bps: 0,
        rx_pps: 1,
        tx_pps: 0,
        rx_bytes_total: 0,
        tx_bytes_total: 0,
        utilization: 0,
      },
      timestamp: RECEIVED_AT - 250,
    });
  });

  it('stamps events without a timestamp with the receive time', () => {
    const event = parseAgentEvent({ event_type: 'link_state_change', link_id: 'r1-r2', new_state: 'active' });

    expect(toAgentObservation(event, RECEIVED_AT).timestamp).toBe(RECEIVED_AT);
  });

  it('rejects timestamps too far ahead of the receive time', () => {
    const withinSkew = parseAgentEvent({
      event_type: 'metrics_update',
      link_id: 'r1-r2',
      metrics: { rx_bps: 1 },
      timestamp: RECEIVED_AT + 5_000,
    });
    const future = parseAgentEvent({
      event_type: 'metrics_update',
      link_id: 'r1-r2',
      metrics: { rx_bps: 1 },
      timestamp: '2100-01-01T00:00:00Z',
    });

    expect(toAgentObservation(withinSkew, RECEIVED_AT).timestamp).toBe(RECEIVED_AT + 5_000);
    expect(() => toAgentObservation(future, RECEIVED_AT)).toThrow(
      'Invalid agent event: timestamp: 2100-01-01T00:00:00.000Z is ahead of server time by more than 5000 ms',
    );
  });

  it.each([
    ['an unsupported event type', { event_type: 'node_added', link_id: 'r1-r2' }],
    ['a state change without new_state', { event_type: 'link_state_change', link_id: 'r1-r2' }],
    ['a metrics update without metrics', { event_type: 'metrics_update', link_id: 'r1-r2' }],
    ['an unknown state', { event_type: 'link_state_change', link_id: 'r1-r2', new_state: 'flapping' }],
    ['utilization above 1', { event_type: 'metrics_update', link_id: 'r1-r2', metrics: { utilization: 1.5 } }],
  ])('rejects %s', (_label, payload) => {
    expect(() => parseAgentEvent(payload)).toThrow(TopologyValidationError);
  });
});
