import { AgentGateway } from './agent.gateway';
import { AgentPushSource } from './agent-push.source';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');

describe('AgentGateway', () => {
  let source: AgentPushSource;
  let gateway: AgentGateway;

  beforeEach(() => {
    source = new AgentPushSource(8);
    gateway = new AgentGateway(source, () => NOW);
  });

  it('refuses frames while the push source is not observed', () => {
    const response = gateway.handleAgentEvent({ event_type: 'link_state_change', link_id: 'r1-r2', new_state: 'down' });

    expect(response).toEqual({
      event: 'agent-ack',
      data: { status: 'error', message: 'Agent ingestion is not running' },
    });
  });

  it('acknowledges valid frames and hands them to the push source', async () => {
    const controller = new AbortController();
    const iterator = source.observe(controller.signal);
    const next = iterator.next();

    const response = gateway.handleAgentEvent({ event_type: 'link_state_change', link_id: 'r1-r2', new_state: 'down' });

    expect(response.data).toEqual({ status: 'ok', message: 'Accepted link_state_change for r1-r2' });
    await expect(next).resolves.toEqual({
      done: false,
      value: { kind: 'state', linkId: 'r1-r2', state: 'down', timestamp: NOW },
    });

    controller.abort();
    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
    expect(source.isAccepting).toBe(false);
  });

  it('answers invalid frames with an error ack', () => {
    const response = gateway.handleAgentEvent({ event_type: 'node_removed', link_id: 'r1-r2' });

    expect(response.data.status).toBe('error');
    expect(response.data.message).toMatch(/^Invalid agent event: event_type: /);
  });

  it('tracks connected agents', () => {
    gateway.handleConnection({ id: 'a1' });
    gateway.handleConnection({ id: 'a2' });
    gateway.handleDisconnect({ id: 'a1' });

    expect(gateway.connectedAgents).toBe(1);
  });
});
