import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import type { App } from 'supertest/types';
import { ZodValidationPipe } from 'nestjs-zod';
import { AppModule } from '../src/app.module';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('Link State API (e2e)', () => {
  let app: INestApplication<App>;

  const createPair = async (left: string, right: string) => {
    const server = app.getHttpServer();
    await request(server).post('/api/topology/nodes').send({ id: left, type: 'switch' }).expect(201);
    await request(server).post('/api/topology/nodes').send({ id: right, type: 'switch' }).expect(201);
    await request(server)
      .post('/api/topology/links')
      .send({
        id: `${left}-${right}`,
        source_node_id: left,
        target_node_id: right,
        source_interface: `${left}-e1`,
        target_interface: `${right}-e1`,
        speed_mbps: 1000,
      })
      .expect(201);
  };

  beforeAll(async () => {
    process.env.NODE_ENV = 'test';
    process.env.IDLE_TIMEOUT_SECONDS = '0.4';
    process.env.IDLE_SWEEP_INTERVAL_MS = '50';

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication();
    app.setGlobalPrefix('api');
    app.useGlobalPipes(new ZodValidationPipe());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('responds with health status', async () => {
    const { body } = await request(app.getHttpServer()).get('/api/health').expect(200);

    expect(body.status).toBe('ok');
    expect(body.discovery_mode).toBe('disabled');
    expect(body.discovery).toEqual([expect.objectContaining({ name: 'agent', running: true })]);
  });

  it('activates a link on traffic and demotes it after the idle timeout', async () => {
    await createPair('leaf1', 'leaf2');
    const server = app.getHttpServer();

    const { body: created } = await request(server).get('/api/links/leaf1-leaf2').expect(200);
    expect(created.state).toBe('idle');

    const { body: update } = await request(server)
      .put('/api/links/leaf1-leaf2/metrics')
      .send({ rx_bps: 1_000_000, tx_bps: 500_000 })
      .expect(200);
    expect(update.applied).toBe(true);
    expect(update.link.state).toBe('active');
    expect(update.events.map((event: { event_type: string }) => event.event_type)).toEqual([
      'metrics_update',
      'link_state_change',
    ]);

    const { body: history } = await request(server)
      .get('/api/events/history')
      .query({ link_id: 'leaf1-leaf2', event_type: 'link_state_change' })
      .expect(200);
    expect(history.count).toBe(1);
    expect(history.events[0]).toMatchObject({ old_state: 'idle', new_state: 'active', source: 'api' });

    await sleep(900);

    const { body: demoted } = await request(server).get('/api/links/leaf1-leaf2').expect(200);
    expect(demoted.state).toBe('idle');
    const { body: afterSweep } = await request(server)
      .get('/api/events/history')
      .query({ link_id: 'leaf1-leaf2', event_type: 'link_state_change' })
      .expect(200);
    expect(afterSweep.events.map((event: { new_state: string }) => event.new_state)).toEqual(['active', 'idle']);
    expect(afterSweep.events[1].trigger).toBe('idle_timeout');
  });

  it('refuses to remove a node that still owns a link', async () => {
    await createPair('spine1', 'spine2');
    const server = app.getHttpServer();

    await request(server).delete('/api/topology/nodes/spine1').expect(409);

    const { body: topology } = await request(server).get('/api/topology').expect(200);
    expect(topology.nodes.map((node: { id: string }) => node.id)).toContain('spine1');
    expect(topology.links.map((link: { id: string }) => link.id)).toContain('spine1-spine2');

    await request(server).delete('/api/topology/links/spine1-spine2').expect(200, {
      status: 'removed',
      link_id: 'spine1-spine2',
    });
    await request(server).delete('/api/topology/nodes/spine1').expect(200, { status: 'removed', node_id: 'spine1' });
  });

  it('rejects invalid, dangling and duplicate topology writes', async () => {
    const server = app.getHttpServer();
    await request(server).post('/api/topology/nodes').send({ id: 'edge1', type: 'router' }).expect(201);

    await request(server).post('/api/topology/nodes').send({ id: 'edge1', type: 'router' }).expect(409);
    await request(server).post('/api/topology/nodes').send({ id: 'edge2', type: 'toaster' }).expect(400);
    await request(server)
      .post('/api/topology/links')
      .send({
        id: 'edge1-ghost',
        source_node_id: 'edge1',
        target_node_id: 'ghost',
        source_interface: 'ge-0/0/0',
        target_interface: 'ge-0/0/1',
      })
      .expect(400);
    await request(server).get('/api/links/edge1-ghost').expect(404);
    await request(server).put('/api/links/edge1-ghost/state').query({ state: 'down' }).expect(404);
    await request(server).put('/api/links/edge1-ghost/state').query({ state: 'flapping' }).expect(400);
  });

  it('filters links by state and looks them up by interface', async () => {
    await createPair('core1', 'core2');
    const server = app.getHttpServer();

    const { body: override } = await request(server)
      .put('/api/links/core1-core2/state')
      .query({ state: 'down' })
      .expect(200);
    expect(override.applied).toBe(true);
    expect(override.event).toMatchObject({ event_type: 'link_state_change', new_state: 'down', trigger: 'override' });

    const { body: down } = await request(server).get('/api/links').query({ state: 'down' }).expect(200);
    expect(down.links.map((link: { id: string }) => link.id)).toEqual(['core1-core2']);
    expect(down.count).toBe(1);

    const { body: byInterface } = await request(server).get('/api/links/by-interface/core2-e1').expect(200);
    expect(byInterface.id).toBe('core1-core2');
    await request(server).get('/api/links/by-interface/nope0').expect(404);
  });

  it('accepts agent events one by one and in batches', async () => {
    await createPair('agg1', 'agg2');
    const server = app.getHttpServer();

    const { body: single } = await request(server)
      .post('/api/events')
      .send({ event_type: 'link_state_change', link_id: 'agg1-agg2', new_state: 'down' })
      .expect(200);
    expect(single).toMatchObject({ status: 'applied', link_id: 'agg1-agg2', state_changed: true });
    expect(single.link.state).toBe('down');

    await request(server)
      .post('/api/events')
      .send({ event_type: 'link_state_change', link_id: 'missing', new_state: 'down' })
      .expect(404);
    await request(server).post('/api/events').send({ event_type: 'node_added', link_id: 'agg1-agg2' }).expect(400);
    await request(server)
      .post('/api/events')
      .send({
        event_type: 'link_state_change',
        link_id: 'agg1-agg2',
        new_state: 'active',
        timestamp: '2100-01-01T00:00:00Z',
      })
      .expect(400);

    const { body: batch } = await request(server)
      .post('/api/events/batch')
      .send([
        { event_type: 'metrics_update', link_id: 'agg1-agg2', metrics: { rx_bps: 2_000 } },
        { event_type: 'metrics_update', link_id: 'agg1-agg2' },
        { event_type: 'link_state_change', link_id: 'missing', new_state: 'idle' },
      ])
      .expect(200);
    expect(batch.processed).toBe(1);
    expect(batch.failed).toBe(2);
    expect(batch.results[0]).toEqual({
      link_id: 'agg1-agg2',
      processed: true,
      status: 'applied',
      state_changed: true,
    });
    expect(batch.results[2]).toEqual({ link_id: 'missing', processed: false, error: 'Link not found: missing' });

    const { body: metrics } = await request(server).get('/api/links/agg1-agg2/metrics').expect(200);
    expect(metrics.rx_bps).toBe(2_000);
  });
});
