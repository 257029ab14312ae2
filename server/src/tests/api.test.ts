/**
 * HTTP API Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import request from 'supertest';
import { createApp } from '../app.js';
import { createHarness, type Harness } from './helpers/engine-harness.js';
import { TOKEN, WALLET } from './helpers/fixtures.js';

vi.mock('../services/logger.js', async () => (await import('./helpers/logger-mock.js')).loggerModule());

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

describe('HTTP API', () => {
  let harness: Harness;

  async function started(options: { autoExecute?: boolean } = {}) {
    harness = createHarness(options);
    await harness.engine.start();
    await vi.waitFor(() => expect(harness.history.opportunities).toHaveLength(1));
    return createApp(harness.engine);
  }

  afterEach(async () => {
    await harness.engine.stop();
  });

  describe('probes', () => {
    it('reports a healthy engine', async () => {
      const app = await started();

      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.live).toBe(true);
      expect(response.body.venues).toHaveLength(2);
      expect(response.body.services).toEqual({ database: null, websocket: { clients: 0 } });
    });

    it('is ready once every venue is UP', async () => {
      const app = await started();

      expect((await request(app).get('/ready')).body).toEqual({ ready: true });
      expect((await request(app).get('/live')).body).toEqual({ live: true });
    });

    it('degrades when a venue is DOWN', async () => {
      const app = await started();
      harness.sources[0]?.drop();
      await vi.waitFor(() => expect(harness.feeds[0]?.getStatus()).toBe('DOWN'));

      const health = await request(app).get('/health');
      const ready = await request(app).get('/ready');

      expect(health.body.status).toBe('degraded');
      expect(ready.status).toBe(503);
      expect(ready.body).toEqual({ ready: false, services: { venues: false, database: true } });
    });

    it('serves prometheus metrics', async () => {
      const app = await started();

      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
    });
  });

  describe('engine requests', () => {
    it('evaluates a snipe and renders amounts as strings', async () => {
      const app = await started();

      const response = await request(app).post('/api/engine/snipe').send({ token: TOKEN, amount: 100 });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data.status).toBe('accepted');
      expect(response.body.data.opportunity.inputs.legs[0].amountIn).toBe('100000000000000000000');
    });

    it('rejects malformed snipe requests', async () => {
      const app = await started();

      const response = await request(app).post('/api/engine/snipe').send({ token: 'nope', amount: -1 });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Validation failed');
      expect(Object.keys(response.body.details).sort()).toEqual(['amount', 'token']);
    });

    it('answers 404 when no pool trades the token', async () => {
      const app = await started();

      const response = await request(app).post('/api/engine/snipe').send({ token: WALLET, amount: 1 });

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('no tradable pool for token');
    });

    it('runs an arbitrage scan', async () => {
      const app = await started();

      const response = await request(app).post('/api/engine/arb-scan');

      expect(response.status).toBe(200);
      expect(response.body.data.found).toBe(1);
      expect(response.body.data.opportunities[0].kind).toBe('arbitrage');
    });

    it('serves predictions for known tokens only', async () => {
      const app = await started();

      const known = await request(app).get(`/api/engine/predictions/${TOKEN}`);
      const unknown = await request(app).get(`/api/engine/predictions/${WALLET}`);

      expect(known.status).toBe(200);
      expect(known.body.data.launchScore.value).toBe(70);
      expect(unknown.status).toBe(404);
      expect(unknown.body.error).toBe('No market data for token');
    });
  });

  describe('opportunities', () => {
    it('lists and filters the book', async () => {
      const app = await started();

      const all = await request(app).get('/api/opportunities');
      const snipes = await request(app).get('/api/opportunities?kind=snipe');
      const rich = await request(app).get('/api/opportunities?minExpectedValue=100');

      expect(all.body.data.count).toBe(1);
      expect(snipes.body.data.count).toBe(0);
      expect(rich.body.data.count).toBe(0);
    });

    it('looks up by id', async () => {
      const app = await started();
      const [booked] = harness.engine.getOpportunities();

      const found = await request(app).get(`/api/opportunities/${booked?.id}`);
      const missing = await request(app).get(`/api/opportunities/${MISSING_ID}`);
      const invalid = await request(app).get('/api/opportunities/not-a-uuid');

      expect(found.status).toBe(200);
      expect(found.body.data.id).toBe(booked?.id);
      expect(missing.status).toBe(404);
      expect(invalid.status).toBe(400);
    });
  });

  describe('executions', () => {
    it('lists settled executions with a state filter', async () => {
      const app = await started({ autoExecute: true });
      await vi.waitFor(() => expect(harness.engine.listExecutions()[0]?.state).toBe('Settled'));

      const settled = await request(app).get('/api/executions?state=Settled');
      const failed = await request(app).get('/api/executions?state=Failed');

      expect(settled.body.data.count).toBe(1);
      expect(settled.body.data.records[0].outcome.txHash).toBe('0xabc');
      expect(failed.body.data.count).toBe(0);
    });

    it('leaves terminal records alone on manual resolution', async () => {
      const app = await started({ autoExecute: true });
      await vi.waitFor(() => expect(harness.engine.listExecutions()[0]?.state).toBe('Settled'));
      const [record] = harness.engine.listExecutions();

      const response = await request(app)
        .post(`/api/executions/${record?.id}/resolve`)
        .send({ state: 'Failed', note: 'operator check' });

      expect(response.status).toBe(200);
      expect(response.body.data.state).toBe('Settled');
    });

    it('answers 404 for unknown executions', async () => {
      const app = await started();

      expect((await request(app).get(`/api/executions/${MISSING_ID}`)).status).toBe(404);
      expect((await request(app).post(`/api/executions/${MISSING_ID}/reconcile`)).status).toBe(404);
      expect(
        (await request(app).post(`/api/executions/${MISSING_ID}/resolve`).send({ state: 'Settled' })).status
      ).toBe(404);
    });
  });

  describe('venues', () => {
    it('lists venue health and recovers known venues', async () => {
      const app = await started();

      const venues = await request(app).get('/api/venues');
      const unknown = await request(app).post('/api/venues/venue-z/recover');
      const known = await request(app).post('/api/venues/venue-a/recover');

      expect(venues.body.data.map((venue: { venueId: string }) => venue.venueId)).toEqual(['venue-a', 'venue-b']);
      expect(unknown.status).toBe(404);
      expect(known.body.data).toEqual({ venueId: 'venue-a', recovered: false, status: 'UP' });
    });
  });

  it('answers 404 for unknown routes', async () => {
    const app = await started();

    const response = await request(app).get('/api/nothing-here');

    expect(response.status).toBe(404);
    expect(response.body.error).toBe('Not found');
  });
});
