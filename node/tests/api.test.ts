import request from 'supertest';
import express, { type Express } from 'express';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createApp } from '@/app';
import { attachCorrelationId } from '@/middleware/correlation';
import { requestTimeout } from '@/stability/errorHandlers';
import { FailingGenerator, RecordingGenerator, createTestPipeline, type TestPipeline } from './helpers';

describe('HTTP API', () => {
  let pipeline: TestPipeline;
  let app: Express;

  beforeAll(async () => {
    pipeline = await createTestPipeline(new RecordingGenerator('Visa-free for up to 30 days.'), {
      NODE_ENV: 'test',
    });
    app = createApp(pipeline, pipeline.config);
  });

  afterAll(() => pipeline.cleanup());

  it('GET /health reports status and catalog size', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('OK');
    expect(res.body.flights).toBe(14);
    expect(res.headers['x-correlation-id']).toBeDefined();
  });

  it('should echo a caller-supplied correlation id', async () => {
    const res = await request(app).get('/health').set('x-correlation-id', 'req-42');
    expect(res.headers['x-correlation-id']).toBe('req-42');
  });

  describe('POST /api/flights/search', () => {
    it('should search with free text', async () => {
      const res = await request(app)
        .post('/api/flights/search')
        .send({ query: 'nonstop flights to London under $800' });

      expect(res.status).toBe(200);
      expect(res.body.success).toBe(true);
      expect(res.body.data.criteria).toEqual({ destination: 'London', maxPrice: 800, maxLayovers: 0 });
      expect(res.body.data.summary).toBe('to London, under $800, nonstop');
      expect(res.body.data.flights.map((f: { id: string }) => f.id)).toEqual(['FL006']);
    });

    it('should search with structured criteria', async () => {
      const res = await request(app)
        .post('/api/flights/search')
        .send({ criteria: { alliance: 'SkyTeam', refundableOnly: true } });

      expect(res.status).toBe(200);
      expect(res.body.data.filtered).toBe(true);
      expect(res.body.data.count).toBe(1);
      expect(res.body.data.flights[0].id).toBe('FL007');
    });

    it('should reject invalid structured criteria', async () => {
      const res = await request(app)
        .post('/api/flights/search')
        .send({ criteria: { maxPrice: 'cheap' } });

      expect(res.status).toBe(400);
      expect(res.body.success).toBe(false);
      expect(res.body.code).toBe('invalid_argument');
      expect(res.body.errors[0].path).toBe('maxPrice');
    });

    it('should reject a body with neither query nor criteria', async () => {
      const res = await request(app).post('/api/flights/search').send({});
      expect(res.status).toBe(400);
      expect(res.body.message).toBe('invalid request body');
    });
  });

  describe('GET /api/flights/:id', () => {
    it('should return one flight', async () => {
      const res = await request(app).get('/api/flights/FL002');
      expect(res.status).toBe(200);
      expect(res.body.data.airline).toBe('Emirates');
    });

    it('should answer 404 for an unknown id', async () => {
      const res = await request(app).get('/api/flights/FL999').set('x-correlation-id', 'req-404');
      expect(res.status).toBe(404);
      expect(res.body.code).toBe('not_found');
      expect(res.body.correlationId).toBe('req-404');
    });
  });

  describe('POST /api/policy/answer', () => {
    it('should answer with passages', async () => {
      const res = await request(app)
        .post('/api/policy/answer')
        .send({ question: 'Do UAE passport holders need a visa for Japan?', k: 2 });

      expect(res.status).toBe(200);
      expect(res.body.data.answer).toBe('Visa-free for up to 30 days.');
      expect(res.body.data.passages).toHaveLength(2);
      expect(res.body.data.passages[0].source).toBe('visa_rules.md');
      expect(res.body.data.passages[0].text).toContain('UAE passport holders can enter Japan visa-free');
      expect(res.body.data.passages[0].embedding).toBeUndefined();
    });

    it('should reject a non-positive k', async () => {
      const res = await request(app).post('/api/policy/answer').send({ question: 'visa?', k: 0 });
      expect(res.status).toBe(400);
    });
  });

  describe('POST /api/chat', () => {
    it('should route to flight search', async () => {
      const res = await request(app).post('/api/chat').send({ message: 'cheapest flights to Paris' });

      expect(res.status).toBe(200);
      expect(res.body.data.capability).toBe('flight_search');
      expect(res.body.data.flights.map((f: { id: string }) => f.id)).toEqual(['FL008', 'FL007']);
    });

    it('should honour a forced capability', async () => {
      const res = await request(app)
        .post('/api/chat')
        .send({ message: 'flights and visas', capability: 'policy_search' });

      expect(res.status).toBe(200);
      expect(res.body.data.capability).toBe('policy_search');
      expect(res.body.data.message).toBe('Visa-free for up to 30 days.');
    });

    it('should reject an empty message', async () => {
      const res = await request(app).post('/api/chat').send({ message: '   ' });
      expect(res.status).toBe(400);
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await request(app).get('/api/nowhere');
    expect(res.status).toBe(404);
    expect(res.body.message).toBe('Route not found: GET /api/nowhere');
    expect(res.body.correlationId).toBe(res.headers['x-correlation-id']);
  });
});

describe('HTTP API with a failing model', () => {
  let pipeline: TestPipeline<FailingGenerator>;

  beforeAll(async () => {
    pipeline = await createTestPipeline(new FailingGenerator());
  });

  afterAll(() => pipeline.cleanup());

  it('should map generation failures to 502', async () => {
    const app = createApp(pipeline, pipeline.config);
    const res = await request(app).post('/api/policy/answer').send({ question: 'refund policy' });

    expect(res.status).toBe(502);
    expect(res.body.code).toBe('upstream_error');
    expect(res.body.message).toBe('generation call failed: rate limited');
  });
});

describe('requestTimeout', () => {
  it('should answer 408 with the correlation id when a handler is too slow', async () => {
    const slow = express();
    slow.use(attachCorrelationId);
    slow.use(requestTimeout(20));
    slow.get('/slow', (_req, res) => {
      setTimeout(() => {
        if (!res.headersSent) res.json({ late: true });
      }, 200);
    });

    const res = await request(slow).get('/slow').set('x-correlation-id', 'req-slow');

    expect(res.status).toBe(408);
    expect(res.body).toEqual({
      success: false,
      message: 'Request exceeded 20ms timeout',
      code: 'request_timeout',
      correlationId: 'req-slow',
    });
  });
});
