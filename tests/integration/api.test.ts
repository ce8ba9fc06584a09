// Integration tests for API routes
import { describe, it, expect, beforeEach } from 'vitest';
import type express from 'express';
import jwt from 'jsonwebtoken';
import request from 'supertest';

import { createApp } from '../../src/app.js';
import { config } from '../../src/config/index.js';
import type { YieldOracleService } from '../../src/services/YieldOracleService.js';
import {
  ASSET_A,
  ASSET_B,
  FakeRateSource,
  SOURCE_A,
  SOURCE_B,
  T0,
  buildOracle,
  manualClock,
  silentLogger
} from '../helpers/fakes.js';

const ADMIN = '0x' + 'c1'.repeat(20);
const OUTSIDER = '0x' + 'c2'.repeat(20);

function bearer(address: string): string {
  return `Bearer ${jwt.sign({ address }, config.jwtSecret)}`;
}

describe('API Integration Tests', () => {
  let app: express.Application;
  let oracle: YieldOracleService;
  let sourceA: FakeRateSource;
  let sourceB: FakeRateSource;
  let time: ReturnType<typeof manualClock>;

  beforeEach(() => {
    sourceA = new FakeRateSource(SOURCE_A, [100n, 300n]);
    sourceB = new FakeRateSource(SOURCE_B, [50n]);
    time = manualClock(T0);
    const built = buildOracle([sourceA, sourceB], time.clock, { admins: [ADMIN] });
    oracle = built.oracle;
    app = createApp({ oracle, gate: built.gate, logger: silentLogger() });
  });

  async function registerA() {
    await request(app)
      .post('/api/v1/assets')
      .set('x-api-key', config.apiKey)
      .send({ asset: ASSET_A, rateSource: SOURCE_A })
      .expect(201);
  }

  describe('GET /api/v1/health', () => {
    it('should return health status without authentication', async () => {
      const response = await request(app).get('/api/v1/health').expect(200);

      expect(response.body.status).toBe('ok');
      expect(response.body.service).toBe('pool-yield-oracle');
      expect(response.body.assets).toBe(0);
      expect(response.body.lastRefresh).toBeNull();
    });
  });

  describe('authentication', () => {
    it('should reject admin requests without credentials', async () => {
      const response = await request(app)
        .post('/api/v1/assets')
        .send({ asset: ASSET_A, rateSource: SOURCE_A })
        .expect(401);

      expect(response.body).toEqual({ error: 'Authentication required' });
    });

    it('should reject a token signed with another secret', async () => {
      const response = await request(app)
        .post('/api/v1/refresh')
        .set('Authorization', `Bearer ${jwt.sign({ address: ADMIN }, 'other-test-secret')}`)
        .expect(401);

      expect(response.body).toEqual({ error: 'Invalid token' });
    });

    it('should reject a token without an address claim', async () => {
      const response = await request(app)
        .post('/api/v1/refresh')
        .set('Authorization', `Bearer ${jwt.sign({ sub: 'someone' }, config.jwtSecret)}`)
        .expect(401);

      expect(response.body).toEqual({ error: 'Token missing address claim' });
    });

    it('should forbid authenticated callers that are not admins', async () => {
      const response = await request(app)
        .post('/api/v1/assets')
        .set('Authorization', bearer(OUTSIDER))
        .send({ asset: ASSET_A, rateSource: SOURCE_A })
        .expect(403);

      expect(response.body).toEqual({
        error: 'Unauthorized',
        message: 'Caller is not authorized for this operation'
      });
      expect(oracle.listAssets()).toEqual([]);
    });

    it('should accept admins identified by JWT in any case', async () => {
      await request(app)
        .post('/api/v1/assets')
        .set('Authorization', bearer(ADMIN.toUpperCase()))
        .send({ asset: ASSET_A, rateSource: SOURCE_A })
        .expect(201);
    });
  });

  describe('POST /api/v1/assets', () => {
    it('should create then acknowledge a repeated registration', async () => {
      const created = await request(app)
        .post('/api/v1/assets')
        .set('x-api-key', config.apiKey)
        .send({ asset: ASSET_A, rateSource: SOURCE_A })
        .expect(201);

      expect(created.body).toEqual({ asset: ASSET_A, rateSource: SOURCE_A, created: true, rebound: true });

      const repeated = await request(app)
        .post('/api/v1/assets')
        .set('x-api-key', config.apiKey)
        .send({ asset: ASSET_A, rateSource: SOURCE_A })
        .expect(200);

      expect(repeated.body).toEqual({ asset: ASSET_A, rateSource: SOURCE_A, created: false, rebound: false });

      const listed = await request(app).get('/api/v1/assets').expect(200);
      expect(listed.body).toEqual({
        assets: [{ asset: ASSET_A, rateSource: SOURCE_A, position: 0 }],
        count: 1
      });
    });

    it('should reject malformed identifiers', async () => {
      const response = await request(app)
        .post('/api/v1/assets')
        .set('x-api-key', config.apiKey)
        .send({ asset: 'not-an-address', rateSource: SOURCE_A })
        .expect(400);

      expect(response.body).toEqual({ error: 'InvalidAddressOrIdentifier', message: 'Invalid asset' });
    });

    it('should reject a body missing the rate source', async () => {
      const response = await request(app)
        .post('/api/v1/assets')
        .set('x-api-key', config.apiKey)
        .send({ asset: ASSET_A })
        .expect(400);

      expect(response.body.error).toBe('InvalidArgument');
      expect(response.body.message).toBe('Invalid request body');
    });
    it('should answer a malformed JSON body with 400', async () => {
      const response = await request(app)
        .post('/api/v1/assets')
        .set('x-api-key', config.apiKey)
        .set('Content-Type', 'application/json')
        .send('{"asset":')
        .expect(400);

      expect(response.body.error).toBe('InvalidArgument');
    });

    it('should answer an oversized body with 413', async () => {
      const response = await request(app)
        .post('/api/v1/assets')
        .set('x-api-key', config.apiKey)
        .send({ asset: ASSET_A, rateSource: SOURCE_A, padding: 'x'.repeat(200_000) })
        .expect(413);

      expect(response.body.error).toBe('InvalidArgument');
      expect(oracle.listAssets()).toEqual([]);
    });
  });

  describe('POST /api/v1/assets/:asset/capacity', () => {
    it('should grow the buffer and ignore shrink requests', async () => {
      await registerA();

      const grown = await request(app)
        .post(`/api/v1/assets/${ASSET_A}/capacity`)
        .set('x-api-key', config.apiKey)
        .send({ capacity: 8 })
        .expect(200);
      expect(grown.body).toEqual({ asset: ASSET_A, capacity: 8 });

      const shrunk = await request(app)
        .post(`/api/v1/assets/${ASSET_A}/capacity`)
        .set('x-api-key', config.apiKey)
        .send({ capacity: 2 })
        .expect(200);
      expect(shrunk.body).toEqual({ asset: ASSET_A, capacity: 8 });
    });

    it('should echo the normalized asset key', async () => {
      await registerA();

      const response = await request(app)
        .post(`/api/v1/assets/%20${ASSET_A.toUpperCase()}%20/capacity`)
        .set('x-api-key', config.apiKey)
        .send({ capacity: 6 })
        .expect(200);

      expect(response.body).toEqual({ asset: ASSET_A, capacity: 6 });
    });

    it('should map CapacityTooLarge to 400', async () => {
      await registerA();

      const response = await request(app)
        .post(`/api/v1/assets/${ASSET_A}/capacity`)
        .set('x-api-key', config.apiKey)
        .send({ capacity: 16 })
        .expect(400);

      expect(response.body).toEqual({ error: 'CapacityTooLarge', message: 'Capacity exceeds maximum of 15' });
    });

    it('should reject non-integer capacities', async () => {
      await registerA();

      const response = await request(app)
        .post(`/api/v1/assets/${ASSET_A}/capacity`)
        .set('x-api-key', config.apiKey)
        .send({ capacity: 'ten' })
        .expect(400);

      expect(response.body.error).toBe('InvalidArgument');
    });
  });

  describe('GET /api/v1/assets/:asset/yield', () => {
    it('should return 404 for unregistered assets', async () => {
      const response = await request(app).get(`/api/v1/assets/${ASSET_B}/yield`).expect(404);

      expect(response.body).toEqual({ error: 'UnknownAsset', message: 'Asset is not registered' });
    });

    it('should return 409 until two distinct timestamps are latched', async () => {
      await registerA();
      await request(app)
        .post(`/api/v1/assets/${ASSET_A}/latch`)
        .set('x-api-key', config.apiKey)
        .expect(200);

      const response = await request(app).get(`/api/v1/assets/${ASSET_A}/yield`).expect(409);

      expect(response.body.error).toBe('InsufficientSamples');
    });

    it('should report the time-weighted rate and its annualized form', async () => {
      await registerA();
      const first = await request(app)
        .post(`/api/v1/assets/${ASSET_A}/latch`)
        .set('x-api-key', config.apiKey)
        .expect(200);
      expect(first.body).toEqual({
        asset: ASSET_A,
        rateSource: SOURCE_A,
        timestamp: T0,
        rate: '100',
        writeIndex: 1
      });

      time.advance(10);
      await request(app)
        .post(`/api/v1/assets/${ASSET_A}/latch`)
        .set('x-api-key', config.apiKey)
        .expect(200);

      const response = await request(app).get(`/api/v1/assets/${ASSET_A}/yield`).expect(200);

      expect(response.body).toEqual({
        asset: ASSET_A,
        rate: '200',
        rateDecimal: '0.0000000000000002',
        annualized: '6307200000',
        annualizedDecimal: '0.0000000063072',
        window: {
          fromTimestamp: T0,
          toTimestamp: T0 + 10,
          totalElapsed: '10',
          samples: 2
        }
      });
    });
  });

  describe('GET /api/v1/assets/:asset/snapshots', () => {
    it('should return raw slots with the cursor', async () => {
      await registerA();
      await request(app)
        .post(`/api/v1/assets/${ASSET_A}/latch`)
        .set('x-api-key', config.apiKey)
        .expect(200);

      const response = await request(app).get(`/api/v1/assets/${ASSET_A}/snapshots`).expect(200);

      expect(response.body).toEqual({
        writeIndex: 1,
        capacity: 5,
        snapshots: [
          { timestamp: T0, rate: '100' },
          { timestamp: 0, rate: '0' },
          { timestamp: 0, rate: '0' },
          { timestamp: 0, rate: '0' },
          { timestamp: 0, rate: '0' }
        ]
      });
    });
  });

  describe('POST /api/v1/refresh', () => {
    it('should latch healthy assets and report failing ones', async () => {
      await registerA();
      await request(app)
        .post('/api/v1/assets')
        .set('x-api-key', config.apiKey)
        .send({ asset: ASSET_B, rateSource: SOURCE_B })
        .expect(201);
      sourceB.failWith(new Error('rpc down'));

      const response = await request(app)
        .post('/api/v1/refresh')
        .set('Authorization', bearer(ADMIN))
        .expect(200);

      expect(response.body).toEqual({
        trigger: 'manual',
        startedAt: T0,
        latched: [{ asset: ASSET_A, rateSource: SOURCE_A, timestamp: T0, rate: '100', writeIndex: 1 }],
        failures: [{ asset: ASSET_B, code: 'RateSourceUnavailable', message: 'Rate source read failed: rpc down' }]
      });

      const health = await request(app).get('/api/v1/health').expect(200);
      expect(health.body.lastRefresh).toEqual({ trigger: 'manual', startedAt: T0, latched: 1, failed: 1 });
    });

    it('should map a single failing latch to 502', async () => {
      await registerA();
      sourceA.failWith(new Error('rpc down'));

      const response = await request(app)
        .post(`/api/v1/assets/${ASSET_A}/latch`)
        .set('x-api-key', config.apiKey)
        .expect(502);

      expect(response.body).toEqual({ error: 'RateSourceUnavailable', message: 'Rate source read failed: rpc down' });
    });
  });

  describe('GET /metrics', () => {
    it('should expose oracle counters', async () => {
      await registerA();
      await request(app)
        .post(`/api/v1/assets/${ASSET_A}/latch`)
        .set('x-api-key', config.apiKey)
        .expect(200);

      const response = await request(app).get('/metrics').expect(200);

      expect(response.text).toContain('pool_yield_oracle_snapshots_latched_total');
      expect(response.text).toContain('pool_yield_oracle_registered_assets');
    });
  });
});
