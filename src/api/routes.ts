// API routes: yield read surface plus admin-gated registry and refresh operations
import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';

import type { AdminGate } from '../auth/AdminGate.js';
import { buildInfo } from '../buildInfo.js';
import { authenticate, type AuthRequest } from '../middleware/auth.js';
import type { LatchedSnapshot, RefreshReport, YieldOracleService } from '../services/YieldOracleService.js';
import type { Snapshot } from '../snapshots/types.js';
import { lookupKey } from '../utils/Address.js';
import { annualize, formatRate } from '../utils/fixedPoint.js';

const registerBody = z.object({
  asset: z.string().min(1),
  rateSource: z.string().min(1)
});

const capacityBody = z.object({
  capacity: z.number().int()
});

type Handler = (req: AuthRequest, res: Response) => Promise<void> | void;

/**
 * Express 4 does not forward rejected promises; route them to the error handler
 */
function handle(fn: Handler) {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
}

function assetParam(req: Request): string {
  return req.params.asset ?? '';
}

export function serializeSnapshot(snapshot: Snapshot) {
  return {
    timestamp: snapshot.timestamp,
    rate: snapshot.rate.toString()
  };
}

export function serializeLatched(latched: LatchedSnapshot) {
  return {
    asset: latched.asset,
    rateSource: latched.rateSource,
    timestamp: latched.timestamp,
    rate: latched.rate.toString(),
    writeIndex: latched.writeIndex
  };
}

export function serializeReport(report: RefreshReport) {
  return {
    trigger: report.trigger,
    startedAt: report.startedAt,
    latched: report.latched.map(serializeLatched),
    failures: report.failures
  };
}

export default function buildRoutes(oracle: YieldOracleService, gate: AdminGate) {
  const router = Router();

  /**
   * GET /health - Health check endpoint
   */
  router.get('/health', (_req, res) => {
    const last = oracle.getLastRefresh();
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: buildInfo.service,
      version: buildInfo.version,
      commit: buildInfo.commit,
      assets: oracle.listAssets().length,
      lastRefresh: last
        ? { trigger: last.trigger, startedAt: last.startedAt, latched: last.latched.length, failed: last.failures.length }
        : null
    });
  });

  router.get('/assets', (_req, res) => {
    const assets = oracle.listAssets();
    res.json({ assets, count: assets.length });
  });

  router.get('/assets/:asset/yield', handle((req, res) => {
    const window = oracle.getYieldWindow(assetParam(req));
    res.json({
      asset: lookupKey(assetParam(req)),
      rate: window.rate.toString(),
      rateDecimal: formatRate(window.rate),
      annualized: annualize(window.rate).toString(),
      annualizedDecimal: formatRate(annualize(window.rate)),
      window: {
        fromTimestamp: window.fromTimestamp,
        toTimestamp: window.toTimestamp,
        totalElapsed: window.totalElapsed.toString(),
        samples: window.samples
      }
    });
  }));

  router.get('/assets/:asset/snapshots', handle((req, res) => {
    const view = oracle.getSnapshots(assetParam(req));
    res.json({
      writeIndex: view.writeIndex,
      capacity: view.capacity,
      snapshots: view.snapshots.map(serializeSnapshot)
    });
  }));

  // Admin surface: authenticate, then mint a capability for the caller
  router.post('/assets', authenticate, handle((req, res) => {
    const capability = gate.authorize(req.user?.address);
    const body = registerBody.parse(req.body);
    const result = oracle.register(capability, body.asset, body.rateSource);
    res.status(result.created ? 201 : 200).json(result);
  }));

  router.post('/assets/:asset/capacity', authenticate, handle((req, res) => {
    const capability = gate.authorize(req.user?.address);
    const body = capacityBody.parse(req.body);
    const capacity = oracle.resize(capability, assetParam(req), body.capacity);
    res.json({ asset: lookupKey(assetParam(req)), capacity });
  }));

  router.post('/assets/:asset/latch', authenticate, handle(async (req, res) => {
    const capability = gate.authorize(req.user?.address);
    const latched = await oracle.refreshOne(capability, assetParam(req));
    res.json(serializeLatched(latched));
  }));

  router.post('/refresh', authenticate, handle(async (req, res) => {
    const capability = gate.authorize(req.user?.address);
    const report = await oracle.refreshAll(capability);
    res.json(serializeReport(report));
  }));

  return router;
}
