/**
 * REST API: historical query, stats and capcode lookups
 */
import { Router, type Response } from 'express';
import { ZodError, z } from 'zod';
import type { CapcodeActivityLog } from '../capcodes/activity.js';
import { isUnknownCapcode, normalizeCapcode, type CapcodeDirectory } from '../capcodes/table.js';
import { errorMessage } from '../errors.js';
import { compileFilter, parseFilterQuery } from '../hub/filter.js';
import type { BroadcastHub } from '../hub/service.js';
import type { IngestionLoop } from '../ingest/service.js';
import { logWarn } from '../logger.js';
import type { RetentionStore } from '../store/service.js';

export interface ApiDeps {
  capcodes: CapcodeDirectory;
  store: RetentionStore;
  hub: BroadcastHub;
  ingest: IngestionLoop;
  activity: CapcodeActivityLog | null;
  version: string;
}

const historyQuerySchema = z.object({
  maxAgeMs: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(10_000).default(500),
});

const activityQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(10_000).default(100),
  sort: z.enum(['recent', 'busiest']).default('recent'),
});

function badRequest(res: Response, err: unknown) {
  const message = err instanceof ZodError
    ? err.issues.map((i) => `${i.path.join('.') || 'query'}: ${i.message}`).join('; ')
    : errorMessage(err);
  res.status(400).json({ error: message });
}

export function createApiRouter(deps: ApiDeps): Router {
  const router = Router();
  const startedAt = Date.now();

  router.get('/health', (_req, res) => {
    res.json({
      name: 'flexwatch',
      version: deps.version,
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      status: 'operational',
    });
  });

  router.get('/alerts', (req, res) => {
    try {
      const filter = parseFilterQuery(req.query);
      const { maxAgeMs, limit } = historyQuerySchema.parse(req.query);
      const alerts = deps.store.query(compileFilter(filter), { maxAgeMs, limit });
      res.json({ filter, count: alerts.length, alerts });
    } catch (err) {
      badRequest(res, err);
    }
  });

  router.get('/alerts/:id', (req, res) => {
    const id = Number(req.params.id);
    const alert = Number.isInteger(id) ? deps.store.get(id) : undefined;
    if (!alert) return res.status(404).json({ error: 'Alert not found' });
    res.json(alert);
  });

  router.get('/stats', (_req, res) => {
    res.json({
      ingest: deps.ingest.stats(),
      store: deps.store.stats(),
      hub: deps.hub.stats(),
      capcodes: deps.capcodes.current().stats(),
      subscribers: deps.hub.list(),
    });
  });

  router.get('/capcodes/activity', (req, res) => {
    if (!deps.activity) return res.status(404).json({ error: 'Capcode activity ledger disabled' });
    try {
      const { limit, sort } = activityQuerySchema.parse(req.query);
      res.json(deps.activity.list({ limit, sort }));
    } catch (err) {
      badRequest(res, err);
    }
  });

  router.post('/capcodes/reload', async (_req, res) => {
    try {
      const table = await deps.capcodes.reload();
      res.json({ ok: true, ...table.stats() });
    } catch (err) {
      logWarn(`📟 Capcode reload failed, keeping previous table: ${errorMessage(err)}`);
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/capcodes/:capcode', (req, res) => {
    const capcode = normalizeCapcode(req.params.capcode);
    if (!capcode) return res.status(400).json({ error: 'capcode must be numeric' });
    const record = deps.capcodes.current().lookup(capcode);
    res.json({
      capcode,
      known: !isUnknownCapcode(record),
      record: isUnknownCapcode(record) ? null : record,
      activity: deps.activity?.get(capcode) ?? null,
    });
  });

  return router;
}
