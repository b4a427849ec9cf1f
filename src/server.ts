import express, { NextFunction, Request, Response } from 'express';
import { getCatalogSummary, buildManifest } from './catalog/manifest';
import { generateTenantToken, validateTenantConfig, validateTenantId } from './config/tenant';
import { ConfigInvalid, StoreUnavailable, formatError } from './errors';
import { createLogger, maskToken } from './logger';
import type { IngestionScheduler } from './scheduler/scheduler';
import type { RateLimiter } from './store/rateLimiter';
import type { TenantStore } from './store/tenantStore';

const log = createLogger('HTTP');

export type ServerDeps = {
  store: TenantStore;
  scheduler: IngestionScheduler;
  rateLimiter: RateLimiter;
  version: string;
  staticDir?: string;
};

type Handler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward rejected promises to the error handler by itself
function route(fn: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function clientKey(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

function logoOverrideBody(body: unknown): { pattern: string; logoUrl: string; isRegex: boolean } {
  if (typeof body !== 'object' || body === null) throw new ConfigInvalid('Body must be a JSON object');
  const pattern = 'pattern' in body && typeof body.pattern === 'string' ? body.pattern.trim() : '';
  const logoUrl = 'logoUrl' in body && typeof body.logoUrl === 'string' ? body.logoUrl.trim() : '';
  const isRegex = 'isRegex' in body && body.isRegex === true;
  if (!pattern) throw new ConfigInvalid('pattern is required', 'pattern');
  if (!/^https?:\/\//.test(logoUrl)) throw new ConfigInvalid('logoUrl must be an http(s) URL', 'logoUrl');
  return { pattern, logoUrl, isRegex };
}

export function createApp(deps: ServerDeps): express.Express {
  const { store, scheduler, rateLimiter } = deps;
  const app = express();
  app.set('trust proxy', true);
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Accept');
    if (req.method === 'OPTIONS') return res.sendStatus(204);
    next();
  });
  app.use(express.json({ limit: '256kb' }));
  if (deps.staticDir) app.use('/static', express.static(deps.staticDir, { maxAge: '1d' }));

  app.get('/health', route(async (_req, res) => {
    const up = await store.ping();
    res.status(up ? 200 : 503).json({ status: up ? 'ok' : 'degraded', store: up ? 'up' : 'down' });
  }));

  app.post('/configure', route(async (req, res) => {
    const limit = await rateLimiter.consume(clientKey(req));
    if (!limit.allowed) {
      res.setHeader('Retry-After', String(limit.retryAfterSeconds));
      return res.status(429).json({ error: 'Too many registrations, try again later' });
    }
    const config = validateTenantConfig(req.body);
    const tenant = generateTenantToken();
    await store.putTenantConfig(tenant, config);
    scheduler.schedule(tenant, config);
    await store.recordAudit('tenant.create', tenant, { sources: config.sources.length });
    const report = await scheduler.triggerNow(tenant, config);
    res.status(201).json({ tenant, manifestUrl: `${config.hostUrl}/${tenant}/manifest.json`, report });
  }));

  app.put('/:tenant/configure', route(async (req, res) => {
    const tenant = validateTenantId(req.params.tenant);
    if (!(await store.getTenantConfig(tenant))) return res.status(404).json({ error: 'not configured' });
    const config = validateTenantConfig(req.body);
    await store.putTenantConfig(tenant, config);
    scheduler.schedule(tenant, config);
    await store.recordAudit('tenant.update', tenant, { sources: config.sources.length, cron: config.cron });
    const report = await scheduler.triggerNow(tenant, config);
    res.json({ tenant, report });
  }));

  app.delete('/:tenant', route(async (req, res) => {
    const tenant = validateTenantId(req.params.tenant);
    const known = await store.getTenantConfig(tenant);
    scheduler.unschedule(tenant);
    if (!known) return res.status(404).json({ error: 'not configured' });
    const removed = await store.deleteTenant(tenant);
    await store.recordAudit('tenant.delete', tenant, { keys: removed });
    res.status(204).end();
  }));

  app.get('/:tenant/manifest.json', route(async (req, res) => {
    const tenant = validateTenantId(req.params.tenant);
    const config = await store.getTenantConfig(tenant);
    if (!config) return res.status(404).json({ error: 'not configured' });
    const summary = await getCatalogSummary(store, tenant);
    res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, proxy-revalidate');
    res.json(buildManifest(summary, { version: deps.version, logo: deps.staticDir ? `${config.hostUrl}/static/logo.png` : undefined }));
  }));

  app.get('/:tenant/history', route(async (req, res) => {
    const tenant = validateTenantId(req.params.tenant);
    if (!(await store.getTenantConfig(tenant))) return res.status(404).json({ error: 'not configured' });
    res.json({ history: await store.getParseHistory(tenant) });
  }));

  app.get('/:tenant/logo-overrides', route(async (req, res) => {
    const tenant = validateTenantId(req.params.tenant);
    if (!(await store.getTenantConfig(tenant))) return res.status(404).json({ error: 'not configured' });
    res.json({ overrides: await store.listLogoOverrides(tenant) });
  }));

  app.put('/:tenant/logo-overrides', route(async (req, res) => {
    const tenant = validateTenantId(req.params.tenant);
    if (!(await store.getTenantConfig(tenant))) return res.status(404).json({ error: 'not configured' });
    const override = logoOverrideBody(req.body);
    const invalidated = await store.putLogoOverride(tenant, override);
    await store.recordAudit('logo-override.put', tenant, { pattern: override.pattern, isRegex: override.isRegex });
    res.json({ override, invalidatedImages: invalidated });
  }));

  app.delete('/:tenant/logo-overrides', route(async (req, res) => {
    const tenant = validateTenantId(req.params.tenant);
    const pattern = typeof req.query.pattern === 'string' ? req.query.pattern : '';
    if (!pattern) throw new ConfigInvalid('pattern query parameter is required', 'pattern');
    if (!(await store.deleteLogoOverride(tenant, pattern))) return res.status(404).json({ error: 'no such override' });
    await store.recordAudit('logo-override.delete', tenant, { pattern });
    res.status(204).end();
  }));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ConfigInvalid) return res.status(400).json({ error: err.message, field: err.field });
    if (err instanceof StoreUnavailable) {
      log.error('%s %s: %s', req.method, req.path, formatError(err));
      return res.status(503).json({ error: 'Storage temporarily unavailable' });
    }
    if (err instanceof SyntaxError) return res.status(400).json({ error: 'Malformed JSON body' });
    log.error('%s %s failed: %s', req.method, req.path.replace(/^\/[^/]+/, (m) => `/${maskToken(m.slice(1))}`), formatError(err));
    res.status(500).json({ error: 'Internal error' });
  });

  return app;
}
