import fs from 'fs';
import path from 'path';
import { loadAppConfig } from './config/env';
import { formatError } from './errors';
import { createLogger } from './logger';
import { runIngestion } from './scheduler/ingestion';
import { IngestionScheduler } from './scheduler/scheduler';
import { createApp } from './server';
import { httpFetcher } from './sources/fetch';
import { createBackend } from './store';
import { RateLimiter } from './store/rateLimiter';
import { TenantStore } from './store/tenantStore';

const log = createLogger('ADDON');

// log and survive unexpected errors
process.on('uncaughtException', (err: unknown) => log.error('uncaughtException', err));
process.on('unhandledRejection', (reason: unknown) => log.error('unhandledRejection', reason));

const VERSION = '1.0.0';

async function main(): Promise<void> {
  const cfg = loadAppConfig();
  const staticDir = path.resolve(cfg.staticDir);
  const backend = createBackend({ url: cfg.redisUrl, maxRetries: cfg.storeMaxRetries, retryDelayMs: cfg.storeRetryDelayMs });
  const store = new TenantStore(backend, { eventGraceHours: cfg.eventGraceHours, manifestCacheSeconds: cfg.manifestCacheSeconds });
  const scheduler = new IngestionScheduler({
    store,
    timezone: cfg.schedulerTimeZone,
    run: (tenant, config, trigger) => runIngestion(tenant, config, {
      store,
      fetcher: httpFetcher,
      settings: {
        graceHours: cfg.eventGraceHours,
        playlistTimeoutMs: cfg.playlistFetchTimeoutMs,
        epgTimeoutMs: cfg.epgFetchTimeoutMs,
        insecure: cfg.disableSslVerify,
        zonePreference: cfg.eventZonePreference,
        logoAssetExists: (asset) => fs.existsSync(path.join(staticDir, asset)),
      },
    }, trigger),
  });
  const rateLimiter = new RateLimiter(backend, cfg.rateLimitRequests, cfg.rateLimitWindowSeconds);
  const app = createApp({ store, scheduler, rateLimiter, version: VERSION, staticDir: fs.existsSync(staticDir) ? staticDir : undefined });

  try {
    const jobs = await scheduler.reloadAllJobs();
    log.info(`Scheduled ${jobs} tenants`);
  } catch (e) {
    // serve anyway; jobs are rebuilt on the next configuration change or restart
    log.error('Could not load tenant jobs:', formatError(e));
  }

  const server = app.listen(cfg.port, '0.0.0.0', () => log.info(`IPTV ingest addon on http://localhost:${cfg.port}/health`));

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    scheduler.stop();
    server.close(() => {
      backend.close().then(() => process.exit(0), (e) => {
        log.error('Store close failed:', formatError(e));
        process.exit(1);
      });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((e) => {
  log.error('Startup failed:', formatError(e));
  process.exit(1);
});
