import cron from 'node-cron';
import type { TenantConfig } from '../config/tenant';
import { ConfigInvalid, formatError } from '../errors';
import { createLogger, maskToken } from '../logger';
import type { TenantStore } from '../store/tenantStore';
import { parseCron } from './cron';
import type { IngestionReport, IngestionTrigger } from './types';

const log = createLogger('SCHEDULER');

export interface ScheduledJob {
  stop(): void;
}

export type CronFactory = (expression: string, onTick: () => void, timezone: string) => ScheduledJob;

export type JobEntry = { cron: string; task: ScheduledJob };

/** Where the scheduler keeps its jobs; a Map satisfies it. */
export interface JobStore {
  get(tenant: string): JobEntry | undefined;
  set(tenant: string, entry: JobEntry): unknown;
  delete(tenant: string): boolean;
  keys(): Iterable<string>;
}

export type IngestionRunner = (tenant: string, config: TenantConfig, trigger: IngestionTrigger) => Promise<IngestionReport>;

export type SchedulerOptions = {
  store: TenantStore;
  run: IngestionRunner;
  cronFactory?: CronFactory;
  jobs?: JobStore;
  timezone?: string;
};

export const nodeCronFactory: CronFactory = (expression, onTick, timezone) =>
  cron.schedule(expression, onTick, { timezone });

/**
 * One cron job per tenant. Runs of the same tenant never overlap: a cron tick that finds a
 * run in flight is skipped, an on-demand trigger waits for it and then runs.
 */
export class IngestionScheduler {
  private readonly store: TenantStore;
  private readonly run: IngestionRunner;
  private readonly cronFactory: CronFactory;
  private readonly jobs: JobStore;
  private readonly timezone: string;
  private readonly running = new Map<string, Promise<IngestionReport>>();

  constructor(opts: SchedulerOptions) {
    this.store = opts.store;
    this.run = opts.run;
    this.cronFactory = opts.cronFactory || nodeCronFactory;
    this.jobs = opts.jobs || new Map<string, JobEntry>();
    this.timezone = opts.timezone || 'UTC';
  }

  /** Registers or replaces the tenant's job. Invalid expressions throw before the old job is touched. */
  schedule(tenant: string, config: TenantConfig): void {
    const expression = parseCron(config.cron).expression;
    let task: ScheduledJob;
    try {
      task = this.cronFactory(expression, () => {
        this.tick(tenant).catch((e) => log.error('Tick failed for %s: %s', maskToken(tenant), formatError(e)));
      }, this.timezone);
    } catch (e) {
      throw new ConfigInvalid(`Cron expression rejected: ${formatError(e)}`, 'cron', { cause: e });
    }
    const previous = this.jobs.get(tenant);
    this.jobs.set(tenant, { cron: expression, task });
    if (previous) previous.task.stop();
    log.info('Scheduled %s at "%s"%s', maskToken(tenant), expression, previous ? ' (replaced)' : '');
  }

  unschedule(tenant: string): boolean {
    const entry = this.jobs.get(tenant);
    if (!entry) return false;
    entry.task.stop();
    this.jobs.delete(tenant);
    log.info('Unscheduled %s', maskToken(tenant));
    return true;
  }

  isScheduled(tenant: string): boolean {
    return this.jobs.get(tenant) !== undefined;
  }

  scheduledCron(tenant: string): string | undefined {
    const entry = this.jobs.get(tenant);
    return entry ? entry.cron : undefined;
  }

  scheduledTenants(): string[] {
    return [...this.jobs.keys()].sort();
  }

  isRunning(tenant: string): boolean {
    return this.running.has(tenant);
  }

  /**
   * Drops every job and rebuilds from the stored tenant list, which is taken as complete.
   * Configurations that no longer validate are logged and left unscheduled.
   */
  async reloadAllJobs(): Promise<number> {
    const loaded: [string, TenantConfig][] = [];
    for (const tenant of await this.store.listTenants()) {
      try {
        const config = await this.store.getTenantConfig(tenant);
        if (config) loaded.push([tenant, config]);
      } catch (e) {
        if (!(e instanceof ConfigInvalid)) throw e;
        log.error('Skipping %s: %s', maskToken(tenant), formatError(e));
      }
    }
    this.stop();
    for (const [tenant, config] of loaded) {
      try {
        this.schedule(tenant, config);
      } catch (e) {
        if (!(e instanceof ConfigInvalid)) throw e;
        log.error('Skipping %s: %s', maskToken(tenant), formatError(e));
      }
    }
    log.info('Reloaded %d jobs', [...this.jobs.keys()].length);
    return [...this.jobs.keys()].length;
  }

  /** Runs inline and resolves with the report; rejects when the store is unavailable. */
  triggerNow(tenant: string, config: TenantConfig): Promise<IngestionReport> {
    return this.execute(tenant, config, 'manual');
  }

  stop(): void {
    for (const tenant of [...this.jobs.keys()]) {
      const entry = this.jobs.get(tenant);
      if (entry) entry.task.stop();
      this.jobs.delete(tenant);
    }
  }

  private execute(tenant: string, config: TenantConfig, trigger: IngestionTrigger): Promise<IngestionReport> {
    const previous = this.running.get(tenant);
    // the previous run's outcome belongs to its own caller; only its completion matters here
    const after = previous ? previous.then(() => undefined, () => undefined) : Promise.resolve();
    const current: Promise<IngestionReport> = after
      .then(() => this.run(tenant, config, trigger))
      .finally(() => {
        if (this.running.get(tenant) === current) this.running.delete(tenant);
      });
    this.running.set(tenant, current);
    return current;
  }

  private async tick(tenant: string): Promise<void> {
    if (this.running.has(tenant)) {
      log.info('Skipping tick for %s: previous run still in progress', maskToken(tenant));
      return;
    }
    try {
      const config = await this.store.getTenantConfig(tenant);
      if (!config) {
        log.warn('No configuration for %s; removing its job', maskToken(tenant));
        this.unschedule(tenant);
        return;
      }
      await this.execute(tenant, config, 'cron');
    } catch (e) {
      log.error('Scheduled ingestion failed for %s: %s', maskToken(tenant), formatError(e));
    }
  }
}
