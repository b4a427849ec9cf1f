import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { TenantConfig } from '../config/tenant';
import { ConfigInvalid, StoreUnavailable } from '../errors';
import { MemoryBackend } from '../store/memoryBackend';
import { TenantStore } from '../store/tenantStore';
import { CronFactory, IngestionRunner, IngestionScheduler } from './scheduler';
import type { IngestionReport, IngestionTrigger } from './types';

type FakeJob = { expression: string; timezone: string; onTick: () => void; stopped: boolean; stop(): void };

const CONFIG: TenantConfig = { sources: ['http://a.test/list.m3u'], cron: '0 */6 * * *', hostUrl: 'https://addon.test' };

function report(trigger: IngestionTrigger): IngestionReport {
  return {
    status: 'success', trigger, startedAt: '2025-11-08T12:00:00.000Z', finishedAt: '2025-11-08T12:00:01.000Z',
    channels: 1, events: 0, stored: 1, removed: 0, guides: 0, guideChannels: 0, unmatchedGuideChannels: 0, failures: [],
  };
}

describe('IngestionScheduler', () => {
  let jobs: FakeJob[];
  let factory: CronFactory;
  let store: TenantStore;
  let run: Mock<Parameters<IngestionRunner>, ReturnType<IngestionRunner>>;
  let scheduler: IngestionScheduler;

  beforeEach(() => {
    jobs = [];
    factory = (expression, onTick, timezone) => {
      const job: FakeJob = { expression, timezone, onTick, stopped: false, stop() { this.stopped = true; } };
      jobs.push(job);
      return job;
    };
    store = new TenantStore(new MemoryBackend());
    run = vi.fn<Parameters<IngestionRunner>, ReturnType<IngestionRunner>>(async (_tenant, _config, trigger) => report(trigger));
    scheduler = new IngestionScheduler({ store, run, cronFactory: factory });
  });

  it('registers one job per tenant', () => {
    scheduler.schedule('tenant-0001', CONFIG);
    expect(jobs.map((j) => [j.expression, j.timezone])).toEqual([['0 */6 * * *', 'UTC']]);
    expect(scheduler.isScheduled('tenant-0001')).toBe(true);
    expect(scheduler.scheduledCron('tenant-0001')).toBe('0 */6 * * *');
  });

  it('replaces an existing job and stops the old one', () => {
    scheduler.schedule('tenant-0001', CONFIG);
    scheduler.schedule('tenant-0001', { ...CONFIG, cron: '30 2 * * *' });
    expect(jobs.map((j) => j.stopped)).toEqual([true, false]);
    expect(scheduler.scheduledCron('tenant-0001')).toBe('30 2 * * *');
    expect(scheduler.scheduledTenants()).toEqual(['tenant-0001']);
  });

  it('keeps the current job when the new expression is invalid', () => {
    scheduler.schedule('tenant-0001', CONFIG);
    expect(() => scheduler.schedule('tenant-0001', { ...CONFIG, cron: '61 * * * *' })).toThrow(ConfigInvalid);
    expect(jobs).toHaveLength(1);
    expect(jobs[0].stopped).toBe(false);
    expect(scheduler.scheduledCron('tenant-0001')).toBe('0 */6 * * *');
  });

  it('wraps factory rejections as config errors', () => {
    const throwing = new IngestionScheduler({ store, run, cronFactory: () => { throw new Error('bad timezone'); } });
    expect(() => throwing.schedule('tenant-0001', CONFIG)).toThrow('Cron expression rejected: bad timezone');
  });

  it('unschedules once', () => {
    scheduler.schedule('tenant-0001', CONFIG);
    expect(scheduler.unschedule('tenant-0001')).toBe(true);
    expect(scheduler.unschedule('tenant-0001')).toBe(false);
    expect(jobs[0].stopped).toBe(true);
    expect(scheduler.isScheduled('tenant-0001')).toBe(false);
  });

  it('rebuilds jobs from stored configurations', async () => {
    scheduler.schedule('tenant-gone1', CONFIG);
    await store.putTenantConfig('tenant-0001', CONFIG);
    await store.putTenantConfig('tenant-0002', { ...CONFIG, cron: '15 * * * *' });

    expect(await scheduler.reloadAllJobs()).toBe(2);
    expect(jobs[0].stopped).toBe(true);
    expect(scheduler.scheduledTenants()).toEqual(['tenant-0001', 'tenant-0002']);
    expect(scheduler.scheduledCron('tenant-0002')).toBe('15 * * * *');
  });

  it('serializes on-demand runs of one tenant', async () => {
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => { release = resolve; });
    run.mockImplementation(async (_tenant, _config, trigger) => {
      order.push('start');
      if (order.length === 1) await gate;
      order.push('end');
      return report(trigger);
    });

    const first = scheduler.triggerNow('tenant-0001', CONFIG);
    const second = scheduler.triggerNow('tenant-0001', CONFIG);
    await vi.waitFor(() => expect(order).toEqual(['start']));
    expect(scheduler.isRunning('tenant-0001')).toBe(true);
    release();
    await Promise.all([first, second]);
    expect(order).toEqual(['start', 'end', 'start', 'end']);
    expect(scheduler.isRunning('tenant-0001')).toBe(false);
  });

  it('skips a tick while a run is in flight', async () => {
    await store.putTenantConfig('tenant-0001', CONFIG);
    scheduler.schedule('tenant-0001', CONFIG);
    let release: () => void = () => undefined;
    run.mockImplementationOnce(async (_tenant, _config, trigger) => {
      await new Promise<void>((resolve) => { release = resolve; });
      return report(trigger);
    });
    const manual = scheduler.triggerNow('tenant-0001', CONFIG);
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));
    jobs[0].onTick();
    await Promise.resolve();
    release();
    await manual;
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('runs a cron tick with the stored configuration', async () => {
    await store.putTenantConfig('tenant-0001', { ...CONFIG, sources: ['http://b.test/other.m3u'] });
    scheduler.schedule('tenant-0001', CONFIG);
    jobs[0].onTick();
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));
    const [tenant, config, trigger] = run.mock.calls[0];
    expect([tenant, config.sources, trigger]).toEqual(['tenant-0001', ['http://b.test/other.m3u'], 'cron']);
  });

  it('drops the job of a tenant whose configuration is gone', async () => {
    scheduler.schedule('tenant-0001', CONFIG);
    jobs[0].onTick();
    await vi.waitFor(() => expect(scheduler.isScheduled('tenant-0001')).toBe(false));
    expect(run).not.toHaveBeenCalled();
    expect(jobs[0].stopped).toBe(true);
  });

  it('surfaces store outages to on-demand callers', async () => {
    run.mockRejectedValueOnce(new StoreUnavailable('redis down'));
    await expect(scheduler.triggerNow('tenant-0001', CONFIG)).rejects.toBeInstanceOf(StoreUnavailable);
    expect(scheduler.isRunning('tenant-0001')).toBe(false);
  });
});
