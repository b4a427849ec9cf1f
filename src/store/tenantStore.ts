import crypto from 'crypto';
import { TenantConfig, validateTenantConfig } from '../config/tenant';
import type { ProgramEntry, ProgramMap } from '../epg/types';
import { ConfigInvalid, StoreUnavailable, formatError } from '../errors';
import { createLogger, maskToken } from '../logger';
import { ChannelRecord, isPlaceholderLogo } from '../playlist/types';
import type { IngestionReport } from '../scheduler/types';
import { KeyValueBackend, WriteOp } from './backend';
import { decodeCatalogSummary, decodeChannel, decodeLogoOverride, decodeProgramMap, decodeReport } from './codec';
import { IMAGE_KINDS, ImageKind, escapeGlob, imageCacheKey, keys } from './keys';
import {
  AUDIT_LOG_SECONDS, DEFAULT_EVENT_GRACE_HOURS, DEFAULT_MANIFEST_CACHE_SECONDS, EPG_CACHE_SECONDS,
  IMAGE_CACHE_SECONDS, PARSE_HISTORY_LIMIT, PARSE_HISTORY_SECONDS, channelTtl,
} from './ttl';
import type { AuditEntry, CatalogSummary, LogoOverride, StoreSummary } from './types';

const log = createLogger('STORE');

export type Clock = () => Date;

export type TenantStoreSettings = {
  eventGraceHours?: number;
  manifestCacheSeconds?: number;
};

function compileOverride(pattern: string): RegExp {
  try {
    return new RegExp(`^(?:${pattern})`);
  } catch (e) {
    throw new ConfigInvalid(`Invalid logo override pattern "${pattern}": ${formatError(e)}`, 'pattern', { cause: e });
  }
}

/**
 * Tenant-scoped persistence over a key-value backend. Writes that matter surface
 * StoreUnavailable; image cache, audit and parse-history writes only log.
 */
export class TenantStore {
  private readonly backend: KeyValueBackend;
  private readonly clock: Clock;
  private readonly graceHours: number;
  private readonly manifestSeconds: number;

  constructor(backend: KeyValueBackend, settings: TenantStoreSettings = {}, clock: Clock = () => new Date()) {
    this.backend = backend;
    this.clock = clock;
    this.graceHours = settings.eventGraceHours ?? DEFAULT_EVENT_GRACE_HOURS;
    this.manifestSeconds = settings.manifestCacheSeconds ?? DEFAULT_MANIFEST_CACHE_SECONDS;
  }

  private async bestEffort<T>(what: string, op: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await op();
    } catch (e) {
      if (!(e instanceof StoreUnavailable)) throw e;
      log.warn(`${what} skipped: ${formatError(e)}`);
      return fallback;
    }
  }

  // ---- tenant configuration ----

  async getTenantConfig(tenant: string): Promise<TenantConfig | null> {
    const raw = await this.backend.get(keys.tenantConfig(tenant));
    if (raw === null) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new ConfigInvalid(`Stored configuration for ${maskToken(tenant)} is not JSON`, undefined, { cause: e });
    }
    return validateTenantConfig(parsed);
  }

  /** Replaces the configuration wholesale and drops the cached manifest. */
  async putTenantConfig(tenant: string, config: TenantConfig): Promise<void> {
    await this.backend.exec([
      { op: 'set', key: keys.tenantConfig(tenant), value: JSON.stringify(config) },
      ...this.manifestInvalidation(tenant),
    ]);
  }

  async listTenants(): Promise<string[]> {
    const prefix = 'tenant-config:';
    const found = await this.backend.scan(keys.tenantConfigPattern());
    return found.map((k) => k.slice(prefix.length)).sort();
  }

  /** Removes every key of the tenant; the global image cache is left to expire. */
  async deleteTenant(tenant: string): Promise<number> {
    const [channelKeys, overrideKeys] = await Promise.all([
      this.backend.scan(keys.channelPattern(tenant)),
      this.backend.scan(keys.logoOverridePattern(tenant)),
    ]);
    return this.backend.del([
      keys.tenantConfig(tenant), keys.epg(tenant), keys.manifestCache(tenant), keys.manifestGeneration(tenant), keys.parseHistory(tenant),
      ...channelKeys, ...overrideKeys,
    ]);
  }

  // ---- channels ----

  private async channelIds(tenant: string): Promise<string[]> {
    const prefix = keys.channelPrefix(tenant);
    const found = await this.backend.scan(keys.channelPattern(tenant));
    return found.map((k) => k.slice(prefix.length));
  }

  /**
   * Replaces the tenant's channel set in one transaction: stale and already-expired
   * records are deleted, events expire at start + grace, and the manifest cache is dropped.
   */
  async storeChannels(tenant: string, channels: readonly ChannelRecord[]): Promise<StoreSummary> {
    const now = this.clock();
    const existing = await this.backend.scan(keys.channelPattern(tenant));
    const written = new Set<string>();
    const ops: WriteOp[] = [];
    let skippedExpired = 0;
    for (const record of channels) {
      const key = keys.channel(tenant, record.channelId);
      const ttl = channelTtl(record, now, this.graceHours);
      if (ttl.kind === 'expired') { skippedExpired++; continue; }
      written.add(key);
      ops.push({ op: 'set', key, value: JSON.stringify(record), ttlSeconds: ttl.kind === 'expiring' ? ttl.seconds : undefined });
    }
    const stale = existing.filter((k) => !written.has(k));
    ops.unshift({ op: 'del', keys: stale }, ...this.manifestInvalidation(tenant));
    await this.backend.exec(ops);
    log.debug('Stored channels', maskToken(tenant), { stored: written.size, skippedExpired, removed: stale.length });
    return { stored: written.size, skippedExpired, removed: stale.length };
  }

  async getAllChannels(tenant: string): Promise<Record<string, ChannelRecord>> {
    const found = await this.backend.scan(keys.channelPattern(tenant));
    const values = await this.backend.mget(found);
    const out: Record<string, ChannelRecord> = {};
    values.forEach((raw, i) => {
      const record = decodeChannel(raw);
      if (record) out[record.channelId] = record;
      else if (raw !== null) log.warn('Unreadable channel record', found[i]);
    });
    return out;
  }

  async getChannel(tenant: string, channelId: string): Promise<ChannelRecord | null> {
    return decodeChannel(await this.backend.get(keys.channel(tenant, channelId)));
  }

  // ---- guide ----

  async storeEpg(tenant: string, programs: ProgramMap): Promise<void> {
    await this.backend.set(keys.epg(tenant), JSON.stringify(programs), EPG_CACHE_SECONDS);
  }

  async getEpg(tenant: string): Promise<ProgramMap | null> {
    return decodeProgramMap(await this.backend.get(keys.epg(tenant)));
  }

  async getChannelPrograms(tenant: string, channelId: string): Promise<ProgramEntry[] | null> {
    const epg = await this.getEpg(tenant);
    return epg && epg[channelId] ? epg[channelId] : null;
  }

  // ---- manifest cache ----

  async getManifestSummary(tenant: string): Promise<CatalogSummary | null> {
    return decodeCatalogSummary(await this.backend.get(keys.manifestCache(tenant)));
  }

  // Every invalidation moves the generation on, so a summary computed before it is never cached after it
  private manifestInvalidation(tenant: string): WriteOp[] {
    return [
      { op: 'del', keys: [keys.manifestCache(tenant)] },
      { op: 'set', key: keys.manifestGeneration(tenant), value: crypto.randomUUID() },
    ];
  }

  async manifestGeneration(tenant: string): Promise<string | null> {
    return this.backend.get(keys.manifestGeneration(tenant));
  }

  /**
   * Caches the summary. With a generation (as read before the channels were) the write is
   * dropped when an invalidation happened in between; returns whether it was written.
   */
  async storeManifestSummary(tenant: string, summary: CatalogSummary, generation?: string | null): Promise<boolean> {
    const key = keys.manifestCache(tenant);
    const value = JSON.stringify(summary);
    if (generation === undefined) {
      await this.backend.set(key, value, this.manifestSeconds);
      return true;
    }
    return this.backend.setIfUnchanged(key, value, this.manifestSeconds, keys.manifestGeneration(tenant), generation);
  }

  async invalidateManifest(tenant: string): Promise<void> {
    await this.backend.exec(this.manifestInvalidation(tenant));
  }

  // ---- logo overrides ----

  async listLogoOverrides(tenant: string): Promise<LogoOverride[]> {
    const found = await this.backend.scan(keys.logoOverridePattern(tenant));
    const values = await this.backend.mget(found);
    return values.map(decodeLogoOverride).filter((o): o is LogoOverride => o !== null);
  }

  /** An override stored under the channel id wins; otherwise a regex must match at the start of the id. */
  async getLogoOverride(tenant: string, channelId: string): Promise<LogoOverride | null> {
    const exact = decodeLogoOverride(await this.backend.get(keys.logoOverride(tenant, channelId)));
    if (exact) return exact;
    const overrides = await this.listLogoOverrides(tenant);
    for (const o of overrides) {
      if (!o.isRegex) continue;
      try {
        if (compileOverride(o.pattern).test(channelId)) return o;
      } catch (e) {
        log.warn('Ignoring stored logo override', JSON.stringify(o.pattern), formatError(e));
      }
    }
    return null;
  }

  async resolveLogo(tenant: string, channel: ChannelRecord): Promise<string> {
    const override = await this.getLogoOverride(tenant, channel.channelId);
    return override ? override.logoUrl : channel.logo;
  }

  /** Image cache key for the channel's effective logo; placeholder images are cached per drawing version. */
  async imageCacheKeyFor(tenant: string, channel: ChannelRecord, kind: ImageKind, placeholderVersion: string): Promise<string> {
    const logo = await this.resolveLogo(tenant, channel);
    return imageCacheKey(channel.channelId, kind, isPlaceholderLogo(logo) ? placeholderVersion : undefined);
  }

  private async matchingChannelIds(tenant: string, override: LogoOverride): Promise<string[]> {
    if (!override.isRegex) return [override.pattern];
    const re = compileOverride(override.pattern);
    return (await this.channelIds(tenant)).filter((id) => re.test(id));
  }

  async putLogoOverride(tenant: string, override: LogoOverride): Promise<number> {
    if (!override.pattern) throw new ConfigInvalid('Logo override pattern must not be empty', 'pattern');
    if (override.isRegex) compileOverride(override.pattern);
    await this.backend.set(keys.logoOverride(tenant, override.pattern), JSON.stringify(override));
    return this.invalidateProcessedImages(await this.matchingChannelIds(tenant, override));
  }

  async deleteLogoOverride(tenant: string, pattern: string): Promise<boolean> {
    const key = keys.logoOverride(tenant, pattern);
    const existing = decodeLogoOverride(await this.backend.get(key));
    if (!existing) return false;
    await this.backend.del([key]);
    await this.invalidateProcessedImages(await this.matchingChannelIds(tenant, existing));
    return true;
  }

  // ---- processed image cache (global) ----

  async getProcessedImage(cacheKey: string): Promise<Buffer | null> {
    return this.bestEffort(`image cache read ${cacheKey}`, () => this.backend.getBuffer(keys.processedImage(cacheKey)), null);
  }

  async storeProcessedImage(cacheKey: string, bytes: Buffer): Promise<void> {
    await this.bestEffort(`image cache write ${cacheKey}`, () => this.backend.set(keys.processedImage(cacheKey), bytes, IMAGE_CACHE_SECONDS), undefined);
  }

  /** Drops every kind and placeholder generation cached for the given channel ids. */
  async invalidateProcessedImages(channelIds: readonly string[]): Promise<number> {
    if (!channelIds.length) return 0;
    const doomed: string[] = [];
    for (const id of channelIds) {
      for (const kind of IMAGE_KINDS) {
        doomed.push(keys.processedImage(imageCacheKey(id, kind)));
        doomed.push(...await this.backend.scan(keys.processedImage(`${escapeGlob(id)}_${kind}_placeholder_*`)));
      }
    }
    const removed = await this.backend.del(doomed);
    log.debug('Invalidated processed images', { channels: channelIds.length, removed });
    return removed;
  }

  // ---- history and audit ----

  async recordParseHistory(tenant: string, report: IngestionReport): Promise<void> {
    await this.bestEffort('parse history', () => this.backend.pushCapped(keys.parseHistory(tenant), JSON.stringify(report), PARSE_HISTORY_LIMIT, PARSE_HISTORY_SECONDS), undefined);
  }

  async getParseHistory(tenant: string, limit = PARSE_HISTORY_LIMIT): Promise<IngestionReport[]> {
    const raw = await this.backend.range(keys.parseHistory(tenant), 0, limit - 1);
    return raw.map(decodeReport).filter((r): r is IngestionReport => r !== null);
  }

  async recordAudit(action: string, tenant?: string, details?: AuditEntry['details']): Promise<void> {
    const at = this.clock().toISOString();
    const entry: AuditEntry = { action, at };
    if (tenant) entry.tenant = maskToken(tenant);
    if (details) entry.details = details;
    await this.bestEffort(`audit ${action}`, () => this.backend.set(keys.auditLog(at, crypto.randomUUID()), JSON.stringify(entry), AUDIT_LOG_SECONDS), undefined);
  }

  ping(): Promise<boolean> {
    return this.backend.ping();
  }
}
