import type { TenantConfig } from '../config/tenant';
import { mergeGuides } from '../epg/matcher';
import { parseXmltv } from '../epg/parser';
import type { ParsedGuide } from '../epg/types';
import { StoreUnavailable, formatError } from '../errors';
import { createLogger, maskToken } from '../logger';
import { parsePlaylist } from '../playlist/parser';
import type { ChannelRecord } from '../playlist/types';
import type { SourceFetcher } from '../sources/fetch';
import type { TenantStore } from '../store/tenantStore';
import type { IngestionReport, IngestionTrigger, SourceFailure } from './types';

const log = createLogger('INGEST');

export type IngestionSettings = {
  graceHours: number;
  playlistTimeoutMs: number;
  epgTimeoutMs: number;
  insecure?: boolean;
  zonePreference?: readonly string[];
  logoAssetExists?: (asset: string) => boolean;
};

export type IngestionDeps = {
  store: TenantStore;
  fetcher: SourceFetcher;
  settings: IngestionSettings;
  clock?: () => Date;
};

function failureOf(source: string, kind: SourceFailure['kind'], e: unknown): SourceFailure {
  return { source, kind, error: e instanceof Error ? e.name : 'Error', message: formatError(e) };
}

// Store outages abort the cycle; anything else stays with the source that caused it
function rethrowStoreFailure(e: unknown): void {
  if (e instanceof StoreUnavailable) throw e;
}

/**
 * One ingestion cycle for a tenant: playlists, channel set replacement, guides, guide
 * replacement and, last, manifest invalidation. A cycle that yields no channels leaves
 * the stored catalog untouched.
 */
export async function runIngestion(tenant: string, config: TenantConfig, deps: IngestionDeps, trigger: IngestionTrigger = 'manual'): Promise<IngestionReport> {
  const clock = deps.clock || (() => new Date());
  const { store, fetcher, settings } = deps;
  const startedAt = clock();
  const who = maskToken(tenant);
  const failures: SourceFailure[] = [];

  const channels: ChannelRecord[] = [];
  const seen = new Set<string>();
  const guideUrls: string[] = [];
  for (const source of config.sources) {
    try {
      const text = await fetcher.fetchText(source, { timeoutMs: settings.playlistTimeoutMs, insecure: settings.insecure });
      const parsed = parsePlaylist(text, {
        source,
        now: clock(),
        graceHours: settings.graceHours,
        hostUrl: config.hostUrl,
        zonePreference: settings.zonePreference,
        logoAssetExists: settings.logoAssetExists,
      });
      for (const ch of parsed.channels) {
        if (seen.has(ch.channelId)) continue;
        seen.add(ch.channelId);
        channels.push(ch);
      }
      guideUrls.push(...parsed.guideUrls);
      log.info('Playlist %s: %d channels', source, parsed.channels.length);
    } catch (e) {
      rethrowStoreFailure(e);
      failures.push(failureOf(source, 'playlist', e));
      log.error('Playlist %s failed for %s: %s', source, who, formatError(e));
    }
  }

  const base = { trigger, startedAt: startedAt.toISOString(), channels: channels.length, events: channels.filter((c) => c.isEvent).length };

  if (!channels.length) {
    const report: IngestionReport = {
      ...base, status: 'fatal', finishedAt: clock().toISOString(),
      stored: 0, removed: 0, guides: 0, guideChannels: 0, unmatchedGuideChannels: 0, failures,
    };
    log.error('No channels produced for %s; keeping the stored catalog', who);
    await store.recordParseHistory(tenant, report);
    return report;
  }

  const stored = await store.storeChannels(tenant, channels);

  for (const ch of channels) if (ch.guideUrl) guideUrls.push(ch.guideUrl);
  const guides: ParsedGuide[] = [];
  for (const url of [...new Set(guideUrls)]) {
    try {
      const content = await fetcher.fetchBinary(url, { timeoutMs: settings.epgTimeoutMs, insecure: settings.insecure });
      guides.push(parseXmltv(content, { now: clock(), fallbackTimeZone: config.timezone }, url));
    } catch (e) {
      rethrowStoreFailure(e);
      failures.push(failureOf(url, 'epg', e));
      log.error('Guide %s failed for %s: %s', url, who, formatError(e));
    }
  }

  const merged = mergeGuides(guides, channels);
  if (guides.length) await store.storeEpg(tenant, merged.programs);

  // readers must never pair the new channel set with a stale manifest
  await store.invalidateManifest(tenant);

  const report: IngestionReport = {
    ...base,
    status: failures.length ? 'partial-failure' : 'success',
    finishedAt: clock().toISOString(),
    stored: stored.stored,
    removed: stored.removed,
    guides: guides.length,
    guideChannels: Object.keys(merged.programs).length,
    unmatchedGuideChannels: merged.unmatched.length,
    failures,
  };
  log.info('Ingestion for %s finished: %s (%d stored, %d guide channels, %d failures)', who, report.status, report.stored, report.guideChannels, failures.length);
  await store.recordParseHistory(tenant, report);
  return report;
}
