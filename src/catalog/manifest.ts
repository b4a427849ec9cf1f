import type { ChannelRecord } from '../playlist/types';
import type { TenantStore } from '../store/tenantStore';
import type { CatalogSummary } from '../store/types';

export type ManifestCatalog = {
  id: string;
  type: string;
  name: string;
  extra: { name: string; isRequired?: boolean; options?: string[] }[];
};

export type Manifest = {
  id: string;
  version: string;
  name: string;
  description: string;
  logo?: string;
  types: string[];
  idPrefixes: string[];
  resources: string[];
  catalogs: ManifestCatalog[];
  behaviorHints: { configurable: boolean; configurationRequired: boolean };
};

export const ID_PREFIX = 'iptv_';

function sortedDistinct(values: Iterable<string>): string[] {
  return [...new Set([...values].filter(Boolean))].sort((a, b) => a.localeCompare(b));
}

export function summarizeChannels(channels: Iterable<ChannelRecord>): CatalogSummary {
  const genres: string[] = [];
  const eventGenres: string[] = [];
  for (const c of channels) {
    if (c.isEvent) eventGenres.push(c.event ? c.event.sport : c.group);
    else genres.push(c.group);
  }
  return { genres: sortedDistinct(genres), eventGenres: sortedDistinct(eventGenres) };
}

/**
 * Read-through: cached summary when present, otherwise computed from the live channel set.
 * The result is cached only if no ingestion invalidated the manifest while it was computed.
 */
export async function getCatalogSummary(store: TenantStore, tenant: string): Promise<CatalogSummary> {
  const cached = await store.getManifestSummary(tenant);
  if (cached) return cached;
  const generation = await store.manifestGeneration(tenant);
  const summary = summarizeChannels(Object.values(await store.getAllChannels(tenant)));
  await store.storeManifestSummary(tenant, summary, generation);
  return summary;
}

export function buildManifest(summary: CatalogSummary, opts: { version: string; logo?: string }): Manifest {
  const catalogs: ManifestCatalog[] = [
    { id: `${ID_PREFIX}channels`, type: 'tv', name: 'IPTV Channels', extra: [{ name: 'genre', options: summary.genres }, { name: 'search' }] },
  ];
  if (summary.eventGenres.length) {
    catalogs.push({ id: `${ID_PREFIX}events`, type: 'events', name: 'Live Events', extra: [{ name: 'genre', options: summary.eventGenres }] });
  }
  return {
    id: 'community.iptv.ingest',
    version: opts.version,
    name: 'IPTV Ingest',
    description: 'Channels and live events from your own M3U playlists, with guide data.',
    logo: opts.logo,
    types: summary.eventGenres.length ? ['tv', 'events'] : ['tv'],
    idPrefixes: [ID_PREFIX],
    resources: ['catalog'],
    catalogs,
    behaviorHints: { configurable: true, configurationRequired: false },
  };
}
