import { beforeEach, describe, expect, it } from 'vitest';
import type { TenantConfig } from '../config/tenant';
import { SourceUnavailable, StoreUnavailable } from '../errors';
import type { FetchOptions, SourceFetcher } from '../sources/fetch';
import type { WriteOp } from '../store/backend';
import { MemoryBackend } from '../store/memoryBackend';
import { TenantStore } from '../store/tenantStore';
import { IngestionDeps, runIngestion } from './ingestion';

const TENANT = 'tenant-0001';
const NOW = new Date('2025-11-08T12:00:00Z');

const PLAYLIST_A = [
  '#EXTM3U url-tvg="http://guide.test/main.xml"',
  '#EXTINF:-1 tvg-id="news.one" group-title="News",News One',
  'http://stream.test/news1.m3u8',
  '#EXTINF:-1 tvg-id="dup" group-title="Movies",First Copy',
  'http://stream.test/dup-a.m3u8',
  '#EXTINF:-1 group-title="Basketball",11/08/2025 08:10:00 PM EST = Portland Trail Blazers @ Miami Heat',
  'http://stream.test/event.m3u8',
].join('\n');

const PLAYLIST_B = [
  '#EXTM3U',
  '#EXTINF:-1 tvg-id="dup" group-title="Movies",Second Copy',
  'http://stream.test/dup-b.m3u8',
  '#EXTINF:-1 tvg-id="docs" group-title="Docs",Docs Channel',
  'http://stream.test/docs.m3u8',
].join('\n');

const GUIDE = `<tv>
  <channel id="n1"><display-name>News One</display-name></channel>
  <programme channel="n1" start="20251108130000 +0000" stop="20251108140000 +0000"><title>Afternoon</title></programme>
  <programme channel="ghost" start="20251108130000 +0000"><title>Nobody</title></programme>
</tv>`;

class FakeFetcher implements SourceFetcher {
  readonly calls: string[] = [];
  constructor(private readonly responses: Record<string, string | Error>) {}

  async fetchText(uri: string, _opts: FetchOptions): Promise<string> {
    this.calls.push(uri);
    const r = this.responses[uri];
    if (r === undefined) throw new SourceUnavailable(uri, `no fixture for ${uri}`);
    if (r instanceof Error) throw r;
    return r;
  }

  async fetchBinary(uri: string, opts: FetchOptions): Promise<Buffer> {
    return Buffer.from(await this.fetchText(uri, opts), 'utf8');
  }
}

const CONFIG: TenantConfig = {
  sources: ['http://a.test/one.m3u', 'http://b.test/two.m3u'],
  cron: '0 */6 * * *',
  hostUrl: 'https://addon.test',
};

describe('runIngestion', () => {
  let store: TenantStore;

  beforeEach(() => {
    store = new TenantStore(new MemoryBackend(() => NOW.getTime()), { eventGraceHours: 4 }, () => NOW);
  });

  function deps(responses: Record<string, string | Error>, target = store): IngestionDeps {
    return {
      store: target,
      fetcher: new FakeFetcher(responses),
      clock: () => NOW,
      settings: { graceHours: 4, playlistTimeoutMs: 1000, epgTimeoutMs: 1000 },
    };
  }

  it('stores channels and matched guide data', async () => {
    const report = await runIngestion(TENANT, CONFIG, deps({
      'http://a.test/one.m3u': PLAYLIST_A,
      'http://b.test/two.m3u': PLAYLIST_B,
      'http://guide.test/main.xml': GUIDE,
    }), 'cron');

    expect(report).toMatchObject({
      status: 'success', trigger: 'cron', channels: 4, events: 1, stored: 4, removed: 0,
      guides: 1, guideChannels: 1, unmatchedGuideChannels: 1, failures: [],
    });
    const channels = await store.getAllChannels(TENANT);
    expect(Object.keys(channels)).toHaveLength(4);
    expect(channels.dup.name).toBe('First Copy');
    expect(await store.getChannelPrograms(TENANT, 'news.one')).toEqual([
      { title: 'Afternoon', description: '', category: '', start: '2025-11-08T13:00:00.000Z', stop: '2025-11-08T14:00:00.000Z' },
    ]);
    expect((await store.getParseHistory(TENANT)).map((r) => r.status)).toEqual(['success']);
  });

  it('reports partial failure when one playlist is unreachable', async () => {
    const report = await runIngestion(TENANT, CONFIG, deps({
      'http://a.test/one.m3u': PLAYLIST_A,
      'http://b.test/two.m3u': new SourceUnavailable('http://b.test/two.m3u', 'HTTP 502'),
      'http://guide.test/main.xml': GUIDE,
    }));
    expect(report.status).toBe('partial-failure');
    expect(report.failures).toEqual([{ source: 'http://b.test/two.m3u', kind: 'playlist', error: 'SourceUnavailable', message: 'HTTP 502' }]);
    const stored = await store.getAllChannels(TENANT);
    expect(Object.keys(stored)).toHaveLength(3);
    expect(stored.dup.name).toBe('First Copy');
    expect(stored['news.one'].group).toBe('News');
  });

  it('treats a broken guide as a partial failure', async () => {
    const report = await runIngestion(TENANT, CONFIG, deps({
      'http://a.test/one.m3u': PLAYLIST_A,
      'http://b.test/two.m3u': PLAYLIST_B,
      'http://guide.test/main.xml': '<tv><programme',
    }));
    expect(report.status).toBe('partial-failure');
    expect(report.failures.map((f) => [f.kind, f.error])).toEqual([['epg', 'ParseFailure']]);
    expect(report.stored).toBe(4);
  });

  it('leaves the stored catalog alone when nothing parses', async () => {
    await store.storeChannels(TENANT, [{ channelId: 'keep', name: 'Keep', title: 'Keep', group: 'News', logo: '', streamUrl: 'http://stream.test/keep', isEvent: false }]);
    await store.storeManifestSummary(TENANT, { genres: ['News'], eventGenres: [] });
    const report = await runIngestion(TENANT, CONFIG, deps({
      'http://a.test/one.m3u': 'not a playlist',
      'http://b.test/two.m3u': new SourceUnavailable('http://b.test/two.m3u', 'timeout'),
    }));
    expect(report.status).toBe('fatal');
    expect(report.failures.map((f) => f.error)).toEqual(['ParseFailure', 'SourceUnavailable']);
    expect(Object.keys(await store.getAllChannels(TENANT))).toEqual(['keep']);
    expect(await store.getManifestSummary(TENANT)).toEqual({ genres: ['News'], eventGenres: [] });
  });

  it('invalidates the manifest cache at the end of a cycle', async () => {
    await store.storeManifestSummary(TENANT, { genres: ['Old'], eventGenres: [] });
    await runIngestion(TENANT, CONFIG, deps({ 'http://a.test/one.m3u': PLAYLIST_A, 'http://b.test/two.m3u': PLAYLIST_B }));
    expect(await store.getManifestSummary(TENANT)).toBeNull();
  });

  it('aborts on store outages', async () => {
    class DownBackend extends MemoryBackend {
      async exec(_ops: WriteOp[]): Promise<void> {
        throw new StoreUnavailable('redis down');
      }
    }
    const down = new TenantStore(new DownBackend(() => NOW.getTime()), {}, () => NOW);
    await expect(runIngestion(TENANT, CONFIG, deps({ 'http://a.test/one.m3u': PLAYLIST_A }, down))).rejects.toBeInstanceOf(StoreUnavailable);
  });
});
