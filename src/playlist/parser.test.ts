import crypto from 'crypto';
import { describe, expect, it } from 'vitest';
import { ParseFailure } from '../errors';
import { parsePlaylist, PlaylistParseOptions } from './parser';
import { PLACEHOLDER_LOGO } from './types';

const sha256 = (s: string) => crypto.createHash('sha256').update(s, 'utf8').digest('hex');

const PLAYLIST = [
  'leading junk from a proxy',
  '#EXTM3U url-tvg="http://guide.test/a.xml,http://guide.test/b.xml"',
  '#EXTGRP:News',
  '#EXTINF:-1 tvg-id="news.one" tvg-logo="http://logo.test/n1.png",News One',
  '#EXTVLCOPT:http-referrer=http://ref.test/',
  '#EXTVLCOPT:http-user-agent=TestAgent/1.0',
  'http://stream.test/news1.m3u8',
  '#EXTINF:-1 tvg-name="Movie Max",Movies, Max',
  'http://stream.test/movies.m3u8',
  '#EXTINF:-1 group-title="Sports" tvg-url="http://guide.test/sports.xml",11/08/2025 08:10:00 PM EST = Portland Trail Blazers @ Miami Heat',
  'http://stream.test/event1.m3u8',
  '#EXTINF:-1 group-title="Sports",10/01/2025 01:00:00 PM EST = Old Team @ Older Team',
  'http://stream.test/event-old.m3u8',
].join('\n');

const opts: PlaylistParseOptions = {
  source: 'test.m3u',
  now: new Date('2025-11-08T12:00:00Z'),
  graceHours: 4,
  hostUrl: 'https://addon.test',
  logoAssetExists: (asset) => asset === 'news.png',
};

describe('parsePlaylist', () => {
  it('parses standing channels with groups, headers and logos', () => {
    const { channels, guideUrls } = parsePlaylist(PLAYLIST, opts);
    expect(guideUrls).toEqual(['http://guide.test/a.xml', 'http://guide.test/b.xml']);
    expect(channels).toHaveLength(3);
    expect(channels[0]).toEqual({
      channelId: 'news.one',
      name: 'News One',
      title: 'News One',
      group: 'News',
      logo: 'http://logo.test/n1.png',
      streamUrl: 'http://stream.test/news1.m3u8',
      streamHeaders: { Referer: 'http://ref.test/', 'User-Agent': 'TestAgent/1.0' },
      guideUrl: undefined,
      isEvent: false,
    });
    expect(channels[1]).toMatchObject({
      channelId: sha256('Movies, Max'),
      name: 'Movie Max',
      group: 'News',
      logo: 'https://addon.test/static/news.png',
      isEvent: false,
    });
    expect(channels[1].streamHeaders).toBeUndefined();
  });

  it('extracts events and drops the ones already past', () => {
    const { channels } = parsePlaylist(PLAYLIST, opts);
    const event = channels[2];
    expect(event.isEvent).toBe(true);
    expect(event.title).toBe('Portland Trail Blazers @ Miami Heat\nNov 8 8:10PM');
    expect(event.event).toEqual({ sport: 'Sports', team1: 'Portland Trail Blazers', team2: 'Miami Heat', start: '2025-11-09T01:10:00.000Z' });
    expect(event.guideUrl).toBe('http://guide.test/sports.xml');
    expect(event.logo).toBe(PLACEHOLDER_LOGO);
    expect(event.channelId).toBe(sha256('11/08/2025 08:10:00 PM EST = Portland Trail Blazers @ Miami Heat_2025-11-09 01:10:00'));
    expect(channels.some((c) => c.streamUrl.includes('event-old'))).toBe(false);
  });

  it('derives the same ids on every run', () => {
    const first = parsePlaylist(PLAYLIST, opts).channels.map((c) => c.channelId);
    const second = parsePlaylist(PLAYLIST, { ...opts, now: new Date('2025-11-08T13:00:00Z') }).channels.map((c) => c.channelId);
    expect(second).toEqual(first);
  });

  it('keeps unresolved events without a start', () => {
    const { channels } = parsePlaylist('#EXTM3U\n#EXTINF:-1,Final 99/99/2025 10:00\nhttp://stream.test/final.m3u8', opts);
    expect(channels).toHaveLength(1);
    expect(channels[0]).toMatchObject({
      channelId: sha256('Final 99/99/2025 10:00'),
      title: 'Final',
      group: 'Uncategorized',
      isEvent: true,
      event: { sport: 'Uncategorized' },
    });
    expect(channels[0].event?.start).toBeUndefined();
  });

  it('applies a group directive that follows the EXTINF line', () => {
    const text = '#EXTM3U\n#EXTINF:-1,Docs One\n#EXTGRP:Documentary\nhttp://stream.test/docs.m3u8';
    expect(parsePlaylist(text, opts).channels[0].group).toBe('Documentary');
  });

  it('rejects content without the #EXTM3U marker', () => {
    expect(() => parsePlaylist('#EXTINF:-1,Foo\nhttp://x.test/a', opts)).toThrow(ParseFailure);
  });
});
