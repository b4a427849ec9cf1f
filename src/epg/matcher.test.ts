import { describe, expect, it } from 'vitest';
import type { ChannelRecord } from '../playlist/types';
import { ChannelMatcher, matchGuideChannel, mergeGuides } from './matcher';
import { normalizeChannelName } from './nameMap';
import type { ProgramEntry } from './types';

function channel(channelId: string, name: string): ChannelRecord {
  return { channelId, name, title: name, group: 'TV', logo: '', streamUrl: `http://stream.test/${channelId}`, isEvent: false };
}

const CHANNELS = [
  channel('news.one', 'News One'),
  channel('abc123', 'Sky Sports F1 HD'),
  channel('def', 'Sky Sports'),
  channel('bbc1.uk', 'Something Else'),
];

const prog = (title: string, start: string): ProgramEntry => ({ title, description: '', category: '', start });

describe('normalizeChannelName', () => {
  it('lowercases, strips accents, punctuation and quality tags', () => {
    expect(normalizeChannelName('Sky Sports Main-Event HD')).toBe('sky sports main event');
    expect(normalizeChannelName('Télé Über 4K')).toBe('tele uber');
  });
});

describe('ChannelMatcher', () => {
  const matcher = new ChannelMatcher(CHANNELS);

  it('matches on exact id first', () => {
    expect(matcher.match('news.one', ['Unrelated'])).toEqual({ kind: 'matched', epgId: 'news.one', channelId: 'news.one', strategy: 'id' });
  });

  it('prefers name equality over containment', () => {
    expect(matcher.match('sky.f1', ['Sky Sports F1'])).toEqual({ kind: 'matched', epgId: 'sky.f1', channelId: 'abc123', strategy: 'name' });
  });

  it('falls back to containment between names', () => {
    expect(matcher.match('skysports.main', ['Sky Sports Main Event'])).toMatchObject({ kind: 'matched', channelId: 'def', strategy: 'name' });
  });

  it('compares normalized ids last', () => {
    expect(matcher.match('BBC1.UK', ['Unknown Station'])).toMatchObject({ kind: 'matched', channelId: 'bbc1.uk', strategy: 'normalized-id' });
  });

  it('reports unmatched guide channels', () => {
    expect(matchGuideChannel('zzz', ['Nope Channel'], CHANNELS)).toEqual({ kind: 'unmatched', epgId: 'zzz' });
  });
});

describe('mergeGuides', () => {
  it('merges programmes of one channel across guides and drops unmatched ones', () => {
    const merged = mergeGuides([
      { programs: { 'news.one': [prog('Noon', '2025-11-08T12:00:00.000Z')], zzz: [prog('Lost', '2025-11-08T12:00:00.000Z')] }, channelNames: {} },
      { programs: { News1: [prog('Eleven', '2025-11-08T11:00:00.000Z')] }, channelNames: { News1: ['News One'] } },
    ], CHANNELS);
    expect(merged.programs).toEqual({ 'news.one': [prog('Eleven', '2025-11-08T11:00:00.000Z'), prog('Noon', '2025-11-08T12:00:00.000Z')] });
    expect(merged.matched).toBe(2);
    expect(merged.unmatched).toEqual(['zzz']);
  });
});
