import { createLogger } from '../logger';
import type { ChannelRecord } from '../playlist/types';
import { compactChannelName } from './nameMap';
import type { ParsedGuide, ProgramMap } from './types';

const log = createLogger('EPG');

export type MatchStrategy = 'id' | 'name' | 'normalized-id';

export type MatchResult =
  | { kind: 'matched'; epgId: string; channelId: string; strategy: MatchStrategy }
  | { kind: 'unmatched'; epgId: string };

// containment on very short keys ("a", "tv") pairs unrelated channels
const MIN_CONTAINMENT_LENGTH = 3;

function equalOrContained(a: string, b: string, allowContainment: boolean): boolean {
  if (!a || !b) return false;
  if (a === b) return true;
  if (!allowContainment || a.length < MIN_CONTAINMENT_LENGTH || b.length < MIN_CONTAINMENT_LENGTH) return false;
  return a.includes(b) || b.includes(a);
}

type IndexedChannel = { channelId: string; nameKey: string; idKey: string };

export class ChannelMatcher {
  private readonly byId = new Set<string>();
  private readonly indexed: IndexedChannel[];
  private readonly cache = new Map<string, MatchResult>();

  constructor(channels: readonly ChannelRecord[]) {
    this.indexed = channels.map((c) => {
      this.byId.add(c.channelId);
      return { channelId: c.channelId, nameKey: compactChannelName(c.name), idKey: compactChannelName(c.channelId) };
    });
  }

  /** Exact id, then guide names against playlist names, then guide id against playlist id. */
  match(epgId: string, epgNames: readonly string[] = []): MatchResult {
    const cached = this.cache.get(epgId);
    if (cached) return cached;
    const result = this.resolve(epgId, epgNames);
    this.cache.set(epgId, result);
    return result;
  }

  private resolve(epgId: string, epgNames: readonly string[]): MatchResult {
    if (this.byId.has(epgId)) return { kind: 'matched', epgId, channelId: epgId, strategy: 'id' };

    const guideKeys = [...epgNames, epgId].map(compactChannelName).filter(Boolean);
    const idKey = compactChannelName(epgId);
    // equality across every channel before containment, so "Sky Sports F1" is not taken by "Sky Sports"
    for (const allowContainment of [false, true]) {
      const byName = this.indexed.find((c) => guideKeys.some((g) => equalOrContained(g, c.nameKey, allowContainment)));
      if (byName) return { kind: 'matched', epgId, channelId: byName.channelId, strategy: 'name' };
    }
    for (const allowContainment of [false, true]) {
      const byId = this.indexed.find((c) => equalOrContained(idKey, c.idKey, allowContainment));
      if (byId) return { kind: 'matched', epgId, channelId: byId.channelId, strategy: 'normalized-id' };
    }
    return { kind: 'unmatched', epgId };
  }
}

export function matchGuideChannel(epgId: string, epgNames: readonly string[], channels: readonly ChannelRecord[]): MatchResult {
  return new ChannelMatcher(channels).match(epgId, epgNames);
}

export type MergedGuide = { programs: ProgramMap; matched: number; unmatched: string[] };

/** Re-keys every guide by playlist channel id; programmes of one channel from several guides are merged by start. */
export function mergeGuides(guides: readonly ParsedGuide[], channels: readonly ChannelRecord[]): MergedGuide {
  const matcher = new ChannelMatcher(channels);
  const programs: ProgramMap = {};
  const matchedIds = new Set<string>();
  const unmatched = new Set<string>();
  for (const guide of guides) {
    for (const [epgId, entries] of Object.entries(guide.programs)) {
      const result = matcher.match(epgId, guide.channelNames[epgId] || []);
      if (result.kind === 'unmatched') { unmatched.add(epgId); continue; }
      matchedIds.add(epgId);
      const target = programs[result.channelId] || (programs[result.channelId] = []);
      target.push(...entries);
    }
  }
  for (const list of Object.values(programs)) list.sort((a, b) => a.start.localeCompare(b.start));
  if (unmatched.size) log.info('Dropped %d unmatched guide channels', unmatched.size);
  log.debug('Unmatched guide channels:', [...unmatched].slice(0, 50));
  return { programs, matched: matchedIds.size, unmatched: [...unmatched] };
}
