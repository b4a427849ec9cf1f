import crypto from 'crypto';
import { DateTime } from 'luxon';
import { ParseFailure } from '../errors';
import { createLogger } from '../logger';
import { cleanEventTitle, extractEventStart, formatEventTime, isEventTitle, splitTeams } from './eventTime';
import { ChannelRecord, EventInfo, ParsedPlaylist, PLACEHOLDER_LOGO, StreamHeaders } from './types';

const log = createLogger('PLAYLIST');

export const DEFAULT_GROUP = 'Uncategorized';

export type PlaylistParseOptions = {
  source: string; // for error and log context
  now: Date;
  graceHours: number;
  hostUrl?: string;
  zonePreference?: readonly string[];
  // relative asset name, e.g. "sports.png"; served under {hostUrl}/static/
  logoAssetExists?: (asset: string) => boolean;
};

type PendingEntry = {
  attrs: Record<string, string>;
  name: string;
  group: string;
  explicitGroup: boolean;
  headers: StreamHeaders;
};

const VLC_HEADER_OPTIONS: Record<string, string> = {
  'http-referrer': 'Referer',
  'http-referer': 'Referer',
  'http-user-agent': 'User-Agent',
  'http-origin': 'Origin',
};

function parseAttributes(s: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const m of s.matchAll(/([\w-]+)="([^"]*)"/g)) attrs[m[1].toLowerCase()] = m[2];
  return attrs;
}

// Name follows the first comma that is not inside an attribute value
function splitExtinf(line: string): { attrs: Record<string, string>; name: string } {
  const body = line.slice(line.indexOf(':') + 1);
  let inQuote = false;
  for (let i = 0; i < body.length; i++) {
    const c = body[i];
    if (c === '"') inQuote = !inQuote;
    else if (c === ',' && !inQuote) return { attrs: parseAttributes(body.slice(0, i)), name: body.slice(i + 1).trim() };
  }
  return { attrs: parseAttributes(body), name: '' };
}

function splitUrlList(v?: string): string[] {
  return (v || '').split(',').map((s) => s.trim()).filter(Boolean);
}

function sha256(s: string): string {
  return crypto.createHash('sha256').update(s, 'utf8').digest('hex');
}

function fallbackLogo(group: string, opts: PlaylistParseOptions): string {
  const asset = `${group.toLowerCase().replace(/\s+/g, '-')}.png`;
  if (opts.hostUrl && opts.logoAssetExists && opts.logoAssetExists(asset)) return `${opts.hostUrl}/static/${asset}`;
  return PLACEHOLDER_LOGO;
}

function buildRecord(entry: PendingEntry, streamUrl: string, opts: PlaylistParseOptions): ChannelRecord | null {
  const { attrs } = entry;
  const name = (attrs['tvg-name'] || '').trim() || entry.name || 'Unknown';
  const nativeId = (attrs['tvg-id'] || '').trim();
  const logo = (attrs['tvg-logo'] || '').trim() || fallbackLogo(entry.group, opts);
  const guideUrl = (attrs['url-tvg'] || attrs['tvg-url'] || '').trim() || undefined;
  const streamHeaders = Object.keys(entry.headers).length ? entry.headers : undefined;

  if (!isEventTitle(name)) {
    return {
      channelId: nativeId || sha256(entry.name || name),
      name, title: name, group: entry.group, logo, streamUrl, streamHeaders, guideUrl,
      isEvent: false,
    };
  }

  const start = extractEventStart(name, { now: opts.now, zonePreference: opts.zonePreference });
  if (start && start.getTime() + opts.graceHours * 3600_000 <= opts.now.getTime()) {
    log.debug('Dropping past event', JSON.stringify(name), start.toISOString());
    return null;
  }
  const cleaned = cleanEventTitle(name);
  const teams = splitTeams(cleaned);
  const event: EventInfo = { sport: entry.group };
  if (teams) { event.team1 = teams.team1; event.team2 = teams.team2; }
  let title = cleaned;
  let channelId = nativeId;
  if (start) {
    event.start = start.toISOString();
    title = `${teams ? `${teams.team1} @ ${teams.team2}` : cleaned}\n${formatEventTime(start)}`;
    if (!channelId) channelId = sha256(`${name}_${DateTime.fromJSDate(start, { zone: 'utc' }).toFormat('yyyy-MM-dd HH:mm:ss')}`);
  }
  return {
    channelId: channelId || sha256(entry.name || name),
    name, title, group: entry.group, logo, streamUrl, streamHeaders, guideUrl,
    isEvent: true, event,
  };
}

/**
 * Parses M3U text into channel records. Lines before #EXTM3U are ignored; a playlist
 * without the marker is rejected. Events already past their grace window are left out.
 */
export function parsePlaylist(content: string, opts: PlaylistParseOptions): ParsedPlaylist {
  const start = content.indexOf('#EXTM3U');
  if (start < 0) throw new ParseFailure(opts.source, `No #EXTM3U marker in ${opts.source}`);
  const lines = content.slice(start).split(/\r?\n/);
  const headerAttrs = parseAttributes(lines[0]);
  const guideUrls = [...new Set([...splitUrlList(headerAttrs['url-tvg']), ...splitUrlList(headerAttrs['x-tvg-url'])])];

  const channels: ChannelRecord[] = [];
  let currentGroup = DEFAULT_GROUP;
  let pending: PendingEntry | null = null;
  let dropped = 0;

  for (const raw of lines.slice(1)) {
    const line = raw.trim();
    if (!line) continue;
    if (line.startsWith('#EXTGRP:')) {
      const group = line.slice('#EXTGRP:'.length).trim();
      if (!group) continue;
      currentGroup = group;
      if (pending && !pending.explicitGroup) pending.group = group;
    } else if (line.startsWith('#EXTINF')) {
      if (pending) log.debug('EXTINF without stream URL skipped:', pending.name);
      const { attrs, name } = splitExtinf(line);
      const explicit = (attrs['group-title'] || '').trim();
      pending = { attrs, name, group: explicit || currentGroup, explicitGroup: !!explicit, headers: {} };
    } else if (line.startsWith('#EXTVLCOPT:')) {
      if (!pending) continue;
      const opt = line.slice('#EXTVLCOPT:'.length);
      const eq = opt.indexOf('=');
      if (eq < 0) continue;
      const header = VLC_HEADER_OPTIONS[opt.slice(0, eq).trim().toLowerCase()];
      if (header) pending.headers[header] = opt.slice(eq + 1).trim();
    } else if (line.startsWith('#')) {
      continue;
    } else if (pending) {
      const record = buildRecord(pending, line, opts);
      if (record) channels.push(record); else dropped++;
      pending = null;
    }
  }

  log.debug('Parsed', opts.source, { channels: channels.length, droppedPastEvents: dropped, guideUrls: guideUrls.length });
  return { channels, guideUrls };
}
