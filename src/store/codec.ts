// Decoders for values read back from the store. Anything that does not have the expected
// shape decodes to null and is treated as absent.
import type { ProgramEntry, ProgramMap } from '../epg/types';
import type { ChannelRecord, EventInfo, StreamHeaders } from '../playlist/types';
import type { IngestionReport, IngestionStatus, IngestionTrigger, SourceFailure } from '../scheduler/types';
import type { CatalogSummary, LogoOverride } from './types';

type Json = Record<string, unknown>;

function parseJson(raw: string | null): unknown {
  if (raw === null) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isObject(v: unknown): v is Json {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function optStr(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

function strList(v: unknown): string[] | null {
  if (!Array.isArray(v)) return null;
  const out: string[] = [];
  for (const s of v) {
    if (typeof s !== 'string') return null;
    out.push(s);
  }
  return out;
}

function num(v: unknown): number {
  return typeof v === 'number' && Number.isFinite(v) ? v : 0;
}

function headers(v: unknown): StreamHeaders | undefined {
  if (!isObject(v)) return undefined;
  const out: StreamHeaders = {};
  for (const [k, val] of Object.entries(v)) if (typeof val === 'string') out[k] = val;
  return Object.keys(out).length ? out : undefined;
}

function eventInfo(v: unknown): EventInfo | undefined {
  if (!isObject(v) || typeof v.sport !== 'string') return undefined;
  const ev: EventInfo = { sport: v.sport };
  const team1 = optStr(v.team1);
  const team2 = optStr(v.team2);
  const start = optStr(v.start);
  if (team1) ev.team1 = team1;
  if (team2) ev.team2 = team2;
  if (start) ev.start = start;
  return ev;
}

export function decodeChannel(raw: string | null): ChannelRecord | null {
  const v = parseJson(raw);
  if (!isObject(v)) return null;
  const { channelId, name, title, group, logo, streamUrl, isEvent } = v;
  if (typeof channelId !== 'string' || typeof name !== 'string' || typeof title !== 'string'
    || typeof group !== 'string' || typeof logo !== 'string' || typeof streamUrl !== 'string'
    || typeof isEvent !== 'boolean') return null;
  const record: ChannelRecord = { channelId, name, title, group, logo, streamUrl, isEvent };
  const streamHeaders = headers(v.streamHeaders);
  const guideUrl = optStr(v.guideUrl);
  const event = isEvent ? eventInfo(v.event) : undefined;
  if (streamHeaders) record.streamHeaders = streamHeaders;
  if (guideUrl) record.guideUrl = guideUrl;
  if (event) record.event = event;
  return record;
}

function programEntry(v: unknown): ProgramEntry | null {
  if (!isObject(v) || typeof v.start !== 'string') return null;
  const entry: ProgramEntry = {
    title: optStr(v.title) || 'Unknown',
    description: optStr(v.description) || '',
    category: optStr(v.category) || '',
    start: v.start,
  };
  const stop = optStr(v.stop);
  if (stop) entry.stop = stop;
  return entry;
}

export function decodeProgramMap(raw: string | null): ProgramMap | null {
  const v = parseJson(raw);
  if (!isObject(v)) return null;
  const out: ProgramMap = {};
  for (const [id, list] of Object.entries(v)) {
    if (!Array.isArray(list)) continue;
    out[id] = list.map(programEntry).filter((p): p is ProgramEntry => p !== null);
  }
  return out;
}

export function decodeLogoOverride(raw: string | null): LogoOverride | null {
  const v = parseJson(raw);
  if (!isObject(v) || typeof v.pattern !== 'string' || typeof v.logoUrl !== 'string') return null;
  return { pattern: v.pattern, logoUrl: v.logoUrl, isRegex: v.isRegex === true };
}

export function decodeCatalogSummary(raw: string | null): CatalogSummary | null {
  const v = parseJson(raw);
  if (!isObject(v)) return null;
  const genres = strList(v.genres);
  const eventGenres = strList(v.eventGenres);
  return genres && eventGenres ? { genres, eventGenres } : null;
}

const STATUSES: readonly IngestionStatus[] = ['success', 'partial-failure', 'fatal'];
const TRIGGERS: readonly IngestionTrigger[] = ['cron', 'manual'];

function failure(v: unknown): SourceFailure | null {
  if (!isObject(v) || typeof v.source !== 'string') return null;
  return {
    source: v.source,
    kind: v.kind === 'epg' ? 'epg' : 'playlist',
    error: optStr(v.error) || 'Error',
    message: optStr(v.message) || '',
  };
}

export function decodeReport(raw: string | null): IngestionReport | null {
  const v = parseJson(raw);
  if (!isObject(v)) return null;
  const status = STATUSES.find((s) => s === v.status);
  const trigger = TRIGGERS.find((s) => s === v.trigger);
  if (!status || !trigger || typeof v.startedAt !== 'string' || typeof v.finishedAt !== 'string') return null;
  return {
    status,
    trigger,
    startedAt: v.startedAt,
    finishedAt: v.finishedAt,
    channels: num(v.channels),
    events: num(v.events),
    stored: num(v.stored),
    removed: num(v.removed),
    guides: num(v.guides),
    guideChannels: num(v.guideChannels),
    unmatchedGuideChannels: num(v.unmatchedGuideChannels),
    failures: Array.isArray(v.failures) ? v.failures.map(failure).filter((f): f is SourceFailure => f !== null) : [],
  };
}
