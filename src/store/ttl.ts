import type { ChannelRecord } from '../playlist/types';

const DAY = 86400;

export const DEFAULT_EVENT_GRACE_HOURS = 4;
export const DEFAULT_MANIFEST_CACHE_SECONDS = 300;
export const IMAGE_CACHE_SECONDS = 7 * DAY;
export const EPG_CACHE_SECONDS = 7 * DAY;
export const AUDIT_LOG_SECONDS = 90 * DAY;
export const PARSE_HISTORY_SECONDS = 90 * DAY;
export const PARSE_HISTORY_LIMIT = 50;

export type TtlDecision =
  | { kind: 'persistent' }
  | { kind: 'expiring'; seconds: number }
  | { kind: 'expired' };

/** Seconds until the event leaves the grace window; zero or less once it has. */
export function eventTtlSeconds(start: Date, now: Date, graceHours: number): number {
  return Math.floor((start.getTime() + graceHours * 3600_000 - now.getTime()) / 1000);
}

export function channelTtl(record: ChannelRecord, now: Date, graceHours: number): TtlDecision {
  const start = record.isEvent && record.event && record.event.start ? new Date(record.event.start) : undefined;
  if (!start || Number.isNaN(start.getTime())) return { kind: 'persistent' };
  const seconds = eventTtlSeconds(start, now, graceHours);
  return seconds > 0 ? { kind: 'expiring', seconds } : { kind: 'expired' };
}
