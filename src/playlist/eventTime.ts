import { DateTime, FixedOffsetZone, IANAZone, Zone } from 'luxon';
import { createLogger } from '../logger';
import { formatError } from '../errors';

const log = createLogger('EVENTS');

// Abbreviations that may appear in event titles. US zones are fixed offsets on purpose:
// feeds write EST in summer too and mean UTC-5.
export const ZONE_ABBREVIATIONS: ReadonlyMap<string, Zone> = new Map<string, Zone>([
  ['EST', FixedOffsetZone.instance(-5 * 60)],
  ['EDT', FixedOffsetZone.instance(-4 * 60)],
  ['CST', FixedOffsetZone.instance(-6 * 60)],
  ['CDT', FixedOffsetZone.instance(-5 * 60)],
  ['MST', FixedOffsetZone.instance(-7 * 60)],
  ['MDT', FixedOffsetZone.instance(-6 * 60)],
  ['PST', FixedOffsetZone.instance(-8 * 60)],
  ['PDT', FixedOffsetZone.instance(-7 * 60)],
  ['UK', IANAZone.create('Europe/London')],
  ['UTC', FixedOffsetZone.utcInstance],
  ['ET', IANAZone.create('America/New_York')],
  ['GMT', FixedOffsetZone.utcInstance],
]);

export const DEFAULT_ZONE_PREFERENCE: readonly string[] = ['EST', 'EDT', 'CST', 'CDT', 'MST', 'MDT', 'PST', 'PDT', 'UK', 'UTC', 'ET', 'GMT'];

// Catalog titles always show Eastern time, whatever the tenant's zone
export const DISPLAY_ZONE = 'America/New_York';

export type EventTimeOptions = {
  zonePreference?: readonly string[];
  now?: Date; // supplies the year when a title omits it
};

const MONTH = '(?:Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)';
const MONTH_INDEX = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const ZONES = [...ZONE_ABBREVIATIONS.keys()].sort((a, b) => b.length - a.length).join('|');

const NUMERIC_DATE = '\\b\\d{1,2}[/-]\\d{1,2}[/-](?:\\d{4}|\\d{2})\\b';
const MONTH_FIRST_DATE = `\\b${MONTH}\\b\\.?[ -]\\d{1,2}(?:st|nd|rd|th)?\\b(?!:)(?:,?[ -]\\d{4}\\b|[ -]\\d{2}\\b(?!:))?`;
const DAY_FIRST_DATE = `\\b\\d{1,2}(?:st|nd|rd|th)?[ -]${MONTH}\\b\\.?(?:,?[ -]\\d{4}\\b)?`;
const DATE_SOURCE = `${NUMERIC_DATE}|${MONTH_FIRST_DATE}|${DAY_FIRST_DATE}`;
const TIME_SOURCE = `\\b\\d{1,2}:\\d{2}(?::\\d{2})?(?:\\s*[AP]M\\b)?(?:\\s*(?:${ZONES})\\b)?`;

const DATE_RE = new RegExp(DATE_SOURCE, 'i');
const TIME_RE = new RegExp(TIME_SOURCE, 'i');

/** A title is an event when it carries both a date and a clock time, anywhere in the string. */
export function isEventTitle(name: string): boolean {
  return DATE_RE.test(name) && TIME_RE.test(name);
}

// 1. keep only the "=" / " - " segments that carry a date or a time
function focusSegments(title: string): string {
  const segments = title.split(/\s*=\s*|\s+-\s+/).filter((seg) => DATE_RE.test(seg) || TIME_RE.test(seg));
  return segments.length ? segments.join(' ') : title;
}

// 2. "(8:15 PM EST/5:15 PM PST/1:15 AM UK)" keeps the segment of the most preferred zone
function pickZoneSegment(s: string, preference: readonly string[]): string {
  return s.replace(/\(([^()]*)\)/g, (group: string, inner: string) => {
    const segments = inner.split('/').map((seg) => seg.trim()).filter(Boolean);
    const zoned = segments.filter((seg) => findZone(seg, [...ZONE_ABBREVIATIONS.keys()]));
    if (segments.length < 2 || zoned.length < 2) return group;
    for (const abbr of preference) {
      const hit = segments.find((seg) => zoneMentioned(seg, abbr));
      if (hit) return ` ${hit} `;
    }
    return ` ${segments[0]} `;
  });
}

// 3. punctuation variants and duplicate clock times
function normalize(s: string): string {
  let out = s.replace(new RegExp(`\\b(${MONTH})\\.?-(\\d{1,2})-(\\d{2,4})\\b`, 'gi'), '$1 $2 $3');
  out = out.replace(/\bUTC\s+(?:HD|SD|FHD|UHD)\b/gi, 'UTC');
  if (/\d{1,2}:\d{2}(?::\d{2})?\s*[AP]M\b/i.test(out)) {
    out = out.replace(/(?<![:\d])\d{1,2}:\d{2}(?::\d{2})?(?![:\d]|\s*[AP]M)/gi, ' ');
  }
  return out.replace(/[^A-Za-z0-9:/\- ]+/g, ' ').replace(/\s+/g, ' ').trim();
}

function zoneMentioned(s: string, abbr: string): boolean {
  return new RegExp(`\\b${abbr}\\b`).test(s);
}

function findZone(s: string, preference: readonly string[]): Zone | undefined {
  for (const abbr of preference) {
    const zone = ZONE_ABBREVIATIONS.get(abbr);
    if (zone && zoneMentioned(s, abbr)) return zone;
  }
  return undefined;
}

type DateParts = { year?: number; month: number; day: number };

function fullYear(raw: string): number {
  const n = parseInt(raw, 10);
  return raw.length === 2 ? 2000 + n : n;
}

function monthNumber(name: string): number {
  return MONTH_INDEX.indexOf(name.slice(0, 3).toLowerCase()) + 1;
}

// 4a. candidate calendar dates; numeric ones try US month-first before day-first
function dateCandidates(s: string): DateParts[] {
  const numeric = s.match(/\b(\d{1,2})[/-](\d{1,2})[/-](\d{4}|\d{2})\b/);
  if (numeric) {
    const a = parseInt(numeric[1], 10);
    const b = parseInt(numeric[2], 10);
    const year = fullYear(numeric[3]);
    return [{ year, month: a, day: b }, { year, month: b, day: a }];
  }
  // a clock time after the month name ("Nov 20:00") is not its day
  const monthFirst = s.match(new RegExp(`\\b(${MONTH})\\b[ -](\\d{1,2})(?:st|nd|rd|th)?\\b(?!:)(?:[ -](\\d{4})\\b|[ -](\\d{2})\\b(?!:))?`, 'i'));
  const dayFirst = s.match(new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?[ -](${MONTH})\\b(?:[ -](\\d{4})\\b)?`, 'i'));
  // "8 Nov 20:00" is day-first: a day number ahead of the month name wins
  if (dayFirst && (!monthFirst || (dayFirst.index ?? 0) < (monthFirst.index ?? 0))) {
    return [{ year: dayFirst[3] ? fullYear(dayFirst[3]) : undefined, month: monthNumber(dayFirst[2]), day: parseInt(dayFirst[1], 10) }];
  }
  if (monthFirst) {
    const yearRaw = monthFirst[3] || monthFirst[4];
    return [{ year: yearRaw ? fullYear(yearRaw) : undefined, month: monthNumber(monthFirst[1]), day: parseInt(monthFirst[2], 10) }];
  }
  return [];
}

type TimeParts = { hour: number; minute: number; second: number };

// 4b. first clock time; 12-hour times win because 24-hour duplicates were stripped
function timeOfDay(s: string): TimeParts | undefined {
  const m = s.match(/\b(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([AP])M\b)?/i);
  if (!m) return undefined;
  let hour = parseInt(m[1], 10);
  const minute = parseInt(m[2], 10);
  const second = m[3] ? parseInt(m[3], 10) : 0;
  if (m[4]) {
    if (hour < 1 || hour > 12) return undefined;
    hour = (hour % 12) + (m[4].toUpperCase() === 'P' ? 12 : 0);
  }
  if (hour > 23 || minute > 59 || second > 59) return undefined;
  return { hour, minute, second };
}

function resolve(title: string, opts: EventTimeOptions): Date | undefined {
  const preference = opts.zonePreference && opts.zonePreference.length ? opts.zonePreference : DEFAULT_ZONE_PREFERENCE;
  const cleaned = normalize(pickZoneSegment(focusSegments(title), preference));
  const time = timeOfDay(cleaned);
  if (!time) return undefined;
  // 5. explicit or preferred abbreviation, else UTC
  const zone = findZone(cleaned, preference) || FixedOffsetZone.utcInstance;
  const now = DateTime.fromJSDate(opts.now || new Date(), { zone });
  for (const date of dateCandidates(cleaned)) {
    const dt = DateTime.fromObject({ ...date, year: date.year ?? now.year, ...time }, { zone });
    if (dt.isValid) return dt.toUTC().toJSDate();
  }
  return undefined;
}

/** Best-effort UTC start of an event title; undefined whenever the title cannot be read. */
export function extractEventStart(title: string, opts: EventTimeOptions = {}): Date | undefined {
  try {
    return resolve(title, opts);
  } catch (e) {
    log.debug('Event time unresolved for', JSON.stringify(title), formatError(e));
    return undefined;
  }
}

/** Removes date/time fragments and dangling separators, e.g. "11/08/2025 8:10 PM EST = A @ B" -> "A @ B". */
export function cleanEventTitle(name: string): string {
  const s = name
    .replace(new RegExp(DATE_SOURCE, 'gi'), ' ')
    .replace(new RegExp(TIME_SOURCE, 'gi'), ' ')
    .replace(/\([\s/,|-]*\)/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/(?:\s*[-=|,]\s*){2,}/g, ' - ')
    .replace(/\b(?:HD|SD|FHD|UHD)\s*$/i, '')
    .replace(/^[\s\-=,|:]+|[\s\-=,|:]+$/g, '');
  return s || name.trim();
}

export function splitTeams(cleaned: string): { team1: string; team2: string } | undefined {
  const m = cleaned.match(/^(.*?)\s+(?:@|vs\.?)\s+(.*)$/i);
  if (!m) return undefined;
  const team1 = m[1].trim();
  const team2 = m[2].trim();
  return team1 && team2 ? { team1, team2 } : undefined;
}

/** "Nov 8 8:10PM" in Eastern time. */
export function formatEventTime(start: Date): string {
  return DateTime.fromJSDate(start, { zone: 'utc' })
    .setZone(DISPLAY_ZONE)
    .setLocale('en-US')
    .toFormat('LLL d h:mma')
    .replace(':00', '');
}
