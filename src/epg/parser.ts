import zlib from 'zlib';
import sax from 'sax';
import type { QualifiedTag, Tag } from 'sax';
import { DateTime } from 'luxon';
import { ParseFailure, formatError } from '../errors';
import { GuideParseOptions, ParsedGuide, ProgramEntry, ProgramMap } from './types';

type OpenElement = { local: string; accepted: boolean };

function isGzip(buf: Buffer): boolean {
  return buf.length > 2 && buf[0] === 0x1f && buf[1] === 0x8b;
}

function decode(content: string | Buffer, source: string): string {
  if (typeof content === 'string') return content;
  if (!isGzip(content)) return content.toString('utf8');
  try {
    return zlib.gunzipSync(content).toString('utf8');
  } catch (e) {
    throw new ParseFailure(source, `Corrupt gzip guide ${source}: ${formatError(e)}`, { cause: e });
  }
}

function attr(tag: Tag | QualifiedTag, name: string): string {
  for (const [key, value] of Object.entries(tag.attributes)) {
    if (typeof value === 'string') {
      if (key === name) return value;
    } else if (value.local === name) {
      return value.value;
    }
  }
  return '';
}

/** XMLTV time "20240917101500 +0200" (offset optional) to epoch ms. */
export function xmltvToMs(v: string, fallbackTimeZone?: string): number | undefined {
  const m = v.trim().match(/^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(?:\s*([+-]\d{4}))?/);
  if (!m) return undefined;
  const [, Y, M, D, h, mnt, s, tz] = m;
  const baseISO = `${Y}-${M}-${D}T${h}:${mnt}:${s}`;
  if (tz) {
    const sign = tz.startsWith('-') ? -1 : 1;
    const offsetMinutes = sign * (parseInt(tz.slice(1, 3), 10) * 60 + parseInt(tz.slice(3, 5), 10));
    const dt = DateTime.fromISO(baseISO, { zone: 'utc' }).minus({ minutes: offsetMinutes });
    return dt.isValid ? dt.toMillis() : undefined;
  }
  if (fallbackTimeZone) {
    const local = DateTime.fromISO(baseISO, { zone: fallbackTimeZone });
    if (local.isValid) return local.toMillis();
  }
  const utc = DateTime.fromISO(baseISO, { zone: 'utc' });
  return utc.isValid ? utc.toMillis() : undefined;
}

/**
 * Streams XMLTV (plain or gzip) into per-channel programme lists.
 * When the root element is namespaced only elements of that namespace are read.
 * Programmes outside [now - 2h, now + 30d] are dropped. Malformed XML throws ParseFailure.
 */
export function parseXmltv(content: string | Buffer, opts: GuideParseOptions, source = 'xmltv'): ParsedGuide {
  const xml = decode(content, source);
  const now = opts.now.getTime();
  const earliest = now - (opts.pastWindowHours ?? 2) * 3600_000;
  const latest = now + (opts.futureWindowDays ?? 30) * 86400_000;

  const parser = sax.parser(true, { trim: true, xmlns: true });
  const programs: ProgramMap = {};
  const channelNames: Record<string, string[]> = {};
  const stack: OpenElement[] = [];
  let rootUri: string | undefined;
  let text = '';
  let prog: { channel: string; start?: number; stop?: number; title?: string; desc?: string; category?: string } | null = null;
  let channelId: string | null = null;

  parser.onerror = (e: Error) => { throw e; };

  parser.onopentag = (tag: Tag | QualifiedTag) => {
    const local = 'local' in tag ? tag.local : tag.name;
    const uri = 'uri' in tag ? tag.uri : '';
    if (rootUri === undefined) rootUri = uri;
    const accepted = uri === rootUri;
    stack.push({ local, accepted });
    text = '';
    if (!accepted) return;
    if (local === 'programme') {
      const channel = attr(tag, 'channel').trim();
      prog = {
        channel,
        start: xmltvToMs(attr(tag, 'start'), opts.fallbackTimeZone),
        stop: xmltvToMs(attr(tag, 'stop'), opts.fallbackTimeZone),
      };
    } else if (local === 'channel' && !prog) {
      channelId = attr(tag, 'id').trim();
      if (channelId && !channelNames[channelId]) channelNames[channelId] = [];
    }
  };

  parser.ontext = (t: string) => { text += t; };
  parser.oncdata = (t: string) => { text += t; };

  parser.onclosetag = () => {
    const el = stack.pop();
    const value = text.trim();
    text = '';
    if (!el || !el.accepted) return;
    if (prog) {
      if (el.local === 'title' && prog.title === undefined) prog.title = value;
      else if (el.local === 'desc' && prog.desc === undefined) prog.desc = value;
      else if (el.local === 'category' && prog.category === undefined) prog.category = value;
      else if (el.local === 'programme') {
        const { channel, start, stop } = prog;
        if (channel && start !== undefined && start >= earliest && start <= latest) {
          const entry: ProgramEntry = {
            title: prog.title || 'Unknown',
            description: prog.desc || '',
            category: prog.category || '',
            start: new Date(start).toISOString(),
          };
          if (stop !== undefined) entry.stop = new Date(stop).toISOString();
          (programs[channel] ||= []).push(entry);
        }
        prog = null;
      }
    } else if (channelId) {
      if (el.local === 'display-name' && value) channelNames[channelId].push(value);
      else if (el.local === 'channel') channelId = null;
    }
  };

  try {
    parser.write(xml).close();
  } catch (e) {
    throw new ParseFailure(source, `Malformed XMLTV in ${source}: ${formatError(e)}`, { cause: e });
  }

  for (const list of Object.values(programs)) list.sort((a, b) => a.start.localeCompare(b.start));
  return { programs, channelNames };
}
