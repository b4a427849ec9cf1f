export interface ProgramEntry {
  title: string;
  description: string;
  category: string;
  start: string; // ISO-8601 UTC
  stop?: string; // ISO-8601 UTC
}

// guide channel id -> programmes sorted by start
export type ProgramMap = Record<string, ProgramEntry[]>;

export interface ParsedGuide {
  programs: ProgramMap;
  // guide channel id -> <display-name> values
  channelNames: Record<string, string[]>;
}

export interface GuideParseOptions {
  now: Date;
  // Times without an explicit offset are read in this zone, UTC otherwise (e.g. 'Europe/Rome')
  fallbackTimeZone?: string;
  pastWindowHours?: number; // default 2
  futureWindowDays?: number; // default 30
}
