import util from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function debugEnabled(): boolean {
  const v = (process.env.ADDON_DEBUG || '').toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

// Console logging with a bracketed tag, e.g. "[INGEST] Fetched 3 sources"
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  const line = (args: unknown[]) => `${prefix} ${util.format(...args)}`;
  return {
    debug: (...args) => { if (debugEnabled()) console.log(line(args)); },
    info: (...args) => console.log(line(args)),
    warn: (...args) => console.warn(line(args)),
    error: (...args) => console.error(line(args)),
  };
}

/** Keeps the edges of a secret visible so log lines stay correlatable. */
export function maskToken(s: string): string {
  if (!s) return '';
  if (s.length <= 16) return s.replace(/.(?=.{4})/g, '*');
  return `${s.slice(0, 8)}${'*'.repeat(Math.max(0, s.length - 16))}${s.slice(-8)}`;
}
