import { CappedIncrement, KeyValueBackend, WriteOp } from './backend';

type Entry = { value: string | Buffer | string[]; expiresAt?: number };

/** Glob as understood by SCAN MATCH: * ? [set] and backslash escapes. */
export function globToRegExp(glob: string): RegExp {
  let out = '';
  for (let i = 0; i < glob.length; i++) {
    const c = glob[i];
    if (c === '\\' && i + 1 < glob.length) {
      out += glob[++i].replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
    } else if (c === '*') {
      out += '.*';
    } else if (c === '?') {
      out += '.';
    } else if (c === '[') {
      const end = glob.indexOf(']', i + 1);
      if (end < 0) { out += '\\['; continue; }
      const body = glob.slice(i + 1, end).replace(/\\/g, '\\\\');
      out += `[${body.startsWith('^') ? `^${body.slice(1)}` : body}]`;
      i = end;
    } else {
      out += c.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
    }
  }
  return new RegExp(`^${out}$`, 's');
}

/** In-process stand-in for Redis with lazy expiry against an injectable clock. */
export class MemoryBackend implements KeyValueBackend {
  private readonly data = new Map<string, Entry>();
  private readonly now: () => number;

  constructor(now: () => number = () => Date.now()) {
    this.now = now;
  }

  private live(key: string): Entry | undefined {
    const e = this.data.get(key);
    if (!e) return undefined;
    if (e.expiresAt !== undefined && e.expiresAt <= this.now()) {
      this.data.delete(key);
      return undefined;
    }
    return e;
  }

  private write(key: string, value: string | Buffer, ttlSeconds?: number): void {
    if (ttlSeconds !== undefined && ttlSeconds <= 0) {
      this.data.delete(key);
      return;
    }
    this.data.set(key, { value, expiresAt: ttlSeconds !== undefined ? this.now() + ttlSeconds * 1000 : undefined });
  }

  private readString(key: string): string | null {
    const e = this.live(key);
    if (!e || Array.isArray(e.value)) return null;
    return typeof e.value === 'string' ? e.value : e.value.toString('utf8');
  }

  async get(key: string): Promise<string | null> {
    return this.readString(key);
  }

  async getBuffer(key: string): Promise<Buffer | null> {
    const e = this.live(key);
    if (!e || Array.isArray(e.value)) return null;
    return typeof e.value === 'string' ? Buffer.from(e.value, 'utf8') : e.value;
  }

  async mget(keys: string[]): Promise<(string | null)[]> {
    return Promise.all(keys.map((k) => this.get(k)));
  }

  async set(key: string, value: string | Buffer, ttlSeconds?: number): Promise<void> {
    this.write(key, value, ttlSeconds);
  }

  async del(keys: string[]): Promise<number> {
    let n = 0;
    for (const k of keys) if (this.live(k) && this.data.delete(k)) n++;
    return n;
  }

  async scan(pattern: string): Promise<string[]> {
    const re = globToRegExp(pattern);
    return [...this.data.keys()].filter((k) => re.test(k) && this.live(k) !== undefined);
  }

  async ttl(key: string): Promise<number> {
    const e = this.live(key);
    if (!e) return -2;
    if (e.expiresAt === undefined) return -1;
    return Math.ceil((e.expiresAt - this.now()) / 1000);
  }

  async exec(ops: WriteOp[]): Promise<void> {
    for (const op of ops) {
      if (op.op === 'set') this.write(op.key, op.value, op.ttlSeconds);
      else for (const k of op.keys) this.data.delete(k);
    }
  }

  async pushCapped(key: string, value: string, cap: number, ttlSeconds: number): Promise<void> {
    const e = this.live(key);
    const items = e && Array.isArray(e.value) ? e.value : [];
    this.data.set(key, { value: [value, ...items].slice(0, cap), expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async range(key: string, start: number, stop: number): Promise<string[]> {
    const e = this.live(key);
    if (!e || !Array.isArray(e.value)) return [];
    return e.value.slice(start, stop < 0 ? e.value.length + stop + 1 : stop + 1);
  }

  async incrementCapped(key: string, limit: number, windowSeconds: number): Promise<CappedIncrement> {
    const e = this.live(key);
    const current = e && typeof e.value === 'string' ? parseInt(e.value, 10) || 0 : 0;
    if (e && current >= limit) return { count: current, allowed: false, ttlSeconds: await this.ttl(key) };
    const expiresAt = e && e.expiresAt !== undefined ? e.expiresAt : this.now() + windowSeconds * 1000;
    this.data.set(key, { value: String(current + 1), expiresAt });
    return { count: current + 1, allowed: true, ttlSeconds: await this.ttl(key) };
  }

  async setIfUnchanged(key: string, value: string, ttlSeconds: number, guardKey: string, expected: string | null): Promise<boolean> {
    if (this.readString(guardKey) !== expected) return false;
    this.write(key, value, ttlSeconds);
    return true;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.data.clear();
  }
}
