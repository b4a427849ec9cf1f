import Redis from 'ioredis';
import { StoreUnavailable, formatError } from '../errors';
import { createLogger } from '../logger';
import { CappedIncrement, KeyValueBackend, WriteOp } from './backend';

const log = createLogger('STORE');

export type RedisBackendOptions = {
  url: string;
  maxRetries: number; // attempts per operation before StoreUnavailable
  retryDelayMs: number; // base of the exponential backoff
  maxRetryDelayMs?: number;
};

// Reject once the ceiling is reached; the first increment opens the window, later ones keep it
const INCREMENT_CAPPED = `
local current = tonumber(redis.call('GET', KEYS[1]) or '0')
if current >= tonumber(ARGV[1]) then
  return {current, 0, redis.call('TTL', KEYS[1])}
end
current = redis.call('INCR', KEYS[1])
local ttl = redis.call('TTL', KEYS[1])
if ttl < 0 then
  redis.call('EXPIRE', KEYS[1], ARGV[2])
  ttl = tonumber(ARGV[2])
end
return {current, 1, ttl}
`;

const SET_IF_UNCHANGED = `
if (redis.call('GET', KEYS[2]) or '') ~= ARGV[3] then
  return 0
end
redis.call('SET', KEYS[1], ARGV[1], 'EX', ARGV[2])
return 1
`;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((n) => typeof n === 'number');
}

export class RedisBackend implements KeyValueBackend {
  private readonly client: Redis;
  private readonly opts: RedisBackendOptions;

  constructor(opts: RedisBackendOptions) {
    this.opts = opts;
    this.client = new Redis(opts.url, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      retryStrategy: (times: number) => Math.min(times * 200, 5000),
    });
    this.client.on('error', (e: Error) => log.debug('Redis connection error:', formatError(e)));
  }

  // Exponential backoff with jitter; only exhaustion surfaces to the caller
  private async withRetry<T>(description: string, op: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.opts.maxRetries; attempt++) {
      try {
        return await op();
      } catch (e) {
        lastError = e;
        log.warn(`Attempt ${attempt} failed for ${description}: ${formatError(e)}`);
        if (attempt < this.opts.maxRetries) {
          const base = Math.min(this.opts.retryDelayMs * Math.pow(2, attempt - 1), this.opts.maxRetryDelayMs ?? 5000);
          await sleep(base + Math.random() * base * 0.5);
        }
      }
    }
    throw new StoreUnavailable(`Redis ${description} failed after ${this.opts.maxRetries} attempts: ${formatError(lastError)}`, { cause: lastError });
  }

  get(key: string): Promise<string | null> {
    return this.withRetry(`GET ${key}`, () => this.client.get(key));
  }

  getBuffer(key: string): Promise<Buffer | null> {
    return this.withRetry(`GET ${key}`, () => this.client.getBuffer(key));
  }

  mget(keys: string[]): Promise<(string | null)[]> {
    if (!keys.length) return Promise.resolve([]);
    return this.withRetry(`MGET (${keys.length} keys)`, () => this.client.mget(keys));
  }

  async set(key: string, value: string | Buffer, ttlSeconds?: number): Promise<void> {
    await this.withRetry(`SET ${key}`, async () => {
      if (ttlSeconds === undefined) await this.client.set(key, value);
      else if (ttlSeconds > 0) await this.client.set(key, value, 'EX', ttlSeconds);
      else await this.client.del(key);
    });
  }

  del(keys: string[]): Promise<number> {
    if (!keys.length) return Promise.resolve(0);
    return this.withRetry(`DEL (${keys.length} keys)`, () => this.client.del(...keys));
  }

  scan(pattern: string): Promise<string[]> {
    return this.withRetry(`SCAN ${pattern}`, async () => {
      const found = new Set<string>();
      let cursor = '0';
      do {
        const [next, keys] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', 500);
        for (const k of keys) found.add(k);
        cursor = next;
      } while (cursor !== '0');
      return [...found];
    });
  }

  ttl(key: string): Promise<number> {
    return this.withRetry(`TTL ${key}`, () => this.client.ttl(key));
  }

  async exec(ops: WriteOp[]): Promise<void> {
    if (!ops.length) return;
    await this.withRetry(`MULTI (${ops.length} ops)`, async () => {
      const tx = this.client.multi();
      for (const op of ops) {
        if (op.op === 'del') {
          if (op.keys.length) tx.del(...op.keys);
        } else if (op.ttlSeconds === undefined) {
          tx.set(op.key, op.value);
        } else if (op.ttlSeconds > 0) {
          tx.set(op.key, op.value, 'EX', op.ttlSeconds);
        } else {
          tx.del(op.key);
        }
      }
      const results = await tx.exec();
      if (!results) throw new Error('transaction aborted');
      const failed = results.find(([err]) => err);
      if (failed && failed[0]) throw failed[0];
    });
  }

  async pushCapped(key: string, value: string, cap: number, ttlSeconds: number): Promise<void> {
    await this.withRetry(`LPUSH ${key}`, async () => {
      await this.client.multi().lpush(key, value).ltrim(key, 0, cap - 1).expire(key, ttlSeconds).exec();
    });
  }

  range(key: string, start: number, stop: number): Promise<string[]> {
    return this.withRetry(`LRANGE ${key}`, () => this.client.lrange(key, start, stop));
  }

  incrementCapped(key: string, limit: number, windowSeconds: number): Promise<CappedIncrement> {
    return this.withRetry(`INCR ${key}`, async () => {
      const res: unknown = await this.client.eval(INCREMENT_CAPPED, 1, key, limit, windowSeconds);
      if (!isNumberArray(res) || res.length !== 3) throw new Error(`unexpected reply ${JSON.stringify(res)}`);
      return { count: res[0], allowed: res[1] === 1, ttlSeconds: res[2] };
    });
  }

  setIfUnchanged(key: string, value: string, ttlSeconds: number, guardKey: string, expected: string | null): Promise<boolean> {
    return this.withRetry(`SET ${key} guarded by ${guardKey}`, async () => {
      const res: unknown = await this.client.eval(SET_IF_UNCHANGED, 2, key, guardKey, value, ttlSeconds, expected ?? '');
      return res === 1;
    });
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (e) {
      log.warn('Redis ping failed:', formatError(e));
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
