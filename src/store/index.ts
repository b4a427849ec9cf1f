import { createLogger } from '../logger';
import { KeyValueBackend } from './backend';
import { MemoryBackend } from './memoryBackend';
import { RedisBackend } from './redisBackend';

const log = createLogger('STORE');

export type BackendOptions = { url: string; maxRetries: number; retryDelayMs: number };

/** "memory://" keeps data in process (single instance, lost on restart). */
export function createBackend(opts: BackendOptions): KeyValueBackend {
  if (opts.url.startsWith('memory:')) {
    log.warn('Using in-process memory store; data does not survive restarts');
    return new MemoryBackend();
  }
  return new RedisBackend(opts);
}
