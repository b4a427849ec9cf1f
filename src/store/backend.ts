export type WriteOp =
  | { op: 'set'; key: string; value: string | Buffer; ttlSeconds?: number }
  | { op: 'del'; keys: string[] };

export type CappedIncrement = {
  count: number; // value after this call
  allowed: boolean; // false when the ceiling was already reached; the counter is left as is
  ttlSeconds: number; // remaining window
};

/**
 * The few primitives the store needs from a key-value engine: TTLs, glob scans, a
 * transactional write batch, an atomic capped increment and a guarded write.
 */
export interface KeyValueBackend {
  get(key: string): Promise<string | null>;
  getBuffer(key: string): Promise<Buffer | null>;
  mget(keys: string[]): Promise<(string | null)[]>;
  set(key: string, value: string | Buffer, ttlSeconds?: number): Promise<void>;
  del(keys: string[]): Promise<number>;
  scan(pattern: string): Promise<string[]>;
  ttl(key: string): Promise<number>; // -2 missing, -1 no expiry
  exec(ops: WriteOp[]): Promise<void>;
  pushCapped(key: string, value: string, cap: number, ttlSeconds: number): Promise<void>;
  range(key: string, start: number, stop: number): Promise<string[]>;
  incrementCapped(key: string, limit: number, windowSeconds: number): Promise<CappedIncrement>;
  // writes only while guardKey still holds `expected` (null: absent); false when it moved on
  setIfUnchanged(key: string, value: string, ttlSeconds: number, guardKey: string, expected: string | null): Promise<boolean>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
