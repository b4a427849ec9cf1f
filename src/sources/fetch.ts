import fs from 'fs';
import https from 'https';
import path from 'path';
import { fileURLToPath } from 'url';
import fetch from 'node-fetch';
import type { Response } from 'node-fetch';
import { SourceUnavailable, formatError } from '../errors';

export type FetchOptions = {
  timeoutMs: number;
  insecure?: boolean; // accept self-signed certificates
  headers?: Record<string, string>;
};

/** Fetches playlists and guides; injectable so ingestion can run against fixtures. */
export interface SourceFetcher {
  fetchText(uri: string, opts: FetchOptions): Promise<string>;
  fetchBinary(uri: string, opts: FetchOptions): Promise<Buffer>;
}

const DEFAULT_UA = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const insecureAgent = new https.Agent({ rejectUnauthorized: false });

function localPath(uri: string): string | null {
  if (uri.startsWith('file://')) return fileURLToPath(uri);
  if (path.isAbsolute(uri)) return uri;
  return null;
}

async function readLocal(uri: string, file: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(file);
  } catch (e) {
    throw new SourceUnavailable(uri, `Cannot read ${file}: ${formatError(e)}`, { cause: e });
  }
}

async function readRemote(uri: string, opts: FetchOptions): Promise<Buffer> {
  let res: Response;
  try {
    res = await fetch(uri, {
      timeout: opts.timeoutMs,
      headers: { 'User-Agent': DEFAULT_UA, ...(opts.headers || {}) },
      agent: opts.insecure && uri.startsWith('https:') ? insecureAgent : undefined,
    });
  } catch (e) {
    throw new SourceUnavailable(uri, `Fetch failed for ${uri}: ${formatError(e)}`, { cause: e });
  }
  if (!res.ok) throw new SourceUnavailable(uri, `Fetch failed for ${uri}: HTTP ${res.status}`);
  try {
    return Buffer.from(await res.arrayBuffer());
  } catch (e) {
    throw new SourceUnavailable(uri, `Body read failed for ${uri}: ${formatError(e)}`, { cause: e });
  }
}

export const httpFetcher: SourceFetcher = {
  async fetchBinary(uri, opts) {
    const file = localPath(uri);
    return file ? readLocal(uri, file) : readRemote(uri, opts);
  },
  async fetchText(uri, opts) {
    const buf = await httpFetcher.fetchBinary(uri, opts);
    return buf.toString('utf8');
  },
};
