import crypto from 'crypto';
import path from 'path';
import { IANAZone } from 'luxon';
import { ConfigInvalid } from '../errors';
import { parseCron } from '../scheduler/cron';

export type TenantConfig = {
  sources: string[]; // playlist URIs, in fetch order
  cron: string;
  hostUrl: string; // without trailing slash
  credentialHash?: string;
  timezone?: string; // IANA zone used for guide times without an offset
};

export const DEFAULT_CRON = '0 */6 * * *';
export const MAX_SOURCES = 50;

const TENANT_ID_RE = /^[A-Za-z0-9._-]{8,256}$/;

export function generateTenantToken(): string {
  return crypto.randomBytes(32).toString('base64url');
}

export function validateTenantId(tenant: unknown): string {
  if (typeof tenant !== 'string' || !TENANT_ID_RE.test(tenant)) {
    throw new ConfigInvalid('Tenant token must be 8-256 characters of [A-Za-z0-9._-]', 'tenant');
  }
  return tenant;
}

export function validateSourceUri(raw: unknown): string {
  const uri = typeof raw === 'string' ? raw.trim() : '';
  if (!uri) throw new ConfigInvalid('Source URI must be a non-empty string', 'sources');
  if (path.isAbsolute(uri)) return uri;
  let parsed: URL;
  try {
    parsed = new URL(uri);
  } catch (e) {
    throw new ConfigInvalid(`Malformed source URI: ${uri}`, 'sources', { cause: e });
  }
  if (!['http:', 'https:', 'file:'].includes(parsed.protocol)) {
    throw new ConfigInvalid(`Unsupported source scheme "${parsed.protocol}" in ${uri}`, 'sources');
  }
  return uri;
}

function validateHostUrl(raw: unknown): string {
  const host = typeof raw === 'string' ? raw.trim().replace(/\/+$/, '') : '';
  let parsed: URL | null = null;
  try { parsed = new URL(host); } catch { parsed = null; }
  if (!parsed || (parsed.protocol !== 'http:' && parsed.protocol !== 'https:')) {
    throw new ConfigInvalid('hostUrl must be an absolute http(s) URL', 'hostUrl');
  }
  return host;
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  if (v === undefined || v === null || v === '') return undefined;
  if (typeof v !== 'string') throw new ConfigInvalid(`${key} must be a string`, key);
  return v.trim() || undefined;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Turns untrusted JSON into a TenantConfig, or throws ConfigInvalid naming the offending field. */
export function validateTenantConfig(input: unknown): TenantConfig {
  if (!isRecord(input)) throw new ConfigInvalid('Tenant configuration must be an object');
  const rawSources = input.sources;
  if (!Array.isArray(rawSources) || rawSources.length < 1 || rawSources.length > MAX_SOURCES) {
    throw new ConfigInvalid(`sources must list between 1 and ${MAX_SOURCES} playlist URIs`, 'sources');
  }
  const sources = rawSources.map(validateSourceUri);
  const cronRaw = optionalString(input, 'cron') || DEFAULT_CRON;
  const cron = parseCron(cronRaw).expression;
  const hostUrl = validateHostUrl(input.hostUrl);
  const credentialHash = optionalString(input, 'credentialHash');
  const timezone = optionalString(input, 'timezone');
  if (timezone && !IANAZone.isValidZone(timezone)) {
    throw new ConfigInvalid(`Unknown timezone "${timezone}"`, 'timezone');
  }
  const config: TenantConfig = { sources, cron, hostUrl };
  if (credentialHash) config.credentialHash = credentialHash;
  if (timezone) config.timezone = timezone;
  return config;
}
