import { validateTenantId } from '../config/tenant';

export const IMAGE_KINDS = ['poster', 'background', 'logo', 'icon'] as const;
export type ImageKind = typeof IMAGE_KINDS[number];

/** Escapes SCAN MATCH metacharacters so user-controlled parts match literally. */
export function escapeGlob(s: string): string {
  return s.replace(/[*?[\]\\]/g, '\\$&');
}

// Every tenant-scoped key goes through the tenant check, so a malformed token can never address another namespace
function t(tenant: string): string {
  return validateTenantId(tenant);
}

export const keys = {
  tenantConfig: (tenant: string) => `tenant-config:${t(tenant)}`,
  tenantConfigPattern: () => 'tenant-config:*',
  channel: (tenant: string, channelId: string) => `channel:${t(tenant)}:${channelId}`,
  channelPrefix: (tenant: string) => `channel:${t(tenant)}:`,
  channelPattern: (tenant: string) => `channel:${escapeGlob(t(tenant))}:*`,
  epg: (tenant: string) => `epg:${t(tenant)}`,
  logoOverride: (tenant: string, pattern: string) => `logo-override:${t(tenant)}:${pattern}`,
  logoOverridePattern: (tenant: string) => `logo-override:${escapeGlob(t(tenant))}:*`,
  manifestCache: (tenant: string) => `manifest-cache:${t(tenant)}`,
  manifestGeneration: (tenant: string) => `manifest-gen:${t(tenant)}`,
  parseHistory: (tenant: string) => `parse-history:${t(tenant)}`,
  processedImage: (cacheKey: string) => `processed-image:${cacheKey}`,
  rateLimit: (client: string) => `rate-limit:${client}`,
  auditLog: (timestamp: string, id: string) => `audit-log:${timestamp}:${id}`,
};

export function imageCacheKey(channelId: string, kind: ImageKind, placeholderVersion?: string): string {
  return placeholderVersion ? `${channelId}_${kind}_placeholder_${placeholderVersion}` : `${channelId}_${kind}`;
}
