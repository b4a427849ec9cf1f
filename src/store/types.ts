export interface LogoOverride {
  pattern: string; // channel id, or a regular expression anchored at the start of the id
  logoUrl: string;
  isRegex: boolean;
}

export interface CatalogSummary {
  genres: string[]; // groups of standing channels
  eventGenres: string[]; // sports of events
}

export interface AuditEntry {
  action: string;
  tenant?: string; // masked
  at: string;
  details?: Record<string, string | number | boolean>;
}

export type StoreSummary = { stored: number; skippedExpired: number; removed: number };
