export type IngestionStatus = 'success' | 'partial-failure' | 'fatal';
export type IngestionTrigger = 'cron' | 'manual';

export interface SourceFailure {
  source: string;
  kind: 'playlist' | 'epg';
  error: string; // error class, e.g. SourceUnavailable
  message: string;
}

export interface IngestionReport {
  status: IngestionStatus;
  trigger: IngestionTrigger;
  startedAt: string;
  finishedAt: string;
  channels: number; // distinct channels parsed
  events: number;
  stored: number;
  removed: number; // stale keys deleted
  guides: number; // guide sources loaded
  guideChannels: number; // channels that received programmes
  unmatchedGuideChannels: number;
  failures: SourceFailure[];
}
