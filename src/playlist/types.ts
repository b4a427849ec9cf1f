export type StreamHeaders = Record<string, string>;

export interface EventInfo {
  sport: string; // group label of the event line
  team1?: string;
  team2?: string;
  start?: string; // ISO-8601 UTC, absent when the title could not be read
}

export interface ChannelRecord {
  channelId: string;
  name: string; // display name as written in the playlist
  title: string; // catalog title; events get "{teams}\n{Eastern time}"
  group: string;
  logo: string;
  streamUrl: string;
  streamHeaders?: StreamHeaders;
  guideUrl?: string;
  isEvent: boolean;
  event?: EventInfo;
}

export interface ParsedPlaylist {
  channels: ChannelRecord[];
  guideUrls: string[]; // advertised in the #EXTM3U header
}

// Recognised by the image cache, which draws a placeholder instead of fetching it
export const PLACEHOLDER_LOGO = 'https://via.placeholder.com/240x135.png?text=No+Logo';

export function isPlaceholderLogo(uri: string): boolean {
  return uri === PLACEHOLDER_LOGO;
}
