// Quality and codec tags that vary between playlists and guides for the same channel
const NOISE_TOKENS = new Set(['hd', 'fhd', 'uhd', 'sd', '4k', 'hevc', 'h265', '1080p', '720p']);

/** "Sky Sports Main-Event HD" -> "sky sports main event" */
export function normalizeChannelName(name: string): string {
  return String(name || '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .split(' ')
    .filter((tok) => tok && !NOISE_TOKENS.has(tok))
    .join(' ');
}

/** Normalized name without spaces, so "Sky Sports" and "SkySports" compare equal. */
export function compactChannelName(name: string): string {
  return normalizeChannelName(name).replace(/ /g, '');
}
