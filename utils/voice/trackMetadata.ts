/**
 * Input classification for play requests: which kind of URL (if any) a user typed.
 */

/** YouTube video IDs are 11 characters: alphanumeric, hyphen, underscore */
const VIDEO_ID_PATTERN = /^[a-zA-Z0-9_-]{11}$/;

/** Canonical watch URL base */
const CANONICAL_WATCH_URL = 'https://www.youtube.com/watch?v=';

/**
 * Check if hostname matches expected domain
 */
export function isValidHostname(hostname: string, expectedDomain: string): boolean {
  // Exact match
  if (hostname === expectedDomain) return true;
  // Subdomain match (e.g., www.youtube.com, m.youtube.com)
  if (hostname.endsWith('.' + expectedDomain)) return true;
  return false;
}

/**
 * Extract YouTube video ID from watch, youtu.be, embed and legacy /v/ URLs.
 *
 * @returns The 11-character video ID, or null if not a YouTube video URL
 */
export function extractYouTubeVideoId(url: string | null | undefined): string | null {
  if (!url) return null;

  try {
    const parsed = new URL(url);
    const hostname = parsed.hostname.toLowerCase();

    if (hostname === 'youtu.be') {
      const id = parsed.pathname.slice(1).split('/')[0] ?? '';
      return VIDEO_ID_PATTERN.test(id) ? id : null;
    }

    if (isValidHostname(hostname, 'youtube.com')) {
      if (parsed.pathname.startsWith('/watch')) {
        const id = parsed.searchParams.get('v');
        return id && VIDEO_ID_PATTERN.test(id) ? id : null;
      }
      const pathMatch = parsed.pathname.match(/^\/(?:v|embed|shorts)\/([a-zA-Z0-9_-]{11})/);
      if (pathMatch?.[1]) return pathMatch[1];
    }

    return null;
  } catch {
    return null;
  }
}

/**
 * Strip playlist/timestamp params so cache keys stay stable
 */
export function toCanonicalYouTubeUrl(url: string): string | null {
  const id = extractYouTubeVideoId(url);
  return id ? CANONICAL_WATCH_URL + id : null;
}

export type UrlType =
  | 'yt_video'
  | 'yt_playlist'
  | 'sp_track'
  | 'sp_playlist'
  | 'sp_album'
  | 'url'
  | 'search';

/**
 * Detect what a play request refers to. Anything that is not an http(s) URL is a search.
 */
export function detectUrlType(source: string): UrlType {
  let url: URL;
  try {
    url = new URL(source.trim());
  } catch {
    return 'search';
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') return 'search';

  const hostname = url.hostname.toLowerCase();

  if (isValidHostname(hostname, 'youtube.com') || hostname === 'youtu.be') {
    if (extractYouTubeVideoId(source.trim())) return 'yt_video';
    if (url.pathname.startsWith('/playlist') && url.searchParams.has('list')) {
      return 'yt_playlist';
    }
    return 'url';
  }

  if (isValidHostname(hostname, 'spotify.com')) {
    const pathParts = url.pathname.split('/').filter((p) => p);
    // open.spotify.com/intl-xx/track/... carries a locale segment
    const kind = pathParts[0]?.startsWith('intl-') ? pathParts[1] : pathParts[0];
    if (kind === 'track') return 'sp_track';
    if (kind === 'playlist') return 'sp_playlist';
    if (kind === 'album') return 'sp_album';
  }

  return 'url';
}

export interface ArtistRef {
  name?: string;
}

/**
 * Join artist names, skipping blanks
 */
export function joinArtists(artists: readonly ArtistRef[]): string {
  return artists
    .map((artist) => artist.name?.trim() ?? '')
    .filter((name) => name.length > 0)
    .join(', ');
}

/**
 * Search text used to find a Spotify entry on YouTube
 */
export function spotifySearchQuery(name: string, artists: readonly ArtistRef[]): string {
  const first = artists.find((artist) => artist.name?.trim())?.name?.trim();
  return first ? `${name.trim()} ${first}` : name.trim();
}

/**
 * Display title for a Spotify entry
 */
export function spotifyDisplayTitle(name: string, artists: readonly ArtistRef[]): string {
  const joined = joinArtists(artists);
  return joined ? `${name.trim()} — ${joined}` : name.trim();
}
