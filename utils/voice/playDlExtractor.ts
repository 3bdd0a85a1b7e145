import play from 'play-dl';
import { createLogger } from '../logger';
import type { MediaInfo } from './searchPolicy';
import type { ArtistRef } from './trackMetadata';

const log = createLogger('EXTRACTOR');

export interface SpotifyEntry {
  name: string;
  artists: ArtistRef[];
  /** Seconds, 0 when unknown */
  duration: number;
  url: string;
  thumbnail?: string;
}

export interface MediaCollection<T> {
  title: string;
  entries: T[];
}

/**
 * Metadata lookups against the media platforms. Implementations do no
 * downloading; audio is opened later through a StreamSource.
 */
export interface MediaExtractor {
  search: (query: string, limit: number) => Promise<MediaInfo[]>;
  lookup: (url: string) => Promise<MediaInfo>;
  playlist: (url: string) => Promise<MediaCollection<MediaInfo>>;
  spotify: (url: string) => Promise<MediaCollection<SpotifyEntry>>;
}

export interface SpotifyCredentials {
  clientId?: string;
  clientSecret?: string;
  refreshToken?: string;
  market: string;
}

interface PlayDlVideo {
  title?: string;
  url: string;
  durationInSec: number;
  thumbnails: Array<{ url: string }>;
}

interface PlayDlSpotifyTrack {
  name: string;
  url: string;
  durationInSec: number;
  artists: Array<{ name: string }>;
  thumbnail?: { url: string };
}

function toMediaInfo(video: PlayDlVideo, fallbackTitle: string): MediaInfo {
  const thumbnail = video.thumbnails[video.thumbnails.length - 1]?.url;
  return {
    title: video.title || fallbackTitle,
    url: video.url,
    duration: video.durationInSec || 0,
    ...(thumbnail ? { thumbnail } : {}),
  };
}

function toSpotifyEntry(track: PlayDlSpotifyTrack): SpotifyEntry {
  return {
    name: track.name,
    artists: track.artists.map((artist) => ({ name: artist.name })),
    duration: track.durationInSec || 0,
    url: track.url,
    ...(track.thumbnail?.url ? { thumbnail: track.thumbnail.url } : {}),
  };
}

/**
 * MediaExtractor backed by play-dl
 */
export class PlayDlExtractor implements MediaExtractor {
  private spotifyReady = false;

  /**
   * Register Spotify credentials. Without them Spotify links fail with an
   * extractor error.
   */
  configureSpotify(credentials: SpotifyCredentials): boolean {
    const { clientId, clientSecret, refreshToken, market } = credentials;
    if (!clientId || !clientSecret || !refreshToken) {
      log.warn(
        'Spotify credentials not configured. Set SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET and SPOTIFY_REFRESH_TOKEN to enable Spotify links.'
      );
      return false;
    }

    void play
      .setToken({
        spotify: {
          client_id: clientId,
          client_secret: clientSecret,
          refresh_token: refreshToken,
          market,
        },
      })
      .then(() => {
        this.spotifyReady = true;
        log.info('Spotify credentials configured for play-dl');
      })
      .catch((error: unknown) => {
        log.warn(`Failed to configure Spotify credentials: ${String(error)}`);
      });
    return true;
  }

  async search(query: string, limit: number): Promise<MediaInfo[]> {
    const results = await play.search(query, { limit, source: { youtube: 'video' } });
    return results.map((video) => toMediaInfo(video, query));
  }

  async lookup(url: string): Promise<MediaInfo> {
    const info = await play.video_basic_info(url);
    return toMediaInfo(info.video_details, 'Unknown Track');
  }

  async playlist(url: string): Promise<MediaCollection<MediaInfo>> {
    const list = await play.playlist_info(url, { incomplete: true });
    const videos = await list.all_videos();
    return {
      title: list.title || 'Unknown Playlist',
      entries: videos.map((video) => toMediaInfo(video, 'Unknown Track')),
    };
  }

  async spotify(url: string): Promise<MediaCollection<SpotifyEntry>> {
    if (!this.spotifyReady) {
      log.debug('Spotify lookup without confirmed credentials');
    }
    if (play.is_expired()) {
      await play.refreshToken();
    }

    const data = await play.spotify(url);
    if ('all_tracks' in data) {
      const tracks = await data.all_tracks();
      return { title: data.name, entries: tracks.map(toSpotifyEntry) };
    }
    return { title: data.name, entries: [toSpotifyEntry(data)] };
  }
}
