import { randomUUID } from 'crypto';
import { createLogger } from '../logger';
import { ResolutionError, toErrorMessage } from '../errors';
import {
  detectUrlType,
  isValidHostname,
  spotifyDisplayTitle,
  spotifySearchQuery,
  toCanonicalYouTubeUrl,
} from './trackMetadata';
import { firstResult } from './searchPolicy';
import type { MediaInfo, SearchRankingPolicy } from './searchPolicy';
import type { MediaExtractor, SpotifyEntry } from './playDlExtractor';
import type { StreamSource, Track, TrackOrigin } from '../../types/voice';

const log = createLogger('TRACK_RESOLVER');

export interface StreamSourceFactory {
  createSource: (url: string) => StreamSource;
}

export interface TrackResolverOptions {
  extractor: MediaExtractor;
  streams: StreamSourceFactory;
  /** Upper bound on every extractor call */
  timeoutMs: number;
  rankingPolicy?: SearchRankingPolicy;
  idFactory?: () => string;
}

/**
 * Turns user input into frozen Track descriptors. Stateless: resolving the
 * same query twice performs the same lookups and yields equivalent tracks.
 */
export class TrackResolver {
  private readonly policy: SearchRankingPolicy;
  private readonly nextId: () => string;

  constructor(private readonly options: TrackResolverOptions) {
    this.policy = options.rankingPolicy ?? firstResult;
    this.nextId = options.idFactory ?? randomUUID;
  }

  /**
   * Resolve to a single track. Collections yield their first entry.
   */
  async resolve(query: string, requestedBy: string): Promise<Track> {
    const [first] = await this.resolveAll(query, requestedBy);
    if (!first) {
      throw new ResolutionError('not_found', `Nothing playable found for "${query}"`, query);
    }
    return first;
  }

  /**
   * Playlists and albums, which expand into several tracks
   */
  isCollection(query: string): boolean {
    const urlType = detectUrlType(query.trim());
    return urlType === 'yt_playlist' || urlType === 'sp_album' || urlType === 'sp_playlist';
  }

  /**
   * A track for a single-item query that is looked up when it is first
   * opened, so it can take its queue slot before any network call. Until
   * then the title is the query itself and the duration unknown.
   */
  defer(query: string, requestedBy: string): Track {
    const input = query.trim();
    if (!input) {
      throw new ResolutionError('not_found', 'Empty query', query);
    }

    const urlType = detectUrlType(input);
    if (urlType === 'url') {
      return this.makeTrack(this.describeUrl(input), requestedBy, input, this.originOf(input));
    }

    const url = toCanonicalYouTubeUrl(input) ?? input;
    const origin: TrackOrigin =
      urlType === 'yt_video' ? 'youtube' : urlType === 'sp_track' ? 'spotify' : 'search';
    return this.makeTrack(
      { title: input, url, duration: 0 },
      requestedBy,
      input,
      origin,
      this.lazySource(input, requestedBy, url)
    );
  }

  /**
   * Resolve to every track the input refers to, in order
   */
  async resolveAll(query: string, requestedBy: string): Promise<Track[]> {
    const input = query.trim();
    if (!input) {
      throw new ResolutionError('not_found', 'Empty query', query);
    }

    const urlType = detectUrlType(input);
    log.debug(`Resolving "${input}" as ${urlType}`);

    switch (urlType) {
      case 'yt_video': {
        const url = toCanonicalYouTubeUrl(input) ?? input;
        const info = await this.bounded(input, () => this.options.extractor.lookup(url));
        return [this.makeTrack({ ...info, url }, requestedBy, input, 'youtube')];
      }

      case 'yt_playlist': {
        const list = await this.bounded(input, () => this.options.extractor.playlist(input));
        if (list.entries.length === 0) {
          throw new ResolutionError('not_found', `Playlist "${list.title}" is empty`, input);
        }
        log.info(`Expanded playlist "${list.title}" into ${list.entries.length} tracks`);
        return list.entries.map((info) => this.makeTrack(info, requestedBy, input, 'youtube'));
      }

      case 'sp_track':
      case 'sp_album':
      case 'sp_playlist': {
        const collection = await this.bounded(input, () => this.options.extractor.spotify(input));
        if (collection.entries.length === 0) {
          throw new ResolutionError('not_found', `Spotify "${collection.title}" has no tracks`, input);
        }
        if (urlType !== 'sp_track') {
          log.info(`Expanded Spotify ${urlType} "${collection.title}" into ${collection.entries.length} tracks`);
        }
        return collection.entries.map((entry) => this.makeSpotifyTrack(entry, requestedBy, input));
      }

      case 'url':
        return [this.makeTrack(this.describeUrl(input), requestedBy, input, this.originOf(input))];

      case 'search': {
        const info = await this.search(input);
        log.info(`Search "${input}" matched "${info.title}" (${this.policy.name})`);
        return [this.makeTrack(info, requestedBy, input, 'search')];
      }
    }
  }

  /**
   * Free-text search through the ranking policy
   */
  async search(query: string): Promise<MediaInfo> {
    const results = await this.bounded(query, () =>
      this.options.extractor.search(query, this.policy.candidates)
    );
    const picked = this.policy.pick(query, results);
    if (!picked) {
      throw new ResolutionError('not_found', `No results found for "${query}"`, query);
    }
    return picked;
  }

  private async bounded<T>(query: string, work: () => Promise<T>): Promise<T> {
    const ms = this.options.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new ResolutionError('timeout', `Timed out after ${ms}ms resolving "${query}"`, query)),
        ms
      );
    });

    try {
      return await Promise.race([work(), timeout]);
    } catch (error) {
      if (error instanceof ResolutionError) throw error;
      log.warn(`Extractor failed for "${query}": ${toErrorMessage(error)}`);
      throw new ResolutionError('external_tool_failure', toErrorMessage(error), query);
    } finally {
      clearTimeout(timer);
    }
  }

  private makeTrack(
    info: MediaInfo,
    requestedBy: string,
    query: string,
    origin: TrackOrigin,
    streamSource: StreamSource = this.options.streams.createSource(info.url)
  ): Track {
    return Object.freeze({
      id: this.nextId(),
      title: info.title,
      duration: info.duration,
      requestedBy,
      url: info.url,
      ...(info.thumbnail ? { thumbnail: info.thumbnail } : {}),
      query,
      origin,
      streamSource,
    });
  }

  private makeSpotifyTrack(entry: SpotifyEntry, requestedBy: string, query: string): Track {
    const info: MediaInfo = {
      title: spotifyDisplayTitle(entry.name, entry.artists),
      url: entry.url,
      duration: entry.duration,
      ...(entry.thumbnail ? { thumbnail: entry.thumbnail } : {}),
    };
    return this.makeTrack(info, requestedBy, query, 'spotify', this.deferredSource(entry));
  }

  /**
   * Spotify has no audio; the YouTube match is searched when the track is
   * first opened and reused afterwards.
   */
  private deferredSource(entry: SpotifyEntry): StreamSource {
    let inner: StreamSource | null = null;
    return {
      url: entry.url,
      open: async (signal) => {
        if (!inner) {
          const match = await this.search(spotifySearchQuery(entry.name, entry.artists));
          log.debug(`Spotify "${entry.name}" mapped to ${match.url}`);
          inner = this.options.streams.createSource(match.url);
        }
        return inner.open(signal);
      },
    };
  }

  private lazySource(query: string, requestedBy: string, url: string): StreamSource {
    let resolved: Track | null = null;
    return {
      url,
      open: async (signal) => {
        if (!resolved) {
          resolved = await this.resolve(query, requestedBy);
          log.debug(`Deferred "${query}" resolved to "${resolved.title}"`);
        }
        const opened = await resolved.streamSource.open(signal);
        return {
          ...opened,
          resolved: {
            title: resolved.title,
            duration: resolved.duration,
            url: resolved.url,
            ...(resolved.thumbnail ? { thumbnail: resolved.thumbnail } : {}),
          },
        };
      },
    };
  }

  private describeUrl(input: string): MediaInfo {
    const url = new URL(input);
    const name = url.pathname.split('/').filter((p) => p).pop();
    let title = url.hostname;
    if (name) {
      try {
        title = decodeURIComponent(name);
      } catch {
        title = name;
      }
    }
    return {
      title,
      url: input,
      duration: 0,
    };
  }

  private originOf(input: string): TrackOrigin {
    const hostname = new URL(input).hostname.toLowerCase();
    return isValidHostname(hostname, 'soundcloud.com') ? 'soundcloud' : 'other';
  }
}
