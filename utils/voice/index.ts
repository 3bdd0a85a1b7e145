// util-category: audio
/**
 * Voice module exports
 * This serves as the main entry point for the playback engine
 */

// Sessions
export { PlaybackSession } from './playbackSession';
export type { PlaybackSessionOptions } from './playbackSession';
export { SessionRegistry } from './sessionRegistry';
export type { SessionRegistryOptions } from './sessionRegistry';
export { VolumeTable } from './volumeTable';

// Transport
export { DiscordTransmissionDriver, toStreamType } from './transmissionDriver';
export type {
  TransmissionDriver,
  TransmissionDriverFactory,
  DiscordDriverOptions,
} from './transmissionDriver';

// Resolution
export { TrackResolver } from './trackResolver';
export type { TrackResolverOptions, StreamSourceFactory } from './trackResolver';
export { PlayDlExtractor } from './playDlExtractor';
export type { MediaExtractor, SpotifyEntry, SpotifyCredentials } from './playDlExtractor';
export { StreamResolver, runTool, spawnTool } from './playback/StreamResolver';
export type {
  StreamResolverOptions,
  ToolProcess,
  ToolRunner,
  ToolSpawner,
} from './playback/StreamResolver';
export { firstResult, preferDurationWithin } from './searchPolicy';
export type { MediaInfo, SearchRankingPolicy } from './searchPolicy';

// Track metadata
export {
  detectUrlType,
  extractYouTubeVideoId,
  toCanonicalYouTubeUrl,
  spotifySearchQuery,
  spotifyDisplayTitle,
} from './trackMetadata';
export type { UrlType } from './trackMetadata';
