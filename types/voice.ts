/**
 * Voice playback type definitions
 */

import type { Readable } from 'stream';

/**
 * Container/codec of an opened audio stream, as understood by the voice transport
 */
export type AudioStreamKind = 'arbitrary' | 'raw' | 'opus' | 'ogg/opus' | 'webm/opus';

/**
 * An audio stream opened for one transmission
 */
export interface OpenedStream {
  stream: Readable;
  kind: AudioStreamKind;
  /** Release the stream and any helper process behind it */
  close: () => void;
  /** Set when opening looked the track up, replacing its placeholder details */
  resolved?: TrackDetails;
}

/**
 * Opaque handle to a track's audio. Each open() yields a fresh stream; the
 * handle decides whether it can reuse what it extracted earlier.
 */
export interface StreamSource {
  readonly url: string;
  open: (signal: AbortSignal) => Promise<OpenedStream>;
}

export type TrackOrigin = 'youtube' | 'spotify' | 'soundcloud' | 'search' | 'other';

/**
 * Track object representing one playable media item.
 * Tracks are frozen by the resolver and never mutated afterwards.
 */
export interface Track {
  readonly id: string;
  readonly title: string;
  /** Seconds, 0 when unknown */
  readonly duration: number;
  readonly requestedBy: string;
  readonly url: string;
  readonly thumbnail?: string;
  /** What the user typed, kept so the track can be resolved again */
  readonly query: string;
  readonly origin: TrackOrigin;
  readonly streamSource: StreamSource;
}

export type TrackDetails = Pick<Track, 'title' | 'duration' | 'url' | 'thumbnail'>;

export type LoopMode = 'off' | 'track' | 'queue';

export type PlaybackStatus = 'idle' | 'buffering' | 'playing' | 'paused' | 'stopped';

/**
 * Immutable read of a session for UI refresh
 */
export interface SessionSnapshot {
  readonly guildId: string;
  readonly status: PlaybackStatus;
  readonly currentTrack: Track | null;
  readonly queue: readonly Track[];
  readonly loopMode: LoopMode;
  readonly voiceChannelId: string | null;
  readonly volumes: Readonly<Record<string, number>>;
  /** Gain currently applied to the transmitted audio */
  readonly effectiveGain: number;
  /** Seconds into the current track, pause-aware */
  readonly position: number;
  readonly consecutiveFailures: number;
}

export interface TrackFailure {
  kind: string;
  message: string;
}

export type StopReason = 'command' | 'idle' | 'disconnected' | 'shutdown';

/**
 * Outbound session events. Delivered at-least-once; consumers tolerate duplicates.
 */
export type PlaybackEvent =
  | { type: 'trackStarted'; guildId: string; track: Track }
  | { type: 'trackEnded'; guildId: string; track: Track; skipped: boolean }
  | { type: 'trackFailed'; guildId: string; track: Track; error: TrackFailure }
  | { type: 'queueEmpty'; guildId: string }
  | { type: 'stateChanged'; guildId: string; status: PlaybackStatus }
  | { type: 'sessionStopped'; guildId: string; reason: StopReason };

export type PlaybackEventType = PlaybackEvent['type'];

export interface PlayResult {
  added: number;
  tracks: Track[];
  totalInQueue: number;
  snapshot: SessionSnapshot;
}
