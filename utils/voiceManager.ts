import { EventEmitter } from 'events';
import { createLogger } from './logger';
import { CommandError, ConcurrencyError } from './errors';
import type { SessionRegistry } from './voice/sessionRegistry';
import type { PlaybackSession } from './voice/playbackSession';
import type { TrackResolver } from './voice/trackResolver';
import type { LoopMode, PlayResult, SessionSnapshot, Track } from '../types/voice';

const log = createLogger('VOICE');

const LOOP_MODES: readonly LoopMode[] = ['off', 'track', 'queue'];

export function parseLoopMode(value: string): LoopMode | null {
  return LOOP_MODES.find((mode) => mode === value) ?? null;
}

export type PlayResolver = Pick<TrackResolver, 'resolveAll' | 'defer' | 'isCollection'>;

export interface VoiceManagerOptions {
  registry: SessionRegistry;
  resolver: PlayResolver;
}

export interface PlayRequest {
  guildId: string;
  voiceChannelId: string;
  query: string;
  userId: string;
}

/**
 * Single entry point for chat commands and panel buttons. Every action goes
 * through the guild's session; rejected commands surface as MusicError.
 *
 * Emits 'playback' with every session event.
 */
export class VoiceManager extends EventEmitter {
  private readonly registry: SessionRegistry;
  private readonly resolver: PlayResolver;
  /** Per guild, settles once the latest play request has been queued or failed */
  private readonly pending = new Map<string, Promise<void>>();

  constructor(options: VoiceManagerOptions) {
    super();
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.registry.on('playback', (event) => this.emit('playback', event));
  }

  /**
   * Join the caller's channel and queue what the query refers to.
   *
   * A single item is queued at once as a deferred track and looked up when it
   * plays. Playlists and albums are expanded first; requests for the same
   * guild still reach the queue in the order they were made.
   */
  async play(request: PlayRequest): Promise<PlayResult> {
    const { guildId, voiceChannelId, query, userId } = request;
    const lookup: Promise<Track[]> = this.resolver.isCollection(query)
      ? this.resolver.resolveAll(query, userId)
      : Promise.resolve().then(() => [this.resolver.defer(query, userId)]);

    const previous = this.pending.get(guildId);
    const turn = (async () => {
      const [tracks] = await Promise.all([lookup, previous]);
      log.info(`Queueing ${tracks.length} track(s) for "${query}" in guild ${guildId}`);

      try {
        return await this.enqueueInto(guildId, voiceChannelId, tracks);
      } catch (error) {
        // The session stopped between lookup and enqueue; a fresh one takes over
        if (error instanceof ConcurrencyError) {
          log.debug(`Session in guild ${guildId} stopped mid-request, retrying`);
          return this.enqueueInto(guildId, voiceChannelId, tracks);
        }
        throw error;
      }
    })();

    const done: Promise<void> = turn.then(
      () => this.release(guildId, done),
      () => this.release(guildId, done)
    );
    this.pending.set(guildId, done);
    return turn;
  }

  async skip(guildId: string): Promise<Track | null> {
    return this.requireSession(guildId).skip();
  }

  async pause(guildId: string): Promise<boolean> {
    return this.requireSession(guildId).pause();
  }

  async resume(guildId: string): Promise<boolean> {
    return this.requireSession(guildId).resume();
  }

  async togglePause(guildId: string): Promise<{ paused: boolean }> {
    return this.requireSession(guildId).togglePause();
  }

  /**
   * Clear everything and leave voice
   * @returns false when nothing was running
   */
  async stop(guildId: string): Promise<boolean> {
    const session = this.registry.get(guildId);
    if (!session) return false;
    await session.stop('command');
    return true;
  }

  async leave(guildId: string): Promise<boolean> {
    return this.registry.remove(guildId, 'command');
  }

  async setLoopMode(guildId: string, mode: LoopMode): Promise<LoopMode> {
    return this.requireSession(guildId).setLoopMode(mode);
  }

  async cycleLoopMode(guildId: string): Promise<LoopMode> {
    return this.requireSession(guildId).cycleLoopMode();
  }

  /**
   * @param percent 100 = unity gain
   * @returns The stored volume in percent after clamping
   */
  async setVolume(guildId: string, userId: string, percent: number): Promise<number> {
    if (!Number.isFinite(percent)) {
      throw new CommandError('invalid_argument', 'Volume must be a number', guildId);
    }
    const gain = await this.requireSession(guildId).setVolume(userId, percent / 100);
    return Math.round(gain * 100);
  }

  async shuffle(guildId: string): Promise<number> {
    return this.requireSession(guildId).shuffle();
  }

  /**
   * @param position 1-based queue position
   */
  async jump(guildId: string, position: number): Promise<Track> {
    return this.requireSession(guildId).skipTo(position - 1);
  }

  /**
   * @param position 1-based queue position
   */
  async remove(guildId: string, position: number): Promise<Track> {
    return this.requireSession(guildId).removeAt(position - 1);
  }

  async clear(guildId: string): Promise<number> {
    return this.requireSession(guildId).clearQueue();
  }

  getSnapshot(guildId: string): SessionSnapshot | null {
    return this.registry.get(guildId)?.snapshot() ?? null;
  }

  /**
   * The bot was removed from voice by someone else
   */
  async handleBotLeftVoice(guildId: string): Promise<void> {
    if (await this.registry.remove(guildId, 'disconnected')) {
      log.info(`Bot left voice in guild ${guildId}, session closed`);
    }
  }

  private release(guildId: string, done: Promise<void>): void {
    if (this.pending.get(guildId) === done) this.pending.delete(guildId);
  }

  private requireSession(guildId: string): PlaybackSession {
    const session = this.registry.get(guildId);
    if (!session) {
      throw new CommandError('invalid_state', 'Nothing is playing', guildId);
    }
    return session;
  }

  private async enqueueInto(
    guildId: string,
    voiceChannelId: string,
    tracks: Track[]
  ): Promise<PlayResult> {
    const session = this.registry.getOrCreate(guildId);
    const fresh = session.snapshot();
    try {
      await session.connect(voiceChannelId);
    } catch (error) {
      if (!fresh.currentTrack && fresh.queue.length === 0 && !(error instanceof ConcurrencyError)) {
        await this.registry.remove(guildId, 'disconnected');
      }
      throw error;
    }
    const totalInQueue = await session.enqueueMany(tracks);
    return {
      added: tracks.length,
      tracks,
      totalInQueue,
      snapshot: session.snapshot(),
    };
  }
}
