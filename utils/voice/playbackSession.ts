import { EventEmitter } from 'events';
import { Mutex } from 'async-mutex';
import { createLogger } from '../logger';
import {
  CommandError,
  ConcurrencyError,
  MusicError,
  StreamError,
  toErrorMessage,
} from '../errors';
import { VolumeTable } from './volumeTable';
import type { TransmissionDriver } from './transmissionDriver';
import type {
  LoopMode,
  PlaybackEvent,
  PlaybackStatus,
  SessionSnapshot,
  StopReason,
  Track,
  TrackFailure,
} from '../../types/voice';
import type { Clock } from '../../types/common';

const log = createLogger('SESSION');

export interface PlaybackSessionOptions {
  guildId: string;
  driver: TransmissionDriver;
  maxConsecutiveFailures: number;
  volumeMin: number;
  volumeMax: number;
  clock?: Clock;
  /** [0, 1) source for shuffle */
  random?: () => number;
}

type AdvanceReason = 'completed' | 'skipped' | 'failed';

const NEXT_LOOP_MODE: Record<LoopMode, LoopMode> = {
  off: 'track',
  track: 'queue',
  queue: 'off',
};

function describeFailure(error: unknown): TrackFailure {
  if (error instanceof MusicError && 'kind' in error && typeof error.kind === 'string') {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'unknown', message: toErrorMessage(error) };
}

/**
 * Per-guild playback state machine.
 *
 * Every mutating command runs under one FIFO mutex, so commands apply in the
 * order they were issued. Stream opening and transmission run in a background
 * task per track; the task re-enters the mutex to report completion and is
 * ignored once its AbortController is no longer the active one.
 *
 * States: idle -> buffering -> playing <-> paused, back to buffering on
 * advance, idle when the queue runs out, stopped (terminal) on stop().
 */
export class PlaybackSession extends EventEmitter {
  readonly guildId: string;

  private readonly mutex = new Mutex();
  private readonly driver: TransmissionDriver;
  private readonly volumes: VolumeTable;
  private readonly clock: Clock;
  private readonly random: () => number;

  private queue: Track[] = [];
  private current: Track | null = null;
  private status: PlaybackStatus = 'idle';
  private loopMode: LoopMode = 'off';
  private voiceChannelId: string | null = null;
  private active: AbortController | null = null;
  private consecutiveFailures = 0;
  private idleSince: number;

  // Position tracking
  private startedAt: number | null = null;
  private pausedAt: number | null = null;
  private pausedTotal = 0;

  private readonly onConnectionLost = (error: StreamError) => {
    log.warn(`Voice connection lost in guild ${this.guildId}: ${error.message}`);
  };

  constructor(private readonly options: PlaybackSessionOptions) {
    super();
    this.guildId = options.guildId;
    this.driver = options.driver;
    this.volumes = new VolumeTable(options.volumeMin, options.volumeMax);
    this.clock = options.clock ?? Date.now;
    this.random = options.random ?? Math.random;
    this.idleSince = this.clock();
    this.driver.on('connectionLost', this.onConnectionLost);
  }

  /**
   * Listen to session events. Returns the unsubscribe function.
   */
  subscribe(listener: (event: PlaybackEvent) => void): () => void {
    this.on('event', listener);
    return () => {
      this.off('event', listener);
    };
  }

  get isStopped(): boolean {
    return this.status === 'stopped';
  }

  async connect(voiceChannelId: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.ensureOpen();
      if (this.driver.channelId === voiceChannelId && this.driver.isConnected()) {
        this.voiceChannelId = voiceChannelId;
        return;
      }
      if (this.driver.channelId) {
        await this.driver.move(voiceChannelId);
      } else {
        await this.driver.connect(voiceChannelId);
      }
      this.voiceChannelId = voiceChannelId;
    });
  }

  /**
   * Append a track. Starts playback when the session is idle.
   * @returns Number of tracks waiting behind the current one
   */
  async enqueue(track: Track): Promise<number> {
    return this.enqueueMany([track]);
  }

  /**
   * Append tracks in order as one command
   */
  async enqueueMany(tracks: readonly Track[]): Promise<number> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      this.queue.push(...tracks);
      log.debug(`Enqueued ${tracks.length} track(s) in guild ${this.guildId}`);
      if (tracks.length > 0 && this.status === 'idle' && !this.current) {
        this.consecutiveFailures = 0;
        this.startNext();
      }
      return this.queue.length;
    });
  }

  /**
   * End the current track early. Loop modes treat it as finished, except that
   * a skipped track is never played again straight away.
   * @returns The skipped track, or null when an idle session was restarted
   */
  async skip(): Promise<Track | null> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      const skipped = this.current;
      if (!skipped) {
        if (this.status === 'idle' && this.queue.length > 0) {
          this.consecutiveFailures = 0;
          this.startNext();
          return null;
        }
        throw new CommandError('invalid_state', 'Nothing is playing', this.guildId);
      }

      this.active?.abort();
      this.active = null;
      log.info(`Skipped "${skipped.title}" in guild ${this.guildId}`);
      this.publish({ type: 'trackEnded', guildId: this.guildId, track: skipped, skipped: true });
      this.advance(skipped, 'skipped');
      return skipped;
    });
  }

  /**
   * Move the queued entry at `index` to the front and skip to it
   */
  async skipTo(index: number): Promise<Track> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      const [target] = this.spliceAt(index);
      if (!target) {
        throw new CommandError('invalid_argument', `No queued track at position ${index + 1}`, this.guildId);
      }
      this.queue.unshift(target);

      const skipped = this.current;
      if (skipped) {
        this.active?.abort();
        this.active = null;
        this.publish({ type: 'trackEnded', guildId: this.guildId, track: skipped, skipped: true });
        this.advance(skipped, 'skipped');
      } else {
        this.consecutiveFailures = 0;
        this.startNext();
      }
      log.info(`Jumped to "${target.title}" in guild ${this.guildId}`);
      return target;
    });
  }

  async removeAt(index: number): Promise<Track> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      const [removed] = this.spliceAt(index);
      if (!removed) {
        throw new CommandError('invalid_argument', `No queued track at position ${index + 1}`, this.guildId);
      }
      log.debug(`Removed "${removed.title}" from queue in guild ${this.guildId}`);
      return removed;
    });
  }

  /**
   * Shuffle queued tracks (the current track stays)
   */
  async shuffle(): Promise<number> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      const items = this.queue;
      for (let i = items.length - 1; i > 0; i--) {
        const j = Math.floor(this.random() * (i + 1));
        const a = items[i];
        const b = items[j];
        if (a && b) {
          items[i] = b;
          items[j] = a;
        }
      }
      return items.length;
    });
  }

  async clearQueue(): Promise<number> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      const cleared = this.queue.length;
      this.queue = [];
      return cleared;
    });
  }

  /**
   * @returns false when already paused
   */
  async pause(): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      if (this.status === 'paused') return false;
      this.pauseNow();
      return true;
    });
  }

  /**
   * @returns false when already playing
   */
  async resume(): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      if (this.status === 'playing') return false;
      this.resumeNow();
      return true;
    });
  }

  /**
   * Pause when playing, resume when paused, as one command
   */
  async togglePause(): Promise<{ paused: boolean }> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      if (this.status === 'paused') {
        this.resumeNow();
        return { paused: false };
      }
      this.pauseNow();
      return { paused: true };
    });
  }

  /**
   * Terminal. Idempotent once stopped.
   */
  async stop(reason: StopReason = 'command'): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (this.status === 'stopped') return;

      this.active?.abort();
      this.active = null;
      this.queue = [];
      this.current = null;
      this.resetPosition();
      this.setStatus('stopped');
      this.driver.off('connectionLost', this.onConnectionLost);
      try {
        this.driver.disconnect();
      } catch (error) {
        log.warn(`Disconnect failed in guild ${this.guildId}: ${toErrorMessage(error)}`);
      }
      this.voiceChannelId = null;
      log.info(`Session stopped in guild ${this.guildId} (${reason})`);
      this.publish({ type: 'sessionStopped', guildId: this.guildId, reason });
    });
  }

  /**
   * Applies from the next advance decision; the playing track is unaffected
   */
  async setLoopMode(mode: LoopMode): Promise<LoopMode> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      this.loopMode = mode;
      log.debug(`Loop mode ${mode} in guild ${this.guildId}`);
      return mode;
    });
  }

  /**
   * off -> track -> queue -> off, read and written under the same lock
   */
  async cycleLoopMode(): Promise<LoopMode> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      this.loopMode = NEXT_LOOP_MODE[this.loopMode];
      log.debug(`Loop mode ${this.loopMode} in guild ${this.guildId}`);
      return this.loopMode;
    });
  }

  /**
   * Store a user's gain, clamped into the configured range
   * @returns The gain actually stored
   */
  async setVolume(userId: string, gain: number): Promise<number> {
    return this.mutex.runExclusive(() => {
      this.ensureOpen();
      const applied = this.volumes.set(userId, gain);
      this.applyGain();
      return applied;
    });
  }

  snapshot(): SessionSnapshot {
    return Object.freeze({
      guildId: this.guildId,
      status: this.status,
      currentTrack: this.current,
      queue: Object.freeze([...this.queue]),
      loopMode: this.loopMode,
      voiceChannelId: this.voiceChannelId,
      volumes: this.volumes.toRecord(),
      effectiveGain: this.effectiveGain(),
      position: this.position(),
      consecutiveFailures: this.consecutiveFailures,
    });
  }

  /**
   * True when nothing is playing or queued and the session has sat idle for
   * at least `thresholdMs`
   */
  isIdleFor(thresholdMs: number, now: number = this.clock()): boolean {
    return (
      this.status === 'idle' &&
      !this.current &&
      this.queue.length === 0 &&
      now - this.idleSince >= thresholdMs
    );
  }

  private ensureOpen(): void {
    if (this.status === 'stopped') {
      throw new ConcurrencyError(
        'session_already_stopped',
        'Session has been stopped; request a new one',
        this.guildId
      );
    }
  }

  private pauseNow(): void {
    if (this.status !== 'playing') {
      throw new CommandError('invalid_state', `Cannot pause while ${this.status}`, this.guildId);
    }
    this.driver.pause();
    this.pausedAt = this.clock();
    this.setStatus('paused');
  }

  private resumeNow(): void {
    if (this.status !== 'paused') {
      throw new CommandError('invalid_state', `Cannot resume while ${this.status}`, this.guildId);
    }
    this.driver.resume();
    if (this.pausedAt !== null) {
      this.pausedTotal += this.clock() - this.pausedAt;
      this.pausedAt = null;
    }
    this.setStatus('playing');
  }

  private spliceAt(index: number): Track[] {
    if (!Number.isInteger(index) || index < 0 || index >= this.queue.length) return [];
    return this.queue.splice(index, 1);
  }

  private publish(event: PlaybackEvent): void {
    try {
      this.emit('event', event);
    } catch (error) {
      log.error(`Event listener failed for ${event.type} in guild ${this.guildId}: ${toErrorMessage(error)}`);
    }
  }

  private setStatus(status: PlaybackStatus): void {
    if (this.status === status) return;
    this.status = status;
    if (status === 'idle') this.idleSince = this.clock();
    this.publish({ type: 'stateChanged', guildId: this.guildId, status });
  }

  private effectiveGain(): number {
    return this.current ? this.volumes.get(this.current.requestedBy) : this.volumes.clamp(1);
  }

  private applyGain(): void {
    this.driver.setGain(this.effectiveGain());
  }

  private position(): number {
    if (this.startedAt === null) return 0;
    const end = this.pausedAt ?? this.clock();
    return Math.max(0, Math.floor((end - this.startedAt - this.pausedTotal) / 1000));
  }

  private resetPosition(): void {
    this.startedAt = null;
    this.pausedAt = null;
    this.pausedTotal = 0;
  }

  private goIdle(): void {
    this.active = null;
    this.current = null;
    this.resetPosition();
    this.setStatus('idle');
  }

  private startNext(): void {
    const next = this.queue.shift();
    if (!next) {
      this.goIdle();
      log.info(`Queue finished in guild ${this.guildId}`);
      this.publish({ type: 'queueEmpty', guildId: this.guildId });
      return;
    }
    this.begin(next);
  }

  private begin(track: Track): void {
    this.active?.abort();
    const controller = new AbortController();
    this.active = controller;
    this.current = track;
    this.resetPosition();
    this.setStatus('buffering');
    this.applyGain();
    void this.transmit(track, controller);
  }

  private advance(finished: Track, reason: AdvanceReason): void {
    this.active = null;

    if (reason === 'completed' && this.loopMode === 'track') {
      this.begin(finished);
      return;
    }

    const requeue =
      reason !== 'failed' &&
      this.loopMode !== 'off' &&
      !(reason === 'skipped' && this.queue.length === 0);
    if (requeue) this.queue.push(finished);

    this.current = null;
    this.startNext();
  }

  private handleTrackEnd(track: Track): void {
    this.consecutiveFailures = 0;
    log.debug(`Finished "${track.title}" in guild ${this.guildId}`);
    this.publish({ type: 'trackEnded', guildId: this.guildId, track, skipped: false });
    this.advance(track, 'completed');
  }

  private handleTrackFailure(track: Track, error: unknown): void {
    this.consecutiveFailures++;
    const failure = describeFailure(error);
    log.warn(`Track "${track.title}" failed in guild ${this.guildId}: ${failure.kind}: ${failure.message}`);
    this.publish({ type: 'trackFailed', guildId: this.guildId, track, error: failure });

    const max = this.options.maxConsecutiveFailures;
    if (this.consecutiveFailures >= max && this.queue.length > 0) {
      log.warn(`${this.consecutiveFailures} consecutive failures in guild ${this.guildId}, halting`);
      this.goIdle();
      return;
    }
    this.advance(track, 'failed');
  }

  private async ensureConnected(): Promise<void> {
    if (this.driver.isConnected() || !this.voiceChannelId) return;
    log.info(`Rejoining voice channel ${this.voiceChannelId} in guild ${this.guildId}`);
    await this.driver.connect(this.voiceChannelId);
  }

  /**
   * Background task for one track. Never rejects.
   */
  private async transmit(track: Track, controller: AbortController): Promise<void> {
    const { signal } = controller;
    // A lazily resolved track is replaced by its looked-up details once open
    let live = track;
    try {
      await this.ensureConnected();
      const opened = await track.streamSource.open(signal);

      const started = await this.mutex.runExclusive(() => {
        if (this.active !== controller) {
          opened.close();
          return false;
        }
        if (opened.resolved) {
          live = Object.freeze({ ...track, ...opened.resolved });
          this.current = live;
        }
        this.startedAt = this.clock();
        this.setStatus('playing');
        log.info(`Now playing "${live.title}" in guild ${this.guildId}`);
        this.publish({ type: 'trackStarted', guildId: this.guildId, track: live });
        return true;
      });
      if (!started) return;

      await this.driver.send(opened, signal);
      await this.mutex.runExclusive(() => {
        if (this.active === controller) this.handleTrackEnd(live);
      });
    } catch (error) {
      await this.mutex
        .runExclusive(() => {
          if (this.active === controller) this.handleTrackFailure(live, error);
        })
        .catch((inner: unknown) => {
          log.error(`Failure handling broke in guild ${this.guildId}: ${toErrorMessage(inner)}`);
        });
    }
  }
}
