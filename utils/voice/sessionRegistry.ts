import { EventEmitter } from 'events';
import { createLogger } from '../logger';
import { toErrorMessage } from '../errors';
import { PlaybackSession } from './playbackSession';
import type { TransmissionDriverFactory } from './transmissionDriver';
import type { PlaybackConfig } from '../config';
import type { StopReason } from '../../types/voice';
import type { Clock } from '../../types/common';

const log = createLogger('SESSIONS');

export interface SessionRegistryOptions {
  createDriver: TransmissionDriverFactory;
  playback: Pick<
    PlaybackConfig,
    'idleTimeoutMs' | 'idleSweepIntervalMs' | 'maxConsecutiveFailures' | 'volumeMin' | 'volumeMax'
  >;
  clock?: Clock;
  random?: () => number;
}

/**
 * Process-wide guild -> session map. Lookups and inserts are synchronous, so
 * two callers for one guild always see the same session.
 *
 * Emits 'sessionCreated' and 'sessionRemoved' with the guild id, and
 * 'playback' with every session event.
 */
export class SessionRegistry extends EventEmitter {
  private readonly sessions = new Map<string, PlaybackSession>();
  private readonly clock: Clock;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: SessionRegistryOptions) {
    super();
    this.clock = options.clock ?? Date.now;
  }

  getOrCreate(guildId: string): PlaybackSession {
    const existing = this.sessions.get(guildId);
    if (existing) return existing;

    const { playback } = this.options;
    const session = new PlaybackSession({
      guildId,
      driver: this.options.createDriver(guildId),
      maxConsecutiveFailures: playback.maxConsecutiveFailures,
      volumeMin: playback.volumeMin,
      volumeMax: playback.volumeMax,
      clock: this.clock,
      ...(this.options.random ? { random: this.options.random } : {}),
    });

    const unsubscribe = session.subscribe((event) => {
      this.emit('playback', event);
      if (event.type !== 'sessionStopped') return;
      // A session that stopped itself leaves the map
      if (this.sessions.get(guildId) === session) this.detach(guildId);
      unsubscribe();
    });
    this.sessions.set(guildId, session);
    log.info(`Created session for guild ${guildId}`);
    this.emit('sessionCreated', guildId);
    return session;
  }

  get(guildId: string): PlaybackSession | undefined {
    return this.sessions.get(guildId);
  }

  list(): PlaybackSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Detach and stop a guild's session. The map entry is gone before the stop
   * is awaited, so a concurrent getOrCreate builds a fresh session.
   * @returns false when the guild had no session
   */
  async remove(guildId: string, reason: StopReason = 'command'): Promise<boolean> {
    const session = this.detach(guildId);
    if (!session) return false;
    await session.stop(reason);
    return true;
  }

  /**
   * Remove sessions idle for longer than the idle threshold
   * @returns Guild ids that were swept
   */
  async sweep(now: number = this.clock()): Promise<string[]> {
    const { idleTimeoutMs } = this.options.playback;
    const idle = [...this.sessions.entries()]
      .filter(([, session]) => session.isIdleFor(idleTimeoutMs, now))
      .map(([guildId]) => guildId);

    const results = await Promise.allSettled(idle.map((guildId) => this.remove(guildId, 'idle')));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        log.error(`Idle sweep failed for guild ${idle[i]}: ${toErrorMessage(result.reason)}`);
      }
    });

    if (idle.length > 0) {
      log.info(`Idle sweep removed ${idle.length} session(s)`);
    }
    return idle;
  }

  /**
   * Start the background idle sweep
   */
  start(): void {
    if (this.sweepTimer) return;
    const interval = this.options.playback.idleSweepIntervalMs;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        log.error(`Idle sweep failed: ${toErrorMessage(error)}`);
      });
    }, interval);
    this.sweepTimer.unref();
    log.debug(`Idle sweep every ${interval}ms`);
  }

  /**
   * Stop the sweep and every session
   */
  async shutdown(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    const guildIds = [...this.sessions.keys()];
    await Promise.allSettled(guildIds.map((guildId) => this.remove(guildId, 'shutdown')));
    log.info(`Shut down ${guildIds.length} session(s)`);
  }

  private detach(guildId: string): PlaybackSession | undefined {
    const session = this.sessions.get(guildId);
    if (!session) return undefined;
    this.sessions.delete(guildId);
    this.emit('sessionRemoved', guildId);
    log.info(`Removed session for guild ${guildId}`);
    return session;
  }
}
