import { createLogger } from './logger';
import { toErrorMessage } from './errors';
import { createPlayerMessage, type PlayerMessage } from './playerEmbed';
import type { PlaybackEvent, SessionSnapshot } from '../types/voice';

const log = createLogger('PANEL');

/**
 * The posted message a panel keeps editing
 */
export interface PanelMessage {
  edit(payload: PlayerMessage): Promise<unknown>;
}

export interface PanelSource {
  getSnapshot(guildId: string): SessionSnapshot | null;
  on(event: 'playback', listener: (event: PlaybackEvent) => void): unknown;
  off(event: 'playback', listener: (event: PlaybackEvent) => void): unknown;
}

export interface NowPlayingPanelOptions {
  source: PanelSource;
  /** Bursts of events inside this window produce one edit */
  debounceMs?: number;
  /** Redraw playing panels this often so the progress bar moves; 0 disables */
  refreshIntervalMs?: number;
}

/**
 * One live player message per guild, refreshed from session events
 */
export class NowPlayingPanel {
  private readonly source: PanelSource;
  private readonly debounceMs: number;
  private readonly messages = new Map<string, PanelMessage>();
  private readonly notices = new Map<string, string>();
  private readonly lastSnapshots = new Map<string, SessionSnapshot>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly ticker: NodeJS.Timeout | null;
  private readonly listener = (event: PlaybackEvent): void => this.onEvent(event);

  constructor(options: NowPlayingPanelOptions) {
    this.source = options.source;
    this.debounceMs = options.debounceMs ?? 750;
    this.source.on('playback', this.listener);

    const interval = options.refreshIntervalMs ?? 5000;
    this.ticker = interval > 0 ? setInterval(() => this.tick(), interval) : null;
    this.ticker?.unref();
  }

  /**
   * Make `message` the guild's panel; a previous panel is left as it was
   */
  attach(guildId: string, message: PanelMessage): void {
    this.messages.set(guildId, message);
    const snapshot = this.source.getSnapshot(guildId);
    if (snapshot) this.lastSnapshots.set(guildId, snapshot);
  }

  has(guildId: string): boolean {
    return this.messages.has(guildId);
  }

  async refresh(guildId: string): Promise<void> {
    this.clearTimer(guildId);
    const message = this.messages.get(guildId);
    const snapshot = this.source.getSnapshot(guildId);
    if (!message || !snapshot) return;

    this.lastSnapshots.set(guildId, snapshot);
    await this.edit(guildId, message, createPlayerMessage(snapshot, this.notices.get(guildId)));
  }

  dispose(): void {
    this.source.off('playback', this.listener);
    if (this.ticker) clearInterval(this.ticker);
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    this.messages.clear();
    this.notices.clear();
    this.lastSnapshots.clear();
  }

  private onEvent(event: PlaybackEvent): void {
    const { guildId } = event;
    switch (event.type) {
      case 'trackFailed':
        this.notices.set(guildId, `Couldn't play **${event.track.title}**: ${event.error.message}`);
        break;
      case 'trackStarted':
        this.notices.delete(guildId);
        break;
      case 'sessionStopped':
        void this.finalize(guildId);
        return;
      default:
        break;
    }
    if (this.messages.has(guildId)) this.schedule(guildId);
  }

  private tick(): void {
    for (const guildId of this.messages.keys()) {
      if (this.timers.has(guildId)) continue;
      if (this.source.getSnapshot(guildId)?.status === 'playing') void this.refresh(guildId);
    }
  }

  private schedule(guildId: string): void {
    if (this.timers.has(guildId)) return;
    this.timers.set(
      guildId,
      setTimeout(() => void this.refresh(guildId), this.debounceMs)
    );
  }

  private async finalize(guildId: string): Promise<void> {
    this.clearTimer(guildId);
    const message = this.messages.get(guildId);
    const last = this.lastSnapshots.get(guildId);
    this.messages.delete(guildId);
    this.notices.delete(guildId);
    this.lastSnapshots.delete(guildId);
    if (!message || !last) return;

    const stopped: SessionSnapshot = { ...last, status: 'stopped', currentTrack: null, queue: [], position: 0 };
    await this.edit(guildId, message, createPlayerMessage(stopped));
  }

  private async edit(guildId: string, message: PanelMessage, payload: PlayerMessage): Promise<void> {
    try {
      await message.edit(payload);
    } catch (error) {
      // Deleted or inaccessible; stop tracking it
      log.warn(`Failed to update player panel in guild ${guildId}: ${toErrorMessage(error)}`);
      if (this.messages.get(guildId) === message) this.messages.delete(guildId);
    }
  }

  private clearTimer(guildId: string): void {
    const timer = this.timers.get(guildId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(guildId);
    }
  }
}
