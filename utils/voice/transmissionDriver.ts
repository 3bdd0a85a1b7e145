import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import {
  AudioPlayerStatus,
  NoSubscriberBehavior,
  StreamType,
  VoiceConnectionStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel,
} from '@discordjs/voice';
import type {
  AudioPlayer,
  AudioPlayerError,
  AudioResource,
  DiscordGatewayAdapterCreator,
  VoiceConnection,
} from '@discordjs/voice';
import { createLogger } from '../logger';
import { StreamError } from '../errors';
import { RECONNECT_BACKOFF_MS, RECONNECT_WINDOW_MS } from './constants';
import type { AudioStreamKind, OpenedStream } from '../../types/voice';

const log = createLogger('TRANSMISSION');

/**
 * Adapter to the real-time audio transport. One instance per session; the
 * connection behind it is never shared.
 */
export interface TransmissionDriver {
  readonly channelId: string | null;
  connect: (voiceChannelId: string) => Promise<void>;
  move: (voiceChannelId: string) => Promise<void>;
  disconnect: () => void;
  /**
   * Transmit until the stream is exhausted. Rejects with StreamError on
   * cancellation, decode failure or fatal connection loss.
   */
  send: (stream: OpenedStream, signal: AbortSignal) => Promise<void>;
  setGain: (gain: number) => void;
  pause: () => boolean;
  resume: () => boolean;
  isConnected: () => boolean;
  on(event: 'connectionLost', listener: (error: StreamError) => void): this;
  off(event: 'connectionLost', listener: (error: StreamError) => void): this;
}

export type TransmissionDriverFactory = (guildId: string) => TransmissionDriver;

export interface DiscordDriverOptions {
  guildId: string;
  getAdapterCreator: () => DiscordGatewayAdapterCreator;
  connectTimeoutMs: number;
  reconnectAttempts: number;
}

export function toStreamType(kind: AudioStreamKind): StreamType {
  switch (kind) {
    case 'raw':
      return StreamType.Raw;
    case 'opus':
      return StreamType.Opus;
    case 'ogg/opus':
      return StreamType.OggOpus;
    case 'webm/opus':
      return StreamType.WebmOpus;
    case 'arbitrary':
      return StreamType.Arbitrary;
  }
}

interface PendingSend {
  cancel: (error: StreamError) => void;
}

/**
 * TransmissionDriver over one @discordjs/voice connection and audio player
 */
export class DiscordTransmissionDriver extends EventEmitter implements TransmissionDriver {
  private connection: VoiceConnection | null = null;
  private readonly player: AudioPlayer;
  private resource: AudioResource | null = null;
  private pending: PendingSend | null = null;
  private gain = 1;
  private currentChannelId: string | null = null;
  private reconnecting = false;

  constructor(private readonly options: DiscordDriverOptions) {
    super();
    this.player = createAudioPlayer({
      behaviors: { noSubscriber: NoSubscriberBehavior.Pause },
    });
    this.player.on('error', (error) => {
      log.debug(`Player error in guild ${options.guildId}: ${error.message}`);
    });
  }

  get channelId(): string | null {
    return this.currentChannelId;
  }

  isConnected(): boolean {
    return this.connection?.state.status === VoiceConnectionStatus.Ready;
  }

  async connect(voiceChannelId: string): Promise<void> {
    if (this.connection) {
      await this.move(voiceChannelId);
      return;
    }

    const { guildId } = this.options;
    const connection = joinVoiceChannel({
      channelId: voiceChannelId,
      guildId,
      adapterCreator: this.options.getAdapterCreator(),
      selfDeaf: true,
    });
    this.connection = connection;
    this.currentChannelId = voiceChannelId;
    connection.subscribe(this.player);

    connection.on(VoiceConnectionStatus.Disconnected, () => {
      void this.handleDisconnect(connection);
    });

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, this.options.connectTimeoutMs);
    } catch {
      this.teardown();
      throw new StreamError(
        'connection_lost',
        `Could not join voice channel ${voiceChannelId} within ${this.options.connectTimeoutMs}ms`,
        guildId
      );
    }
    log.info(`Joined voice channel ${voiceChannelId} in guild ${guildId}`);
  }

  async move(voiceChannelId: string): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      await this.connect(voiceChannelId);
      return;
    }
    if (this.currentChannelId === voiceChannelId && this.isConnected()) return;

    connection.rejoin({ channelId: voiceChannelId, selfDeaf: true, selfMute: false });
    this.currentChannelId = voiceChannelId;

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, this.options.connectTimeoutMs);
    } catch {
      throw new StreamError(
        'connection_lost',
        `Could not move to voice channel ${voiceChannelId}`,
        this.options.guildId
      );
    }
    log.info(`Moved to voice channel ${voiceChannelId} in guild ${this.options.guildId}`);
  }

  disconnect(): void {
    this.pending?.cancel(new StreamError('cancelled', 'Disconnected', this.options.guildId));
    this.player.stop(true);
    if (this.connection) {
      log.info(`Left voice channel in guild ${this.options.guildId}`);
    }
    this.teardown();
  }

  send(opened: OpenedStream, signal: AbortSignal): Promise<void> {
    const { guildId } = this.options;

    if (signal.aborted) {
      opened.close();
      return Promise.reject(new StreamError('cancelled', 'Transmission cancelled', guildId));
    }
    if (!this.isConnected()) {
      opened.close();
      return Promise.reject(
        new StreamError('connection_lost', 'Not connected to a voice channel', guildId)
      );
    }

    this.pending?.cancel(new StreamError('cancelled', 'Superseded by a new transmission', guildId));

    return new Promise<void>((resolve, reject) => {
      const resource = createAudioResource(opened.stream, {
        inputType: toStreamType(opened.kind),
        inlineVolume: true,
      });
      resource.volume?.setVolume(this.gain);

      let settled = false;
      const settle = (error?: StreamError) => {
        if (settled) return;
        settled = true;
        this.player.off(AudioPlayerStatus.Idle, onIdle);
        this.player.off('error', onError);
        signal.removeEventListener('abort', onAbort);
        if (this.pending === entry) this.pending = null;
        if (this.resource === resource) this.resource = null;
        opened.close();
        if (error) reject(error);
        else resolve();
      };

      const onIdle = () => settle();
      const onError = (error: AudioPlayerError) => {
        if (error.resource !== resource) return;
        settle(new StreamError('decode_failure', error.message, guildId));
      };
      const onAbort = () => {
        settle(new StreamError('cancelled', 'Transmission cancelled', guildId));
        this.player.stop(true);
      };
      const entry: PendingSend = { cancel: (error) => settle(error) };

      this.player.on(AudioPlayerStatus.Idle, onIdle);
      this.player.on('error', onError);
      signal.addEventListener('abort', onAbort, { once: true });
      this.pending = entry;
      this.resource = resource;
      this.player.play(resource);
    });
  }

  setGain(gain: number): void {
    this.gain = gain;
    this.resource?.volume?.setVolume(gain);
  }

  pause(): boolean {
    return this.player.pause();
  }

  resume(): boolean {
    return this.player.unpause();
  }

  private async handleDisconnect(connection: VoiceConnection): Promise<void> {
    if (connection !== this.connection || this.reconnecting) return;
    this.reconnecting = true;
    const { guildId, reconnectAttempts } = this.options;

    try {
      for (let attempt = 1; attempt <= reconnectAttempts; attempt++) {
        try {
          await Promise.race([
            entersState(connection, VoiceConnectionStatus.Signalling, RECONNECT_WINDOW_MS),
            entersState(connection, VoiceConnectionStatus.Connecting, RECONNECT_WINDOW_MS),
          ]);
          await entersState(connection, VoiceConnectionStatus.Ready, this.options.connectTimeoutMs);
          log.info(`Voice connection recovered in guild ${guildId}`);
          return;
        } catch {
          if (connection !== this.connection) return;
          log.warn(`Reconnect attempt ${attempt}/${reconnectAttempts} failed in guild ${guildId}`);
          if (connection.state.status === VoiceConnectionStatus.Destroyed) break;
          await delay(RECONNECT_BACKOFF_MS * attempt);
          if (connection !== this.connection) return;
          if (this.currentChannelId) {
            connection.rejoin({ channelId: this.currentChannelId, selfDeaf: true, selfMute: false });
          }
        }
      }

      if (connection !== this.connection) return;
      const error = new StreamError('connection_lost', 'Voice connection lost', guildId);
      log.error(`Voice connection lost in guild ${guildId} after ${reconnectAttempts} attempts`);
      this.pending?.cancel(error);
      this.player.stop(true);
      this.teardown();
      this.emit('connectionLost', error);
    } finally {
      this.reconnecting = false;
    }
  }

  private teardown(): void {
    const connection = this.connection;
    this.connection = null;
    this.currentChannelId = null;
    if (connection && connection.state.status !== VoiceConnectionStatus.Destroyed) {
      connection.destroy();
    }
  }
}
