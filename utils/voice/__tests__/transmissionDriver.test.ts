import { Readable } from 'stream';
import {
  AudioPlayerStatus,
  StreamType,
  VoiceConnectionStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel,
} from '@discordjs/voice';
import type { DiscordGatewayAdapterCreator } from '@discordjs/voice';
import { DiscordTransmissionDriver, toStreamType } from '../transmissionDriver';
import { StreamError } from '../../errors';
import { settle } from './helpers/fakes';
import type { OpenedStream } from '../../../types/voice';

jest.mock('@discordjs/voice', () => {
  const { EventEmitter } = jest.requireActual<typeof import('events')>('events');

  class MockPlayer extends EventEmitter {
    play = jest.fn();
    stop = jest.fn(() => true);
    pause = jest.fn(() => true);
    unpause = jest.fn(() => true);
  }

  class MockConnection extends EventEmitter {
    state = { status: 'ready' };
    subscribe = jest.fn();
    rejoin = jest.fn(() => true);
    destroy = jest.fn(() => {
      this.state = { status: 'destroyed' };
    });
  }

  return {
    AudioPlayerStatus: { Idle: 'idle', Buffering: 'buffering', Playing: 'playing' },
    VoiceConnectionStatus: {
      Signalling: 'signalling',
      Connecting: 'connecting',
      Ready: 'ready',
      Disconnected: 'disconnected',
      Destroyed: 'destroyed',
    },
    NoSubscriberBehavior: { Pause: 'pause' },
    StreamType: {
      Arbitrary: 'arbitrary',
      Raw: 'raw',
      Opus: 'opus',
      OggOpus: 'ogg/opus',
      WebmOpus: 'webm/opus',
    },
    createAudioPlayer: jest.fn(() => new MockPlayer()),
    createAudioResource: jest.fn(() => ({ volume: { setVolume: jest.fn() } })),
    joinVoiceChannel: jest.fn(() => new MockConnection()),
    entersState: jest.fn(async () => undefined),
  };
});

const adapterCreator: DiscordGatewayAdapterCreator = () => ({
  sendPayload: () => true,
  destroy: () => undefined,
});

function createDriver(reconnectAttempts = 0) {
  const driver = new DiscordTransmissionDriver({
    guildId: 'guild-1',
    getAdapterCreator: () => adapterCreator,
    connectTimeoutMs: 1_000,
    reconnectAttempts,
  });
  const player = jest.mocked(createAudioPlayer).mock.results.at(-1)?.value;
  if (!player) throw new Error('player not created');
  return { driver, player };
}

async function connected(reconnectAttempts = 0) {
  const ctx = createDriver(reconnectAttempts);
  await ctx.driver.connect('voice-1');
  const connection = jest.mocked(joinVoiceChannel).mock.results.at(-1)?.value;
  if (!connection) throw new Error('connection not created');
  return { ...ctx, connection };
}

function opened(): OpenedStream & { close: jest.Mock } {
  return { stream: Readable.from([]), kind: 'arbitrary', close: jest.fn() };
}

function lastResource() {
  const resource = jest.mocked(createAudioResource).mock.results.at(-1)?.value;
  if (!resource) throw new Error('resource not created');
  return resource;
}

describe('DiscordTransmissionDriver', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('connect', () => {
    it('joins the channel and waits for ready', async () => {
      const { driver, connection, player } = await connected();

      expect(joinVoiceChannel).toHaveBeenCalledWith({
        channelId: 'voice-1',
        guildId: 'guild-1',
        adapterCreator,
        selfDeaf: true,
      });
      expect(entersState).toHaveBeenCalledWith(connection, VoiceConnectionStatus.Ready, 1_000);
      expect(connection.subscribe).toHaveBeenCalledWith(player);
      expect(driver.isConnected()).toBe(true);
      expect(driver.channelId).toBe('voice-1');
    });

    it('fails with connection_lost when the channel never becomes ready', async () => {
      jest.mocked(entersState).mockRejectedValueOnce(new Error('timed out'));
      const { driver } = createDriver();

      await expect(driver.connect('voice-1')).rejects.toMatchObject({ kind: 'connection_lost' });

      const connection = jest.mocked(joinVoiceChannel).mock.results.at(-1)?.value;
      expect(connection?.destroy).toHaveBeenCalled();
      expect(driver.channelId).toBeNull();
    });

    it('moves an existing connection instead of joining again', async () => {
      const { driver, connection } = await connected();

      await driver.connect('voice-2');

      expect(joinVoiceChannel).toHaveBeenCalledTimes(1);
      expect(connection.rejoin).toHaveBeenCalledWith({
        channelId: 'voice-2',
        selfDeaf: true,
        selfMute: false,
      });
      expect(driver.channelId).toBe('voice-2');
    });
  });

  describe('send', () => {
    it('resolves when the player goes idle and closes the stream', async () => {
      const { driver, player } = await connected();
      const stream = opened();

      const sending = driver.send(stream, new AbortController().signal);
      expect(createAudioResource).toHaveBeenCalledWith(stream.stream, {
        inputType: StreamType.Arbitrary,
        inlineVolume: true,
      });
      expect(player.play).toHaveBeenCalledWith(lastResource());

      player.emit(AudioPlayerStatus.Idle);

      await expect(sending).resolves.toBeUndefined();
      expect(stream.close).toHaveBeenCalled();
    });

    it('rejects with cancelled and stops the player on abort', async () => {
      const { driver, player } = await connected();
      const controller = new AbortController();

      const sending = driver.send(opened(), controller.signal);
      controller.abort();

      await expect(sending).rejects.toMatchObject({ kind: 'cancelled' });
      expect(player.stop).toHaveBeenCalledWith(true);
    });

    it('rejects with decode_failure on a player error for its resource', async () => {
      const { driver, player } = await connected();

      const sending = driver.send(opened(), new AbortController().signal);
      player.emit('error', { message: 'Premature close', resource: { other: true } });
      player.emit('error', { message: 'Invalid data', resource: lastResource() });

      await expect(sending).rejects.toMatchObject({
        kind: 'decode_failure',
        message: 'Invalid data',
      });
    });

    it('rejects immediately when not connected', async () => {
      const { driver } = createDriver();
      const stream = opened();

      await expect(driver.send(stream, new AbortController().signal)).rejects.toMatchObject({
        kind: 'connection_lost',
      });
      expect(stream.close).toHaveBeenCalled();
    });

    it('cancels the previous transmission when a new one starts', async () => {
      const { driver } = await connected();

      const first = driver.send(opened(), new AbortController().signal);
      const second = driver.send(opened(), new AbortController().signal);

      await expect(first).rejects.toMatchObject({ kind: 'cancelled' });
      driver.disconnect();
      await expect(second).rejects.toBeInstanceOf(StreamError);
    });
  });

  it('applies gain to the playing resource and later ones', async () => {
    const { driver } = await connected();
    driver.setGain(0.5);

    const sending = driver.send(opened(), new AbortController().signal);
    const resource = lastResource();
    expect(resource.volume?.setVolume).toHaveBeenCalledWith(0.5);

    driver.setGain(1.5);
    expect(resource.volume?.setVolume).toHaveBeenLastCalledWith(1.5);

    driver.disconnect();
    await expect(sending).rejects.toMatchObject({ kind: 'cancelled' });
  });

  it('pause and resume delegate to the player', async () => {
    const { driver, player } = await connected();

    expect(driver.pause()).toBe(true);
    expect(driver.resume()).toBe(true);
    expect(player.pause).toHaveBeenCalled();
    expect(player.unpause).toHaveBeenCalled();
  });

  it('disconnect destroys the connection', async () => {
    const { driver, connection } = await connected();

    driver.disconnect();

    expect(connection.destroy).toHaveBeenCalled();
    expect(driver.isConnected()).toBe(false);
    expect(driver.channelId).toBeNull();
  });

  describe('connection loss', () => {
    it('reports a fatal loss and fails the in-flight transmission', async () => {
      const { driver, connection } = await connected(0);
      const lost = jest.fn();
      driver.on('connectionLost', lost);

      const sending = driver.send(opened(), new AbortController().signal);
      connection.emit(VoiceConnectionStatus.Disconnected);
      await settle();

      await expect(sending).rejects.toMatchObject({ kind: 'connection_lost' });
      expect(lost).toHaveBeenCalledWith(expect.objectContaining({ kind: 'connection_lost' }));
      expect(connection.destroy).toHaveBeenCalled();
      expect(driver.channelId).toBeNull();
    });

    it('keeps the connection when it recovers', async () => {
      const { driver, connection } = await connected(2);
      const lost = jest.fn();
      driver.on('connectionLost', lost);

      connection.emit(VoiceConnectionStatus.Disconnected);
      await settle();

      expect(lost).not.toHaveBeenCalled();
      expect(connection.destroy).not.toHaveBeenCalled();
      expect(driver.channelId).toBe('voice-1');
    });
  });

  it.each([
    ['arbitrary', StreamType.Arbitrary],
    ['raw', StreamType.Raw],
    ['opus', StreamType.Opus],
    ['ogg/opus', StreamType.OggOpus],
    ['webm/opus', StreamType.WebmOpus],
  ] as const)('maps %s streams', (kind, type) => {
    expect(toStreamType(kind)).toBe(type);
  });
});
