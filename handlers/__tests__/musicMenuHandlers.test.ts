import { MessageFlags } from 'discord.js';
import { createJumpMenuHandler, createVolumeModalHandler } from '../musicMenuHandlers';
import { createTestVoiceManager, settle } from '../../utils/voice/__tests__/helpers/fakes';
import { makeModalInteraction, makeSelectInteraction } from './helpers/interaction';

const ctx = { guildId: 'guild-1', userId: 'user-1', voiceChannelId: 'voice-1' };

async function setup(query?: string) {
  const harness = createTestVoiceManager();
  if (query) {
    await harness.voice.play({ guildId: 'guild-1', voiceChannelId: 'voice-1', query, userId: 'user-1' });
    await settle();
  }
  return {
    ...harness,
    jump: createJumpMenuHandler(harness.voice),
    volume: createVolumeModalHandler(harness.voice),
  };
}

describe('jump menu handler', () => {
  it('jumps to the picked position and redraws the panel', async () => {
    const { voice, jump } = await setup('A, B, C');
    const interaction = makeSelectInteraction('player_jump', ['2']);

    const result = await jump(interaction, ctx);
    await settle();

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({ title: 'C' });
    expect(interaction.update).toHaveBeenCalledTimes(1);
    expect(voice.getSnapshot('guild-1')?.currentTrack?.title).toBe('C');
    expect(voice.getSnapshot('guild-1')?.queue.map((track) => track.title)).toEqual(['B']);
  });

  it('rejects a value that is not a position', async () => {
    const { jump } = await setup('A, B');
    const interaction = makeSelectInteraction('player_jump', ['first']);

    expect(await jump(interaction, ctx)).toEqual({ success: false, error: 'Invalid selection' });
    expect(interaction.update).not.toHaveBeenCalled();
  });

  it('reports a position the queue no longer has', async () => {
    const { jump } = await setup('A, B');
    const interaction = makeSelectInteraction('player_jump', ['5']);

    expect(await jump(interaction, ctx)).toEqual({
      success: false,
      error: 'No queued track at position 5',
    });
    expect(interaction.reply).toHaveBeenCalledWith({
      content: '❌ No queued track at position 5',
      flags: MessageFlags.Ephemeral,
    });
  });

  it('is limited to listeners in the bot channel', async () => {
    const { voice, jump } = await setup('A, B');
    const interaction = makeSelectInteraction('player_jump', ['1']);

    const result = await jump(interaction, { ...ctx, voiceChannelId: 'voice-2' });

    expect(result).toEqual({ success: false, error: 'Be in <#voice-1> to use the player' });
    expect(voice.getSnapshot('guild-1')?.currentTrack?.title).toBe('A');
  });
});

describe('volume modal handler', () => {
  it('sets the submitter volume', async () => {
    const { voice, volume } = await setup('A');
    const interaction = makeModalInteraction('player_volume_modal', { volume: '80%' });

    expect(await volume(interaction, ctx)).toEqual({ success: true, data: 80 });
    expect(voice.getSnapshot('guild-1')?.volumes).toEqual({ 'user-1': 0.8 });
    expect(interaction.reply).toHaveBeenCalledWith({
      content: '🔊 Your volume is now **80%**',
      flags: MessageFlags.Ephemeral,
    });
  });

  it('notes when the level was clamped', async () => {
    const { volume } = await setup('A');
    const interaction = makeModalInteraction('player_volume_modal', { volume: '300' });

    expect(await volume(interaction, ctx)).toEqual({ success: true, data: 200 });
    expect(interaction.reply).toHaveBeenCalledWith({
      content: '🔊 Your volume is now **200%** (clamped from 300%)',
      flags: MessageFlags.Ephemeral,
    });
  });

  it('rejects input that is not a number', async () => {
    const { voice, volume } = await setup('A');
    const interaction = makeModalInteraction('player_volume_modal', { volume: 'loud' });

    expect(await volume(interaction, ctx)).toEqual({
      success: false,
      error: 'Enter a number like 80 or 150',
    });
    expect(voice.getSnapshot('guild-1')?.volumes).toEqual({});
  });

  it('needs a session', async () => {
    const { volume } = await setup();
    const interaction = makeModalInteraction('player_volume_modal', { volume: '80' });

    expect(await volume(interaction, ctx)).toEqual({ success: false, error: 'Nothing is playing' });
  });

  it('refuses users outside voice', async () => {
    const { voice, volume } = await setup('A');
    const interaction = makeModalInteraction('player_volume_modal', { volume: '80' });

    expect(await volume(interaction, { ...ctx, voiceChannelId: null })).toEqual({
      success: false,
      error: 'Join a voice channel first',
    });
    expect(voice.getSnapshot('guild-1')?.volumes).toEqual({});
  });
});
