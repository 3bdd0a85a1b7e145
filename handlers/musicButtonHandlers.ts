/**
 * Music control button handlers
 */

import { MessageFlags } from 'discord.js';
import type { ButtonHandler, PlayerButtonInteraction } from '../types/buttons';
import { createLogger } from '../utils/logger';
import { CommandError } from '../utils/errors';
import { createPlayerMessage, createQueueEmbed } from '../utils/playerEmbed';
import { createVolumeModal } from '../components/modals/volumeModal';
import { checkPlayerAccess, replyError } from './playerAccess';
import type { VoiceManager } from '../utils/voiceManager';

const log = createLogger('MUSIC_BUTTONS');

export type MusicButtonHandlers = Record<
  'pause' | 'skip' | 'stop' | 'loop' | 'shuffle' | 'queue' | 'volume' | 'leave',
  ButtonHandler
>;

/**
 * Build the panel handlers around a voice manager. Each one runs the command
 * and redraws the panel from the resulting snapshot.
 */
export function createMusicButtonHandlers(voice: VoiceManager): MusicButtonHandlers {
  const redraw = async (
    interaction: PlayerButtonInteraction,
    guildId: string
  ): Promise<void> => {
    const snapshot = voice.getSnapshot(guildId);
    if (snapshot) {
      await interaction.update(createPlayerMessage(snapshot));
    }
  };

  const listenersOnly =
    (action: string, handler: ButtonHandler): ButtonHandler =>
    async (interaction, context) => {
      const denied = checkPlayerAccess(voice, context.guildId, context.voiceChannelId);
      if (denied) return replyError(interaction, action, denied);
      return handler(interaction, context);
    };

  const withRedraw = (
    action: string,
    run: (guildId: string, userId: string) => Promise<unknown>
  ): ButtonHandler =>
    listenersOnly(action, async (interaction, { guildId, userId }) => {
      try {
        const data = await run(guildId, userId);
        await redraw(interaction, guildId);
        return { success: true, data };
      } catch (error) {
        return replyError(interaction, action, error);
      }
    });

  return {
    pause: withRedraw('Pause', (guildId) => voice.togglePause(guildId)),
    skip: withRedraw('Skip', (guildId) => voice.skip(guildId)),
    loop: withRedraw('Loop', (guildId) => voice.cycleLoopMode(guildId)),
    shuffle: withRedraw('Shuffle', (guildId) => voice.shuffle(guildId)),

    // The panel finalizes itself once the session reports it stopped
    stop: listenersOnly('Stop', async (interaction, { guildId, userId }) => {
      try {
        const stopped = await voice.stop(guildId);
        log.info(`Playback stopped from panel by ${userId} in guild ${guildId}`);
        await interaction.reply({
          content: stopped ? '⏹️ Stopped playback and cleared the queue.' : '❌ Nothing is playing.',
          flags: MessageFlags.Ephemeral,
        });
        return { success: stopped };
      } catch (error) {
        return replyError(interaction, 'Stop', error);
      }
    }),

    leave: listenersOnly('Leave', async (interaction, { guildId, userId }) => {
      try {
        const left = await voice.leave(guildId);
        if (left) log.info(`Left voice from panel by ${userId} in guild ${guildId}`);
        await interaction.reply({
          content: left ? '👋 Left the voice channel.' : '❌ Not in a voice channel.',
          flags: MessageFlags.Ephemeral,
        });
        return { success: left };
      } catch (error) {
        return replyError(interaction, 'Leave', error);
      }
    }),

    queue: listenersOnly('Queue', async (interaction, { guildId }) => {
      const snapshot = voice.getSnapshot(guildId);
      if (!snapshot) {
        return replyError(interaction, 'Queue', new CommandError('invalid_state', 'Nothing is playing', guildId));
      }
      await interaction.reply({ embeds: [createQueueEmbed(snapshot)], flags: MessageFlags.Ephemeral });
      return { success: true };
    }),

    // Opens the modal; the submission is handled by the volume modal handler
    volume: listenersOnly('Volume', async (interaction, { guildId, userId }) => {
      const snapshot = voice.getSnapshot(guildId);
      if (!snapshot) {
        return replyError(interaction, 'Volume', new CommandError('invalid_state', 'Nothing is playing', guildId));
      }
      const percent = Math.round((snapshot.volumes[userId] ?? 1) * 100);
      await interaction.showModal(createVolumeModal(percent));
      return { success: true, data: percent };
    }),
  };
}
