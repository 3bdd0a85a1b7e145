/**
 * Handlers for the panel's jump menu and volume modal
 */

import { MessageFlags } from 'discord.js';
import type { ModalHandler, SelectMenuHandler } from '../types/select-menus';
import { CommandError } from '../utils/errors';
import { createPlayerMessage } from '../utils/playerEmbed';
import { parseJumpValue } from '../components/select-menus/string/jumpMenu';
import { VOLUME_INPUT_ID, parseVolumeInput } from '../components/modals/volumeModal';
import { checkPlayerAccess, replyError } from './playerAccess';
import type { VoiceManager } from '../utils/voiceManager';

export function createJumpMenuHandler(voice: VoiceManager): SelectMenuHandler {
  return async (interaction, { guildId, voiceChannelId }) => {
    const denied = checkPlayerAccess(voice, guildId, voiceChannelId);
    if (denied) return replyError(interaction, 'Jump', denied);

    const position = parseJumpValue(interaction.values[0]);
    if (position === null) {
      return replyError(interaction, 'Jump', new CommandError('invalid_argument', 'Invalid selection', guildId));
    }

    try {
      const track = await voice.jump(guildId, position);
      const snapshot = voice.getSnapshot(guildId);
      if (snapshot) await interaction.update(createPlayerMessage(snapshot));
      return { success: true, data: track };
    } catch (error) {
      return replyError(interaction, 'Jump', error);
    }
  };
}

export function createVolumeModalHandler(voice: VoiceManager): ModalHandler {
  return async (interaction, { guildId, userId, voiceChannelId }) => {
    const denied = checkPlayerAccess(voice, guildId, voiceChannelId);
    if (denied) return replyError(interaction, 'Volume', denied);

    const percent = parseVolumeInput(interaction.fields.getTextInputValue(VOLUME_INPUT_ID));
    if (percent === null) {
      return replyError(
        interaction,
        'Volume',
        new CommandError('invalid_argument', 'Enter a number like 80 or 150', guildId)
      );
    }

    try {
      const applied = await voice.setVolume(guildId, userId, percent);
      const note = applied !== Math.round(percent) ? ` (clamped from ${percent}%)` : '';
      await interaction.reply({
        content: `🔊 Your volume is now **${applied}%**${note}`,
        flags: MessageFlags.Ephemeral,
      });
      return { success: true, data: applied };
    } catch (error) {
      return replyError(interaction, 'Volume', error);
    }
  };
}
