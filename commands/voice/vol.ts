import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { failure, replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('vol')
    .setDescription('Set your playback volume (applies while your tracks play)')
    .addIntegerOption((option) =>
      option.setName('level').setDescription('Volume in percent').setRequired(false).setMinValue(0)
    ),
  async execute(voice, ctx, options) {
    const level = options.getInteger('level');

    if (level === null) {
      const snapshot = voice.getSnapshot(ctx.guildId);
      if (!snapshot) return failure('❌ Nothing is playing.');
      return success(`🔊 Current volume: **${Math.round(snapshot.effectiveGain * 100)}%**`);
    }

    try {
      const applied = await voice.setVolume(ctx.guildId, ctx.userId, level);
      const note = applied !== level ? ` (clamped from ${level}%)` : '';
      return success(`🔊 Your volume is now **${applied}%**${note}`);
    } catch (error) {
      return replyForError('vol', error);
    }
  },
};

export default command;
