import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { failure, replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('jump')
    .setDescription('Skip ahead to a position in the queue')
    .addIntegerOption((option) =>
      option.setName('position').setDescription('Queue position (1 = next)').setRequired(true).setMinValue(1)
    ),
  async execute(voice, ctx, options) {
    const position = options.getInteger('position');
    if (position === null) return failure('❌ Give a queue position.');

    try {
      const track = await voice.jump(ctx.guildId, position);
      return success(`⏩ Jumped to **${track.title}**`);
    } catch (error) {
      return replyForError('jump', error);
    }
  },
};

export default command;
