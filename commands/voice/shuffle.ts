import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { failure, replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder().setName('shuffle').setDescription('Shuffle the queue'),
  async execute(voice, ctx) {
    try {
      const count = await voice.shuffle(ctx.guildId);
      if (count < 2) return failure('❌ Not enough tracks in the queue to shuffle.');
      return success(`🔀 Shuffled **${count}** tracks.`);
    } catch (error) {
      return replyForError('shuffle', error);
    }
  },
};

export default command;
