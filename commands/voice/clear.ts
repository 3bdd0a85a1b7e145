import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder().setName('clear').setDescription('Clear the queue, keeping the current track'),
  async execute(voice, ctx) {
    try {
      const cleared = await voice.clear(ctx.guildId);
      if (cleared === 0) return success('📋 The queue is already empty.');
      return success(`🗑️ Cleared **${cleared}** track${cleared === 1 ? '' : 's'} from the queue.`);
    } catch (error) {
      return replyForError('clear', error);
    }
  },
};

export default command;
