import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { failure, replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('stop')
    .setDescription('Stop playback, clear the queue and leave the channel'),
  async execute(voice, ctx) {
    try {
      const stopped = await voice.stop(ctx.guildId);
      return stopped ? success('⏹️ Stopped playback and cleared the queue.') : failure('❌ Nothing is playing.');
    } catch (error) {
      return replyForError('stop', error);
    }
  },
};

export default command;
