import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { failure, replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder().setName('leave').setDescription('Leave the voice channel'),
  async execute(voice, ctx) {
    try {
      const left = await voice.leave(ctx.guildId);
      return left ? success('👋 Left the voice channel.') : failure("❌ I'm not in a voice channel.");
    } catch (error) {
      return replyForError('leave', error);
    }
  },
};

export default command;
