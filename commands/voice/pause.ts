import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { failure, replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder().setName('pause').setDescription('Pause playback'),
  async execute(voice, ctx) {
    try {
      const paused = await voice.pause(ctx.guildId);
      if (!paused) return failure('❌ Playback is already paused.');
      const title = voice.getSnapshot(ctx.guildId)?.currentTrack?.title;
      return success(`⏸️ Paused playback${title ? ` **${title}**` : ''}.`);
    } catch (error) {
      return replyForError('pause', error);
    }
  },
};

export default command;
