import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { failure, replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder().setName('resume').setDescription('Resume paused playback'),
  async execute(voice, ctx) {
    try {
      const resumed = await voice.resume(ctx.guildId);
      if (!resumed) return failure('❌ Playback is not paused.');
      const title = voice.getSnapshot(ctx.guildId)?.currentTrack?.title;
      return success(`▶️ Resumed playback${title ? ` **${title}**` : ''}.`);
    } catch (error) {
      return replyForError('resume', error);
    }
  },
};

export default command;
