import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { failure, replyForError, success } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder().setName('skip').setDescription('Skip the current track'),
  async execute(voice, ctx) {
    try {
      const skipped = await voice.skip(ctx.guildId);
      if (!skipped) return failure('❌ Nothing to skip.');

      const next = voice.getSnapshot(ctx.guildId)?.currentTrack;
      return success(`⏭️ Skipped **${skipped.title}**\n▶️ Up next: **${next?.title ?? 'Nothing'}**`);
    } catch (error) {
      return replyForError('skip', error);
    }
  },
};

export default command;
