import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import type { PlayResult } from '../../types/voice';
import { createPlayerMessage, formatDuration } from '../../utils/playerEmbed';
import { NOT_IN_VOICE, failure, replyForError } from './replies';

export function formatPlayMessage(result: PlayResult): string {
  const [first] = result.tracks;
  if (result.added === 1 && first) {
    const duration = formatDuration(first.duration);
    const position = result.snapshot.currentTrack?.id === first.id ? '' : ` (position ${result.totalInQueue})`;
    return `🎵 Added **${first.title}**${duration ? ` \`${duration}\`` : ''}${position}`;
  }
  return `📋 Added **${result.added}** tracks to the queue (${result.totalInQueue} waiting)`;
}

const command: SlashCommand = {
  data: new SlashCommandBuilder()
    .setName('play')
    .setDescription('Play a song, playlist or search result')
    .addStringOption((option) =>
      option
        .setName('source')
        .setDescription('YouTube/Spotify/SoundCloud URL or search terms')
        .setRequired(true)
    ),
  defer: true,
  async execute(voice, ctx, options) {
    const query = options.getString('source')?.trim();
    if (!query) return failure('❌ Tell me what to play.');
    if (!ctx.voiceChannelId) return failure(NOT_IN_VOICE);

    try {
      const result = await voice.play({
        guildId: ctx.guildId,
        voiceChannelId: ctx.voiceChannelId,
        query,
        userId: ctx.userId,
      });
      return { content: formatPlayMessage(result), ...createPlayerMessage(result.snapshot), panel: true };
    } catch (error) {
      return replyForError('play', error);
    }
  },
};

export default command;
