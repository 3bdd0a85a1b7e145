import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { createQueueEmbed } from '../../utils/playerEmbed';
import { failure } from './replies';

const command: SlashCommand = {
  data: new SlashCommandBuilder().setName('queue').setDescription('Show the queue'),
  async execute(voice, ctx) {
    const snapshot = voice.getSnapshot(ctx.guildId);
    if (!snapshot) return failure('❌ Nothing is playing.');
    return { embeds: [createQueueEmbed(snapshot)] };
  },
};

export default command;
