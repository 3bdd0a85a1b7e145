import { SlashCommandBuilder } from 'discord.js';
import type { SlashCommand } from '../../types/commands';
import { createPlayerMessage } from '../../utils/playerEmbed';
import { failure } from './replies';

// Posts a fresh player panel; the panel keeps itself updated afterwards
const command: SlashCommand = {
  data: new SlashCommandBuilder().setName('np').setDescription('Show the player for the current track'),
  async execute(voice, ctx) {
    const snapshot = voice.getSnapshot(ctx.guildId);
    if (!snapshot) return failure('❌ Nothing is playing.');
    return { ...createPlayerMessage(snapshot), panel: true };
  },
};

export default command;
