/**
 * Slash command type definitions
 */

import type { EmbedBuilder, RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import type { VoiceManager } from '../utils/voiceManager';
import type { PlayerRow } from '../utils/playerEmbed';

/**
 * Who invoked a command and where
 */
export interface CommandContext {
  guildId: string;
  userId: string;
  /** Voice channel the invoking member is in, if any */
  voiceChannelId: string | null;
}

/**
 * Subset of the interaction option resolver the executors read
 */
export interface CommandOptions {
  getString(name: string): string | null;
  getInteger(name: string): number | null;
}

export interface CommandReply {
  content?: string;
  embeds?: EmbedBuilder[];
  components?: PlayerRow[];
  ephemeral?: boolean;
  /** Track this reply as the guild's player panel */
  panel?: boolean;
}

export interface SlashCommand {
  data: {
    name: string;
    toJSON: () => RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  /** Resolution can outlast Discord's 3s reply window */
  defer?: boolean;
  execute: (voice: VoiceManager, ctx: CommandContext, options: CommandOptions) => Promise<CommandReply>;
}
