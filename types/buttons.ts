/**
 * Type definitions for button components
 */

import type { EmbedBuilder, MessageFlags, ModalBuilder } from 'discord.js';
import type { LoopMode } from './voice';
import type { PlayerMessage } from '../utils/playerEmbed';

/**
 * Private or public reply to a player control
 */
export interface PlayerReply {
  content?: string;
  embeds?: EmbedBuilder[];
  flags?: MessageFlags.Ephemeral;
}

/**
 * The parts of a button interaction the handlers use
 */
export interface PlayerButtonInteraction {
  customId: string;
  guildId: string | null;
  user: { id: string; tag: string };
  update(payload: PlayerMessage): Promise<unknown>;
  reply(payload: PlayerReply): Promise<unknown>;
  showModal(modal: ModalBuilder): Promise<unknown>;
}

/**
 * Button context for passing additional data
 */
export interface ButtonContext {
  guildId: string;
  userId: string;
  /** Voice channel the presser is in */
  voiceChannelId: string | null;
}

/**
 * Button handler result
 */
export interface ButtonHandlerResult {
  success: boolean;
  error?: string;
  data?: unknown;
}

/**
 * Button handler function type
 */
export type ButtonHandler = (
  interaction: PlayerButtonInteraction,
  context: ButtonContext
) => Promise<ButtonHandlerResult>;

/**
 * Music player state for buttons
 */
export interface MusicPlayerState {
  isPaused: boolean;
  canSkip: boolean;
  canShuffle: boolean;
  loopMode: LoopMode;
  /** Disable every control (stopped session) */
  disabled?: boolean;
}
