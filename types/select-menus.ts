/**
 * Type definitions for select menu and modal components
 */

import type { ButtonContext, ButtonHandlerResult, PlayerReply } from './buttons';
import type { PlayerMessage } from '../utils/playerEmbed';

export interface SelectMenuOption {
  label: string;
  value: string;
  description?: string;
  emoji?: string;
  default?: boolean;
}

/**
 * The parts of a string select interaction the handlers use
 */
export interface PlayerSelectInteraction {
  customId: string;
  guildId: string | null;
  user: { id: string; tag: string };
  values: string[];
  update(payload: PlayerMessage): Promise<unknown>;
  reply(payload: PlayerReply): Promise<unknown>;
}

/**
 * The parts of a modal submission the handlers use
 */
export interface PlayerModalInteraction {
  customId: string;
  guildId: string | null;
  user: { id: string; tag: string };
  fields: { getTextInputValue(customId: string): string };
  reply(payload: PlayerReply): Promise<unknown>;
}

export type SelectMenuContext = ButtonContext;

export type SelectMenuHandlerResult = ButtonHandlerResult;

export type SelectMenuHandler = (
  interaction: PlayerSelectInteraction,
  context: SelectMenuContext
) => Promise<SelectMenuHandlerResult>;

export type ModalHandler = (
  interaction: PlayerModalInteraction,
  context: SelectMenuContext
) => Promise<SelectMenuHandlerResult>;
