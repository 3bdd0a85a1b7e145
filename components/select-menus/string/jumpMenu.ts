/**
 * Jump-to-track select menu
 */

import { ActionRowBuilder, StringSelectMenuBuilder } from 'discord.js';
import { createStringSelectMenu } from '../../builders/selectMenuBuilder';
import { MAX_LIST_OPTIONS } from '../../../utils/voice/constants';
import type { SelectMenuOption } from '../../../types/select-menus';
import type { Track } from '../../../types/voice';

export const JUMP_MENU_ID = 'player_jump';

/**
 * One option per queued track, valued by its 1-based position
 */
export function getJumpOptions(queue: readonly Track[]): SelectMenuOption[] {
  return queue.slice(0, MAX_LIST_OPTIONS).map((track, index) => ({
    label: `${index + 1}. ${track.title}`,
    value: String(index + 1),
  }));
}

/**
 * Null when the queue is empty; Discord rejects a menu without options
 */
export function createJumpMenu(
  queue: readonly Track[],
  disabled: boolean = false
): ActionRowBuilder<StringSelectMenuBuilder> | null {
  if (queue.length === 0) return null;
  const menu = createStringSelectMenu(JUMP_MENU_ID, '⏭️ Jump to track…', getJumpOptions(queue), {
    minValues: 1,
    maxValues: 1,
    disabled,
  });
  return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu);
}

/**
 * Queue position picked in the menu, or null when the value is not one
 */
export function parseJumpValue(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  const position = Number(value);
  return position >= 1 ? position : null;
}
