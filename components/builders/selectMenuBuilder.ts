/**
 * Select menu builder utilities
 */

import { StringSelectMenuBuilder } from 'discord.js';
import type { SelectMenuOption } from '../../types/select-menus';

/** Discord's limit on option labels */
export const MAX_OPTION_LABEL_LENGTH = 100;

/**
 * Shorten a label to fit an option, marking the cut with an ellipsis
 */
export function truncateLabel(label: string, max: number = MAX_OPTION_LABEL_LENGTH): string {
  return label.length <= max ? label : `${label.slice(0, max - 1)}…`;
}

/**
 * Create a string select menu with options
 */
export function createStringSelectMenu(
  customId: string,
  placeholder: string,
  options: SelectMenuOption[],
  config?: {
    minValues?: number;
    maxValues?: number;
    disabled?: boolean;
  }
): StringSelectMenuBuilder {
  const selectMenu = new StringSelectMenuBuilder()
    .setCustomId(customId)
    .setPlaceholder(placeholder);

  selectMenu.addOptions(
    options.map((option) => ({
      label: truncateLabel(option.label),
      value: option.value,
      ...(option.description ? { description: truncateLabel(option.description) } : {}),
      ...(option.emoji ? { emoji: option.emoji } : {}),
      default: option.default || false,
    }))
  );

  if (config?.minValues !== undefined) {
    selectMenu.setMinValues(config.minValues);
  }
  if (config?.maxValues !== undefined) {
    selectMenu.setMaxValues(config.maxValues);
  }
  if (config?.disabled) {
    selectMenu.setDisabled(true);
  }

  return selectMenu;
}
