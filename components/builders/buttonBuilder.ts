/**
 * Button builder utilities for creating Discord button components
 */

import { ButtonBuilder, ButtonStyle } from 'discord.js';

/**
 * Split a custom ID into its handler prefix and action, e.g. player_pause
 */
export function parseButtonId(customId: string): { prefix: string; action: string } {
  const separator = customId.indexOf('_');
  if (separator === -1) return { prefix: customId, action: '' };
  return { prefix: customId.slice(0, separator), action: customId.slice(separator + 1) };
}

/**
 * Create a button with common styling
 */
export function createButton(
  customId: string,
  label: string,
  style: ButtonStyle = ButtonStyle.Secondary,
  emoji?: string,
  disabled: boolean = false
): ButtonBuilder {
  const button = new ButtonBuilder()
    .setCustomId(customId)
    .setLabel(label)
    .setStyle(style)
    .setDisabled(disabled);

  if (emoji) {
    button.setEmoji(emoji);
  }

  return button;
}

/**
 * Create a secondary action button (gray)
 */
export function createSecondaryButton(
  customId: string,
  label: string,
  emoji?: string,
  disabled: boolean = false
): ButtonBuilder {
  return createButton(customId, label, ButtonStyle.Secondary, emoji, disabled);
}

/**
 * Create a success action button (green)
 */
export function createSuccessButton(
  customId: string,
  label: string,
  emoji?: string,
  disabled: boolean = false
): ButtonBuilder {
  return createButton(customId, label, ButtonStyle.Success, emoji, disabled);
}

/**
 * Create a danger action button (red)
 */
export function createDangerButton(
  customId: string,
  label: string,
  emoji?: string,
  disabled: boolean = false
): ButtonBuilder {
  return createButton(customId, label, ButtonStyle.Danger, emoji, disabled);
}

/**
 * Create a primary action button (blurple)
 */
export function createPrimaryButton(
  customId: string,
  label: string,
  emoji?: string,
  disabled: boolean = false
): ButtonBuilder {
  return createButton(customId, label, ButtonStyle.Primary, emoji, disabled);
}
