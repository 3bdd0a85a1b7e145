/**
 * Volume modal opened from the player panel
 */

import { ActionRowBuilder, ModalBuilder, TextInputBuilder, TextInputStyle } from 'discord.js';

export const VOLUME_MODAL_ID = 'player_volume_modal';
export const VOLUME_INPUT_ID = 'volume';

export function createVolumeModal(currentPercent: number): ModalBuilder {
  const input = new TextInputBuilder()
    .setCustomId(VOLUME_INPUT_ID)
    .setLabel('Volume (%)')
    .setPlaceholder('Example: 80 or 150')
    .setStyle(TextInputStyle.Short)
    .setRequired(true)
    .setMaxLength(6)
    .setValue(String(currentPercent));

  return new ModalBuilder()
    .setCustomId(VOLUME_MODAL_ID)
    .setTitle('Set Volume')
    .addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(input));
}

/**
 * Percent typed into the modal; "80", "80%" and "80.5" are accepted
 */
export function parseVolumeInput(raw: string): number | null {
  const text = raw.trim().replace(/%$/, '').trim();
  if (!/^\d+(\.\d+)?$/.test(text)) return null;
  return Number(text);
}
