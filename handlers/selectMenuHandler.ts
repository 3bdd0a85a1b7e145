/**
 * Dispatch for select menus and modal submissions
 */

import { createComponentRegistry } from './buttonHandler';
import type { ButtonHandlerResult } from '../types/buttons';
import type {
  ModalHandler,
  PlayerModalInteraction,
  PlayerSelectInteraction,
  SelectMenuHandler,
} from '../types/select-menus';

const selectMenus = createComponentRegistry<PlayerSelectInteraction>('select menu');
const modals = createComponentRegistry<PlayerModalInteraction>('modal');

export function registerSelectMenuHandler(customId: string, handler: SelectMenuHandler): void {
  selectMenus.register(customId, handler);
}

export function registerModalHandler(customId: string, handler: ModalHandler): void {
  modals.register(customId, handler);
}

export async function handleSelectMenuInteraction(
  interaction: PlayerSelectInteraction,
  voiceChannelId: string | null
): Promise<ButtonHandlerResult> {
  return selectMenus.handle(interaction, voiceChannelId);
}

export async function handleModalSubmit(
  interaction: PlayerModalInteraction,
  voiceChannelId: string | null
): Promise<ButtonHandlerResult> {
  return modals.handle(interaction, voiceChannelId);
}

export function clearMenuHandlers(): void {
  selectMenus.clear();
  modals.clear();
}

export function getRegisteredMenuIds(): { selectMenus: string[]; modals: string[] } {
  return { selectMenus: selectMenus.ids(), modals: modals.ids() };
}
