/**
 * Register all player component handlers
 */

import { registerButtonHandler } from './buttonHandler';
import { registerModalHandler, registerSelectMenuHandler } from './selectMenuHandler';
import { createMusicButtonHandlers } from './musicButtonHandlers';
import { createJumpMenuHandler, createVolumeModalHandler } from './musicMenuHandlers';
import { PLAYER_BUTTON_IDS } from '../components/buttons/music/controlButtons';
import { JUMP_MENU_ID } from '../components/select-menus/string/jumpMenu';
import { VOLUME_MODAL_ID } from '../components/modals/volumeModal';
import { createLogger } from '../utils/logger';
import type { VoiceManager } from '../utils/voiceManager';

const log = createLogger('BUTTON_REGISTRY');

export function initializeButtonHandlers(voice: VoiceManager): void {
  log.info('Registering button handlers...');

  const handlers = createMusicButtonHandlers(voice);
  registerButtonHandler(PLAYER_BUTTON_IDS.pause, handlers.pause);
  registerButtonHandler(PLAYER_BUTTON_IDS.skip, handlers.skip);
  registerButtonHandler(PLAYER_BUTTON_IDS.stop, handlers.stop);
  registerButtonHandler(PLAYER_BUTTON_IDS.loop, handlers.loop);
  registerButtonHandler(PLAYER_BUTTON_IDS.shuffle, handlers.shuffle);
  registerButtonHandler(PLAYER_BUTTON_IDS.queue, handlers.queue);
  registerButtonHandler(PLAYER_BUTTON_IDS.volume, handlers.volume);
  registerButtonHandler(PLAYER_BUTTON_IDS.leave, handlers.leave);

  registerSelectMenuHandler(JUMP_MENU_ID, createJumpMenuHandler(voice));
  registerModalHandler(VOLUME_MODAL_ID, createVolumeModalHandler(voice));

  log.info('Button handlers registered successfully');
}
