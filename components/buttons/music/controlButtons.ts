/**
 * Music player control buttons
 */

import { ActionRowBuilder, ButtonBuilder } from 'discord.js';
import {
  createPrimaryButton,
  createSuccessButton,
  createSecondaryButton,
  createDangerButton,
} from '../../builders/buttonBuilder';
import type { MusicPlayerState } from '../../../types/buttons';
import type { LoopMode } from '../../../types/voice';

export const PLAYER_BUTTON_IDS = {
  pause: 'player_pause',
  skip: 'player_skip',
  stop: 'player_stop',
  loop: 'player_loop',
  shuffle: 'player_shuffle',
  queue: 'player_queue',
  volume: 'player_volume',
  leave: 'player_leave',
} as const;

export const LOOP_MODE_DISPLAY: Record<LoopMode, { emoji: string; label: string }> = {
  off: { emoji: '➡️', label: 'Loop Off' },
  track: { emoji: '🔂', label: 'Loop Track' },
  queue: { emoji: '🔁', label: 'Loop Queue' },
};

/**
 * Create play/pause button
 */
export function createPlayPauseButton(isPaused: boolean, disabled: boolean = false): ButtonBuilder {
  if (isPaused) {
    return createSuccessButton(PLAYER_BUTTON_IDS.pause, 'Resume', '▶️', disabled);
  }
  return createSecondaryButton(PLAYER_BUTTON_IDS.pause, 'Pause', '⏸️', disabled);
}

export function createSkipButton(disabled: boolean = false): ButtonBuilder {
  return createSecondaryButton(PLAYER_BUTTON_IDS.skip, 'Skip', '⏭️', disabled);
}

export function createStopButton(disabled: boolean = false): ButtonBuilder {
  return createDangerButton(PLAYER_BUTTON_IDS.stop, 'Stop', '⏹️', disabled);
}

/**
 * Loop button shows the current mode; pressing it cycles to the next
 */
export function createLoopButton(mode: LoopMode, disabled: boolean = false): ButtonBuilder {
  const { emoji, label } = LOOP_MODE_DISPLAY[mode];
  if (mode === 'off') {
    return createSecondaryButton(PLAYER_BUTTON_IDS.loop, label, emoji, disabled);
  }
  return createPrimaryButton(PLAYER_BUTTON_IDS.loop, label, emoji, disabled);
}

export function createShuffleButton(disabled: boolean = false): ButtonBuilder {
  return createSecondaryButton(PLAYER_BUTTON_IDS.shuffle, 'Shuffle', '🔀', disabled);
}

export function createQueueButton(disabled: boolean = false): ButtonBuilder {
  return createSecondaryButton(PLAYER_BUTTON_IDS.queue, 'View Queue', '📋', disabled);
}

export function createVolumeButton(disabled: boolean = false): ButtonBuilder {
  return createSecondaryButton(PLAYER_BUTTON_IDS.volume, 'Volume', '🔊', disabled);
}

export function createLeaveButton(disabled: boolean = false): ButtonBuilder {
  return createDangerButton(PLAYER_BUTTON_IDS.leave, 'Leave', '👋', disabled);
}

/**
 * Create a complete music control row
 */
export function createMusicControlRow(state: MusicPlayerState): ActionRowBuilder<ButtonBuilder> {
  const { isPaused, canSkip, canShuffle, loopMode, disabled = false } = state;

  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    createPlayPauseButton(isPaused, disabled),
    createSkipButton(disabled || !canSkip),
    createStopButton(disabled),
    createLoopButton(loopMode, disabled),
    createShuffleButton(disabled || !canShuffle)
  );
}

/**
 * Secondary row: queue view, volume and leave
 */
export function createPanelRow(disabled: boolean = false): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    createQueueButton(disabled),
    createVolumeButton(disabled),
    createLeaveButton(disabled)
  );
}
