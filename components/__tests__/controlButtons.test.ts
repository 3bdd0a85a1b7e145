/**
 * Tests for music control buttons
 */

import { ButtonStyle } from 'discord.js';
import {
  createLoopButton,
  createMusicControlRow,
  createLeaveButton,
  createPanelRow,
  createPlayPauseButton,
  createQueueButton,
  createSkipButton,
  createStopButton,
  createVolumeButton,
} from '../buttons/music/controlButtons';
import { parseButtonId } from '../builders/buttonBuilder';
import type { MusicPlayerState } from '../../types/buttons';

const baseState: MusicPlayerState = {
  isPaused: false,
  canSkip: true,
  canShuffle: true,
  loopMode: 'off',
};

describe('Music Control Buttons', () => {
  describe('createPlayPauseButton', () => {
    it('creates pause button when not paused', () => {
      expect(createPlayPauseButton(false).toJSON()).toMatchObject({
        custom_id: 'player_pause',
        label: 'Pause',
        style: ButtonStyle.Secondary,
      });
    });

    it('creates resume button when paused', () => {
      expect(createPlayPauseButton(true).toJSON()).toMatchObject({
        custom_id: 'player_pause',
        label: 'Resume',
        style: ButtonStyle.Success,
      });
    });

    it('respects disabled parameter', () => {
      expect(createPlayPauseButton(false, true).toJSON()).toMatchObject({ disabled: true });
    });
  });

  it('creates skip, stop and queue buttons', () => {
    expect(createSkipButton(true).toJSON()).toMatchObject({ custom_id: 'player_skip', disabled: true });
    expect(createStopButton().toJSON()).toMatchObject({
      custom_id: 'player_stop',
      label: 'Stop',
      style: ButtonStyle.Danger,
    });
    expect(createQueueButton().toJSON()).toMatchObject({ custom_id: 'player_queue', label: 'View Queue' });
  });

  describe('createLoopButton', () => {
    it('is secondary while looping is off', () => {
      expect(createLoopButton('off').toJSON()).toMatchObject({
        custom_id: 'player_loop',
        label: 'Loop Off',
        style: ButtonStyle.Secondary,
      });
    });

    it('highlights an active loop mode', () => {
      expect(createLoopButton('track').toJSON()).toMatchObject({ label: 'Loop Track', style: ButtonStyle.Primary });
      expect(createLoopButton('queue').toJSON()).toMatchObject({ label: 'Loop Queue', style: ButtonStyle.Primary });
    });
  });

  describe('createMusicControlRow', () => {
    it('orders the controls', () => {
      const row = createMusicControlRow(baseState);
      expect(row.toJSON().components).toEqual([
        expect.objectContaining({ custom_id: 'player_pause' }),
        expect.objectContaining({ custom_id: 'player_skip' }),
        expect.objectContaining({ custom_id: 'player_stop' }),
        expect.objectContaining({ custom_id: 'player_loop' }),
        expect.objectContaining({ custom_id: 'player_shuffle' }),
      ]);
    });

    it('disables skip and shuffle when they cannot act', () => {
      const row = createMusicControlRow({ ...baseState, canSkip: false, canShuffle: false });
      expect(row.components[1]?.toJSON()).toMatchObject({ disabled: true });
      expect(row.components[4]?.toJSON()).toMatchObject({ disabled: true });
      expect(row.components[0]?.toJSON()).toMatchObject({ disabled: false });
    });

    it('disables everything when requested', () => {
      const row = createMusicControlRow({ ...baseState, disabled: true });
      expect(row.toJSON().components.every((button) => button.disabled === true)).toBe(true);
    });
  });

  it('creates the volume and leave buttons', () => {
    expect(createVolumeButton().toJSON()).toMatchObject({
      custom_id: 'player_volume',
      label: 'Volume',
      style: ButtonStyle.Secondary,
    });
    expect(createLeaveButton().toJSON()).toMatchObject({
      custom_id: 'player_leave',
      label: 'Leave',
      style: ButtonStyle.Danger,
    });
  });

  it('creates the panel row', () => {
    expect(createPanelRow().toJSON().components).toEqual([
      expect.objectContaining({ custom_id: 'player_queue', disabled: false }),
      expect.objectContaining({ custom_id: 'player_volume', disabled: false }),
      expect.objectContaining({ custom_id: 'player_leave', disabled: false }),
    ]);
  });

  it('disables the panel row when requested', () => {
    expect(createPanelRow(true).toJSON().components.every((button) => button.disabled === true)).toBe(true);
  });
});

describe('parseButtonId', () => {
  it('splits at the first underscore', () => {
    expect(parseButtonId('player_pause')).toEqual({ prefix: 'player', action: 'pause' });
    expect(parseButtonId('queue_page_2')).toEqual({ prefix: 'queue', action: 'page_2' });
  });

  it('handles ids without an action', () => {
    expect(parseButtonId('refresh')).toEqual({ prefix: 'refresh', action: '' });
  });
});
