import {
  clearMenuHandlers,
  getRegisteredMenuIds,
  handleModalSubmit,
  handleSelectMenuInteraction,
  registerModalHandler,
  registerSelectMenuHandler,
} from '../selectMenuHandler';
import { makeModalInteraction, makeSelectInteraction } from './helpers/interaction';

describe('selectMenuHandler', () => {
  beforeEach(() => {
    clearMenuHandlers();
  });

  it('dispatches select menus with the member voice channel', async () => {
    const handler = jest.fn(async () => ({ success: true }));
    registerSelectMenuHandler('player_jump', handler);
    const interaction = makeSelectInteraction('player_jump', ['1']);

    expect(await handleSelectMenuInteraction(interaction, 'voice-1')).toEqual({ success: true });
    expect(handler).toHaveBeenCalledWith(interaction, {
      guildId: 'guild-1',
      userId: 'user-1',
      voiceChannelId: 'voice-1',
    });
  });

  it('dispatches modal submissions separately from select menus', async () => {
    const handler = jest.fn(async () => ({ success: true }));
    registerModalHandler('player_volume_modal', handler);

    const result = await handleSelectMenuInteraction(makeSelectInteraction('player_volume_modal', []), null);
    expect(result).toEqual({ success: false, error: 'No handler found for select menu: player_volume_modal' });

    await handleModalSubmit(makeModalInteraction('player_volume_modal', { volume: '80' }), null);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(getRegisteredMenuIds()).toEqual({ selectMenus: [], modals: ['player_volume_modal'] });
  });

  it('reports unknown modals', async () => {
    const result = await handleModalSubmit(makeModalInteraction('other_modal', {}), null);
    expect(result).toEqual({ success: false, error: 'No handler found for modal: other_modal' });
  });
});
