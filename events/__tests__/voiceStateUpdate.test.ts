import voiceStateUpdate from '../voiceStateUpdate';

const BOT_ID = 'bot-1';

function state(id: string, channelId: string | null) {
  return { id, channelId, guild: { id: 'guild-1' } };
}

describe('voiceStateUpdate', () => {
  const voice = { handleBotLeftVoice: jest.fn(async (_guildId: string) => undefined) };

  beforeEach(() => {
    voice.handleBotLeftVoice.mockClear();
  });

  it('closes the session when the bot is disconnected', async () => {
    await voiceStateUpdate.execute(state(BOT_ID, 'voice-1'), state(BOT_ID, null), voice, BOT_ID);
    expect(voice.handleBotLeftVoice).toHaveBeenCalledWith('guild-1');
  });

  it('ignores the bot moving between channels', async () => {
    await voiceStateUpdate.execute(state(BOT_ID, 'voice-1'), state(BOT_ID, 'voice-2'), voice, BOT_ID);
    expect(voice.handleBotLeftVoice).not.toHaveBeenCalled();
  });

  it('ignores other members', async () => {
    await voiceStateUpdate.execute(state('user-1', 'voice-1'), state('user-1', null), voice, BOT_ID);
    expect(voice.handleBotLeftVoice).not.toHaveBeenCalled();
  });
});
