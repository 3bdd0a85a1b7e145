import { Events, type VoiceState } from 'discord.js';
import { createLogger } from '../utils/logger';
import type { VoiceManager } from '../utils/voiceManager';

const log = createLogger('VOICE-STATE-UPDATE');

export default {
  name: Events.VoiceStateUpdate as const,
  async execute(
    oldState: Pick<VoiceState, 'channelId' | 'id'>,
    newState: Pick<VoiceState, 'channelId' | 'id'> & { guild: { id: string } },
    voice: Pick<VoiceManager, 'handleBotLeftVoice'>,
    botUserId: string
  ): Promise<void> {
    // Only the bot's own voice state matters here
    if (newState.id !== botUserId) return;
    if (oldState.channelId === newState.channelId) return;

    if (oldState.channelId && !newState.channelId) {
      log.debug(`Bot left channel ${oldState.channelId} in guild ${newState.guild.id}`);
      await voice.handleBotLeftVoice(newState.guild.id);
    }
  },
};
