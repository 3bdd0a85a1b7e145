/**
 * Checks and error replies shared by the player panel controls
 */

import { MessageFlags } from 'discord.js';
import type { ButtonHandlerResult, PlayerReply } from '../types/buttons';
import { createLogger } from '../utils/logger';
import { CommandError, MusicError, toErrorMessage } from '../utils/errors';
import type { VoiceManager } from '../utils/voiceManager';

const log = createLogger('PLAYER_ACCESS');

interface Replyable {
  reply(payload: PlayerReply): Promise<unknown>;
}

/**
 * Report a failed control privately. Errors outside the music taxonomy are
 * logged as bugs.
 */
export async function replyError(
  interaction: Replyable,
  action: string,
  error: unknown
): Promise<ButtonHandlerResult> {
  const message = toErrorMessage(error);
  if (!(error instanceof MusicError)) {
    log.error(`${action} control error: ${message}`);
  }
  try {
    await interaction.reply({ content: `❌ ${message}`, flags: MessageFlags.Ephemeral });
  } catch (replyError) {
    log.warn(`Could not report ${action} failure: ${toErrorMessage(replyError)}`);
  }
  return { success: false, error: message };
}

/**
 * Only listeners may drive the panel: the user must be in a voice channel,
 * and in the bot's channel once the bot has joined one.
 * @returns The refusal, or null when the user may proceed
 */
export function checkPlayerAccess(
  voice: Pick<VoiceManager, 'getSnapshot'>,
  guildId: string,
  memberChannelId: string | null
): CommandError | null {
  if (!memberChannelId) {
    return new CommandError('invalid_state', 'Join a voice channel first', guildId);
  }
  const botChannelId = voice.getSnapshot(guildId)?.voiceChannelId ?? null;
  if (botChannelId && botChannelId !== memberChannelId) {
    return new CommandError('invalid_state', `Be in <#${botChannelId}> to use the player`, guildId);
  }
  return null;
}
