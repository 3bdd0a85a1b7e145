import type { CommandReply } from '../../types/commands';
import { MusicError, toErrorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const log = createLogger('COMMANDS');

export const NOT_IN_VOICE = '❌ You need to be in a voice channel to use this command.';

export function success(content: string): CommandReply {
  return { content };
}

export function failure(content: string): CommandReply {
  return { content, ephemeral: true };
}

/**
 * Turn a rejected command into an ephemeral reply. Errors outside the music
 * taxonomy are logged since they point at a bug rather than a user mistake.
 */
export function replyForError(command: string, error: unknown): CommandReply {
  if (!(error instanceof MusicError)) {
    log.error(`/${command} failed: ${toErrorMessage(error)}`, {
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
  return failure(`❌ ${toErrorMessage(error)}`);
}
