/**
 * Centralized component handler system
 */

import type {
  ButtonContext,
  ButtonHandler,
  ButtonHandlerResult,
  PlayerButtonInteraction,
} from '../types/buttons';
import { createLogger } from '../utils/logger';
import { toErrorMessage } from '../utils/errors';
import { parseButtonId } from '../components/builders/buttonBuilder';

const log = createLogger('BUTTON_HANDLER');

/**
 * What every dispatched component interaction carries
 */
export interface ComponentInteraction {
  customId: string;
  guildId: string | null;
  user: { id: string; tag: string };
}

export type ComponentHandler<I extends ComponentInteraction> = (
  interaction: I,
  context: ButtonContext
) => Promise<ButtonHandlerResult>;

export interface ComponentRegistry<I extends ComponentInteraction> {
  register(customId: string, handler: ComponentHandler<I>): void;
  handle(interaction: I, voiceChannelId: string | null): Promise<ButtonHandlerResult>;
  clear(): void;
  ids(): string[];
}

/**
 * Registry of handlers keyed by full custom ID
 * @param kind Component name used in logs and errors
 */
export function createComponentRegistry<I extends ComponentInteraction>(
  kind: string
): ComponentRegistry<I> {
  const handlers = new Map<string, ComponentHandler<I>>();

  return {
    register(customId, handler) {
      if (handlers.has(customId)) {
        log.warn(`Overwriting existing handler for ${kind}: ${customId}`);
      }
      handlers.set(customId, handler);
      log.debug(`Registered ${kind} handler: ${customId}`);
    },

    async handle(interaction, voiceChannelId) {
      const startTime = Date.now();
      const { customId } = interaction;
      const { prefix, action } = parseButtonId(customId);

      log.debug(`${kind} used: ${prefix}/${action} by ${interaction.user.tag}`);

      const handler = handlers.get(customId);
      if (!handler) {
        log.warn(`No handler registered for ${kind}: ${customId}`);
        return { success: false, error: `No handler found for ${kind}: ${customId}` };
      }

      if (!interaction.guildId) {
        return { success: false, error: 'No guild ID' };
      }

      try {
        const result = await handler(interaction, {
          guildId: interaction.guildId,
          userId: interaction.user.id,
          voiceChannelId,
        });
        log.debug(`${kind} handled: ${customId} in ${Date.now() - startTime}ms`, {
          success: result.success,
          error: result.error,
        });
        return result;
      } catch (error) {
        log.error(`Error handling ${kind} interaction: ${toErrorMessage(error)}`, {
          customId,
          duration: Date.now() - startTime,
          stack: error instanceof Error ? error.stack : undefined,
        });
        return { success: false, error: toErrorMessage(error) };
      }
    },

    clear() {
      handlers.clear();
    },

    ids() {
      return Array.from(handlers.keys());
    },
  };
}

const buttons = createComponentRegistry<PlayerButtonInteraction>('button');

export function registerButtonHandler(customId: string, handler: ButtonHandler): void {
  buttons.register(customId, handler);
}

/**
 * Main button interaction handler
 * @param voiceChannelId Voice channel the presser is in
 */
export async function handleButtonInteraction(
  interaction: PlayerButtonInteraction,
  voiceChannelId: string | null
): Promise<ButtonHandlerResult> {
  return buttons.handle(interaction, voiceChannelId);
}

/**
 * Clear all registered handlers (useful for testing)
 */
export function clearAllHandlers(): void {
  buttons.clear();
}

export function getRegisteredButtonIds(): string[] {
  return buttons.ids();
}
