import { REST, Routes, type RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import { commands } from '../commands';
import { createLogger } from './logger';
import { toErrorMessage } from './errors';

const log = createLogger('DEPLOY');

export function buildCommandPayload(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return commands.map((command) => command.data.toJSON());
}

/**
 * Deploy commands to Discord
 * @returns Number of commands Discord acknowledged
 */
export async function deployCommands(
  token: string,
  clientId: string,
  guildId: string | null = null,
  rest: Pick<REST, 'put'> = new REST().setToken(token)
): Promise<number> {
  const body = buildCommandPayload();
  const scope = guildId ? ` for guild ${guildId}` : ' globally';

  log.info(`Started refreshing ${body.length} application (/) commands${scope}...`);

  try {
    // Guild deploys update immediately; global ones take up to an hour to propagate
    const route = guildId
      ? Routes.applicationGuildCommands(clientId, guildId)
      : Routes.applicationCommands(clientId);
    const data = await rest.put(route, { body });
    const count = Array.isArray(data) ? data.length : 0;

    log.info(`Successfully reloaded ${count} application (/) commands${scope}.`);
    return count;
  } catch (error) {
    log.error(`Failed to deploy commands: ${toErrorMessage(error)}`);
    throw error;
  }
}
