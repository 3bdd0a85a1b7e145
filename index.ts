// Load environment variables before anything reads them
import 'dotenv/config';

import { Client, Events, GatewayIntentBits } from 'discord.js';
import { loadConfig } from './utils/config';
import { createLogger } from './utils/logger';
import { StreamError, toErrorMessage } from './utils/errors';
import { deployCommands } from './utils/deployCommands';
import { VoiceManager } from './utils/voiceManager';
import { NowPlayingPanel } from './utils/nowPlayingPanel';
import {
  DiscordTransmissionDriver,
  PlayDlExtractor,
  SessionRegistry,
  StreamResolver,
  TrackResolver,
} from './utils/voice';
import { initializeButtonHandlers } from './handlers/buttonRegistry';
import interactionCreate from './events/interactionCreate';
import voiceStateUpdate from './events/voiceStateUpdate';

const log = createLogger('MAIN');

async function main(): Promise<void> {
  const config = loadConfig();

  if (!config.token || !config.clientId) {
    log.error('❌ CRITICAL: DISCORD_TOKEN and DISCORD_CLIENT_ID are required.');
    log.error('   Copy .env.example to .env, fill them in and restart.');
    process.exitCode = 1;
    return;
  }
  const { token, clientId } = config;

  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
  });

  const extractor = new PlayDlExtractor();
  extractor.configureSpotify({
    clientId: config.spotifyClientId,
    clientSecret: config.spotifyClientSecret,
    refreshToken: config.spotifyRefreshToken,
    market: config.spotifyMarket,
  });

  const streams = new StreamResolver({
    ytdlpPath: config.ytdlpPath,
    ytdlpCookies: config.ytdlpCookies,
    streamUrlTtlMs: config.playback.streamUrlTtlMs,
    openTimeoutMs: config.playback.resolveTimeoutMs,
  });
  const resolver = new TrackResolver({
    extractor,
    streams,
    timeoutMs: config.playback.resolveTimeoutMs,
  });

  const registry = new SessionRegistry({
    playback: config.playback,
    createDriver: (guildId) =>
      new DiscordTransmissionDriver({
        guildId,
        connectTimeoutMs: config.playback.voiceConnectTimeoutMs,
        reconnectAttempts: config.playback.voiceReconnectAttempts,
        getAdapterCreator: () => {
          const guild = client.guilds.cache.get(guildId);
          if (!guild) {
            throw new StreamError('connection_lost', `Guild ${guildId} is not available`, guildId);
          }
          return guild.voiceAdapterCreator;
        },
      }),
  });

  const voice = new VoiceManager({ registry, resolver });
  const panel = new NowPlayingPanel({ source: voice });
  initializeButtonHandlers(voice);

  client.on(interactionCreate.name, (interaction) => {
    void interactionCreate.execute(interaction, { voice, panel }).catch((error: unknown) => {
      log.error(`Interaction handler failed: ${toErrorMessage(error)}`);
    });
  });

  client.on(voiceStateUpdate.name, (oldState, newState) => {
    void voiceStateUpdate
      .execute(oldState, newState, voice, client.user?.id ?? '')
      .catch((error: unknown) => {
        log.error(`Error handling voice state update: ${toErrorMessage(error)}`);
      });
  });

  client.once(Events.ClientReady, (ready) => {
    log.info(`Logged in as ${ready.user.tag}`);
    registry.start();

    if (config.disableAutoDeploy) {
      log.info('Auto-deploy disabled, skipping command registration');
      return;
    }
    deployCommands(token, clientId, config.guildId ?? null).catch((error: unknown) => {
      log.warn(`Command deployment failed, existing commands stay registered: ${toErrorMessage(error)}`);
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down...`);

    panel.dispose();
    await registry.shutdown();
    await client.destroy();
    log.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .catch((error: unknown) => {
          log.error(`Shutdown failed: ${toErrorMessage(error)}`);
          process.exitCode = 1;
        })
        .finally(() => process.exit());
    });
  }

  await client.login(token);
}

process.on('unhandledRejection', (error) => {
  log.error(`Unhandled promise rejection: ${toErrorMessage(error)}`, {
    stack: error instanceof Error ? error.stack : undefined,
  });
});

process.on('uncaughtException', (error) => {
  log.error(`Uncaught exception: ${error.message}`, { stack: error.stack });
});

main().catch((error: unknown) => {
  log.error(`Failed to start: ${toErrorMessage(error)}`);
  process.exit(1);
});
