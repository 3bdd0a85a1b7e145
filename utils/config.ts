import { createLogger } from './logger';

const log = createLogger('CONFIG');

// Cache the config so we only load/log once
let cachedConfig: AppConfig | null = null;

export interface PlaybackConfig {
  /** Idle sessions older than this are swept */
  idleTimeoutMs: number;
  idleSweepIntervalMs: number;
  /** Consecutive track failures before a session halts into idle */
  maxConsecutiveFailures: number;
  volumeMin: number;
  volumeMax: number;
  resolveTimeoutMs: number;
  voiceConnectTimeoutMs: number;
  voiceReconnectAttempts: number;
  /** How long an extracted stream URL is trusted before re-extraction */
  streamUrlTtlMs: number;
}

export interface AppConfig {
  // Bot configuration
  token: string | undefined;
  clientId: string | undefined;
  guildId: string | undefined;
  disableAutoDeploy: boolean;

  // Spotify configuration
  spotifyClientId: string | undefined;
  spotifyClientSecret: string | undefined;
  spotifyRefreshToken: string | undefined;
  spotifyMarket: string;

  // Extraction tool
  ytdlpPath: string;
  ytdlpCookies: string | undefined;

  playback: PlaybackConfig;
}

export const DEFAULT_PLAYBACK_CONFIG: PlaybackConfig = {
  idleTimeoutMs: 5 * 60 * 1000,
  idleSweepIntervalMs: 30 * 1000,
  maxConsecutiveFailures: 3,
  volumeMin: 0,
  volumeMax: 2,
  resolveTimeoutMs: 15 * 1000,
  voiceConnectTimeoutMs: 10 * 1000,
  voiceReconnectAttempts: 3,
  streamUrlTtlMs: 2 * 60 * 60 * 1000,
};

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  opts: { min?: number; integer?: boolean } = {}
): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  const invalid =
    !Number.isFinite(value) ||
    (opts.integer === true && !Number.isInteger(value)) ||
    (opts.min !== undefined && value < opts.min);

  if (invalid) {
    log.warn(`Ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBoolean(env: Env, key: string): boolean {
  const raw = readString(env, key)?.toLowerCase();
  return raw === 'true' || raw === '1' || raw === 'yes';
}

/**
 * Build configuration from an environment map. Pure apart from warnings.
 */
export function parseConfig(env: Env): AppConfig {
  const d = DEFAULT_PLAYBACK_CONFIG;

  let volumeMin = readNumber(env, 'VOLUME_MIN', d.volumeMin, { min: 0 });
  let volumeMax = readNumber(env, 'VOLUME_MAX', d.volumeMax, { min: 0 });
  if (volumeMin > volumeMax) {
    log.warn(`VOLUME_MIN (${volumeMin}) exceeds VOLUME_MAX (${volumeMax}), using defaults`);
    volumeMin = d.volumeMin;
    volumeMax = d.volumeMax;
  }

  return {
    token: readString(env, 'DISCORD_TOKEN'),
    clientId: readString(env, 'DISCORD_CLIENT_ID'),
    guildId: readString(env, 'DISCORD_GUILD_ID'),
    disableAutoDeploy: readBoolean(env, 'DISABLE_AUTO_DEPLOY'),

    spotifyClientId: readString(env, 'SPOTIFY_CLIENT_ID'),
    spotifyClientSecret: readString(env, 'SPOTIFY_CLIENT_SECRET'),
    spotifyRefreshToken: readString(env, 'SPOTIFY_REFRESH_TOKEN'),
    spotifyMarket: readString(env, 'SPOTIFY_MARKET') ?? 'US',

    ytdlpPath: readString(env, 'YTDLP_PATH') ?? 'yt-dlp',
    ytdlpCookies: readString(env, 'YTDLP_COOKIES'),

    playback: {
      idleTimeoutMs: readNumber(env, 'IDLE_TIMEOUT_MS', d.idleTimeoutMs, { min: 1000 }),
      idleSweepIntervalMs: readNumber(env, 'IDLE_SWEEP_INTERVAL_MS', d.idleSweepIntervalMs, {
        min: 1000,
      }),
      maxConsecutiveFailures: readNumber(env, 'MAX_CONSECUTIVE_FAILURES', d.maxConsecutiveFailures, {
        min: 1,
        integer: true,
      }),
      volumeMin,
      volumeMax,
      resolveTimeoutMs: readNumber(env, 'RESOLVE_TIMEOUT_MS', d.resolveTimeoutMs, { min: 100 }),
      voiceConnectTimeoutMs: readNumber(env, 'VOICE_CONNECT_TIMEOUT_MS', d.voiceConnectTimeoutMs, {
        min: 100,
      }),
      voiceReconnectAttempts: readNumber(env, 'VOICE_RECONNECT_ATTEMPTS', d.voiceReconnectAttempts, {
        min: 0,
        integer: true,
      }),
      streamUrlTtlMs: readNumber(env, 'STREAM_URL_TTL_MS', d.streamUrlTtlMs, { min: 0 }),
    },
  };
}

/**
 * Load configuration from environment variables (.env file or process.env)
 * dotenv is loaded in index.ts before this module is required
 * Results are cached to avoid duplicate logging
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = parseConfig(process.env);

  log.info(
    `Loaded config: hasToken=${!!cachedConfig.token}, clientId=${cachedConfig.clientId ?? 'unset'}, ` +
      `spotify=${cachedConfig.spotifyClientId ? 'configured' : 'disabled'}`
  );
  log.debug(`Playback settings: ${JSON.stringify(cachedConfig.playback)}`);

  return cachedConfig;
}
