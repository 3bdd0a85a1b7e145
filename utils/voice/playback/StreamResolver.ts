// util-category: audio
import play from 'play-dl';
import { execFile, spawn } from 'child_process';
import { Readable } from 'stream';
import { createLogger } from '../../logger';
import { ResolutionError, StreamError, toErrorMessage } from '../../errors';
import { MAX_CACHE_SIZE } from '../constants';
import { toCanonicalYouTubeUrl } from '../trackMetadata';
import type { AudioStreamKind, OpenedStream, StreamSource } from '../../../types/voice';
import type { Clock } from '../../../types/common';

const log = createLogger('STREAM_RESOLVER');

const AUDIO_FORMAT = 'bestaudio[acodec=opus]/bestaudio/best';

/**
 * Runs an external tool and resolves with its stdout
 */
export type ToolRunner = (file: string, args: string[], signal: AbortSignal) => Promise<string>;

export const runTool: ToolRunner = (file, args, signal) =>
  new Promise((resolve, reject) => {
    execFile(file, args, { signal, maxBuffer: 1024 * 1024 }, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });

/**
 * The parts of a spawned yt-dlp process the pipe fallback uses
 */
export interface ToolProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly killed: boolean;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null) => void): unknown;
  off(event: 'error', listener: (err: Error) => void): unknown;
  off(event: 'close', listener: (code: number | null) => void): unknown;
}

export type ToolSpawner = (file: string, args: string[]) => ToolProcess;

export const spawnTool: ToolSpawner = (file, args) =>
  spawn(file, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export interface StreamResolverOptions {
  ytdlpPath: string;
  ytdlpCookies?: string;
  /** How long an extracted stream URL stays usable */
  streamUrlTtlMs: number;
  /** Deadline for each way of opening a stream */
  openTimeoutMs: number;
  clock?: Clock;
  runTool?: ToolRunner;
  spawnTool?: ToolSpawner;
}

interface CacheEntry {
  url: string;
  expires: number;
}

/**
 * Map play-dl's stream type onto the transport's stream kinds
 */
export function toStreamKind(type: string): AudioStreamKind {
  switch (type) {
    case 'opus':
    case 'raw':
    case 'ogg/opus':
    case 'webm/opus':
      return type;
    default:
      return 'arbitrary';
  }
}

function cancelled(): StreamError {
  return new StreamError('cancelled', 'Stream opening was cancelled');
}

interface Deadline {
  /** Aborts when the caller cancels or the deadline passes */
  signal: AbortSignal;
  expired(): boolean;
  clear(): void;
}

function startDeadline(parent: AbortSignal, ms: number): Deadline {
  const controller = new AbortController();
  let expired = false;
  const onAbort = () => controller.abort();
  if (parent.aborted) controller.abort();
  else parent.addEventListener('abort', onAbort, { once: true });
  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, ms);

  return {
    signal: controller.signal,
    expired: () => expired,
    clear: () => {
      clearTimeout(timer);
      parent.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Settle with `work`, or reject as soon as `signal` aborts. A result that
 * arrives after the abort goes to `onLate` so it can be released.
 */
function untilAborted<T>(
  work: Promise<T>,
  signal: AbortSignal,
  onLate?: (value: T) => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('aborted'));
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        if (signal.aborted) onLate?.(value);
        else resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Opens incremental audio streams for media URLs.
 *
 * YouTube URLs are extracted once with yt-dlp and the direct stream URL is
 * cached for `streamUrlTtlMs`, so re-opening a looping track reuses it. When
 * the direct fetch fails the resolver falls back to play-dl, and finally to
 * piping yt-dlp's output. Every stage gets `openTimeoutMs`; a stage that
 * overruns fails with a `timeout` resolution error and the next one runs.
 */
export class StreamResolver {
  private readonly urlCache = new Map<string, CacheEntry>();
  private readonly clock: Clock;
  private readonly run: ToolRunner;
  private readonly spawn: ToolSpawner;

  constructor(private readonly options: StreamResolverOptions) {
    this.clock = options.clock ?? Date.now;
    this.run = options.runTool ?? runTool;
    this.spawn = options.spawnTool ?? spawnTool;
  }

  createSource(url: string): StreamSource {
    return {
      url,
      open: (signal) => this.open(url, signal),
    };
  }

  async open(url: string, signal: AbortSignal): Promise<OpenedStream> {
    if (signal.aborted) throw cancelled();

    const canonical = toCanonicalYouTubeUrl(url);
    if (canonical) {
      try {
        return await this.openDirect(canonical, signal);
      } catch (error) {
        if (signal.aborted) throw cancelled();
        log.warn(`Direct stream failed for ${canonical}: ${toErrorMessage(error)}, trying play-dl`);
      }

      try {
        return await this.openWithPlayDl(canonical, signal);
      } catch (error) {
        if (signal.aborted) throw cancelled();
        log.warn(`play-dl failed for ${canonical}: ${toErrorMessage(error)}, piping yt-dlp`);
      }
    }

    return this.openWithYtDlpPipe(canonical ?? url, signal);
  }

  /**
   * Direct stream URL from yt-dlp, cached until it expires
   */
  async getStreamUrl(videoUrl: string, signal: AbortSignal): Promise<string> {
    const cached = this.urlCache.get(videoUrl);
    if (cached && cached.expires > this.clock()) {
      log.debug(`Using cached stream URL for ${videoUrl}`);
      // Refresh LRU position
      this.urlCache.delete(videoUrl);
      this.urlCache.set(videoUrl, cached);
      return cached.url;
    }

    const deadline = startDeadline(signal, this.options.openTimeoutMs);
    let output: string;
    try {
      output = await untilAborted(
        this.run(
          this.options.ytdlpPath,
          [...this.baseArgs(), '-f', AUDIO_FORMAT, '--get-url', videoUrl],
          deadline.signal
        ),
        deadline.signal
      );
    } catch (error) {
      throw this.stageFailure('yt-dlp', videoUrl, error, signal, deadline);
    } finally {
      deadline.clear();
    }

    const streamUrl = output.trim().split('\n')[0]?.trim() ?? '';
    if (!streamUrl) {
      throw new ResolutionError('external_tool_failure', 'yt-dlp returned no stream URL', videoUrl);
    }

    // LRU eviction if cache is too large
    if (this.urlCache.size >= MAX_CACHE_SIZE) {
      const oldestKey = this.urlCache.keys().next().value;
      if (oldestKey !== undefined) this.urlCache.delete(oldestKey);
    }

    this.urlCache.set(videoUrl, { url: streamUrl, expires: this.clock() + this.options.streamUrlTtlMs });
    return streamUrl;
  }

  invalidate(videoUrl: string): void {
    this.urlCache.delete(videoUrl);
  }

  get cacheSize(): number {
    return this.urlCache.size;
  }

  private stageFailure(
    stage: string,
    url: string,
    error: unknown,
    signal: AbortSignal,
    deadline: Deadline
  ): Error {
    if (signal.aborted) return cancelled();
    if (deadline.expired()) {
      return new ResolutionError(
        'timeout',
        `${stage} timed out after ${this.options.openTimeoutMs}ms`,
        url
      );
    }
    if (error instanceof ResolutionError) return error;
    return new ResolutionError('external_tool_failure', `${stage} failed: ${toErrorMessage(error)}`, url);
  }

  private baseArgs(): string[] {
    const args = ['--no-playlist', '--no-warnings', '--quiet', '--no-check-certificates'];
    if (this.options.ytdlpCookies) {
      args.push('--cookies', this.options.ytdlpCookies);
    }
    return args;
  }

  private async openDirect(videoUrl: string, signal: AbortSignal): Promise<OpenedStream> {
    const streamUrl = await this.getStreamUrl(videoUrl, signal);

    const deadline = startDeadline(signal, this.options.openTimeoutMs);
    try {
      const response = await fetch(streamUrl, {
        signal: deadline.signal,
        headers: {
          Accept: '*/*',
          'Accept-Encoding': 'identity',
          Range: 'bytes=0-',
        },
      });

      if (!response.ok || !response.body) {
        // Expired or blocked URL
        if (response.status === 403) {
          this.invalidate(videoUrl);
        }
        throw new Error(`HTTP ${response.status}`);
      }

      const nodeStream = Readable.fromWeb(response.body as Parameters<typeof Readable.fromWeb>[0]);
      nodeStream.on('error', (err) => {
        log.debug(`Stream error (expected on skip/stop): ${err.message}`);
      });

      return {
        stream: nodeStream,
        kind: 'arbitrary',
        close: () => nodeStream.destroy(),
      };
    } catch (error) {
      throw this.stageFailure('Stream fetch', videoUrl, error, signal, deadline);
    } finally {
      // Only bounds the wait for headers, the body keeps streaming
      deadline.clear();
    }
  }

  private async openWithPlayDl(url: string, signal: AbortSignal): Promise<OpenedStream> {
    const deadline = startDeadline(signal, this.options.openTimeoutMs);
    let info: Awaited<ReturnType<typeof play.stream>>;
    try {
      info = await untilAborted(play.stream(url, { quality: 2 }), deadline.signal, (late) =>
        late.stream.destroy()
      );
    } catch (error) {
      throw this.stageFailure('play-dl', url, error, signal, deadline);
    } finally {
      deadline.clear();
    }
    return {
      stream: info.stream,
      kind: toStreamKind(info.type),
      close: () => info.stream.destroy(),
    };
  }

  private async openWithYtDlpPipe(url: string, signal: AbortSignal): Promise<OpenedStream> {
    const child = this.spawn(this.options.ytdlpPath, [
      ...this.baseArgs(),
      '-f',
      AUDIO_FORMAT,
      '-o',
      '-',
      url,
    ]);

    child.stderr.on('data', (data: Buffer) => {
      const msg = data.toString().trim();
      if (msg && !msg.includes('Broken pipe')) {
        log.debug(`yt-dlp: ${msg}`);
      }
    });
    child.stdout.on('error', (err) => {
      log.debug(`yt-dlp stdout error (expected on skip/stop): ${err.message}`);
    });

    const kill = () => {
      if (child.exitCode === null && !child.killed) child.kill('SIGKILL');
    };

    // Wait for the first bytes so a broken URL fails here, not mid-transmission
    const deadline = startDeadline(signal, this.options.openTimeoutMs);
    await new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        child.stdout.off('readable', onReadable);
        child.off('error', onError);
        child.off('close', onClose);
        deadline.signal.removeEventListener('abort', onAbort);
        deadline.clear();
      };
      const onReadable = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new ResolutionError('external_tool_failure', `yt-dlp failed: ${err.message}`, url));
      };
      const onClose = (code: number | null) => {
        cleanup();
        reject(
          new ResolutionError('external_tool_failure', `yt-dlp exited with code ${code}`, url)
        );
      };
      const onAbort = () => {
        cleanup();
        kill();
        reject(this.stageFailure('yt-dlp pipe', url, null, signal, deadline));
      };

      child.stdout.once('readable', onReadable);
      child.once('error', onError);
      child.once('close', onClose);
      if (deadline.signal.aborted) onAbort();
      else deadline.signal.addEventListener('abort', onAbort, { once: true });
    });

    return {
      stream: child.stdout,
      kind: 'arbitrary',
      close: () => {
        child.stdout.destroy();
        kill();
      },
    };
  }
}
