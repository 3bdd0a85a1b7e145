import { EventEmitter } from 'events';
import { PassThrough, Readable } from 'stream';
import { StreamResolver, toStreamKind } from '../StreamResolver';
import type { ToolProcess, ToolRunner, ToolSpawner } from '../StreamResolver';

type PlayDlStream = { stream: Readable; type: string };

const mockPlayStream = jest.fn<Promise<PlayDlStream>, [string, { quality: number }]>();

jest.mock('play-dl', () => ({
  __esModule: true,
  default: {
    stream: (url: string, options: { quality: number }) => mockPlayStream(url, options),
  },
}));

const VIDEO = 'https://www.youtube.com/watch?v=dQw4w9WgXcQ';

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  killed = false;
  readonly kill = jest.fn(() => {
    this.killed = true;
    return true;
  });
}

const never = <T>(): Promise<T> => new Promise<T>(() => undefined);

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function createResolver(
  runTool: jest.MockedFunction<ToolRunner>,
  cookies?: string,
  spawnTool?: jest.MockedFunction<ToolSpawner>,
  openTimeoutMs: number = 1_000
) {
  let now = 0;
  const resolver = new StreamResolver({
    ytdlpPath: 'yt-dlp',
    ...(cookies ? { ytdlpCookies: cookies } : {}),
    streamUrlTtlMs: 60_000,
    openTimeoutMs,
    clock: () => now,
    runTool,
    ...(spawnTool ? { spawnTool } : {}),
  });
  return {
    resolver,
    setNow: (value: number) => {
      now = value;
    },
  };
}

describe('StreamResolver', () => {
  const signal = new AbortController().signal;

  describe('getStreamUrl', () => {
    it('extracts once and reuses the URL while it is valid', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      runTool.mockResolvedValue('https://cdn.test/audio-1\n');
      const { resolver, setNow } = createResolver(runTool);

      expect(await resolver.getStreamUrl(VIDEO, signal)).toBe('https://cdn.test/audio-1');
      setNow(59_999);
      expect(await resolver.getStreamUrl(VIDEO, signal)).toBe('https://cdn.test/audio-1');

      expect(runTool).toHaveBeenCalledTimes(1);
      expect(runTool).toHaveBeenCalledWith(
        'yt-dlp',
        [
          '--no-playlist',
          '--no-warnings',
          '--quiet',
          '--no-check-certificates',
          '-f',
          'bestaudio[acodec=opus]/bestaudio/best',
          '--get-url',
          VIDEO,
        ],
        expect.any(AbortSignal)
      );
    });

    it('re-extracts after the TTL', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      runTool
        .mockResolvedValueOnce('https://cdn.test/audio-1')
        .mockResolvedValueOnce('https://cdn.test/audio-2');
      const { resolver, setNow } = createResolver(runTool);

      await resolver.getStreamUrl(VIDEO, signal);
      setNow(60_000);

      expect(await resolver.getStreamUrl(VIDEO, signal)).toBe('https://cdn.test/audio-2');
      expect(runTool).toHaveBeenCalledTimes(2);
    });

    it('re-extracts after invalidate', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      runTool.mockResolvedValue('https://cdn.test/audio-1');
      const { resolver } = createResolver(runTool);

      await resolver.getStreamUrl(VIDEO, signal);
      resolver.invalidate(VIDEO);
      await resolver.getStreamUrl(VIDEO, signal);

      expect(runTool).toHaveBeenCalledTimes(2);
      expect(resolver.cacheSize).toBe(1);
    });

    it('passes the cookies file', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      runTool.mockResolvedValue('https://cdn.test/audio-1');
      const { resolver } = createResolver(runTool, '/tmp/cookies.txt');

      await resolver.getStreamUrl(VIDEO, signal);

      expect(runTool.mock.calls[0]?.[1]).toContain('--cookies');
      expect(runTool.mock.calls[0]?.[1]).toContain('/tmp/cookies.txt');
    });

    it('rejects empty output as an extractor failure', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      runTool.mockResolvedValue('  \n');
      const { resolver } = createResolver(runTool);

      await expect(resolver.getStreamUrl(VIDEO, signal)).rejects.toMatchObject({
        kind: 'external_tool_failure',
      });
      expect(resolver.cacheSize).toBe(0);
    });

    it('wraps tool errors', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      runTool.mockRejectedValue(new Error('spawn yt-dlp ENOENT'));
      const { resolver } = createResolver(runTool);

      await expect(resolver.getStreamUrl(VIDEO, signal)).rejects.toMatchObject({
        kind: 'external_tool_failure',
        message: 'yt-dlp failed: spawn yt-dlp ENOENT',
      });
    });
  });

  describe('open', () => {
    beforeEach(() => {
      mockPlayStream.mockReset();
    });

    function spawnerFor(child: FakeChild, firstBytes: boolean) {
      return jest.fn<ToolProcess, [string, string[]]>(() => {
        if (firstBytes) setImmediate(() => child.stdout.write('audio'));
        return child;
      });
    }

    it('falls back to play-dl when yt-dlp extraction fails', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      runTool.mockRejectedValue(new Error('HTTP Error 429'));
      mockPlayStream.mockResolvedValue({ stream: Readable.from(['x']), type: 'opus' });
      const spawnTool = spawnerFor(new FakeChild(), true);
      const { resolver } = createResolver(runTool, undefined, spawnTool);

      const opened = await resolver.open(VIDEO, signal);

      expect(opened.kind).toBe('opus');
      expect(mockPlayStream).toHaveBeenCalledWith(VIDEO, { quality: 2 });
      expect(spawnTool).not.toHaveBeenCalled();
      opened.close();
    });

    it('pipes yt-dlp output when play-dl fails too', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      runTool.mockRejectedValue(new Error('HTTP Error 429'));
      mockPlayStream.mockRejectedValue(new Error('Sign in to confirm your age'));
      const child = new FakeChild();
      const spawnTool = spawnerFor(child, true);
      const { resolver } = createResolver(runTool, undefined, spawnTool);

      const opened = await resolver.open(VIDEO, signal);

      expect(opened.stream).toBe(child.stdout);
      expect(opened.kind).toBe('arbitrary');
      expect(spawnTool.mock.calls[0]?.[1].slice(-3)).toEqual(['-o', '-', VIDEO]);

      opened.close();
      expect(child.kill).toHaveBeenCalledWith('SIGKILL');
    });

    it('pipes non-YouTube URLs straight away', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      const spawnTool = spawnerFor(new FakeChild(), true);
      const { resolver } = createResolver(runTool, undefined, spawnTool);

      await resolver.open('https://soundcloud.com/artist/song', signal);

      expect(runTool).not.toHaveBeenCalled();
      expect(mockPlayStream).not.toHaveBeenCalled();
      expect(spawnTool).toHaveBeenCalledTimes(1);
    });

    it('gives up with a timeout when every stage hangs', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>(() => never());
      mockPlayStream.mockImplementation(() => never());
      const child = new FakeChild();
      const { resolver } = createResolver(runTool, undefined, spawnerFor(child, false), 20);

      await expect(resolver.open(VIDEO, signal)).rejects.toMatchObject({
        kind: 'timeout',
        message: 'yt-dlp pipe timed out after 20ms',
      });
      expect(runTool.mock.calls[0]?.[2].aborted).toBe(true);
      expect(mockPlayStream).toHaveBeenCalledTimes(1);
      expect(child.kill).toHaveBeenCalledWith('SIGKILL');
    });

    it('reports a hung extraction as a timeout', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>(() => never());
      const { resolver } = createResolver(runTool, undefined, undefined, 20);

      await expect(resolver.getStreamUrl(VIDEO, signal)).rejects.toMatchObject({
        kind: 'timeout',
        message: 'yt-dlp timed out after 20ms',
      });
      expect(resolver.cacheSize).toBe(0);
    });

    it('releases a play-dl stream that arrives after its deadline', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      runTool.mockRejectedValue(new Error('HTTP Error 429'));
      const late = Readable.from(['x']);
      mockPlayStream.mockImplementation(
        () =>
          new Promise<PlayDlStream>((resolve) => {
            setTimeout(() => resolve({ stream: late, type: 'opus' }), 40);
          })
      );
      const child = new FakeChild();
      const { resolver } = createResolver(runTool, undefined, spawnerFor(child, true), 20);

      const opened = await resolver.open(VIDEO, signal);
      expect(opened.stream).toBe(child.stdout);

      await sleep(60);
      expect(late.destroyed).toBe(true);
    });

    it('cancels a pending pipe when the caller aborts', async () => {
      const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
      const child = new FakeChild();
      const { resolver } = createResolver(runTool, undefined, spawnerFor(child, false));
      const controller = new AbortController();

      const opening = resolver.open('https://soundcloud.com/artist/song', controller.signal);
      controller.abort();

      await expect(opening).rejects.toMatchObject({ kind: 'cancelled' });
      expect(child.kill).toHaveBeenCalledWith('SIGKILL');
    });
  });

  it('refuses to open with an aborted signal', async () => {
    const runTool = jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>();
    const { resolver } = createResolver(runTool);
    const controller = new AbortController();
    controller.abort();

    await expect(resolver.createSource(VIDEO).open(controller.signal)).rejects.toMatchObject({
      kind: 'cancelled',
    });
    expect(runTool).not.toHaveBeenCalled();
  });

  it('createSource keeps the URL', () => {
    const { resolver } = createResolver(jest.fn<ReturnType<ToolRunner>, Parameters<ToolRunner>>());

    expect(resolver.createSource(VIDEO).url).toBe(VIDEO);
  });

  it.each([
    ['opus', 'opus'],
    ['ogg/opus', 'ogg/opus'],
    ['webm/opus', 'webm/opus'],
    ['raw', 'raw'],
    ['arbitrary', 'arbitrary'],
    ['mp3', 'arbitrary'],
  ])('maps stream type %s to %s', (type, kind) => {
    expect(toStreamKind(type)).toBe(kind);
  });
});
