import winston from 'winston';
import { createLogger, sanitizeLogMessage } from '../logger';

// Mock winston to capture log calls
jest.mock('winston', () => {
  const mockLogger = {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    http: jest.fn(),
    debug: jest.fn(),
  };

  return {
    createLogger: jest.fn(() => mockLogger),
    format: {
      combine: jest.fn((...args: unknown[]) => args),
      timestamp: jest.fn((opts: unknown) => opts),
      printf: jest.fn((fn: unknown) => fn),
      colorize: jest.fn((opts: unknown) => opts),
      errors: jest.fn((opts: unknown) => opts),
    },
    transports: {
      Console: jest.fn(),
      File: jest.fn(),
    },
    addColors: jest.fn(),
  };
});

const FAKE_TOKEN = `${'a'.repeat(24)}.bcdefg.${'h'.repeat(27)}`;

describe('logger', () => {
  const sink = winston.createLogger();

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('createLogger', () => {
    it('logs each level with its context', () => {
      const logger = createLogger('LEVEL_TEST');

      logger.error('error message');
      logger.warn('warn message');
      logger.info('info message');
      logger.http('http message');
      logger.debug('debug message');

      expect(sink.error).toHaveBeenCalledWith('error message', { context: 'LEVEL_TEST' });
      expect(sink.warn).toHaveBeenCalledWith('warn message', { context: 'LEVEL_TEST' });
      expect(sink.info).toHaveBeenCalledWith('info message', { context: 'LEVEL_TEST' });
      expect(sink.http).toHaveBeenCalledWith('http message', { context: 'LEVEL_TEST' });
      expect(sink.debug).toHaveBeenCalledWith('debug message', { context: 'LEVEL_TEST' });
    });

    it('includes additional metadata in log messages', () => {
      const logger = createLogger('META_TEST');

      logger.info('Test with metadata', { guildId: '123', action: 'skip' });

      expect(sink.info).toHaveBeenCalledWith('Test with metadata', {
        context: 'META_TEST',
        guildId: '123',
        action: 'skip',
      });
    });

    it('masks bot tokens before writing', () => {
      const logger = createLogger('TOKEN_TEST');

      logger.error(`Request failed with Bot ${FAKE_TOKEN}`);

      expect(sink.error).toHaveBeenCalledWith(`Request failed with Bot ${'a'.repeat(24)}.****.****`, {
        context: 'TOKEN_TEST',
      });
    });

    it('creates different logger instances for different contexts', () => {
      expect(createLogger('CONTEXT_1')).not.toBe(createLogger('CONTEXT_2'));
    });
  });

  describe('sanitizeLogMessage', () => {
    it('does not modify messages without sensitive data', () => {
      expect(sanitizeLogMessage('Joined voice channel 123456789012345678')).toBe(
        'Joined voice channel 123456789012345678'
      );
    });

    it('masks every token in a message', () => {
      expect(sanitizeLogMessage(`${FAKE_TOKEN} and ${FAKE_TOKEN}`)).toBe(
        `${'a'.repeat(24)}.****.**** and ${'a'.repeat(24)}.****.****`
      );
    });
  });
});
