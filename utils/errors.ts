/**
 * Error taxonomy for the playback engine.
 * Resolution and stream errors stay inside a session; command and concurrency
 * errors are returned to the caller as rejected commands.
 */

export class MusicError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly guildId?: string
  ) {
    super(message);
    this.name = 'MusicError';
    Object.setPrototypeOf(this, MusicError.prototype);
  }

  toJSON(): { error: string; code: string; guildId?: string } {
    return {
      error: this.message,
      code: this.code,
      ...(this.guildId ? { guildId: this.guildId } : {}),
    };
  }
}

export type ResolutionErrorKind = 'timeout' | 'not_found' | 'external_tool_failure';

export class ResolutionError extends MusicError {
  constructor(
    public readonly kind: ResolutionErrorKind,
    message: string,
    public readonly query?: string
  ) {
    super(message, `RESOLUTION_${kind.toUpperCase()}`);
    this.name = 'ResolutionError';
    Object.setPrototypeOf(this, ResolutionError.prototype);
  }
}

export type StreamErrorKind = 'connection_lost' | 'decode_failure' | 'cancelled';

export class StreamError extends MusicError {
  constructor(
    public readonly kind: StreamErrorKind,
    message: string,
    guildId?: string
  ) {
    super(message, `STREAM_${kind.toUpperCase()}`, guildId);
    this.name = 'StreamError';
    Object.setPrototypeOf(this, StreamError.prototype);
  }
}

export type CommandErrorKind = 'invalid_state' | 'invalid_argument';

export class CommandError extends MusicError {
  constructor(
    public readonly kind: CommandErrorKind,
    message: string,
    guildId?: string
  ) {
    super(message, `COMMAND_${kind.toUpperCase()}`, guildId);
    this.name = 'CommandError';
    Object.setPrototypeOf(this, CommandError.prototype);
  }
}

export type ConcurrencyErrorKind = 'session_already_stopped';

export class ConcurrencyError extends MusicError {
  constructor(
    public readonly kind: ConcurrencyErrorKind,
    message: string,
    guildId?: string
  ) {
    super(message, `CONCURRENCY_${kind.toUpperCase()}`, guildId);
    this.name = 'ConcurrencyError';
    Object.setPrototypeOf(this, ConcurrencyError.prototype);
  }
}

/**
 * Normalize any thrown value into a printable message
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
