import { CommandError } from '../errors';

/**
 * Per-user gain for one session. Values are clamped into [min, max]; the
 * table lives and dies with its session.
 */
export class VolumeTable {
  private readonly gains = new Map<string, number>();

  constructor(
    readonly min: number,
    readonly max: number,
    private readonly defaultGain = 1.0
  ) {}

  clamp(gain: number): number {
    return Math.min(this.max, Math.max(this.min, gain));
  }

  /**
   * Store a user's gain and return the clamped value
   */
  set(userId: string, gain: number): number {
    if (Number.isNaN(gain)) {
      throw new CommandError('invalid_argument', 'Volume must be a number');
    }
    const clamped = this.clamp(gain);
    this.gains.set(userId, clamped);
    return clamped;
  }

  get(userId: string): number {
    return this.gains.get(userId) ?? this.clamp(this.defaultGain);
  }

  toRecord(): Readonly<Record<string, number>> {
    return Object.freeze(Object.fromEntries(this.gains));
  }
}
