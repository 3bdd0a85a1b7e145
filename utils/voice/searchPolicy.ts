/**
 * Ranking policies for free-text searches. The resolver asks the extractor for
 * `candidates` results and lets the policy pick one.
 */

export interface MediaInfo {
  title: string;
  url: string;
  /** Seconds, 0 when unknown */
  duration: number;
  thumbnail?: string;
}

export interface SearchRankingPolicy {
  readonly name: string;
  readonly candidates: number;
  pick: (query: string, results: readonly MediaInfo[]) => MediaInfo | undefined;
}

/**
 * Take whatever the extractor lists first
 */
export const firstResult: SearchRankingPolicy = {
  name: 'first-result',
  candidates: 1,
  pick: (_query, results) => results[0],
};

/**
 * First result no longer than `maxSeconds`; skips hour-long compilations and
 * live streams (duration 0). Falls back to the first result.
 */
export function preferDurationWithin(maxSeconds: number, candidates = 5): SearchRankingPolicy {
  return {
    name: `duration-within-${maxSeconds}s`,
    candidates,
    pick: (_query, results) =>
      results.find((result) => result.duration > 0 && result.duration <= maxSeconds) ?? results[0],
  };
}
