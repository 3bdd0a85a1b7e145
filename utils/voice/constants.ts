/**
 * Voice engine constants
 */

/** Maximum number of cached stream URLs before LRU eviction */
export const MAX_CACHE_SIZE = 500;

/** Window in which a dropped voice connection must start signalling again */
export const RECONNECT_WINDOW_MS = 5_000;

/** Delay before a rejoin attempt, multiplied by the attempt number */
export const RECONNECT_BACKOFF_MS = 1_000;

/** Maximum entries shown in queue previews */
export const QUEUE_PREVIEW_SIZE = 5;

/** Discord select menus and jump lists cap at 25 options */
export const MAX_LIST_OPTIONS = 25;

export default {
  MAX_CACHE_SIZE,
  RECONNECT_WINDOW_MS,
  RECONNECT_BACKOFF_MS,
  QUEUE_PREVIEW_SIZE,
  MAX_LIST_OPTIONS,
};
