import type { SettlementWindow } from '@netsettle/core';

import type { WindowOptions } from './schemas.js';

/** Window length used when `--start` is omitted */
export const DEFAULT_WINDOW_DAYS = 2;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * `--end` defaults to now, `--start` to two days before the end.
 */
export function resolveWindow(options: WindowOptions, now: Date = new Date()): SettlementWindow {
  const end = options.end ?? now;
  const start = options.start ?? new Date(end.getTime() - DEFAULT_WINDOW_DAYS * DAY_MS);
  return { start, end };
}
