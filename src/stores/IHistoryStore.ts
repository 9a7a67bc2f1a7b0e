/**
 * Assessment cycle history.
 * Append-only: entries are frozen once recorded.
 */

import type { HistoryEntry } from '../types/models.js';

export interface IHistoryStore {
  /** Number of the cycle currently in progress (starts at 1). */
  currentCycle(): Promise<number>;

  /** Record a finished cycle and advance to the next one. Returns the new cycle number. */
  append(entry: HistoryEntry): Promise<number>;

  list(): Promise<readonly HistoryEntry[]>;

  /** Drop all history and restart at cycle 1. */
  clear(): Promise<void>;
}
