/**
 * In-memory cycle history, discarded with the session.
 */

import type { HistoryEntry } from '../types/models.js';
import type { IHistoryStore } from './IHistoryStore.js';

export class InMemoryHistoryStore implements IHistoryStore {
  private entries: Readonly<HistoryEntry>[] = [];
  private cycle = 1;

  async currentCycle(): Promise<number> {
    return this.cycle;
  }

  async append(entry: HistoryEntry): Promise<number> {
    this.entries.push(Object.freeze({ ...entry }));
    this.cycle = entry.cycle + 1;
    return this.cycle;
  }

  async list(): Promise<readonly HistoryEntry[]> {
    return [...this.entries];
  }

  async clear(): Promise<void> {
    this.entries = [];
    this.cycle = 1;
  }
}
