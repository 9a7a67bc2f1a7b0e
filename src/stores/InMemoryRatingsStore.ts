/**
 * In-memory ratings store.
 * Holds the session's ratings in a Map; every read hands out copies,
 * so an export never observes a half-applied edit.
 */

import type { Rating, RatingField } from '../types/models.js';
import type { IRatingsStore } from './IRatingsStore.js';

export class InMemoryRatingsStore implements IRatingsStore {
  private ratings = new Map<string, Rating>();

  async seed(ratings: readonly Rating[]): Promise<void> {
    this.ratings = new Map(ratings.map((r) => [r.code, { ...r }]));
  }

  async findByCode(code: string): Promise<Rating | null> {
    const rating = this.ratings.get(code);
    return rating ? { ...rating } : null;
  }

  async findAll(): Promise<Rating[]> {
    return Array.from(this.ratings.values(), (r) => ({ ...r }));
  }

  async updateField<F extends RatingField>(
    code: string,
    field: F,
    value: Rating[F]
  ): Promise<Rating | null> {
    const existing = this.ratings.get(code);
    if (!existing) return null;

    const updated: Rating = { ...existing };
    updated[field] = value;
    this.ratings.set(code, updated);
    return { ...updated };
  }

  async count(): Promise<number> {
    return this.ratings.size;
  }
}
