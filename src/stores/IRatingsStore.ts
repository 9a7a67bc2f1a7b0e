/**
 * Ratings data access interface.
 * One rating per question code, edited one field at a time.
 */

import type { Rating, RatingField } from '../types/models.js';

export interface IRatingsStore {
  /** Replace every rating (session start or reset). */
  seed(ratings: readonly Rating[]): Promise<void>;

  findByCode(code: string): Promise<Rating | null>;

  /** Copies of all ratings, in insertion order. Later writes do not show through. */
  findAll(): Promise<Rating[]>;

  /** Set a single field. Returns the updated rating, or null for an unknown code. */
  updateField<F extends RatingField>(code: string, field: F, value: Rating[F]): Promise<Rating | null>;

  count(): Promise<number>;
}
