/**
 * Assessment session service.
 * Owns one session's ratings and cycle history. Every read derives gap,
 * priority and aggregates afresh from the stored ratings.
 */

import type { IRatingsStore } from '../stores/IRatingsStore.js';
import type { IHistoryStore } from '../stores/IHistoryStore.js';
import type { QuestionCatalog } from '../catalog/QuestionCatalog.js';
import type {
  AssessmentRow,
  Domain,
  DomainSummary,
  HistoryEntry,
  MatrixScore,
  Rating,
  RatingField,
} from '../types/models.js';
import { RATING_FIELDS, isMatrixScore, isMaturityLevel } from '../types/models.js';
import type {
  ActionPlanResponse,
  CatalogResponse,
  HistoryResponse,
  MatrixPoint,
  OverviewResponse,
} from '../types/api.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { NotFoundError, ValidationError } from '../errors.js';
import {
  aggregateByDomain,
  deriveRows,
  overallScore,
  priorityBreakdown,
  quadrantOf,
  sortByGapDescending,
  topGapItems,
  isCriticalOrHigh,
} from '../scoring/index.js';

const MAX_ACTION_ITEMS_LENGTH = 5000;

// New ratings start mid-matrix
const DEFAULT_BENEFIT: MatrixScore = 1;
const DEFAULT_EFFORT: MatrixScore = 1;

export class AssessmentService {
  private lastSaved: Date | null = null;

  constructor(
    private readonly ratingsStore: IRatingsStore,
    private readonly historyStore: IHistoryStore,
    private readonly catalog: QuestionCatalog,
    private readonly logProvider: ILogProvider,
    private readonly topActionsLimit = 5
  ) {}

  /** Seed ratings from catalog defaults if the store is empty. */
  async start(): Promise<void> {
    if ((await this.ratingsStore.count()) === 0) {
      await this.ratingsStore.seed(this.defaultRatings());
    }
  }

  /** Discard ratings, history and the save stamp; reseed from defaults. */
  async reset(): Promise<void> {
    await this.ratingsStore.seed(this.defaultRatings());
    await this.historyStore.clear();
    this.lastSaved = null;
    this.logProvider.info('Assessment session reset');
  }

  // ── Catalog ──

  listQuestions(): CatalogResponse {
    return { domains: [...this.catalog.domains], questions: [...this.catalog.questions] };
  }

  listDomains(): Domain[] {
    return [...this.catalog.domains];
  }

  // ── Ratings ──

  async listRatings(): Promise<Rating[]> {
    await this.start();
    return this.ratingsStore.findAll();
  }

  async getRating(code: string): Promise<Rating> {
    await this.start();
    const rating = await this.ratingsStore.findByCode(code);
    if (!rating) {
      throw new NotFoundError(`No question with code ${code}`);
    }
    return rating;
  }

  /**
   * Edit one field of one rating. Levels must be 0–4, benefit/effort 0–2,
   * action items a string. Last write wins.
   */
  async setRatingField(code: string, field: string, value: unknown): Promise<Rating> {
    await this.start();

    if (!isRatingField(field)) {
      throw new ValidationError(`field must be one of: ${RATING_FIELDS.join(', ')}`);
    }

    let updated: Rating | null = null;
    switch (field) {
      case 'current':
      case 'target':
        if (!isMaturityLevel(value)) {
          throw new ValidationError(`${field} must be an integer from 0 to 4`, { field });
        }
        updated = await this.ratingsStore.updateField(code, field, value);
        break;
      case 'benefit':
      case 'effort':
        if (!isMatrixScore(value)) {
          throw new ValidationError(`${field} must be an integer from 0 to 2`, { field });
        }
        updated = await this.ratingsStore.updateField(code, field, value);
        break;
      case 'actionItems':
        if (typeof value !== 'string') {
          throw new ValidationError('actionItems must be a string', { field });
        }
        if (value.length > MAX_ACTION_ITEMS_LENGTH) {
          throw new ValidationError(
            `actionItems must be ${MAX_ACTION_ITEMS_LENGTH} characters or less`,
            { field }
          );
        }
        updated = await this.ratingsStore.updateField(code, field, value);
        break;
    }

    if (!updated) {
      throw new NotFoundError(`No question with code ${code}`);
    }

    this.logProvider.debug('Rating updated', { code, field });
    return updated;
  }

  /**
   * Replace every rating, e.g. from a re-read detailed report.
   * The set must cover the catalog exactly, one rating per question.
   */
  async importRatings(ratings: readonly Rating[]): Promise<number> {
    const seen = new Set<string>();
    for (const rating of ratings) {
      if (!this.catalog.has(rating.code)) {
        throw new ValidationError(`Unknown question code ${rating.code}`);
      }
      if (seen.has(rating.code)) {
        throw new ValidationError(`Duplicate rating for ${rating.code}`);
      }
      if (rating.actionItems.length > MAX_ACTION_ITEMS_LENGTH) {
        throw new ValidationError(
          `actionItems for ${rating.code} must be ${MAX_ACTION_ITEMS_LENGTH} characters or less`
        );
      }
      seen.add(rating.code);
    }

    const missing = this.catalog.questions.filter((q) => !seen.has(q.code)).map((q) => q.code);
    if (missing.length > 0) {
      throw new ValidationError('Imported ratings do not cover every question', { missing });
    }

    await this.ratingsStore.seed(ratings);
    this.logProvider.info('Ratings imported', { count: ratings.length });
    return ratings.length;
  }

  // ── Derived views ──

  /** Every question joined with its rating, in catalog order. */
  async getRows(): Promise<AssessmentRow[]> {
    await this.start();
    const ratings = await this.ratingsStore.findAll();
    return deriveRows(ratings, this.catalog.questions, this.catalog.domains);
  }

  async getDomainSummaries(): Promise<DomainSummary[]> {
    return aggregateByDomain(await this.getRows(), this.catalog.domains);
  }

  async getOverview(): Promise<OverviewResponse> {
    const rows = await this.getRows();
    const score = overallScore(rows);

    return {
      ...score,
      priorities: priorityBreakdown(rows),
      cycle: await this.historyStore.currentCycle(),
      lastSaved: this.lastSaved?.toISOString() ?? null,
    };
  }

  /** Critical and High rows with the largest gaps, for the dashboard panel. */
  async getTopActions(limit = this.topActionsLimit): Promise<AssessmentRow[]> {
    const rows = await this.getRows();
    return topGapItems(
      rows.filter((r) => isCriticalOrHigh(r.priority)),
      limit
    );
  }

  async getGapTable(): Promise<AssessmentRow[]> {
    return sortByGapDescending(await this.getRows());
  }

  /** Critical, High and Medium rows, each list by gap descending. */
  async getActionGroups(): Promise<Pick<ActionPlanResponse, 'critical' | 'high' | 'medium'>> {
    const rows = sortByGapDescending(await this.getRows());
    return {
      critical: rows.filter((r) => r.priority === 'Critical'),
      high: rows.filter((r) => r.priority === 'High'),
      medium: rows.filter((r) => r.priority === 'Medium'),
    };
  }

  /** Rows with an open gap placed on the benefit/effort grid. */
  async getBenefitEffortMatrix(): Promise<MatrixPoint[]> {
    const rows = sortByGapDescending(await this.getRows());
    return rows
      .filter((r) => r.gap > 0)
      .map((r) => ({
        code: r.code,
        prompt: r.prompt,
        benefit: r.benefit,
        effort: r.effort,
        gap: r.gap,
        priority: r.priority,
        quadrant: quadrantOf(r.benefit, r.effort),
      }));
  }

  async getActionPlan(): Promise<ActionPlanResponse> {
    return { ...(await this.getActionGroups()), matrix: await this.getBenefitEffortMatrix() };
  }

  // ── Cycles ──

  saveProgress(now = new Date()): string {
    this.lastSaved = now;
    this.logProvider.info('Assessment progress saved', { at: now.toISOString() });
    return now.toISOString();
  }

  /**
   * Snapshot the current cycle into history and move to the next cycle.
   * Ratings carry over unchanged.
   */
  async startNewCycle(now = new Date()): Promise<{ recorded: HistoryEntry; cycle: number }> {
    const rows = await this.getRows();
    const score = overallScore(rows);

    const recorded: HistoryEntry = {
      cycle: await this.historyStore.currentCycle(),
      date: now.toISOString().slice(0, 10),
      overallScore: round2(score.overallScore),
      targetScore: round2(score.targetScore),
      criticalGaps: score.criticalHigh,
    };

    const cycle = await this.historyStore.append(recorded);
    this.logProvider.info('Assessment cycle started', { cycle, previous: recorded.cycle });
    return { recorded, cycle };
  }

  async getHistory(): Promise<HistoryResponse> {
    return {
      cycle: await this.historyStore.currentCycle(),
      history: [...(await this.historyStore.list())],
    };
  }

  private defaultRatings(): Rating[] {
    return this.catalog.questions.map((q): Rating => ({
      code: q.code,
      current: q.defaultCurrent,
      target: q.defaultTarget,
      actionItems: '',
      benefit: DEFAULT_BENEFIT,
      effort: DEFAULT_EFFORT,
    }));
  }
}

function isRatingField(value: string): value is RatingField {
  return RATING_FIELDS.some((f) => f === value);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
