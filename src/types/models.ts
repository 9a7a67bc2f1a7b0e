/**
 * Domain models — core entities as the application understands them.
 * Decoupled from both API shapes and export sheet layouts.
 */

// ── Scales ──

/** Maturity level: 0 Absent, 1 Initial, 2 Defined, 3 Repeatable, 4 Managed/Optimized. */
export type MaturityLevel = 0 | 1 | 2 | 3 | 4;

/** Benefit or effort score on the action matrix (0–2). */
export type MatrixScore = 0 | 1 | 2;

export const MATURITY_LEVELS: readonly MaturityLevel[] = [0, 1, 2, 3, 4];
export const MATRIX_SCORES: readonly MatrixScore[] = [0, 1, 2];

export function isMaturityLevel(value: unknown): value is MaturityLevel {
  return typeof value === 'number' && MATURITY_LEVELS.some((l) => l === value);
}

export function isMatrixScore(value: unknown): value is MatrixScore {
  return typeof value === 'number' && MATRIX_SCORES.some((s) => s === value);
}

// ── Catalog ──

export interface Domain {
  /** Stable id, e.g. "gov3". */
  id: string;
  /** Section label, e.g. "GOV 3". */
  section: string;
  title: string;
}

export interface Question {
  /** Unique code, e.g. "GOV 1.3". */
  code: string;
  prompt: string;
  description: string;
  domainId: string;
  defaultCurrent: MaturityLevel;
  defaultTarget: MaturityLevel;
}

// ── Session state ──

export interface Rating {
  code: string;
  current: MaturityLevel;
  target: MaturityLevel;
  actionItems: string;
  benefit: MatrixScore;
  effort: MatrixScore;
}

export type RatingField = 'current' | 'target' | 'actionItems' | 'benefit' | 'effort';

export const RATING_FIELDS: readonly RatingField[] = [
  'current',
  'target',
  'actionItems',
  'benefit',
  'effort',
];

export interface HistoryEntry {
  cycle: number;
  /** YYYY-MM-DD */
  date: string;
  overallScore: number;
  targetScore: number;
  criticalGaps: number;
}

// ── Derived ──

/**
 * Urgency tier. `Unknown` marks a row whose gap or current level could not
 * be read, so it is never confused with a computed `Low`.
 */
export type Priority = 'Critical' | 'High' | 'Medium' | 'Low' | 'Unknown';

export interface AssessmentRow extends Rating {
  prompt: string;
  domainId: string;
  domainTitle: string;
  section: string;
  gap: number;
  priority: Priority;
}

export interface DomainSummary {
  domainId: string;
  section: string;
  title: string;
  avgCurrent: number;
  avgTarget: number;
  avgGap: number;
  questions: number;
  criticalHigh: number;
}

export type Quadrant = 'quick-win' | 'strategic' | 'fill-in';

// ── LLM providers ──

export type ProviderKind = 'llama_cpp' | 'ollama' | 'openai';

export const PROVIDER_KINDS: readonly ProviderKind[] = ['llama_cpp', 'ollama', 'openai'];

export function isProviderKind(value: unknown): value is ProviderKind {
  return typeof value === 'string' && PROVIDER_KINDS.some((k) => k === value);
}

export interface ProviderConfig {
  provider: ProviderKind;
  model: string;
  baseUrl: string;
  /** Only read by the openai provider. */
  apiKey?: string;
}
