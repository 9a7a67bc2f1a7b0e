/**
 * API types — shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  AssessmentRow,
  Domain,
  DomainSummary,
  HistoryEntry,
  Priority,
  Quadrant,
  Question,
} from './models.js';
import type { LlmFailure } from '../providers/ILlmProvider.js';

// ── Requests ──

/**
 * Provider selection as sent by a client. Every field is optional and
 * falls back to configured defaults; `provider` is deliberately a plain
 * string so an unknown name can be reported as a result.
 */
export interface ProviderRequest {
  provider?: string;
  model?: string;
  baseUrl?: string;
  apiKey?: string;
}

export type ExportKind = 'executive-summary' | 'detailed-report' | 'action-plan';

export const EXPORT_KINDS: readonly ExportKind[] = [
  'executive-summary',
  'detailed-report',
  'action-plan',
];

// ── Responses ──

export interface CatalogResponse {
  domains: Domain[];
  questions: Question[];
}

export interface OverviewResponse {
  overallScore: number;
  targetScore: number;
  progressPercent: number;
  questions: number;
  criticalHigh: number;
  priorities: Record<Priority, number>;
  cycle: number;
  lastSaved: string | null;
}

export interface MatrixPoint {
  code: string;
  prompt: string;
  benefit: number;
  effort: number;
  gap: number;
  priority: Priority;
  quadrant: Quadrant;
}

export interface ActionPlanResponse {
  critical: AssessmentRow[];
  high: AssessmentRow[];
  medium: AssessmentRow[];
  matrix: MatrixPoint[];
}

export interface DomainsResponse {
  domains: DomainSummary[];
}

export interface HistoryResponse {
  cycle: number;
  history: HistoryEntry[];
}

export type RecommendationOutcome =
  | { status: 'nothing-to-analyze'; message: string }
  | { status: 'success'; text: string; model: string; provider: string }
  | { status: 'failure'; error: LlmFailure };

export interface ExportResponse {
  kind: ExportKind;
  location: string;
  sheets: string[];
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'INVARIANT_VIOLATION'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
