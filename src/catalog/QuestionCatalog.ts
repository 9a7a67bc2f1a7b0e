/**
 * Question catalog.
 * Immutable after construction. Construction checks that codes are unique,
 * every question names a known domain, defaults are valid levels and
 * every domain has at least one question.
 */

import type { Domain, Question } from '../types/models.js';
import { isMaturityLevel } from '../types/models.js';
import { InvariantViolationError } from '../errors.js';
import { GOVERNANCE_DOMAINS } from './domains.js';
import catalogData from './questions.json' with { type: 'json' };

export class QuestionCatalog {
  readonly domains: readonly Domain[];
  readonly questions: readonly Question[];
  private readonly byCode: Map<string, Question>;

  constructor(domains: readonly Domain[], questions: readonly Question[]) {
    const domainIds = new Set(domains.map((d) => d.id));
    const byCode = new Map<string, Question>();

    for (const question of questions) {
      if (byCode.has(question.code)) {
        throw new InvariantViolationError(`Duplicate question code ${question.code}`);
      }
      if (!domainIds.has(question.domainId)) {
        throw new InvariantViolationError(
          `Question ${question.code} references unknown domain ${question.domainId}`
        );
      }
      byCode.set(question.code, question);
    }

    for (const domain of domains) {
      if (!questions.some((q) => q.domainId === domain.id)) {
        throw new InvariantViolationError(`Domain ${domain.section} has no questions`, {
          domainId: domain.id,
        });
      }
    }

    this.domains = Object.freeze([...domains]);
    this.questions = Object.freeze(questions.map((q) => Object.freeze({ ...q })));
    this.byCode = byCode;
  }

  get(code: string): Question | undefined {
    return this.byCode.get(code);
  }

  has(code: string): boolean {
    return this.byCode.has(code);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse catalog JSON of the shape `{ questions: [...] }`. */
export function parseQuestions(data: unknown): Question[] {
  if (!isRecord(data) || !Array.isArray(data.questions)) {
    throw new InvariantViolationError('Question catalog must be an object with a questions array');
  }

  return data.questions.map((entry: unknown, index: number): Question => {
    if (!isRecord(entry)) {
      throw new InvariantViolationError(`Catalog entry ${index} is not an object`);
    }
    const { code, prompt, description, domainId, defaultCurrent, defaultTarget } = entry;

    if (
      typeof code !== 'string' ||
      typeof prompt !== 'string' ||
      typeof description !== 'string' ||
      typeof domainId !== 'string'
    ) {
      throw new InvariantViolationError(`Catalog entry ${index} is missing text fields`);
    }
    if (!isMaturityLevel(defaultCurrent) || !isMaturityLevel(defaultTarget)) {
      throw new InvariantViolationError(`Catalog entry ${code} has invalid default levels`);
    }

    return { code, prompt, description, domainId, defaultCurrent, defaultTarget };
  });
}

export function loadDefaultCatalog(): QuestionCatalog {
  return new QuestionCatalog(GOVERNANCE_DOMAINS, parseQuestions(catalogData));
}
