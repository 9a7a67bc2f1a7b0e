/**
 * Prompt templates for governance recommendations.
 */

import type { AssessmentRow } from '../types/models.js';
import type { ChatPrompt } from '../providers/ILlmProvider.js';

export const ADVISOR_SYSTEM_PROMPT =
  'You are an expert AI governance consultant specializing in the NIST AI RMF, ' +
  'healthcare compliance (HIPAA, CMIA, CPRA/CCPA) and organizational risk management. ' +
  'You help organizations improve their AI governance maturity. ' +
  'Give concise, actionable recommendations that are specific and implementable.';

export const CONNECTION_TEST_PROMPT = "Respond with exactly: 'Connection successful'";

const INTRO =
  'Based on the following AI Governance Assessment gaps aligned with the NIST AI RMF, ' +
  'provide specific, actionable recommendations for each item. ' +
  'Consider healthcare regulatory requirements (HIPAA, CMIA) and how feasible each step ' +
  'is to implement in the organization.';

const INSTRUCTIONS = [
  'For each governance item, provide:',
  '1. **Specific Action Steps** - Concrete tasks to close the gap',
  '2. **Key Stakeholders** - Who needs to be involved',
  '3. **Timeline** - Quick win (1-3 months) vs Strategic initiative (6-12 months)',
  '4. **Dependencies** - Prerequisites or related items',
  '',
  'Format your response with the GOV code of each item as its header.',
].join('\n');

export function formatGapItem(row: AssessmentRow): string {
  return (
    `${row.code}: ${row.prompt}\n` +
    `Current Level: ${row.current}, Target Level: ${row.target}, Gap: ${row.gap}`
  );
}

/** Items are embedded in the order given. */
export function buildRecommendationPrompt(items: readonly AssessmentRow[]): ChatPrompt {
  const user = [
    INTRO,
    '',
    'Assessment Gaps:',
    items.map(formatGapItem).join('\n\n'),
    '',
    INSTRUCTIONS,
  ].join('\n');

  return { system: ADVISOR_SYSTEM_PROMPT, user };
}

export function buildConnectionTestPrompt(): ChatPrompt {
  return { system: ADVISOR_SYSTEM_PROMPT, user: CONNECTION_TEST_PROMPT };
}
