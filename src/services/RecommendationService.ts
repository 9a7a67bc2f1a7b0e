/**
 * Recommendation pipeline.
 * Builds a prompt from the largest gaps, dispatches it to the selected
 * provider and normalizes the outcome. No retries: a failure ends the
 * request and the caller decides whether to try again.
 *
 * States per request:
 *   idle → building-prompt → dispatching → success | failure → idle
 * Concurrent requests are not serialized; the state reflects the latest one.
 */

import type { AssessmentRow, ProviderConfig, ProviderKind } from '../types/models.js';
import { PROVIDER_KINDS } from '../types/models.js';
import type { RecommendationOutcome } from '../types/api.js';
import type { ChatPrompt, ILlmProvider, LlmResult } from '../providers/ILlmProvider.js';
import { failure } from '../providers/ILlmProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { unsupportedProviderMessage } from '../providers/remediation.js';
import { buildConnectionTestPrompt, buildRecommendationPrompt } from '../prompts/recommendations.js';
import { topGapItems } from '../scoring/index.js';

export type PipelineState = 'idle' | 'building-prompt' | 'dispatching' | 'success' | 'failure';

export const NOTHING_TO_ANALYZE = 'No gaps found to analyze.';

export class RecommendationService {
  private readonly providers: ReadonlyMap<ProviderKind, ILlmProvider>;
  private current: PipelineState = 'idle';

  constructor(
    providers: readonly ILlmProvider[],
    private readonly logProvider: ILogProvider,
    private readonly promptItemLimit = 10
  ) {
    this.providers = new Map(providers.map((p) => [p.kind, p]));
  }

  get state(): PipelineState {
    return this.current;
  }

  /**
   * Ask the provider for recommendations on the largest gaps.
   * Rows without a positive gap are ignored; if none remain nothing is sent.
   */
  async generateRecommendations(
    rows: readonly AssessmentRow[],
    config: ProviderConfig
  ): Promise<RecommendationOutcome> {
    this.transition('building-prompt', config);
    const items = topGapItems(rows, this.promptItemLimit);

    if (items.length === 0) {
      this.transition('idle', config);
      return { status: 'nothing-to-analyze', message: NOTHING_TO_ANALYZE };
    }

    return this.run(buildRecommendationPrompt(items), config, { items: items.length });
  }

  /** Same dispatch path as recommendations, with a fixed one-line prompt. */
  async testConnection(config: ProviderConfig): Promise<RecommendationOutcome> {
    this.transition('building-prompt', config);
    return this.run(buildConnectionTestPrompt(), config, { test: true });
  }

  /** Select the provider by kind and send. Unknown kinds come back as UnsupportedProvider. */
  async dispatch(prompt: ChatPrompt, config: ProviderConfig): Promise<LlmResult> {
    const provider = this.providers.get(config.provider);
    if (!provider) {
      return failure({
        kind: 'UnsupportedProvider',
        provider: config.provider,
        message: unsupportedProviderMessage(config.provider, PROVIDER_KINDS),
      });
    }
    return provider.send(prompt, config);
  }

  private async run(
    prompt: ChatPrompt,
    config: ProviderConfig,
    fields: Record<string, unknown>
  ): Promise<RecommendationOutcome> {
    this.transition('dispatching', config);
    const started = performance.now();

    let result: LlmResult;
    try {
      result = await this.dispatch(prompt, config);
    } catch (err) {
      this.transition('idle', config);
      throw err;
    }
    const durationMs = Math.round(performance.now() - started);

    if (result.ok) {
      this.transition('success', config);
      this.logProvider.info('LLM request succeeded', {
        ...fields,
        provider: config.provider,
        model: config.model,
        durationMs,
        chars: result.text.length,
      });
      this.transition('idle', config);
      return { status: 'success', text: result.text, provider: config.provider, model: config.model };
    }

    this.transition('failure', config);
    this.logProvider.warn('LLM request failed', {
      ...fields,
      provider: config.provider,
      model: config.model,
      durationMs,
      kind: result.error.kind,
    });
    this.transition('idle', config);
    return { status: 'failure', error: result.error };
  }

  private transition(next: PipelineState, config: ProviderConfig): void {
    this.logProvider.debug(`Recommendation pipeline ${this.current} → ${next}`, {
      provider: config.provider,
    });
    this.current = next;
  }
}
