// src/ai/analyzer.ts
// Transcript → canonical record through an ordered provider chain.
//
// Each provider is tried in turn until one returns non-empty text; that text
// alone decides the outcome, even when it cannot be parsed.

import { createChildLogger, createLogger } from '../observability/logger.js';
import { recordAiRequest } from '../observability/metrics.js';
import { PipelineError, errorMessage } from '../pipeline/errors.js';
import { isQuotaError } from '../utils/retryable.js';
import { withTimeout } from '../utils/timeout.js';
import { normalizeResponse } from './normalizer/index.js';
import type { CanonicalRecord } from './normalizer/schema.js';
import { buildPrompt } from './prompt.js';
import type { TextProvider } from './providers/types.js';

const log = createLogger('ai/analyzer');

/* ---------- Types ---------- */

export type AnalysisOutcome =
  | { kind: 'record'; record: CanonicalRecord; provider: string; model: string }
  | {
      kind: 'empty';
      reason: 'empty_transcript' | 'unparsable_response';
      provider?: string;
      rawText?: string;
    };

export interface AnalyzerOptions {
  providers: TextProvider[];
  promptTemplate: string;
  timeoutMs: number;
  maxTokens?: number;
  temperature?: number;
}

interface ProviderFailure {
  provider: string;
  message: string;
  quota: boolean;
}

/* ---------- Analyzer ---------- */

export class Analyzer {
  private readonly providers: TextProvider[];

  constructor(private readonly options: AnalyzerOptions) {
    if (options.providers.length === 0) {
      throw new Error('Analyzer needs at least one provider');
    }
    this.providers = [...options.providers];
  }

  get providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  async analyze(transcript: string, contextName: string): Promise<AnalysisOutcome> {
    if (!transcript.trim()) {
      return { kind: 'empty', reason: 'empty_transcript' };
    }

    const prompt = buildPrompt(this.options.promptTemplate, transcript, contextName);
    const failures: ProviderFailure[] = [];

    for (const provider of this.providers) {
      const plog = createChildLogger(log, { provider: provider.name, model: provider.model, contextName });
      const started = Date.now();
      let text: string;
      try {
        const result = await withTimeout(
          provider.generate({
            prompt,
            maxTokens: this.options.maxTokens,
            temperature: this.options.temperature,
            jsonMode: true,
          }),
          this.options.timeoutMs,
          `${provider.name} did not respond within ${this.options.timeoutMs}ms`
        );
        text = result.text.trim();
      } catch (err) {
        recordAiRequest(provider.name, 'error', (Date.now() - started) / 1000);
        const failure = { provider: provider.name, message: errorMessage(err), quota: isQuotaError(err) };
        failures.push(failure);
        plog.warn({ err, quota: failure.quota }, 'Provider unavailable, trying next');
        continue;
      }

      if (!text) {
        recordAiRequest(provider.name, 'empty', (Date.now() - started) / 1000);
        failures.push({ provider: provider.name, message: 'empty response', quota: false });
        plog.warn('Provider returned an empty response, trying next');
        continue;
      }

      recordAiRequest(provider.name, 'success', (Date.now() - started) / 1000);
      const normalized = normalizeResponse(text, { fileName: contextName });
      if (normalized.kind === 'none') {
        plog.warn({ reason: normalized.reason, detail: normalized.detail }, 'Provider response has no usable record');
        return { kind: 'empty', reason: 'unparsable_response', provider: provider.name, rawText: text };
      }
      plog.info('Analysis complete');
      return { kind: 'record', record: normalized.record, provider: provider.name, model: provider.model };
    }

    const summary = failures.map((f) => `${f.provider}: ${f.message}`).join('; ');
    if (failures.length > 0 && failures.every((f) => f.quota)) {
      throw new PipelineError('QuotaExhausted', `All providers are out of quota (${summary})`, { stage: 'analyzing' });
    }
    throw new PipelineError('AnalysisFailed', `All providers failed (${summary})`, { stage: 'analyzing' });
  }
}
