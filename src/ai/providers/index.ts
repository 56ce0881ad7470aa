// src/ai/providers/index.ts
// Builds the ordered provider chain from config. Providers without an API key
// are left out with a warning.

import type { AppConfig, AIProviderName } from '../../config.js';
import { createLogger } from '../../observability/logger.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';
import type { TextProvider } from './types.js';

export type { GenerateParams, GenerateResult, TextProvider } from './types.js';
export { ProviderNotConfiguredError } from './types.js';
export { OpenAIProvider } from './openai.js';
export { AnthropicProvider, extractTextFromBlocks } from './anthropic.js';

const log = createLogger('ai/providers');

function buildProvider(name: AIProviderName, ai: AppConfig['ai']): TextProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider({ apiKey: ai.openaiKey, model: ai.model.openai });
    case 'anthropic':
      return new AnthropicProvider({ apiKey: ai.anthropicKey, model: ai.model.anthropic });
  }
}

export function createProviders(ai: AppConfig['ai']): TextProvider[] {
  const providers: TextProvider[] = [];
  for (const name of ai.providers) {
    try {
      providers.push(buildProvider(name, ai));
    } catch (err) {
      log.warn({ err, provider: name }, 'Provider skipped');
    }
  }
  if (providers.length === 0) {
    throw new Error(`No AI provider is configured (AI_PROVIDERS=${ai.providers.join(',')})`);
  }
  return providers;
}
