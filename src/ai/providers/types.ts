// src/ai/providers/types.ts
// Shared provider contract for the analyzer's fallback chain.

import type { AIProviderName } from '../../config.js';

export type GenerateParams = {
  prompt: string;                 // full user prompt
  system?: string;                // optional system prompt
  temperature?: number;
  maxTokens?: number;             // aka max_tokens
  jsonMode?: boolean;             // ask for a bare JSON object where supported
};

export type GenerateResult = {
  text: string;
  model: string;
  usage?: { inputTokens?: number; outputTokens?: number };
};

export interface TextProvider {
  readonly name: AIProviderName;
  readonly model: string;
  generate(params: GenerateParams): Promise<GenerateResult>;
}

/** Thrown at construction when the provider's API key is missing */
export class ProviderNotConfiguredError extends Error {
  constructor(provider: AIProviderName, envVar: string) {
    super(`${envVar} is not set. Set it in your environment to use the ${provider} provider.`);
    this.name = 'ProviderNotConfiguredError';
  }
}
