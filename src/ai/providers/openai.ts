// src/ai/providers/openai.ts
import OpenAI from 'openai';
import { ProviderNotConfiguredError, type GenerateParams, type GenerateResult, type TextProvider } from './types.js';

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
  /** Injected client, mainly for tests. */
  client?: OpenAI;
}

/**
 * Text generation via OpenAI Chat Completions. `jsonMode` maps to
 * response_format json_object, which requires the word "JSON" in the prompt.
 */
export class OpenAIProvider implements TextProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIProviderOptions) {
    if (!options.client && !options.apiKey) {
      throw new ProviderNotConfiguredError('openai', 'OPENAI_API_KEY');
    }
    this.model = options.model;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  }

  async generate(params: GenerateParams): Promise<GenerateResult> {
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (params.system && params.system.trim()) messages.push({ role: 'system', content: params.system });
    messages.push({ role: 'user', content: params.prompt });

    const resp = await this.client.chat.completions.create({
      model: this.model,
      messages,
      temperature: typeof params.temperature === 'number' ? params.temperature : undefined,
      max_tokens: typeof params.maxTokens === 'number' ? params.maxTokens : undefined,
      response_format: params.jsonMode ? { type: 'json_object' } : undefined,
    });

    const text = resp.choices[0]?.message?.content ?? '';
    return {
      text,
      model: resp.model,
      usage: {
        inputTokens: resp.usage?.prompt_tokens,
        outputTokens: resp.usage?.completion_tokens,
      },
    };
  }
}
