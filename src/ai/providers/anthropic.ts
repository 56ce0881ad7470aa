// src/ai/providers/anthropic.ts
import Anthropic from '@anthropic-ai/sdk';
import { ProviderNotConfiguredError, type GenerateParams, type GenerateResult, type TextProvider } from './types.js';

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  client?: Anthropic;
}

/** Visible text of a Messages API response; thinking and tool blocks are skipped. */
export function extractTextFromBlocks(blocks: ReadonlyArray<{ type: string }>): string {
  const parts: string[] = [];
  for (const block of blocks) {
    if (block.type !== 'text') continue;
    const text: unknown = Reflect.get(block, 'text');
    if (typeof text === 'string' && text.trim()) parts.push(text.trim());
  }
  return parts.join('\n\n');
}

export class AnthropicProvider implements TextProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private readonly client: Anthropic;

  constructor(options: AnthropicProviderOptions) {
    if (!options.client && !options.apiKey) {
      throw new ProviderNotConfiguredError('anthropic', 'ANTHROPIC_API_KEY');
    }
    this.model = options.model;
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
  }

  async generate(params: GenerateParams): Promise<GenerateResult> {
    const resp = await this.client.messages.create({
      model: this.model,
      max_tokens: typeof params.maxTokens === 'number' ? params.maxTokens : 1024,
      messages: [{ role: 'user', content: params.prompt }],
      system: params.system && params.system.trim() ? params.system : undefined,
      temperature: typeof params.temperature === 'number' ? params.temperature : undefined,
    });

    return {
      text: extractTextFromBlocks(resp.content),
      model: resp.model,
      usage: {
        inputTokens: resp.usage?.input_tokens,
        outputTokens: resp.usage?.output_tokens,
      },
    };
  }
}
