// src/ai/prompt.ts
// Analysis prompt: external template file with a built-in fallback.
//
// Placeholders: {{fields}} {{fileName}} {{transcript}}

import fs from 'node:fs/promises';
import { createLogger } from '../observability/logger.js';
import { CANONICAL_FIELDS, NA } from './normalizer/schema.js';

const log = createLogger('ai/prompt');

export const FALLBACK_TEMPLATE = `You are an expert business analyst reviewing sales meetings for a society-management ERP and accounting-services company.
Analyze the transcript provided.
Strictly return ONLY a single valid JSON object using exactly these keys:
{{fields}}
Do not include any introductory text, closing text, or markdown formatting.
If a piece of information cannot be found in the transcript, use "${NA}" as the value for that key.
For the score fields ("Opening Pitch Score", "Product Pitch Score", "Cross-Sell / Opportunity Handling", "Closing Effectiveness", "Negotiation Strength") output whole numbers between 0 and 10 as strings.
The recording file is named "{{fileName}}".`;

const TRANSCRIPT_SECTION = '\n\n---\nMEETING TRANSCRIPT:\n';

export interface PromptTemplate {
  text: string;
  source: 'file' | 'fallback';
}

/**
 * Load the template from disk; a missing, unreadable or empty file falls
 * back to the built-in template.
 */
export async function loadPromptTemplate(filePath: string): Promise<PromptTemplate> {
  try {
    const text = (await fs.readFile(filePath, 'utf8')).trim();
    if (text) {
      log.info({ filePath }, 'Loaded prompt template');
      return { text, source: 'file' };
    }
    log.warn({ filePath }, 'Prompt template file is empty, using fallback');
  } catch (err) {
    log.warn({ err, filePath }, 'Prompt template not readable, using fallback');
  }
  return { text: FALLBACK_TEMPLATE, source: 'fallback' };
}

export function buildPrompt(template: string, transcript: string, fileName: string): string {
  const fields = CANONICAL_FIELDS.map((f) => `- "${f}"`).join('\n');
  // Function replacers keep `$` sequences in the transcript literal.
  let prompt = template
    .replace(/\{\{\s*fields\s*\}\}/g, () => fields)
    .replace(/\{\{\s*fileName\s*\}\}/g, () => fileName);

  if (/\{\{\s*transcript\s*\}\}/.test(prompt)) {
    prompt = prompt.replace(/\{\{\s*transcript\s*\}\}/g, () => transcript);
  } else {
    prompt = `${prompt}${TRANSCRIPT_SECTION}${transcript}`;
  }
  return prompt;
}
