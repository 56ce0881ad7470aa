import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CANONICAL_FIELDS } from '../normalizer/schema.js';
import { FALLBACK_TEMPLATE, buildPrompt, loadPromptTemplate } from '../prompt.js';

/* ============= buildPrompt ============= */

describe('buildPrompt', () => {
  it('lists every canonical field and names the file', () => {
    const prompt = buildPrompt(FALLBACK_TEMPLATE, 'hello', 'call.mp3');
    expect(prompt).toContain('- "Date"\n- "POC Name"\n- "Society Name"');
    expect(prompt).toContain(`- "${CANONICAL_FIELDS[CANONICAL_FIELDS.length - 1]}"`);
    expect(prompt).toContain('The recording file is named "call.mp3".');
  });

  it('appends the transcript when the template has no placeholder', () => {
    const prompt = buildPrompt('Analyze {{fileName}}', 'costs $& more', 'x.mp3');
    expect(prompt).toBe('Analyze x.mp3\n\n---\nMEETING TRANSCRIPT:\ncosts $& more');
  });

  it('substitutes an inline transcript placeholder', () => {
    expect(buildPrompt('A {{ fileName }} B {{transcript}} C', "it's $1", 'x.mp3')).toBe("A x.mp3 B it's $1 C");
  });
});

/* ============= loadPromptTemplate ============= */

describe('loadPromptTemplate', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'prompt-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads and trims a template file', async () => {
    const file = path.join(dir, 'prompt.txt');
    await fs.writeFile(file, '\n  Custom {{fields}}  \n');
    expect(await loadPromptTemplate(file)).toEqual({ text: 'Custom {{fields}}', source: 'file' });
  });

  it('falls back for a missing file', async () => {
    expect(await loadPromptTemplate(path.join(dir, 'missing.txt'))).toEqual({
      text: FALLBACK_TEMPLATE,
      source: 'fallback',
    });
  });

  it('falls back for an empty file', async () => {
    const file = path.join(dir, 'empty.txt');
    await fs.writeFile(file, '   \n');
    expect((await loadPromptTemplate(file)).source).toBe('fallback');
  });

  it('loads the bundled template', async () => {
    const bundled = fileURLToPath(new URL('../../../prompts/meeting-analysis.txt', import.meta.url));
    const template = await loadPromptTemplate(bundled);
    expect(template.source).toBe('file');
    expect(template.text).toContain('{{fields}}');
    expect(template.text).toContain('{{transcript}}');
  });
});
