import { describe, it, expect, beforeEach } from 'vitest';
import { aiRequestsTotal, objectsTotal, recordAiRequest, recordObjectOutcome } from '../metrics.js';

beforeEach(() => {
  objectsTotal.reset();
  aiRequestsTotal.reset();
});

describe('pipeline metrics', () => {
  it('counts object outcomes by label', async () => {
    recordObjectOutcome('processed', 12);
    recordObjectOutcome('processed');
    recordObjectOutcome('failed');

    const { values } = await objectsTotal.get();
    const byOutcome = Object.fromEntries(values.map((v) => [String(v.labels.outcome), v.value]));
    expect(byOutcome).toEqual({ processed: 2, failed: 1 });
  });

  it('counts provider requests by provider and status', async () => {
    recordAiRequest('anthropic', 'error', 0.4);
    recordAiRequest('openai', 'success', 1.2);

    const { values } = await aiRequestsTotal.get();
    const keys = values.map((v) => `${String(v.labels.provider)}/${String(v.labels.status)}=${v.value}`).sort();
    expect(keys).toEqual(['anthropic/error=1', 'openai/success=1']);
  });
});
