import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import {
  FakeProvider,
  PROCESSED_ID,
  QUARANTINE_ID,
  bytes,
  createTestContext,
  httpError,
  type TestContext,
} from '../../__tests__/helpers/fakes.js';
import { FIELD } from '../../ai/normalizer/schema.js';
import { TeamDirectory } from '../../enrichment/teamDirectory.js';
import { PipelineError, isPipelineError } from '../errors.js';
import { processObject } from '../processor.js';

const ANALYSIS_JSON = JSON.stringify({
  opening_pitch_score: 8,
  product_pitch_score: 7,
  cross_sell: 9,
  closing_effectiveness: 6,
  negotiation_strength: 10,
  Team: 'Guessed',
});

const directory = TeamDirectory.fromJson({
  members: { 'Asha Rao': { email: 'asha.rao@example.com', manager: 'Vikram Shah', team: 'West' } },
  managers: { 'Vikram Shah': 'vikram.shah@example.com' },
});

let ctx: TestContext | undefined;

afterEach(async () => {
  await ctx?.close();
  ctx = undefined;
});

async function setup(options: Parameters<typeof createTestContext>[0] = {}) {
  const created = await createTestContext({ directory, ...options });
  ctx = created;
  const object = created.store.addObject(
    {
      id: 'obj-1',
      containerId: 'owner-a',
      name: 'Green_Acres_31-08-25.mp3',
      webViewLink: 'https://drive.example/obj-1',
    },
    bytes('fake audio bytes')
  );
  return { ctx: created, object };
}

async function rejection(promise: Promise<unknown>): Promise<PipelineError> {
  const err = await promise.then(
    () => {
      throw new Error('expected a rejection');
    },
    (e: unknown) => e
  );
  if (!isPipelineError(err)) throw new Error(`expected a PipelineError, got ${String(err)}`);
  return err;
}

/* ============= Success ============= */

describe('processObject — success', () => {
  it('runs every stage and records the outcome', async () => {
    const provider = new FakeProvider('anthropic', [ANALYSIS_JSON]);
    const { ctx, object } = await setup({
      providers: [provider],
      transcript: { text: 'We discussed the budget and tally import.', durationMinutes: 12 },
    });

    const outcome = await processObject(ctx, object, 'Asha Rao');

    expect(outcome.status).toBe('processed');
    if (outcome.status !== 'processed') return;
    expect(outcome.provider).toBe('anthropic');
    expect(outcome.transcriptChars).toBe(41);

    const { record } = outcome;
    expect(record[FIELD.date]).toBe('2025-08-31');
    expect(record[FIELD.totalScore]).toBe('40');
    expect(record[FIELD.percentScore]).toBe('80.0%');
    expect(record[FIELD.owner]).toBe('Asha Rao');
    expect(record[FIELD.team]).toBe('West');
    expect(record[FIELD.managerEmail]).toBe('vikram.shah@example.com');
    expect(record[FIELD.duration]).toBe('12');
    expect(record[FIELD.fileId]).toBe('obj-1');
    expect(record[FIELD.mediaLink]).toBe('https://drive.example/obj-1');
    expect(record[FIELD.societyName]).toBe('Green Acres 31 08 25');
    expect(record[FIELD.featureCoverage].startsWith('ERP Coverage: 2/19 (11%). Covered: Budgeting, Tally import/export.')).toBe(
      true
    );

    expect(ctx.transcriber.calls).toEqual([path.join(ctx.tmpDir, 'obj-1_Green_Acres_31-08-25.mp3')]);
    expect(await ctx.ledger.isProcessed('obj-1')).toBe(true);
    const stored = await ctx.sink.listByObject('obj-1');
    expect(stored.map((s) => s.record)).toEqual([record]);
    expect((await ctx.store.getObject('obj-1')).containerId).toBe(PROCESSED_ID);
    expect(await fs.readdir(ctx.tmpDir)).toEqual([]);
    expect(await ctx.ledger.claim('obj-1', 'another-worker', 60_000)).toBe(true);
  });

  it('skips an object that is already processed', async () => {
    const provider = new FakeProvider('anthropic', [ANALYSIS_JSON]);
    const { ctx, object } = await setup({ providers: [provider] });
    await ctx.ledger.recordOutcome('obj-1', 'Processed', '', object.name);

    const outcome = await processObject(ctx, object, 'Asha Rao');

    expect(outcome).toEqual({ status: 'skipped', objectId: 'obj-1', reason: 'already_processed' });
    expect(ctx.store.reads).toEqual([]);
    expect(provider.callCount).toBe(0);
  });

  it('skips an object claimed by another worker', async () => {
    const { ctx, object } = await setup();
    await ctx.ledger.claim('obj-1', 'another-worker', 60_000);

    const outcome = await processObject(ctx, object, 'Asha Rao');

    expect(outcome).toEqual({ status: 'skipped', objectId: 'obj-1', reason: 'claimed_elsewhere' });
    expect(ctx.store.reads).toEqual([]);
    expect(await ctx.ledger.getEntry('obj-1')).toBeNull();
  });
});

describe('processObject — concurrent calls', () => {
  it('processes one object once when two tasks of the same worker race', async () => {
    const provider = new FakeProvider('anthropic', [ANALYSIS_JSON, ANALYSIS_JSON]);
    const { ctx, object } = await setup({
      providers: [provider],
      transcript: { text: 'We discussed the budget.', durationMinutes: 3 },
    });

    const outcomes = await Promise.all([
      processObject(ctx, object, 'Asha Rao'),
      processObject(ctx, object, 'Asha Rao'),
    ]);

    expect(outcomes.map((o) => o.status)).toEqual(['processed', 'skipped']);
    expect(outcomes[1]).toEqual({ status: 'skipped', objectId: 'obj-1', reason: 'claimed_elsewhere' });
    expect(await ctx.sink.count()).toBe(1);
    expect(provider.callCount).toBe(1);
  });
});

/* ============= Failures ============= */

describe('processObject — failures', () => {
  it('records, quarantines and rethrows an empty transcript', async () => {
    const provider = new FakeProvider('anthropic', [ANALYSIS_JSON]);
    const { ctx, object } = await setup({ providers: [provider] });

    const err = await rejection(processObject(ctx, object, 'Asha Rao'));

    expect(err.kind).toBe('TranscriptionEmpty');
    expect(err.stage).toBe('transcribing');
    expect(err.objectId).toBe('obj-1');
    expect(await ctx.ledger.getEntry('obj-1')).toMatchObject({
      status: 'Failed',
      error: 'TranscriptionEmpty: Transcription produced no text',
    });
    expect((await ctx.store.getObject('obj-1')).containerId).toBe(QUARANTINE_ID);
    expect(ctx.store.description('obj-1')).toBe('Quarantined: TranscriptionEmpty: Transcription produced no text');
    expect(await ctx.sink.count()).toBe(0);
    expect(provider.callCount).toBe(0);
    expect(await fs.readdir(ctx.tmpDir)).toEqual([]);
  });

  it('fails with UnparsableResponse when the provider text has no record', async () => {
    const { ctx, object } = await setup({
      providers: [new FakeProvider('anthropic', ['Sorry, I cannot help with that.'])],
      transcript: { text: 'Some meeting talk.', durationMinutes: 3 },
    });

    const err = await rejection(processObject(ctx, object, 'Asha Rao'));

    expect(err.kind).toBe('UnparsableResponse');
    expect((await ctx.ledger.getEntry('obj-1'))?.error).toBe(
      'UnparsableResponse: No JSON record in anthropic response'
    );
  });

  it('reports QuotaExhausted when every provider is rate limited', async () => {
    const { ctx, object } = await setup({
      providers: [
        new FakeProvider('anthropic', [httpError(429, 'rate limited')]),
        new FakeProvider('openai', [httpError(429, 'rate limited')]),
      ],
      transcript: { text: 'Some meeting talk.', durationMinutes: 3 },
    });

    const err = await rejection(processObject(ctx, object, 'Asha Rao'));
    expect(err.kind).toBe('QuotaExhausted');
  });

  it('fails with EnrichmentFailed when the team directory throws', async () => {
    const { ctx, object } = await setup({
      providers: [new FakeProvider('anthropic', [ANALYSIS_JSON])],
      transcript: { text: 'Some meeting talk.', durationMinutes: 3 },
      directory: new TeamDirectory(),
    });
    ctx.directory.lookup = () => {
      throw new Error('directory offline');
    };

    const err = await rejection(processObject(ctx, object, 'Asha Rao'));

    expect(err.kind).toBe('EnrichmentFailed');
    expect(err.stage).toBe('enriching');
    expect((await ctx.ledger.getEntry('obj-1'))?.error).toBe('EnrichmentFailed: directory offline');
    expect(await ctx.sink.count()).toBe(0);
  });

  it('fails with PersistenceFailure when the record cannot be written', async () => {
    const { ctx, object } = await setup({
      providers: [new FakeProvider('anthropic', [ANALYSIS_JSON])],
      transcript: { text: 'Some meeting talk.', durationMinutes: 3 },
    });
    ctx.sink.append = async () => {
      throw new Error('database is locked');
    };

    const err = await rejection(processObject(ctx, object, 'Asha Rao'));

    expect(err.kind).toBe('PersistenceFailure');
    expect(err.message).toBe('Could not write record: database is locked');
    expect(await ctx.ledger.isProcessed('obj-1')).toBe(false);
  });

  it('records the failure even when quarantine cannot move the object', async () => {
    const { ctx } = await setup();
    const ghost = { ...(await ctx.store.getObject('obj-1')), id: 'ghost' };

    const err = await rejection(processObject(ctx, ghost, 'Asha Rao'));

    expect(err.kind).toBe('RetrievalFailed');
    expect((await ctx.ledger.getEntry('ghost'))?.error).toBe(
      'RetrievalFailed: Retrieval failed (metadata): File not found: ghost'
    );
    expect(ctx.store.moves.filter((m) => m.id === 'ghost')).toHaveLength(4);
  });

  it('surfaces a ledger failure on the failure path', async () => {
    const { ctx, object } = await setup();
    ctx.ledger.recordOutcome = async () => {
      throw new PipelineError('LedgerWriteFailure', 'ledger unavailable');
    };

    const err = await rejection(processObject(ctx, object, 'Asha Rao'));

    expect(err.kind).toBe('TranscriptionEmpty');
    expect(err.ledgerError?.kind).toBe('LedgerWriteFailure');
    expect((await ctx.store.getObject('obj-1')).containerId).toBe(QUARANTINE_ID);
  });
});
