import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FakeObjectStore, bytes, httpError } from '../../__tests__/helpers/fakes.js';
import { isPipelineError } from '../errors.js';
import { Fetcher, type ProgressEvent } from '../fetcher.js';

let tmpDir: string;
let store: FakeObjectStore;
let sleeps: number[];
let fetcher: Fetcher;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fetcher-test-'));
  store = new FakeObjectStore();
  sleeps = [];
  fetcher = new Fetcher(store, {
    tmpDir,
    chunkSizeBytes: 4,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => 0,
  });
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('expected a rejection');
    },
    (err: unknown) => err
  );
}

/* ============= Success ============= */

describe('Fetcher — success', () => {
  it('transfers the object chunk by chunk and reports progress', async () => {
    store.addObject({ id: 'obj-1', containerId: 'owner', name: 'Team Call.mp3' }, bytes('hello world'));
    const events: ProgressEvent[] = [];

    const handle = await fetcher.retrieve('obj-1', 'Team Call.mp3', (e) => events.push(e));

    expect(handle).toEqual({
      path: path.join(tmpDir, 'obj-1_Team_Call.mp3'),
      sizeBytes: 11,
      mimeType: 'audio/mpeg',
    });
    expect(await fs.readFile(handle.path, 'utf8')).toBe('hello world');
    expect(store.reads.map((r) => [r.start, r.end])).toEqual([
      [0, 3],
      [4, 7],
      [8, 10],
    ]);
    expect(events.map((e) => e.percent)).toEqual([36, 72, 100]);
    expect(events[2]).toEqual({ objectId: 'obj-1', percent: 100, bytes: 11, totalBytes: 11 });
  });

  it('reports 100% for a zero-byte object', async () => {
    store.addObject({ id: 'empty', containerId: 'owner' });
    const events: ProgressEvent[] = [];

    const handle = await fetcher.retrieve('empty', 'empty.mp3', (e) => events.push(e));

    expect(handle.sizeBytes).toBe(0);
    expect((await fs.stat(handle.path)).size).toBe(0);
    expect(events).toEqual([{ objectId: 'empty', percent: 100, bytes: 0, totalBytes: 0 }]);
    expect(store.reads).toEqual([]);
  });

  it('reads until a short chunk when the size is unknown', async () => {
    store.addObject({ id: 'obj-2', containerId: 'owner', sizeBytes: null }, bytes('0123456789'));

    const handle = await fetcher.retrieve('obj-2', 'stream.mp3');

    expect(handle.sizeBytes).toBe(10);
    expect(store.reads).toHaveLength(3);
    expect(await fs.readFile(handle.path, 'utf8')).toBe('0123456789');
  });

  it('ignores a throwing progress observer', async () => {
    store.addObject({ id: 'obj-1', containerId: 'owner' }, bytes('abcdef'));
    const handle = await fetcher.retrieve('obj-1', 'a.mp3', () => {
      throw new Error('observer broke');
    });
    expect(await fs.readFile(handle.path, 'utf8')).toBe('abcdef');
  });
});

/* ============= Retries and failures ============= */

describe('Fetcher — failures', () => {
  it('retries transient failures with growing delays', async () => {
    store.addObject({ id: 'obj-1', containerId: 'owner' }, bytes('abcdef'));
    store.failNext.readRange.push(httpError(503), new Error('socket hang up'));

    const handle = await fetcher.retrieve('obj-1', 'a.mp3');

    expect(sleeps).toEqual([800, 1600]);
    expect(await fs.readFile(handle.path, 'utf8')).toBe('abcdef');
    expect(store.reads.map((r) => r.start)).toEqual([0, 0, 0, 4]);
  });

  it('restarts the retry count for each chunk', async () => {
    store.addObject({ id: 'obj-1', containerId: 'owner' }, bytes('abcdef'));
    store.failNext.readRange.push(httpError(500));
    const flaky = store.readRange.bind(store);
    let calls = 0;
    store.readRange = async (id, start, end) => {
      calls++;
      if (calls === 3) throw httpError(502);
      return flaky(id, start, end);
    };

    await fetcher.retrieve('obj-1', 'a.mp3');
    expect(sleeps).toEqual([800, 800]);
  });

  it('aborts on a permanent failure and removes the partial file', async () => {
    store.addObject({ id: 'obj-1', containerId: 'owner' }, bytes('abcdefgh'));
    const original = store.readRange.bind(store);
    store.readRange = async (id, start, end) => {
      if (start > 0) throw httpError(403, 'Forbidden');
      return original(id, start, end);
    };

    const err = await rejection(fetcher.retrieve('obj-1', 'a.mp3'));

    expect(isPipelineError(err)).toBe(true);
    if (!isPipelineError(err)) return;
    expect(err.kind).toBe('RetrievalFailed');
    expect(err.stage).toBe('retrieving');
    expect(err.message).toBe('Retrieval failed (bytes 4-7): Forbidden');
    await expect(fs.access(fetcher.localPathFor('obj-1', 'a.mp3'))).rejects.toThrow();
    expect(sleeps).toEqual([]);
  });

  it('fails when the transfer ends before the reported size', async () => {
    store.addObject({ id: 'obj-1', containerId: 'owner', sizeBytes: 10 }, bytes('abcd'));

    const err = await rejection(fetcher.retrieve('obj-1', 'a.mp3'));

    expect(isPipelineError(err)).toBe(true);
    if (!isPipelineError(err)) return;
    expect(err.kind).toBe('RetrievalFailed');
    expect(err.message).toBe('Retrieval failed: received 4 of 10 bytes');
    expect(store.reads.map((r) => [r.start, r.end])).toEqual([
      [0, 3],
      [4, 7],
    ]);
    await expect(fs.access(fetcher.localPathFor('obj-1', 'a.mp3'))).rejects.toThrow();
  });

  it('fails when the object does not exist', async () => {
    const err = await rejection(fetcher.retrieve('missing', 'gone.mp3'));
    expect(isPipelineError(err) && err.message).toBe('Retrieval failed (metadata): File not found: missing');
  });

  it('rejects a zero chunk size', () => {
    expect(() => new Fetcher(store, { tmpDir, chunkSizeBytes: 0 })).toThrow(RangeError);
  });
});
