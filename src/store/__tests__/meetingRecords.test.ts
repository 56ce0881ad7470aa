import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { coerce } from '../../ai/normalizer/coerce.js';
import { CANONICAL_FIELDS, FIELD, NA } from '../../ai/normalizer/schema.js';
import { initSchema } from '../../db/schema.js';
import { SqliteAdapter } from '../../db/sqlite.js';
import { DbRecordSink } from '../meetingRecords.js';

let db: SqliteAdapter;
let sink: DbRecordSink;

beforeEach(async () => {
  db = SqliteAdapter.open(':memory:');
  await initSchema(db);
  sink = new DbRecordSink(db, () => 1_700_000_000_000);
});

afterEach(async () => {
  await db.close();
});

describe('DbRecordSink', () => {
  it('stores records and reads them back in canonical order', async () => {
    const record = coerce({ Team: 'North', 'File ID': 'obj-1' });
    await sink.append(record, { objectId: 'obj-1', fileName: 'call.mp3' });

    const stored = await sink.listByObject('obj-1');
    expect(stored).toHaveLength(1);
    expect(stored[0].id).toHaveLength(12);
    expect(stored[0].fileName).toBe('call.mp3');
    expect(stored[0].createdAt).toBe('2023-11-14T22:13:20.000Z');
    expect(Object.keys(stored[0].record)).toEqual([...CANONICAL_FIELDS]);
    expect(stored[0].record).toEqual(record);
  });

  it('fills fields missing from stored JSON with N/A', async () => {
    await db.run(
      `INSERT INTO meeting_records (id, object_id, file_name, record_json, created_at) VALUES (?, ?, ?, ?, ?)`,
      ['r1', 'obj-2', 'old.mp3', '{"Team": "South", "Months": 12}', 1]
    );
    const [stored] = await sink.listByObject('obj-2');
    expect(stored.record[FIELD.team]).toBe('South');
    expect(stored.record['Months']).toBe(NA);
  });

  it('counts stored records', async () => {
    expect(await sink.count()).toBe(0);
    await sink.append(coerce({}), { objectId: 'a', fileName: 'a.mp3' });
    await sink.append(coerce({}), { objectId: 'b', fileName: 'b.mp3' });
    expect(await sink.count()).toBe(2);
  });
});
