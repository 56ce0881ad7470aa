import { describe, it, expect } from 'vitest';
import { coerce, stringifyValue } from '../coerce.js';
import { CANONICAL_FIELDS, FIELD, NA } from '../schema.js';

/* ============= stringifyValue ============= */

describe('stringifyValue', () => {
  it('maps absent and placeholder values to N/A', () => {
    expect(stringifyValue(null)).toBe(NA);
    expect(stringifyValue(undefined)).toBe(NA);
    expect(stringifyValue('   ')).toBe(NA);
    expect(stringifyValue(' none ')).toBe(NA);
    expect(stringifyValue('NULL')).toBe(NA);
    expect(stringifyValue(Number.NaN)).toBe(NA);
    expect(stringifyValue({})).toBe(NA);
    expect(stringifyValue([])).toBe(NA);
  });

  it('renders scalars', () => {
    expect(stringifyValue('  Asha ')).toBe('Asha');
    expect(stringifyValue(7)).toBe('7');
    expect(stringifyValue(true)).toBe('true');
  });

  it('joins arrays line by line, dropping empty items', () => {
    expect(stringifyValue(['Send quote', null, ' ', 'Book demo'])).toBe('Send quote\nBook demo');
  });

  it('serializes nested objects as JSON', () => {
    expect(stringifyValue({ step: 1 })).toBe('{"step":1}');
  });
});

/* ============= coerce ============= */

describe('coerce', () => {
  it('returns exactly the canonical keys in canonical order', () => {
    const record = coerce({ 'Favourite Colour': 'blue', Team: 'North' });
    expect(Object.keys(record)).toEqual([...CANONICAL_FIELDS]);
    expect(record[FIELD.team]).toBe('North');
    expect(Object.values(record).filter((v) => v !== NA)).toEqual(['North']);
  });

  it('resolves aliases and normalized spellings', () => {
    expect(coerce({ owner_name: 'Asha' })[FIELD.owner]).toBe('Asha');
    expect(coerce({ OwnerName: 'Ravi' })[FIELD.owner]).toBe('Ravi');
    expect(coerce({ percent_score: '80%' })[FIELD.percentScore]).toBe('80%');
    expect(coerce({ 'society name': 'Green Acres' })[FIELD.societyName]).toBe('Green Acres');
  });

  it('prefers the exact field name over an alias', () => {
    const record = coerce({ owner: 'From alias', 'Owner (Who handled the meeting)': 'Exact' });
    expect(record[FIELD.owner]).toBe('Exact');
  });

  it('keeps the first non-empty value among aliases', () => {
    const record = coerce({ owner_name: 'N/A', owner: 'Ravi', handled_by: 'Someone else' });
    expect(record[FIELD.owner]).toBe('Ravi');
  });

  it('is idempotent', () => {
    const once = coerce({ date: '2025-03-01', action_items: ['Call back', 'Share deck'], Months: 12 });
    expect(coerce(once)).toEqual(once);
    expect(once[FIELD.date]).toBe('2025-03-01');
    expect(once['Action items']).toBe('Call back\nShare deck');
    expect(once['Months']).toBe('12');
  });
});
