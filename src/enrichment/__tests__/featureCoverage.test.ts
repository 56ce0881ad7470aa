import { describe, it, expect } from 'vitest';
import {
  computeFeatureCoverage,
  loadDefaultFeatureCatalog,
  normalizeText,
  parseFeatureCatalog,
  type FeatureCatalog,
} from '../featureCoverage.js';

const catalog: FeatureCatalog = {
  sections: [
    {
      label: 'ERP',
      features: {
        Budgeting: ['budget'],
        Inventory: ['inventory'],
        'Tally import/export': ['tally'],
      },
    },
    {
      label: 'ASP',
      features: {
        Bookkeeping: ['bookkeeping'],
        'Data backup': ['backup'],
      },
    },
  ],
  priority: ['Tally import/export', 'Data backup'],
};

/* ============= normalizeText ============= */

describe('normalizeText', () => {
  it('drops punctuation, lower-cases and collapses whitespace', () => {
    expect(normalizeText('  E-Invoice,   GST!\nOK ')).toBe('einvoice gst ok');
  });
});

/* ============= computeFeatureCoverage ============= */

describe('computeFeatureCoverage', () => {
  it('summarizes coverage per section and lists missed features by priority', () => {
    const coverage = computeFeatureCoverage('We covered the BUDGET, and inventory!', catalog);
    expect(coverage.summary).toBe(
      'ERP Coverage: 2/3 (67%). Covered: Budgeting, Inventory. ASP Coverage: 0/2 (0%).'
    );
    expect(coverage.missed).toBe('- Tally import/export\n- Data backup\n- Bookkeeping');
  });

  it('covers nothing for an empty transcript', () => {
    const coverage = computeFeatureCoverage('', catalog);
    expect(coverage.summary).toBe('ERP Coverage: 0/3 (0%). ASP Coverage: 0/2 (0%).');
    expect(coverage.missed).toBe(
      '- Tally import/export\n- Data backup\n- Bookkeeping\n- Budgeting\n- Inventory'
    );
  });

  it('returns no missed list when everything is covered', () => {
    const coverage = computeFeatureCoverage('tally budget inventory bookkeeping backup', catalog);
    expect(coverage.missed).toBe('');
    expect(coverage.summary).toBe(
      'ERP Coverage: 3/3 (100%). Covered: Budgeting, Inventory, Tally import/export. ' +
        'ASP Coverage: 2/2 (100%). Covered: Bookkeeping, Data backup.'
    );
  });

  it('matches keywords regardless of punctuation', () => {
    const coverage = computeFeatureCoverage('They asked about e-invoice support.', loadDefaultFeatureCatalog());
    expect(coverage.summary.startsWith('ERP Coverage: 1/19 (5%). Covered: E-invoicing.')).toBe(true);
  });
});

/* ============= Catalog loading ============= */

describe('feature catalog', () => {
  it('loads the bundled catalog', () => {
    const bundled = loadDefaultFeatureCatalog();
    expect(bundled.sections.map((s) => [s.label, Object.keys(s.features).length])).toEqual([
      ['ERP', 19],
      ['ASP', 9],
    ]);
    expect(bundled.priority[0]).toBe('Tally import/export');
  });

  it('ignores malformed sections and keywords', () => {
    const parsed = parseFeatureCatalog({
      catalogs: [{ label: 'ERP', features: { Budgeting: ['budget', 7] } }, { features: {} }, 'junk'],
      priority: ['Budgeting', null],
    });
    expect(parsed).toEqual({
      sections: [{ label: 'ERP', features: { Budgeting: ['budget'] } }],
      priority: ['Budgeting'],
    });
  });

  it('rejects a non-object catalog', () => {
    expect(() => parseFeatureCatalog(null)).toThrow('Feature catalog must be an object');
  });
});
