/**
 * Tests for batch fee processing (deal-processor.ts)
 *
 * Runs against the in-memory deal store and a canned text source.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { pino } from 'pino';
import { createRegistry } from './entity-registry.js';
import { DocumentLoadError } from './errors.js';
import { NameResolver } from './name-resolver.js';
import type { DocumentTextSource } from './os-text.js';
import {
  NO_DISCOUNT_FOUND,
  NO_PDF_PATH,
  processDeals,
  summarizeRun,
  type ProcessDeps,
  type ProcessOptions,
} from './deal-processor.js';
import { MemoryDealStore } from './testing/memory-deal-store.js';
import type { JsonObject, OverrideTable } from './types.js';

const silent = pino({ level: 'silent' });

const OVERRIDE_URL = 'https://portal.example/deal/2';

class CannedTextSource implements DocumentTextSource {
  readonly requested: string[] = [];

  constructor(private readonly files: Record<string, string[]>) {}

  async loadPages(location: string): Promise<string[]> {
    this.requested.push(location);
    const pages = this.files[location];
    if (!pages) throw new DocumentLoadError(location, 'file not found');
    return pages;
  }
}

const FILES: Record<string, string[]> = {
  '/os/d1.pdf': [
    'underwriting discount of $1,000.00',
    'The Bonds are being purchased by Piper Sandler & Co. (the "Underwriter").',
  ],
  '/os/d4.pdf': ['This page has no fee language.'],
  '/os/d6.pdf': ['underwriting discount of $600.00', 'underwriting discount of $650.00'],
  '/os/fixed.pdf': ['underwriting discount of $75.00'],
};

function seedDeals(): Record<string, JsonObject> {
  return {
    d1: {
      url: 'https://portal.example/deal/1',
      os_type: 'OFFICIAL STATEMENT',
      os_file_path: '/os/d1.pdf',
      series_name_obligor: 'City of Alder',
    },
    d2: { url: OVERRIDE_URL, os_type: 'OFFICIAL STATEMENT', os_file_path: '/os/d2.pdf' },
    d3: { url: 'https://portal.example/deal/3', os_type: 'OFFICIAL STATEMENT', os_file_path: null },
    d4: { url: 'https://portal.example/deal/4', os_type: 'OFFERING MEMORANDUM', os_file_path: '/os/d4.pdf' },
    d5: { os_type: 'OFFICIAL STATEMENT', os_file_path: '/os/missing.pdf' },
    d6: {
      url: 'https://portal.example/deal/6',
      os_type: 'OFFICIAL STATEMENT',
      os_file_path: '/os/d6.pdf',
      underwriters_fee_total: 500,
    },
    d7: { url: 'https://portal.example/deal/7', os_type: 'NOTICE', os_file_path: '/os/d7.pdf' },
  };
}

const overrides: OverrideTable = {
  [OVERRIDE_URL]: { os_type: 'COMMERCIAL PAPER OFFERING MEMORANDUM' },
};

const { registry } = createRegistry([
  { canonicalName: 'Piper Sandler', nameVariations: ['Piper Sandler & Co.'], websites: [] },
]);

const baseOptions: ProcessOptions = {
  batchSize: 2,
  acceptedOsTypes: ['OFFICIAL STATEMENT', 'OFFERING MEMORANDUM'],
  duplicatePolicy: 'keep-all',
};

describe('processDeals', () => {
  let store: MemoryDealStore;
  let textSource: CannedTextSource;
  let deps: ProcessDeps;

  beforeEach(() => {
    store = new MemoryDealStore(seedDeals());
    textSource = new CannedTextSource(FILES);
    deps = { store, textSource, overrides, resolver: new NameResolver(registry), logger: silent };
  });

  it('counts every outcome across batches', async () => {
    const results = await processDeals(deps, baseOptions);

    expect({
      total_documents: results.total_documents,
      skipped_os_type: results.skipped_os_type,
      already_processed: results.already_processed,
      missing_path: results.missing_path,
      processing_failed: results.processing_failed,
      successfully_processed: results.successfully_processed,
    }).toEqual({
      total_documents: 7,
      skipped_os_type: 2,
      already_processed: 0,
      missing_path: 1,
      processing_failed: 2,
      successfully_processed: 2,
    });
  });

  it('writes the fee, breakdown and audit fields on success', async () => {
    await processDeals(deps, baseOptions);

    expect(store.updates.find(u => u.id === 'd1')?.patch).toEqual({
      previous_underwriters_fee_total: null,
      underwriters_fee_total: 1000,
      underwriter_fee: {
        total: 1000,
        scrape_success: true,
        scrape_breakdown: {
          amounts: [1000],
          candidates: [{ page: 1, pattern: 'fee_noun_of_amount', raw: '1,000.00', amount: 1000 }],
          are_amounts_identical: true,
          is_dupe_review_completed: true,
          duplicate_policy: 'keep-all',
          collapsed_duplicates: 0,
        },
      },
      pdf_underwriters: { underwriter_lead_left: 'Piper Sandler', underwriter_all: ['Piper Sandler'] },
      unprocessed_pdf_scrape_before_override: {
        overridden_fields: {},
        original_url: 'https://portal.example/deal/1',
      },
    });
    // Merged into the stored document
    expect(store.get('d1')?.series_name_obligor).toBe('City of Alder');
    expect(store.get('d1')?.underwriters_fee_total).toBe(1000);
  });

  it('keeps the previous fee when reprocessing', async () => {
    const results = await processDeals(deps, baseOptions);

    expect(store.get('d6')?.previous_underwriters_fee_total).toBe(500);
    expect(store.get('d6')?.underwriters_fee_total).toBe(1250);
    expect(results.successful_documents.find(s => s.doc_id === 'd6')).toEqual({
      doc_id: 'd6',
      obligor: 'Unknown',
      os_type: 'OFFICIAL STATEMENT',
      url: 'https://portal.example/deal/6',
      pdf_path: '/os/d6.pdf',
      old_fee: 500,
      new_fee: 1250,
      amounts: [600, 650],
      are_amounts_identical: false,
    });
  });

  it('skips documents that already have a fee when asked to', async () => {
    const results = await processDeals(deps, { ...baseOptions, reprocessProcessed: false });

    expect(results.already_processed).toBe(1);
    expect(results.successfully_processed).toBe(1);
    expect(textSource.requested).not.toContain('/os/d6.pdf');
    expect(store.get('d6')?.underwriters_fee_total).toBe(500);
  });

  it('applies overrides before the os_type filter and never persists them', async () => {
    const results = await processDeals(deps, baseOptions);

    expect(textSource.requested).not.toContain('/os/d2.pdf');
    expect(results.overridden_documents).toEqual([
      {
        doc_id: 'd2',
        url: OVERRIDE_URL,
        changes: [
          {
            field: 'os_type',
            previous: { present: true, value: 'OFFICIAL STATEMENT' },
            next: 'COMMERCIAL PAPER OFFERING MEMORANDUM',
          },
        ],
      },
    ]);
    expect(store.get('d2')?.os_type).toBe('OFFICIAL STATEMENT');
  });

  it('records a missing path without touching the document', async () => {
    const results = await processDeals(deps, baseOptions);

    expect(results.failed_documents.find(f => f.doc_id === 'd3')).toEqual({
      doc_id: 'd3',
      obligor: 'Unknown',
      os_type: 'OFFICIAL STATEMENT',
      url: 'https://portal.example/deal/3',
      path: 'Missing',
      reason: NO_PDF_PATH,
    });
    expect(store.updates.some(u => u.id === 'd3')).toBe(false);
  });

  it('marks a document without a fee as a failed scrape', async () => {
    const results = await processDeals(deps, baseOptions);

    expect(store.get('d4')?.underwriter_fee).toEqual({
      total: null,
      scrape_success: false,
      reason: 'no_candidates',
    });
    expect(store.get('d4')?.pdf_underwriters).toEqual({ underwriter_lead_left: null, underwriter_all: [] });
    expect(results.failed_documents.find(f => f.doc_id === 'd4')?.reason).toBe(NO_DISCOUNT_FOUND);
  });

  it('records a load error and carries on', async () => {
    const results = await processDeals(deps, baseOptions);

    expect(results.failed_documents.find(f => f.doc_id === 'd5')).toEqual({
      doc_id: 'd5',
      obligor: 'Unknown',
      os_type: 'OFFICIAL STATEMENT',
      url: 'N/A',
      path: '/os/missing.pdf',
      reason: 'Failed to load document /os/missing.pdf: file not found',
    });
    expect(results.successful_documents.map(s => s.doc_id)).toEqual(['d1', 'd6']);
  });

  it('uses an overridden path and audits the replaced value', async () => {
    const url = 'https://portal.example/deal/9';
    store = new MemoryDealStore({ d9: { url, os_type: 'OFFICIAL STATEMENT', os_file_path: null } });
    const results = await processDeals(
      { ...deps, store, overrides: { [url]: { os_file_path: '/os/fixed.pdf' } } },
      baseOptions
    );

    expect(results.successfully_processed).toBe(1);
    expect(store.get('d9')?.underwriters_fee_total).toBe(75);
    expect(store.get('d9')?.unprocessed_pdf_scrape_before_override).toEqual({
      overridden_fields: { os_file_path: null },
      original_url: url,
    });
  });

  it('accepts every os_type when the filter is disabled', async () => {
    store = new MemoryDealStore({ n1: { os_type: 'NOTICE', os_file_path: '/os/fixed.pdf' } });
    const results = await processDeals({ ...deps, store }, { ...baseOptions, acceptedOsTypes: null });

    expect(results.skipped_os_type).toBe(0);
    expect(results.successfully_processed).toBe(1);
  });

  it('keeps raw party names without a resolver', async () => {
    store = new MemoryDealStore({ d1: seedDeals().d1 });
    await processDeals({ store, textSource, overrides: {}, logger: silent }, baseOptions);

    expect(store.get('d1')?.pdf_underwriters).toEqual({
      underwriter_lead_left: 'Piper Sandler & Co.',
      underwriter_all: ['Piper Sandler & Co.'],
    });
  });
});

describe('summarizeRun', () => {
  it('groups failures by os_type and lists documents needing review', async () => {
    const store = new MemoryDealStore(seedDeals());
    const results = await processDeals(
      { store, textSource: new CannedTextSource(FILES), overrides, logger: silent },
      baseOptions
    );

    const summary = summarizeRun(results, silent);

    expect(summary.counts.total_documents).toBe(7);
    expect(Object.keys(summary.failures_by_os_type).sort()).toEqual(['OFFERING MEMORANDUM', 'OFFICIAL STATEMENT']);
    expect(summary.failures_by_os_type['OFFICIAL STATEMENT'].map(f => f.doc_id)).toEqual(['d3', 'd5']);
    expect(summary.failures_by_os_type['OFFERING MEMORANDUM'].map(f => f.doc_id)).toEqual(['d4']);
    expect(summary.multi_amount_documents.map(d => d.doc_id)).toEqual(['d6']);
    expect(summary.overrides).toEqual([{ doc_id: 'd2', url: OVERRIDE_URL, fields: ['os_type'] }]);
  });

  it('files failures without an os_type under UNKNOWN', () => {
    const summary = summarizeRun(
      {
        total_documents: 1,
        skipped_os_type: 0,
        already_processed: 0,
        missing_path: 1,
        processing_failed: 0,
        successfully_processed: 0,
        failed_documents: [
          { doc_id: 'x', obligor: 'Unknown', os_type: null, url: 'N/A', path: 'Missing', reason: NO_PDF_PATH },
        ],
        successful_documents: [],
        overridden_documents: [],
      },
      silent
    );

    expect(Object.keys(summary.failures_by_os_type)).toEqual(['UNKNOWN']);
  });
});
