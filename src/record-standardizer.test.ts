import { describe, it, expect } from 'vitest';
import { createRegistry } from './entity-registry.js';
import { NameResolver } from './name-resolver.js';
import { describeUnresolved, standardizeDeal } from './record-standardizer.js';

const { registry } = createRegistry([
  { canonicalName: 'Piper Sandler', nameVariations: ['Piper Sandler & Co.'], websites: ['pipersandler.com'] },
  { canonicalName: 'Loop Capital Markets', nameVariations: ['LOOP CAPITAL'], websites: ['loopcapital.com'] },
  { canonicalName: 'PFM Financial Advisors', nameVariations: ['PFM'], websites: ['pfm.com'] },
  { canonicalName: 'Orrick', nameVariations: ['Orrick, Herrington & Sutcliffe LLP'], websites: ['orrick.com'] },
]);
const resolver = new NameResolver(registry);

describe('standardizeDeal', () => {
  it('maps every slot to canonical names and keeps the raw scrape', () => {
    const result = standardizeDeal(
      {
        lead_managers: ['Piper Sandler & Co.'],
        co_managers: ['https://www.loopcapital.com/'],
        municipal_advisors: ['PFM'],
        counsels: ['Orrick, Herrington & Sutcliffe LLP'],
        os_file_path: '/data/os/123.pdf',
      },
      resolver
    );

    expect(result).toEqual({
      ok: true,
      warnings: [],
      record: {
        lead_managers: ['Piper Sandler'],
        co_managers: ['Loop Capital Markets'],
        municipal_advisors: ['PFM Financial Advisors'],
        counsels: ['Orrick'],
        os_file_path: '/data/os/123.pdf',
        unprocessed_deal_scrape: {
          lead_managers: ['Piper Sandler & Co.'],
          co_managers: ['https://www.loopcapital.com/'],
          municipal_advisors: ['PFM'],
          counsels: ['Orrick, Herrington & Sutcliffe LLP'],
        },
      },
    });
  });

  it('fails without a lead manager', () => {
    expect(standardizeDeal({ co_managers: ['PFM'] }, resolver)).toEqual({
      ok: false,
      reason: 'missing_lead_managers',
    });
  });

  it('treats blank-only lead managers as missing', () => {
    expect(standardizeDeal({ lead_managers: ['', '  '] }, resolver)).toEqual({
      ok: false,
      reason: 'missing_lead_managers',
    });
  });

  it('keeps unresolved values in place and warns', () => {
    const result = standardizeDeal(
      { lead_managers: ['Piper Sandler & Co.', 'Mystery Securities'], co_managers: ['https://acme-capital.com'] },
      resolver
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.lead_managers).toEqual(['Piper Sandler', 'Mystery Securities']);
    expect(result.record.co_managers).toEqual(['https://acme-capital.com']);
    expect(result.warnings).toEqual([
      { slot: 'lead_managers', value: 'Mystery Securities' },
      { slot: 'co_managers', value: 'https://acme-capital.com', suggestion: 'Acme Capital' },
    ]);
  });

  it('drops blank entries but preserves order and duplicates', () => {
    const result = standardizeDeal(
      { lead_managers: ['PFM', '', 'Piper Sandler & Co.', 'Piper Sandler'] },
      resolver
    );

    expect(result.ok && result.record.lead_managers).toEqual([
      'PFM Financial Advisors',
      'Piper Sandler',
      'Piper Sandler',
    ]);
    expect(result.ok && result.record.unprocessed_deal_scrape.lead_managers).toEqual([
      'PFM', '', 'Piper Sandler & Co.', 'Piper Sandler',
    ]);
  });

  it('defaults missing slots and path', () => {
    const result = standardizeDeal({ lead_managers: ['PFM'] }, resolver);

    expect(result.ok && result.record.counsels).toEqual([]);
    expect(result.ok && result.record.os_file_path).toBeNull();
    expect(result.ok && result.record.unprocessed_deal_scrape.counsels).toEqual([]);
  });

  it('does not mutate the input', () => {
    const raw = { lead_managers: ['Piper Sandler & Co.'] };
    standardizeDeal(raw, resolver);
    expect(raw).toEqual({ lead_managers: ['Piper Sandler & Co.'] });
  });
});

describe('describeUnresolved', () => {
  it('names the slot in the singular', () => {
    expect(describeUnresolved({ slot: 'co_managers', value: 'X Securities' })).toBe('Unknown co manager: X Securities');
  });

  it('adds the website suggestion', () => {
    expect(
      describeUnresolved({ slot: 'municipal_advisors', value: 'www.acme.com', suggestion: 'Acme' })
    ).toBe('Unknown municipal advisor: www.acme.com (looks like Acme)');
  });
});
