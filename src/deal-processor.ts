/**
 * Deal Processor - underwriting fee extraction over every stored deal
 *
 * Walks the deal store in id order, one batch at a time. Per document:
 * 1. Apply URL-keyed overrides (a corrected os_type decides step 2)
 * 2. Skip document types that are not official statements
 * 3. Skip documents that already carry a fee, unless reprocessing
 * 4. Extract the fee from the official statement PDF and write it back
 *
 * A failure on one document is recorded and the run moves on.
 */

import { config } from './config.js';
import type { DealStore, StoredDeal } from './db/deal-store.js';
import { errorMessage } from './errors.js';
import { extractFees } from './fee-extractor.js';
import { logger as rootLogger, type Logger } from './logger.js';
import type { NameResolver } from './name-resolver.js';
import type { DocumentTextSource } from './os-text.js';
import { applyOverrides, describeChange, overriddenFieldsSnapshot } from './overrides.js';
import { extractParties, standardizeParties } from './party-extractor.js';
import type {
  DuplicatePolicy,
  FeeExtractionResult,
  JsonObject,
  JsonValue,
  OverrideChange,
  OverrideTable,
} from './types.js';

export interface ProcessOptions {
  reprocessProcessed?: boolean;
  batchSize?: number;
  /** null accepts every os_type */
  acceptedOsTypes?: readonly string[] | null;
  duplicatePolicy?: DuplicatePolicy;
}

export interface ProcessDeps {
  store: DealStore;
  textSource: DocumentTextSource;
  overrides: OverrideTable;
  /** When set, underwriter names found in the PDF are mapped to canonical names */
  resolver?: NameResolver;
  logger?: Logger;
}

interface DocumentRecord {
  doc_id: string;
  obligor: string;
  os_type: string | null;
  url: string;
}

export interface FailureRecord extends DocumentRecord {
  path: string;
  reason: string;
}

export interface SuccessRecord extends DocumentRecord {
  pdf_path: string;
  old_fee: JsonValue;
  new_fee: number;
  amounts: number[];
  are_amounts_identical: boolean;
}

export interface OverriddenDocument {
  doc_id: string;
  url: string;
  changes: OverrideChange[];
}

export interface ProcessRunResult {
  total_documents: number;
  skipped_os_type: number;
  already_processed: number;
  missing_path: number;
  processing_failed: number;
  successfully_processed: number;
  failed_documents: FailureRecord[];
  successful_documents: SuccessRecord[];
  overridden_documents: OverriddenDocument[];
}

export const NO_PDF_PATH = 'No PDF path found';
export const NO_DISCOUNT_FOUND = 'No discount found in PDF';

function stringField(data: JsonObject, field: string): string | null {
  const value = data[field];
  return typeof value === 'string' ? value : null;
}

function describeDocument(deal: StoredDeal, data: JsonObject): DocumentRecord {
  return {
    doc_id: deal.id,
    obligor: stringField(data, 'series_name_obligor') ?? 'Unknown',
    os_type: stringField(data, 'os_type'),
    url: stringField(data, 'url') ?? 'N/A',
  };
}

function isAcceptedOsType(osType: string | null, accepted: readonly string[] | null): boolean {
  if (accepted === null) return true;
  return osType !== null && accepted.includes(osType.trim().toUpperCase());
}

/**
 * Persisted form of a fee extraction
 */
export function feeResultToJson(result: FeeExtractionResult): JsonObject {
  const breakdown = result.scrape_breakdown;
  return {
    total: result.total,
    scrape_success: result.scrape_success,
    scrape_breakdown: {
      amounts: breakdown.amounts,
      candidates: breakdown.candidates.map(c => ({
        page: c.page,
        pattern: c.pattern,
        raw: c.raw,
        amount: c.amount,
      })),
      are_amounts_identical: breakdown.are_amounts_identical,
      is_dupe_review_completed: breakdown.is_dupe_review_completed,
      duplicate_policy: breakdown.duplicate_policy,
      collapsed_duplicates: breakdown.collapsed_duplicates,
    },
  };
}

export function emptyRunResult(): ProcessRunResult {
  return {
    total_documents: 0,
    skipped_os_type: 0,
    already_processed: 0,
    missing_path: 0,
    processing_failed: 0,
    successfully_processed: 0,
    failed_documents: [],
    successful_documents: [],
    overridden_documents: [],
  };
}

export async function processDeals(deps: ProcessDeps, options: ProcessOptions = {}): Promise<ProcessRunResult> {
  const log = deps.logger ?? rootLogger;
  const reprocessProcessed = options.reprocessProcessed ?? true;
  const batchSize = options.batchSize ?? config.processing.batchSize;
  const acceptedOsTypes =
    options.acceptedOsTypes === undefined ? config.processing.acceptedOsTypes : options.acceptedOsTypes;
  const duplicatePolicy = options.duplicatePolicy ?? config.processing.duplicatePolicy;

  const results = emptyRunResult();
  let afterId: string | null = null;

  while (true) {
    const batch = await deps.store.listBatch(afterId, batchSize);
    if (batch.length === 0) break;

    for (const deal of batch) {
      results.total_documents++;

      const url = stringField(deal.data, 'url');
      const { record: data, changes } = applyOverrides(deps.overrides, url, deal.data);
      if (changes.length > 0) {
        results.overridden_documents.push({ doc_id: deal.id, url: url ?? 'N/A', changes });
        for (const change of changes) {
          log.warn({ dealId: deal.id, url }, `Override applied: ${describeChange(change)}`);
        }
      }

      const doc = describeDocument(deal, data);

      if (!isAcceptedOsType(doc.os_type, acceptedOsTypes)) {
        results.skipped_os_type++;
        continue;
      }

      const existingFee = data.underwriters_fee_total;
      if (existingFee !== undefined && existingFee !== null) {
        if (!reprocessProcessed) {
          log.debug({ dealId: deal.id }, 'Skipping already processed document');
          results.already_processed++;
          continue;
        }
        log.info({ dealId: deal.id, existingFee }, 'Reprocessing document with existing fee');
      }

      const osFilePath = stringField(data, 'os_file_path');
      if (!osFilePath) {
        results.missing_path++;
        results.failed_documents.push({ ...doc, path: 'Missing', reason: NO_PDF_PATH });
        log.warn({ dealId: deal.id, url: doc.url }, 'Missing PDF path');
        continue;
      }

      try {
        const pages = await deps.textSource.loadPages(osFilePath);
        const extraction = extractFees(pages, { duplicatePolicy });
        const parties = extractParties(pages);
        const underwriters = deps.resolver ? standardizeParties(parties, deps.resolver) : parties;
        const pdfUnderwriters: JsonObject = {
          underwriter_lead_left: underwriters.underwriter_lead_left,
          underwriter_all: underwriters.underwriter_all,
        };

        if (extraction.status === 'not_found') {
          await deps.store.updateDeal(deal.id, {
            underwriter_fee: { total: null, scrape_success: false, reason: extraction.reason },
            pdf_underwriters: pdfUnderwriters,
          });
          results.processing_failed++;
          results.failed_documents.push({ ...doc, path: osFilePath, reason: NO_DISCOUNT_FOUND });
          log.info({ dealId: deal.id, reason: extraction.reason }, NO_DISCOUNT_FOUND);
          continue;
        }

        const fee = extraction.result;
        const oldFee: JsonValue = existingFee ?? null;
        await deps.store.updateDeal(deal.id, {
          previous_underwriters_fee_total: oldFee,
          underwriters_fee_total: fee.total,
          underwriter_fee: feeResultToJson(fee),
          pdf_underwriters: pdfUnderwriters,
          unprocessed_pdf_scrape_before_override: {
            overridden_fields: overriddenFieldsSnapshot(changes),
            original_url: url,
          },
        });

        results.successfully_processed++;
        results.successful_documents.push({
          ...doc,
          pdf_path: osFilePath,
          old_fee: oldFee,
          new_fee: fee.total,
          amounts: fee.scrape_breakdown.amounts,
          are_amounts_identical: fee.scrape_breakdown.are_amounts_identical,
        });
      } catch (e) {
        results.processing_failed++;
        results.failed_documents.push({ ...doc, path: osFilePath, reason: errorMessage(e) });
        log.error(
          { dealId: deal.id, obligor: doc.obligor, pdfPath: osFilePath, osType: doc.os_type, err: e },
          'Error processing deal'
        );
      }
    }

    afterId = batch[batch.length - 1].id;
    log.info({ afterId }, 'Processed batch');

    if (batch.length < batchSize) break;
  }

  return results;
}

// ============================================================
// SUMMARY
// ============================================================

export interface RunSummary {
  counts: {
    total_documents: number;
    skipped_os_type: number;
    already_processed: number;
    missing_path: number;
    processing_failed: number;
    successfully_processed: number;
  };
  failures_by_os_type: Record<string, FailureRecord[]>;
  multi_amount_documents: SuccessRecord[];
  overrides: Array<{ doc_id: string; url: string; fields: string[] }>;
}

export function summarizeRun(results: ProcessRunResult, log: Logger = rootLogger): RunSummary {
  const failuresByOsType: Record<string, FailureRecord[]> = {};
  for (const failure of results.failed_documents) {
    const key = failure.os_type ?? 'UNKNOWN';
    (failuresByOsType[key] ??= []).push(failure);
  }

  const summary: RunSummary = {
    counts: {
      total_documents: results.total_documents,
      skipped_os_type: results.skipped_os_type,
      already_processed: results.already_processed,
      missing_path: results.missing_path,
      processing_failed: results.processing_failed,
      successfully_processed: results.successfully_processed,
    },
    failures_by_os_type: failuresByOsType,
    multi_amount_documents: results.successful_documents.filter(s => !s.are_amounts_identical),
    overrides: results.overridden_documents.map(o => ({
      doc_id: o.doc_id,
      url: o.url,
      fields: o.changes.map(c => c.field),
    })),
  };

  log.info(summary.counts, 'Processing complete');

  for (const [osType, failures] of Object.entries(failuresByOsType)) {
    log.info({ osType, count: failures.length }, 'Failed documents');
    for (const failure of failures) {
      log.info(
        { dealId: failure.doc_id, obligor: failure.obligor, path: failure.path, url: failure.url },
        failure.reason
      );
    }
  }

  for (const doc of summary.multi_amount_documents) {
    log.info({ dealId: doc.doc_id, amounts: doc.amounts, total: doc.new_fee }, 'Multiple fee amounts, needs review');
  }

  for (const override of summary.overrides) {
    log.info({ dealId: override.doc_id, url: override.url, fields: override.fields }, 'Overrides applied');
  }

  return summary;
}
