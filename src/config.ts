import path from 'path';
import { fileURLToPath } from 'url';
import type { DuplicatePolicy } from './types.js';

// ES Module dirname equivalent
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DATA_DIR = path.join(__dirname, '../data');

const DEFAULT_OS_TYPES = ['OFFICIAL STATEMENT', 'OFFERING MEMORANDUM'];

/**
 * Parse ACCEPTED_OS_TYPES: a comma list, or "*" to accept every type.
 */
export function parseOsTypes(raw: string | undefined): string[] | null {
  if (raw === undefined || raw.trim() === '') return DEFAULT_OS_TYPES;
  if (raw.trim() === '*') return null;
  return raw.split(',').map(t => t.trim().toUpperCase()).filter(t => t.length > 0);
}

export function parseDuplicatePolicy(raw: string | undefined): DuplicatePolicy {
  return raw === 'dedupe-page-amount' ? 'dedupe-page-amount' : 'keep-all';
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || '', 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

// Environment configuration
export const config = {
  logLevel: process.env.LOG_LEVEL || 'info',

  database: {
    url: process.env.DATABASE_URL || '',
    ssl: process.env.DATABASE_SSL === 'true',
  },

  data: {
    registryPath: process.env.ENTITY_REGISTRY_PATH || path.join(DATA_DIR, 'entities.json'),
    overridesPath: process.env.OVERRIDES_PATH || path.join(DATA_DIR, 'overrides.json'),
  },

  processing: {
    batchSize: parsePositiveInt(process.env.BATCH_SIZE, 50),
    acceptedOsTypes: parseOsTypes(process.env.ACCEPTED_OS_TYPES),
    duplicatePolicy: parseDuplicatePolicy(process.env.FEE_DUPLICATE_POLICY),
  },

  pdf: {
    downloadTimeoutMs: parsePositiveInt(process.env.PDF_DOWNLOAD_TIMEOUT_MS, 60000),
  },
} as const;
