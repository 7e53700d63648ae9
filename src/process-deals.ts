/**
 * Extract underwriting fees for every stored deal
 *
 * Usage:
 *   npm run process-deals -- [--skip-processed] [--batch-size N]
 */

import 'dotenv/config';
import { randomUUID } from 'crypto';
import { config } from './config.js';
import { processDeals, summarizeRun, type ProcessOptions } from './deal-processor.js';
import { loadRegistry } from './entity-registry.js';
import { createRunLogger } from './logger.js';
import { NameResolver } from './name-resolver.js';
import { PdfTextSource } from './os-text.js';
import { loadOverrideTable } from './overrides.js';

export function parseArgs(args: readonly string[]): ProcessOptions {
  const options: ProcessOptions = {
    reprocessProcessed: !args.includes('--skip-processed'),
  };

  const batchIndex = args.indexOf('--batch-size');
  if (batchIndex >= 0) {
    const batchSize = parseInt(args[batchIndex + 1] ?? '', 10);
    if (Number.isFinite(batchSize) && batchSize > 0) {
      options.batchSize = batchSize;
    }
  }

  return options;
}

async function main() {
  const log = createRunLogger(randomUUID());
  const options = parseArgs(process.argv.slice(2));

  // Loaded here so importing parseArgs does not open a pool
  const { db, closeDb } = await import('./db/index.js');
  const { DrizzleDealStore } = await import('./db/deal-store.js');

  const { registry, conflicts } = loadRegistry(config.data.registryPath);
  for (const conflict of conflicts) {
    log.warn(conflict, 'Entity registry conflict');
  }
  const overrides = loadOverrideTable(config.data.overridesPath);
  log.info(
    { entities: registry.size, overrides: Object.keys(overrides).length, ...options },
    'Starting fee extraction'
  );

  try {
    const results = await processDeals(
      {
        store: new DrizzleDealStore(db),
        textSource: new PdfTextSource(),
        overrides,
        resolver: new NameResolver(registry),
        logger: log,
      },
      options
    );
    summarizeRun(results, log);
  } finally {
    await closeDb();
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    createRunLogger('fatal').fatal({ err }, 'Fee extraction failed');
    process.exitCode = 1;
  });
}
