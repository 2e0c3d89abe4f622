#!/usr/bin/env node

/**
 * Catalog validation script
 * -------------------------
 * Loads the configured store and reports every broken invariant: dangling category
 * or tag references, stale category caches, parent cycles, duplicate tag names and
 * prompts pointing at missing versions. Exits with code 1 when anything is wrong.
 *
 * Usage:
 *   npm run validate:catalog
 */

import { entityStoreFactory } from '../adapters.js';
import { loadConfig } from '../config.js';
import { checkConsistency } from '../consistency.js';
import type { EntityStore } from '../interfaces.js';
import { createLogger } from '../logger.js';

export async function validateCatalog(store: EntityStore): Promise<string[]> {
  await store.connect();
  try {
    return checkConsistency(await store.snapshot());
  } finally {
    await store.disconnect();
  }
}

async function main() {
  const config = loadConfig();
  const logger = createLogger(config);
  const store = entityStoreFactory(config.storage, logger);

  const violations = await validateCatalog(store);
  if (violations.length === 0) {
    logger.info('Catalog is consistent');
    return;
  }
  for (const violation of violations) {
    logger.error(violation);
  }
  logger.error(`${violations.length} consistency violation(s) found`);
  process.exitCode = 1;
}

if (require.main === module) {
  main().catch(error => {
    console.error('Validation failed:', error);
    process.exit(1);
  });
}
