#!/usr/bin/env node

/**
 * Copies the JSON file store into Postgres.
 *
 * Usage:
 *   npm run migrate:store
 *
 * Reads CATALOG_DATA_DIR and writes to the POSTGRES_* database. Existing rows in
 * the target are replaced.
 */

import { FileEntityStore, entityStoreFactory } from '../adapters.js';
import { loadConfig } from '../config.js';
import { assertConsistent } from '../consistency.js';
import type { EntityStore } from '../interfaces.js';
import { createLogger, type Logger } from '../logger.js';

export interface MigrationSummary {
  categories: number;
  tags: number;
  prompts: number;
  versions: number;
}

/**
 * Copies a full snapshot from `source` to `target` in one commit. An inconsistent
 * source is refused so broken references are never carried over.
 */
export async function migrateStore(source: EntityStore, target: EntityStore, logger: Logger): Promise<MigrationSummary> {
  await source.connect();
  await target.connect();
  try {
    const snapshot = await source.snapshot();
    assertConsistent(snapshot);
    await target.exclusive(() => target.commit(snapshot));
    const summary = {
      categories: snapshot.categories.length,
      prompts: snapshot.prompts.length,
      tags: snapshot.tags.length,
      versions: snapshot.versions.length,
    };
    logger.info(summary, 'Catalog migrated');
    return summary;
  } finally {
    await source.disconnect();
    await target.disconnect();
  }
}

async function main() {
  const config = loadConfig();
  const logger = createLogger(config);
  const source = new FileEntityStore({ dataDir: config.storage.dataDir }, logger);
  const target = entityStoreFactory({ ...config.storage, type: 'postgres' }, logger);
  await migrateStore(source, target, logger);
}

if (require.main === module) {
  main().catch(error => {
    console.error('Migration failed:', error);
    process.exit(1);
  });
}
