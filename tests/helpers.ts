import fs from 'fs';
import os from 'os';
import path from 'path';

import { MemoryEntityStore } from '../src/adapters.js';
import { CatalogService } from '../src/catalog-service.js';
import type { CatalogChanges } from '../src/interfaces.js';
import { createSilentLogger, type Logger } from '../src/logger.js';
import { QueryEngine } from '../src/query-engine.js';

export const TEST_SECRET = 'test-secret';

/** Clock that moves one second forward on every reading. */
export function steppingClock(start = Date.UTC(2024, 0, 1, 0, 0, 0)): () => Date {
  let current = start;
  return () => {
    current += 1000;
    return new Date(current);
  };
}

export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export interface TestCatalog {
  store: MemoryEntityStore;
  service: CatalogService;
  queryEngine: QueryEngine;
  logger: Logger;
}

export async function createTestCatalog(initial?: CatalogChanges): Promise<TestCatalog> {
  const store = new MemoryEntityStore(initial);
  const logger = createSilentLogger();
  const service = new CatalogService(store, logger, { generateId: sequentialIds(), now: steppingClock() });
  await service.initialize();
  return { logger, queryEngine: new QueryEngine(store), service, store };
}

export function makeTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `prompt-catalog-${label}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { force: true, recursive: true });
}
