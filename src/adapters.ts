/**
 * Entity store adapters
 * File (one JSON array per collection behind a manifest), memory and Postgres
 * implementations of EntityStore.
 */

import * as fsp from 'fs/promises';
import path from 'path';

import lockfile from 'proper-lockfile';
import pg from 'pg';
import { z } from 'zod';

import type { StorageConfig } from './config.js';
import { LockError, StorageError, describeError } from './errors.js';
import {
  ENTITY_KINDS,
  type CatalogChanges,
  type CatalogSnapshot,
  type EntityKind,
  type EntityStore,
} from './interfaces.js';
import type { Logger } from './logger.js';
import { collectionSchemas } from './schemas.js';
import { SerialLock, atomicWriteFile, isErrnoException } from './utils.js';

export function entityStoreFactory(config: StorageConfig, logger: Logger): EntityStore {
  switch (config.type) {
    case 'file':
      logger.info(`Using file entity store with directory: ${config.dataDir}`);
      return new FileEntityStore({ dataDir: config.dataDir }, logger);
    case 'memory':
      logger.info('Using memory entity store');
      return new MemoryEntityStore();
    case 'postgres':
      logger.info(`Using postgres entity store with host: ${config.postgres.host ?? 'localhost'}`);
      return new PostgresEntityStore(
        createPgPool({
          database: config.postgres.database,
          host: config.postgres.host,
          max: config.postgres.maxConnections,
          password: config.postgres.password,
          port: config.postgres.port,
          ssl: config.postgres.ssl,
          user: config.postgres.user,
        }),
        { schemaFile: config.postgres.schemaFile },
        logger,
      );
    default: {
      const unknownType: never = config.type;
      throw new Error(`Unknown entity store type: ${String(unknownType)}`);
    }
  }
}

function parseCollection<K extends EntityKind>(kind: K, data: unknown, location: string): CatalogSnapshot[K] {
  const result = collectionSchemas[kind].safeParse(data);
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new StorageError(`Stored ${kind} failed validation in ${location}: ${issues}`, location);
  }
  return result.data;
}

function changedKinds(changes: CatalogChanges): EntityKind[] {
  return ENTITY_KINDS.filter(kind => changes[kind] !== undefined);
}

export interface FileEntityStoreOptions {
  dataDir: string;
  /** Attempts to take the cross-process lock before giving up with LockError. */
  lockRetries?: number;
}

const MANIFEST_FILE = 'manifest.json';
const MANIFEST_READ_ATTEMPTS = 5;

const manifestSchema = z.object({
  files: z.object({
    categories: z.string().min(1).optional(),
    prompts: z.string().min(1).optional(),
    tags: z.string().min(1).optional(),
    versions: z.string().min(1).optional(),
  }),
  generation: z.number().int().nonnegative(),
});

type Manifest = z.infer<typeof manifestSchema>;

/** A file named by the manifest was removed because a newer commit replaced it. */
class ManifestMovedError extends Error {}

function parseJson(content: string, filePath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error: unknown) {
    throw new StorageError(`Corrupt JSON in ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
}

/**
 * FileEntityStore Implementation
 * Stores each collection as a JSON array. `manifest.json` names the current file
 * of every collection; a commit writes new generation files and then swaps the
 * manifest with a single rename, so readers and crashes see all of a commit or
 * none of it. A collection the manifest does not list is read from
 * `<dataDir>/<kind>.json`.
 */
export class FileEntityStore implements EntityStore {
  private readonly dataDir: string;
  private readonly lockTarget: string;
  private readonly lockRetries: number;
  private readonly serial = new SerialLock();
  private readonly logger: Logger;
  private connected = false;

  public constructor(options: FileEntityStoreOptions, logger: Logger) {
    this.dataDir = options.dataDir;
    this.lockTarget = path.join(options.dataDir, 'catalog');
    this.lockRetries = options.lockRetries ?? 5;
    this.logger = logger.child({ component: 'file-entity-store' });
  }

  /** Location of a collection that no commit has written yet. */
  public collectionFile(kind: EntityKind): string {
    return path.join(this.dataDir, `${kind}.json`);
  }

  /** Location of the collection's current file. */
  public async collectionPath(kind: EntityKind): Promise<string> {
    return this.resolveFile(kind, await this.readManifest()).filePath;
  }

  public async connect(): Promise<void> {
    try {
      await fsp.mkdir(this.dataDir, { recursive: true });
    } catch (error: unknown) {
      throw new StorageError(`Failed to prepare data directory ${this.dataDir}: ${describeError(error)}`, this.dataDir, {
        cause: error,
      });
    }
    // Fail at startup on corrupt files rather than on the first request.
    const snapshot = await this.snapshot();
    for (const kind of ENTITY_KINDS) {
      this.logger.debug({ count: snapshot[kind].length, kind }, 'Collection validated');
    }
    this.connected = true;
  }

  public async disconnect(): Promise<void> {
    this.connected = false;
  }

  public async healthCheck(): Promise<boolean> {
    if (!this.connected) return false;
    try {
      await fsp.access(this.dataDir);
      return true;
    } catch {
      return false;
    }
  }

  public load<K extends EntityKind>(kind: K): Promise<CatalogSnapshot[K]> {
    return this.readConsistently(manifest => this.readCollection(kind, manifest));
  }

  public async save<K extends EntityKind>(kind: K, items: CatalogSnapshot[K]): Promise<void> {
    const changes: CatalogChanges = {};
    changes[kind] = items;
    await this.commit(changes);
  }

  /**
   * Writes every changed collection to a new generation file, then replaces the
   * manifest. Until that last rename nothing a reader resolves has changed; on
   * failure the new files are removed and the previous state stays current.
   */
  public async commit(changes: CatalogChanges): Promise<void> {
    const kinds = changedKinds(changes);
    if (kinds.length === 0) return;

    const previous = await this.readManifest();
    const next: Manifest = { files: { ...previous.files }, generation: previous.generation + 1 };
    const written: string[] = [];
    try {
      for (const kind of kinds) {
        const fileName = `${kind}.${next.generation}.json`;
        const target = path.join(this.dataDir, fileName);
        const items = parseCollection(kind, changes[kind], target);
        await atomicWriteFile(target, `${JSON.stringify(items, null, 2)}\n`);
        written.push(target);
        next.files[kind] = fileName;
      }
      await atomicWriteFile(this.manifestFile(), `${JSON.stringify(next, null, 2)}\n`);
    } catch (error: unknown) {
      await Promise.all(written.map(file => fsp.rm(file, { force: true })));
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Failed to commit catalog changes in ${this.dataDir}: ${describeError(error)}`, this.dataDir, {
        cause: error,
      });
    }

    await this.removeSuperseded(previous, kinds);
    this.logger.debug({ generation: next.generation, kinds }, 'Catalog changes committed');
  }

  /** All four collections as named by one manifest. */
  public snapshot(): Promise<CatalogSnapshot> {
    return this.readConsistently(async manifest => {
      const [categories, tags, prompts, versions] = await Promise.all([
        this.readCollection('categories', manifest),
        this.readCollection('tags', manifest),
        this.readCollection('prompts', manifest),
        this.readCollection('versions', manifest),
      ]);
      return { categories, prompts, tags, versions };
    });
  }

  public exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.serial.run(() => this.withLock(fn));
  }

  private manifestFile(): string {
    return path.join(this.dataDir, MANIFEST_FILE);
  }

  private resolveFile(kind: EntityKind, manifest: Manifest): { filePath: string; listed: boolean } {
    const fileName = manifest.files[kind];
    return fileName
      ? { filePath: path.join(this.dataDir, fileName), listed: true }
      : { filePath: this.collectionFile(kind), listed: false };
  }

  private async readManifest(): Promise<Manifest> {
    const filePath = this.manifestFile();
    let content: string;
    try {
      content = await fsp.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { files: {}, generation: 0 };
      }
      throw new StorageError(`Failed to read ${filePath}: ${describeError(error)}`, filePath, { cause: error });
    }
    const result = manifestSchema.safeParse(parseJson(content, filePath));
    if (!result.success) {
      throw new StorageError(`${filePath} is not a valid catalog manifest`, filePath);
    }
    return result.data;
  }

  /** Runs `read` against the current manifest, starting over when a commit lands in between. */
  private async readConsistently<T>(read: (manifest: Manifest) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const manifest = await this.readManifest();
      try {
        return await read(manifest);
      } catch (error: unknown) {
        if (!(error instanceof ManifestMovedError)) throw error;
        if (attempt >= MANIFEST_READ_ATTEMPTS) {
          throw new StorageError(
            `Catalog in ${this.dataDir} kept changing while it was read: ${error.message}`,
            this.dataDir,
          );
        }
        this.logger.debug({ attempt, generation: manifest.generation }, 'Manifest moved during read, retrying');
      }
    }
  }

  private async readCollection<K extends EntityKind>(kind: K, manifest: Manifest): Promise<CatalogSnapshot[K]> {
    const { filePath, listed } = this.resolveFile(kind, manifest);
    let content: string;
    try {
      content = await fsp.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw new StorageError(`Failed to read ${filePath}: ${describeError(error)}`, filePath, { cause: error });
      }
      if ((await this.readManifest()).generation !== manifest.generation) {
        throw new ManifestMovedError(`${filePath} was superseded`);
      }
      if (listed) {
        throw new StorageError(`${filePath} is listed in ${MANIFEST_FILE} but missing`, filePath);
      }
      return parseCollection(kind, [], filePath);
    }

    if (content.trim() === '') {
      return parseCollection(kind, [], filePath);
    }
    return parseCollection(kind, parseJson(content, filePath), filePath);
  }

  /** Deletes the files the last commit replaced. The commit already stands, so failures are only logged. */
  private async removeSuperseded(previous: Manifest, kinds: readonly EntityKind[]): Promise<void> {
    for (const kind of kinds) {
      const { filePath } = this.resolveFile(kind, previous);
      try {
        await fsp.rm(filePath, { force: true });
      } catch (error: unknown) {
        this.logger.warn({ err: error, file: filePath }, 'Could not remove superseded collection file');
      }
    }
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await fsp.mkdir(this.dataDir, { recursive: true });
    let release: (() => Promise<void>) | undefined;
    try {
      try {
        // realpath: false because the lock target is never created as a file.
        release = await lockfile.lock(this.lockTarget, {
          realpath: false,
          retries: { maxTimeout: 1000, minTimeout: 50, retries: this.lockRetries },
          stale: 20000,
        });
      } catch (error: unknown) {
        throw new LockError(`Could not acquire catalog lock in ${this.dataDir}: ${describeError(error)}`, this.lockTarget);
      }
      return await fn();
    } finally {
      if (release) {
        await release();
      }
    }
  }
}

/**
 * MemoryEntityStore Implementation
 * Keeps collections in process memory; useful for tests and development.
 */
export class MemoryEntityStore implements EntityStore {
  private collections: CatalogSnapshot = { categories: [], prompts: [], tags: [], versions: [] };
  private readonly serial = new SerialLock();
  private connected = false;

  public constructor(initial?: CatalogChanges) {
    if (initial) {
      this.collections = { ...this.collections, ...structuredClone(initial) };
    }
  }

  public async connect(): Promise<void> {
    this.connected = true;
  }

  public async disconnect(): Promise<void> {
    this.connected = false;
  }

  public async healthCheck(): Promise<boolean> {
    return this.connected;
  }

  public async load<K extends EntityKind>(kind: K): Promise<CatalogSnapshot[K]> {
    return structuredClone(this.collections[kind]);
  }

  public async save<K extends EntityKind>(kind: K, items: CatalogSnapshot[K]): Promise<void> {
    this.collections[kind] = parseCollection(kind, structuredClone(items), 'memory');
  }

  public async commit(changes: CatalogChanges): Promise<void> {
    const next: CatalogSnapshot = { ...this.collections };
    for (const kind of changedKinds(changes)) {
      this.assign(next, kind, parseCollection(kind, structuredClone(changes[kind]), 'memory'));
    }
    this.collections = next;
  }

  public async snapshot(): Promise<CatalogSnapshot> {
    return structuredClone(this.collections);
  }

  public exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.serial.run(fn);
  }

  private assign<K extends EntityKind>(target: CatalogSnapshot, kind: K, items: CatalogSnapshot[K]): void {
    target[kind] = items;
  }
}

/**
 * Minimal slice of a pg client used by the Postgres store.
 */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export function createPgPool(config: pg.PoolConfig): SqlPool {
  const pool = new pg.Pool({
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
    ...config,
  });
  return {
    async connect(): Promise<SqlClient> {
      const client = await pool.connect();
      return {
        async query(text: string, params: unknown[] = []) {
          const result = await client.query(text, params);
          return { rows: result.rows };
        },
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

/** Advisory lock key that serializes catalog writers across processes. */
export const CATALOG_LOCK_KEY = 720_419;

const categoryRowSchema = z
  .object({
    color: z.string(),
    created_at: z.string(),
    description: z.string(),
    id: z.string(),
    level: z.coerce.number(),
    name: z.string(),
    parent_id: z.string().nullable(),
    path: z.string(),
    updated_at: z.string(),
  })
  .transform(row => ({
    color: row.color,
    createdAt: row.created_at,
    description: row.description,
    id: row.id,
    level: row.level,
    name: row.name,
    parentId: row.parent_id,
    path: row.path,
    updatedAt: row.updated_at,
  }));

const tagRowSchema = z
  .object({
    color: z.string(),
    created_at: z.string(),
    id: z.string(),
    name: z.string(),
    updated_at: z.string(),
  })
  .transform(row => ({
    color: row.color,
    createdAt: row.created_at,
    id: row.id,
    name: row.name,
    updatedAt: row.updated_at,
  }));

const promptRowSchema = z
  .object({
    category_id: z.string(),
    category_name: z.string(),
    category_path: z.string(),
    content: z.string(),
    created_at: z.string(),
    current_version: z.string(),
    description: z.string(),
    id: z.string(),
    tags: z.array(z.string()).nullable(),
    title: z.string(),
    updated_at: z.string(),
    usage_count: z.coerce.number(),
  })
  .transform(row => ({
    categoryId: row.category_id,
    categoryName: row.category_name,
    categoryPath: row.category_path,
    content: row.content,
    createdAt: row.created_at,
    currentVersion: row.current_version,
    description: row.description,
    id: row.id,
    tags: row.tags ?? [],
    title: row.title,
    updatedAt: row.updated_at,
    usageCount: row.usage_count,
  }));

const versionRowSchema = z
  .object({
    change_note: z.string(),
    content: z.string(),
    created_at: z.string(),
    description: z.string(),
    prompt_id: z.string(),
    title: z.string(),
    version: z.string(),
  })
  .transform(row => ({
    changeNote: row.change_note,
    content: row.content,
    createdAt: row.created_at,
    description: row.description,
    promptId: row.prompt_id,
    title: row.title,
    version: row.version,
  }));

const SELECT_QUERIES: Record<EntityKind, string> = {
  categories: 'SELECT * FROM categories ORDER BY position',
  prompts: `SELECT p.*,
      COALESCE(array_agg(pt.tag_name ORDER BY pt.position) FILTER (WHERE pt.tag_name IS NOT NULL), '{}') AS tags
    FROM prompts p
    LEFT JOIN prompt_tags pt ON pt.prompt_id = p.id
    GROUP BY p.id
    ORDER BY p.position`,
  tags: 'SELECT * FROM tags ORDER BY position',
  versions: 'SELECT * FROM prompt_versions ORDER BY position',
};

/**
 * PostgresEntityStore Implementation
 * Normalized schema (see sql/schema.sql). Tag associations live in prompt_tags keyed
 * by tag name; versions in prompt_versions keyed by (prompt_id, version).
 */
export class PostgresEntityStore implements EntityStore {
  private readonly pool: SqlPool;
  private readonly schemaFile?: string;
  private readonly serial = new SerialLock();
  private readonly logger: Logger;
  private connected = false;

  public constructor(pool: SqlPool, options: { schemaFile?: string }, logger: Logger) {
    this.pool = pool;
    this.schemaFile = options.schemaFile;
    this.logger = logger.child({ component: 'postgres-entity-store' });
  }

  public async connect(): Promise<void> {
    const client = await this.acquire();
    try {
      if (this.schemaFile) {
        const ddl = await fsp.readFile(this.schemaFile, 'utf-8');
        await client.query(ddl);
        this.logger.debug({ schemaFile: this.schemaFile }, 'Schema applied');
      } else {
        await client.query('SELECT 1');
      }
      this.connected = true;
      this.logger.info('Postgres entity store connected');
    } catch (error: unknown) {
      throw new StorageError(`Failed to initialize Postgres schema: ${describeError(error)}`, 'postgres', {
        cause: error,
      });
    } finally {
      client.release();
    }
  }

  public async disconnect(): Promise<void> {
    await this.pool.end();
    this.connected = false;
    this.logger.info('Postgres entity store disconnected');
  }

  public async healthCheck(): Promise<boolean> {
    if (!this.connected) return false;
    try {
      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
      return true;
    } catch {
      return false;
    }
  }

  public async load<K extends EntityKind>(kind: K): Promise<CatalogSnapshot[K]> {
    const client = await this.acquire();
    try {
      return await this.loadWith(client, kind);
    } finally {
      client.release();
    }
  }

  public async save<K extends EntityKind>(kind: K, items: CatalogSnapshot[K]): Promise<void> {
    const changes: CatalogChanges = {};
    changes[kind] = items;
    await this.commit(changes);
  }

  public async commit(changes: CatalogChanges): Promise<void> {
    const client = await this.acquire();
    try {
      await client.query('BEGIN');
      if (changes.categories) await this.replaceCategories(client, changes.categories);
      if (changes.tags) await this.replaceTags(client, changes.tags);
      if (changes.prompts) await this.replacePrompts(client, changes.prompts);
      if (changes.versions) await this.replaceVersions(client, changes.versions);
      await client.query('COMMIT');
    } catch (error: unknown) {
      await client.query('ROLLBACK');
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Postgres commit failed: ${describeError(error)}`, 'postgres', { cause: error });
    } finally {
      client.release();
    }
  }

  /**
   * Reads all collections inside one REPEATABLE READ transaction so the snapshot is
   * consistent across tables.
   */
  public async snapshot(): Promise<CatalogSnapshot> {
    const client = await this.acquire();
    try {
      await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
      const categories = await this.loadWith(client, 'categories');
      const tags = await this.loadWith(client, 'tags');
      const prompts = await this.loadWith(client, 'prompts');
      const versions = await this.loadWith(client, 'versions');
      await client.query('COMMIT');
      return { categories, prompts, tags, versions };
    } catch (error: unknown) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Holds a session-level advisory lock on a dedicated connection for the duration of
   * `fn`, so writers in other processes wait as well.
   */
  public exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.serial.run(async () => {
      const client = await this.acquire();
      try {
        await client.query('SELECT pg_advisory_lock($1)', [CATALOG_LOCK_KEY]);
        try {
          return await fn();
        } finally {
          await client.query('SELECT pg_advisory_unlock($1)', [CATALOG_LOCK_KEY]);
        }
      } finally {
        client.release();
      }
    });
  }

  private async acquire(): Promise<SqlClient> {
    try {
      return await this.pool.connect();
    } catch (error: unknown) {
      throw new StorageError(`Could not connect to Postgres: ${describeError(error)}`, 'postgres', { cause: error });
    }
  }

  private async loadWith<K extends EntityKind>(client: SqlClient, kind: K): Promise<CatalogSnapshot[K]> {
    const { rows } = await client.query(SELECT_QUERIES[kind]);
    const mapped = this.mapRows(kind, rows);
    return parseCollection(kind, mapped, `postgres:${kind}`);
  }

  private mapRows(kind: EntityKind, rows: unknown[]): unknown[] {
    const rowSchema =
      kind === 'categories'
        ? categoryRowSchema
        : kind === 'tags'
          ? tagRowSchema
          : kind === 'prompts'
            ? promptRowSchema
            : versionRowSchema;
    const result = z.array(rowSchema).safeParse(rows);
    if (!result.success) {
      const issues = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
      throw new StorageError(`Unexpected ${kind} rows from Postgres: ${issues}`, `postgres:${kind}`);
    }
    return result.data;
  }

  private async replaceCategories(client: SqlClient, categories: CatalogSnapshot['categories']): Promise<void> {
    await client.query('DELETE FROM categories');
    for (const [position, c] of categories.entries()) {
      await client.query(
        'INSERT INTO categories (id, name, color, description, parent_id, level, path, created_at, updated_at, position) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)',
        [c.id, c.name, c.color, c.description, c.parentId, c.level, c.path, c.createdAt, c.updatedAt, position],
      );
    }
  }

  private async replaceTags(client: SqlClient, tags: CatalogSnapshot['tags']): Promise<void> {
    await client.query('DELETE FROM tags');
    for (const [position, t] of tags.entries()) {
      await client.query(
        'INSERT INTO tags (id, name, color, created_at, updated_at, position) VALUES ($1, $2, $3, $4, $5, $6)',
        [t.id, t.name, t.color, t.createdAt, t.updatedAt, position],
      );
    }
  }

  private async replacePrompts(client: SqlClient, prompts: CatalogSnapshot['prompts']): Promise<void> {
    await client.query('DELETE FROM prompt_tags');
    await client.query('DELETE FROM prompts');
    for (const [position, p] of prompts.entries()) {
      await client.query(
        'INSERT INTO prompts (id, title, content, description, category_id, category_name, category_path, usage_count, current_version, created_at, updated_at, position) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)',
        [
          p.id,
          p.title,
          p.content,
          p.description,
          p.categoryId,
          p.categoryName,
          p.categoryPath,
          p.usageCount,
          p.currentVersion,
          p.createdAt,
          p.updatedAt,
          position,
        ],
      );
      for (const [tagPosition, tagName] of p.tags.entries()) {
        await client.query('INSERT INTO prompt_tags (prompt_id, tag_name, position) VALUES ($1, $2, $3)', [
          p.id,
          tagName,
          tagPosition,
        ]);
      }
    }
  }

  private async replaceVersions(client: SqlClient, versions: CatalogSnapshot['versions']): Promise<void> {
    await client.query('DELETE FROM prompt_versions');
    for (const [position, v] of versions.entries()) {
      await client.query(
        'INSERT INTO prompt_versions (prompt_id, version, title, content, description, change_note, created_at, position) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)',
        [v.promptId, v.version, v.title, v.content, v.description, v.changeNote, v.createdAt, position],
      );
    }
  }
}
