import fs from 'fs';
import path from 'path';

import type { MockProxy } from 'jest-mock-extended';
import { mock } from 'jest-mock-extended';

import { CATALOG_LOCK_KEY, PostgresEntityStore, type SqlClient, type SqlPool } from '../../src/adapters.js';
import { StorageError } from '../../src/errors.js';
import { createSilentLogger } from '../../src/logger.js';
import { makeTempDir, removeDir } from '../helpers.js';

const NOW = '2024-01-01T00:00:00.000Z';

describe('PostgresEntityStore', () => {
  let pool: MockProxy<SqlPool>;
  let client: MockProxy<SqlClient>;
  let store: PostgresEntityStore;

  const queryTexts = () => client.query.mock.calls.map(call => call[0]);

  beforeEach(() => {
    pool = mock<SqlPool>();
    client = mock<SqlClient>();
    pool.connect.mockResolvedValue(client);
    client.query.mockResolvedValue({ rows: [] });
    store = new PostgresEntityStore(pool, {}, createSilentLogger());
  });

  describe('connect', () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir('pg-schema');
    });

    afterEach(() => {
      removeDir(dir);
    });

    it('applies the schema file', async () => {
      const schemaFile = path.join(dir, 'schema.sql');
      fs.writeFileSync(schemaFile, 'CREATE TABLE IF NOT EXISTS t (id TEXT);');
      const withSchema = new PostgresEntityStore(pool, { schemaFile }, createSilentLogger());

      await withSchema.connect();

      expect(queryTexts()).toEqual(['CREATE TABLE IF NOT EXISTS t (id TEXT);']);
      expect(client.release).toHaveBeenCalledTimes(1);
      expect(await withSchema.healthCheck()).toBe(true);
    });

    it('wraps schema failures and releases the client', async () => {
      client.query.mockRejectedValue(new Error('permission denied'));
      const withSchema = new PostgresEntityStore(pool, { schemaFile: path.join(dir, 'missing.sql') }, createSilentLogger());

      await expect(withSchema.connect()).rejects.toBeInstanceOf(StorageError);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('wraps connection failures', async () => {
      pool.connect.mockRejectedValue(new Error('ECONNREFUSED'));
      await expect(store.connect()).rejects.toBeInstanceOf(StorageError);
    });
  });

  it('replaces changed collections inside one transaction', async () => {
    await store.commit({
      tags: [{ color: '#3B82F6', createdAt: NOW, id: 't1', name: 'alpha', updatedAt: NOW }],
      versions: [],
    });

    expect(queryTexts()).toEqual([
      'BEGIN',
      'DELETE FROM tags',
      'INSERT INTO tags (id, name, color, created_at, updated_at, position) VALUES ($1, $2, $3, $4, $5, $6)',
      'DELETE FROM prompt_versions',
      'COMMIT',
    ]);
    expect(client.query.mock.calls[2][1]).toEqual(['t1', 'alpha', '#3B82F6', NOW, NOW, 0]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('writes prompt tags in their listed order', async () => {
    await store.commit({
      prompts: [
        {
          categoryId: '7',
          categoryName: '其他',
          categoryPath: '其他',
          content: 'body',
          createdAt: NOW,
          currentVersion: '1.0',
          description: '',
          id: 'p1',
          tags: ['b', 'a'],
          title: 'Title',
          updatedAt: NOW,
          usageCount: 2,
        },
      ],
    });

    const tagInserts = client.query.mock.calls.filter(call => call[0].startsWith('INSERT INTO prompt_tags'));
    expect(tagInserts.map(call => call[1])).toEqual([
      ['p1', 'b', 0],
      ['p1', 'a', 1],
    ]);
    expect(queryTexts().slice(0, 3)).toEqual(['BEGIN', 'DELETE FROM prompt_tags', 'DELETE FROM prompts']);
  });

  it('rolls back and reports a StorageError when a statement fails', async () => {
    client.query.mockImplementation(async (text: string) => {
      if (text.startsWith('INSERT')) throw new Error('duplicate key value');
      return { rows: [] };
    });

    await expect(
      store.commit({ tags: [{ color: '#3B82F6', createdAt: NOW, id: 't1', name: 'alpha', updatedAt: NOW }] }),
    ).rejects.toBeInstanceOf(StorageError);
    expect(queryTexts()).toEqual([
      'BEGIN',
      'DELETE FROM tags',
      'INSERT INTO tags (id, name, color, created_at, updated_at, position) VALUES ($1, $2, $3, $4, $5, $6)',
      'ROLLBACK',
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('maps snake_case rows into prompts', async () => {
    client.query.mockResolvedValue({
      rows: [
        {
          category_id: '7',
          category_name: '其他',
          category_path: '其他',
          content: 'body',
          created_at: NOW,
          current_version: '1.1',
          description: 'd',
          id: 'p1',
          position: 0,
          tags: null,
          title: 'Title',
          updated_at: NOW,
          usage_count: '4',
        },
      ],
    });

    expect(await store.load('prompts')).toEqual([
      {
        categoryId: '7',
        categoryName: '其他',
        categoryPath: '其他',
        content: 'body',
        createdAt: NOW,
        currentVersion: '1.1',
        description: 'd',
        id: 'p1',
        tags: [],
        title: 'Title',
        updatedAt: NOW,
        usageCount: 4,
      },
    ]);
  });

  it('rejects rows of an unexpected shape', async () => {
    client.query.mockResolvedValue({ rows: [{ id: 't1' }] });
    await expect(store.load('tags')).rejects.toBeInstanceOf(StorageError);
  });

  it('reads a snapshot inside one read-only transaction', async () => {
    const snapshot = await store.snapshot();

    expect(snapshot).toEqual({ categories: [], prompts: [], tags: [], versions: [] });
    const texts = queryTexts();
    expect(texts[0]).toBe('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
    expect(texts).toHaveLength(6);
    expect(texts[5]).toBe('COMMIT');
  });

  it('holds the advisory lock around exclusive sections', async () => {
    const result = await store.exclusive(async () => {
      expect(queryTexts()).toEqual(['SELECT pg_advisory_lock($1)']);
      return 'done';
    });

    expect(result).toBe('done');
    expect(client.query.mock.calls).toEqual([
      ['SELECT pg_advisory_lock($1)', [CATALOG_LOCK_KEY]],
      ['SELECT pg_advisory_unlock($1)', [CATALOG_LOCK_KEY]],
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('releases the advisory lock when the section fails', async () => {
    await expect(
      store.exclusive(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(queryTexts()).toEqual(['SELECT pg_advisory_lock($1)', 'SELECT pg_advisory_unlock($1)']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
