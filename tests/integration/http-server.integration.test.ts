import path from 'path';

import type { Express } from 'express';
import request from 'supertest';

import { BackupService } from '../../src/backup.js';
import { ADMIN_SECRET_HEADER, createHttpApp } from '../../src/http-server.js';
import { MutationGate } from '../../src/mutation-gate.js';
import { TEST_SECRET, createTestCatalog, makeTempDir, removeDir, steppingClock, type TestCatalog } from '../helpers.js';

const EXAMPLES_FILE = path.join(__dirname, '..', '..', 'data', 'examples', 'prompts.json');

describe('HTTP API', () => {
  let dir: string;
  let catalog: TestCatalog;
  let app: Express;

  beforeEach(async () => {
    dir = makeTempDir('http');
    catalog = await createTestCatalog();
    const backups = new BackupService(path.join(dir, 'backups'), catalog.logger, steppingClock());
    const mutationGate = new MutationGate(
      catalog.service,
      catalog.store,
      backups,
      { adminSecret: TEST_SECRET, examplesFile: EXAMPLES_FILE },
      catalog.logger,
    );
    app = createHttpApp(
      {},
      { logger: catalog.logger, mutationGate, queryEngine: catalog.queryEngine, store: catalog.store },
    );
  });

  afterEach(() => {
    removeDir(dir);
  });

  const createPrompt = (body: object) =>
    request(app).post('/api/v1/prompts').set(ADMIN_SECRET_HEADER, TEST_SECRET).send(body);

  it('reports storage health', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', storage: true });
  });

  it('rejects writes without the admin secret', async () => {
    const res = await request(app).post('/api/v1/prompts').send({ content: 'body', title: 'T' });

    expect(res.status).toBe(401);
    expect(res.body.error).toMatchObject({ code: 'UNAUTHORIZED', message: 'Admin secret is missing or incorrect' });
    expect((await request(app).get('/api/v1/prompts')).body.totalCount).toBe(0);
  });

  it('creates, searches and reads prompts', async () => {
    const created = await createPrompt({ categoryId: '1', content: 'Hello world', tags: ['demo'], title: 'Greeting' });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({
      categoryId: '1',
      categoryPath: '编程',
      currentVersion: '1.0',
      tags: ['demo'],
      title: 'Greeting',
      usageCount: 0,
    });

    const found = await request(app).get('/api/v1/prompts').query({ text: 'HELLO' });
    expect(found.body.totalCount).toBe(1);
    expect(found.body.items[0].id).toBe(created.body.id);

    const byTag = await request(app).get('/api/v1/prompts?tags=demo,other');
    expect(byTag.body.totalCount).toBe(1);

    const read = await request(app).get(`/api/v1/prompts/${created.body.id}`);
    expect(read.status).toBe(200);
    expect(read.body.title).toBe('Greeting');

    const versions = await request(app).get(`/api/v1/prompts/${created.body.id}/versions`);
    expect(versions.body.map((v: { version: string }) => v.version)).toEqual(['1.0']);
  });

  it('returns validation errors as 400', async () => {
    const res = await createPrompt({ content: 'body', title: '   ' });
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('returns 404 for unknown prompts and routes', async () => {
    const missing = await request(app).get('/api/v1/prompts/missing');
    expect(missing.status).toBe(404);
    expect(missing.body.error).toMatchObject({ code: 'NOT_FOUND', message: 'Prompt missing not found' });

    const route = await request(app).get('/api/v1/nope');
    expect(route.status).toBe(404);
    expect(route.body.error.message).toBe('Route GET /api/v1/nope not found');
  });

  it('counts uses without the admin secret', async () => {
    const created = await createPrompt({ content: 'body', title: 'T' });
    const res = await request(app).post(`/api/v1/prompts/${created.body.id}/use`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: created.body.id, usageCount: 1 });
  });

  it('deletes prompts with 204', async () => {
    const created = await createPrompt({ content: 'body', title: 'T' });
    const res = await request(app).delete(`/api/v1/prompts/${created.body.id}`).set(ADMIN_SECRET_HEADER, TEST_SECRET);

    expect(res.status).toBe(204);
    expect((await request(app).get(`/api/v1/prompts/${created.body.id}`)).status).toBe(404);
  });

  it('refuses to delete the fallback category', async () => {
    const res = await request(app).delete('/api/v1/categories/7').set(ADMIN_SECRET_HEADER, TEST_SECRET);
    expect(res.status).toBe(409);
    expect(res.body.error.code).toBe('CONFLICT');
  });

  it('cascades a tag rename into prompts', async () => {
    const created = await createPrompt({ content: 'body', tags: ['old'], title: 'T' });
    const tags = await request(app).get('/api/v1/tags');
    const tagId: string = tags.body[0].id;

    const res = await request(app)
      .patch(`/api/v1/tags/${tagId}`)
      .set(ADMIN_SECRET_HEADER, TEST_SECRET)
      .send({ name: 'new' });

    expect(res.status).toBe(200);
    expect(res.body.affectedPrompts).toBe(1);
    expect((await request(app).get(`/api/v1/prompts/${created.body.id}`)).body.tags).toEqual(['new']);
  });

  it('exports prompts as CSV', async () => {
    await createPrompt({ content: 'body', title: 'Exported' });
    const res = await request(app).get('/api/v1/export');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toMatch(/^attachment; filename="prompts-export-\d{4}-\d{2}-\d{2}\.csv"$/);
    const lines = res.text.replace(/^\ufeff/, '').split('\n');
    expect(lines[0]).toBe('标题,描述,分类,标签,内容,创建时间');
    expect(lines[1].startsWith('Exported,,其他,,body,')).toBe(true);
  });

  it('resets the catalog and loads the example prompts', async () => {
    await createPrompt({ content: 'body', title: 'T' });

    const reset = await request(app).post('/api/v1/admin/reset').set(ADMIN_SECRET_HEADER, TEST_SECRET);
    expect(reset.status).toBe(200);
    expect(reset.body.totalPrompts).toBe(0);
    expect((await request(app).get('/api/v1/prompts')).body.totalCount).toBe(0);

    const loaded = await request(app).post('/api/v1/admin/load-test-data').set(ADMIN_SECRET_HEADER, TEST_SECRET);
    expect(loaded.status).toBe(200);
    expect(loaded.body.totalPrompts).toBe(10);

    const backups = await request(app).get('/api/v1/admin/backups').set(ADMIN_SECRET_HEADER, TEST_SECRET);
    expect(backups.body).toHaveLength(2);
  });

  it('imports prompts through the admin route', async () => {
    const body = { prompts: [{ category: '编程', content: 'imported body', id: 'ext-1', tags: ['ext'], title: 'External' }] };

    expect((await request(app).post('/api/v1/admin/import').send(body)).status).toBe(401);

    const res = await request(app).post('/api/v1/admin/import').set(ADMIN_SECRET_HEADER, TEST_SECRET).send(body);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ created: 1, skipped: 0, updated: 0 });

    const prompt = await request(app).get('/api/v1/prompts/ext-1');
    expect(prompt.body).toMatchObject({ categoryId: '1', currentVersion: '1.0', tags: ['ext'], title: 'External' });

    const invalid = await request(app)
      .post('/api/v1/admin/import')
      .set(ADMIN_SECRET_HEADER, TEST_SECRET)
      .send({ items: [] });
    expect(invalid.status).toBe(400);
    expect(invalid.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('rejects malformed JSON bodies', async () => {
    const res = await request(app)
      .post('/api/v1/prompts')
      .set(ADMIN_SECRET_HEADER, TEST_SECRET)
      .set('Content-Type', 'application/json')
      .send('{"title":');

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Request body is not valid JSON.');
  });
});
