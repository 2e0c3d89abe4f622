import { MemoryEntityStore } from '../../src/adapters.js';
import { buildDefaultCategories } from '../../src/data/defaults.js';
import { NotFoundError, ValidationError } from '../../src/errors.js';
import type { Category, Prompt, Tag } from '../../src/interfaces.js';
import { QueryEngine } from '../../src/query-engine.js';

const CREATED = '2024-01-01T00:00:00.000Z';

const web: Category = {
  color: '#000000',
  createdAt: CREATED,
  description: '',
  id: 'web',
  level: 2,
  name: 'Web',
  parentId: '1',
  path: '编程/Web',
  updatedAt: CREATED,
};

function prompt(fields: Pick<Prompt, 'id' | 'title' | 'content' | 'categoryId' | 'tags' | 'updatedAt'> & Partial<Prompt>): Prompt {
  return {
    categoryName: '',
    categoryPath: '',
    createdAt: CREATED,
    currentVersion: '1.0',
    description: '',
    usageCount: 0,
    ...fields,
  };
}

function tag(name: string): Tag {
  return { color: '#3B82F6', createdAt: CREATED, id: `tag-${name}`, name, updatedAt: CREATED };
}

const prompts: Prompt[] = [
  prompt({
    categoryId: '1',
    content: 'use list comprehensions',
    id: 'p1',
    tags: ['Rust'],
    title: 'Rust Tips',
    updatedAt: '2024-01-03T00:00:00.000Z',
    usageCount: 5,
  }),
  prompt({
    categoryId: 'web',
    content: 'useEffect cleanup',
    description: 'frontend',
    id: 'p2',
    tags: ['React', 'JS'],
    title: 'React hooks',
    updatedAt: '2024-01-05T00:00:00.000Z',
    usageCount: 2,
  }),
  prompt({
    categoryId: '2',
    content: 'Write about RUST history',
    id: 'p3',
    tags: ['Writing'],
    title: 'Essay',
    updatedAt: '2024-01-05T00:00:00.000Z',
    usageCount: 9,
  }),
  prompt({
    categoryId: '7',
    content: 'nothing',
    description: 'rust notes',
    id: 'p4',
    tags: [],
    title: 'Misc',
    updatedAt: '2024-01-01T00:00:00.000Z',
  }),
];

describe('QueryEngine', () => {
  let store: MemoryEntityStore;
  let engine: QueryEngine;

  beforeEach(() => {
    store = new MemoryEntityStore({
      categories: [...buildDefaultCategories(CREATED), web],
      prompts,
      tags: [tag('Rust'), tag('React'), tag('JS'), tag('Writing')],
      versions: [
        { changeNote: '', content: 'v1', createdAt: CREATED, description: '', promptId: 'p1', title: 'Rust Tips', version: '1.0' },
        { changeNote: '', content: 'v2', createdAt: CREATED, description: '', promptId: 'p1', title: 'Rust Tips', version: '1.1' },
      ],
    });
    engine = new QueryEngine(store);
  });

  const ids = (items: Prompt[]) => items.map(p => p.id);

  it('orders by most recent update, then id', async () => {
    const result = await engine.search();
    expect(ids(result.items)).toEqual(['p2', 'p3', 'p1', 'p4']);
    expect(result).toMatchObject({ page: 1, pageSize: 20, totalCount: 4 });
  });

  it('matches text case-insensitively across title, content and description', async () => {
    expect(ids((await engine.search({ text: 'rust' })).items)).toEqual(['p3', 'p1', 'p4']);
  });

  it('includes the whole subtree in the category filter', async () => {
    expect(ids((await engine.search({ categoryId: '1' })).items)).toEqual(['p2', 'p1']);
    expect(ids((await engine.search({ categoryId: 'web' })).items)).toEqual(['p2']);
    expect((await engine.search({ categoryId: 'unknown' })).totalCount).toBe(0);
  });

  it('matches any of the selected tags', async () => {
    expect(ids((await engine.search({ tags: ['Rust', 'React'] })).items)).toEqual(['p2', 'p1']);
  });

  it('combines text with the other filters', async () => {
    expect(ids((await engine.search({ categoryId: '1', text: 'RUST' })).items)).toEqual(['p1']);
  });

  it('pages deterministically', async () => {
    const first = await engine.search({ page: 1, pageSize: 2 });
    const again = await engine.search({ page: 1, pageSize: 2 });
    const second = await engine.search({ page: 2, pageSize: 2 });
    const beyond = await engine.search({ page: 3, pageSize: 2 });

    expect(ids(first.items)).toEqual(['p2', 'p3']);
    expect(again).toEqual(first);
    expect(ids(second.items)).toEqual(['p1', 'p4']);
    expect(beyond.items).toEqual([]);
    expect(beyond.totalCount).toBe(4);
  });

  it('rejects page sizes above 100', async () => {
    await expect(engine.search({ pageSize: 101 })).rejects.toBeInstanceOf(ValidationError);
  });

  it('never changes usage counts', async () => {
    await engine.search({ text: 'rust' });
    await engine.getPrompt('p1');
    expect((await store.load('prompts')).map(p => p.usageCount)).toEqual([5, 2, 9, 0]);
  });

  it('computes statistics over live prompts', async () => {
    const stats = await engine.getStats();

    expect(stats).toMatchObject({ totalCategories: 8, totalPrompts: 4, totalTags: 4 });
    expect(stats.mostUsedPrompt?.id).toBe('p3');
    expect(stats.levelStats).toEqual({ 1: 7, 2: 1 });
    const count = (id: string) => stats.categoryDistribution.find(c => c.id === id)?.count;
    expect(count('1')).toBe(2);
    expect(count('web')).toBe(1);
    expect(count('2')).toBe(1);
    expect(count('7')).toBe(1);
    expect(count('3')).toBe(0);
  });

  it('lists categories by level and tags by name', async () => {
    const categories = await engine.listCategories();
    expect(categories.slice(0, 7).every(c => c.level === 1)).toBe(true);
    expect(categories[7].id).toBe('web');
    expect((await engine.listTags()).map(t => t.name)).toEqual(['JS', 'React', 'Rust', 'Writing']);
  });

  it('builds the category tree', async () => {
    const roots = await engine.getCategoryTree();
    expect(roots).toHaveLength(7);
    expect(roots.find(r => r.id === '1')?.children.map(c => c.id)).toEqual(['web']);
  });

  it('reads versions and reports missing records', async () => {
    expect((await engine.listVersions('p1')).map(v => v.version)).toEqual(['1.0', '1.1']);
    expect((await engine.getVersion('p1', '1.1')).content).toBe('v2');
    expect(await engine.listVersions('p2')).toEqual([]);
    await expect(engine.listVersions('ghost')).rejects.toBeInstanceOf(NotFoundError);
    await expect(engine.getVersion('p1', '3.0')).rejects.toBeInstanceOf(NotFoundError);
    await expect(engine.getPrompt('ghost')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('joins collections from a single snapshot', async () => {
    const load = jest.spyOn(store, 'load');
    const snapshot = jest.spyOn(store, 'snapshot');

    await engine.search({ categoryId: '1', text: 'tips' });
    await engine.listVersions('p1');

    expect(load).not.toHaveBeenCalled();
    expect(snapshot).toHaveBeenCalledTimes(2);
  });
});
