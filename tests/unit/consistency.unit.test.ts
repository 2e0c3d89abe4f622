import { assertConsistent, checkConsistency } from '../../src/consistency.js';
import { buildDefaultCategories } from '../../src/data/defaults.js';
import { ConsistencyError } from '../../src/errors.js';
import type { CatalogSnapshot, Category, Prompt } from '../../src/interfaces.js';

const NOW = '2024-01-01T00:00:00.000Z';

function child(id: string, name: string, parentId: string, level: number, path: string): Category {
  return { color: '#000000', createdAt: NOW, description: '', id, level, name, parentId, path, updatedAt: NOW };
}

function healthy(): CatalogSnapshot {
  const prompt: Prompt = {
    categoryId: 'web',
    categoryName: 'Web',
    categoryPath: '编程/Web',
    content: 'body',
    createdAt: NOW,
    currentVersion: '1.0',
    description: '',
    id: 'p1',
    tags: ['ts'],
    title: 'Title',
    updatedAt: NOW,
    usageCount: 0,
  };
  return {
    categories: [...buildDefaultCategories(NOW), child('web', 'Web', '1', 2, '编程/Web')],
    prompts: [prompt],
    tags: [{ color: '#3B82F6', createdAt: NOW, id: 't1', name: 'ts', updatedAt: NOW }],
    versions: [
      { changeNote: '', content: 'body', createdAt: NOW, description: '', promptId: 'p1', title: 'Title', version: '1.0' },
    ],
  };
}

describe('checkConsistency', () => {
  it('accepts a healthy catalog', () => {
    expect(checkConsistency(healthy())).toEqual([]);
    expect(() => assertConsistent(healthy())).not.toThrow();
  });

  it('reports a missing fallback category', () => {
    const snapshot = healthy();
    snapshot.categories = snapshot.categories.filter(c => c.id !== '7');
    expect(checkConsistency(snapshot)).toEqual(['fallback category 7 is missing']);
  });

  it('reports broken category chains', () => {
    const snapshot = healthy();
    snapshot.categories.push(
      child('orphan', 'Orphan', 'ghost', 2, 'Ghost/Orphan'),
      child('x', 'X', 'y', 2, 'Y/X'),
      child('y', 'Y', 'x', 2, 'X/Y'),
    );
    expect(checkConsistency(snapshot)).toEqual([
      'category orphan references missing parent ghost',
      'category x is not connected to a root (parent cycle or broken chain)',
      'category y is not connected to a root (parent cycle or broken chain)',
    ]);
  });

  it('reports stale derived fields and excessive depth', () => {
    const snapshot = healthy();
    snapshot.categories.push(
      child('l3', 'L3', 'web', 3, '编程/Web/L3'),
      child('l4', 'L4', 'l3', 4, '编程/Web/L3/L4'),
      child('l5', 'L5', 'l4', 5, '编程/Web/L3/L4/L5'),
      child('l6', 'L6', 'l5', 6, '编程/Web/L3/L4/L5/L6'),
      child('stale', 'Stale', '2', 1, 'Stale'),
    );
    expect(checkConsistency(snapshot)).toEqual([
      'category l6 is nested deeper than 5 levels',
      'category stale has stale level/path (1, "Stale"), expected (2, "写作/Stale")',
    ]);
  });

  it('reports prompt references that do not resolve', () => {
    const snapshot = healthy();
    snapshot.tags.push({ ...snapshot.tags[0], id: 't2' });
    snapshot.prompts.push(
      { ...snapshot.prompts[0], categoryId: 'gone', id: 'p2', tags: ['ts', 'ts', 'missing'] },
      { ...snapshot.prompts[0], categoryPath: 'old path', currentVersion: '9.0', id: 'p3' },
    );
    expect(checkConsistency(snapshot)).toEqual([
      'tag name "ts" is duplicated',
      'prompt p2 references missing category gone',
      'prompt p2 references missing tag "missing"',
      'prompt p2 lists a tag more than once',
      'prompt p2 points at missing version 1.0',
      'prompt p3 has a stale category cache for web',
      'prompt p3 points at missing version 9.0',
    ]);
  });

  it('throws a ConsistencyError carrying every violation', () => {
    const snapshot = healthy();
    snapshot.versions.push({ ...snapshot.versions[0] });

    let caught: unknown;
    try {
      assertConsistent(snapshot);
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConsistencyError);
    expect(caught instanceof ConsistencyError && caught.details).toEqual(['version 1.0 of prompt p1 is duplicated']);
  });
});
