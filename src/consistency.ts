import { CategoryTree, MAX_CATEGORY_DEPTH } from './category-tree.js';
import { FALLBACK_CATEGORY_ID } from './data/defaults.js';
import { ConsistencyError } from './errors.js';
import type { CatalogSnapshot } from './interfaces.js';

/**
 * Lists every broken cross-collection invariant in `snapshot`. An empty result
 * means the catalog is consistent.
 */
export function checkConsistency(snapshot: CatalogSnapshot): string[] {
  const violations: string[] = [];
  const tree = new CategoryTree(snapshot.categories);

  if (!tree.has(FALLBACK_CATEGORY_ID)) {
    violations.push(`fallback category ${FALLBACK_CATEGORY_ID} is missing`);
  }

  const categoryIds = new Set<string>();
  for (const category of snapshot.categories) {
    if (categoryIds.has(category.id)) {
      violations.push(`category id ${category.id} is duplicated`);
    }
    categoryIds.add(category.id);

    if (category.parentId !== null && !tree.has(category.parentId)) {
      violations.push(`category ${category.id} references missing parent ${category.parentId}`);
      continue;
    }
    const chain = tree.ancestry(category.id);
    if (chain.length === 0 || chain[0].parentId !== null) {
      violations.push(`category ${category.id} is not connected to a root (parent cycle or broken chain)`);
      continue;
    }
    const path = chain.map(c => c.name).join('/');
    if (category.level !== chain.length || category.path !== path) {
      violations.push(
        `category ${category.id} has stale level/path (${category.level}, "${category.path}"), expected (${chain.length}, "${path}")`,
      );
    }
    if (chain.length > MAX_CATEGORY_DEPTH) {
      violations.push(`category ${category.id} is nested deeper than ${MAX_CATEGORY_DEPTH} levels`);
    }
  }

  const tagNames = new Set<string>();
  for (const tag of snapshot.tags) {
    if (tagNames.has(tag.name)) {
      violations.push(`tag name "${tag.name}" is duplicated`);
    }
    tagNames.add(tag.name);
  }

  const promptIds = new Set<string>();
  for (const prompt of snapshot.prompts) {
    if (promptIds.has(prompt.id)) {
      violations.push(`prompt id ${prompt.id} is duplicated`);
    }
    promptIds.add(prompt.id);

    const category = tree.get(prompt.categoryId);
    if (!category) {
      violations.push(`prompt ${prompt.id} references missing category ${prompt.categoryId}`);
    } else if (prompt.categoryName !== category.name || prompt.categoryPath !== category.path) {
      violations.push(`prompt ${prompt.id} has a stale category cache for ${category.id}`);
    }

    for (const tagName of prompt.tags) {
      if (!tagNames.has(tagName)) {
        violations.push(`prompt ${prompt.id} references missing tag "${tagName}"`);
      }
    }
    if (new Set(prompt.tags).size !== prompt.tags.length) {
      violations.push(`prompt ${prompt.id} lists a tag more than once`);
    }

    const hasCurrentVersion = snapshot.versions.some(
      v => v.promptId === prompt.id && v.version === prompt.currentVersion,
    );
    if (!hasCurrentVersion) {
      violations.push(`prompt ${prompt.id} points at missing version ${prompt.currentVersion}`);
    }
  }

  const versionKeys = new Set<string>();
  for (const version of snapshot.versions) {
    const key = `${version.promptId}@${version.version}`;
    if (versionKeys.has(key)) {
      violations.push(`version ${version.version} of prompt ${version.promptId} is duplicated`);
    }
    versionKeys.add(key);
  }

  return violations;
}

export function assertConsistent(snapshot: CatalogSnapshot): void {
  const violations = checkConsistency(snapshot);
  if (violations.length > 0) {
    throw new ConsistencyError(violations);
  }
}
