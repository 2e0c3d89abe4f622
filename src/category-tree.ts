import type { Category, CategoryTreeNode } from './interfaces.js';

/** Deepest level a category may sit at; roots are level 1. */
export const MAX_CATEGORY_DEPTH = 5;

/**
 * Read-only index over a category collection. Every traversal is bounded by the
 * collection size, so a corrupt parent chain cannot loop forever.
 */
export class CategoryTree {
  private readonly byId: Map<string, Category>;
  private readonly childrenByParent: Map<string | null, Category[]>;

  public constructor(private readonly categories: readonly Category[]) {
    this.byId = new Map(categories.map(c => [c.id, c]));
    this.childrenByParent = new Map();
    for (const category of categories) {
      const siblings = this.childrenByParent.get(category.parentId) ?? [];
      siblings.push(category);
      this.childrenByParent.set(category.parentId, siblings);
    }
  }

  public get(id: string): Category | undefined {
    return this.byId.get(id);
  }

  public has(id: string): boolean {
    return this.byId.has(id);
  }

  public childrenOf(id: string | null): Category[] {
    return this.childrenByParent.get(id) ?? [];
  }

  /** Ids of every category below `id`, breadth first. */
  public descendantIds(id: string): string[] {
    const result: string[] = [];
    const seen = new Set<string>([id]);
    const queue = [id];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const child of this.childrenOf(current)) {
        if (seen.has(child.id)) continue;
        seen.add(child.id);
        result.push(child.id);
        queue.push(child.id);
      }
    }
    return result;
  }

  /** `id` plus all of its descendants. */
  public subtreeIds(id: string): Set<string> {
    return new Set([id, ...this.descendantIds(id)]);
  }

  /**
   * Categories from the root down to `id` inclusive. Stops early on a missing parent
   * or a repeated id.
   */
  public ancestry(id: string): Category[] {
    const chain: Category[] = [];
    const seen = new Set<string>();
    let current = this.byId.get(id);
    while (current && !seen.has(current.id)) {
      seen.add(current.id);
      chain.unshift(current);
      current = current.parentId === null ? undefined : this.byId.get(current.parentId);
    }
    return chain;
  }

  /** True when making `newParentId` the parent of `id` would close a loop. */
  public wouldCreateCycle(id: string, newParentId: string | null): boolean {
    if (newParentId === null) return false;
    if (newParentId === id) return true;
    return this.descendantIds(id).includes(newParentId);
  }

  /** Levels spanned by the subtree rooted at `id`; a leaf has height 1. */
  public subtreeHeight(id: string): number {
    const start = this.byId.get(id);
    if (!start) return 0;
    let height = 1;
    let frontier = [id];
    const seen = new Set<string>([id]);
    while (frontier.length > 0 && height <= this.categories.length) {
      const next: string[] = [];
      for (const parentId of frontier) {
        for (const child of this.childrenOf(parentId)) {
          if (seen.has(child.id)) continue;
          seen.add(child.id);
          next.push(child.id);
        }
      }
      if (next.length === 0) break;
      height += 1;
      frontier = next;
    }
    return height;
  }

  /** Level `id` would take under `parentId`. */
  public levelUnder(parentId: string | null): number {
    if (parentId === null) return 1;
    return this.ancestry(parentId).length + 1;
  }
}

/**
 * Recomputes `level` and `path` of every category from its parent chain. Records
 * whose derived fields are already correct are returned as the same object.
 */
export function recomputeDerivedFields(categories: readonly Category[]): Category[] {
  const tree = new CategoryTree(categories);
  return categories.map(category => {
    const chain = tree.ancestry(category.id);
    const level = chain.length;
    const path = chain.map(c => c.name).join('/');
    if (category.level === level && category.path === path) {
      return category;
    }
    return { ...category, level, path };
  });
}

/**
 * Nests categories under their parents. Siblings keep stored order; categories
 * whose parent is missing surface as roots.
 */
export function buildCategoryTree(categories: readonly Category[]): CategoryTreeNode[] {
  const nodes = new Map<string, CategoryTreeNode>(categories.map(c => [c.id, { ...c, children: [] }]));
  const roots: CategoryTreeNode[] = [];
  for (const category of categories) {
    const node = nodes.get(category.id);
    if (!node) continue;
    const parent = category.parentId === null ? undefined : nodes.get(category.parentId);
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
  }
  return roots;
}
