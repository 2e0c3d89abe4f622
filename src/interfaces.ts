/**
 * Unified Interface Definitions
 * Entities, storage contract and query shapes shared by the catalog modules.
 */

/**
 * A node in the category tree.
 */
export interface Category {
  /** Stable identifier */
  id: string;

  /** Display name; unique among siblings is not enforced */
  name: string;

  /** Display color (hex) */
  color: string;

  description: string;

  /** Parent category id, or null for a root */
  parentId: string | null;

  /** Depth in the tree, roots are level 1. Derived from the parent chain. */
  level: number;

  /** Ancestor-to-self name chain joined by "/", e.g. "编程/Web". Derived. */
  path: string;

  createdAt: string;
  updatedAt: string;
}

/**
 * A tag. Prompts reference tags by name, so the name is the association key.
 */
export interface Tag {
  id: string;
  name: string;
  color: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Prompt interface
 * Represents a prompt in the catalog with a cached copy of its category's display data.
 */
export interface Prompt {
  /** Unique identifier for the prompt */
  id: string;

  title: string;

  /** The actual prompt content */
  content: string;

  description: string;

  /** Always references a live category */
  categoryId: string;

  /** Cache of the category's name at last write */
  categoryName: string;

  /** Cache of the category's path at last write */
  categoryPath: string;

  /** Tag names in display order */
  tags: string[];

  /** Incremented only by the "use" action */
  usageCount: number;

  /** Label of the ledger version the prompt currently shows */
  currentVersion: string;

  /** Date when the prompt was created (ISO string) */
  createdAt: string;

  /** Date when the prompt was last updated (ISO string) */
  updatedAt: string;
}

/**
 * Immutable snapshot of a prompt's content, appended on every content edit.
 */
export interface PromptVersion {
  promptId: string;
  version: string;
  title: string;
  content: string;
  description: string;
  changeNote: string;
  createdAt: string;
}

/**
 * Every collection the entity store owns.
 */
export interface CatalogSnapshot {
  categories: Category[];
  tags: Tag[];
  prompts: Prompt[];
  versions: PromptVersion[];
}

export type EntityKind = keyof CatalogSnapshot;

export const ENTITY_KINDS: readonly EntityKind[] = ['categories', 'tags', 'prompts', 'versions'];

/**
 * Collections to replace in one commit. Omitted kinds are left untouched.
 */
export type CatalogChanges = Partial<CatalogSnapshot>;

/**
 * Storage contract. Implementations own the on-disk representation and make every
 * save atomic: readers observe either the previous or the new collection, never a
 * partial one.
 */
export interface EntityStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;

  /** Returns the collection in stored order. A missing collection is empty. */
  load<K extends EntityKind>(kind: K): Promise<CatalogSnapshot[K]>;

  /** Atomically replaces one collection. */
  save<K extends EntityKind>(kind: K, items: CatalogSnapshot[K]): Promise<void>;

  /** Atomically replaces every collection present in `changes`. */
  commit(changes: CatalogChanges): Promise<void>;

  snapshot(): Promise<CatalogSnapshot>;

  /**
   * Runs `fn` while holding the store-wide write lock. Calls are serialized in
   * arrival order; the lock is released when `fn` settles.
   */
  exclusive<T>(fn: () => Promise<T>): Promise<T>;
}

export interface SearchResult {
  items: Prompt[];
  totalCount: number;
  page: number;
  pageSize: number;
}

export interface CategoryTreeNode extends Category {
  children: CategoryTreeNode[];
}

export interface CategoryDistribution {
  id: string;
  name: string;
  path: string;
  level: number;
  color: string;
  parentId: string | null;
  /** Prompts in this category or any descendant */
  count: number;
}

export interface CatalogStats {
  totalPrompts: number;
  totalCategories: number;
  totalTags: number;
  mostUsedPrompt: Prompt | null;
  categoryDistribution: CategoryDistribution[];
  /** Number of categories at each tree level */
  levelStats: Record<number, number>;
}

export interface CategoryDeletionImpact {
  category: Category;
  affectedPrompts: number;
  childCategories: string[];
}

export interface CategoryDeletionResult {
  deleted: Category;
  reassignedPrompts: number;
  reparentedChildren: number;
}

export interface TagDeletionResult {
  deleted: Tag;
  affectedPrompts: number;
}

export interface TagUpdateResult {
  tag: Tag;
  affectedPrompts: number;
}

export interface BulkOperationResult {
  backupPath: string;
  totalPrompts: number;
}

export interface ImportResult {
  created: number;
  updated: number;
  /** Entries that failed validation */
  skipped: number;
}
