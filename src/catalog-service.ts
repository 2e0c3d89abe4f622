import { v4 as uuidv4 } from 'uuid';

import { CategoryTree, MAX_CATEGORY_DEPTH, recomputeDerivedFields } from './category-tree.js';
import { assertConsistent } from './consistency.js';
import { FALLBACK_CATEGORY_ID, buildDefaultCategories, buildFallbackCategory } from './data/defaults.js';
import { ConflictError, NotFoundError, ValidationError } from './errors.js';
import type {
  CatalogChanges,
  CatalogSnapshot,
  Category,
  CategoryDeletionImpact,
  CategoryDeletionResult,
  EntityKind,
  EntityStore,
  ImportResult,
  Prompt,
  Tag,
  TagDeletionResult,
  TagUpdateResult,
} from './interfaces.js';
import type { Logger } from './logger.js';
import {
  DEFAULT_CATEGORY_COLOR,
  DEFAULT_TAG_COLOR,
  importRequestSchema,
  importedPromptSchema,
  mutationSchemas,
  parseInput,
  type CreateCategoryInput,
  type CreatePromptInput,
  type CreateTagInput,
  type ExamplePrompt,
  type ImportPromptsInput,
  type ImportedPrompt,
  type UpdateCategoryInput,
  type UpdatePromptInput,
  type UpdateTagInput,
} from './schemas.js';
import { VersionLedger, compareVersionLabels, type VersionSnapshot } from './version-ledger.js';

export const INITIAL_CHANGE_NOTE = 'Initial version';
export const IMPORT_CHANGE_NOTE = 'Imported';

export interface CatalogServiceOptions {
  /** Clock used for every timestamp the service writes. */
  now?: () => Date;
  /** Id generator for new prompts, categories and tags. */
  generateId?: () => string;
}

interface NewPromptFields extends VersionSnapshot {
  categoryId?: string | null;
  tags?: readonly string[] | null;
}

function sameSnapshot(a: VersionSnapshot, b: VersionSnapshot): boolean {
  return a.title === b.title && a.content === b.content && a.description === b.description;
}

/**
 * Working copy of the catalog for one mutation. Every cascade is applied here in
 * memory; `changes()` yields only the collections that were touched.
 */
class CatalogDraft {
  public categories: Category[];
  public tags: Tag[];
  public prompts: Prompt[];
  public readonly ledger: VersionLedger;
  private readonly touched = new Set<EntityKind>();

  public constructor(
    snapshot: CatalogSnapshot,
    private readonly timestamp: string,
    private readonly generateId: () => string,
  ) {
    this.categories = [...snapshot.categories];
    this.tags = [...snapshot.tags];
    this.prompts = [...snapshot.prompts];
    this.ledger = new VersionLedger(snapshot.versions);
  }

  public get now(): string {
    return this.timestamp;
  }

  public touch(...kinds: EntityKind[]): void {
    for (const kind of kinds) this.touched.add(kind);
  }

  public tree(): CategoryTree {
    return new CategoryTree(this.categories);
  }

  public requirePrompt(id: string): Prompt {
    const prompt = this.prompts.find(p => p.id === id);
    if (!prompt) throw new NotFoundError(`Prompt ${id} not found`);
    return prompt;
  }

  public requireCategory(id: string): Category {
    const category = this.categories.find(c => c.id === id);
    if (!category) throw new NotFoundError(`Category ${id} not found`);
    return category;
  }

  public requireTag(id: string): Tag {
    const tag = this.tags.find(t => t.id === id);
    if (!tag) throw new NotFoundError(`Tag ${id} not found`);
    return tag;
  }

  public replacePrompt(next: Prompt): void {
    this.prompts = this.prompts.map(p => (p.id === next.id ? next : p));
    this.touch('prompts');
  }

  public replaceCategory(next: Category): void {
    this.categories = this.categories.map(c => (c.id === next.id ? next : c));
    this.touch('categories');
  }

  public fallbackCategory(): Category {
    const existing = this.categories.find(c => c.id === FALLBACK_CATEGORY_ID);
    if (existing) return existing;
    const fallback = buildFallbackCategory(this.timestamp);
    this.categories.push(fallback);
    this.touch('categories');
    return fallback;
  }

  /** The referenced category, or the fallback when absent or unknown. */
  public resolveCategory(categoryId: string | null | undefined): Category {
    if (categoryId) {
      const category = this.categories.find(c => c.id === categoryId);
      if (category) return category;
    }
    return this.fallbackCategory();
  }

  /** An explicit id wins; otherwise a category whose name or path equals `name`. */
  public matchCategory(categoryId: string | null | undefined, name: string | undefined): string | undefined {
    if (categoryId) return categoryId;
    if (!name) return undefined;
    return this.categories.find(c => c.name === name || c.path === name)?.id;
  }

  /**
   * Trims, drops empties and de-duplicates tag names keeping first occurrence.
   * Names without a tag record get one.
   */
  public resolveTagNames(names: readonly string[] | null | undefined): string[] {
    const result: string[] = [];
    for (const raw of names ?? []) {
      const name = raw.trim();
      if (name === '' || result.includes(name)) continue;
      if (!this.tags.some(t => t.name === name)) {
        this.tags.push({
          color: DEFAULT_TAG_COLOR,
          createdAt: this.timestamp,
          id: this.generateId(),
          name,
          updatedAt: this.timestamp,
        });
        this.touch('tags');
      }
      result.push(name);
    }
    return result;
  }

  public addPrompt(fields: NewPromptFields): Prompt {
    const category = this.resolveCategory(fields.categoryId);
    const tags = this.resolveTagNames(fields.tags);
    const id = this.generateId();
    const snapshot: VersionSnapshot = {
      content: fields.content,
      description: fields.description,
      title: fields.title,
    };
    const version = this.ledger.append(id, snapshot, INITIAL_CHANGE_NOTE, { createdAt: this.timestamp });
    const prompt: Prompt = {
      ...snapshot,
      categoryId: category.id,
      categoryName: category.name,
      categoryPath: category.path,
      createdAt: this.timestamp,
      currentVersion: version.version,
      id,
      tags,
      updatedAt: this.timestamp,
      usageCount: 0,
    };
    this.prompts.push(prompt);
    this.touch('prompts', 'versions');
    return prompt;
  }

  /**
   * Upserts one imported prompt under its own id. Versions are adopted under labels
   * the prompt does not have yet; when no version holds the imported fields a new
   * one is appended. An existing prompt keeps its usage count and creation time,
   * and keeps its category, tags and description where the entry omits them.
   */
  public importPrompt(entry: ImportedPrompt): 'created' | 'updated' {
    const existing = this.prompts.find(p => p.id === entry.id);
    const category = this.resolveCategory(
      this.matchCategory(entry.categoryId, entry.category) ?? existing?.categoryId,
    );
    const tags = this.resolveTagNames(entry.tags ?? existing?.tags);

    const imported = [...entry.versions].sort((a, b) => compareVersionLabels(a.version, b.version));
    for (const version of imported) {
      this.ledger.adopt({
        changeNote: version.changeNote,
        content: version.content,
        createdAt: version.createdAt ?? this.timestamp,
        description: version.description,
        promptId: entry.id,
        title: version.title,
        version: version.version,
      });
    }

    const snapshot: VersionSnapshot = {
      content: entry.content,
      description: entry.description ?? existing?.description ?? '',
      title: entry.title,
    };
    const currentVersion =
      this.versionHolding(entry.id, snapshot, [entry.currentVersion, existing?.currentVersion]) ??
      this.ledger.append(entry.id, snapshot, IMPORT_CHANGE_NOTE, { createdAt: this.timestamp }).version;

    const prompt: Prompt = {
      ...snapshot,
      categoryId: category.id,
      categoryName: category.name,
      categoryPath: category.path,
      createdAt: existing?.createdAt ?? entry.createdAt ?? this.timestamp,
      currentVersion,
      id: entry.id,
      tags,
      updatedAt: existing ? this.timestamp : (entry.updatedAt ?? this.timestamp),
      usageCount: existing?.usageCount ?? entry.usageCount ?? 0,
    };
    if (existing) {
      this.replacePrompt(prompt);
    } else {
      this.prompts.push(prompt);
    }
    this.touch('prompts', 'versions');
    return existing ? 'updated' : 'created';
  }

  /** First of the preferred labels, then the latest version, whose fields equal `snapshot`. */
  private versionHolding(
    promptId: string,
    snapshot: VersionSnapshot,
    preferred: ReadonlyArray<string | undefined>,
  ): string | undefined {
    const candidates = preferred.map(label => (label === undefined ? undefined : this.ledger.get(promptId, label)));
    candidates.push(this.ledger.latest(promptId));
    return candidates.find(version => version !== undefined && sameSnapshot(version, snapshot))?.version;
  }

  /**
   * Recomputes level/path across the tree, then brings every prompt's category
   * cache in line. Prompts whose category is gone move to the fallback.
   * Returns the number of prompts moved.
   */
  public refreshCategories(): number {
    this.categories = recomputeDerivedFields(this.categories);
    this.touch('categories');

    const tree = this.tree();
    let reassigned = 0;
    this.prompts = this.prompts.map(prompt => {
      let category = tree.get(prompt.categoryId);
      let updatedAt = prompt.updatedAt;
      if (!category) {
        category = this.fallbackCategory();
        updatedAt = this.timestamp;
        reassigned += 1;
      }
      if (
        prompt.categoryId === category.id &&
        prompt.categoryName === category.name &&
        prompt.categoryPath === category.path
      ) {
        return prompt;
      }
      this.touch('prompts');
      return {
        ...prompt,
        categoryId: category.id,
        categoryName: category.name,
        categoryPath: category.path,
        updatedAt,
      };
    });
    return reassigned;
  }

  public toSnapshot(): CatalogSnapshot {
    return {
      categories: this.categories,
      prompts: this.prompts,
      tags: this.tags,
      versions: this.ledger.toArray(),
    };
  }

  public changes(): CatalogChanges {
    const snapshot = this.toSnapshot();
    const changes: CatalogChanges = {};
    if (this.touched.has('categories')) changes.categories = snapshot.categories;
    if (this.touched.has('tags')) changes.tags = snapshot.tags;
    if (this.touched.has('prompts')) changes.prompts = snapshot.prompts;
    if (this.touched.has('versions')) changes.versions = snapshot.versions;
    return changes;
  }

  public hasChanges(): boolean {
    return this.touched.size > 0;
  }
}

/**
 * Keeps prompts, categories, tags and versions mutually consistent. Each mutation
 * runs under the store's exclusive lock, computes the whole new state in memory,
 * checks it and commits every changed collection at once.
 */
export class CatalogService {
  private readonly store: EntityStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  public constructor(store: EntityStore, logger: Logger, options: CatalogServiceOptions = {}) {
    this.store = store;
    this.logger = logger.child({ component: 'catalog-service' });
    this.clock = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => uuidv4());
  }

  /**
   * Connects the store and guarantees the category tree: an empty store is seeded
   * with the default categories and a missing fallback is re-created.
   */
  public async initialize(): Promise<void> {
    await this.store.connect();
    await this.store.exclusive(async () => {
      const categories = await this.store.load('categories');
      const now = this.timestamp();
      if (categories.length === 0) {
        await this.store.commit({ categories: buildDefaultCategories(now) });
        this.logger.info('Seeded default categories');
      } else if (!categories.some(c => c.id === FALLBACK_CATEGORY_ID)) {
        await this.store.commit({ categories: [...categories, buildFallbackCategory(now)] });
        this.logger.warn(`Fallback category ${FALLBACK_CATEGORY_ID} was missing and has been re-created`);
      }
    });
  }

  public async createPrompt(input: CreatePromptInput): Promise<Prompt> {
    const data = parseInput(mutationSchemas.createPrompt, input, 'prompt data');
    const prompt = await this.mutate(draft =>
      draft.addPrompt({
        categoryId: data.categoryId,
        content: data.content,
        description: data.description ?? '',
        tags: data.tags,
        title: data.title,
      }),
    );
    this.logger.info({ categoryId: prompt.categoryId, promptId: prompt.id }, 'Prompt created');
    return prompt;
  }

  /**
   * Applies an edit. A change to title, content or description appends a ledger
   * version (minor bump, or major with `majorChange`); category and tag edits do not.
   */
  public async updatePrompt(id: string, input: UpdatePromptInput): Promise<Prompt> {
    const data = parseInput(mutationSchemas.updatePrompt, input, 'prompt update');
    const prompt = await this.mutate(draft => {
      const current = draft.requirePrompt(id);
      const category = draft.resolveCategory(data.categoryId === undefined ? current.categoryId : data.categoryId);
      const tags = draft.resolveTagNames(data.tags ?? current.tags);
      const snapshot: VersionSnapshot = {
        content: data.content ?? current.content,
        description: data.description ?? current.description,
        title: data.title ?? current.title,
      };

      let currentVersion = current.currentVersion;
      if (
        snapshot.title !== current.title ||
        snapshot.content !== current.content ||
        snapshot.description !== current.description
      ) {
        const version = draft.ledger.append(id, snapshot, data.changeNote ?? '', {
          createdAt: draft.now,
          major: data.majorChange,
        });
        currentVersion = version.version;
        draft.touch('versions');
      }

      const next: Prompt = {
        ...current,
        ...snapshot,
        categoryId: category.id,
        categoryName: category.name,
        categoryPath: category.path,
        currentVersion,
        tags,
        updatedAt: draft.now,
      };
      draft.replacePrompt(next);
      return next;
    });
    this.logger.info({ promptId: id, version: prompt.currentVersion }, 'Prompt updated');
    return prompt;
  }

  /** Removes the prompt. Its versions stay in the ledger. */
  public async deletePrompt(id: string): Promise<Prompt> {
    const deleted = await this.mutate(draft => {
      const prompt = draft.requirePrompt(id);
      draft.prompts = draft.prompts.filter(p => p.id !== id);
      draft.touch('prompts');
      return prompt;
    });
    this.logger.info({ promptId: id }, 'Prompt deleted');
    return deleted;
  }

  /** Adds exactly one to the usage counter. Not versioned; `updatedAt` is kept. */
  public async usePrompt(id: string): Promise<Prompt> {
    return this.mutate(draft => {
      const prompt = draft.requirePrompt(id);
      const next: Prompt = { ...prompt, usageCount: prompt.usageCount + 1 };
      draft.replacePrompt(next);
      return next;
    });
  }

  /**
   * Restores title, content and description from a ledger version and points
   * `currentVersion` at it. The ledger itself is not touched.
   */
  public async rollbackPrompt(id: string, input: { version: string }): Promise<Prompt> {
    const data = parseInput(mutationSchemas.rollback, input, 'rollback request');
    const prompt = await this.mutate(draft => {
      const current = draft.requirePrompt(id);
      const version = draft.ledger.get(id, data.version);
      if (!version) {
        throw new NotFoundError(`Version ${data.version} of prompt ${id} not found`);
      }
      const next: Prompt = {
        ...current,
        content: version.content,
        currentVersion: version.version,
        description: version.description,
        title: version.title,
        updatedAt: draft.now,
      };
      draft.replacePrompt(next);
      return next;
    });
    this.logger.info({ promptId: id, version: prompt.currentVersion }, 'Prompt rolled back');
    return prompt;
  }

  public async createCategory(input: CreateCategoryInput): Promise<Category> {
    const data = parseInput(mutationSchemas.createCategory, input, 'category data');
    const category = await this.mutate(draft => {
      const parentId = data.parentId ?? null;
      const tree = draft.tree();
      if (parentId !== null && !tree.has(parentId)) {
        throw new ValidationError(`Parent category ${parentId} does not exist`, [
          { message: 'Parent category does not exist.', path: ['parentId'] },
        ]);
      }
      const level = tree.levelUnder(parentId);
      if (level > MAX_CATEGORY_DEPTH) {
        throw new ValidationError(`Categories cannot be nested deeper than ${MAX_CATEGORY_DEPTH} levels`, [
          { message: `Parent category ${parentId ?? ''} is already at the deepest level.`, path: ['parentId'] },
        ]);
      }
      const id = this.generateId();
      draft.categories.push({
        color: data.color ?? DEFAULT_CATEGORY_COLOR,
        createdAt: draft.now,
        description: data.description ?? '',
        id,
        level,
        name: data.name,
        parentId,
        path: data.name,
        updatedAt: draft.now,
      });
      draft.refreshCategories();
      return draft.requireCategory(id);
    });
    this.logger.info({ categoryId: category.id, path: category.path }, 'Category created');
    return category;
  }

  /**
   * Renames, recolours or moves a category. Moves are rejected when they would form
   * a cycle or push the subtree past the depth limit. Paths below the category and
   * the cached paths on affected prompts are refreshed in the same commit.
   */
  public async updateCategory(id: string, input: UpdateCategoryInput): Promise<Category> {
    const data = parseInput(mutationSchemas.updateCategory, input, 'category update');
    const category = await this.mutate(draft => {
      const current = draft.requireCategory(id);
      const tree = draft.tree();
      let parentId = current.parentId;

      if (data.parentId !== undefined && data.parentId !== current.parentId) {
        parentId = data.parentId;
        if (parentId !== null && !tree.has(parentId)) {
          throw new ValidationError(`Parent category ${parentId} does not exist`, [
            { message: 'Parent category does not exist.', path: ['parentId'] },
          ]);
        }
        if (tree.wouldCreateCycle(id, parentId)) {
          throw new ValidationError(`Cannot move category ${id} under itself or one of its descendants`, [
            { message: 'Moving the category there would create a cycle.', path: ['parentId'] },
          ]);
        }
        const deepest = tree.levelUnder(parentId) + tree.subtreeHeight(id) - 1;
        if (deepest > MAX_CATEGORY_DEPTH) {
          throw new ValidationError(
            `Moving category ${id} would nest categories ${deepest} levels deep (limit ${MAX_CATEGORY_DEPTH})`,
            [{ message: 'The moved subtree would exceed the depth limit.', path: ['parentId'] }],
          );
        }
      }

      draft.replaceCategory({
        ...current,
        color: data.color ?? current.color,
        description: data.description ?? current.description,
        name: data.name ?? current.name,
        parentId,
        updatedAt: draft.now,
      });
      draft.refreshCategories();
      return draft.requireCategory(id);
    });
    this.logger.info({ categoryId: id, path: category.path }, 'Category updated');
    return category;
  }

  /** Reports what deleting the category would change, without changing anything. */
  public async previewCategoryDeletion(id: string): Promise<CategoryDeletionImpact> {
    if (id === FALLBACK_CATEGORY_ID) {
      throw new ConflictError(`Category ${id} is the fallback category and cannot be deleted`);
    }
    const { categories, prompts } = await this.store.snapshot();
    const tree = new CategoryTree(categories);
    const category = tree.get(id);
    if (!category) throw new NotFoundError(`Category ${id} not found`);
    return {
      affectedPrompts: prompts.filter(p => p.categoryId === id).length,
      category,
      childCategories: tree.childrenOf(id).map(c => c.name),
    };
  }

  /**
   * Deletes a category. Its prompts move to the fallback category and its direct
   * children move up to its parent, or become roots.
   */
  public async deleteCategory(id: string): Promise<CategoryDeletionResult> {
    if (id === FALLBACK_CATEGORY_ID) {
      throw new ConflictError(`Category ${id} is the fallback category and cannot be deleted`);
    }
    const result = await this.mutate(draft => {
      const category = draft.requireCategory(id);
      draft.fallbackCategory();

      let reparentedChildren = 0;
      draft.categories = draft.categories
        .filter(c => c.id !== id)
        .map(c => {
          if (c.parentId !== id) return c;
          reparentedChildren += 1;
          return { ...c, parentId: category.parentId, updatedAt: draft.now };
        });
      draft.touch('categories');

      const reassignedPrompts = draft.refreshCategories();
      return { deleted: category, reassignedPrompts, reparentedChildren };
    });
    this.logger.info(
      { categoryId: id, reassignedPrompts: result.reassignedPrompts, reparentedChildren: result.reparentedChildren },
      'Category deleted',
    );
    return result;
  }

  public async createTag(input: CreateTagInput): Promise<Tag> {
    const data = parseInput(mutationSchemas.createTag, input, 'tag data');
    const tag = await this.mutate(draft => {
      if (draft.tags.some(t => t.name === data.name)) {
        throw new ValidationError(`Tag "${data.name}" already exists`, [
          { message: 'Tag names must be unique.', path: ['name'] },
        ]);
      }
      const created: Tag = {
        color: data.color ?? DEFAULT_TAG_COLOR,
        createdAt: draft.now,
        id: this.generateId(),
        name: data.name,
        updatedAt: draft.now,
      };
      draft.tags.push(created);
      draft.touch('tags');
      return created;
    });
    this.logger.info({ tagId: tag.id, name: tag.name }, 'Tag created');
    return tag;
  }

  /** Renames or recolours a tag. A rename is rewritten into every prompt's tag list. */
  public async updateTag(id: string, input: UpdateTagInput): Promise<TagUpdateResult> {
    const data = parseInput(mutationSchemas.updateTag, input, 'tag update');
    const result = await this.mutate(draft => {
      const current = draft.requireTag(id);
      const name = data.name ?? current.name;
      if (name !== current.name && draft.tags.some(t => t.name === name)) {
        throw new ValidationError(`Tag "${name}" already exists`, [
          { message: 'Tag names must be unique.', path: ['name'] },
        ]);
      }
      const tag: Tag = { ...current, color: data.color ?? current.color, name, updatedAt: draft.now };
      draft.tags = draft.tags.map(t => (t.id === id ? tag : t));
      draft.touch('tags');

      let affectedPrompts = 0;
      if (name !== current.name) {
        draft.prompts = draft.prompts.map(prompt => {
          if (!prompt.tags.includes(current.name)) return prompt;
          affectedPrompts += 1;
          return { ...prompt, tags: prompt.tags.map(t => (t === current.name ? name : t)) };
        });
        draft.touch('prompts');
      }
      return { affectedPrompts, tag };
    });
    this.logger.info({ affectedPrompts: result.affectedPrompts, tagId: id }, 'Tag updated');
    return result;
  }

  /** Deletes a tag and strips its name from every prompt. */
  public async deleteTag(id: string): Promise<TagDeletionResult> {
    const result = await this.mutate(draft => {
      const tag = draft.requireTag(id);
      draft.tags = draft.tags.filter(t => t.id !== id);
      let affectedPrompts = 0;
      draft.prompts = draft.prompts.map(prompt => {
        if (!prompt.tags.includes(tag.name)) return prompt;
        affectedPrompts += 1;
        return { ...prompt, tags: prompt.tags.filter(t => t !== tag.name) };
      });
      draft.touch('tags', 'prompts');
      return { affectedPrompts, deleted: tag };
    });
    this.logger.info({ affectedPrompts: result.affectedPrompts, tagId: id }, 'Tag deleted');
    return result;
  }

  /**
   * Upserts prompts by id in one commit. Entries that fail validation are skipped
   * and counted; the rest follow the same category and tag rules as create.
   */
  public async importPrompts(input: ImportPromptsInput): Promise<ImportResult> {
    const { prompts: entries } = parseInput(importRequestSchema, input, 'import data');
    const result = await this.mutate(draft => {
      const counts: ImportResult = { created: 0, skipped: 0, updated: 0 };
      for (const entry of entries) {
        const parsed = importedPromptSchema.safeParse(entry);
        if (!parsed.success) {
          counts.skipped += 1;
          continue;
        }
        counts[draft.importPrompt(parsed.data)] += 1;
      }
      return counts;
    });
    this.logger.info(result, 'Prompts imported');
    return result;
  }

  /** The state a full reset leaves behind: default categories and nothing else. */
  public planReset(): CatalogSnapshot {
    return { categories: buildDefaultCategories(this.timestamp()), prompts: [], tags: [], versions: [] };
  }

  /**
   * The state after replacing prompts and versions with `examples`. Categories and
   * tags are kept and new tag names are added; each example is matched to a
   * category by id, then by name or path.
   */
  public planTestData(snapshot: CatalogSnapshot, examples: readonly ExamplePrompt[]): CatalogSnapshot {
    const draft = new CatalogDraft(
      { categories: snapshot.categories, prompts: [], tags: snapshot.tags, versions: [] },
      this.timestamp(),
      this.generateId,
    );
    for (const example of examples) {
      draft.addPrompt({
        categoryId: draft.matchCategory(example.categoryId, example.category),
        content: example.content,
        description: example.description ?? '',
        tags: example.tags,
        title: example.title,
      });
    }
    return draft.toSnapshot();
  }

  private timestamp(): string {
    return this.clock().toISOString();
  }

  private mutate<T>(apply: (draft: CatalogDraft) => T): Promise<T> {
    return this.store.exclusive(async () => {
      const snapshot = await this.store.snapshot();
      const draft = new CatalogDraft(snapshot, this.timestamp(), this.generateId);
      const result = apply(draft);
      if (draft.hasChanges()) {
        assertConsistent(draft.toSnapshot());
        await this.store.commit(draft.changes());
      }
      return result;
    });
  }
}
