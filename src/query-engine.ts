import { CategoryTree, buildCategoryTree } from './category-tree.js';
import { NotFoundError } from './errors.js';
import type {
  CatalogStats,
  Category,
  CategoryTreeNode,
  EntityStore,
  Prompt,
  PromptVersion,
  SearchResult,
  Tag,
} from './interfaces.js';
import { parseInput, searchSchema, type SearchInput } from './schemas.js';
import { VersionLedger, compareVersionLabels } from './version-ledger.js';

export type SearchFilters = Omit<SearchInput, 'page' | 'pageSize'>;

/** Most recently updated first, ties broken by id. */
export function comparePrompts(a: Prompt, b: Prompt): number {
  if (a.updatedAt !== b.updatedAt) return a.updatedAt < b.updatedAt ? 1 : -1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Text matches title, content or description case-insensitively. The category
 * filter includes the whole subtree; the tag filter matches any selected tag.
 */
export function filterPrompts(
  prompts: readonly Prompt[],
  categories: readonly Category[],
  filters: SearchFilters,
): Prompt[] {
  const text = filters.text?.trim().toLowerCase() ?? '';
  const categoryIds = filters.categoryId ? new CategoryTree(categories).subtreeIds(filters.categoryId) : undefined;
  const tags = filters.tags && filters.tags.length > 0 ? new Set(filters.tags) : undefined;

  return prompts.filter(prompt => {
    if (
      text !== '' &&
      !prompt.title.toLowerCase().includes(text) &&
      !prompt.content.toLowerCase().includes(text) &&
      !prompt.description.toLowerCase().includes(text)
    ) {
      return false;
    }
    if (categoryIds && !categoryIds.has(prompt.categoryId)) return false;
    if (tags && !prompt.tags.some(tag => tags.has(tag))) return false;
    return true;
  });
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Read side of the catalog. Never writes; reads take no lock. Reads that join
 * collections take them from one snapshot.
 */
export class QueryEngine {
  public constructor(private readonly store: EntityStore) {}

  public async search(input: SearchInput = {}): Promise<SearchResult> {
    const params = parseInput(searchSchema, input, 'search parameters');
    const matches = await this.searchAll(params);
    const start = (params.page - 1) * params.pageSize;
    return {
      items: matches.slice(start, start + params.pageSize),
      page: params.page,
      pageSize: params.pageSize,
      totalCount: matches.length,
    };
  }

  /** Every match in search order, without paging. */
  public async searchAll(filters: SearchFilters = {}): Promise<Prompt[]> {
    const { categories, prompts } = await this.store.snapshot();
    return filterPrompts(prompts, categories, filters).sort(comparePrompts);
  }

  public async getPrompt(id: string): Promise<Prompt> {
    const prompts = await this.store.load('prompts');
    const prompt = prompts.find(p => p.id === id);
    if (!prompt) throw new NotFoundError(`Prompt ${id} not found`);
    return prompt;
  }

  /** Categories ordered by level, then name. */
  public async listCategories(): Promise<Category[]> {
    const categories = await this.store.load('categories');
    return [...categories].sort((a, b) => a.level - b.level || compareText(a.name, b.name));
  }

  public async getCategoryTree(): Promise<CategoryTreeNode[]> {
    return buildCategoryTree(await this.store.load('categories'));
  }

  public async listTags(): Promise<Tag[]> {
    const tags = await this.store.load('tags');
    return [...tags].sort((a, b) => compareText(a.name, b.name));
  }

  /**
   * Versions of a prompt in creation order. Versions of deleted prompts stay
   * readable.
   */
  public async listVersions(promptId: string): Promise<PromptVersion[]> {
    const { prompts, versions } = await this.store.snapshot();
    const list = new VersionLedger(versions).list(promptId);
    if (list.length === 0 && !prompts.some(p => p.id === promptId)) {
      throw new NotFoundError(`Prompt ${promptId} not found`);
    }
    return list.sort((a, b) => compareVersionLabels(a.version, b.version));
  }

  public async getVersion(promptId: string, label: string): Promise<PromptVersion> {
    const versions = await this.store.load('versions');
    const version = new VersionLedger(versions).get(promptId, label);
    if (!version) throw new NotFoundError(`Version ${label} of prompt ${promptId} not found`);
    return version;
  }

  /**
   * Counts over live prompts only. Category counts include every descendant.
   */
  public async getStats(): Promise<CatalogStats> {
    const { categories, prompts, tags } = await this.store.snapshot();
    const tree = new CategoryTree(categories);

    let mostUsedPrompt: Prompt | null = null;
    for (const prompt of prompts) {
      if (!mostUsedPrompt || prompt.usageCount > mostUsedPrompt.usageCount) {
        mostUsedPrompt = prompt;
      }
    }

    const levelStats: Record<number, number> = {};
    const categoryDistribution = categories.map(category => {
      levelStats[category.level] = (levelStats[category.level] ?? 0) + 1;
      const subtree = tree.subtreeIds(category.id);
      return {
        color: category.color,
        count: prompts.filter(p => subtree.has(p.categoryId)).length,
        id: category.id,
        level: category.level,
        name: category.name,
        parentId: category.parentId,
        path: category.path,
      };
    });

    return {
      categoryDistribution,
      levelStats,
      mostUsedPrompt,
      totalCategories: categories.length,
      totalPrompts: prompts.length,
      totalTags: tags.length,
    };
  }
}
