import type { Category } from '../interfaces.js';

/** The category that receives prompts whose category is missing or deleted. */
export const FALLBACK_CATEGORY_ID = '7';

/**
 * Root categories seeded into an empty store and restored by a full reset.
 */
export const DEFAULT_CATEGORIES: ReadonlyArray<Pick<Category, 'id' | 'name' | 'color' | 'description'>> = [
  { color: '#3B82F6', description: '编程相关提示词', id: '1', name: '编程' },
  { color: '#10B981', description: '写作相关提示词', id: '2', name: '写作' },
  { color: '#F59E0B', description: '分析相关提示词', id: '3', name: '分析' },
  { color: '#8B5CF6', description: '创意相关提示词', id: '4', name: '创意' },
  { color: '#EF4444', description: '商业相关提示词', id: '5', name: '商业' },
  { color: '#06B6D4', description: '教育相关提示词', id: '6', name: '教育' },
  { color: '#6B7280', description: '其他类型提示词', id: FALLBACK_CATEGORY_ID, name: '其他' },
];

export function buildDefaultCategories(now: string): Category[] {
  return DEFAULT_CATEGORIES.map(seed => ({
    ...seed,
    createdAt: now,
    level: 1,
    parentId: null,
    path: seed.name,
    updatedAt: now,
  }));
}

export function buildFallbackCategory(now: string): Category {
  const [fallback] = buildDefaultCategories(now).filter(c => c.id === FALLBACK_CATEGORY_ID);
  return fallback;
}
