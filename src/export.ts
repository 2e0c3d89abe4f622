import { stringify } from 'csv-stringify/sync';

import type { Prompt } from './interfaces.js';

export const EXPORT_COLUMNS = [
  { header: '标题', key: 'title' },
  { header: '描述', key: 'description' },
  { header: '分类', key: 'category' },
  { header: '标签', key: 'tags' },
  { header: '内容', key: 'content' },
  { header: '创建时间', key: 'createdAt' },
];

/**
 * Serializes prompts to CSV. Output starts with a UTF-8 byte order mark so
 * spreadsheet tools read the CJK headers correctly. The category column carries
 * the cached category path.
 */
export function exportPromptsCsv(prompts: readonly Prompt[]): string {
  const records = prompts.map(prompt => ({
    category: prompt.categoryPath,
    content: prompt.content,
    createdAt: prompt.createdAt,
    description: prompt.description,
    tags: prompt.tags.join(', '),
    title: prompt.title,
  }));
  return stringify(records, { bom: true, columns: EXPORT_COLUMNS, header: true });
}

export function exportFileName(now: Date): string {
  return `prompts-export-${now.toISOString().slice(0, 10)}.csv`;
}
