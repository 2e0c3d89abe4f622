import { z } from 'zod';

import { ValidationError } from './errors.js';
import type { CatalogSnapshot, EntityKind } from './interfaces.js';

export const DEFAULT_CATEGORY_COLOR = '#6B7280';
export const DEFAULT_TAG_COLOR = '#3B82F6';

const VERSION_LABEL_PATTERN = /^\d+(\.\d+)*$/;

const versionLabelSchema = z
  .string()
  .regex(VERSION_LABEL_PATTERN, { message: 'Version labels are dot-separated numbers, e.g. 1.0 or 2.3.' });

const colorSchema = z
  .string()
  .trim()
  .regex(/^#[0-9a-fA-F]{3}([0-9a-fA-F]{3})?$/, { message: 'Color must be a hex value such as #3B82F6.' });

const timestampSchema = z.string().min(1);

/**
 * Schemas for entities as they are persisted. Defaults fill fields that older
 * data files did not carry yet.
 */
const storedCategorySchema = z.object({
  color: z.string().default(DEFAULT_CATEGORY_COLOR),
  createdAt: timestampSchema,
  description: z.string().default(''),
  id: z.string().min(1),
  level: z.number().int().positive(),
  name: z.string().min(1),
  parentId: z.string().min(1).nullable().default(null),
  path: z.string(),
  updatedAt: timestampSchema,
});

const storedTagSchema = z.object({
  color: z.string().default(DEFAULT_TAG_COLOR),
  createdAt: timestampSchema,
  id: z.string().min(1),
  name: z.string().min(1),
  updatedAt: timestampSchema,
});

const storedPromptSchema = z.object({
  categoryId: z.string().min(1),
  categoryName: z.string(),
  categoryPath: z.string(),
  content: z.string(),
  createdAt: timestampSchema,
  currentVersion: versionLabelSchema,
  description: z.string().default(''),
  id: z.string().min(1),
  tags: z.array(z.string().min(1)).default([]),
  title: z.string(),
  updatedAt: timestampSchema,
  usageCount: z.number().int().nonnegative().default(0),
});

const storedVersionSchema = z.object({
  changeNote: z.string().default(''),
  content: z.string(),
  createdAt: timestampSchema,
  description: z.string().default(''),
  promptId: z.string().min(1),
  title: z.string(),
  version: versionLabelSchema,
});

export const entitySchemas = {
  category: storedCategorySchema,
  prompt: storedPromptSchema,
  tag: storedTagSchema,
  version: storedVersionSchema,
};

/**
 * One schema per persisted collection, keyed by entity kind.
 */
export const collectionSchemas: {
  [K in EntityKind]: z.ZodType<CatalogSnapshot[K], z.ZodTypeDef, unknown>;
} = {
  categories: z.array(storedCategorySchema),
  prompts: z.array(storedPromptSchema),
  tags: z.array(storedTagSchema),
  versions: z.array(storedVersionSchema),
};

export const backupFileSchema = z.object({
  backupTime: z.string(),
  categories: collectionSchemas.categories,
  prompts: collectionSchemas.prompts,
  tags: collectionSchemas.tags,
  versions: collectionSchemas.versions,
});

/** Search splits `?tags=a,b` on commas, so names cannot hold one. */
export const tagNameSchema = z
  .string({ invalid_type_error: 'Tags must be strings.', required_error: 'Tag name is required.' })
  .trim()
  .min(1, { message: 'Tag name cannot be empty.' })
  .max(50, { message: 'Tag name cannot be longer than 50 characters.' })
  .refine(name => !name.includes(','), { message: 'Tag names cannot contain ",".' });

/** Blank entries are dropped; the rest follow the tag name rules. */
const tagNamesSchema = z
  .array(z.string({ invalid_type_error: 'Tags must be strings.' }))
  .transform(names => names.filter(name => name.trim() !== ''))
  .pipe(z.array(tagNameSchema));

/**
 * Schemas for mutation inputs.
 */
export const mutationSchemas = {
  createCategory: z
    .object({
      color: colorSchema.optional(),
      description: z.string().trim().max(500).optional(),
      name: z
        .string({ required_error: 'Category name is required.' })
        .trim()
        .min(1, { message: 'Category name cannot be empty.' })
        .max(50, { message: 'Category name cannot be longer than 50 characters.' })
        .refine(name => !name.includes('/'), { message: 'Category names cannot contain "/".' }),
      parentId: z.string().min(1).nullish(),
    })
    .strict(),

  createPrompt: z
    .object({
      categoryId: z.string().nullish(),
      content: z
        .string({
          invalid_type_error: 'Content must be a string.',
          required_error: 'Content is required.',
        })
        .trim()
        .min(1, { message: 'Content cannot be empty or just whitespace.' }),
      description: z.string().trim().max(500, { message: 'Description cannot be longer than 500 characters.' }).optional(),
      tags: tagNamesSchema.nullish(),
      title: z
        .string({
          invalid_type_error: 'Title must be a string.',
          required_error: 'Title is required.',
        })
        .trim()
        .min(1, { message: 'Title cannot be empty or just whitespace.' })
        .max(200, { message: 'Title cannot be longer than 200 characters.' }),
    })
    .strict(),

  createTag: z
    .object({
      color: colorSchema.optional(),
      name: tagNameSchema,
    })
    .strict(),

  rollback: z.object({ version: versionLabelSchema }).strict(),

  updateCategory: z
    .object({
      color: colorSchema.optional(),
      description: z.string().trim().max(500).optional(),
      name: z
        .string()
        .trim()
        .min(1, { message: 'Category name cannot be empty.' })
        .max(50, { message: 'Category name cannot be longer than 50 characters.' })
        .refine(name => !name.includes('/'), { message: 'Category names cannot contain "/".' })
        .optional(),
      parentId: z.string().min(1).nullable().optional(),
    })
    .strict(),

  updatePrompt: z
    .object({
      categoryId: z.string().nullish(),
      changeNote: z.string().trim().max(500).optional(),
      content: z.string().trim().min(1, { message: 'Content cannot be empty or just whitespace.' }).optional(),
      description: z.string().trim().max(500).optional(),
      majorChange: z.boolean().optional(),
      tags: tagNamesSchema.optional(),
      title: z.string().trim().min(1, { message: 'Title cannot be empty or just whitespace.' }).max(200).optional(),
    })
    .strict(),

  updateTag: z
    .object({
      color: colorSchema.optional(),
      name: tagNameSchema.optional(),
    })
    .strict(),
};

export const searchSchema = z.object({
  categoryId: z.string().min(1).optional(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(20),
  tags: z.array(z.string().min(1)).optional(),
  text: z.string().optional(),
});

/**
 * Example prompts file used by the test-data loader. Categories are matched by
 * id first, then by display name.
 */
export const examplesFileSchema = z.object({
  prompts: z.array(
    z.object({
      category: z.string().optional(),
      categoryId: z.string().nullish(),
      content: z.string().min(1),
      description: z.string().optional(),
      tags: tagNamesSchema.optional(),
      title: z.string().min(1),
    }),
  ),
});

const importedVersionSchema = z.object({
  changeNote: z.string().default(''),
  content: z.string().min(1),
  createdAt: timestampSchema.optional(),
  description: z.string().default(''),
  title: z.string().min(1),
  version: versionLabelSchema,
});

/**
 * One prompt of a bulk import, matched to existing prompts by id. Categories are
 * matched by id first, then by name or path.
 */
export const importedPromptSchema = z.object({
  category: z.string().optional(),
  categoryId: z.string().nullish(),
  content: z.string().trim().min(1),
  createdAt: timestampSchema.optional(),
  currentVersion: versionLabelSchema.optional(),
  description: z.string().trim().max(500).optional(),
  id: z.string().trim().min(1),
  tags: tagNamesSchema.optional(),
  title: z.string().trim().min(1).max(200),
  updatedAt: timestampSchema.optional(),
  usageCount: z.number().int().nonnegative().optional(),
  versions: z.array(importedVersionSchema).default([]),
});

/** Entries are checked one by one so a bad entry is skipped, not fatal. */
export const importRequestSchema = z.object({ prompts: z.array(z.unknown()) }).strict();

export type CreatePromptInput = z.input<typeof mutationSchemas.createPrompt>;
export type UpdatePromptInput = z.input<typeof mutationSchemas.updatePrompt>;
export type CreateCategoryInput = z.input<typeof mutationSchemas.createCategory>;
export type UpdateCategoryInput = z.input<typeof mutationSchemas.updateCategory>;
export type CreateTagInput = z.input<typeof mutationSchemas.createTag>;
export type UpdateTagInput = z.input<typeof mutationSchemas.updateTag>;
export type SearchInput = z.input<typeof searchSchema>;
export type SearchParams = z.output<typeof searchSchema>;
export type ExamplePrompt = z.output<typeof examplesFileSchema>['prompts'][number];
export type ImportedPrompt = z.output<typeof importedPromptSchema>;
export type ImportPromptsInput = z.input<typeof importRequestSchema>;

/**
 * Parses caller input, turning zod issues into a ValidationError that names `subject`.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, subject: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map(e => ({ message: e.message, path: e.path }));
    throw new ValidationError(`Invalid ${subject}: ${issues.map(i => i.message).join('; ')}`, issues);
  }
  return result.data;
}
