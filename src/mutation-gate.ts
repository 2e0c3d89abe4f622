import { createHash, timingSafeEqual } from 'crypto';
import * as fsp from 'fs/promises';

import type { BackupInfo, BackupService } from './backup.js';
import type { CatalogService } from './catalog-service.js';
import { assertConsistent } from './consistency.js';
import { NotFoundError, StorageError, UnauthorizedError, describeError } from './errors.js';
import type {
  BulkOperationResult,
  Category,
  CategoryDeletionImpact,
  CategoryDeletionResult,
  EntityStore,
  ImportResult,
  Prompt,
  Tag,
  TagDeletionResult,
  TagUpdateResult,
} from './interfaces.js';
import type { Logger } from './logger.js';
import {
  examplesFileSchema,
  parseInput,
  type CreateCategoryInput,
  type CreatePromptInput,
  type CreateTagInput,
  type ExamplePrompt,
  type ImportPromptsInput,
  type UpdateCategoryInput,
  type UpdatePromptInput,
  type UpdateTagInput,
} from './schemas.js';
import { isErrnoException } from './utils.js';

/**
 * Compares secrets through their sha256 digests so the comparison takes the same
 * time whatever the inputs' lengths.
 */
export function secretsMatch(provided: string | undefined, expected: string): boolean {
  const left = createHash('sha256')
    .update(provided ?? '')
    .digest();
  const right = createHash('sha256').update(expected).digest();
  return timingSafeEqual(left, right) && provided !== undefined;
}

export interface MutationGateOptions {
  adminSecret: string;
  /** Default source for loadTestData */
  examplesFile: string;
}

/**
 * Single entry point for writes. Every mutation except `usePrompt` needs the admin
 * secret; a wrong secret fails before anything is loaded. Bulk replacements take a
 * backup first and abort if it cannot be written.
 */
export class MutationGate {
  private readonly logger: Logger;

  public constructor(
    private readonly service: CatalogService,
    private readonly store: EntityStore,
    private readonly backups: BackupService,
    private readonly options: MutationGateOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'mutation-gate' });
  }

  public authorize(secret: string | undefined): void {
    if (!secretsMatch(secret, this.options.adminSecret)) {
      this.logger.warn('Rejected mutation with a missing or wrong admin secret');
      throw new UnauthorizedError('Admin secret is missing or incorrect');
    }
  }

  public async createPrompt(secret: string | undefined, input: CreatePromptInput): Promise<Prompt> {
    this.authorize(secret);
    return this.service.createPrompt(input);
  }

  public async updatePrompt(secret: string | undefined, id: string, input: UpdatePromptInput): Promise<Prompt> {
    this.authorize(secret);
    return this.service.updatePrompt(id, input);
  }

  public async deletePrompt(secret: string | undefined, id: string): Promise<Prompt> {
    this.authorize(secret);
    return this.service.deletePrompt(id);
  }

  public async rollbackPrompt(secret: string | undefined, id: string, input: { version: string }): Promise<Prompt> {
    this.authorize(secret);
    return this.service.rollbackPrompt(id, input);
  }

  /** Not gated: counting a use is open to every caller. */
  public async usePrompt(id: string): Promise<Prompt> {
    return this.service.usePrompt(id);
  }

  public async createCategory(secret: string | undefined, input: CreateCategoryInput): Promise<Category> {
    this.authorize(secret);
    return this.service.createCategory(input);
  }

  public async updateCategory(secret: string | undefined, id: string, input: UpdateCategoryInput): Promise<Category> {
    this.authorize(secret);
    return this.service.updateCategory(id, input);
  }

  public async previewCategoryDeletion(secret: string | undefined, id: string): Promise<CategoryDeletionImpact> {
    this.authorize(secret);
    return this.service.previewCategoryDeletion(id);
  }

  public async deleteCategory(secret: string | undefined, id: string): Promise<CategoryDeletionResult> {
    this.authorize(secret);
    return this.service.deleteCategory(id);
  }

  public async createTag(secret: string | undefined, input: CreateTagInput): Promise<Tag> {
    this.authorize(secret);
    return this.service.createTag(input);
  }

  public async updateTag(secret: string | undefined, id: string, input: UpdateTagInput): Promise<TagUpdateResult> {
    this.authorize(secret);
    return this.service.updateTag(id, input);
  }

  public async deleteTag(secret: string | undefined, id: string): Promise<TagDeletionResult> {
    this.authorize(secret);
    return this.service.deleteTag(id);
  }

  /** Upserts prompts by id. Nothing is removed, so no backup is taken. */
  public async importPrompts(secret: string | undefined, input: ImportPromptsInput): Promise<ImportResult> {
    this.authorize(secret);
    return this.service.importPrompts(input);
  }

  public async listBackups(secret: string | undefined): Promise<BackupInfo[]> {
    this.authorize(secret);
    return this.backups.listBackups();
  }

  /**
   * Backs up the catalog, then resets it to the default categories with no tags,
   * prompts or versions.
   */
  public async resetAll(secret: string | undefined): Promise<BulkOperationResult> {
    this.authorize(secret);
    const result = await this.store.exclusive(async () => {
      const backupPath = await this.backups.createBackup(await this.store.snapshot());
      const next = this.service.planReset();
      assertConsistent(next);
      await this.store.commit(next);
      return { backupPath, totalPrompts: next.prompts.length };
    });
    this.logger.warn({ backupPath: result.backupPath }, 'Catalog reset to defaults');
    return result;
  }

  /**
   * Backs up the catalog, then replaces prompts and versions with the example
   * prompts in `examplesFile`. Categories and tags are kept.
   */
  public async loadTestData(
    secret: string | undefined,
    examplesFile: string = this.options.examplesFile,
  ): Promise<BulkOperationResult> {
    this.authorize(secret);
    const examples = await this.readExamples(examplesFile);
    const result = await this.store.exclusive(async () => {
      const snapshot = await this.store.snapshot();
      const backupPath = await this.backups.createBackup(snapshot);
      const next = this.service.planTestData(snapshot, examples);
      assertConsistent(next);
      await this.store.commit(next);
      return { backupPath, totalPrompts: next.prompts.length };
    });
    this.logger.warn(
      { backupPath: result.backupPath, examplesFile, totalPrompts: result.totalPrompts },
      'Catalog replaced with test data',
    );
    return result;
  }

  private async readExamples(examplesFile: string): Promise<ExamplePrompt[]> {
    let content: string;
    try {
      content = await fsp.readFile(examplesFile, 'utf-8');
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Examples file ${examplesFile} not found`);
      }
      throw new StorageError(`Failed to read examples file ${examplesFile}: ${describeError(error)}`, examplesFile, {
        cause: error,
      });
    }
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error: unknown) {
      throw new StorageError(`Examples file ${examplesFile} is not valid JSON: ${describeError(error)}`, examplesFile, {
        cause: error,
      });
    }
    return parseInput(examplesFileSchema, data, `examples file ${examplesFile}`).prompts;
  }
}
