import * as fsp from 'fs/promises';
import path from 'path';

import { StorageError, describeError } from './errors.js';
import type { CatalogSnapshot } from './interfaces.js';
import type { Logger } from './logger.js';
import { backupFileSchema } from './schemas.js';
import { formatFileTimestamp, isErrnoException, writeTempFile } from './utils.js';

const BACKUP_PREFIX = 'catalog-backup-';
const BACKUP_NAME = /^catalog-backup-(\d{8}_\d{6}_\d{3})(?:-(\d+))?\.json$/;
const MAX_NAME_ATTEMPTS = 100;

export interface BackupInfo {
  path: string;
  fileName: string;
  /** YYYYMMDD_HHmmss_SSS stamp (UTC) taken from the file name */
  timestamp: string;
  /** Suffix that keeps backups taken in the same millisecond apart; 0 for the first */
  sequence: number;
}

function backupFileName(stamp: string, sequence: number): string {
  return sequence === 0 ? `${BACKUP_PREFIX}${stamp}.json` : `${BACKUP_PREFIX}${stamp}-${sequence}.json`;
}

/**
 * Writes full catalog snapshots to timestamped JSON files. Restoring one is left
 * to the operator.
 */
export class BackupService {
  private readonly logger: Logger;

  public constructor(
    private readonly backupsDir: string,
    logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.logger = logger.child({ component: 'backup-service' });
  }

  /**
   * Persists `snapshot` and returns the file path. Any failure surfaces as a
   * StorageError so the caller can abort.
   */
  public async createBackup(snapshot: CatalogSnapshot): Promise<string> {
    const now = this.clock();
    const stamp = formatFileTimestamp(now);
    const body = {
      backupTime: now.toISOString(),
      categories: snapshot.categories,
      prompts: snapshot.prompts,
      tags: snapshot.tags,
      versions: snapshot.versions,
    };

    let tempPath: string;
    try {
      const target = path.join(this.backupsDir, backupFileName(stamp, 0));
      tempPath = await writeTempFile(target, `${JSON.stringify(body, null, 2)}\n`);
    } catch (error: unknown) {
      throw new StorageError(`Backup to ${this.backupsDir} failed: ${describeError(error)}`, this.backupsDir, {
        cause: error,
      });
    }
    try {
      const filePath = await this.publish(tempPath, stamp);
      this.logger.info({ file: filePath, prompts: snapshot.prompts.length }, 'Catalog backup written');
      return filePath;
    } finally {
      await fsp.rm(tempPath, { force: true });
    }
  }

  /** Links the finished temp file under the first free name for `stamp`. Existing backups are never replaced. */
  private async publish(tempPath: string, stamp: string): Promise<string> {
    for (let sequence = 0; sequence < MAX_NAME_ATTEMPTS; sequence++) {
      const filePath = path.join(this.backupsDir, backupFileName(stamp, sequence));
      try {
        await fsp.link(tempPath, filePath);
        return filePath;
      } catch (error: unknown) {
        if (isErrnoException(error) && error.code === 'EEXIST') continue;
        throw new StorageError(`Backup to ${filePath} failed: ${describeError(error)}`, filePath, { cause: error });
      }
    }
    throw new StorageError(`No free backup name for ${stamp} in ${this.backupsDir}`, this.backupsDir);
  }

  /** Backups on disk, newest first. */
  public async listBackups(): Promise<BackupInfo[]> {
    let entries: string[];
    try {
      entries = await fsp.readdir(this.backupsDir);
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw new StorageError(`Failed to list backups in ${this.backupsDir}: ${describeError(error)}`, this.backupsDir, {
        cause: error,
      });
    }
    const backups: BackupInfo[] = [];
    for (const fileName of entries) {
      const match = BACKUP_NAME.exec(fileName);
      if (!match) continue;
      backups.push({
        fileName,
        path: path.join(this.backupsDir, fileName),
        sequence: match[2] ? Number(match[2]) : 0,
        timestamp: match[1],
      });
    }
    return backups.sort((a, b) =>
      a.timestamp === b.timestamp ? b.sequence - a.sequence : a.timestamp < b.timestamp ? 1 : -1,
    );
  }

  /** Reads a backup file back into a snapshot. */
  public async readBackup(filePath: string): Promise<CatalogSnapshot> {
    let data: unknown;
    try {
      data = JSON.parse(await fsp.readFile(filePath, 'utf-8'));
    } catch (error: unknown) {
      throw new StorageError(`Failed to read backup ${filePath}: ${describeError(error)}`, filePath, { cause: error });
    }
    const result = backupFileSchema.safeParse(data);
    if (!result.success) {
      throw new StorageError(`Backup ${filePath} is not a valid catalog snapshot`, filePath);
    }
    const { categories, prompts, tags, versions } = result.data;
    return { categories, prompts, tags, versions };
  }
}
