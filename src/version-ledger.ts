import { ConflictError } from './errors.js';
import type { PromptVersion } from './interfaces.js';

export const INITIAL_VERSION_LABEL = '1.0';

export type VersionSnapshot = Pick<PromptVersion, 'title' | 'content' | 'description'>;

export interface AppendOptions {
  /** Bump the major component instead of the minor one. */
  major?: boolean;
  createdAt: string;
}

function parseVersionLabel(label: string): number[] {
  return label.split('.').map(part => Number.parseInt(part, 10));
}

/**
 * Orders labels numerically component by component, so "1.10" sorts after "1.9".
 * Missing components count as zero.
 */
export function compareVersionLabels(a: string, b: string): number {
  const left = parseVersionLabel(a);
  const right = parseVersionLabel(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * "1.0" for the first version; otherwise M.m becomes M.(m+1), or (M+1).0 for a major bump.
 */
export function nextVersionLabel(highest: string | undefined, major = false): string {
  if (highest === undefined) return INITIAL_VERSION_LABEL;
  const [majorPart = 1, minorPart = 0] = parseVersionLabel(highest);
  return major ? `${majorPart + 1}.0` : `${majorPart}.${minorPart + 1}`;
}

/**
 * Append-only view over the versions collection. Works on a private copy; callers
 * commit `toArray()` together with the prompt changes that produced it.
 */
export class VersionLedger {
  private readonly entries: PromptVersion[];

  public constructor(versions: readonly PromptVersion[]) {
    this.entries = [...versions];
  }

  /** Versions of one prompt in creation order. */
  public list(promptId: string): PromptVersion[] {
    return this.entries.filter(v => v.promptId === promptId);
  }

  public get(promptId: string, label: string): PromptVersion | undefined {
    return this.entries.find(v => v.promptId === promptId && v.version === label);
  }

  /** The version with the highest label, which is also the most recent one. */
  public latest(promptId: string): PromptVersion | undefined {
    let latest: PromptVersion | undefined;
    for (const version of this.list(promptId)) {
      if (!latest || compareVersionLabels(version.version, latest.version) > 0) {
        latest = version;
      }
    }
    return latest;
  }

  public append(
    promptId: string,
    snapshot: VersionSnapshot,
    changeNote: string,
    options: AppendOptions,
  ): PromptVersion {
    const label = nextVersionLabel(this.latest(promptId)?.version, options.major);
    if (this.get(promptId, label)) {
      throw new ConflictError(`Version ${label} already exists for prompt ${promptId}`);
    }
    const version: PromptVersion = {
      changeNote,
      content: snapshot.content,
      createdAt: options.createdAt,
      description: snapshot.description,
      promptId,
      title: snapshot.title,
      version: label,
    };
    this.entries.push(version);
    return version;
  }

  /** Takes an existing record as is. Returns false when its label is already taken. */
  public adopt(version: PromptVersion): boolean {
    if (this.get(version.promptId, version.version)) return false;
    this.entries.push(version);
    return true;
  }

  public toArray(): PromptVersion[] {
    return [...this.entries];
  }
}
