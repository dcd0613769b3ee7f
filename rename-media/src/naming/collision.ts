import fs from "node:fs/promises";
import path from "node:path";

export interface UniqueTargetOptions {
  /** The file being renamed; its own path never counts as a collision */
  source?: string;

  /** Paths already claimed earlier in the run but not yet on disk (dry run) */
  reserved?: ReadonlySet<string>;

  /** Paths a dry run has already moved away from; treated as free */
  vacated?: ReadonlySet<string>;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find a free path for base + ext in dirPath, probing base-1, base-2, ... on collision
 * @param ext - Extension including the dot; written lower-cased
 * @returns Absolute destination path
 */
export async function uniqueTarget(
  dirPath: string,
  base: string,
  ext: string,
  options: UniqueTargetOptions = {}
): Promise<string> {
  const lowerExt = ext.toLowerCase();
  const isTaken = async (candidate: string): Promise<boolean> => {
    if (candidate === options.source) return false;
    if (options.reserved?.has(candidate)) return true;
    if (options.vacated?.has(candidate)) return false;
    return exists(candidate);
  };

  const target = path.join(dirPath, `${base}${lowerExt}`);
  if (!(await isTaken(target))) {
    return target;
  }

  for (let i = 1; ; i++) {
    const candidate = path.join(dirPath, `${base}-${i}${lowerExt}`);
    if (!(await isTaken(candidate))) {
      return candidate;
    }
  }
}
