import fs from "node:fs/promises";
import path from "node:path";

/**
 * Lists regular files directly inside a directory (no recursion).
 * Symlinks count when they resolve to a regular file.
 * @param dirPath - Directory to list
 * @param extensions - Lower-cased extensions to keep, e.g. [".mov"]; empty keeps everything
 * @returns Absolute file paths sorted by file name
 */
export async function listMediaFiles(
  dirPath: string,
  extensions: readonly string[] = []
): Promise<string[]> {
  const root = path.resolve(dirPath);
  const entries = await fs.readdir(root, { withFileTypes: true });
  const allowed = new Set(extensions.map((e) => e.toLowerCase()));

  const names: string[] = [];
  for (const entry of entries) {
    if (allowed.size > 0 && !allowed.has(path.extname(entry.name).toLowerCase())) {
      continue;
    }
    const isFile =
      entry.isFile() ||
      (entry.isSymbolicLink() && (await linksToFile(path.join(root, entry.name))));
    if (isFile) {
      names.push(entry.name);
    }
  }

  return names.sort(compareNames).map((name) => path.join(root, name));
}

async function linksToFile(linkPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(linkPath);
    return stats.isFile();
  } catch (error) {
    // Dangling or looping link
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || code === "ELOOP") {
      return false;
    }
    throw error;
  }
}

/** Code-point order, independent of locale */
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
