import { glob } from 'glob';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface CollectedFiles {
  files: string[];
  /** Paths given on the command line that do not exist */
  missing: string[];
}

function extensionPattern(extensions: string[]): string {
  return extensions.length === 1 ? `**/*.${extensions[0]}` : `**/*.{${extensions.join(',')}}`;
}

/**
 * Expand files and directories into a sorted list of files to process.
 * Directories are searched recursively for the given extensions.
 */
export async function collectFiles(paths: string[], extensions: string[]): Promise<CollectedFiles> {
  const files = new Set<string>();
  const missing: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(p);

    let stats: fs.Stats;
    try {
      stats = fs.statSync(resolved);
    } catch {
      missing.push(p);
      continue;
    }

    if (stats.isFile()) {
      files.add(resolved);
    } else if (stats.isDirectory()) {
      const found = await glob(extensionPattern(extensions), {
        cwd: resolved,
        absolute: true,
        nodir: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      for (const file of found) {
        files.add(file);
      }
    }
  }

  return { files: [...files].sort(), missing };
}
