import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';

export interface DirectoryResult {
  path: string;
  created: boolean;
}

/**
 * Create each directory under root if missing. Existing directories are left alone.
 */
export function ensureDirectories(root: string, directories: string[]): DirectoryResult[] {
  return directories.map((dir) => {
    const fullPath = join(root, dir);
    if (existsSync(fullPath)) {
      return { path: dir, created: false };
    }
    mkdirSync(fullPath, { recursive: true });
    return { path: dir, created: true };
  });
}
