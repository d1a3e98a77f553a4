import { readdirSync, statSync, lstatSync, readFileSync, existsSync } from 'fs';

export type EntryKind = 'directory' | 'linked-directory' | 'file';

/**
 * Directory, symlinked directory or file. Anything that cannot be stat'ed
 * (a dangling symlink, a permission problem) is reported as a file so that
 * reading it later records the failure on that node.
 */
export function entryKind(fullPath: string): EntryKind {
  try {
    if (lstatSync(fullPath).isSymbolicLink()) {
      return statSync(fullPath).isDirectory() ? 'linked-directory' : 'file';
    }
    return statSync(fullPath).isDirectory() ? 'directory' : 'file';
  } catch {
    return 'file';
  }
}

export function fileSize(fullPath: string): number {
  return statSync(fullPath).size;
}

export function readSourceBytes(fullPath: string): Buffer {
  return readFileSync(fullPath);
}

export function fileExists(filePath: string): boolean {
  try {
    return existsSync(filePath) && statSync(filePath).isFile();
  } catch {
    return false;
  }
}
