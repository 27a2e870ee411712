import { statSync } from 'node:fs';

/**
 * Synchronous directory check that follows symbolic links.
 * Missing paths, dangling links and unreadable parents all report false.
 */
export function isDirectorySync(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
