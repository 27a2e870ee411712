/**
 * Filesystem scanning for synchronized groups.
 *
 * Synchronized groups list no children in the project description, so their
 * contents come from the directory they point at. Only entries Xcode would
 * show are emitted: recognized source and resource files, plain directories
 * (recursed into), and bundle directories (shown as a single item).
 */

import { opendirSync, realpathSync, type Dirent } from 'node:fs';
import { extname, join } from 'node:path';
import { ICONS, fileIcon } from '../display/index.ts';
import type { TreeWriter } from '../tree/index.ts';
import { isDirectorySync } from '../utils/fs.ts';

export const RECOGNIZED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.swift', '.m', '.mm', '.c', '.cpp', '.h', '.hpp',
  '.storyboard', '.xib', '.plist', '.json',
  '.xcassets', '.dataset', '.mlmodel', '.playground',
  '.intentdefinition', '.strings', '.stringsdict', '.xcstrings',
  '.entitlements', '.md', '.txt', '.rtf',
  '.png', '.jpg', '.jpeg', '.gif', '.heic', '.svg', '.pdf',
  '.ttf', '.otf',
  '.wav', '.mp3', '.aac', '.m4a',
]);

/** Directories shown as one opaque item instead of being entered */
export const BUNDLE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.xcassets',
  '.playground',
  '.xcdatamodeld',
  '.mlpackage',
]);

/** Build artifacts and caches, skipped along with dotfiles */
export const IGNORED_NAMES: ReadonlySet<string> = new Set(['__pycache__', 'build', 'DerivedData']);

export type ScanEntryKind = 'directory' | 'bundle' | 'file';

export interface ScanEntry {
  name: string;
  path: string;
  kind: ScanEntryKind;
  icon: string;
  depth: number;
}

export interface ScanResult {
  /** Every emitted entry in emission order, nested ones included */
  entries: ScanEntry[];
  /** Whether this level emitted at least one directory, bundle or recognized file */
  found: boolean;
}

/** The part of an open directory the scanner reads through */
export interface DirectoryHandle {
  readSync(): Dirent | null;
  closeSync(): void;
}

export interface ScanOptions {
  /** Opens a directory for listing (defaults to opendirSync) */
  openDir?: (path: string) => DirectoryHandle;
}

interface ListedEntry {
  name: string;
  path: string;
  isDirectory: boolean;
}

function byName(a: ListedEntry, b: ListedEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function isIgnored(name: string): boolean {
  return name.startsWith('.') || IGNORED_NAMES.has(name);
}

function listDirectory(directory: string, openDir: (path: string) => DirectoryHandle): ListedEntry[] {
  const handle = openDir(directory);
  try {
    const entries: ListedEntry[] = [];
    for (let dirent = handle.readSync(); dirent !== null; dirent = handle.readSync()) {
      if (isIgnored(dirent.name)) continue;

      const path = join(directory, dirent.name);
      const isDirectory = dirent.isDirectory() || (dirent.isSymbolicLink() && isDirectorySync(path));
      entries.push({ name: dirent.name, path, isDirectory });
    }
    return entries.sort(byName);
  } finally {
    handle.closeSync();
  }
}

// Matching is case-sensitive: "IMG.JPG" is not a recognized file. Icons still
// ignore case.
export function isRecognizedFile(name: string): boolean {
  return RECOGNIZED_EXTENSIONS.has(extname(name));
}

export function isBundle(name: string): boolean {
  return BUNDLE_EXTENSIONS.has(extname(name));
}

function nothingFound(): ScanResult {
  return { entries: [], found: false };
}

function reportFailure(writer: TreeWriter, directory: string, error: unknown): ScanResult {
  const message = error instanceof Error ? error.message : String(error);
  writer.warn('SCAN_ERROR', `Cannot list ${directory}: ${message}`);
  return nothingFound();
}

/**
 * @param descent - Real paths of the directories being scanned above this one
 */
function scanLevel(
  directory: string,
  depth: number,
  writer: TreeWriter,
  openDir: (path: string) => DirectoryHandle,
  descent: Set<string>
): ScanResult {
  let realPath: string;
  try {
    realPath = realpathSync(directory);
  } catch (error) {
    return reportFailure(writer, directory, error);
  }
  if (descent.has(realPath)) {
    writer.warn('CYCLE', `${directory} leads back to ${realPath}; not entered`);
    return nothingFound();
  }

  let listed: ListedEntry[];
  try {
    listed = listDirectory(directory, openDir);
  } catch (error) {
    return reportFailure(writer, directory, error);
  }

  const entries: ScanEntry[] = [];
  let found = false;

  const emit = (entry: ListedEntry, kind: ScanEntryKind, icon: string): void => {
    writer.write(depth, icon, entry.name);
    entries.push({ name: entry.name, path: entry.path, kind, icon, depth });
    found = true;
  };

  descent.add(realPath);
  try {
    for (const entry of listed) {
      if (entry.isDirectory) {
        if (isBundle(entry.name)) {
          emit(entry, 'bundle', fileIcon(entry.name));
          continue;
        }
        // A sub-directory counts as found even if nothing inside it is recognized
        emit(entry, 'directory', ICONS.directory);
        entries.push(...scanLevel(entry.path, depth + 1, writer, openDir, descent).entries);
      } else if (isRecognizedFile(entry.name)) {
        emit(entry, 'file', fileIcon(entry.name));
      }
    }
  } finally {
    descent.delete(realPath);
  }

  return { entries, found };
}

/**
 * Emit the recognized contents of a directory, depth first.
 * Symbolic links are followed, except into a directory already being scanned.
 * @param directory - Directory to scan; undefined or a non-directory finds nothing
 * @param depth - Tree depth of the emitted entries
 * @param writer - Receives one line per entry, and a warning if a listing fails
 */
export function scanDirectory(
  directory: string | undefined,
  depth: number,
  writer: TreeWriter,
  options: ScanOptions = {}
): ScanResult {
  if (!directory || !isDirectorySync(directory)) {
    return nothingFound();
  }
  return scanLevel(directory, depth, writer, options.openDir ?? opendirSync, new Set());
}
