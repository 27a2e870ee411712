import { basename, extname } from 'node:path';
import type { PbxNode } from '../pbxproj/index.ts';
import { effectiveSourceTree, SOURCE_TREE } from '../resolver/index.ts';

/**
 * Icons for navigator items that are not decided by file extension.
 */
export const ICONS = {
  virtualGroup: '🗂️',
  folderReference: '🟦',
  synchronizedGroup: '🔗',
  localizedGroup: '🌍',
  target: '🎯',
  product: '➡️',
  directory: '📁',
  file: '📄',
  unknown: '❔',
} as const;

/** Extension (lower case, with dot) → icon */
const EXTENSION_ICONS: Record<string, string> = {
  '.swift': '𝑺',
  '.h': '𝒉',
  '.hpp': '𝒉',
  '.m': '𝒎',
  '.mm': '𝒎',
  '.c': '𝒎',
  '.cpp': '𝒎',
  '.json': '｛｝',
  '.plist': '⚙️',
  '.intentdefinition': '💡',
  '.strings': '🌍',
  '.stringsdict': '🌍',
  '.xcstrings': '🌍',
  '.entitlements': '🔑',
  '.storyboard': '📱',
  '.xib': '📱',
  '.png': '🖼️',
  '.jpg': '🖼️',
  '.jpeg': '🖼️',
  '.gif': '🖼️',
  '.heic': '🖼️',
  '.svg': '🖼️',
  '.pdf': '📰',
  '.xcassets': '🎨',
  '.playground': '🎈',
  '.xcdatamodeld': '🗃️',
  '.mlpackage': '🧠',
};

/**
 * Lower-cased extension of a file name, including the dot.
 */
export function extensionOf(name: string): string {
  return extname(name).toLowerCase();
}

/**
 * Icon for a file or bundle, chosen by extension.
 */
export function fileIcon(name: string): string {
  return EXTENSION_ICONS[extensionOf(name)] ?? ICONS.file;
}

/**
 * Label shown for a node in the tree.
 *
 * An explicit name wins, except for groups anchored outside their parent whose
 * name only repeats the last path segment: the full path says more there.
 */
export function displayName(node: PbxNode): string {
  const { name, path } = node;

  if (name) {
    if (
      path &&
      (node.kind === 'group' || node.kind === 'synchronizedGroup') &&
      effectiveSourceTree(node) !== SOURCE_TREE.group &&
      name === basename(path)
    ) {
      return path;
    }
    return name;
  }

  if (path) {
    return basename(path);
  }

  return `Unnamed ${node.isa}`;
}
