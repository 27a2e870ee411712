/**
 * Path resolution for navigator nodes.
 *
 * A node's on-disk location is its declared `path` interpreted against its
 * source tree:
 * - SOURCE_ROOT: the project root
 * - <group>: the resolved directory of the parent group
 * - <absolute>: nothing, the path is already absolute
 * Groups that omit sourceTree are treated as SOURCE_ROOT.
 */

import { resolve } from 'node:path';
import type { PbxNode, ProjectGraph } from '../pbxproj/index.ts';
import { isDirectorySync } from '../utils/fs.ts';

export const SOURCE_TREE = {
  sourceRoot: 'SOURCE_ROOT',
  group: '<group>',
  absolute: '<absolute>',
} as const;

/** Longest parent chain followed before it is treated as a cycle */
export const MAX_PARENT_DEPTH = 64;

export type Resolution =
  | { status: 'resolved'; path: string }
  | { status: 'unresolved' }
  | { status: 'cycle' };

const UNRESOLVED: Resolution = { status: 'unresolved' };
const CYCLE: Resolution = { status: 'cycle' };

/**
 * The anchor a node's path is interpreted against, after defaulting.
 */
export function effectiveSourceTree(node: PbxNode): string | undefined {
  if (!node.sourceTree && (node.kind === 'group' || node.kind === 'synchronizedGroup')) {
    return SOURCE_TREE.sourceRoot;
  }
  return node.sourceTree;
}

function resolveWithin(
  graph: ProjectGraph,
  node: PbxNode,
  projectRoot: string,
  visiting: Set<string>
): Resolution {
  if (visiting.has(node.id) || visiting.size >= MAX_PARENT_DEPTH) {
    return CYCLE;
  }
  if (!node.path) {
    return UNRESOLVED;
  }

  switch (effectiveSourceTree(node)) {
    case SOURCE_TREE.sourceRoot:
      return { status: 'resolved', path: resolve(projectRoot, node.path) };

    case SOURCE_TREE.absolute:
      return { status: 'resolved', path: resolve(node.path) };

    case SOURCE_TREE.group: {
      const parentId = graph.parentOf(node.id);
      const parent = parentId ? graph.getObject(parentId) : undefined;

      if (parent) {
        visiting.add(node.id);
        const parentResolution = resolveWithin(graph, parent, projectRoot, visiting);
        if (parentResolution.status === 'cycle') {
          return parentResolution;
        }
        if (parentResolution.status === 'resolved' && isDirectorySync(parentResolution.path)) {
          return { status: 'resolved', path: resolve(parentResolution.path, node.path) };
        }
      }

      // Broken or unanchored parent chain: best effort relative to the project root
      return { status: 'resolved', path: resolve(projectRoot, node.path) };
    }

    default:
      return UNRESOLVED;
  }
}

/**
 * Resolve a node to an absolute path, reporting why resolution failed.
 * @param projectRoot - Directory that SOURCE_ROOT paths are relative to
 */
export function resolveNode(graph: ProjectGraph, node: PbxNode, projectRoot: string): Resolution {
  return resolveWithin(graph, node, projectRoot, new Set());
}

/**
 * Resolve a node to an absolute path, or undefined when it has none.
 */
export function resolvePath(
  graph: ProjectGraph,
  node: PbxNode,
  projectRoot: string
): string | undefined {
  const resolution = resolveNode(graph, node, projectRoot);
  return resolution.status === 'resolved' ? resolution.path : undefined;
}
