/**
 * Tree walker for the project navigator.
 *
 * Visits the graph depth first from the main group, emitting one line per
 * node. Explicit children keep their declared order; synchronized groups are
 * filled from a filesystem scan, or from the product of a same-named target
 * when the scan finds nothing.
 */

import { resolve } from 'node:path';
import { ICONS, displayName, fileIcon } from '../display/index.ts';
import type { NavError } from '../errors/index.ts';
import {
  ISA,
  type GroupNode,
  type PbxNode,
  type ProjectGraph,
  type SynchronizedGroupNode,
  type TargetNode,
  type VariantGroupNode,
} from '../pbxproj/index.ts';
import { SOURCE_TREE, effectiveSourceTree, resolveNode } from '../resolver/index.ts';
import { scanDirectory, type ScanOptions } from '../scanner/index.ts';
import { TargetIndex } from '../targets/index.ts';
import { DEFAULT_INDENT_WIDTH, TreeWriter, formatTree, type TreeLine } from '../tree/index.ts';

export interface WalkResult {
  lines: TreeLine[];
  warnings: NavError[];
  /** Number of native targets available for product fallback */
  indexedTargets: number;
}

function assertNever(node: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(node)}`);
}

class TreeWalker {
  /** Groups on the current descent path */
  private readonly ancestors = new Set<string>();

  constructor(
    private readonly graph: ProjectGraph,
    private readonly projectRoot: string,
    private readonly targets: TargetIndex,
    private readonly writer: TreeWriter,
    private readonly scanOptions: ScanOptions
  ) {}

  visit(node: PbxNode, depth: number): void {
    const name = displayName(node);

    switch (node.kind) {
      case 'group': {
        const isFolderReference = Boolean(node.path) && effectiveSourceTree(node) !== SOURCE_TREE.group;
        this.writer.write(depth, isFolderReference ? ICONS.folderReference : ICONS.virtualGroup, name);
        this.visitChildren(node, name, depth + 1);
        return;
      }
      case 'synchronizedGroup':
        this.visitSynchronizedGroup(node, name, depth);
        return;
      case 'variantGroup':
        this.writer.write(depth, ICONS.localizedGroup, `${name} (Localized Group)`);
        this.visitChildren(node, name, depth + 1);
        return;
      case 'fileReference':
        this.writer.write(depth, fileIcon(name), name);
        return;
      case 'target':
        this.writer.write(depth, ICONS.target, `${name} (Target - direct tree entry)`);
        this.visitTargetSources(node, depth + 1);
        return;
      case 'project':
      case 'buildPhase':
      case 'buildFile':
      case 'other':
        this.writer.write(depth, ICONS.unknown, `${name} (Type: ${node.isa})`);
        return;
      default:
        assertNever(node);
    }
  }

  private visitChildren(node: GroupNode | VariantGroupNode, name: string, depth: number): void {
    this.ancestors.add(node.id);
    try {
      for (const childId of node.children) {
        if (this.ancestors.has(childId)) {
          this.writer.warn('CYCLE', `Group "${name}" (${node.id}) contains its ancestor ${childId}; skipped`);
          continue;
        }
        const child = this.graph.getObject(childId);
        if (!child) {
          this.writer.warn('MISSING_OBJECT', `Group "${name}" (${node.id}) lists missing object ${childId}`);
          continue;
        }
        this.visit(child, depth);
      }
    } finally {
      this.ancestors.delete(node.id);
    }
  }

  private visitSynchronizedGroup(node: SynchronizedGroupNode, name: string, depth: number): void {
    this.writer.write(depth, ICONS.synchronizedGroup, name);

    const resolution = resolveNode(this.graph, node, this.projectRoot);
    if (resolution.status === 'cycle') {
      this.writer.warn('CYCLE', `Parent chain of "${name}" (${node.id}) loops; its path is unresolved`);
    }

    const directory = resolution.status === 'resolved' ? resolution.path : undefined;
    if (scanDirectory(directory, depth + 1, this.writer, this.scanOptions).found) {
      return;
    }

    // Nothing on disk: show what the matching target builds instead
    const target = this.targets.find(name);
    if (target) {
      this.writeProduct(target, depth + 1);
    }
  }

  private visitTargetSources(target: TargetNode, depth: number): void {
    let listed = false;

    for (const phaseId of target.buildPhases) {
      const phase = this.graph.getObject(phaseId);
      if (phase?.kind !== 'buildPhase' || phase.isa !== ISA.sourcesBuildPhase) continue;

      for (const buildFileId of phase.files) {
        const buildFile = this.graph.getObject(buildFileId);
        if (buildFile?.kind !== 'buildFile' || !buildFile.fileRef) continue;
        const file = this.graph.getObject(buildFile.fileRef);
        if (!file) continue;

        const fileName = displayName(file);
        this.writer.write(depth, fileIcon(fileName), `${fileName} (from build phase)`);
        listed = true;
      }
      // Only the first sources phase is listed
      break;
    }

    if (!listed) {
      this.writeProduct(target, depth);
    }
  }

  private writeProduct(target: TargetNode, depth: number): void {
    const product = target.productReference ? this.graph.getObject(target.productReference) : undefined;
    if (product) {
      this.writer.write(depth, ICONS.product, `Product: ${displayName(product)}`);
    }
  }
}

/**
 * Walk the navigator from the project's main group.
 * @param projectRoot - Directory that SOURCE_ROOT paths are relative to
 * @param scanOptions - Passed to every synchronized-group scan
 * @throws NavError (INVALID_PROJECT) if the root object or main group is unusable
 */
export function walkProject(
  graph: ProjectGraph,
  projectRoot: string,
  scanOptions: ScanOptions = {}
): WalkResult {
  const mainGroup = graph.mainGroup();
  const targets = TargetIndex.build(graph);
  const writer = new TreeWriter();

  new TreeWalker(graph, resolve(projectRoot), targets, writer, scanOptions).visit(mainGroup, 0);

  return { lines: writer.lines, warnings: writer.warnings, indexedTargets: targets.size };
}

export interface RenderOptions {
  projectRoot: string;
  /** Shown in the header, usually the .xcodeproj bundle name */
  projectName: string;
  header?: boolean;
  indentWidth?: number;
}

export interface RenderResult {
  lines: string[];
  warnings: NavError[];
  indexedTargets: number;
}

export const HEADER_RULE = '-'.repeat(52);

/**
 * Walk the project and format the tree as text lines, framed by a header.
 */
export function renderProjectTree(graph: ProjectGraph, options: RenderOptions): RenderResult {
  const { lines, warnings, indexedTargets } = walkProject(graph, options.projectRoot);
  const tree = formatTree(lines, options.indentWidth ?? DEFAULT_INDENT_WIDTH);

  if (options.header === false) {
    return { lines: tree, warnings, indexedTargets };
  }

  return {
    lines: [
      `Xcode Project Structure for: ${options.projectName}`,
      HEADER_RULE,
      ...tree,
      HEADER_RULE,
    ],
    warnings,
    indexedTargets,
  };
}
