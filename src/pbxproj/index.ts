import { readFile, readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { NavError, getSuggestion } from '../errors/index.ts';
import { parsePlist, isPlistDict, PlistParseError, type PlistDict, type PlistValue } from './parse.ts';

// ============================================================================
// Node Types
// ============================================================================

/** Attributes shared by every object in the project graph */
interface BaseNode {
  id: string;
  /** Raw pbxproj type tag, e.g. "PBXGroup" */
  isa: string;
  name?: string;
  path?: string;
  sourceTree?: string;
  /** Explicit parent; when absent the graph derives one from children lists */
  parent?: string;
}

/** Navigator group with explicitly listed children (PBXGroup) */
export interface GroupNode extends BaseNode {
  kind: 'group';
  children: string[];
}

/** Group whose contents live only on disk (PBXFileSystemSynchronizedRootGroup) */
export interface SynchronizedGroupNode extends BaseNode {
  kind: 'synchronizedGroup';
}

/** Localization container whose children are per-locale file references */
export interface VariantGroupNode extends BaseNode {
  kind: 'variantGroup';
  children: string[];
}

export interface FileReferenceNode extends BaseNode {
  kind: 'fileReference';
}

export interface TargetNode extends BaseNode {
  kind: 'target';
  buildPhases: string[];
  productReference?: string;
  productType?: string;
}

export interface BuildPhaseNode extends BaseNode {
  kind: 'buildPhase';
  files: string[];
}

export interface BuildFileNode extends BaseNode {
  kind: 'buildFile';
  fileRef?: string;
}

export interface ProjectNode extends BaseNode {
  kind: 'project';
  mainGroup?: string;
  targets: string[];
}

export interface OtherNode extends BaseNode {
  kind: 'other';
}

/** Union of all node kinds */
export type PbxNode =
  | GroupNode
  | SynchronizedGroupNode
  | VariantGroupNode
  | FileReferenceNode
  | TargetNode
  | BuildPhaseNode
  | BuildFileNode
  | ProjectNode
  | OtherNode;

export type NodeKind = PbxNode['kind'];

export const ISA = {
  project: 'PBXProject',
  group: 'PBXGroup',
  synchronizedGroup: 'PBXFileSystemSynchronizedRootGroup',
  variantGroup: 'PBXVariantGroup',
  fileReference: 'PBXFileReference',
  nativeTarget: 'PBXNativeTarget',
  sourcesBuildPhase: 'PBXSourcesBuildPhase',
  buildFile: 'PBXBuildFile',
} as const;

const TARGET_ISAS = new Set<string>([ISA.nativeTarget, 'PBXAggregateTarget', 'PBXLegacyTarget']);

// ============================================================================
// Graph
// ============================================================================

/**
 * Read-only object graph of a project description, addressed by identifier.
 */
export class ProjectGraph {
  private readonly nodes = new Map<string, PbxNode>();
  private readonly parents = new Map<string, string>();

  constructor(
    readonly rootObject: string,
    nodes: Iterable<PbxNode>
  ) {
    for (const node of nodes) {
      this.nodes.set(node.id, node);
    }

    // Derived parents never override an explicit one
    for (const node of this.nodes.values()) {
      if (node.kind !== 'group' && node.kind !== 'variantGroup') continue;
      for (const childId of node.children) {
        if (!this.parents.has(childId)) {
          this.parents.set(childId, node.id);
        }
      }
    }
    for (const node of this.nodes.values()) {
      if (node.parent) {
        this.parents.set(node.id, node.parent);
      }
    }
  }

  get size(): number {
    return this.nodes.size;
  }

  getObject(id: string): PbxNode | undefined {
    return this.nodes.get(id);
  }

  parentOf(id: string): string | undefined {
    return this.parents.get(id);
  }

  /**
   * The PBXProject root object.
   * @throws NavError (INVALID_PROJECT) if the root is missing or of the wrong type
   */
  project(): ProjectNode {
    if (!this.rootObject) {
      throw invalidProject("Project's rootObject ID missing");
    }
    const root = this.nodes.get(this.rootObject);
    if (!root) {
      throw invalidProject(`Could not retrieve root object ${this.rootObject}`);
    }
    if (root.kind !== 'project') {
      throw invalidProject(`Root object is not ${ISA.project}. ISA: '${root.isa}'`);
    }
    return root;
  }

  /**
   * The group at the root of the navigator.
   * @throws NavError (INVALID_PROJECT) if the main group is missing
   */
  mainGroup(): PbxNode {
    const project = this.project();
    if (!project.mainGroup) {
      throw invalidProject('mainGroup ID missing');
    }
    const group = this.nodes.get(project.mainGroup);
    if (!group) {
      throw invalidProject(`Could not retrieve main group ${project.mainGroup}`);
    }
    return group;
  }

  /**
   * Declared targets in declaration order; dangling identifiers are skipped.
   */
  targets(): TargetNode[] {
    const targets: TargetNode[] = [];
    for (const id of this.project().targets) {
      const node = this.nodes.get(id);
      if (node?.kind === 'target') {
        targets.push(node);
      }
    }
    return targets;
  }
}

function invalidProject(message: string): NavError {
  return new NavError('INVALID_PROJECT', message, 'fatal', getSuggestion('INVALID_PROJECT'));
}

// ============================================================================
// Building from a property list
// ============================================================================

function stringAttr(dict: PlistDict, key: string): string | undefined {
  const value = dict[key];
  return typeof value === 'string' ? value : undefined;
}

function idList(dict: PlistDict, key: string): string[] {
  const value = dict[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Convert one raw pbxproj object into a typed node.
 */
export function nodeFromObject(id: string, object: PlistDict): PbxNode {
  const isa = stringAttr(object, 'isa') ?? 'Unknown';
  const base: BaseNode = {
    id,
    isa,
    name: stringAttr(object, 'name'),
    path: stringAttr(object, 'path'),
    sourceTree: stringAttr(object, 'sourceTree'),
  };

  if (isa === ISA.group) {
    return { ...base, kind: 'group', children: idList(object, 'children') };
  }
  if (isa === ISA.synchronizedGroup) {
    return { ...base, kind: 'synchronizedGroup' };
  }
  if (isa === ISA.variantGroup) {
    return { ...base, kind: 'variantGroup', children: idList(object, 'children') };
  }
  if (isa === ISA.fileReference) {
    return { ...base, kind: 'fileReference' };
  }
  if (TARGET_ISAS.has(isa)) {
    return {
      ...base,
      kind: 'target',
      buildPhases: idList(object, 'buildPhases'),
      productReference: stringAttr(object, 'productReference'),
      productType: stringAttr(object, 'productType'),
    };
  }
  if (isa.startsWith('PBX') && isa.endsWith('BuildPhase')) {
    return { ...base, kind: 'buildPhase', files: idList(object, 'files') };
  }
  if (isa === ISA.buildFile) {
    return { ...base, kind: 'buildFile', fileRef: stringAttr(object, 'fileRef') };
  }
  if (isa === ISA.project) {
    return {
      ...base,
      kind: 'project',
      mainGroup: stringAttr(object, 'mainGroup'),
      targets: idList(object, 'targets'),
    };
  }
  return { ...base, kind: 'other' };
}

/**
 * Build a graph from a parsed project.pbxproj document.
 * @throws NavError (INVALID_PROJECT) if objects or rootObject are missing
 */
export function graphFromPlist(document: PlistValue): ProjectGraph {
  if (!isPlistDict(document)) {
    throw invalidProject('project.pbxproj does not contain a dictionary');
  }
  const objects = document['objects'];
  if (!isPlistDict(objects)) {
    throw invalidProject("Project lacks 'objects'");
  }
  const rootObject = stringAttr(document, 'rootObject');
  if (!rootObject) {
    throw invalidProject("Project lacks 'rootObject'");
  }

  const nodes: PbxNode[] = [];
  for (const [id, object] of Object.entries(objects)) {
    if (isPlistDict(object)) {
      nodes.push(nodeFromObject(id, object));
    }
  }
  return new ProjectGraph(rootObject, nodes);
}

// ============================================================================
// Loading from disk
// ============================================================================

export const PBXPROJ_FILE = 'project.pbxproj';
export const BUNDLE_EXTENSION = '.xcodeproj';

/**
 * Load and parse <bundle>/project.pbxproj.
 * @param bundlePath - Path to the .xcodeproj bundle
 * @throws NavError (PROJECT_NOT_FOUND, PARSE_ERROR or INVALID_PROJECT), always fatal
 */
export async function loadProject(bundlePath: string): Promise<ProjectGraph> {
  const pbxprojPath = join(bundlePath, PBXPROJ_FILE);

  let content: string;
  try {
    content = await readFile(pbxprojPath, 'utf-8');
  } catch (error) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      throw new NavError(
        'PROJECT_NOT_FOUND',
        `${PBXPROJ_FILE} not found at ${pbxprojPath}`,
        'fatal',
        getSuggestion('PROJECT_NOT_FOUND')
      );
    }
    throw error;
  }

  let document: PlistValue;
  try {
    document = parsePlist(content);
  } catch (error) {
    if (error instanceof PlistParseError) {
      throw new NavError(
        'PARSE_ERROR',
        `Error loading project '${pbxprojPath}': ${error.message}`,
        'fatal',
        getSuggestion('PARSE_ERROR')
      );
    }
    throw error;
  }

  const graph = graphFromPlist(document);
  // Validate the entry points up front so a broken root fails before any output
  graph.mainGroup();
  return graph;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find the .xcodeproj bundle for a path.
 * A bundle path is used as is; a directory is searched for the first bundle in
 * lexicographic order.
 * @returns Absolute path to the bundle
 * @throws NavError (PROJECT_NOT_FOUND) if nothing matches
 */
export async function locateProject(path: string): Promise<string> {
  const absolutePath = resolve(path);

  if (absolutePath.endsWith(BUNDLE_EXTENSION)) {
    if (await isDirectory(absolutePath)) {
      return absolutePath;
    }
    throw new NavError(
      'PROJECT_NOT_FOUND',
      `Xcode project path not found: ${absolutePath}`,
      'fatal',
      getSuggestion('PROJECT_NOT_FOUND')
    );
  }

  if (!(await isDirectory(absolutePath))) {
    throw new NavError(
      'PROJECT_NOT_FOUND',
      `Path "${absolutePath}" does not exist or is not a directory`,
      'fatal',
      getSuggestion('PROJECT_NOT_FOUND')
    );
  }

  const entries = (await readdir(absolutePath)).sort();
  const bundle = entries.find((entry) => entry.endsWith(BUNDLE_EXTENSION));
  if (bundle) {
    return join(absolutePath, bundle);
  }

  throw new NavError(
    'PROJECT_NOT_FOUND',
    `Could not find an ${BUNDLE_EXTENSION} directory in ${absolutePath}`,
    'fatal',
    getSuggestion('PROJECT_NOT_FOUND')
  );
}
