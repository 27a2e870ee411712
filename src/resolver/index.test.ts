import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, mkdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { effectiveSourceTree, resolveNode, resolvePath, MAX_PARENT_DEPTH } from './index.ts';
import type { GroupNode } from '../pbxproj/index.ts';
import { fileRef, group, makeGraph, syncGroup, MAIN_GROUP_ID } from '../../test/helpers/graph.ts';

describe('effectiveSourceTree', () => {
  it('defaults groups and synchronized groups to SOURCE_ROOT', () => {
    assert.strictEqual(effectiveSourceTree(group('G', [], { path: 'App' })), 'SOURCE_ROOT');
    assert.strictEqual(effectiveSourceTree(syncGroup('S', { path: 'App' })), 'SOURCE_ROOT');
  });

  it('leaves file references without an anchor', () => {
    assert.strictEqual(effectiveSourceTree(fileRef('F', { path: 'a.swift' })), undefined);
  });

  it('keeps a declared anchor', () => {
    assert.strictEqual(effectiveSourceTree(syncGroup('S', { sourceTree: '<group>' })), '<group>');
  });
});

describe('resolvePath', () => {
  let projectRoot: string;

  beforeEach(async () => {
    projectRoot = await mkdtemp(join(tmpdir(), 'pbxnav-resolver-test-'));
  });

  afterEach(async () => {
    await rm(projectRoot, { recursive: true, force: true });
  });

  it('joins SOURCE_ROOT paths onto the project root, normalized', () => {
    const node = fileRef('F', { path: 'Sources/../App/main.swift', sourceTree: 'SOURCE_ROOT' });
    const graph = makeGraph([node]);

    assert.strictEqual(resolvePath(graph, node, projectRoot), join(projectRoot, 'App/main.swift'));
  });

  it('treats a group without an anchor as SOURCE_ROOT', () => {
    const node = syncGroup('S', { path: 'App' });
    const graph = makeGraph([group(MAIN_GROUP_ID, ['S']), node]);

    assert.strictEqual(resolvePath(graph, node, projectRoot), join(projectRoot, 'App'));
  });

  it('ignores the project root for absolute paths', () => {
    const node = group('G', [], { path: '/opt/shared/../shared/Lib', sourceTree: '<absolute>' });
    const graph = makeGraph([node]);

    assert.strictEqual(resolvePath(graph, node, projectRoot), '/opt/shared/Lib');
  });

  it('resolves parent-relative paths against a parent directory that exists', async () => {
    await mkdir(join(projectRoot, 'Features'));
    const login = syncGroup('S', { path: 'Login', sourceTree: '<group>' });
    const graph = makeGraph([
      group(MAIN_GROUP_ID, ['G'], { sourceTree: '<group>' }),
      group('G', ['S'], { path: 'Features', sourceTree: '<group>' }),
      login,
    ]);

    assert.strictEqual(resolvePath(graph, login, projectRoot), join(projectRoot, 'Features', 'Login'));
  });

  it('follows several levels of parent-relative groups', async () => {
    await mkdir(join(projectRoot, 'Modules', 'Core'), { recursive: true });
    const file = fileRef('F', { path: 'Core.swift', sourceTree: '<group>' });
    const graph = makeGraph([
      group(MAIN_GROUP_ID, ['G1'], { sourceTree: '<group>' }),
      group('G1', ['G2'], { path: 'Modules', sourceTree: '<group>' }),
      group('G2', ['F'], { path: 'Core', sourceTree: '<group>' }),
      file,
    ]);

    assert.strictEqual(
      resolvePath(graph, file, projectRoot),
      join(projectRoot, 'Modules', 'Core', 'Core.swift')
    );
  });

  it('falls back to the project root when the parent is not a directory', () => {
    const login = syncGroup('S', { path: 'Login', sourceTree: '<group>' });
    const graph = makeGraph([
      group(MAIN_GROUP_ID, ['G'], { sourceTree: '<group>' }),
      group('G', ['S'], { path: 'Features', sourceTree: '<group>' }),
      login,
    ]);

    assert.strictEqual(resolvePath(graph, login, projectRoot), join(projectRoot, 'Login'));
  });

  it('falls back to the project root when there is no parent', () => {
    const orphan = fileRef('F', { path: 'Orphan.swift', sourceTree: '<group>' });
    const graph = makeGraph([orphan]);

    assert.strictEqual(resolvePath(graph, orphan, projectRoot), join(projectRoot, 'Orphan.swift'));
  });

  it('falls back to the project root when the parent id is dangling', () => {
    const orphan = fileRef('F', { path: 'Orphan.swift', sourceTree: '<group>', parent: 'GONE' });
    const graph = makeGraph([orphan]);

    assert.strictEqual(resolvePath(graph, orphan, projectRoot), join(projectRoot, 'Orphan.swift'));
  });

  it('is unresolved without a path', () => {
    const node = group('G', [], { name: 'Virtual', sourceTree: '<group>' });
    const graph = makeGraph([node]);

    assert.strictEqual(resolvePath(graph, node, projectRoot), undefined);
    assert.deepStrictEqual(resolveNode(graph, node, projectRoot), { status: 'unresolved' });
  });

  it('is unresolved for other anchors', () => {
    const product = fileRef('P', { path: 'App.app', sourceTree: 'BUILT_PRODUCTS_DIR' });
    const unanchored = fileRef('F', { path: 'a.swift' });
    const graph = makeGraph([product, unanchored]);

    assert.strictEqual(resolvePath(graph, product, projectRoot), undefined);
    assert.strictEqual(resolvePath(graph, unanchored, projectRoot), undefined);
  });

  it('reports a parent cycle instead of looping', () => {
    const a = group('A', [], { path: 'a', sourceTree: '<group>', parent: 'B' });
    const b = group('B', [], { path: 'b', sourceTree: '<group>', parent: 'A' });
    const graph = makeGraph([a, b]);

    assert.deepStrictEqual(resolveNode(graph, a, projectRoot), { status: 'cycle' });
    assert.strictEqual(resolvePath(graph, a, projectRoot), undefined);
  });

  it('reports a node that is its own parent as a cycle', () => {
    const self = group('A', [], { path: 'a', sourceTree: '<group>', parent: 'A' });
    const graph = makeGraph([self]);

    assert.deepStrictEqual(resolveNode(graph, self, projectRoot), { status: 'cycle' });
  });

  it('gives up on parent chains longer than the depth bound', () => {
    const chain: GroupNode[] = [group('G0', [], { path: 'g0', sourceTree: 'SOURCE_ROOT' })];
    for (let i = 1; i <= MAX_PARENT_DEPTH + 5; i++) {
      chain.push(group(`G${i}`, [], { path: `g${i}`, sourceTree: '<group>', parent: `G${i - 1}` }));
    }
    const graph = makeGraph(chain);
    const deepest = chain[chain.length - 1];
    assert.ok(deepest);

    assert.deepStrictEqual(resolveNode(graph, deepest, projectRoot), { status: 'cycle' });
  });

  it('is a pure function of graph and filesystem state', () => {
    const node = syncGroup('S', { path: 'App' });
    const graph = makeGraph([node]);

    assert.strictEqual(resolvePath(graph, node, projectRoot), resolvePath(graph, node, projectRoot));
  });
});
