import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, DEFAULT_CONFIG } from './index.ts';
import { NavError } from '../errors/index.ts';

describe('config', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'pbxnav-config-test-'));
  });

  afterEach(async () => {
    if (testDir) {
      await rm(testDir, { recursive: true, force: true });
    }
  });

  it('returns default config when no file exists', async () => {
    const config = await loadConfig(testDir);

    assert.deepStrictEqual(config, DEFAULT_CONFIG);
    assert.strictEqual(config.output.header, true);
    assert.strictEqual(config.output.indentWidth, 2);
  });

  it('reads and parses pbxnav.config.json when it exists', async () => {
    await writeFile(
      join(testDir, 'pbxnav.config.json'),
      JSON.stringify({
        project: 'ios/Sample.xcodeproj',
        root: 'ios',
        output: { header: false, indentWidth: 4 },
      })
    );

    const config = await loadConfig(testDir);

    assert.deepStrictEqual(config, {
      project: 'ios/Sample.xcodeproj',
      root: 'ios',
      output: { header: false, indentWidth: 4 },
    });
  });

  it('merges partial config with defaults', async () => {
    await writeFile(join(testDir, 'pbxnav.config.json'), JSON.stringify({ output: { indentWidth: 3 } }));

    const config = await loadConfig(testDir);

    assert.strictEqual(config.project, undefined);
    assert.strictEqual(config.output.header, true);
    assert.strictEqual(config.output.indentWidth, 3);
  });

  it('loads config from current directory when no rootDir provided', async () => {
    const cwd = process.cwd();
    try {
      process.chdir(testDir);
      await writeFile(join(testDir, 'pbxnav.config.json'), JSON.stringify({ root: 'src' }));

      const config = await loadConfig();

      assert.strictEqual(config.root, 'src');
    } finally {
      process.chdir(cwd);
    }
  });

  it('rejects invalid JSON with a CONFIG_ERROR', async () => {
    await writeFile(join(testDir, 'pbxnav.config.json'), 'invalid json{');

    await assert.rejects(
      async () => await loadConfig(testDir),
      (error: unknown) =>
        error instanceof NavError &&
        error.code === 'CONFIG_ERROR' &&
        error.severity === 'fatal' &&
        error.message.startsWith('Failed to parse pbxnav.config.json')
    );
  });

  it('rejects a JSON value that is not an object', async () => {
    await writeFile(join(testDir, 'pbxnav.config.json'), '[1, 2]');

    await assert.rejects(async () => await loadConfig(testDir), /must contain a JSON object/);
  });

  it('validates indentWidth range', async () => {
    await writeFile(join(testDir, 'pbxnav.config.json'), JSON.stringify({ output: { indentWidth: 0 } }));

    await assert.rejects(
      async () => await loadConfig(testDir),
      /Invalid "output.indentWidth": 0\. Must be an integer from 1 to 8/
    );
  });

  it('validates header type', async () => {
    await writeFile(join(testDir, 'pbxnav.config.json'), JSON.stringify({ output: { header: 'yes' } }));

    await assert.rejects(async () => await loadConfig(testDir), /Invalid "output.header"/);
  });

  it('rejects an empty project path', async () => {
    await writeFile(join(testDir, 'pbxnav.config.json'), JSON.stringify({ project: '' }));

    await assert.rejects(async () => await loadConfig(testDir), /Invalid "project"/);
  });
});
