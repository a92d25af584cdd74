import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { ErrorCodes, StrategicError } from '../../../src/types/index.js';
import { StatusDetector, summarizeStatus } from '../../../src/core/status/status-detector.js';
import { createTemplateInfo, saveTemplateInfo } from '../../../src/core/provenance/template-info.js';
import { installFramework, makeTempDir, removeTempDir, testTemplate, writeFrameworkTree } from '../../test-helpers.js';

let target: string;
const detector = new StatusDetector();

beforeEach(async () => {
  target = await makeTempDir();
});

afterEach(async () => {
  await removeTempDir(target);
});

describe('StatusDetector.checkInstallation', () => {
  it('reports a clean absence without issues', async () => {
    const state = await detector.checkInstallation(target);

    assert.equal(state.isInstalled, false);
    assert.equal(state.frameworkDir, false);
    assert.deepEqual(state.integrationDirs, { '.claude': false, '.codex': false });
    assert.deepEqual(state.symlinks, []);
    assert.deepEqual(state.issues, []);
    assert.equal(summarizeStatus(state), 'Strategic Claude Basic is not installed');
  });

  it('fails for a target that does not exist', async () => {
    await assert.rejects(detector.checkInstallation(join(target, 'missing')), (error: unknown) => {
      assert.ok(error instanceof StrategicError);
      assert.equal(error.code, ErrorCodes.DIRECTORY_NOT_FOUND);
      return true;
    });
  });

  it('reports a complete installation with every link valid', async () => {
    await installFramework(target);

    const state = await detector.checkInstallation(target);

    assert.equal(state.isInstalled, true);
    assert.deepEqual(state.issues, []);
    assert.equal(state.symlinks.length, 5);
    assert.equal(state.symlinks.every(link => link.valid), true);
    assert.equal(state.installedTemplate?.template.id, 'test');
    assert.equal(state.installedTemplate?.metadata.cli_version, '0.0.0-test');
    assert.equal(summarizeStatus(state), 'Strategic Claude Basic is installed and configured correctly');
  });

  it('flags a framework directory without integration directories', async () => {
    await writeFrameworkTree(target);
    await saveTemplateInfo(target, createTemplateInfo(testTemplate(), '0.0.0-test'));

    const state = await detector.checkInstallation(target);

    assert.equal(state.isInstalled, false);
    assert.deepEqual(state.issues, [
      '.claude directory does not exist',
      '.codex directory does not exist',
      'Partial installation detected: .strategic-claude-basic exists but no integration directory (.claude or .codex) is present'
    ]);
  });

  it('flags an integration directory left without the framework', async () => {
    await fs.mkdir(join(target, '.claude'));

    const state = await detector.checkInstallation(target);

    assert.equal(state.isInstalled, false);
    assert.deepEqual(state.issues, [
      '.strategic-claude-basic directory does not exist',
      'Missing .claude subdirectory: agents',
      'Missing .claude subdirectory: commands',
      'Missing .claude subdirectory: hooks',
      'Partial installation detected: .claude present but .strategic-claude-basic is missing',
      'Some symlinks are broken or invalid (0/3 valid)'
    ]);
  });

  it('reports broken links while still counting the install', async () => {
    await installFramework(target);
    await fs.rm(join(target, '.strategic-claude-basic', 'core', 'agents'), { recursive: true });

    const state = await detector.checkInstallation(target);

    assert.equal(state.isInstalled, true);
    assert.deepEqual(state.issues, [
      'Missing core subdirectory: core/agents',
      'Some symlinks are broken or invalid (4/5 valid)'
    ]);
    assert.equal(summarizeStatus(state), 'Strategic Claude Basic is installed but has 2 issue(s)');
  });

  it('treats missing provenance as unknown rather than an issue', async () => {
    await installFramework(target);
    await fs.rm(join(target, '.strategic-claude-basic', '.template-info'));

    const state = await detector.checkInstallation(target);

    assert.equal(state.isInstalled, true);
    assert.equal(state.installedTemplate, undefined);
    assert.deepEqual(state.issues, []);
  });

  it('reports unreadable provenance as an issue', async () => {
    await installFramework(target);
    await fs.writeFile(join(target, '.strategic-claude-basic', '.template-info'), '{"template": 1}');

    const state = await detector.checkInstallation(target);

    assert.equal(state.installedTemplate, undefined);
    assert.equal(state.issues.length, 1);
    assert.match(state.issues[0], /^Failed to load template information: /);
  });
});
