import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { InstallationType } from '../../../src/types/index.js';
import { USER_PRESERVED_DIRECTORIES } from '../../../src/constants/index.js';
import { createInstallConfig } from '../../../src/core/install/install-config.js';
import {
  InstallationPlanner,
  addPlanError,
  classifyInstallation,
  createEmptyPlan,
  installationTypeLabel
} from '../../../src/core/install/installation-planner.js';
import { installFramework, makeTempDir, removeTempDir, testTemplate } from '../../test-helpers.js';

const FIXED_NOW = new Date(2024, 0, 2, 3, 4, 5);
const planner = new InstallationPlanner({ now: () => FIXED_NOW });
const ALL_SYMLINKS = [
  '.claude/agents/strategic',
  '.claude/commands/strategic',
  '.claude/hooks/strategic',
  '.codex/prompts/strategic',
  '.codex/hooks/strategic'
];

let target: string;

beforeEach(async () => {
  target = await makeTempDir();
});

afterEach(async () => {
  await removeTempDir(target);
});

function config(overrides: { force?: boolean; forceCore?: boolean; noBackup?: boolean } = {}) {
  return createInstallConfig({ targetDir: target, templateId: 'test', cliVersion: '0.0.0-test', ...overrides });
}

describe('classifyInstallation', () => {
  it('maps flags and state to an installation type', () => {
    assert.equal(classifyInstallation(false, false, false), InstallationType.New);
    assert.equal(classifyInstallation(false, false, true), InstallationType.Overwrite);
    assert.equal(classifyInstallation(true, false, false), InstallationType.Overwrite);
    assert.equal(classifyInstallation(false, true, false), InstallationType.Update);
    assert.equal(classifyInstallation(false, true, true), InstallationType.Update);
  });

  it('labels each type', () => {
    assert.equal(installationTypeLabel(InstallationType.New), 'New Installation');
    assert.equal(installationTypeLabel(InstallationType.Update), 'Update Core Only');
    assert.equal(installationTypeLabel(InstallationType.Overwrite), 'Full Overwrite');
  });
});

describe('InstallationPlanner.analyze', () => {
  it('plans a fresh install into an empty directory', async () => {
    const { plan, state } = await planner.analyze(config(), testTemplate());

    assert.equal(state.isInstalled, false);
    assert.equal(plan.installationType, InstallationType.New);
    assert.deepEqual(plan.willCreate, ['.strategic-claude-basic']);
    assert.deepEqual(plan.willReplace, []);
    assert.deepEqual(plan.willPreserve, []);
    assert.equal(plan.backupRequired, false);
    assert.equal(plan.backupPath, undefined);
    assert.deepEqual(plan.directoriesToCreate, [
      '.claude',
      '.claude/agents',
      '.claude/commands',
      '.claude/hooks',
      '.codex',
      '.codex/prompts',
      '.codex/hooks'
    ]);
    assert.deepEqual(plan.symlinksToCreate, ALL_SYMLINKS);
    assert.deepEqual(plan.symlinksToUpdate, []);
    assert.deepEqual(plan.errors, []);
    assert.deepEqual(plan.warnings, []);
  });

  it('always lists every preserved directory for a core update', async () => {
    const { plan } = await planner.analyze(config({ forceCore: true }), testTemplate());

    assert.equal(plan.installationType, InstallationType.Update);
    assert.deepEqual(
      plan.willPreserve,
      USER_PRESERVED_DIRECTORIES.map(dir => `.strategic-claude-basic/${dir}`)
    );
    assert.deepEqual(plan.willCreate, [
      '.strategic-claude-basic/core',
      '.strategic-claude-basic/guides',
      '.strategic-claude-basic/templates'
    ]);
    assert.deepEqual(plan.warnings, ['.strategic-claude-basic does not exist yet; core update will create it']);
  });

  it('plans a backup when an update replaces installed directories', async () => {
    await installFramework(target);

    const { plan } = await planner.analyze(config({ forceCore: true }), testTemplate());

    assert.deepEqual(plan.willReplace, [
      '.strategic-claude-basic/core',
      '.strategic-claude-basic/guides',
      '.strategic-claude-basic/templates'
    ]);
    assert.equal(plan.backupRequired, true);
    assert.equal(plan.backupPath, join(target, 'strategic-claude-basic-backup-20240102-030405'));
    assert.deepEqual(plan.symlinksToUpdate, ALL_SYMLINKS);
    assert.deepEqual(plan.directoriesToCreate, []);
  });

  it('plans a full overwrite of an installed target', async () => {
    await installFramework(target);

    const { plan } = await planner.analyze(config({ force: true }), testTemplate());

    assert.equal(plan.installationType, InstallationType.Overwrite);
    assert.deepEqual(plan.willReplace, ['.strategic-claude-basic']);
    assert.equal(plan.backupRequired, true);
  });

  it('blocks the plan when the backup directory already exists', async () => {
    await installFramework(target);
    await fs.mkdir(join(target, 'strategic-claude-basic-backup-20240102-030405'));

    const { plan } = await planner.analyze(config({ forceCore: true }), testTemplate());

    assert.deepEqual(plan.errors, [
      `Backup directory already exists: ${join(target, 'strategic-claude-basic-backup-20240102-030405')}`
    ]);
    assert.equal(plan.hasConflicts, true);
  });

  it('warns instead of backing up when backups are disabled', async () => {
    await installFramework(target);

    const { plan } = await planner.analyze(config({ forceCore: true, noBackup: true }), testTemplate());

    assert.equal(plan.backupRequired, false);
    assert.equal(plan.backupPath, undefined);
    assert.deepEqual(plan.warnings, ['Backups are disabled: replaced files cannot be recovered']);
  });
});

describe('addPlanError', () => {
  it('latches the conflict flag', () => {
    const plan = createEmptyPlan(target, InstallationType.New, testTemplate());
    addPlanError(plan, 'first');
    plan.errors.length = 0;
    assert.equal(plan.hasConflicts, true);
  });
});
