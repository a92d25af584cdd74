import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { ErrorCodes, StrategicError } from '../../../src/types/index.js';
import { CLAUDE_INTEGRATION, CODEX_INTEGRATION } from '../../../src/constants/index.js';
import {
  SymlinkManager,
  createIntegrationManagers,
  ownedSymlinkTargets
} from '../../../src/core/symlinks/symlink-manager.js';
import { isSymlink, makeTempDir, removeTempDir, writeFrameworkTree, writeFixtureFile } from '../../test-helpers.js';

let target: string;
const claude = new SymlinkManager(CLAUDE_INTEGRATION);

beforeEach(async () => {
  target = await makeTempDir();
  await writeFrameworkTree(target);
});

afterEach(async () => {
  await removeTempDir(target);
});

describe('SymlinkManager.createAll', () => {
  it('creates every link so that validation passes', async () => {
    for (const manager of createIntegrationManagers()) {
      await manager.createAll(target);
      const statuses = await manager.validateAll(target);
      assert.equal(statuses.length, Object.keys(manager.integration.symlinks).length);
      for (const status of statuses) {
        assert.equal(status.valid, true, `${status.integration}/${status.name}: ${status.error}`);
        assert.equal(status.target, manager.integration.symlinks[status.name]);
      }
    }
  });

  it('creates the required subdirectories', async () => {
    await new SymlinkManager(CODEX_INTEGRATION).createAll(target);
    assert.equal((await fs.stat(join(target, '.codex', 'prompts'))).isDirectory(), true);
    assert.equal(await fs.readlink(join(target, '.codex', 'prompts', 'strategic')),
      '../../.strategic-claude-basic/core/commands');
  });

  it('rejects an empty target directory', async () => {
    await assert.rejects(claude.createAll(''), (error: unknown) => {
      assert.ok(error instanceof StrategicError);
      assert.equal(error.code, ErrorCodes.VALIDATION_FAILED);
      return true;
    });
  });
});

describe('SymlinkManager.validateLink', () => {
  it('reports a missing link as absent', async () => {
    const status = await claude.validateLink(target, 'agents/strategic', '../../.strategic-claude-basic/core/agents');
    assert.equal(status.exists, false);
    assert.equal(status.valid, false);
    assert.equal(status.error, undefined);
  });

  it('reports a real directory in place of the link', async () => {
    await fs.mkdir(join(target, '.claude', 'agents', 'strategic'), { recursive: true });
    const status = await claude.validateLink(target, 'agents/strategic', '../../.strategic-claude-basic/core/agents');
    assert.equal(status.exists, true);
    assert.equal(status.error, 'Path exists but is not a symlink');
  });

  it('reports a link with the wrong target', async () => {
    await fs.mkdir(join(target, '.claude', 'agents'), { recursive: true });
    await fs.symlink('../../elsewhere', join(target, '.claude', 'agents', 'strategic'));
    const status = await claude.validateLink(target, 'agents/strategic', '../../.strategic-claude-basic/core/agents');
    assert.equal(status.valid, false);
    assert.equal(status.error, "Symlink points to '../../elsewhere', expected '../../.strategic-claude-basic/core/agents'");
  });

  it('reports a dangling link', async () => {
    await claude.createAll(target);
    await fs.rm(join(target, '.strategic-claude-basic', 'core', 'agents'), { recursive: true });
    const status = await claude.validateLink(target, 'agents/strategic', '../../.strategic-claude-basic/core/agents');
    assert.equal(status.valid, false);
    assert.equal(status.error, `Symlink target does not exist: ${join(target, '.strategic-claude-basic', 'core', 'agents')}`);
  });
});

describe('SymlinkManager.repairBroken', () => {
  it('recreates only the invalid links', async () => {
    await claude.createAll(target);
    const agents = join(target, '.claude', 'agents', 'strategic');
    await fs.unlink(agents);
    await fs.symlink('../../elsewhere', agents);

    const result = await claude.repairBroken(target);

    assert.deepEqual(result, { repaired: ['agents/strategic'] });
    assert.equal((await claude.validateAll(target)).every(status => status.valid), true);
  });
});

describe('SymlinkManager removal', () => {
  it('removeAll removes every link regardless of target', async () => {
    await claude.createAll(target);
    await fs.unlink(join(target, '.claude', 'hooks', 'strategic'));
    await fs.symlink('/somewhere/else', join(target, '.claude', 'hooks', 'strategic'));

    await claude.removeAll(target);

    for (const name of Object.keys(CLAUDE_INTEGRATION.symlinks)) {
      assert.equal(await isSymlink(join(target, '.claude', name)), false);
    }
  });

  it('removeOwned keeps foreign links and regular files', async () => {
    await claude.createAll(target);
    const agents = join(target, '.claude', 'agents', 'strategic');
    const commands = join(target, '.claude', 'commands', 'strategic');
    await fs.unlink(agents);
    await fs.symlink('../../my-agents', agents);
    await fs.unlink(commands);
    await writeFixtureFile(target, '.claude/commands/strategic', 'user file');

    const result = await claude.removeOwned(target, ownedSymlinkTargets());

    assert.deepEqual(result.removed, [join(target, '.claude', 'hooks', 'strategic')]);
    assert.deepEqual(result.preserved, [agents, commands]);
    assert.deepEqual(result.warnings, [
      `Preserving non-Strategic Claude symlink: ${agents}`,
      `Preserving non-symlink file: ${commands}`
    ]);
    assert.equal(await fs.readlink(agents), '../../my-agents');
    assert.equal(await fs.readFile(commands, 'utf8'), 'user file');
  });

  it('removeOwned keeps going past a link it cannot inspect', async () => {
    await claude.createAll(target);
    await fs.rm(join(target, '.claude', 'commands'), { recursive: true });
    await writeFixtureFile(target, '.claude/commands', 'not a directory');
    const commands = join(target, '.claude', 'commands', 'strategic');

    const result = await claude.removeOwned(target, ownedSymlinkTargets());

    assert.deepEqual(result.removed, [
      join(target, '.claude', 'agents', 'strategic'),
      join(target, '.claude', 'hooks', 'strategic')
    ]);
    assert.deepEqual(result.preserved, []);
    assert.equal(result.warnings.length, 1);
    assert.ok(result.warnings[0].startsWith(`Failed to remove symlink ${commands}: `));
    assert.equal(await fs.readFile(join(target, '.claude', 'commands'), 'utf8'), 'not a directory');
  });

  it('knows the distinct link targets of both integrations', () => {
    assert.deepEqual([...ownedSymlinkTargets()].sort(), [
      '../../.strategic-claude-basic/core/agents',
      '../../.strategic-claude-basic/core/commands',
      '../../.strategic-claude-basic/core/hooks'
    ]);
  });
});

describe('SymlinkManager.updateAll', () => {
  it('recreates links that point elsewhere', async () => {
    await claude.createAll(target);
    const hooks = join(target, '.claude', 'hooks', 'strategic');
    await fs.unlink(hooks);
    await fs.symlink('../../old-hooks', hooks);

    await claude.updateAll(target);

    assert.equal(await fs.readlink(hooks), '../../.strategic-claude-basic/core/hooks');
    const statuses = await claude.validateAll(target);
    assert.equal(statuses.every(status => status.valid), true);
  });
});
