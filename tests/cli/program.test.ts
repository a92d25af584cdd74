import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { program } from '../../src/index.js';

describe('CLI program', () => {
  it('registers no alias of its own; the short name comes from the bin entry', () => {
    assert.equal(program.name(), 'strategic-claude-basic');
    assert.deepEqual(program.aliases(), []);
  });

  it('exposes every command', () => {
    assert.deepEqual(
      program.commands.map(command => command.name()),
      ['init', 'clean', 'install-mcp', 'status', 'version']
    );
  });

  it('accepts server selection flags on install-mcp', () => {
    const installMcp = program.commands.find(command => command.name() === 'install-mcp');
    assert.ok(installMcp);
    assert.deepEqual(
      installMcp.options.map(option => option.long),
      ['--server', '--all', '--yes']
    );
  });
});
