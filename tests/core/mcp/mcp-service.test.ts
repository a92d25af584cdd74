import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { ErrorCodes, StrategicError } from '../../../src/types/index.js';
import {
  McpService,
  mcpConfigPath,
  parseMcpServer,
  selectMcpTemplates,
  serializeMcpServer
} from '../../../src/core/mcp/mcp-service.js';
import { makeTempDir, removeTempDir, writeFixtureFile, writeFrameworkTree } from '../../test-helpers.js';

const FETCH_SERVER = { command: 'uvx', args: ['fetch-server'], env: { LOG_LEVEL: 'info' } };

const MCP_FILES: Record<string, string> = {
  'templates/mcps/fetch.mcp.json': JSON.stringify({ fetch: FETCH_SERVER }),
  'templates/mcps/docs-search.mcp.json': JSON.stringify({
    'docs-search': { command: 'npx', args: ['-y', 'docs-search-server'] }
  }),
  'templates/mcps/template.mcp.json': JSON.stringify({ mcpServers: {} }),
  'templates/mcps/.gitkeep': ''
};

let target: string;
const service = new McpService({ now: () => new Date(2024, 0, 2, 3, 4, 5) });

async function readConfig(): Promise<unknown> {
  return JSON.parse(await fs.readFile(mcpConfigPath(target), 'utf8'));
}

function isNotInstalled(error: unknown): boolean {
  assert.ok(error instanceof StrategicError);
  assert.equal(error.code, ErrorCodes.NOT_INSTALLED);
  return true;
}

beforeEach(async () => {
  target = await makeTempDir();
});

afterEach(async () => {
  await removeTempDir(target);
});

describe('McpService.scanTemplates', () => {
  it('lists server templates by name and skips the base document', async () => {
    await writeFrameworkTree(target, { files: MCP_FILES });

    const templates = await service.scanTemplates(target);

    assert.deepEqual(
      templates.map(template => [template.name, template.fileName]),
      [
        ['docs-search', 'docs-search.mcp.json'],
        ['fetch', 'fetch.mcp.json']
      ]
    );
    assert.deepEqual(templates[1].server, FETCH_SERVER);
  });

  it('requires the templates directory', async () => {
    await writeFrameworkTree(target);
    await assert.rejects(service.scanTemplates(target), isNotInstalled);
  });

  it('rejects a template holding more than one server', async () => {
    await writeFrameworkTree(target, {
      files: { 'templates/mcps/pair.mcp.json': JSON.stringify({ a: { command: 'a' }, b: { command: 'b' } }) }
    });
    await assert.rejects(service.scanTemplates(target), /pair\.mcp\.json must contain exactly one MCP server/);
  });
});

describe('McpService.analyze', () => {
  it('requires an installed framework', async () => {
    await assert.rejects(service.analyze(target, []), isNotInstalled);
  });

  it('requires at least one server', async () => {
    await writeFrameworkTree(target, { files: MCP_FILES });
    await assert.rejects(service.analyze(target, []), /At least one MCP server must be selected/);
  });
});

describe('McpService.install', () => {
  it('creates .mcp.json from the base document without a backup', async () => {
    await writeFrameworkTree(target, { files: MCP_FILES });
    const available = await service.scanTemplates(target);

    const plan = await service.analyze(target, selectMcpTemplates(available, ['fetch']));
    const result = await service.install(plan);

    assert.equal(plan.hasExistingConfig, false);
    assert.equal(plan.backupPath, undefined);
    assert.deepEqual(result, { configPath: mcpConfigPath(target), installed: ['fetch'] });
    assert.deepEqual(await readConfig(), { mcpServers: { fetch: FETCH_SERVER } });
  });

  it('merges into an existing .mcp.json after backing it up', async () => {
    await writeFrameworkTree(target, { files: MCP_FILES });
    const original = [
      '{',
      '  // project servers',
      '  "mcpServers": {',
      '    "local": { "command": "./serve.sh", "args": [] },',
      '    "fetch": { "command": "old-fetch" }',
      '  },',
      '  "note": "keep me",',
      '}',
      ''
    ].join('\n');
    await writeFixtureFile(target, '.mcp.json', original);
    const available = await service.scanTemplates(target);

    const plan = await service.analyze(target, available);
    const result = await service.install(plan);

    const backupPath = join(target, '.mcp-backup-20240102-030405.json');
    assert.deepEqual(plan.replaces, ['fetch']);
    assert.equal(result.backupPath, backupPath);
    assert.deepEqual(result.installed, ['docs-search', 'fetch']);
    assert.equal(await fs.readFile(backupPath, 'utf8'), original);
    assert.deepEqual(await readConfig(), {
      mcpServers: {
        local: { command: './serve.sh', args: [] },
        fetch: FETCH_SERVER,
        'docs-search': { command: 'npx', args: ['-y', 'docs-search-server'] }
      },
      note: 'keep me'
    });
  });

  it('starts from an empty document when no base is shipped', async () => {
    const withoutBase = Object.fromEntries(
      Object.entries(MCP_FILES).filter(([path]) => !path.endsWith('template.mcp.json'))
    );
    await writeFrameworkTree(target, { files: withoutBase });
    const available = await service.scanTemplates(target);

    await service.install(await service.analyze(target, selectMcpTemplates(available, ['docs-search'])));

    assert.deepEqual(await readConfig(), {
      mcpServers: { 'docs-search': { command: 'npx', args: ['-y', 'docs-search-server'] } }
    });
  });
});

describe('selectMcpTemplates', () => {
  it('keeps the order given and ignores repeats', async () => {
    await writeFrameworkTree(target, { files: MCP_FILES });
    const available = await service.scanTemplates(target);

    const selected = selectMcpTemplates(available, ['fetch', 'docs-search', 'fetch']);

    assert.deepEqual(
      selected.map(template => template.name),
      ['fetch', 'docs-search']
    );
  });

  it('names the available servers when one is unknown', async () => {
    await writeFrameworkTree(target, { files: MCP_FILES });
    const available = await service.scanTemplates(target);

    assert.throws(
      () => selectMcpTemplates(available, ['nope']),
      /Unknown MCP server 'nope'\. Available: docs-search, fetch/
    );
  });
});

describe('parseMcpServer', () => {
  it('carries unknown server keys through', () => {
    const server = parseMcpServer({ command: 'serve', type: 'stdio' }, 'test');

    assert.deepEqual(server, { command: 'serve', args: [], extra: { type: 'stdio' } });
    assert.deepEqual(serializeMcpServer(server), { command: 'serve', args: [], type: 'stdio' });
  });

  it('rejects non-string arguments and environment values', () => {
    assert.throws(() => parseMcpServer({ command: 'serve', args: [1] }, 'test'), /test\.args must be a list of strings/);
    assert.throws(() => parseMcpServer({ command: 'serve', env: { PORT: 80 } }, 'test'), /test\.env\.PORT must be a string/);
    assert.throws(() => parseMcpServer({ args: [] }, 'test'), /test must be an object with a string 'command'/);
  });
});
