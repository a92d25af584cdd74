import { promises as fs } from 'fs';
import { join, relative } from 'path';
import { tmpdir } from 'os';
import type { Template } from '../src/types/index.js';
import { DIR_NAMES, TEMPLATE_PATHS } from '../src/constants/index.js';
import type { FetchedSource, SourceProvider } from '../src/core/sources/source-provider.js';
import type { ScriptRunner, ScriptRunResult } from '../src/core/scripts/script-runner.js';
import { InstallationError } from '../src/utils/errors.js';
import { isFile } from '../src/utils/fs.js';
import { createIntegrationManagers } from '../src/core/symlinks/symlink-manager.js';
import { createTemplateInfo, saveTemplateInfo } from '../src/core/provenance/template-info.js';

export const TEST_COMMIT = '0123456789abcdef0123456789abcdef01234567';

export const FRAMEWORK_HOOK_COMMAND = 'python3 .strategic-claude-basic/core/hooks/block-skip-hooks.py';
export const CANONICAL_FRAMEWORK_HOOK = '/usr/bin/python3 $CLAUDE_PROJECT_DIR/.claude/hooks/strategic/block-skip-hooks.py';

export function testTemplate(overrides: Partial<Template> = {}): Template {
  return {
    id: 'test',
    name: 'Test Template',
    description: 'Template used by the test suite',
    repoUrl: 'https://example.invalid/test-template.git',
    branch: 'main',
    commit: TEST_COMMIT,
    ...overrides
  };
}

export async function makeTempDir(prefix: string = 'scb-test-'): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFixtureFile(root: string, relativePath: string, content: string): Promise<void> {
  const path = join(root, relativePath);
  await fs.mkdir(join(path, '..'), { recursive: true });
  await fs.writeFile(path, content, 'utf8');
}

export const SETTINGS_TEMPLATE = {
  hooks: {
    PreToolUse: [
      { matcher: 'Bash', hooks: [{ type: 'command', command: FRAMEWORK_HOOK_COMMAND }] }
    ]
  },
  permissions: {
    allow: ['Bash(git status)']
  }
};

export interface FrameworkFixtureOptions {
  /** Ship the Claude settings template (default true) */
  settingsTemplate?: boolean;
  codexTemplate?: string;
  ignoreTemplates?: Record<string, string>;
  /** Extra files relative to the framework directory */
  files?: Record<string, string>;
}

/**
 * Write a framework tree, as a template would ship it, under root.
 */
export async function writeFrameworkTree(root: string, options: FrameworkFixtureOptions = {}): Promise<void> {
  const framework = join(root, DIR_NAMES.FRAMEWORK);
  const files: Record<string, string> = {
    'core/agents/planner.md': '# Planner agent\n',
    'core/commands/plan.md': '# /plan command\n',
    'core/hooks/block-skip-hooks.py': 'print("hook")\n',
    'guides/getting-started.md': '# Getting started\n',
    'templates/README.md': 'Templates\n',
    'plan/README.md': 'Plans live here\n',
    ...options.files
  };

  if (options.settingsTemplate !== false) {
    files[TEMPLATE_PATHS.CLAUDE_SETTINGS] = `${JSON.stringify(SETTINGS_TEMPLATE, null, 2)}\n`;
  }
  if (options.codexTemplate !== undefined) {
    files[TEMPLATE_PATHS.CODEX_CONFIG] = options.codexTemplate;
  }
  for (const [name, content] of Object.entries(options.ignoreTemplates ?? {})) {
    files[`${TEMPLATE_PATHS.IGNORE_DIR}/${name}`] = content;
  }

  for (const [relativePath, content] of Object.entries(files)) {
    await writeFixtureFile(framework, relativePath, content);
  }
}

/**
 * Lay down a complete installation without going through the installer:
 * framework tree, integration symlinks and provenance.
 */
export async function installFramework(targetDir: string, options: FrameworkFixtureOptions = {}): Promise<void> {
  await writeFrameworkTree(targetDir, { settingsTemplate: false, ...options });
  for (const manager of createIntegrationManagers()) {
    await manager.createAll(targetDir);
  }
  await saveTemplateInfo(targetDir, createTemplateInfo(testTemplate(), '0.0.0-test'));
}

export interface FixtureSourceOptions extends FrameworkFixtureOptions {
  /** Scripts written at the root of the fetched tree */
  scripts?: Record<string, string>;
}

/**
 * SourceProvider that builds the template tree in a temp directory instead of cloning
 */
export class FixtureSourceProvider implements SourceProvider {
  fetchCount = 0;
  cleanupCount = 0;

  constructor(private readonly options: FixtureSourceOptions = {}) {}

  async fetch(_template: Template): Promise<FetchedSource> {
    this.fetchCount++;
    const path = await makeTempDir('scb-fixture-source-');
    await writeFrameworkTree(path, this.options);
    for (const [name, content] of Object.entries(this.options.scripts ?? {})) {
      await writeFixtureFile(path, name, content);
    }
    return {
      path,
      cleanup: async () => {
        this.cleanupCount++;
        await removeTempDir(path);
      }
    };
  }
}

/**
 * ScriptRunner that records invocations instead of running bash
 */
export class RecordingScriptRunner implements ScriptRunner {
  readonly runs: Array<{ name: string; targetDir: string }> = [];

  constructor(private readonly failing: ReadonlySet<string> = new Set()) {}

  async exists(sourceDir: string, name: string): Promise<boolean> {
    return isFile(join(sourceDir, name));
  }

  async run(_sourceDir: string, name: string, targetDir: string): Promise<ScriptRunResult> {
    this.runs.push({ name, targetDir });
    if (this.failing.has(name)) {
      throw new InstallationError(`${name} exited with code 1`, { script: name, exitCode: 1 });
    }
    return { warnings: [] };
  }
}

/**
 * Every path under root mapped to its file content, symlink target or "<dir>".
 */
export async function snapshotTree(root: string, exclude: (relativePath: string) => boolean = () => false): Promise<Map<string, string>> {
  const snapshot = new Map<string, string>();

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const path = join(dir, entry.name);
      const relativePath = relative(root, path);
      if (exclude(relativePath)) {
        continue;
      }
      if (entry.isSymbolicLink()) {
        snapshot.set(relativePath, `-> ${await fs.readlink(path)}`);
      } else if (entry.isDirectory()) {
        snapshot.set(relativePath, '<dir>');
        await walk(path);
      } else {
        snapshot.set(relativePath, await fs.readFile(path, 'utf8'));
      }
    }
  }

  await walk(root);
  return snapshot;
}

export async function isSymlink(path: string): Promise<boolean> {
  try {
    return (await fs.lstat(path)).isSymbolicLink();
  } catch {
    return false;
  }
}
