import { join } from 'path';
import type { Template, TemplateInfo } from '../../types/index.js';
import { DIR_NAMES, FILE_NAMES } from '../../constants/index.js';
import { pathOccupied, readJsoncFile, writeJsonFile } from '../../utils/fs.js';
import { ValidationError } from '../../utils/errors.js';
import { parseTemplate } from '../templates/template.js';

/**
 * Provenance record (.strategic-claude-basic/.template-info).
 * On disk the keys are snake_case.
 */

export function templateInfoPath(targetDir: string): string {
  return join(targetDir, DIR_NAMES.FRAMEWORK, FILE_NAMES.TEMPLATE_INFO);
}

function templateToJson(template: Template): Record<string, unknown> {
  return {
    id: template.id,
    name: template.name,
    description: template.description,
    repo_url: template.repoUrl,
    branch: template.branch,
    commit: template.commit,
    ...(template.language ? { language: template.language } : {}),
    ...(template.tags && template.tags.length > 0 ? { tags: template.tags } : {}),
    ...(template.deprecated ? { deprecated: true } : {})
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createTemplateInfo(template: Template, cliVersion: string, now: Date = new Date()): TemplateInfo {
  return {
    template,
    installedAt: now.toISOString(),
    installedCommit: template.commit,
    metadata: {
      cli_version: cliVersion,
      installation_type: 'cli'
    }
  };
}

export async function saveTemplateInfo(targetDir: string, info: TemplateInfo): Promise<void> {
  await writeJsonFile(templateInfoPath(targetDir), {
    template: templateToJson(info.template),
    installed_at: info.installedAt,
    installed_commit: info.installedCommit,
    metadata: info.metadata
  });
}

/**
 * Read the provenance record. Resolves to undefined when the file is absent;
 * a record that cannot be read or parsed rejects.
 */
export async function loadTemplateInfo(targetDir: string): Promise<TemplateInfo | undefined> {
  const path = templateInfoPath(targetDir);
  if (!(await pathOccupied(path))) {
    return undefined;
  }
  const raw = await readJsoncFile(path);
  if (!isRecord(raw) || !isRecord(raw.template)) {
    throw new ValidationError(`${path} has no template record`);
  }
  if (typeof raw.installed_at !== 'string' || typeof raw.installed_commit !== 'string') {
    throw new ValidationError(`${path} is missing installed_at or installed_commit`);
  }

  const { repo_url: repoUrl, ...rest } = raw.template;
  const template = parseTemplate({ ...rest, repoUrl }, 0);

  const metadata: Record<string, string> = {};
  if (isRecord(raw.metadata)) {
    for (const [key, value] of Object.entries(raw.metadata)) {
      if (typeof value === 'string') {
        metadata[key] = value;
      }
    }
  }

  return {
    template,
    installedAt: raw.installed_at,
    installedCommit: raw.installed_commit,
    metadata
  };
}
