import type { Template } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';

const COMMIT_PATTERN = /^[0-9a-f]{40}$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(raw: Record<string, unknown>, key: string, context: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`template ${context} is missing '${key}'`, { key });
  }
  return value;
}

/**
 * Check the invariants every registry entry must hold
 */
export function validateTemplate(template: Template): void {
  for (const key of ['id', 'name', 'repoUrl', 'branch', 'commit'] as const) {
    if (template[key].trim() === '') {
      throw new ValidationError(`template '${template.id}' has an empty ${key}`, { id: template.id, key });
    }
  }
  if (!COMMIT_PATTERN.test(template.commit)) {
    throw new ValidationError(
      `template '${template.id}' commit must be a 40-character hex hash, got '${template.commit}'`,
      { id: template.id, commit: template.commit }
    );
  }
}

/**
 * Build a Template from untyped registry data
 */
export function parseTemplate(raw: unknown, index: number): Template {
  if (!isRecord(raw)) {
    throw new ValidationError(`template entry #${index} is not an object`);
  }
  const context = typeof raw.id === 'string' ? `'${raw.id}'` : `#${index}`;
  const tags = raw.tags;
  const template: Template = {
    id: requireString(raw, 'id', context),
    name: requireString(raw, 'name', context),
    description: typeof raw.description === 'string' ? raw.description : '',
    repoUrl: requireString(raw, 'repoUrl', context),
    branch: requireString(raw, 'branch', context),
    commit: requireString(raw, 'commit', context),
    ...(typeof raw.language === 'string' ? { language: raw.language } : {}),
    ...(Array.isArray(tags) ? { tags: tags.filter((tag): tag is string => typeof tag === 'string') } : {}),
    ...(raw.deprecated === true ? { deprecated: true } : {})
  };
  validateTemplate(template);
  return template;
}

export function templateDisplayName(template: Template): string {
  return template.deprecated ? `${template.name} (deprecated)` : template.name;
}

export function templateShortDescription(template: Template, maxLength: number): string {
  if (template.description.length <= maxLength) {
    return template.description;
  }
  if (maxLength <= 3) {
    return template.description.slice(0, maxLength);
  }
  return `${template.description.slice(0, maxLength - 3)}...`;
}

export function templateHasTag(template: Template, tag: string): boolean {
  const wanted = tag.toLowerCase();
  return (template.tags ?? []).some(candidate => candidate.toLowerCase() === wanted);
}

/** Short form of the pinned commit for display */
export function shortCommit(template: Template): string {
  return template.commit.slice(0, 8);
}
