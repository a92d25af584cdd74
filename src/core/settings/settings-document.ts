import type { HookEntry, HookMatcher, HooksSection, HookType, PermissionsSection, SettingsDocument } from '../../types/index.js';
import { HOOK_TYPES } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHookType(key: string): key is HookType {
  return HOOK_TYPES.some(type => type === key);
}

function parseStringList(value: unknown, where: string): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ValidationError(`${where} must be a list of strings`);
  }
  return value.filter((item): item is string => typeof item === 'string');
}

const HOOK_ENTRY_KEYS = new Set(['type', 'command', 'timeout']);
const MATCHER_KEYS = new Set(['matcher', 'hooks']);

function collectExtra(raw: Record<string, unknown>, known: Set<string>): Record<string, unknown> | undefined {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!known.has(key)) {
      extra[key] = value;
    }
  }
  return Object.keys(extra).length > 0 ? extra : undefined;
}

function parseHookEntry(raw: unknown, where: string): HookEntry {
  if (!isRecord(raw)) {
    throw new ValidationError(`${where} must be an object`);
  }
  if (raw.command !== undefined && typeof raw.command !== 'string') {
    throw new ValidationError(`${where}.command must be a string`);
  }
  const entry: HookEntry = {
    type: typeof raw.type === 'string' ? raw.type : 'command'
  };
  if (typeof raw.command === 'string') {
    entry.command = raw.command;
  }
  if (typeof raw.timeout === 'number') {
    entry.timeout = raw.timeout;
  }
  const extra = collectExtra(raw, HOOK_ENTRY_KEYS);
  if (extra) {
    entry.extra = extra;
  }
  return entry;
}

function parseMatchers(raw: unknown, where: string): HookMatcher[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError(`${where} must be a list of matchers`);
  }
  return raw.map((item: unknown, index: number) => {
    const at = `${where}[${index}]`;
    if (!isRecord(item)) {
      throw new ValidationError(`${at} must be an object`);
    }
    const hooks = item.hooks ?? [];
    if (!Array.isArray(hooks)) {
      throw new ValidationError(`${at}.hooks must be a list`);
    }
    const matcher: HookMatcher = {
      matcher: typeof item.matcher === 'string' ? item.matcher : '',
      hooks: hooks.map((hook: unknown, hookIndex: number) => parseHookEntry(hook, `${at}.hooks[${hookIndex}]`))
    };
    const extra = collectExtra(item, MATCHER_KEYS);
    if (extra) {
      matcher.extra = extra;
    }
    return matcher;
  });
}

function parsePermissions(raw: unknown, source: string): PermissionsSection {
  if (!isRecord(raw)) {
    throw new ValidationError(`${source}: permissions must be an object`);
  }
  const permissions: PermissionsSection = { extra: {} };
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'allow') {
      permissions.allow = parseStringList(value, `${source}: permissions.allow`);
    } else if (key === 'additionalDirectories') {
      permissions.additionalDirectories = parseStringList(value, `${source}: permissions.additionalDirectories`);
    } else {
      permissions.extra[key] = value;
    }
  }
  return permissions;
}

/**
 * Build a typed settings document from parsed JSON.
 * Hook types and keys the CLI does not manage are kept for write-back.
 */
export function parseSettingsDocument(raw: unknown, source: string): SettingsDocument {
  if (!isRecord(raw)) {
    throw new ValidationError(`${source}: settings must be a JSON object`);
  }

  const doc: SettingsDocument = { extra: {}, extraHooks: {} };
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'hooks') {
      if (!isRecord(value)) {
        throw new ValidationError(`${source}: hooks must be an object`);
      }
      const hooks: HooksSection = {};
      for (const [hookKey, matchers] of Object.entries(value)) {
        if (isHookType(hookKey)) {
          hooks[hookKey] = parseMatchers(matchers, `${source}: hooks.${hookKey}`);
        } else {
          doc.extraHooks[hookKey] = matchers;
        }
      }
      doc.hooks = hooks;
    } else if (key === 'permissions') {
      doc.permissions = parsePermissions(value, source);
    } else {
      doc.extra[key] = value;
    }
  }
  return doc;
}

export function serializeHookEntry(hook: HookEntry): Record<string, unknown> {
  return {
    type: hook.type,
    ...(hook.command !== undefined ? { command: hook.command } : {}),
    ...(hook.timeout !== undefined ? { timeout: hook.timeout } : {}),
    ...hook.extra
  };
}

function serializeMatchers(matchers: HookMatcher[]): Array<Record<string, unknown>> {
  return matchers.map(matcher => ({
    matcher: matcher.matcher,
    hooks: matcher.hooks.map(serializeHookEntry),
    ...matcher.extra
  }));
}

/**
 * Plain JSON shape of a settings document. Empty hook lists are omitted.
 */
export function serializeSettingsDocument(doc: SettingsDocument): Record<string, unknown> {
  const out: Record<string, unknown> = {};

  const hooks: Record<string, unknown> = {};
  for (const type of HOOK_TYPES) {
    const matchers = doc.hooks?.[type];
    if (matchers && matchers.length > 0) {
      hooks[type] = serializeMatchers(matchers);
    }
  }
  Object.assign(hooks, doc.extraHooks);
  if (Object.keys(hooks).length > 0) {
    out.hooks = hooks;
  }

  if (doc.permissions) {
    const permissions: Record<string, unknown> = {};
    if (doc.permissions.allow && doc.permissions.allow.length > 0) {
      permissions.allow = doc.permissions.allow;
    }
    if (doc.permissions.additionalDirectories && doc.permissions.additionalDirectories.length > 0) {
      permissions.additionalDirectories = doc.permissions.additionalDirectories;
    }
    Object.assign(permissions, doc.permissions.extra);
    out.permissions = permissions;
  }

  Object.assign(out, doc.extra);
  return out;
}

export function countHookEntries(doc: SettingsDocument): number {
  let count = 0;
  for (const type of HOOK_TYPES) {
    for (const matcher of doc.hooks?.[type] ?? []) {
      count += matcher.hooks.length;
    }
  }
  return count;
}

/**
 * True when nothing worth keeping is left: no hook entries, no permission
 * content and no unmanaged keys.
 */
export function isSettingsDocumentEmpty(doc: SettingsDocument): boolean {
  if (countHookEntries(doc) > 0 || Object.keys(doc.extraHooks).length > 0 || Object.keys(doc.extra).length > 0) {
    return false;
  }
  const permissions = doc.permissions;
  if (!permissions) {
    return true;
  }
  return (
    (permissions.allow?.length ?? 0) === 0 &&
    (permissions.additionalDirectories?.length ?? 0) === 0 &&
    Object.keys(permissions.extra).length === 0
  );
}
