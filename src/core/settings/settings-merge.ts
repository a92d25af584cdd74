import type { HookEntry, HookMatcher, HooksSection, PermissionsSection, SettingsDocument } from '../../types/index.js';
import { HOOK_TYPES } from '../../constants/index.js';
import { FrameworkHookPolicy, defaultHookPolicy } from './hook-policy.js';
import { serializeHookEntry } from './settings-document.js';

function cloneEntry(entry: HookEntry): HookEntry {
  return { ...entry, ...(entry.extra ? { extra: { ...entry.extra } } : {}) };
}

/** Command hooks compare by normalized command, other hooks by their full content. */
function entryIdentity(entry: HookEntry, policy: FrameworkHookPolicy): string {
  if (entry.command !== undefined) {
    return `command:${policy.normalize(entry.command)}`;
  }
  return `entry:${JSON.stringify(serializeHookEntry(entry))}`;
}

function isFrameworkEntry(entry: HookEntry, policy: FrameworkHookPolicy): boolean {
  return entry.command !== undefined && policy.isFrameworkHook(entry.command);
}

function clonePermissions(permissions: PermissionsSection): PermissionsSection {
  return {
    ...(permissions.allow ? { allow: [...permissions.allow] } : {}),
    ...(permissions.additionalDirectories ? { additionalDirectories: [...permissions.additionalDirectories] } : {}),
    extra: { ...permissions.extra }
  };
}

/**
 * Merge one hook type. Existing matchers keep their order and contents;
 * template entries are appended under their matcher unless the same entry is
 * already there. Matcher-level keys from the existing side win.
 */
function mergeHookType(
  templateMatchers: HookMatcher[],
  existingMatchers: HookMatcher[],
  policy: FrameworkHookPolicy
): HookMatcher[] {
  const byMatcher = new Map<string, HookMatcher>();

  const slot = (source: HookMatcher): HookMatcher => {
    let target = byMatcher.get(source.matcher);
    if (!target) {
      target = { matcher: source.matcher, hooks: [] };
      byMatcher.set(source.matcher, target);
    }
    if (!target.extra && source.extra) {
      target.extra = { ...source.extra };
    }
    return target;
  };

  for (const matcher of existingMatchers) {
    slot(matcher).hooks.push(...matcher.hooks.map(cloneEntry));
  }

  for (const matcher of templateMatchers) {
    const target = slot(matcher);
    for (const candidate of matcher.hooks) {
      const identity = entryIdentity(candidate, policy);
      if (!target.hooks.some(hook => entryIdentity(hook, policy) === identity)) {
        target.hooks.push(cloneEntry(candidate));
      }
    }
  }

  return [...byMatcher.values()].filter(matcher => matcher.hooks.length > 0);
}

function rewriteFrameworkHooks(hooks: HooksSection, policy: FrameworkHookPolicy): void {
  for (const type of HOOK_TYPES) {
    for (const matcher of hooks[type] ?? []) {
      for (const hook of matcher.hooks) {
        if (hook.command !== undefined) {
          hook.command = policy.canonicalCommand(hook.command);
        }
      }
    }
  }
}

/**
 * Merge template hooks into an existing settings document.
 *
 * Permissions come only from the existing document; the template's are never
 * applied. Every framework hook in the result is rewritten to its canonical
 * command.
 */
export function mergeSettings(
  template: SettingsDocument,
  existing: SettingsDocument | undefined,
  policy: FrameworkHookPolicy = defaultHookPolicy
): SettingsDocument {
  const merged: SettingsDocument = {
    extra: { ...(existing?.extra ?? {}) },
    extraHooks: { ...(existing?.extraHooks ?? {}) }
  };

  if (existing?.permissions) {
    merged.permissions = clonePermissions(existing.permissions);
  }

  if (template.hooks || existing?.hooks) {
    const hooks: HooksSection = {};
    for (const type of HOOK_TYPES) {
      const matchers = mergeHookType(template.hooks?.[type] ?? [], existing?.hooks?.[type] ?? [], policy);
      if (matchers.length > 0) {
        hooks[type] = matchers;
      }
    }
    rewriteFrameworkHooks(hooks, policy);
    merged.hooks = hooks;
  }

  return merged;
}

/**
 * Strip every framework hook. Matchers left without hooks are dropped;
 * permissions and unmanaged keys are kept verbatim.
 */
export function removeFrameworkHooks(
  doc: SettingsDocument,
  policy: FrameworkHookPolicy = defaultHookPolicy
): SettingsDocument {
  const cleaned: SettingsDocument = {
    extra: { ...doc.extra },
    extraHooks: { ...doc.extraHooks }
  };

  if (doc.permissions) {
    cleaned.permissions = clonePermissions(doc.permissions);
  }

  if (doc.hooks) {
    const hooks: HooksSection = {};
    for (const type of HOOK_TYPES) {
      const matchers = (doc.hooks[type] ?? [])
        .map(matcher => ({
          matcher: matcher.matcher,
          hooks: matcher.hooks.filter(hook => !isFrameworkEntry(hook, policy)).map(cloneEntry),
          ...(matcher.extra ? { extra: { ...matcher.extra } } : {})
        }))
        .filter(matcher => matcher.hooks.length > 0);
      if (matchers.length > 0) {
        hooks[type] = matchers;
      }
    }
    cleaned.hooks = hooks;
  }

  return cleaned;
}
