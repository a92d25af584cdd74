import type { HOOK_TYPES } from '../constants/index.js';

export type HookType = (typeof HOOK_TYPES)[number];

/**
 * One hook entry. `command` is absent for non-command hooks such as
 * `{"type":"prompt","prompt":"..."}`.
 */
export interface HookEntry {
  type: string;
  command?: string;
  timeout?: number;
  /** Remaining entry keys (prompt, ...), written back untouched */
  extra?: Record<string, unknown>;
}

export interface HookMatcher {
  matcher: string;
  hooks: HookEntry[];
  /** Matcher-level keys other than `matcher` and `hooks` */
  extra?: Record<string, unknown>;
}

/** One list per hook type; absent keys mean "no matchers". */
export type HooksSection = {
  [K in HookType]?: HookMatcher[];
};

export interface PermissionsSection {
  allow?: string[];
  additionalDirectories?: string[];
  /** Any other permission keys (deny, ask, defaultMode, ...) carried through verbatim */
  extra: Record<string, unknown>;
}

/**
 * Claude settings document (.claude/settings.json).
 */
export interface SettingsDocument {
  hooks?: HooksSection;
  permissions?: PermissionsSection;
  /** Hook types outside the managed five (SessionStart, SubagentStop, ...), kept as-is */
  extraHooks: Record<string, unknown>;
  /** Top-level keys the CLI does not manage, written back untouched */
  extra: Record<string, unknown>;
}
