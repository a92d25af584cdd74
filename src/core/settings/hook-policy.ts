import {
  CANONICAL_HOOK_SCRIPT_DIR,
  FRAMEWORK_HOOK_SCRIPTS,
  HOOK_INTERPRETER
} from '../../constants/index.js';

/**
 * Decides which hook commands belong to the framework and how they are
 * identified and rewritten. Merge and clean both consult this one policy.
 */
export class FrameworkHookPolicy {
  constructor(
    readonly scripts: readonly string[] = FRAMEWORK_HOOK_SCRIPTS,
    readonly scriptDir: string = CANONICAL_HOOK_SCRIPT_DIR,
    readonly interpreter: string = HOOK_INTERPRETER
  ) {}

  /** The framework script a command invokes, matched on the command's suffix */
  matchScript(command: string): string | undefined {
    const trimmed = command.trim();
    return this.scripts.find(script => trimmed.endsWith(script));
  }

  isFrameworkHook(command: string): boolean {
    return this.matchScript(command) !== undefined;
  }

  /**
   * Identity key for a hook command. Framework hooks compare on their
   * script name so relocated copies still match; everything else compares verbatim.
   */
  normalize(command: string): string {
    return this.matchScript(command) ?? command;
  }

  /** Canonical invocation of a framework hook, or the command unchanged */
  canonicalCommand(command: string): string {
    const script = this.matchScript(command);
    if (!script) {
      return command;
    }
    return `${this.interpreter} ${this.scriptDir}/${script}`;
  }
}

export const defaultHookPolicy = new FrameworkHookPolicy();
