import type { Template, TemplateInfo } from './template.js';

export enum InstallationType {
  New = 'new',
  Update = 'update',
  Overwrite = 'overwrite'
}

export type GitignoreMode = 'track' | 'all' | 'non-user';

export const GITIGNORE_MODES: readonly GitignoreMode[] = ['track', 'all', 'non-user'];

/**
 * Immutable options for one init run, built once from CLI flags.
 */
export interface InstallConfig {
  readonly targetDir: string;
  readonly templateId: string;
  readonly force: boolean;
  readonly forceCore: boolean;
  readonly noBackup: boolean;
  readonly noConfirm: boolean;
  readonly dryRun: boolean;
  readonly gitignoreMode: GitignoreMode;
  readonly cliVersion: string;
}

export interface SymlinkStatus {
  /** Link name relative to the integration directory, e.g. "agents/strategic" */
  name: string;
  /** Integration directory the link lives in, e.g. ".claude" */
  integration: string;
  path: string;
  exists: boolean;
  valid: boolean;
  /** Raw readlink value; empty when the link is absent or not a symlink */
  target: string;
  error?: string;
}

/**
 * Snapshot of a target directory, rebuilt on every query.
 */
export interface InstallationState {
  targetDir: string;
  frameworkDirPath: string;
  frameworkDir: boolean;
  /** Presence of each integration directory keyed by its directory name */
  integrationDirs: Record<string, boolean>;
  symlinks: SymlinkStatus[];
  issues: string[];
  installedTemplate?: TemplateInfo;
  isInstalled: boolean;
}

export interface InstallationPlan {
  targetDir: string;
  installationType: InstallationType;
  template: Template;
  willCreate: string[];
  willReplace: string[];
  willPreserve: string[];
  symlinksToCreate: string[];
  symlinksToUpdate: string[];
  directoriesToCreate: string[];
  backupRequired: boolean;
  backupPath?: string;
  warnings: string[];
  errors: string[];
  hasConflicts: boolean;
}

export interface InstallResult {
  plan: InstallationPlan;
  backupPath?: string;
  warnings: string[];
  state: InstallationState;
}

export interface CleanupResult {
  removedDirectory: boolean;
  removedSymlinks: string[];
  cleanedSettings: boolean;
  preservedFiles: string[];
  cleanedDirectories: string[];
  warnings: string[];
  errors: string[];
  success: boolean;
}
