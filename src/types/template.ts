/**
 * A named, pinned-revision source of framework content.
 */
export interface Template {
  id: string;
  name: string;
  description: string;
  repoUrl: string;
  branch: string;
  /** Full 40-character commit hash */
  commit: string;
  language?: string;
  tags?: string[];
  deprecated?: boolean;
}

/**
 * Provenance record persisted inside the framework directory after an install.
 */
export interface TemplateInfo {
  template: Template;
  installedAt: string;
  installedCommit: string;
  metadata: Record<string, string>;
}
