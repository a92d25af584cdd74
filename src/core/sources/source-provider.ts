import type { Template } from '../../types/index.js';

/**
 * A local checkout of a template's framework tree
 */
export interface FetchedSource {
  /** Root of the fetched tree; the framework directory sits directly under it */
  path: string;
  /** Remove the scratch directory. Never throws. */
  cleanup(): Promise<void>;
}

export interface SourceProvider {
  fetch(template: Template): Promise<FetchedSource>;
}
