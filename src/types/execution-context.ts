/**
 * Execution Context Types
 *
 * Where a command operates and which ports it renders and prompts through.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

export interface ExecutionContext {
  /** Absolute target directory the command operates on */
  targetDir: string;

  /** Whether prompts can be shown */
  interactive: boolean;

  output?: OutputPort;

  prompt?: PromptPort;
}

export interface ExecutionOptions {
  /** Target directory argument; defaults to the process cwd */
  directory?: string;
}
