import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';

interface TerminalPorts {
  output: OutputPort;
  prompt: PromptPort;
}

let interactivePorts: TerminalPorts | undefined;
let plainPorts: TerminalPorts | undefined;

/** A session is interactive when both stdin and stdout are TTYs and CI is not set. */
export function detectInteractive(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true && process.env.CI !== 'true';
}

function terminalPorts(interactive: boolean): TerminalPorts {
  if (interactive) {
    return (interactivePorts ??= { output: createClackOutput(), prompt: createClackPrompt() });
  }
  return (plainPorts ??= { output: createPlainOutput(), prompt: nonInteractivePrompt });
}

/**
 * Execution context for a CLI command, with clack ports on a terminal and
 * plain ports everywhere else.
 */
export async function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  const interactive = detectInteractive();
  return { ...ctx, interactive, ...terminalPorts(interactive) };
}
