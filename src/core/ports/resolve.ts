import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import type { PromptPort } from './prompt.js';
import { consoleOutput } from './console-output.js';
import { nonInteractivePrompt } from './console-prompt.js';

/** The context's output port, or plain console output */
export function resolveOutput(ctx?: Pick<ExecutionContext, 'output'>): OutputPort {
  return ctx?.output ?? consoleOutput;
}

/** The context's prompt port, or one that refuses to ask */
export function resolvePrompt(ctx?: Pick<ExecutionContext, 'prompt'>): PromptPort {
  return ctx?.prompt ?? nonInteractivePrompt;
}
