/**
 * Prompt port for sessions without a terminal: every question is an error
 * that names the flag answering it up front.
 */

import type { PromptPort } from './prompt.js';

export class NonInteractivePromptError extends Error {
  constructor(question: string, flagHint: string) {
    super(`Cannot ask for ${question} without an interactive terminal. ${flagHint}`);
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async confirm(message: string): Promise<boolean> {
    throw new NonInteractivePromptError(`confirmation ("${message}")`, 'Pass --yes to init or install-mcp, or --force to clean.');
  },

  async select<T>(message: string): Promise<T> {
    throw new NonInteractivePromptError(`a selection ("${message}")`, 'Pass --template <id> to choose a template.');
  },

  async multiselect<T>(message: string): Promise<T[]> {
    throw new NonInteractivePromptError(`a selection ("${message}")`, 'Pass --all or --server <name...> to choose MCP servers.');
  }
};
