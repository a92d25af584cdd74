import type { OutputPort, UnifiedSpinner } from './output.js';

const print = (line: string): void => {
  console.log(line);
};

/**
 * Plain console rendering with no terminal control sequences. Confirmation
 * takes the default answer since nobody can be asked.
 */
export const consoleOutput: OutputPort = {
  info: print,
  step: message => print(`→ ${message}`),
  message: print,
  success: message => print(`✓ ${message}`),
  error: message => print(`✗ ${message}`),
  warn: message => print(`⚠ ${message}`),
  note: (content, title) => print(title ? `\n${title}\n${content}` : `\n${content}`),
  confirm: async (_message, options) => options?.initial ?? false,
  spinner(): UnifiedSpinner {
    let current = '';
    return {
      start(message: string) {
        current = message;
        print(`… ${message}`);
      },
      stop(finalMessage?: string) {
        print(`✓ ${finalMessage ?? current}`);
      },
      message(text: string) {
        current = text;
      }
    };
  }
};

const noop = (): void => {};

/** Discards output; confirmation returns the default. */
export const silentOutput: OutputPort = {
  info: noop,
  step: noop,
  message: noop,
  success: noop,
  error: noop,
  warn: noop,
  note: noop,
  confirm: async (_message, options) => options?.initial ?? false,
  spinner: () => ({ start: noop, stop: noop, message: noop })
};
