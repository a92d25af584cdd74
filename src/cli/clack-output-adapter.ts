/**
 * Terminal OutputPorts: @clack/prompts for interactive sessions, plain lines
 * (with a `prompts` confirmation) for CI and piped output.
 */

import { log, spinner as clackSpinner, confirm as clackConfirm, note as clackNote, isCancel, cancel } from '@clack/prompts';
import prompts from 'prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { UserCancellationError } from '../utils/errors.js';
import { Spinner } from '../utils/spinner.js';

function clackSpinnerPort(): UnifiedSpinner {
  const s = clackSpinner();
  let running = false;
  return {
    start(message: string) {
      if (running) {
        return;
      }
      s.start(message);
      running = true;
    },
    stop(finalMessage?: string) {
      if (!running) {
        return;
      }
      s.stop(finalMessage);
      running = false;
    },
    message(text: string) {
      if (running) {
        s.message(text);
      }
    }
  };
}

export function createClackOutput(): OutputPort {
  return {
    info: message => log.info(message),
    step: message => log.step(message),
    message: message => log.message(message),
    success: message => log.success(message),
    error: message => log.error(message),
    warn: message => log.warn(message),
    note: (content, title) => clackNote(content, title ?? ''),
    async confirm(message, options) {
      const answer = await clackConfirm({ message, initialValue: options?.initial ?? false });
      if (isCancel(answer)) {
        cancel('Operation cancelled.');
        throw new UserCancellationError();
      }
      return answer;
    },
    spinner: clackSpinnerPort
  };
}

/**
 * Plain output. The spinner only animates when stdout is a TTY; its final
 * message is always printed so logs show each finished step.
 */
export function createPlainOutput(): OutputPort {
  return {
    ...consoleOutput,
    async confirm(message, options) {
      const response = await prompts(
        { type: 'confirm', name: 'confirmed', message, initial: options?.initial ?? false },
        {
          onCancel: () => {
            throw new UserCancellationError();
          }
        }
      );
      return response.confirmed === true;
    },
    spinner(): UnifiedSpinner {
      let active: Spinner | undefined;
      return {
        start(message: string) {
          active = new Spinner(message);
          active.start();
        },
        stop(finalMessage?: string) {
          if (!active) {
            return;
          }
          active.stop();
          active = undefined;
          if (finalMessage) {
            consoleOutput.success(finalMessage);
          }
        },
        message(text: string) {
          active?.update(text);
        }
      };
    }
  };
}
