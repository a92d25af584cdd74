import * as clack from '@clack/prompts';
import type { PromptPort, PromptChoice } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

function unlessCancelled<V>(answer: V | symbol): V {
  if (clack.isCancel(answer)) {
    clack.cancel('Operation cancelled.');
    throw new UserCancellationError();
  }
  return answer;
}

/**
 * PromptPort on @clack/prompts for interactive terminals
 */
export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      return unlessCancelled(await clack.confirm({ message, initialValue: initial ?? false }));
    },

    async select<T>(message: string, choices: Array<PromptChoice<T>>, hint?: string): Promise<T> {
      // Options carry the choice index; the value itself may not be a primitive
      const index = unlessCancelled(
        await clack.select({
          message: hint ? `${message} (${hint})` : message,
          options: choices.map((choice, position) => ({
            value: position,
            label: choice.title,
            ...(choice.description ? { hint: choice.description } : {})
          }))
        })
      );
      return choices[index].value;
    },

    async multiselect<T>(message: string, choices: Array<PromptChoice<T>>): Promise<T[]> {
      const indexes = unlessCancelled(
        await clack.multiselect({
          message,
          required: false,
          options: choices.map((choice, position) => ({
            value: position,
            label: choice.title,
            ...(choice.description ? { hint: choice.description } : {})
          }))
        })
      );
      return choices.filter((_, position) => indexes.includes(position)).map(choice => choice.value);
    }
  };
}
