/**
 * Questions asked of the operator: whether to proceed, which template to use
 * and which MCP servers to add.
 */

export interface PromptChoice<T = string> {
  title: string;
  value: T;
  description?: string;
}

export interface PromptPort {
  confirm(message: string, initial?: boolean): Promise<boolean>;
  select<T>(message: string, choices: Array<PromptChoice<T>>, hint?: string): Promise<T>;
  /** Any number of choices, possibly none, in choice order */
  multiselect<T>(message: string, choices: Array<PromptChoice<T>>): Promise<T[]>;
}
