/**
 * Everything user-facing goes through an OutputPort. Core services default to
 * silentOutput; the CLI injects clack or plain adapters.
 */

export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  info(message: string): void;
  /** Progress through installation steps */
  step(message: string): void;
  message(message: string): void;
  success(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  /** Multi-line block such as a plan or a removal report */
  note(content: string, title?: string): void;
  confirm(message: string, options?: { initial?: boolean }): Promise<boolean>;
  spinner(): UnifiedSpinner;
}
