/**
 * Sink for pipeline status lines. The terminal UI renders these as stages;
 * JSON output and tests drop them.
 */
export interface ProgressReporter {
  /** Opens a new stage, e.g. `Threat Model`. */
  section(title: string): void;
  start(message: string): void;
  succeed(message: string): void;
  fail(message: string): void;
  warn(message: string): void;
  info(message: string): void;
}

const ignore = (): void => undefined;

export class SilentProgress implements ProgressReporter {
  section = ignore;
  start = ignore;
  succeed = ignore;
  fail = ignore;
  warn = ignore;
  info = ignore;
}
