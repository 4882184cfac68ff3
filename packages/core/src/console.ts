/**
 * ConsoleOutput — abstraction over terminal output for testability.
 */

/** Handle for a running progress indicator */
export interface ProgressTicker {
  /** Stop the indicator and print its completion marker */
  stop(succeeded: boolean): void;
}

export interface ConsoleOutput {
  write(text: string, newline?: boolean): void;
  error(text: string, newline?: boolean): void;

  // Semantic output (all default newline=true)
  success(text: string, newline?: boolean): void;
  warn(text: string, newline?: boolean): void;
  info(text: string, newline?: boolean): void;
  heading(text: string, newline?: boolean): void;

  /** Start a progress indicator for a long-running step */
  progress(label: string): ProgressTicker;
}
