/**
 * MockConsoleOutput — captures output for test assertions.
 */

import type { ConsoleOutput, ProgressTicker } from "./console.js";

export type CapturedLine = {
  level: "write" | "error" | "success" | "warn" | "info" | "heading" | "progress";
  text: string;
};

export class MockConsoleOutput implements ConsoleOutput {
  public lines: CapturedLine[] = [];

  write(text: string, _newline?: boolean): void {
    this.lines.push({ level: "write", text });
  }

  error(text: string, _newline?: boolean): void {
    this.lines.push({ level: "error", text });
  }

  success(text: string, _newline?: boolean): void {
    this.lines.push({ level: "success", text });
  }

  warn(text: string, _newline?: boolean): void {
    this.lines.push({ level: "warn", text });
  }

  info(text: string, _newline?: boolean): void {
    this.lines.push({ level: "info", text });
  }

  heading(text: string, _newline?: boolean): void {
    this.lines.push({ level: "heading", text });
  }

  /** Records one "progress" line per finished step: `✔ label` or `✗ label` */
  progress(label: string): ProgressTicker {
    return {
      stop: (succeeded) => {
        this.lines.push({ level: "progress", text: `${succeeded ? "✔" : "✗"} ${label}` });
      },
    };
  }

  /** Get all text from lines matching a level */
  textsAt(level: CapturedLine["level"]): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.text);
  }

  /** Check if any line contains a substring */
  hasText(substring: string): boolean {
    return this.lines.some((l) => l.text.includes(substring));
  }
}
