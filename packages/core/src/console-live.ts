/**
 * LiveConsoleOutput — real terminal output with colors via picocolors.
 */

import pc from "picocolors";
import type { ConsoleOutput, ProgressTicker } from "./console.js";

const FRAMES = ["|", "/", "-", "\\"] as const;
const FRAME_INTERVAL_MS = 100;

/** Where operator output goes; `isTTY` decides whether frames are drawn. */
export type OutputStream = NodeJS.WritableStream & { isTTY?: boolean };

function emit(stream: NodeJS.WritableStream, text: string, newline: boolean): void {
  stream.write(newline ? text + "\n" : text);
}

function marker(succeeded: boolean): string {
  return succeeded ? pc.green("[✔]") : pc.red("[✗]");
}

export class LiveConsoleOutput implements ConsoleOutput {
  constructor(private readonly stdout: OutputStream = process.stdout) {}

  write(text: string, newline = true): void {
    emit(this.stdout, text, newline);
  }

  error(text: string, newline = true): void {
    emit(process.stderr, pc.red(text), newline);
  }

  success(text: string, newline = true): void {
    emit(this.stdout, pc.green(text), newline);
  }

  warn(text: string, newline = true): void {
    emit(this.stdout, pc.yellow(text), newline);
  }

  info(text: string, newline = true): void {
    emit(this.stdout, pc.dim(text), newline);
  }

  heading(text: string, newline = true): void {
    emit(this.stdout, pc.bold(text), newline);
  }

  progress(label: string): ProgressTicker {
    const stdout = this.stdout;
    if (!stdout.isTTY) {
      emit(stdout, `[ ] ${label}`, true);
      let done = false;
      return {
        stop: (succeeded) => {
          if (done) return;
          done = true;
          emit(stdout, `${marker(succeeded)} ${label}`, true);
        },
      };
    }

    let frame = 0;
    const draw = (): void => {
      emit(stdout, `\r[${FRAMES[frame % FRAMES.length]}] ${label}`, false);
      frame += 1;
    };
    draw();
    const timer = setInterval(draw, FRAME_INTERVAL_MS);
    timer.unref();

    let stopped = false;
    return {
      stop: (succeeded) => {
        if (stopped) return;
        stopped = true;
        clearInterval(timer);
        emit(stdout, `\r${marker(succeeded)} ${label}`, true);
      },
    };
  }
}
