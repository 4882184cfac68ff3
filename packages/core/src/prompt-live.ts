/**
 * ReadlinePrompter — interactive input via node:readline.
 *
 * Lines are queued as they arrive, so piped or pasted input that carries
 * several answers in one chunk is handed out one per question.
 */

import { createInterface } from "node:readline";
import type { Interface } from "node:readline";
import type { Prompter } from "./prompt.js";

type Waiter = (line: string | undefined) => void;

export class ReadlinePrompter implements Prompter {
  private readonly iface: Interface;
  private readonly lines: string[] = [];
  private waiting: Waiter | undefined;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.iface = createInterface({ input, output });
    this.iface.on("line", (line: string) => {
      const waiter = this.waiting;
      this.waiting = undefined;
      if (waiter) waiter(line);
      else this.lines.push(line);
    });
    this.iface.once("close", () => {
      this.closed = true;
      const waiter = this.waiting;
      this.waiting = undefined;
      waiter?.(undefined);
    });
  }

  ask(question: string): Promise<string | undefined> {
    if (question) this.output.write(`${question}\n`);
    if (!this.closed) {
      this.iface.setPrompt("> ");
      this.iface.prompt();
    }

    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise<string | undefined>((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    this.iface.close();
  }
}
