/**
 * MockPrompter — answers questions from a script, records what was asked.
 */

import type { Prompter } from "./prompt.js";

export class MockPrompter implements Prompter {
  public questions: string[] = [];
  public closed = false;
  private answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  /** Next scripted answer; undefined once the script runs out (input closed) */
  async ask(question: string): Promise<string | undefined> {
    this.questions.push(question);
    return this.answers.shift();
  }

  close(): void {
    this.closed = true;
  }
}
