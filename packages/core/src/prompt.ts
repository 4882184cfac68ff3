/**
 * Prompter — one line of operator input per question.
 */

export interface Prompter {
  /** Ask a question; resolves undefined once input is closed. */
  ask(question: string): Promise<string | undefined>;
  close(): void;
}
