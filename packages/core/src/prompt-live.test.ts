import { describe, expect, test } from "vitest";
import { PassThrough, Writable } from "node:stream";
import { ReadlinePrompter } from "./prompt-live.js";

function setup() {
  const input = new PassThrough();
  const written: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      written.push(String(chunk));
      callback();
    },
  });
  const prompter = new ReadlinePrompter(input, output);
  return { input, written, prompter };
}

describe("ReadlinePrompter", () => {
  test("answers one question per line", async () => {
    const { input, prompter } = setup();

    const name = prompter.ask("Project name?");
    input.write("blog\n");

    expect(await name).toBe("blog");
    prompter.close();
  });

  test("keeps every line of a chunk for the following questions", async () => {
    const { input, prompter } = setup();

    const type = prompter.ask("type");
    input.write("1\n1\nblog\n");

    expect(await type).toBe("1");
    expect(await prompter.ask("action")).toBe("1");
    expect(await prompter.ask("name")).toBe("blog");
    prompter.close();
  });

  test("queued lines are still answered after input ends", async () => {
    const { input, prompter } = setup();

    const first = prompter.ask("first");
    input.end("a\nb\n");

    expect(await first).toBe("a");
    expect(await prompter.ask("second")).toBe("b");
    expect(await prompter.ask("third")).toBeUndefined();
  });

  test("a pending question resolves undefined when input closes", async () => {
    const { input, prompter } = setup();

    const pending = prompter.ask("anything?");
    input.end();

    expect(await pending).toBeUndefined();
  });

  test("writes the question, then a '> ' prompt", async () => {
    const { input, written, prompter } = setup();

    const answer = prompter.ask("Enter the Git repository link:");
    input.write("https://git.example.com/acme/blog.git\n");
    await answer;

    expect(written.join("")).toBe("Enter the Git repository link:\n> ");
    prompter.close();
  });

  test("an empty question writes only the prompt", async () => {
    const { input, written, prompter } = setup();

    const answer = prompter.ask("");
    input.write("2\n");
    await answer;

    expect(written.join("")).toBe("> ");
    prompter.close();
  });
});
