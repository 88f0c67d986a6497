// src/prompt.ts
import readline from "readline";
import { EndOfInputError } from "./errors";

/** Line-oriented terminal I/O used by the controllers. */
export interface Prompter {
  /** Writes `question` without a newline and resolves with the next input line, trimmed. */
  ask(question: string): Promise<string>;
  print(message?: string): void;
  close(): void;
}

export function createConsolePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question) {
      output.write(question);
      const next = await lines.next();
      if (next.done) throw new EndOfInputError();
      return next.value.trim();
    },
    print(message = "") {
      output.write(`${message}\n`);
    },
    close() {
      rl.close();
    },
  };
}
