// src/menu.ts
import type { AppContext, Handler } from "./context";
import { EndOfInputError, errorMessage } from "./errors";

export const SEPARATOR = "================================";

export type MenuEntry =
  | { label: string; handler: Handler }
  | { label: string; leave: true; farewell?: string };

export type Menu = { title: string; entries: MenuEntry[] };

export function selectEntry(menu: Menu, choice: string): MenuEntry | undefined {
  return menu.entries.find((_, i) => String(i + 1) === choice);
}

/**
 * Prints the menu, runs the chosen entry and repeats until a `leave` entry is picked.
 * Errors a handler did not deal with are logged and the loop carries on;
 * end of input is passed up so the program can stop.
 */
export async function runMenu(ctx: AppContext, menu: Menu): Promise<void> {
  const { io } = ctx;
  for (;;) {
    io.print(SEPARATOR);
    io.print(menu.title);
    menu.entries.forEach((entry, i) => io.print(`${i + 1}. ${entry.label}`));

    const entry = selectEntry(menu, await io.ask("Select an option: "));
    if (!entry) {
      io.print("Invalid option, please try again.");
      continue;
    }
    if ("leave" in entry) {
      if (entry.farewell) io.print(entry.farewell);
      return;
    }

    try {
      await entry.handler(ctx);
    } catch (err) {
      if (err instanceof EndOfInputError) throw err;
      console.error("Unhandled error:", err);
      io.print(`Operation failed: ${errorMessage(err)}`);
    }
  }
}
