import { resolve } from "node:path";
import { createInterface } from "node:readline/promises";
import { removeMocks, type RemoverIO } from "../core/remover.js";
import { dim } from "../utils/display.js";

export interface RemoveCommandOptions {
  recursive?: boolean;
  nonInteractive?: boolean;
  dryRun?: boolean;
  silent?: boolean;
}

/** Yes/no prompt on stdin; anything but y or yes declines. */
export async function confirmOnStdin(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`  ${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

const consoleIO: RemoverIO = {
  confirm: confirmOnStdin,
  log: (line) => console.log(line),
};

export async function removeCommand(
  target: string | undefined,
  options: RemoveCommandOptions,
  io: RemoverIO = consoleIO,
): Promise<string[]> {
  const root = resolve(target ?? ".");
  const removed = await removeMocks(
    {
      root,
      recursive: options.recursive ?? false,
      interactive: !options.nonInteractive,
      dryRun: options.dryRun ?? false,
      silent: options.silent ?? false,
    },
    io,
  );

  if (!options.silent && removed.length > 0) {
    const verb = options.dryRun ? "would be removed" : "removed";
    io.log(dim(`\n  ${removed.length} file${removed.length === 1 ? "" : "s"} ${verb}.`));
  }
  return removed;
}
