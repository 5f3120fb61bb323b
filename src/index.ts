#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Command, Option } from "commander";
import { generateCommand } from "./commands/generate.js";
import { watchCommand } from "./commands/watch.js";
import { removeCommand } from "./commands/remove.js";

export interface CommandHandlers {
  generateCommand: typeof generateCommand;
  watchCommand: typeof watchCommand;
  removeCommand: typeof removeCommand;
}

const defaultHandlers: CommandHandlers = {
  generateCommand,
  watchCommand,
  removeCommand,
};

function isInvokedDirectly(argv1: string | undefined): boolean {
  if (typeof argv1 !== "string") return false;

  // npm invokes package bins through symlinks in node_modules/.bin.
  try {
    const invokedPath = realpathSync(argv1);
    const thisModulePath = realpathSync(fileURLToPath(import.meta.url));
    if (invokedPath === thisModulePath) return true;
  } catch (err) {
    if (!(err instanceof Error)) throw err;
    // Unresolvable path: fall through to the URL comparison.
  }

  return import.meta.url === pathToFileURL(argv1).href;
}

export function createProgram(handlers: CommandHandlers = defaultHandlers): Command {
  const program = new Command();

  program
    .name("mockwright")
    .description("Generate mock classes and argument matchers for TypeScript interfaces")
    .version("0.1.0");

  program
    .command("generate")
    .description("Generate mocks for interfaces of a module, or the interface of one .ts file")
    .argument("[args...]", "<file.ts> [Interface] | <module> <Interface...>")
    .option("-o, --output <file>", "Output file; only valid for a single interface")
    .option("--output-dir <dir>", "Directory the mocks are written to")
    .option("--package <name>", "Package name recorded in the generated file header")
    .option("--self-package <module>", "Module whose types are referenced without an import")
    .addOption(new Option("--self_package <module>").hideHelp())
    .option("-d, --debug", "Print the extracted interface models")
    .option("-m, --generate-matchers", "Also generate argument matchers for parameter types")
    .option("-p, --matchers-dir <dir>", "Directory the matchers are written to")
    .option("--syntactic", "Read parameter names from the source declarations")
    .action(async (args: string[], opts) => {
      await handlers.generateCommand(args, {
        output: opts.output,
        outputDir: opts.outputDir,
        packageName: opts.package,
        selfPackage: opts.selfPackage ?? opts.self_package,
        debug: opts.debug,
        generateMatchers: opts.generateMatchers,
        matchersDir: opts.matchersDir,
        syntactic: opts.syntactic,
      });
    });

  program
    .command("watch")
    .description("Regenerate the mocks listed in interfaces_to_mock files whenever sources change")
    .argument("[dirs...]", "Directories to watch (default: current directory)")
    .option("-r, --recursive", "Also watch subdirectories")
    .option("--interval <ms>", "Poll interval in milliseconds")
    .action(async (dirs: string[], opts) => {
      await handlers.watchCommand(dirs, { recursive: opts.recursive, interval: opts.interval });
    });

  program
    .command("remove")
    .description("Delete generated mock and matcher files")
    .argument("[path]", "Directory to search (default: current directory)")
    .option("-r, --recursive", "Also search subdirectories")
    .option("-n, --non-interactive", "Delete without asking")
    .option("-d, --dry-run", "List the files without deleting them")
    .option("-s, --silent", "Print nothing")
    .action(async (target: string | undefined, opts) => {
      await handlers.removeCommand(target, {
        recursive: opts.recursive,
        nonInteractive: opts.nonInteractive,
        dryRun: opts.dryRun,
        silent: opts.silent,
      });
    });

  return program;
}

export async function runCli(
  argv: string[] = process.argv,
  handlers: CommandHandlers = defaultHandlers,
): Promise<void> {
  const program = createProgram(handlers);
  await program.parseAsync(argv);
}

const invokedDirectly = isInvokedDirectly(process.argv[1]);

if (invokedDirectly) {
  runCli().catch((err) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(msg);
    process.exit(1);
  });
}
