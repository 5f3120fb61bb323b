import { rm } from "node:fs/promises";
import { relative } from "node:path";
import { dim, successMsg } from "../utils/display.js";
import { findGeneratedFiles } from "./scanner.js";

export interface RemoveOptions {
  root: string;
  recursive: boolean;
  /** Ask before each deletion */
  interactive: boolean;
  /** Report what would be removed without deleting */
  dryRun: boolean;
  silent: boolean;
}

export interface RemoverIO {
  confirm(question: string): Promise<boolean>;
  log(line: string): void;
}

/**
 * Delete generated files under `root`, identified by their first-line
 * marker. Returns the removed paths, or in dry-run mode the paths that
 * would be removed. Declined files are skipped.
 */
export async function removeMocks(options: RemoveOptions, io: RemoverIO): Promise<string[]> {
  const log = (line: string) => {
    if (!options.silent) io.log(line);
  };
  const label = (path: string) => relative(options.root, path) || path;

  const candidates = await findGeneratedFiles(options.root, options.recursive);
  if (candidates.length === 0) {
    log(dim("  No generated files found."));
    return [];
  }

  const affected: string[] = [];
  for (const path of candidates) {
    if (options.dryRun) {
      log(`  Would remove ${label(path)}`);
      affected.push(path);
      continue;
    }
    if (options.interactive && !(await io.confirm(`Remove ${label(path)}?`))) {
      log(dim(`  Skipped ${label(path)}`));
      continue;
    }
    await rm(path);
    log(successMsg(`Removed ${label(path)}`));
    affected.push(path);
  }

  return affected;
}
