import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { isGeneratedSource } from "./fingerprint.js";

// Directories never walked into
const ALWAYS_IGNORE = new Set([
  "node_modules",
  ".git",
  "dist",
]);

/**
 * List a directory and, when recursive, every directory below it, parents
 * before children. Hidden directories and ALWAYS_IGNORE are skipped.
 */
export async function listDirectories(rootPath: string, recursive: boolean): Promise<string[]> {
  const dirs = [rootPath];
  if (!recursive) return dirs;

  async function walk(dirPath: string): Promise<void> {
    const entries = await readdir(dirPath, { withFileTypes: true });
    const children = entries
      .filter((entry) => entry.isDirectory() && !ALWAYS_IGNORE.has(entry.name) && !entry.name.startsWith("."))
      .map((entry) => entry.name)
      .sort();
    for (const name of children) {
      const childPath = join(dirPath, name);
      dirs.push(childPath);
      await walk(childPath);
    }
  }

  await walk(rootPath);
  return dirs;
}

/**
 * Find `.ts` files whose first line is the generated-file marker, in
 * directory order then file name order.
 */
export async function findGeneratedFiles(rootPath: string, recursive: boolean): Promise<string[]> {
  const found: string[] = [];

  for (const dirPath of await listDirectories(rootPath, recursive)) {
    const entries = await readdir(dirPath, { withFileTypes: true });
    const names = entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(".ts"))
      .map((entry) => entry.name)
      .sort();
    for (const name of names) {
      const filePath = join(dirPath, name);
      if (isGeneratedSource(await readFile(filePath, "utf-8"))) found.push(filePath);
    }
  }

  return found;
}
