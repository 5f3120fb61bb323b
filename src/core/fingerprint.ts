import { createHash } from "node:crypto";
import { readdir, readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { GENERATED_MARKER } from "../generator/naming.js";
import { INTERFACE_LIST_FILENAME } from "./schema.js";
import { isNotFound } from "./writer.js";

export function isGeneratedSource(content: string): boolean {
  return content.split("\n", 1)[0].trimEnd() === GENERATED_MARKER;
}

/**
 * Compute a fingerprint for a directory from the contents of its hand-written
 * `.ts` files and its interface list, plus `extraFiles` from elsewhere (the
 * sources its mocks were last generated from). Only considers files directly
 * in the directory. Generated mocks are excluded so writing them does not
 * retrigger generation.
 */
export async function computeFingerprint(dirPath: string, extraFiles: readonly string[] = []): Promise<string> {
  const entries = await readdir(dirPath, { withFileTypes: true });

  const fileEntries: string[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (!entry.name.endsWith(".ts") && entry.name !== INTERFACE_LIST_FILENAME) continue;

    const content = await readFile(join(dirPath, entry.name), "utf-8");
    if (isGeneratedSource(content)) continue;

    fileEntries.push(`${entry.name}:${digest(content)}`);
  }

  for (const filePath of extraFiles) {
    if (dirname(filePath) === dirPath) continue;
    const content = await readIfPresent(filePath);
    if (content === null) fileEntries.push(`${filePath}:missing`);
    else if (!isGeneratedSource(content)) fileEntries.push(`${filePath}:${digest(content)}`);
  }

  fileEntries.sort();

  return digest(fileEntries.join("\n")).substring(0, 8);
}

function digest(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

async function readIfPresent(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

/**
 * Compare a previously computed fingerprint against the directory's current one.
 */
export type FreshnessState = "fresh" | "stale" | "missing";

export async function checkFreshness(
  dirPath: string,
  storedFingerprint: string | undefined,
  extraFiles: readonly string[] = [],
): Promise<{ state: FreshnessState; computed: string }> {
  const computed = await computeFingerprint(dirPath, extraFiles);

  if (storedFingerprint === undefined) {
    return { state: "missing", computed };
  }

  return {
    state: storedFingerprint === computed ? "fresh" : "stale",
    computed,
  };
}
