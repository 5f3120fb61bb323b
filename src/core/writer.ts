import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { parse, stringify } from "yaml";
import { ZodError } from "zod";
import { configSchema, CONFIG_FILENAME } from "./schema.js";
import type { ConfigFile } from "./schema.js";

/**
 * Thrown when .mockwright.yaml exists but is not valid YAML or does not
 * match the config schema. Never swallowed into null.
 */
export class InvalidConfigError extends Error {
  constructor(public readonly path: string, detail: string) {
    super(`Invalid config ${path}: ${detail}`);
    this.name = "InvalidConfigError";
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read the config file from disk. Returns null when there is none.
 */
export async function readConfig(rootPath: string): Promise<ConfigFile | null> {
  const path = join(rootPath, CONFIG_FILENAME);
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new InvalidConfigError(path, err instanceof Error ? err.message : String(err));
  }
  // An empty file means "all defaults".
  if (parsed === null || parsed === undefined) return {};

  try {
    return configSchema.parse(parsed);
  } catch (err) {
    if (err instanceof ZodError) {
      const detail = err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
      throw new InvalidConfigError(path, detail);
    }
    throw err;
  }
}

export type WriteOutcome = "written" | "unchanged";

/**
 * Write a generated file through a temp file and a rename, so readers never
 * see a torn file. Identical content is left alone.
 */
export async function writeArtifact(path: string, content: string): Promise<WriteOutcome> {
  try {
    if ((await readFile(path, "utf-8")) === content) return "unchanged";
  } catch (err) {
    if (!isNotFound(err)) throw err;
  }

  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, content, "utf-8");
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
  return "written";
}

/**
 * YAML rendering used for debug dumps.
 */
export function toYaml(data: unknown): string {
  return stringify(data, {
    lineWidth: 120,
    defaultStringType: "PLAIN",
    defaultKeyType: "PLAIN",
  });
}
