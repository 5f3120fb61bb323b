import { readFile, writeFile } from "node:fs/promises";
import { join, relative } from "node:path";
import { backendFor } from "../extract/index.js";
import type { Settings } from "../utils/config.js";
import { dim, errorMsg, freshnessIcon, successMsg, timestamp } from "../utils/display.js";
import { checkRequest, parseSourceArgs, resolveDestination } from "./destination.js";
import { UsageError } from "./errors.js";
import { checkFreshness, computeFingerprint } from "./fingerprint.js";
import { runGeneration, type GenerationRequest, type GenerationResult } from "./pipeline.js";
import { listDirectories } from "./scanner.js";
import { INTERFACE_LIST_FILENAME } from "./schema.js";
import { isNotFound } from "./writer.js";

export const INTERFACE_LIST_TEMPLATE = `# Interfaces mockwright regenerates when a file in this directory changes.
# One entry per line, written like the arguments of \`mockwright generate\`:
#
#   ./inventory.ts
#   ./inventory.ts Inventory
#   ./services Mailer Clock
#   -m ./services Mailer
#
# -m (--generate-matchers) also writes argument matchers for the entry.
`;

export interface InterfaceListEntry {
  /** Line as written, for log messages */
  line: string;
  args: string[];
  generateMatchers: boolean;
}

export function parseInterfaceList(content: string): InterfaceListEntry[] {
  const entries: InterfaceListEntry[] = [];
  for (const raw of content.split("\n")) {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) continue;

    let generateMatchers = false;
    const args: string[] = [];
    for (const token of line.split(/\s+/)) {
      if (token === "-m" || token === "--generate-matchers") generateMatchers = true;
      else if (token.startsWith("-")) throw new UsageError(`Unknown option ${token} in ${INTERFACE_LIST_FILENAME} entry "${line}"`);
      else args.push(token);
    }
    entries.push({ line, args, generateMatchers });
  }
  return entries;
}

export interface UpdaterOptions {
  /** Absolute directories to watch */
  targets: readonly string[];
  recursive: boolean;
  settings: Settings;
  log?: (line: string) => void;
  generate?: (request: GenerationRequest) => Promise<GenerationResult>;
}

export interface UpdateSummary {
  /** Directories holding an interface list */
  checked: number;
  /** Directories whose sources changed and were regenerated */
  regenerated: string[];
  /** Entries whose generation run failed */
  failures: number;
}

/**
 * Regenerates the mocks listed in each directory's `interfaces_to_mock` when
 * the directory's hand-written sources, or the sources its entries were last
 * generated from, change. Fingerprints live in memory for the updater's
 * lifetime, so the first update regenerates everything.
 */
export class MockFileUpdater {
  private readonly fingerprints = new Map<string, string>();
  /** Per directory, the source files its last regeneration read */
  private readonly sources = new Map<string, string[]>();
  private readonly log: (line: string) => void;
  private readonly generate: (request: GenerationRequest) => Promise<GenerationResult>;

  constructor(private readonly options: UpdaterOptions) {
    this.log = options.log ?? ((line) => console.log(line));
    this.generate = options.generate ?? runGeneration;
  }

  /**
   * Create an interface list in every target directory that has none.
   * Returns the created files.
   */
  async bootstrap(): Promise<string[]> {
    const created: string[] = [];
    for (const target of this.options.targets) {
      const listPath = join(target, INTERFACE_LIST_FILENAME);
      try {
        await writeFile(listPath, INTERFACE_LIST_TEMPLATE, { encoding: "utf-8", flag: "wx" });
        created.push(listPath);
        this.log(dim(`  Created ${listPath}`));
      } catch (err) {
        if (!(err instanceof Error && "code" in err && err.code === "EEXIST")) throw err;
      }
    }
    return created;
  }

  async update(): Promise<UpdateSummary> {
    const summary: UpdateSummary = { checked: 0, regenerated: [], failures: 0 };

    for (const target of this.options.targets) {
      for (const dir of await listDirectories(target, this.options.recursive)) {
        const content = await readList(dir);
        if (content === null) continue;
        summary.checked++;

        const previous = this.sources.get(dir) ?? [];
        const { state, computed } = await checkFreshness(dir, this.fingerprints.get(dir), previous);
        if (state === "fresh") continue;

        const label = relative(target, dir) || ".";
        this.log(`  ${dim(timestamp())}  ${freshnessIcon(state)}  ${label}`);
        const outcome = await this.regenerate(dir, label, content);
        summary.failures += outcome.failures;
        summary.regenerated.push(dir);

        // A failed entry may depend on files only the previous run saw.
        const sources = outcome.failures > 0 ? mergeSorted(previous, outcome.sources) : outcome.sources;
        this.sources.set(dir, sources);
        const unchanged = sources.length === previous.length && sources.every((path, i) => path === previous[i]);
        this.fingerprints.set(dir, unchanged ? computed : await computeFingerprint(dir, sources));
      }
    }

    return summary;
  }

  /** Every source file some directory's mocks were generated from. */
  sourceFiles(): string[] {
    return mergeSorted(...this.sources.values());
  }

  /** Run every entry of one directory's list. */
  private async regenerate(dir: string, label: string, content: string): Promise<{ failures: number; sources: string[] }> {
    let entries: InterfaceListEntry[];
    try {
      entries = parseInterfaceList(content);
    } catch (err) {
      this.log(errorMsg(`${label}: ${describe(err)}`));
      return { failures: 1, sources: [] };
    }

    let failures = 0;
    const sources: string[][] = [];
    for (const entry of entries) {
      try {
        const result = await this.generate(this.requestFor(dir, entry));
        sources.push(result.sources);
        for (const path of result.written) this.log(successMsg(relative(dir, path)));
      } catch (err) {
        failures++;
        this.log(errorMsg(`${label}: "${entry.line}": ${describe(err)}`));
      }
    }
    return { failures, sources: mergeSorted(...sources) };
  }

  private requestFor(dir: string, entry: InterfaceListEntry): GenerationRequest {
    const { settings } = this.options;
    const spec = parseSourceArgs(entry.args, dir);
    checkRequest(spec, {});
    return {
      cwd: dir,
      spec,
      backend: backendFor(spec, false),
      destination: resolveDestination({}, dir, settings.matchersDir),
      runtimeModule: settings.runtimeModule,
      importExtension: settings.importExtension,
      generateMatchers: entry.generateMatchers || settings.generateMatchers,
      log: this.log,
    };
  }
}

async function readList(dir: string): Promise<string | null> {
  try {
    return await readFile(join(dir, INTERFACE_LIST_FILENAME), "utf-8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

function mergeSorted(...lists: readonly string[][]): string[] {
  return [...new Set(lists.flat())].sort();
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
