import { readConfig } from "../core/writer.js";
import { DEFAULT_RUNTIME_MODULE, DEFAULT_WATCH_INTERVAL_MS } from "../core/schema.js";
import type { ConfigFile } from "../core/schema.js";
import type { ImportExtension } from "../generator/imports.js";

/** Config file values with defaults filled in. */
export interface Settings {
  runtimeModule: string;
  importExtension: ImportExtension;
  /** Relative to the mock directory; undefined means `matchers/` */
  matchersDir?: string;
  generateMatchers: boolean;
  watchIntervalMs: number;
}

/**
 * Load project config, returning null if none exists.
 */
export async function loadConfig(rootPath: string): Promise<ConfigFile | null> {
  return readConfig(rootPath);
}

export function resolveSettings(config: ConfigFile | null): Settings {
  return {
    runtimeModule: config?.runtime_module ?? DEFAULT_RUNTIME_MODULE,
    importExtension: config?.import_extension ?? ".js",
    matchersDir: config?.matchers_dir,
    generateMatchers: config?.generate_matchers ?? false,
    watchIntervalMs: config?.watch_interval ?? DEFAULT_WATCH_INTERVAL_MS,
  };
}

export async function loadSettings(rootPath: string): Promise<Settings> {
  return resolveSettings(await loadConfig(rootPath));
}
