import { resolve } from "node:path";
import { MockFileUpdater } from "../core/updater.js";
import { MockWatcher } from "../core/watcher.js";
import { InvalidConfigError } from "../core/writer.js";
import { loadSettings, type Settings } from "../utils/config.js";
import { dim, errorMsg, heading } from "../utils/display.js";

export interface WatchCommandOptions {
  recursive?: boolean;
  interval?: string;
  path?: string;
}

/**
 * Watch directories and regenerate their listed mocks on change. Stops on
 * SIGINT/SIGTERM, or when `signal` aborts if one is given.
 */
export async function watchCommand(
  dirs: string[],
  options: WatchCommandOptions,
  signal?: AbortSignal,
): Promise<void> {
  const cwd = resolve(options.path ?? ".");

  let settings: Settings;
  try {
    settings = await loadSettings(cwd);
  } catch (err) {
    if (!(err instanceof InvalidConfigError)) throw err;
    console.error(errorMsg(err.message));
    process.exitCode = 1;
    return;
  }

  let intervalMs = settings.watchIntervalMs;
  if (options.interval !== undefined) {
    intervalMs = Number.parseInt(options.interval, 10);
    if (!Number.isInteger(intervalMs) || intervalMs < 1) {
      console.error(errorMsg("--interval must be a positive number of milliseconds"));
      process.exitCode = 1;
      return;
    }
  }

  const targets = (dirs.length > 0 ? dirs : ["."]).map((dir) => resolve(cwd, dir));
  const recursive = options.recursive ?? false;

  console.log(heading("\nmockwright watch\n"));
  for (const target of targets) console.log(`  Watching ${target}${recursive ? " (recursive)" : ""}`);
  console.log(`  Poll interval: ${intervalMs}ms`);
  console.log(dim("  Press Ctrl+C to stop.\n"));

  const updater = new MockFileUpdater({ targets, recursive, settings });
  const watcher = new MockWatcher({ targets, recursive, intervalMs, updater });

  if (!signal) {
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    process.once("SIGTERM", () => controller.abort());
    signal = controller.signal;
  }

  await watcher.run(signal);
}
