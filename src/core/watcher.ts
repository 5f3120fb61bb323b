import { watch, type FSWatcher } from "chokidar";
import { SerialRunner } from "../utils/serial.js";
import { errorMsg } from "../utils/display.js";
import { DEFAULT_WATCH_INTERVAL_MS } from "./schema.js";
import type { MockFileUpdater } from "./updater.js";

export interface MockWatcherOptions {
  targets: readonly string[];
  recursive: boolean;
  intervalMs?: number;
  updater: Pick<MockFileUpdater, "bootstrap" | "update" | "sourceFiles">;
  log?: (line: string) => void;
}

/**
 * Polls the target directories, and every source file the updater has
 * generated from, and runs the updater on every change. Update runs never
 * overlap; changes seen during a run queue at most one more.
 */
export class MockWatcher {
  private watcher: FSWatcher | null = null;
  private readonly watchedSources = new Set<string>();
  private readonly runner: SerialRunner;
  private readonly log: (line: string) => void;

  constructor(private readonly options: MockWatcherOptions) {
    this.log = options.log ?? ((line) => console.log(line));
    this.runner = new SerialRunner(
      async () => {
        await options.updater.update();
        this.watchSources();
      },
      (err) => this.log(errorMsg(`Update failed: ${err instanceof Error ? err.message : String(err)}`)),
    );
  }

  /**
   * Bootstrap interface lists, run a first update, then watch until `signal`
   * aborts. Resolves after the in-flight update has finished.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    await this.options.updater.bootstrap();
    if (signal.aborted) return;

    const stopped = new Promise<void>((resolve) => {
      signal.addEventListener("abort", () => resolve(), { once: true });
    });

    this.watcher = watch([...this.options.targets], {
      ignored: [/node_modules/, /\.git/],
      persistent: true,
      ignoreInitial: true,
      usePolling: true,
      interval: this.options.intervalMs ?? DEFAULT_WATCH_INTERVAL_MS,
      depth: this.options.recursive ? undefined : 0,
    });
    this.watcher.on("all", () => this.runner.trigger());
    this.watcher.on("error", (err) => this.log(errorMsg(`Watch error: ${err instanceof Error ? err.message : String(err)}`)));

    this.runner.trigger();
    await stopped;
    await this.stop();
  }

  /** Add source files outside the targets that the last update read. */
  private watchSources(): void {
    if (!this.watcher) return;
    const added = this.options.updater.sourceFiles().filter((path) => !this.watchedSources.has(path));
    if (added.length === 0) return;
    for (const path of added) this.watchedSources.add(path);
    this.watcher.add(added);
  }

  /** Close the file watcher and wait for the in-flight update. */
  async stop(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
    await this.runner.close();
  }
}
