import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { INTERFACE_LIST_TEMPLATE } from "../../src/core/updater.js";
import { cleanupTmpDir, createFile, createTmpDir } from "../helpers.js";

const eventHandlers = new Map<string, (...args: unknown[]) => void>();
const watcher = {
  on: vi.fn((event: string, handler: (...args: unknown[]) => void) => {
    eventHandlers.set(event, handler);
    return watcher;
  }),
  add: vi.fn((_paths: string[]) => watcher),
  close: vi.fn(async () => {}),
};
const chokidarWatch = vi.fn((_paths: string[], _options: Record<string, unknown>) => watcher);

vi.mock("chokidar", () => ({
  watch: chokidarWatch,
}));

const { watchCommand } = await import("../../src/commands/watch.js");

let tmpDir: string;
let logs: string[];
let errors: string[];

beforeEach(async () => {
  tmpDir = await createTmpDir();
  logs = [];
  errors = [];
  eventHandlers.clear();
  vi.clearAllMocks();
  vi.spyOn(console, "log").mockImplementation((...args) => {
    logs.push(args.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args) => {
    errors.push(args.map(String).join(" "));
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  await cleanupTmpDir(tmpDir);
});

describe("watchCommand", () => {
  it("bootstraps the interface list and watches the directory", async () => {
    const controller = new AbortController();
    const running = watchCommand([], { path: tmpDir, interval: "300" }, controller.signal);
    await new Promise((resolve) => setTimeout(resolve, 20));
    controller.abort();
    await running;

    expect(await readFile(join(tmpDir, "interfaces_to_mock"), "utf-8")).toBe(INTERFACE_LIST_TEMPLATE);
    expect(chokidarWatch).toHaveBeenCalledTimes(1);
    const [paths, options] = chokidarWatch.mock.calls[0];
    expect(paths).toEqual([tmpDir]);
    expect(options.interval).toBe(300);
    expect(options.depth).toBe(0);
    expect(logs).toContain("  Poll interval: 300ms");
    expect(watcher.close).toHaveBeenCalledTimes(1);
  });

  it("takes the poll interval from the config file", async () => {
    await createFile(tmpDir, ".mockwright.yaml", "watch_interval: 750\n");
    const controller = new AbortController();
    controller.abort();
    await watchCommand(["."], { path: tmpDir, recursive: true }, controller.signal);

    expect(logs).toContain("  Poll interval: 750ms");
    expect(logs).toContain(`  Watching ${tmpDir} (recursive)`);
  });

  it("rejects a bad interval", async () => {
    await watchCommand([], { path: tmpDir, interval: "soon" });

    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("--interval must be a positive number of milliseconds");
    expect(process.exitCode).toBe(1);
    expect(chokidarWatch).not.toHaveBeenCalled();
  });

  it("reports an invalid config file", async () => {
    await createFile(tmpDir, ".mockwright.yaml", "watch_interval: fast\n");
    await watchCommand([], { path: tmpDir });

    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("Invalid config");
    expect(process.exitCode).toBe(1);
  });
});
