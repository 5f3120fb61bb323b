import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { access, readFile } from "node:fs/promises";
import { join } from "node:path";
import { generateCommand } from "../../src/commands/generate.js";
import { cleanupTmpDir, createFile, createTmpDir, writeStoreFixture } from "../helpers.js";

let tmpDir: string;
let logs: string[];
let errors: string[];

beforeEach(async () => {
  tmpDir = await createTmpDir();
  await writeStoreFixture(tmpDir);
  logs = [];
  errors = [];
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

describe("generateCommand", () => {
  it("writes mocks for a module and reports them", async () => {
    const result = await generateCommand(["./store", "Inventory", "Repo"], { path: tmpDir, outputDir: "mocks" });

    expect(result?.written).toEqual([join(tmpDir, "mocks", "inventory.mock.ts"), join(tmpDir, "mocks", "repo.mock.ts")]);
    expect(logs.some((line) => line.includes(join("mocks", "inventory.mock.ts")))).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it("mocks the only interface of a file next to the working directory", async () => {
    await createFile(tmpDir, "clock.ts", "export interface Clock {\n  now(): number;\n}\n");
    await generateCommand(["clock.ts"], { path: tmpDir });

    const text = await readFile(join(tmpDir, "clock.mock.ts"), "utf-8");
    expect(text).toContain(`@module ${tmpDir.split("/").pop()}_test`);
    expect(text).toContain("  now(): number {");
  });

  it("marks unchanged files on a second run", async () => {
    await generateCommand(["./store", "Inventory"], { path: tmpDir, outputDir: "mocks" });
    logs = [];
    const result = await generateCommand(["./store", "Inventory"], { path: tmpDir, outputDir: "mocks" });

    expect(result?.written).toEqual([]);
    expect(logs.some((line) => line.includes("(unchanged)"))).toBe(true);
  });

  it("honours the config file", async () => {
    await createFile(tmpDir, ".mockwright.yaml", 'runtime_module: "@acme/doubles"\nimport_extension: ""\n');
    await generateCommand(["./store", "Repo"], { path: tmpDir, outputDir: "mocks" });

    const text = await readFile(join(tmpDir, "mocks", "repo.mock.ts"), "utf-8");
    expect(text).toContain('import * as mockwright from "@acme/doubles";');
    expect(text).toContain('import type { Repo } from "../store";');
  });

  it("reports usage errors without a stack trace", async () => {
    const result = await generateCommand(["./store", "Inventory", "Repo"], { path: tmpDir, output: "both.ts" });

    expect(result).toBeNull();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("--output needs exactly one interface");
    expect(process.exitCode).toBe(1);
  });

  it("reports extraction errors and writes nothing", async () => {
    const result = await generateCommand(["./store", "Missing"], { path: tmpDir, outputDir: "mocks" });

    expect(result).toBeNull();
    expect(errors).toHaveLength(1);
    expect(process.exitCode).toBe(1);
    await expect(access(join(tmpDir, "mocks"))).rejects.toThrow();
  });
});
