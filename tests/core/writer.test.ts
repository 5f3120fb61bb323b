import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { InvalidConfigError, readConfig, toYaml, writeArtifact } from "../../src/core/writer.js";
import { loadSettings } from "../../src/utils/config.js";
import { cleanupTmpDir, createFile, createTmpDir } from "../helpers.js";

let dir: string;

beforeEach(async () => {
  dir = await createTmpDir();
});

afterEach(async () => {
  await cleanupTmpDir(dir);
});

describe("readConfig", () => {
  it("returns null when there is no config file", async () => {
    expect(await readConfig(dir)).toBeNull();
  });

  it("parses a valid config", async () => {
    await createFile(dir, ".mockwright.yaml", 'runtime_module: "@acme/mocks"\nimport_extension: ""\ngenerate_matchers: true\n');
    expect(await readConfig(dir)).toEqual({ runtime_module: "@acme/mocks", import_extension: "", generate_matchers: true });
  });

  it("treats an empty file as all defaults", async () => {
    await createFile(dir, ".mockwright.yaml", "");
    expect(await readConfig(dir)).toEqual({});
  });

  it("rejects unknown keys and bad values", async () => {
    await createFile(dir, ".mockwright.yaml", "watch_interval: -5\n");
    await expect(readConfig(dir)).rejects.toThrow(InvalidConfigError);

    await createFile(dir, ".mockwright.yaml", "provider: openai\n");
    await expect(readConfig(dir)).rejects.toThrow(`Invalid config ${join(dir, ".mockwright.yaml")}`);
  });

  it("rejects malformed YAML", async () => {
    await createFile(dir, ".mockwright.yaml", "runtime_module: [unclosed\n");
    await expect(readConfig(dir)).rejects.toThrow(InvalidConfigError);
  });
});

describe("loadSettings", () => {
  it("fills in defaults", async () => {
    expect(await loadSettings(dir)).toEqual({
      runtimeModule: "mockwright/runtime",
      importExtension: ".js",
      matchersDir: undefined,
      generateMatchers: false,
      watchIntervalMs: 2000,
    });
  });

  it("applies config values", async () => {
    await createFile(dir, ".mockwright.yaml", "matchers_dir: argmatchers\nwatch_interval: 500\n");
    const settings = await loadSettings(dir);
    expect(settings.matchersDir).toBe("argmatchers");
    expect(settings.watchIntervalMs).toBe(500);
  });
});

describe("writeArtifact", () => {
  it("creates directories and writes the file", async () => {
    const path = join(dir, "nested", "deeper", "a.mock.ts");
    expect(await writeArtifact(path, "content\n")).toBe("written");
    expect(await readFile(path, "utf-8")).toBe("content\n");
    expect(await readdir(join(dir, "nested", "deeper"))).toEqual(["a.mock.ts"]);
  });

  it("leaves identical content alone", async () => {
    const path = join(dir, "a.mock.ts");
    await writeArtifact(path, "same\n");
    expect(await writeArtifact(path, "same\n")).toBe("unchanged");
    expect(await writeArtifact(path, "different\n")).toBe("written");
    expect(await readFile(path, "utf-8")).toBe("different\n");
  });
});

describe("toYaml", () => {
  it("renders plain YAML", () => {
    expect(toYaml({ name: "Inventory", methods: ["find"] })).toBe("name: Inventory\nmethods:\n  - find\n");
  });
});
