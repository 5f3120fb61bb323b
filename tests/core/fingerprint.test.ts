import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { checkFreshness, computeFingerprint, isGeneratedSource } from "../../src/core/fingerprint.js";
import { findGeneratedFiles, listDirectories } from "../../src/core/scanner.js";
import { GENERATED_MARKER } from "../../src/generator/naming.js";
import { cleanupTmpDir, createFile, createNestedFile, createTmpDir } from "../helpers.js";

let dir: string;

beforeEach(async () => {
  dir = await createTmpDir();
});

afterEach(async () => {
  await cleanupTmpDir(dir);
});

const generated = `${GENERATED_MARKER}\nexport class MockA {}\n`;

describe("isGeneratedSource", () => {
  it("checks the first line only", () => {
    expect(isGeneratedSource(generated)).toBe(true);
    expect(isGeneratedSource(`${GENERATED_MARKER}\r\nexport {};\n`)).toBe(true);
    expect(isGeneratedSource(`// header\n${GENERATED_MARKER}\n`)).toBe(false);
    expect(isGeneratedSource("")).toBe(false);
  });
});

describe("computeFingerprint", () => {
  it("is an 8 character hex digest", async () => {
    await createFile(dir, "a.ts", "export interface A {}\n");
    expect(await computeFingerprint(dir)).toMatch(/^[0-9a-f]{8}$/);
  });

  it("changes with sources and the interface list", async () => {
    await createFile(dir, "a.ts", "export interface A {}\n");
    const before = await computeFingerprint(dir);

    await createFile(dir, "interfaces_to_mock", "./a.ts\n");
    const withList = await computeFingerprint(dir);
    expect(withList).not.toBe(before);

    await createFile(dir, "a.ts", "export interface A { x(): void }\n");
    expect(await computeFingerprint(dir)).not.toBe(withList);
  });

  it("ignores generated files, other extensions and subdirectories", async () => {
    await createFile(dir, "a.ts", "export interface A {}\n");
    const before = await computeFingerprint(dir);

    await createFile(dir, "a.mock.ts", generated);
    await createFile(dir, "notes.md", "# notes\n");
    await createNestedFile(dir, "sub/b.ts", "export interface B {}\n");
    expect(await computeFingerprint(dir)).toBe(before);
  });
  it("covers extra source files outside the directory", async () => {
    await createNestedFile(dir, "app/a.ts", "export interface A {}\n");
    await createNestedFile(dir, "services/index.ts", "export interface Mailer {}\n");
    const app = join(dir, "app");
    const extra = [join(dir, "services", "index.ts"), join(app, "a.ts")];
    const before = await computeFingerprint(app, extra);
    expect(before).not.toBe(await computeFingerprint(app));

    await createNestedFile(dir, "services/index.ts", "export interface Mailer { send(): void }\n");
    const edited = await computeFingerprint(app, extra);
    expect(edited).not.toBe(before);

    await createNestedFile(dir, "services/index.ts", generated);
    expect(await computeFingerprint(app, extra)).toBe(await computeFingerprint(app));
  });

  it("records a missing extra file", async () => {
    await createFile(dir, "a.ts", "export interface A {}\n");
    const gone = join(dir, "..", "gone", "x.ts");
    expect(await computeFingerprint(dir, [gone])).not.toBe(await computeFingerprint(dir));
  });
});

describe("checkFreshness", () => {
  it("reports missing, fresh and stale", async () => {
    await createFile(dir, "a.ts", "export interface A {}\n");
    const first = await checkFreshness(dir, undefined);
    expect(first.state).toBe("missing");

    expect((await checkFreshness(dir, first.computed)).state).toBe("fresh");
    expect(await checkFreshness(dir, "00000000")).toEqual({ state: "stale", computed: first.computed });
  });
});

describe("listDirectories", () => {
  it("lists only the root unless recursive", async () => {
    await createNestedFile(dir, "b/x.ts");
    expect(await listDirectories(dir, false)).toEqual([dir]);
  });

  it("walks parents before children and skips ignored directories", async () => {
    await createNestedFile(dir, "b/inner/x.ts");
    await createNestedFile(dir, "a/x.ts");
    await createNestedFile(dir, "node_modules/pkg/x.ts");
    await createNestedFile(dir, ".cache/x.ts");
    await createNestedFile(dir, "dist/x.ts");

    expect(await listDirectories(dir, true)).toEqual([dir, join(dir, "a"), join(dir, "b"), join(dir, "b", "inner")]);
  });
});

describe("findGeneratedFiles", () => {
  it("finds marked .ts files in order", async () => {
    await createFile(dir, "z.mock.ts", generated);
    await createFile(dir, "a.mock.ts", generated);
    await createFile(dir, "store.ts", "export interface Store {}\n");
    await createNestedFile(dir, "sub/b.mock.ts", generated);

    expect(await findGeneratedFiles(dir, false)).toEqual([join(dir, "a.mock.ts"), join(dir, "z.mock.ts")]);
    expect(await findGeneratedFiles(dir, true)).toEqual([
      join(dir, "a.mock.ts"),
      join(dir, "z.mock.ts"),
      join(dir, "sub", "b.mock.ts"),
    ]);
  });
});
