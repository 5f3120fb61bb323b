import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Project, ts } from "ts-morph";
import { resolveDestination } from "../../src/core/destination.js";
import { runGeneration } from "../../src/core/pipeline.js";
import { STORE_SOURCE, WIDGET_SOURCE, cleanupTmpDir, createFile, createTmpDir } from "../helpers.js";

const appRoot = fileURLToPath(new URL("../../", import.meta.url));
const runtimeModule = join(appRoot, "src", "runtime", "index.js");

const BUS_SOURCE = `export interface Bus {
  on<E>(handler: (event: E) => void): void;
  emit<E>(name: string, event: E): boolean;
  collect<T, U>(items: T[], fn: (item: T) => U): U[];
  first<T>(...items: T[]): T | undefined;
}
`;

let dir: string;

beforeEach(async () => {
  dir = await createTmpDir();
  await createFile(dir, "package.json", '{ "type": "module" }\n');
  await createFile(dir, "widget.ts", WIDGET_SOURCE);
  await createFile(dir, "store.ts", STORE_SOURCE.replace('from "./widget"', 'from "./widget.js"'));
  await createFile(dir, "bus.ts", BUS_SOURCE);
});

afterEach(async () => {
  await cleanupTmpDir(dir);
});

/** Type-check the written file and everything it imports; returns formatted diagnostics. */
function typeCheck(path: string): string {
  const project = new Project({
    compilerOptions: {
      strict: true,
      noEmit: true,
      skipLibCheck: true,
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.NodeNext,
      moduleResolution: ts.ModuleResolutionKind.NodeNext,
      types: ["node"],
      typeRoots: [join(appRoot, "node_modules", "@types")],
    },
  });
  project.addSourceFileAtPath(path);
  project.resolveSourceFileDependencies();
  return project.formatDiagnosticsWithColorAndContext(project.getPreEmitDiagnostics());
}

async function generate(file: string, interfaceName: string): Promise<string> {
  const result = await runGeneration({
    cwd: dir,
    spec: { kind: "file", filePath: join(dir, file), interfaceName },
    backend: "syntactic",
    destination: resolveDestination({ outputDir: "mocks" }, dir),
    runtimeModule,
    importExtension: ".js",
    generateMatchers: false,
    log: () => {},
  });
  return result.written[0];
}

describe("generated mocks type-check", () => {
  it("for an interface with properties, inherited methods and tuples", async () => {
    expect(typeCheck(await generate("store.ts", "Inventory"))).toBe("");
  });

  it("for generic methods whose type parameters reach callback inputs", async () => {
    const path = await generate("bus.ts", "Bus");
    expect(typeCheck(path)).toBe("");
  });
});
