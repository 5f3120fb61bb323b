import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { ExtractionError } from "../../src/core/errors.js";
import { ReflectiveModelBuilder, SyntacticModelBuilder, backendFor, createModelBuilder } from "../../src/extract/index.js";
import { named, primitive, union } from "../../src/model/type-ref.js";
import type { InterfaceModel, TypeRef } from "../../src/model/types.js";
import { cleanupTmpDir, createFile, createTmpDir, withoutParamNames, writeStoreFixture } from "../helpers.js";

let dir: string;

beforeEach(async () => {
  dir = await createTmpDir();
  await writeStoreFixture(dir);
});

afterEach(async () => {
  await cleanupTmpDir(dir);
});

function syntactic(file: string, interfaceName?: string): InterfaceModel[] {
  return new SyntacticModelBuilder(dir).extract({ kind: "file", filePath: join(dir, file), interfaceName });
}

function reflective(module: string, ...interfaceNames: string[]): InterfaceModel[] {
  return new ReflectiveModelBuilder(dir).extract({ kind: "package", packagePath: module, interfaceNames });
}

describe("SyntacticModelBuilder", () => {
  it("keeps declared parameter names and flattens bases with their type arguments", () => {
    const [model] = syntactic("store.ts", "Inventory");
    const widget = named("Widget", join(dir, "widget"));

    expect(model.interfaceName).toBe("Inventory");
    expect(model.sourcePackage).toBe(join(dir, "store"));
    expect(model.typeParameters).toEqual([]);
    expect(model.methods.map((m) => m.name)).toEqual(["add", "paint", "split", "search", "get", "list"]);

    const [add, paint, split, search, get, list] = model.methods;
    expect(add.params).toEqual([
      { name: "widget", type: widget, optional: false, variadic: false },
      { name: "tags", type: { kind: "array", element: primitive("string"), readonly: false }, optional: false, variadic: true },
    ]);
    expect(add.results).toEqual([]);
    expect(paint.params.map((p) => p.type)).toEqual([primitive("string"), named("Color", join(dir, "widget"))]);
    expect(paint.results).toEqual([primitive("boolean")]);
    expect(split.results).toEqual([widget, primitive("number")]);
    expect(search.params[0].type).toEqual(named("Filter", join(dir, "store")));
    expect(get.results).toEqual([{ kind: "promise", inner: union([widget, primitive("undefined")]) }]);
    expect(list.params).toEqual([{ name: "limit", type: primitive("number"), optional: true, variadic: false }]);
    expect(list.results).toEqual([{ kind: "array", element: widget, readonly: false }]);
  });

  it("records properties with their modifiers", () => {
    const [model] = syntactic("store.ts", "Inventory");
    expect(model.properties).toEqual([
      { name: "name", type: primitive("string"), optional: false, readonly: true },
      { name: "label", type: primitive("string"), optional: true, readonly: false },
    ]);
  });

  it("keeps interface type parameters", () => {
    const [model] = syntactic("store.ts", "Repo");
    const T: TypeRef = { kind: "typeParameter", name: "T" };
    expect(model.typeParameters).toEqual([{ name: "T" }]);
    expect(model.methods[0].results).toEqual([{ kind: "promise", inner: union([T, primitive("undefined")]) }]);
  });

  it("picks the only exported interface when none is named", async () => {
    await createFile(dir, "clock.ts", "export interface Clock {\n  now(): number;\n}\n");
    expect(syntactic("clock.ts").map((m) => m.interfaceName)).toEqual(["Clock"]);
  });

  it("asks for a name when a file exports several interfaces", () => {
    expect(() => syntactic("store.ts")).toThrow(
      `${join(dir, "store.ts")} exports 2 interfaces (Repo, Inventory); name the one to mock`,
    );
  });

  it("trusts imports from packages it cannot find", async () => {
    await createFile(
      dir,
      "scheduler.ts",
      'import type { Tick } from "tick-source";\n\nexport interface Scheduler {\n  at(tick: Tick): void;\n}\n',
    );
    const [model] = syntactic("scheduler.ts");
    expect(model.methods[0].params[0].type).toEqual(named("Tick", "tick-source"));
  });

  it("fails on unresolved relative imports", async () => {
    await createFile(
      dir,
      "haunted.ts",
      'import type { Ghost } from "./ghost";\n\nexport interface Haunted {\n  see(ghost: Ghost): void;\n}\n',
    );
    expect(() => syntactic("haunted.ts")).toThrow(ExtractionError);
    expect(() => syntactic("haunted.ts")).toThrow('Cannot resolve import "./ghost" for type Ghost used by Haunted');
  });

  it("fails for a missing source file", () => {
    expect(() => syntactic("absent.ts")).toThrow(`Source file not found: ${join(dir, "absent.ts")}`);
  });

  it("mocks one interface per run", () => {
    const builder = new SyntacticModelBuilder(dir);
    expect(() => builder.extract({ kind: "package", packagePath: "./store", interfaceNames: ["Repo", "Inventory"] })).toThrow(
      "The syntactic backend mocks one interface per run, got 2",
    );
  });
});

describe("ReflectiveModelBuilder", () => {
  it("builds the same model as the syntactic backend apart from parameter names", () => {
    const [fromChecker] = reflective("./store", "Inventory");
    const [fromSource] = syntactic("store.ts", "Inventory");

    expect(fromChecker.methods[0].params.map((p) => p.name)).toEqual(["p0", "p1"]);
    expect(withoutParamNames(fromChecker)).toEqual(withoutParamNames(fromSource));
  });

  it("extracts several interfaces in request order, once each", () => {
    expect(reflective("./store", "Repo", "Inventory", "Repo").map((m) => m.interfaceName)).toEqual(["Repo", "Inventory"]);
  });

  it("rejects single files", () => {
    const builder = new ReflectiveModelBuilder(dir);
    expect(() => builder.extract({ kind: "file", filePath: join(dir, "store.ts") })).toThrow(ExtractionError);
  });

  it("reports missing interfaces and non-interfaces by name", () => {
    expect(() => reflective("./store", "Missing")).toThrow('Interface Missing not found in "./store"');
    expect(() => reflective("./store", "WidgetId")).toThrow('WidgetId in "./store" is not an interface');
  });

  it("reports modules it cannot resolve", () => {
    expect(() => reflective("./nowhere", "Thing")).toThrow(`Cannot resolve module "./nowhere" from ${dir}`);
  });
});

describe("conflicting members", () => {
  beforeEach(async () => {
    await createFile(
      dir,
      "conflict.ts",
      `export interface Runner {
  run(): void;
}

export interface Walker {
  run(): void;
}

export interface Both extends Runner, Walker {}

export interface Over {
  get(id: string): string;
  get(id: number): string;
}
`,
    );
  });

  it("rejects a member inherited from two bases", () => {
    const message = "Member run is declared by both Runner and Walker";
    expect(() => syntactic("conflict.ts", "Both")).toThrow(message);
    expect(() => reflective("./conflict", "Both")).toThrow(message);
  });

  it("rejects overloaded methods", () => {
    const message = "Over.get is overloaded; overloaded methods cannot be mocked";
    expect(() => syntactic("conflict.ts", "Over")).toThrow(message);
    expect(() => reflective("./conflict", "Over")).toThrow(message);
  });
});

describe("unsupported type syntax", () => {
  beforeEach(async () => {
    await createFile(
      dir,
      "syntax.ts",
      `import type { Widget } from "./widget";

export const DEFAULT_ROUTE = "/";
export type Key = keyof Widget;

export interface Picker {
  pick(key: keyof Widget): void;
}

export interface AliasPicker {
  pick(key: Key): void;
}

export interface Lookup {
  find(id: Widget["id"]): void;
}

export interface Router {
  route(path: typeof DEFAULT_ROUTE): void;
}

export interface Paths {
  open(path: \`/\${string}\`): void;
}
`,
    );
  });

  it.each([
    ["Picker", "keyof Widget"],
    ["AliasPicker", "keyof Widget"],
    ["Lookup", 'Widget["id"]'],
    ["Router", "typeof DEFAULT_ROUTE"],
    ["Paths", "`/${string}`"],
  ])("rejects %s in both backends", (name, text) => {
    const message = `Unsupported type \`${text}\` in ${name}`;
    expect(() => syntactic("syntax.ts", name)).toThrow(message);
    expect(() => reflective("./syntax", name)).toThrow(message);
  });
});

describe("backend selection", () => {
  it("uses the syntactic backend for files or when asked", () => {
    expect(backendFor({ kind: "file", filePath: "a.ts" }, false)).toBe("syntactic");
    expect(backendFor({ kind: "package", packagePath: "./a", interfaceNames: ["A"] }, true)).toBe("syntactic");
    expect(backendFor({ kind: "package", packagePath: "./a", interfaceNames: ["A"] }, false)).toBe("reflective");
  });

  it("creates the requested builder", () => {
    expect(createModelBuilder("syntactic", dir).backend).toBe("syntactic");
    expect(createModelBuilder("reflective", dir).backend).toBe("reflective");
  });
});
