import { mkdtemp, rm, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { InterfaceModel } from "../src/model/types.js";

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "mockwright-test-"));
}

export async function cleanupTmpDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function createFile(dirPath: string, name: string, content = ""): Promise<void> {
  await writeFile(join(dirPath, name), content);
}

export async function createNestedFile(basePath: string, relativePath: string, content = ""): Promise<void> {
  const fullPath = join(basePath, relativePath);
  const dir = fullPath.substring(0, fullPath.lastIndexOf("/"));
  await mkdir(dir, { recursive: true });
  await writeFile(fullPath, content);
}

/** Model with parameter names blanked, for comparing the two backends. */
export function withoutParamNames(model: InterfaceModel): InterfaceModel {
  return {
    ...model,
    methods: model.methods.map((method) => ({
      ...method,
      params: method.params.map((param) => ({ ...param, name: "" })),
    })),
  };
}

export const WIDGET_SOURCE = `export interface Widget {
  id: string;
}

export enum Color {
  Red = "red",
  Blue = "blue",
}
`;

export const STORE_SOURCE = `import type { Color, Widget } from "./widget";

export type WidgetId = string;
export type Filter = { tag: string };

export interface Repo<T> {
  get(id: string): Promise<T | undefined>;
  list(limit?: number): T[];
}

export interface Inventory extends Repo<Widget> {
  readonly name: string;
  label?: string;
  add(widget: Widget, ...tags: string[]): void;
  paint(id: WidgetId, color: Color): boolean;
  split(id: string): [Widget, number];
  search(filter: Filter): Widget[];
}
`;

/** Writes widget.ts and store.ts into `dir`. */
export async function writeStoreFixture(dir: string): Promise<void> {
  await createFile(dir, "widget.ts", WIDGET_SOURCE);
  await createFile(dir, "store.ts", STORE_SOURCE);
}
