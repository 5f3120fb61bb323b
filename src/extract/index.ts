import type { Project } from "ts-morph";
import { ReflectiveModelBuilder } from "./reflective.js";
import { SyntacticModelBuilder } from "./syntactic.js";
import type { BackendName, ModelBuilder, SourceSpec } from "./types.js";

export type { BackendName, ModelBuilder, SourceSpec } from "./types.js";
export { ReflectiveModelBuilder } from "./reflective.js";
export { SyntacticModelBuilder } from "./syntactic.js";

/** Single source files always go through the syntactic backend. */
export function backendFor(spec: SourceSpec, useSyntactic: boolean): BackendName {
  return spec.kind === "file" || useSyntactic ? "syntactic" : "reflective";
}

export function createModelBuilder(backend: BackendName, cwd: string, project?: Project): ModelBuilder {
  return backend === "syntactic" ? new SyntacticModelBuilder(cwd, project) : new ReflectiveModelBuilder(cwd, project);
}
