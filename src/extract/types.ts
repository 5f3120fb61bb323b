import type { InterfaceModel } from "../model/types.js";

/** What to extract: interfaces of a module, or the interface of one source file. */
export type SourceSpec =
  | { kind: "package"; packagePath: string; interfaceNames: string[] }
  | { kind: "file"; filePath: string; interfaceName?: string };

export type BackendName = "reflective" | "syntactic";

/**
 * Builds InterfaceModels. Both backends honour the same output contract and
 * differ only in where parameter names come from.
 */
export interface ModelBuilder {
  readonly backend: BackendName;
  /** @throws ExtractionError */
  extract(spec: SourceSpec): InterfaceModel[];
  /** Source files read by the extractions so far. */
  sourceFiles(): string[];
}
