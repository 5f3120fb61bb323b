import type { Project } from "ts-morph";
import { createModelBuilder } from "../extract/index.js";
import type { BackendName, SourceSpec } from "../extract/types.js";
import { generateMatchers, matcherCandidates } from "../generator/matchers.js";
import { generateMock } from "../generator/mock.js";
import { mockFileNames } from "../generator/naming.js";
import type { ImportExtension } from "../generator/imports.js";
import type { GeneratedArtifact, InterfaceModel, MatcherArtifact } from "../model/types.js";
import { destinationPathFor, type Destination } from "./destination.js";
import { GenerationError } from "./errors.js";
import { toYaml, writeArtifact } from "./writer.js";

export interface GenerationRequest {
  /** Directory module specifiers and relative paths resolve against */
  cwd: string;
  spec: SourceSpec;
  backend: BackendName;
  destination: Destination;
  selfPackagePath?: string;
  runtimeModule: string;
  importExtension: ImportExtension;
  generateMatchers: boolean;
  /** Print the extracted models as YAML */
  debug?: boolean;
  /** Reuse a ts-morph project across runs */
  project?: Project;
  log?: (line: string) => void;
}

export interface GenerationResult {
  models: InterfaceModel[];
  artifacts: GeneratedArtifact[];
  matchers: MatcherArtifact[];
  /** Files whose content changed, in write order */
  written: string[];
  /** Files already holding the generated content */
  unchanged: string[];
  /** Source files the extraction read */
  sources: string[];
}

/**
 * Extract, render every mock and matcher in memory, then write. Any error
 * before the write phase leaves the filesystem untouched.
 */
export async function runGeneration(request: GenerationRequest): Promise<GenerationResult> {
  const log = request.log ?? ((line: string) => console.log(line));

  const builder = createModelBuilder(request.backend, request.cwd, request.project);
  const models = builder.extract(request.spec);

  if (request.debug) {
    log(toYaml({ backend: builder.backend, models }));
  }

  const fileNames = mockFileNames(models.map((model) => model.interfaceName));
  const artifacts = models.map((model, i) =>
    generateMock(model, {
      packageName: request.destination.packageName,
      destinationPath: destinationPathFor(request.destination, model.interfaceName, fileNames[i]),
      selfPackagePath: request.selfPackagePath,
      runtimeModule: request.runtimeModule,
      importExtension: request.importExtension,
    }),
  );

  const matchers = request.generateMatchers
    ? generateMatchers(matcherCandidates(artifacts), {
        matchersDir: request.destination.matchersDir,
        runtimeModule: request.runtimeModule,
        importExtension: request.importExtension,
        selfPackagePath: request.selfPackagePath,
      })
    : [];

  const files = [...artifacts, ...matchers];
  const seen = new Set<string>();
  for (const file of files) {
    if (seen.has(file.destinationPath)) {
      throw new GenerationError(`Two generated files would be written to ${file.destinationPath}`, file.destinationPath);
    }
    seen.add(file.destinationPath);
  }

  const written: string[] = [];
  const unchanged: string[] = [];
  for (const file of files) {
    const outcome = await writeArtifact(file.destinationPath, file.sourceText);
    (outcome === "written" ? written : unchanged).push(file.destinationPath);
  }

  return { models, artifacts, matchers, written, unchanged, sources: builder.sourceFiles() };
}
