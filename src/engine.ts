/**
 * Library entry point: build interface models, render mocks and matchers,
 * and run whole generation passes. Generated mocks import `mockwright/runtime`.
 */
export * from "./model/types.js";
export {
  primitive,
  named,
  literal,
  union,
  intersection,
  typeKey,
  isBuiltin,
  walkTypeRef,
  substitute,
} from "./model/type-ref.js";
export { validateModel } from "./model/validate.js";

export {
  backendFor,
  createModelBuilder,
  ReflectiveModelBuilder,
  SyntacticModelBuilder,
  type BackendName,
  type ModelBuilder,
  type SourceSpec,
} from "./extract/index.js";

export {
  generateMock,
  generateMatchers,
  matcherCandidates,
  GENERATED_MARKER,
  type GenerateOptions,
  type MatcherOptions,
  type ImportExtension,
} from "./generator/index.js";

export { runGeneration, type GenerationRequest, type GenerationResult } from "./core/pipeline.js";
export {
  parseSourceArgs,
  checkRequest,
  resolveDestination,
  destinationPathFor,
  type Destination,
  type DestinationFlags,
} from "./core/destination.js";
export { MockFileUpdater, type UpdaterOptions, type UpdateSummary } from "./core/updater.js";
export { MockWatcher, type MockWatcherOptions } from "./core/watcher.js";
export { removeMocks, type RemoveOptions, type RemoverIO } from "./core/remover.js";
export { ExtractionError, GenerationError, SignatureConstraintError, UsageError } from "./core/errors.js";
export { InvalidConfigError } from "./core/writer.js";
