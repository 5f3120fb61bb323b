export { generateMock, namedRefsOf, referencedTypesOf, type GenerateOptions } from "./mock.js";
export { generateMatchers, matcherCandidates, matcherIdentifier, type MatcherOptions } from "./matchers.js";
export { ImportContext, type ImportExtension } from "./imports.js";
export { GENERATED_MARKER, defaultMockFileName, kebabCase } from "./naming.js";
