import { join } from "node:path";
import { isBuiltin, mentionsTypeParameter, typeKey, walkTypeRef } from "../model/type-ref.js";
import type { GeneratedArtifact, MatcherArtifact, NamedRef, TypeRef } from "../model/types.js";
import { ImportContext, compare, type ImportExtension } from "./imports.js";
import { GENERATED_MARKER, RUNTIME_NAMESPACE, kebabCase, lowerFirst, sanitizeIdentifier, upperFirst } from "./naming.js";
import { TypeRenderer } from "./render.js";

export interface MatcherOptions {
  /** Absolute directory the matcher files are written to */
  matchersDir: string;
  runtimeModule: string;
  importExtension: ImportExtension;
  selfPackagePath?: string;
}

const and = (parts: string[]) => parts.join("And");

/** Identifier describing a type's shape: `Widget`, `ArrayOfWidget`, `MapOfStringToWidget`. */
export function matcherIdentifier(ref: TypeRef): string {
  switch (ref.kind) {
    case "primitive":
      return upperFirst(ref.name);
    case "literal": {
      const cleaned = ref.text.replace(/[^A-Za-z\d]+/g, " ").trim();
      return cleaned === "" ? "Literal" : `Literal${cleaned.split(" ").map(upperFirst).join("")}`;
    }
    case "named": {
      const base = ref.name.split(".").map((part) => upperFirst(sanitizeIdentifier(part))).join("");
      return ref.typeArgs.length > 0 ? `${base}Of${and(ref.typeArgs.map(matcherIdentifier))}` : base;
    }
    case "typeParameter":
      return upperFirst(ref.name);
    case "array":
      return `${ref.readonly ? "ReadonlyArray" : "Array"}Of${matcherIdentifier(ref.element)}`;
    case "tuple":
      return `${ref.readonly ? "Readonly" : ""}TupleOf${and(ref.elements.map(matcherIdentifier))}`;
    case "map":
      return `${ref.style}Of${matcherIdentifier(ref.key)}To${matcherIdentifier(ref.value)}`;
    case "set":
      return `${ref.readonly ? "ReadonlySet" : "Set"}Of${matcherIdentifier(ref.element)}`;
    case "promise":
      return `PromiseOf${matcherIdentifier(ref.inner)}`;
    case "asyncIterable":
      return `AsyncIterableOf${matcherIdentifier(ref.element)}`;
    case "function": {
      const from = ref.params.length > 0 ? `From${and(ref.params.map((p) => matcherIdentifier(p.type)))}` : "";
      const to = ref.results.length > 0 ? `To${and(ref.results.map(matcherIdentifier))}` : "";
      return `Func${from}${to}`;
    }
    case "union":
      return ref.members.map(matcherIdentifier).join("Or");
    case "intersection":
      return and(ref.members.map(matcherIdentifier));
    case "object":
      return ref.members.length > 0 ? `ObjectWith${and(ref.members.map((m) => upperFirst(sanitizeIdentifier(m.name))))}` : "Object";
  }
}

/**
 * Parameter types worth a matcher: those mentioning a non-global named type
 * and no type parameter. Deduplicated across artifacts, in key order.
 */
export function matcherCandidates(artifacts: readonly GeneratedArtifact[]): TypeRef[] {
  const byKey = new Map<string, TypeRef>();
  for (const artifact of artifacts) {
    for (const ref of artifact.referencedTypes) {
      if (isBuiltin(ref) || mentionsTypeParameter(ref)) continue;
      byKey.set(typeKey(ref), ref);
    }
  }
  return [...byKey.keys()].sort(compare).flatMap((key) => {
    const ref = byKey.get(key);
    return ref ? [ref] : [];
  });
}

function renderMatcher(ref: TypeRef, identifier: string, options: MatcherOptions): string {
  const fnNames = {
    any: `any${identifier}`,
    eq: `eq${identifier}`,
    notEq: `notEq${identifier}`,
    that: `${lowerFirst(identifier)}That`,
  };
  const imports = new ImportContext({
    fromDir: options.matchersDir,
    selfPackagePath: options.selfPackagePath,
    importExtension: options.importExtension,
    reserved: new Set([RUNTIME_NAMESPACE, ...Object.values(fnNames)]),
  });
  const refs: NamedRef[] = [];
  walkTypeRef(ref, (r) => {
    if (r.kind === "named") refs.push(r);
  });
  imports.register(refs);

  const type = new TypeRenderer(imports).render(ref);
  const ns = RUNTIME_NAMESPACE;
  const matcher = `${ns}.ArgMatcher<${type}>`;

  return [
    GENERATED_MARKER,
    "",
    `/** Argument matchers for \`${type}\`. */`,
    `import * as ${ns} from "${options.runtimeModule}";`,
    ...imports.lines(),
    "",
    `export function ${fnNames.any}(): ${matcher} {`,
    `  return ${ns}.any<${type}>(${JSON.stringify(type)});`,
    "}",
    "",
    `export function ${fnNames.eq}(value: ${type}): ${matcher} {`,
    `  return ${ns}.eq(value);`,
    "}",
    "",
    `export function ${fnNames.notEq}(value: ${type}): ${matcher} {`,
    `  return ${ns}.notEq(value);`,
    "}",
    "",
    `export function ${fnNames.that}(predicate: (value: ${type}) => boolean): ${matcher} {`,
    `  return ${ns}.argThat(predicate, ${JSON.stringify(`${fnNames.that}(<predicate>)`)});`,
    "}",
    "",
  ].join("\n");
}

/**
 * One matcher file per distinct type. Identifiers that clash, or whose file
 * names clash (`HTTPClient`, `HttpClient`), get numeric suffixes
 * (`Widget`, `Widget2`) in key order.
 */
export function generateMatchers(types: readonly TypeRef[], options: MatcherOptions): MatcherArtifact[] {
  const used = new Set<string>();
  const fileNames = new Set<string>();
  const sorted = [...types].sort((a, b) => compare(typeKey(a), typeKey(b)));
  const seen = new Set<string>();

  return sorted.flatMap((ref) => {
    const key = typeKey(ref);
    if (seen.has(key)) return [];
    seen.add(key);

    const base = matcherIdentifier(ref);
    let identifier = base;
    for (let n = 2; used.has(identifier) || fileNames.has(kebabCase(identifier)); n++) identifier = `${base}${n}`;
    used.add(identifier);
    fileNames.add(kebabCase(identifier));

    const destinationPath = join(options.matchersDir, `${kebabCase(identifier)}.ts`);
    return [{ typeRef: ref, identifier, destinationPath, sourceText: renderMatcher(ref, identifier, options) }];
  });
}
