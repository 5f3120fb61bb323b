import { dirname } from "node:path";
import { mentionsTypeParameter, named, typeKey, walkSignature, walkTypeRef, widensToUnknown } from "../model/type-ref.js";
import type { GeneratedArtifact, InterfaceModel, MethodSignature, NamedRef, TypeRef } from "../model/types.js";
import { validateModel } from "../model/validate.js";
import { ImportContext, compare, type ImportExtension } from "./imports.js";
import { GENERATED_MARKER, RUNTIME_NAMESPACE, mockNames, propertyKey, sanitizeIdentifier } from "./naming.js";
import { TypeRenderer } from "./render.js";
import { ZeroValues } from "./zero.js";

export interface GenerateOptions {
  /** Written as the `@module` tag of the file header */
  packageName: string;
  /** Absolute path the mock will be written to; imports are relative to it */
  destinationPath: string;
  /** Module whose types are referenced without importing them */
  selfPackagePath?: string;
  /** Specifier the generated file imports the runtime from */
  runtimeModule: string;
  importExtension: ImportExtension;
}

/** Every named type a model mentions, in declaration order. */
export function namedRefsOf(model: InterfaceModel): NamedRef[] {
  const found: NamedRef[] = [];
  const visit = (ref: TypeRef) => {
    if (ref.kind === "named") found.push(ref);
  };
  walkSignature({ typeParameters: model.typeParameters, params: [], results: [] }, visit);
  model.methods.forEach((method) => walkSignature(method, visit));
  model.properties.forEach((property) => walkTypeRef(property.type, visit));
  return found;
}

/** Distinct parameter types across all methods, in key order. */
export function referencedTypesOf(model: InterfaceModel): TypeRef[] {
  const byKey = new Map<string, TypeRef>();
  for (const method of model.methods) {
    for (const param of method.params) byKey.set(typeKey(param.type), param.type);
  }
  return [...byKey.keys()].sort(compare).flatMap((key) => {
    const ref = byKey.get(key);
    return ref ? [ref] : [];
  });
}

function privateFields(methods: readonly MethodSignature[]): Map<string, string> {
  const fields = new Map<string, string>();
  const used = new Set<string>();
  for (const method of methods) {
    const base = sanitizeIdentifier(method.name);
    let field = base;
    for (let n = 2; used.has(field); n++) field = `${base}_${n}`;
    used.add(field);
    fields.set(method.name, `#${field}`);
  }
  return fields;
}

interface MethodParts {
  readonly key: string;
  readonly field: string;
  /** Recorded argument tuple, method type parameters erased */
  readonly args: string;
  readonly result: string;
  readonly method: MethodSignature;
}

/**
 * Render the mock class, stubber and verifier interfaces for one interface.
 *
 * @throws SignatureConstraintError for malformed signatures
 * @throws GenerationError when a type cannot be imported into the destination
 */
export function generateMock(model: InterfaceModel, options: GenerateOptions): GeneratedArtifact {
  validateModel(model);

  const names = mockNames(model.interfaceName);
  const reserved = new Set([
    RUNTIME_NAMESPACE,
    names.mock,
    names.stubber,
    names.verifier,
    ...model.typeParameters.map((tp) => tp.name),
    ...model.methods.flatMap((m) => m.typeParameters.map((tp) => tp.name)),
  ]);
  const imports = new ImportContext({
    fromDir: dirname(options.destinationPath),
    selfPackagePath: options.selfPackagePath,
    importExtension: options.importExtension,
    reserved,
  });
  const interfaceRef = named(model.interfaceName, model.sourcePackage);
  imports.register(namedRefsOf(model), interfaceRef);

  const types = new TypeRenderer(imports);
  const zeros = new ZeroValues(types);
  const fields = privateFields(model.methods);

  const typeArgs = types.typeArguments(model.typeParameters);
  const typeParams = types.typeParameters(model.typeParameters);
  const stubber = `${names.stubber}${typeArgs}`;
  const verifier = `${names.verifier}${typeArgs}`;
  const ns = RUNTIME_NAMESPACE;

  const methods: MethodParts[] = model.methods.map((method) => {
    const erased = new Set(method.typeParameters.map((tp) => tp.name));
    return {
      key: propertyKey(method.name),
      field: fields.get(method.name) ?? `#${sanitizeIdentifier(method.name)}`,
      args: types.argsTuple(method.params, erased),
      result: types.results(method.results, erased),
      method,
    };
  });

  const isSelf = options.selfPackagePath !== undefined && model.sourcePackage === options.selfPackagePath;
  const origin = model.sourcePackage === "" || isSelf ? "" : ` from "${imports.specifierFor(model.sourcePackage)}"`;

  const out: string[] = [
    GENERATED_MARKER,
    "",
    "/**",
    ` * Mock of \`${model.interfaceName}\`${origin}.`,
    " *",
    ` * @module ${options.packageName}`,
    " */",
    `import * as ${ns} from "${options.runtimeModule}";`,
    ...imports.lines(),
    "",
    `export class ${names.mock}${typeParams} implements ${imports.reference(interfaceRef)}${typeArgs}, ${ns}.Mocked<${stubber}, ${verifier}> {`,
    `  readonly [${ns}.control]: ${ns}.MockControl<${stubber}, ${verifier}>;`,
  ];

  for (const property of model.properties) {
    const type = types.render(property.type);
    out.push(
      property.optional
        ? `  ${propertyKey(property.name)}?: ${type};`
        : `  ${propertyKey(property.name)}: ${type} = ${zeros.of(property.type)};`,
    );
  }
  for (const m of methods) {
    out.push(`  readonly ${m.field}: ${ns}.MethodMock<${m.args}, ${m.result}>;`);
  }

  out.push("", `  constructor(options?: ${ns}.MockOptions) {`);
  out.push(`    const mock = new ${ns}.Mock(${JSON.stringify(model.interfaceName)}, options);`);
  for (const m of methods) {
    const erased = new Set(m.method.typeParameters.map((tp) => tp.name));
    const zero = zeros.ofResults(m.method.results, erased);
    const body = zero.startsWith("{") ? `(${zero})` : zero;
    out.push(`    this.${m.field} = mock.method<${m.args}, ${m.result}>(${JSON.stringify(m.method.name)}, () => ${body});`);
  }
  if (methods.length === 0) {
    out.push(`    this[${ns}.control] = mock.control<${stubber}, ${verifier}>({}, {});`);
  } else {
    out.push(`    this[${ns}.control] = mock.control<${stubber}, ${verifier}>(`, "      {");
    for (const m of methods) out.push(`        ${m.key}: (...args) => this.${m.field}.when(args),`);
    out.push("      },", "      {");
    for (const m of methods) out.push(`        ${m.key}: (...args) => this.${m.field}.verify(args),`);
    out.push("      },", "    );");
  }
  out.push("  }");

  for (const m of methods) {
    const { method } = m;
    const erased = new Set(method.typeParameters.map((tp) => tp.name));
    const declared = types.results(method.results);
    const recorded = method.params.every((p) => widensToUnknown(p.type, erased)) ? "" : ` as unknown as ${m.args}`;
    const call = `this.${m.field}.invoke([${method.params.map((p) => p.name).join(", ")}]${recorded})`;
    const cast = method.results.some((r) => mentionsTypeParameter(r, erased)) ? ` as ${declared}` : "";

    out.push(
      "",
      `  ${m.key}${types.typeParameters(method.typeParameters)}(${types.parameters(method.params)}): ${declared} {`,
      method.results.length === 0 ? `    ${call};` : `    return ${call}${cast};`,
      "  }",
    );
  }
  out.push("}");

  const argsOf = (m: MethodParts) => {
    if (m.method.params.length === 0) return "";
    const erased = new Set(m.method.typeParameters.map((tp) => tp.name));
    return `...args: [] | ${types.argsTuple(m.method.params, erased, (t) => `${ns}.Arg<${t}>`)}`;
  };

  out.push("", `export interface ${names.stubber}${typeParams} {`);
  for (const m of methods) out.push(`  ${m.key}(${argsOf(m)}): ${ns}.Stubbing<${m.args}, ${m.result}>;`);
  out.push("}", "", `export interface ${names.verifier}${typeParams} {`);
  for (const m of methods) out.push(`  ${m.key}(${argsOf(m)}): ${ns}.CallVerification<${m.args}>;`);
  out.push("}", "");

  return {
    interfaceName: model.interfaceName,
    destinationPath: options.destinationPath,
    packageName: options.packageName,
    sourceText: out.join("\n"),
    referencedTypes: referencedTypesOf(model),
  };
}
