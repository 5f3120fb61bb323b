import { ModuleDeclarationKind, Node, ts, type Program, type SourceFile, type Symbol as MorphSymbol } from "ts-morph";
import { ExtractionError } from "../core/errors.js";
import { named, primitive } from "../model/type-ref.js";
import type { TypeRef } from "../model/types.js";

/** Where a declaration can be imported from, and under which name. */
export interface DeclarationOrigin {
  readonly name: string;
  readonly packagePath: string;
}

const SOURCE_EXTENSION = /(\.d)?\.(ts|tsx|mts|cts|js|jsx|mjs|cjs)$/;

function packageNameFromPath(filePath: string): string {
  const marker = "/node_modules/";
  const rest = filePath.slice(filePath.lastIndexOf(marker) + marker.length).split("/");
  if (rest[0] === "@types" && rest.length > 1) {
    const typed = rest[1];
    return typed.includes("__") ? `@${typed.replace("__", "/")}` : typed;
  }
  return rest[0].startsWith("@") && rest.length > 1 ? `${rest[0]}/${rest[1]}` : rest[0];
}

/**
 * Module path of a source file: "" for the default lib and global scripts,
 * the package name inside node_modules, the extensionless absolute path
 * otherwise.
 */
export function packagePathOf(sourceFile: SourceFile, program: Program): string {
  const compiled = sourceFile.compilerNode;
  if (program.compilerObject.isSourceFileDefaultLibrary(compiled)) return "";
  if (!ts.isExternalModule(compiled)) return "";

  const filePath = sourceFile.getFilePath();
  if (filePath.includes("/node_modules/")) return packageNameFromPath(filePath);
  return filePath.replace(SOURCE_EXTENSION, "");
}

function exportedNameOf(sourceFile: SourceFile, declaration: Node, localName: string): string | undefined {
  const matches = (decls: readonly Node[]) => decls.some((d) => d.compilerNode === declaration.compilerNode);
  const exported = sourceFile.getExportedDeclarations();

  const local = exported.get(localName);
  if (local && matches(local)) return localName;
  for (const [name, decls] of exported) {
    if (matches(decls)) return name;
  }
  return undefined;
}

/**
 * Work out how a declared type is referenced from another module: enum
 * members and namespace members get a dotted name, `declare module "x"`
 * blocks become package "x", global augmentations become "".
 */
export function originOf(symbol: MorphSymbol, program: Program, owner: string): DeclarationOrigin {
  const declaration = symbol.getDeclarations()[0];
  if (!declaration) {
    throw new ExtractionError(`Type ${symbol.getName()} used by ${owner} has no declaration`, owner);
  }

  const names = [symbol.getName()];
  let top: Node = declaration;
  let node = declaration.getParent();

  while (node && !Node.isSourceFile(node)) {
    if (Node.isModuleDeclaration(node)) {
      if (node.getDeclarationKind() === ModuleDeclarationKind.Global) {
        return { name: names.join("."), packagePath: "" };
      }
      const moduleName = node.compilerNode.name;
      if (ts.isStringLiteral(moduleName)) {
        return { name: names.join("."), packagePath: moduleName.text };
      }
      names.unshift(moduleName.text);
      top = node;
    } else if (Node.isEnumDeclaration(node)) {
      names.unshift(node.getName());
      top = node;
    }
    node = node.getParent();
  }

  const sourceFile = declaration.getSourceFile();
  const packagePath = packagePathOf(sourceFile, program);
  if (packagePath === "") return { name: names.join("."), packagePath };

  const exported = exportedNameOf(sourceFile, top, names[0]);
  if (exported === undefined) {
    throw new ExtractionError(
      `Type ${names.join(".")} used by ${owner} is not exported from ${sourceFile.getFilePath()}`,
      owner,
    );
  }
  if (exported === "default") {
    throw new ExtractionError(`Default-exported type ${names.join(".")} used by ${owner} cannot be imported by name`, owner);
  }
  names[0] = exported;
  return { name: names.join("."), packagePath };
}

/** Map a global generic such as `Array<T>` or `Record<K, V>` onto its structural ref. */
export function globalContainer(name: string, args: readonly TypeRef[]): TypeRef | undefined {
  const first = args[0] ?? primitive("unknown");
  const second = args[1] ?? primitive("unknown");
  switch (name) {
    case "Array":
      return { kind: "array", element: first, readonly: false };
    case "ReadonlyArray":
      return { kind: "array", element: first, readonly: true };
    case "Map":
    case "ReadonlyMap":
    case "Record":
      return { kind: "map", key: first, value: second, style: name };
    case "Set":
      return { kind: "set", element: first, readonly: false };
    case "ReadonlySet":
      return { kind: "set", element: first, readonly: true };
    case "Promise":
      return { kind: "promise", inner: first };
    case "AsyncIterable":
      return { kind: "asyncIterable", element: first };
    default:
      return undefined;
  }
}

/** A reference to a declared type, with globals mapped through `globalContainer`. */
export function declaredRef(origin: DeclarationOrigin, args: readonly TypeRef[]): TypeRef {
  if (origin.packagePath === "") {
    return globalContainer(origin.name, args) ?? named(origin.name, "", args);
  }
  return named(origin.name, origin.packagePath, args);
}

/** `void` returns nothing, a mutable tuple of two or more returns several results. */
export function splitResults(ref: TypeRef): TypeRef[] {
  if (ref.kind === "primitive" && ref.name === "void") return [];
  if (ref.kind === "tuple" && !ref.readonly && ref.elements.length >= 2) return [...ref.elements];
  return [ref];
}

export const KEYWORD_PRIMITIVES = new Map<ts.SyntaxKind, TypeRef>([
  [ts.SyntaxKind.StringKeyword, primitive("string")],
  [ts.SyntaxKind.NumberKeyword, primitive("number")],
  [ts.SyntaxKind.BooleanKeyword, primitive("boolean")],
  [ts.SyntaxKind.BigIntKeyword, primitive("bigint")],
  [ts.SyntaxKind.SymbolKeyword, primitive("symbol")],
  [ts.SyntaxKind.UndefinedKeyword, primitive("undefined")],
  [ts.SyntaxKind.VoidKeyword, primitive("void")],
  [ts.SyntaxKind.UnknownKeyword, primitive("unknown")],
  [ts.SyntaxKind.AnyKeyword, primitive("any")],
  [ts.SyntaxKind.NeverKeyword, primitive("never")],
  [ts.SyntaxKind.ObjectKeyword, primitive("object")],
]);
