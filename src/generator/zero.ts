import type { PrimitiveName, TypeRef } from "../model/types.js";
import { propertyKey, RUNTIME_NAMESPACE } from "./naming.js";
import type { TypeRenderer } from "./render.js";

const PRIMITIVE_ZERO: Record<PrimitiveName, string | undefined> = {
  string: '""',
  number: "0",
  boolean: "false",
  bigint: "0n",
  null: "null",
  object: "{}",
  undefined: "undefined",
  void: "undefined",
  any: "undefined",
  unknown: "undefined",
  never: undefined,
  symbol: undefined,
};

/**
 * Expression for the empty value of a type, as returned by unstubbed calls
 * and used to initialise mocked properties. Types with no empty value of
 * their own get `absent<T>()`.
 */
export class ZeroValues {
  constructor(private readonly types: TypeRenderer) {}

  of(ref: TypeRef, erased: ReadonlySet<string> = new Set()): string {
    return this.literalZero(ref, erased) ?? this.absent(ref, erased);
  }

  /** Zero of a method's results: `undefined` for void, a tuple for several. */
  ofResults(results: readonly TypeRef[], erased: ReadonlySet<string> = new Set()): string {
    if (results.length === 0) return "undefined";
    if (results.length === 1) return this.of(results[0], erased);
    return `[${results.map((r) => this.of(r, erased)).join(", ")}]`;
  }

  private absent(ref: TypeRef, erased: ReadonlySet<string>): string {
    return `${RUNTIME_NAMESPACE}.absent<${this.types.render(ref, erased)}>()`;
  }

  private literalZero(ref: TypeRef, erased: ReadonlySet<string>): string | undefined {
    switch (ref.kind) {
      case "primitive":
        return PRIMITIVE_ZERO[ref.name];
      case "literal":
        return ref.text;
      case "typeParameter":
        return erased.has(ref.name) ? "undefined" : undefined;
      case "array":
        return "[]";
      case "tuple":
        return `[${ref.elements.map((e) => this.of(e, erased)).join(", ")}]`;
      case "map":
        if (ref.style !== "Record") return "new Map()";
        return ref.key.kind === "primitive" && (ref.key.name === "string" || ref.key.name === "number") ? "{}" : undefined;
      case "set":
        return "new Set()";
      case "promise": {
        const inner = ref.inner;
        if (inner.kind === "primitive" && (inner.name === "void" || inner.name === "undefined")) return "Promise.resolve()";
        return `Promise.resolve(${this.of(inner, erased)})`;
      }
      case "asyncIterable":
        return `${RUNTIME_NAMESPACE}.emptyAsyncIterable<${this.types.render(ref.element, erased)}>()`;
      case "function":
        if (ref.typeParameters.length > 0) return undefined;
        return `() => ${this.wrapObject(this.ofResults(ref.results, erased))}`;
      case "union":
        return this.unionZero(ref.members, erased);
      case "object": {
        const required = ref.members.filter((m) => !m.optional);
        if (required.length === 0) return "{}";
        return `{ ${required.map((m) => `${propertyKey(m.name)}: ${this.of(m.type, erased)}`).join(", ")} }`;
      }
      case "named":
      case "intersection":
        return undefined;
    }
  }

  private unionZero(members: readonly TypeRef[], erased: ReadonlySet<string>): string | undefined {
    const isPrimitive = (name: string) => members.some((m) => m.kind === "primitive" && m.name === name);
    if (isPrimitive("undefined") || isPrimitive("void")) return "undefined";
    if (isPrimitive("null")) return "null";
    for (const member of members) {
      const zero = this.literalZero(member, erased);
      if (zero !== undefined) return zero;
    }
    return undefined;
  }

  /** An arrow returning an object literal needs parentheses. */
  private wrapObject(expression: string): string {
    return expression.startsWith("{") ? `(${expression})` : expression;
  }
}
