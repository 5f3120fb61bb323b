import type { Parameter, PropertySignature, TypeParameter, TypeRef } from "../model/types.js";
import type { ImportContext } from "./imports.js";
import { propertyKey } from "./naming.js";

/**
 * Where a type is written: at the top of an annotation, as a union or
 * intersection member, or before a `[]` suffix.
 */
type Position = "top" | "union" | "intersection" | "postfix";

function wrap(text: string, needed: boolean): string {
  return needed ? `(${text})` : text;
}

/** Renders TypeRefs as TypeScript type syntax in one file's import context. */
export class TypeRenderer {
  constructor(private readonly imports: ImportContext) {}

  /**
   * @param erased type parameters written as `unknown` (method type
   *   parameters in recorded argument and result types)
   */
  render(ref: TypeRef, erased: ReadonlySet<string> = new Set(), position: Position = "top"): string {
    const sub = (r: TypeRef, p: Position = "top") => this.render(r, erased, p);

    switch (ref.kind) {
      case "primitive":
        return ref.name;
      case "literal":
        return wrap(ref.text, position === "postfix" && ref.text.startsWith("-"));
      case "named": {
        const name = this.imports.reference(ref);
        return ref.typeArgs.length > 0 ? `${name}<${ref.typeArgs.map((a) => sub(a)).join(", ")}>` : name;
      }
      case "typeParameter":
        return erased.has(ref.name) ? "unknown" : ref.name;
      case "array": {
        const text = `${sub(ref.element, "postfix")}[]`;
        return ref.readonly ? wrap(`readonly ${text}`, position === "postfix") : text;
      }
      case "tuple": {
        const text = `[${ref.elements.map((e) => sub(e)).join(", ")}]`;
        return ref.readonly ? wrap(`readonly ${text}`, position === "postfix") : text;
      }
      case "map":
        return `${ref.style}<${sub(ref.key)}, ${sub(ref.value)}>`;
      case "set":
        return `${ref.readonly ? "ReadonlySet" : "Set"}<${sub(ref.element)}>`;
      case "promise":
        return `Promise<${sub(ref.inner)}>`;
      case "asyncIterable":
        return `AsyncIterable<${sub(ref.element)}>`;
      case "function": {
        const inner = new Set(erased);
        ref.typeParameters.forEach((tp) => inner.delete(tp.name));
        const text = `${this.typeParameters(ref.typeParameters, inner)}(${this.parameters(ref.params, inner)}) => ${this.results(ref.results, inner)}`;
        return wrap(text, position !== "top");
      }
      case "union":
        return wrap(
          ref.members.map((m) => sub(m, "union")).join(" | "),
          position === "intersection" || position === "postfix",
        );
      case "intersection":
        return wrap(ref.members.map((m) => sub(m, "intersection")).join(" & "), position === "postfix");
      case "object":
        return this.objectLiteral(ref.members, erased);
    }
  }

  /** Result type: `void`, the single type, or a tuple of several. */
  results(results: readonly TypeRef[], erased: ReadonlySet<string> = new Set()): string {
    if (results.length === 0) return "void";
    if (results.length === 1) return this.render(results[0], erased);
    return `[${results.map((r) => this.render(r, erased)).join(", ")}]`;
  }

  /** Parameter list as declared: `id: string, label?: string, ...rest: string[]`. */
  parameters(params: readonly Parameter[], erased: ReadonlySet<string> = new Set()): string {
    return params.map((p) => `${p.variadic ? "..." : ""}${p.name}${p.optional ? "?" : ""}: ${this.paramType(p, erased)}`).join(", ");
  }

  /**
   * Labelled tuple of the recorded arguments. A variadic parameter is a
   * single slot holding its whole array. `wrapElement` turns each element
   * type into e.g. an `Arg<T>`.
   */
  argsTuple(
    params: readonly Parameter[],
    erased: ReadonlySet<string> = new Set(),
    wrapElement: (type: string) => string = (type) => type,
  ): string {
    const elements = params.map((p) => `${p.name}${p.optional ? "?" : ""}: ${wrapElement(this.paramType(p, erased))}`);
    return `[${elements.join(", ")}]`;
  }

  typeParameters(params: readonly TypeParameter[], erased: ReadonlySet<string> = new Set()): string {
    if (params.length === 0) return "";
    const parts = params.map((tp) => {
      let part = tp.name;
      if (tp.constraint) part += ` extends ${this.render(tp.constraint, erased)}`;
      if (tp.default) part += ` = ${this.render(tp.default, erased)}`;
      return part;
    });
    return `<${parts.join(", ")}>`;
  }

  /** `<T, U>` as used when referring to a generic declaration. */
  typeArguments(params: readonly TypeParameter[]): string {
    return params.length === 0 ? "" : `<${params.map((tp) => tp.name).join(", ")}>`;
  }

  private paramType(param: Parameter, erased: ReadonlySet<string>): string {
    // An erased rest type parameter still has to be an array type.
    if (param.variadic && param.type.kind === "typeParameter" && erased.has(param.type.name)) return "unknown[]";
    return this.render(param.type, erased);
  }

  private objectLiteral(members: readonly PropertySignature[], erased: ReadonlySet<string>): string {
    if (members.length === 0) return "{}";
    const parts = members.map(
      (m) => `${m.readonly ? "readonly " : ""}${propertyKey(m.name)}${m.optional ? "?" : ""}: ${this.render(m.type, erased)}`,
    );
    return `{ ${parts.join("; ")} }`;
  }
}
