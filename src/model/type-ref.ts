import type {
  FunctionRef,
  NamedRef,
  Parameter,
  PrimitiveName,
  PrimitiveRef,
  PropertySignature,
  TypeParameter,
  TypeRef,
} from "./types.js";

export function primitive(name: PrimitiveName): PrimitiveRef {
  return { kind: "primitive", name };
}

export function named(name: string, packagePath: string, typeArgs: readonly TypeRef[] = []): NamedRef {
  return { kind: "named", name, packagePath, typeArgs };
}

export function literal(text: string): TypeRef {
  return { kind: "literal", text };
}

function isNullish(ref: TypeRef): boolean {
  return ref.kind === "primitive" && (ref.name === "null" || ref.name === "undefined");
}

function nullishRank(ref: TypeRef): number {
  if (ref.kind !== "primitive") return 0;
  if (ref.name === "null") return 1;
  if (ref.name === "undefined") return 2;
  return 0;
}

/**
 * Build a union in canonical form: nested unions flattened, duplicates and
 * `never` dropped, `true | false` folded into `boolean`, members sorted by key
 * with `null` and `undefined` last. Both extraction backends go through here,
 * so the checker's member order and the source order end up identical.
 */
export function union(members: readonly TypeRef[]): TypeRef {
  const flat: TypeRef[] = [];
  const pending = [...members];
  while (pending.length > 0) {
    const next = pending.shift();
    if (next === undefined) break;
    if (next.kind === "union") pending.unshift(...next.members);
    else flat.push(next);
  }

  const byKey = new Map<string, TypeRef>();
  for (const member of flat) {
    if (member.kind === "primitive" && member.name === "never") continue;
    byKey.set(typeKey(member), member);
  }

  if (byKey.has("true") && byKey.has("false")) {
    byKey.delete("true");
    byKey.delete("false");
    byKey.set("boolean", primitive("boolean"));
  }

  const sorted = [...byKey.entries()]
    .sort(([ka, a], [kb, b]) => {
      const rank = nullishRank(a) - nullishRank(b);
      if (rank !== 0) return rank;
      return ka < kb ? -1 : ka > kb ? 1 : 0;
    })
    .map(([, member]) => member);

  if (sorted.length === 0) return primitive("never");
  if (sorted.length === 1) return sorted[0];
  return { kind: "union", members: sorted };
}

/**
 * Build an intersection in canonical form: nested intersections flattened,
 * duplicates dropped, members sorted by key.
 */
export function intersection(members: readonly TypeRef[]): TypeRef {
  const byKey = new Map<string, TypeRef>();
  const add = (member: TypeRef): void => {
    if (member.kind === "intersection") member.members.forEach(add);
    else byKey.set(typeKey(member), member);
  };
  members.forEach(add);

  const sorted = [...byKey.keys()].sort().flatMap((key) => {
    const member = byKey.get(key);
    return member ? [member] : [];
  });
  if (sorted.length === 0) return primitive("unknown");
  if (sorted.length === 1) return sorted[0];
  return { kind: "intersection", members: sorted };
}

/** Drop `undefined` from a type, as implied by an optional `?` marker. */
export function withoutUndefined(ref: TypeRef): TypeRef {
  if (ref.kind !== "union") return ref;
  const rest = ref.members.filter((m) => !(m.kind === "primitive" && m.name === "undefined"));
  return rest.length === ref.members.length ? ref : union(rest);
}

function paramKey(p: Parameter): string {
  return `${p.variadic ? "..." : ""}${typeKey(p.type)}${p.optional ? "?" : ""}`;
}

function typeParamsKey(params: readonly TypeParameter[]): string {
  if (params.length === 0) return "";
  const parts = params.map((tp) => {
    let part = tp.name;
    if (tp.constraint) part += ` extends ${typeKey(tp.constraint)}`;
    if (tp.default) part += `=${typeKey(tp.default)}`;
    return part;
  });
  return `<${parts.join(",")}>`;
}

export function resultsKey(results: readonly TypeRef[]): string {
  if (results.length === 0) return "void";
  if (results.length === 1) return typeKey(results[0]);
  return `[${results.map(typeKey).join(",")}]`;
}

function memberKey(m: PropertySignature): string {
  return `${m.readonly ? "readonly " : ""}${m.name}${m.optional ? "?" : ""}:${typeKey(m.type)}`;
}

/**
 * Canonical identity of a type reference. Two refs with the same key render
 * identically and live in the same module; matchers are deduplicated on it.
 */
export function typeKey(ref: TypeRef): string {
  switch (ref.kind) {
    case "primitive":
      return ref.name;
    case "literal":
      return ref.text;
    case "named": {
      const base = ref.packagePath ? `${ref.name}@${ref.packagePath}` : ref.name;
      return ref.typeArgs.length > 0 ? `${base}<${ref.typeArgs.map(typeKey).join(",")}>` : base;
    }
    case "typeParameter":
      return `%${ref.name}`;
    case "array":
      return `${ref.readonly ? "ReadonlyArray" : "Array"}<${typeKey(ref.element)}>`;
    case "tuple":
      return `${ref.readonly ? "readonly " : ""}[${ref.elements.map(typeKey).join(",")}]`;
    case "map":
      return `${ref.style}<${typeKey(ref.key)},${typeKey(ref.value)}>`;
    case "set":
      return `${ref.readonly ? "ReadonlySet" : "Set"}<${typeKey(ref.element)}>`;
    case "promise":
      return `Promise<${typeKey(ref.inner)}>`;
    case "asyncIterable":
      return `AsyncIterable<${typeKey(ref.element)}>`;
    case "function":
      return `${typeParamsKey(ref.typeParameters)}(${ref.params.map(paramKey).join(",")})=>${resultsKey(ref.results)}`;
    case "union":
      return ref.members.map(typeKey).join("|");
    case "intersection":
      return ref.members.map(typeKey).join("&");
    case "object":
      return `{${ref.members.map(memberKey).join(";")}}`;
  }
}

/** Visit `ref` and every ref nested in it, depth-first. */
export function walkTypeRef(ref: TypeRef, visit: (ref: TypeRef) => void): void {
  visit(ref);
  switch (ref.kind) {
    case "named":
      ref.typeArgs.forEach((arg) => walkTypeRef(arg, visit));
      break;
    case "array":
    case "set":
    case "asyncIterable":
      walkTypeRef(ref.element, visit);
      break;
    case "tuple":
      ref.elements.forEach((el) => walkTypeRef(el, visit));
      break;
    case "map":
      walkTypeRef(ref.key, visit);
      walkTypeRef(ref.value, visit);
      break;
    case "promise":
      walkTypeRef(ref.inner, visit);
      break;
    case "function":
      walkSignature(ref, visit);
      break;
    case "union":
    case "intersection":
      ref.members.forEach((m) => walkTypeRef(m, visit));
      break;
    case "object":
      ref.members.forEach((m) => walkTypeRef(m.type, visit));
      break;
    case "primitive":
    case "literal":
    case "typeParameter":
      break;
  }
}

/** Visit every ref of a signature: type parameter bounds, parameters, results. */
export function walkSignature(
  sig: Pick<FunctionRef, "typeParameters" | "params" | "results">,
  visit: (ref: TypeRef) => void,
): void {
  for (const tp of sig.typeParameters) {
    if (tp.constraint) walkTypeRef(tp.constraint, visit);
    if (tp.default) walkTypeRef(tp.default, visit);
  }
  sig.params.forEach((p) => walkTypeRef(p.type, visit));
  sig.results.forEach((r) => walkTypeRef(r, visit));
}

/** True when the ref mentions no type declared outside the global scope. */
export function isBuiltin(ref: TypeRef): boolean {
  let builtin = true;
  walkTypeRef(ref, (r) => {
    if (r.kind === "named" && r.packagePath !== "") builtin = false;
  });
  return builtin;
}

export function mentionsTypeParameter(ref: TypeRef, names?: ReadonlySet<string>): boolean {
  let found = false;
  walkTypeRef(ref, (r) => {
    if (r.kind === "typeParameter" && (!names || names.has(r.name))) found = true;
  });
  return found;
}

/**
 * Whether a value of type `ref` is assignable to `ref` with the type
 * parameters in `names` replaced by `unknown`. Holds when they only occur in
 * output positions; generic named types are assumed invariant.
 */
export function widensToUnknown(ref: TypeRef, names: ReadonlySet<string>): boolean {
  const check = (r: TypeRef, output: boolean): boolean => {
    if (!mentionsTypeParameter(r, names)) return true;
    switch (r.kind) {
      case "typeParameter":
        return output;
      case "array":
      case "set":
      case "asyncIterable":
        return check(r.element, output);
      case "promise":
        return check(r.inner, output);
      case "map":
        return !mentionsTypeParameter(r.key, names) && check(r.value, output);
      case "tuple":
        return r.elements.every((e) => check(e, output));
      case "union":
      case "intersection":
        return r.members.every((m) => check(m, output));
      case "object":
        return r.members.every((m) => check(m.type, output));
      case "function":
        return r.params.every((p) => check(p.type, !output)) && r.results.every((res) => check(res, output));
      default:
        return false;
    }
  };
  return check(ref, true);
}

function mapParams(params: readonly Parameter[], fn: (ref: TypeRef) => TypeRef): Parameter[] {
  return params.map((p) => ({ ...p, type: fn(p.type) }));
}

/**
 * Replace type parameters by the refs bound to them, e.g. when flattening
 * `interface Store extends Repo<Widget>`. Function types that declare a type
 * parameter of the same name shadow the binding.
 */
export function substitute(ref: TypeRef, bindings: ReadonlyMap<string, TypeRef>): TypeRef {
  if (bindings.size === 0) return ref;
  const sub = (r: TypeRef): TypeRef => substitute(r, bindings);
  switch (ref.kind) {
    case "typeParameter":
      return bindings.get(ref.name) ?? ref;
    case "named":
      return { ...ref, typeArgs: ref.typeArgs.map(sub) };
    case "array":
    case "set":
    case "asyncIterable":
      return { ...ref, element: sub(ref.element) };
    case "tuple":
      return { ...ref, elements: ref.elements.map(sub) };
    case "map":
      return { ...ref, key: sub(ref.key), value: sub(ref.value) };
    case "promise":
      return { ...ref, inner: sub(ref.inner) };
    case "function":
      return substituteSignature(ref, bindings);
    case "union":
      return union(ref.members.map(sub));
    case "intersection":
      return intersection(ref.members.map(sub));
    case "object":
      return { ...ref, members: ref.members.map((m) => ({ ...m, type: sub(m.type) })) };
    case "primitive":
    case "literal":
      return ref;
  }
}

type Signature = Pick<FunctionRef, "typeParameters" | "params" | "results">;

/** `substitute` over a whole signature; its own type parameters shadow the bindings. */
export function substituteSignature<S extends Signature>(sig: S, bindings: ReadonlyMap<string, TypeRef>): S {
  if (bindings.size === 0) return sig;
  const shadowed = new Map(bindings);
  sig.typeParameters.forEach((tp) => shadowed.delete(tp.name));
  const inner = (r: TypeRef): TypeRef => substitute(r, shadowed);
  return {
    ...sig,
    typeParameters: sig.typeParameters.map((tp) => ({
      name: tp.name,
      ...(tp.constraint ? { constraint: inner(tp.constraint) } : {}),
      ...(tp.default ? { default: inner(tp.default) } : {}),
    })),
    params: mapParams(sig.params, inner),
    results: sig.results.map(inner),
  };
}
