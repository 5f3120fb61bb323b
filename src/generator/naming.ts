export const GENERATED_MARKER = "// Code generated by mockwright. DO NOT EDIT.";

/** Namespace the runtime module is imported under in generated files. */
export const RUNTIME_NAMESPACE = "mockwright";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/** Member name as written in a class body, interface or object literal. */
export function propertyKey(name: string): string {
  return isIdentifier(name) ? name : JSON.stringify(name);
}

/** Reduce an arbitrary member name to identifier characters. */
export function sanitizeIdentifier(name: string): string {
  const cleaned = name.replace(/[^\w$]/g, "_");
  return /^\d/.test(cleaned) || cleaned === "" ? `_${cleaned}` : cleaned;
}

/** `InventoryStore` → `inventory-store`, `HTTPClient` → `http-client`. */
export function kebabCase(name: string): string {
  return name
    .replace(/([a-z\d])([A-Z])/g, "$1-$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1-$2")
    .replace(/[^A-Za-z\d]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .toLowerCase();
}

export function upperFirst(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function lowerFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}

/** Names declared by the mock file generated for `interfaceName`. */
export function mockNames(interfaceName: string): { mock: string; stubber: string; verifier: string } {
  const base = interfaceName.split(".").map(sanitizeIdentifier).join("");
  return { mock: `Mock${base}`, stubber: `${base}Stubber`, verifier: `${base}Verifier` };
}

export function defaultMockFileName(interfaceName: string): string {
  return `${kebabCase(interfaceName)}.mock.ts`;
}

/**
 * Mock file names for interfaces generated together. Names that would clash
 * after kebab-casing get `-2`, `-3` suffixes in request order.
 */
export function mockFileNames(interfaceNames: readonly string[]): string[] {
  const used = new Set<string>();
  return interfaceNames.map((name) => {
    const base = kebabCase(name);
    let stem = base;
    for (let n = 2; used.has(stem); n++) stem = `${base}-${n}`;
    used.add(stem);
    return `${stem}.mock.ts`;
  });
}
