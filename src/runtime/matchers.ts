import { inspect, isDeepStrictEqual } from "node:util";

// Method syntax keeps ArgMatcher<string> usable where an Arg<string | undefined> is expected.
interface Predicate<T> {
  test(actual: T): boolean;
}

export class ArgMatcher<T> {
  private readonly predicate: Predicate<T>;

  constructor(
    readonly description: string,
    test: (actual: T) => boolean,
  ) {
    this.predicate = { test };
  }

  matches(actual: T): boolean {
    return this.predicate.test(actual);
  }

  toString(): string {
    return this.description;
  }
}

/** A concrete argument value (compared with deep equality) or a matcher. */
export type Arg<T> = T | ArgMatcher<T>;

export function formatValue(value: unknown): string {
  return inspect(value, { depth: 3, breakLength: Infinity });
}

export function any<T>(typeName?: string): ArgMatcher<T> {
  return new ArgMatcher<T>(typeName ? `any(${typeName})` : "any", () => true);
}

export function eq<T>(value: T): ArgMatcher<T> {
  return new ArgMatcher<T>(formatValue(value), (actual) => isDeepStrictEqual(actual, value));
}

export function notEq<T>(value: T): ArgMatcher<T> {
  return new ArgMatcher<T>(`not(${formatValue(value)})`, (actual) => !isDeepStrictEqual(actual, value));
}

export function argThat<T>(predicate: (value: T) => boolean, description = "argThat(<predicate>)"): ArgMatcher<T> {
  return new ArgMatcher<T>(description, predicate);
}

export function anyString(): ArgMatcher<string> {
  return new ArgMatcher<string>("anyString()", (actual) => typeof actual === "string");
}

export function anyNumber(): ArgMatcher<number> {
  return new ArgMatcher<number>("anyNumber()", (actual) => typeof actual === "number");
}

export function anyBoolean(): ArgMatcher<boolean> {
  return new ArgMatcher<boolean>("anyBoolean()", (actual) => typeof actual === "boolean");
}

export function anyArray<T>(): ArgMatcher<T[]> {
  return new ArgMatcher<T[]>("anyArray()", (actual) => Array.isArray(actual));
}

export function anyFunction<T extends (...args: never[]) => unknown>(): ArgMatcher<T> {
  return new ArgMatcher<T>("anyFunction()", (actual) => typeof actual === "function");
}

/**
 * Turn the arguments given to `when(...)`/`verify(...)` into matchers.
 * No arguments at all means "any arguments" and yields null.
 */
export function toMatchers(spec: readonly unknown[]): ArgMatcher<unknown>[] | null {
  if (spec.length === 0) return null;
  return spec.map((arg) => (arg instanceof ArgMatcher ? arg : eq(arg)));
}

/** Omitted trailing matchers only accept omitted (undefined) optional arguments. */
export function argsMatch(matchers: readonly ArgMatcher<unknown>[] | null, args: readonly unknown[]): boolean {
  if (matchers === null) return true;
  if (matchers.length > args.length) return false;
  return args.every((arg, i) => (i < matchers.length ? matchers[i].matches(arg) : arg === undefined));
}

export function describeMatchers(matchers: readonly ArgMatcher<unknown>[] | null): string {
  return matchers === null ? "*" : matchers.map((m) => m.description).join(", ");
}
