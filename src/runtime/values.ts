/**
 * Placeholder returned by unstubbed methods whose result type has no empty
 * value of its own (interfaces, classes, type parameters). It is `undefined`
 * at run time.
 */
export function absent<T>(): T;
export function absent(): undefined {
  return undefined;
}

/** Empty value for `AsyncIterable<T>` results. */
export async function* emptyAsyncIterable<T>(): AsyncGenerator<T, void, undefined> {}
