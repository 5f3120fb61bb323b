import type { Invocation } from "./invocation.js";
import { MethodMock, type MockHost } from "./method-mock.js";

export interface MockOptions {
  /** Throw UnstubbedCallError instead of returning empty values for unstubbed calls */
  strict?: boolean;
}

/** Key under which every generated mock exposes its MockControl. */
export const control: unique symbol = Symbol("mockwright.control");

export interface MockControl<S, V> {
  readonly mock: Mock;
  readonly stubber: S;
  readonly verifier: V;
}

/** Implemented by every generated mock class. */
export interface Mocked<S, V> {
  readonly [control]: MockControl<S, V>;
}

interface MethodLog {
  readonly name: string;
  recorded(): readonly Invocation<readonly unknown[]>[];
  reset(): void;
}

export class Mock implements MockHost {
  readonly strict: boolean;
  private readonly methods = new Map<string, MethodLog>();

  constructor(
    readonly name: string,
    options: MockOptions = {},
  ) {
    this.strict = options.strict ?? false;
  }

  method<A extends unknown[], R>(name: string, zero: () => R): MethodMock<A, R> {
    if (this.methods.has(name)) {
      throw new Error(`Method ${name} is already registered on mock ${this.name}`);
    }
    const method = new MethodMock<A, R>(this, name, zero);
    this.methods.set(name, method);
    return method;
  }

  control<S, V>(stubber: S, verifier: V): MockControl<S, V> {
    return { mock: this, stubber, verifier };
  }

  /** Every recorded call of every method, in call order. */
  invocations(): Invocation<readonly unknown[]>[] {
    const all = [...this.methods.values()].flatMap((method) => method.recorded());
    return all.sort((a, b) => a.sequence - b.sequence);
  }

  reset(): void {
    for (const method of this.methods.values()) method.reset();
  }
}

export function when<S, V>(target: Mocked<S, V>): S {
  return target[control].stubber;
}

export function verify<S, V>(target: Mocked<S, V>): V {
  return target[control].verifier;
}

export function reset(target: Mocked<unknown, unknown>): void {
  target[control].mock.reset();
}

export function invocations(target: Mocked<unknown, unknown>): Invocation<readonly unknown[]>[] {
  return target[control].mock.invocations();
}
