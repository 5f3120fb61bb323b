import { UnstubbedCallError } from "./errors.js";
import { describeCall, nextSequence, type Invocation } from "./invocation.js";
import { argsMatch, describeMatchers, toMatchers } from "./matchers.js";
import { Stubbing } from "./stubbing.js";
import { CallVerification } from "./verification.js";

export interface MockHost {
  readonly name: string;
  readonly strict: boolean;
}

/**
 * Stubs and call log of a single mocked method. `A` is the recorded argument
 * tuple (a variadic parameter occupies one slot holding the whole array),
 * `R` the declared result type.
 */
export class MethodMock<A extends unknown[], R> {
  private readonly stubbings: Stubbing<A, R>[] = [];
  private readonly calls: Invocation<A>[] = [];

  constructor(
    private readonly host: MockHost,
    readonly name: string,
    private readonly zero: () => R,
  ) {}

  invoke(args: A): R {
    this.calls.push({ mockName: this.host.name, method: this.name, args, sequence: nextSequence() });

    // Later stubbings override earlier ones.
    for (let i = this.stubbings.length - 1; i >= 0; i--) {
      const stubbing = this.stubbings[i];
      if (stubbing.matches(args)) return stubbing.answer(args);
    }

    if (this.host.strict) {
      throw new UnstubbedCallError(describeCall(this.host.name, this.name, args));
    }
    return this.zero();
  }

  when(spec: readonly unknown[]): Stubbing<A, R> {
    const stubbing = new Stubbing<A, R>(toMatchers(spec), this.zero);
    this.stubbings.push(stubbing);
    return stubbing;
  }

  verify(spec: readonly unknown[]): CallVerification<A> {
    const matchers = toMatchers(spec);
    const matching = this.calls.filter((call) => argsMatch(matchers, call.args));
    const expectation = `${this.host.name}.${this.name}(${describeMatchers(matchers)})`;
    return new CallVerification(expectation, matching, [...this.calls]);
  }

  recorded(): readonly Invocation<A>[] {
    return [...this.calls];
  }

  reset(): void {
    this.stubbings.length = 0;
    this.calls.length = 0;
  }
}
