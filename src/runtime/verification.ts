import { VerificationError } from "./errors.js";
import { describeInvocation, type Invocation } from "./invocation.js";

function times(n: number): string {
  return `${n} time${n === 1 ? "" : "s"}`;
}

/** Calls of one method that matched the arguments given to `verify(mock).method(...)`. */
export class CallVerification<A extends unknown[]> {
  constructor(
    readonly expectation: string,
    readonly calls: readonly Invocation<A>[],
    private readonly allCalls: readonly Invocation<A>[],
  ) {}

  get count(): number {
    return this.calls.length;
  }

  times(expected: number): this {
    return this.check(this.count === expected, `exactly ${times(expected)}`);
  }

  once(): this {
    return this.times(1);
  }

  never(): this {
    return this.times(0);
  }

  atLeast(min: number): this {
    return this.check(this.count >= min, `at least ${times(min)}`);
  }

  atMost(max: number): this {
    return this.check(this.count <= max, `at most ${times(max)}`);
  }

  /** Arguments of the last matching call. */
  capturedArguments(): A {
    const last = this.calls[this.calls.length - 1];
    if (!last) {
      throw new VerificationError(`Cannot capture arguments: ${this.expectation} was never called`);
    }
    return last.args;
  }

  allCapturedArguments(): A[] {
    return this.calls.map((call) => call.args);
  }

  private check(ok: boolean, wanted: string): this {
    if (ok) return this;
    const lines = [`Expected ${this.expectation} to be called ${wanted}, but it was called ${times(this.count)}`];
    if (this.allCalls.length > 0) {
      lines.push("Recorded calls:");
      for (const call of this.allCalls) lines.push(`  ${describeInvocation(call)}`);
    }
    throw new VerificationError(lines.join("\n"));
  }
}

/**
 * Verifies that calls happened in a given order, possibly across mocks:
 * each verified call must come after the previously verified one.
 */
export class InOrder {
  private cursor = 0;

  verify<A extends unknown[]>(verification: CallVerification<A>): Invocation<A> {
    const next = verification.calls.find((call) => call.sequence > this.cursor);
    if (!next) {
      throw new VerificationError(
        `Expected ${verification.expectation} to be called after the previously verified call, but it was not`,
      );
    }
    this.cursor = next.sequence;
    return next;
  }
}

export function inOrder(): InOrder {
  return new InOrder();
}
