import { formatValue } from "./matchers.js";

export interface Invocation<A extends readonly unknown[]> {
  readonly mockName: string;
  readonly method: string;
  readonly args: A;
  /** Process-wide call counter, used for in-order verification across mocks */
  readonly sequence: number;
}

let lastSequence = 0;

export function nextSequence(): number {
  lastSequence += 1;
  return lastSequence;
}

export function describeCall(mockName: string, method: string, args: readonly unknown[]): string {
  return `${mockName}.${method}(${args.map(formatValue).join(", ")})`;
}

export function describeInvocation(invocation: Invocation<readonly unknown[]>): string {
  return describeCall(invocation.mockName, invocation.method, invocation.args);
}
