export { Mock, control, when, verify, reset, invocations } from "./mock.js";
export type { MockOptions, MockControl, Mocked } from "./mock.js";
export { MethodMock } from "./method-mock.js";
export { Stubbing } from "./stubbing.js";
export { CallVerification, InOrder, inOrder } from "./verification.js";
export {
  ArgMatcher,
  any,
  eq,
  notEq,
  argThat,
  anyString,
  anyNumber,
  anyBoolean,
  anyArray,
  anyFunction,
} from "./matchers.js";
export type { Arg } from "./matchers.js";
export type { Invocation } from "./invocation.js";
export { absent, emptyAsyncIterable } from "./values.js";
export { VerificationError, UnstubbedCallError } from "./errors.js";
