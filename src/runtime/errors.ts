/** A verification (`times`, `once`, in-order, ...) did not hold. */
export class VerificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VerificationError";
  }
}

/** A strict mock received a call no stubbing matches. */
export class UnstubbedCallError extends Error {
  constructor(public readonly call: string) {
    super(`${call} was called, but no stubbing matches it (strict mock)`);
    this.name = "UnstubbedCallError";
  }
}
