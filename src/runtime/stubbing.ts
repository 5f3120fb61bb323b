import { argsMatch, type ArgMatcher } from "./matchers.js";

type Answer<A extends unknown[], R> = (args: A) => R;

/**
 * One `when(mock).method(...)` registration. Answers are consumed in order;
 * the last one keeps answering once the others are used up.
 */
export class Stubbing<A extends unknown[], R> {
  private readonly answers: Answer<A, R>[] = [];
  private position = 0;

  constructor(
    private readonly matchers: readonly ArgMatcher<unknown>[] | null,
    private readonly fallback: () => R,
  ) {}

  thenReturn(...values: R[]): this {
    for (const value of values) {
      this.answers.push(() => value);
    }
    return this;
  }

  thenThrow(error: unknown): this {
    this.answers.push(() => {
      throw error;
    });
    return this;
  }

  thenAnswer(answer: (...args: A) => R): this {
    this.answers.push((args) => answer(...args));
    return this;
  }

  matches(args: A): boolean {
    return argsMatch(this.matchers, args);
  }

  answer(args: A): R {
    if (this.answers.length === 0) return this.fallback();
    const current = this.answers[this.position];
    if (this.position < this.answers.length - 1) this.position++;
    return current(args);
  }
}
