import { describe, it, expect } from "vitest";
import { SerialRunner } from "../../src/utils/serial.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SerialRunner", () => {
  it("runs the task once per idle trigger", async () => {
    let runs = 0;
    const runner = new SerialRunner(async () => {
      runs++;
    }, () => {});

    runner.trigger();
    await runner.idle();
    runner.trigger();
    await runner.idle();

    expect(runs).toBe(2);
    expect(runner.busy).toBe(false);
  });

  it("collapses triggers during a run into one more run", async () => {
    const gate = deferred();
    let runs = 0;
    let active = 0;
    let maxActive = 0;
    const runner = new SerialRunner(async () => {
      runs++;
      active++;
      maxActive = Math.max(maxActive, active);
      if (runs === 1) await gate.promise;
      active--;
    }, () => {});

    runner.trigger();
    expect(runner.busy).toBe(true);
    runner.trigger();
    runner.trigger();
    runner.trigger();
    gate.resolve();
    await runner.idle();

    expect(runs).toBe(2);
    expect(maxActive).toBe(1);
  });

  it("reports task errors and keeps going", async () => {
    const errors: unknown[] = [];
    let runs = 0;
    const runner = new SerialRunner(async () => {
      runs++;
      if (runs === 1) throw new Error("boom");
    }, (err) => errors.push(err));

    runner.trigger();
    await runner.idle();
    runner.trigger();
    await runner.idle();

    expect(runs).toBe(2);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(Error);
  });

  it("drops pending runs and ignores triggers once closed", async () => {
    const gate = deferred();
    let runs = 0;
    const runner = new SerialRunner(async () => {
      runs++;
      await gate.promise;
    }, () => {});

    runner.trigger();
    runner.trigger();
    const closing = runner.close();
    runner.trigger();
    gate.resolve();
    await closing;

    expect(runs).toBe(1);
    expect(runner.busy).toBe(false);
  });
});
