import { describe, it, expect } from "vitest";
import { KeyedLock } from "../keyedLock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs calls for one key in arrival order", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];
    const first = lock.run("k", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = lock.run("k", async () => {
      order.push("second");
    });
    await Promise.resolve();
    expect(order).toEqual([]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const blocked = lock.run("a", () => gate.promise);
    await expect(lock.run("b", async () => "done")).resolves.toBe("done");
    gate.resolve();
    await blocked;
  });

  it("keeps going after a failed call", async () => {
    const lock = new KeyedLock();
    const failed = lock.run("k", async () => {
      throw new Error("boom");
    });
    const next = lock.run("k", async () => 42);
    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });
});
