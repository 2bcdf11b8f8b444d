import { describe, expect, it } from "vitest";
import { ReentrantLock } from "../../src/storage/lock.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("ReentrantLock", () => {
  it("runs sections one at a time in call order", async () => {
    const lock = new ReentrantLock();
    const events: string[] = [];

    await Promise.all([
      lock.runExclusive(async () => {
        events.push("a:start");
        await sleep(20);
        events.push("a:end");
      }),
      lock.runExclusive(async () => {
        events.push("b:start");
        await sleep(5);
        events.push("b:end");
      }),
      lock.runExclusive(async () => {
        events.push("c:start");
        events.push("c:end");
      }),
    ]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("lets a held section re-enter without deadlocking", async () => {
    const lock = new ReentrantLock();
    const result = await lock.runExclusive(async () => {
      const inner = await lock.runExclusive(async () => "inner");
      return `outer(${inner})`;
    });
    expect(result).toBe("outer(inner)");
  });

  it("releases the lock when a section throws", async () => {
    const lock = new ReentrantLock();
    await expect(
      lock.runExclusive(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await lock.runExclusive(async () => "next")).toBe("next");
  });

  it("knows whether the caller holds it", async () => {
    const lock = new ReentrantLock();
    expect(lock.heldByCaller).toBe(false);
    const inside = await lock.runExclusive(async () => lock.heldByCaller);
    expect(inside).toBe(true);
    expect(lock.heldByCaller).toBe(false);
  });

  it("counts callers waiting for the lock", async () => {
    const lock = new ReentrantLock();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = lock.runExclusive(() => gate);
    const second = lock.runExclusive(async () => "second");
    await sleep(0);
    expect(lock.pending).toBe(1);

    release();
    await first;
    expect(await second).toBe("second");
    expect(lock.pending).toBe(0);
  });
});
