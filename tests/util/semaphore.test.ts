import { describe, it, expect } from "vitest";
import { Semaphore } from "../../src/util/semaphore.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Semaphore", () => {
  it("runs one task at a time with a single permit", async () => {
    const sem = new Semaphore(1);
    const order: string[] = [];
    const gate = deferred();

    const first = sem.run(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = sem.run(async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(sem.pending).toBe(1);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(sem.pending).toBe(0);
  });

  it("releases the permit when a task throws", async () => {
    const sem = new Semaphore(1);
    await expect(sem.run(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    await expect(sem.run(async () => "next")).resolves.toBe("next");
  });

  it("lets as many tasks run as it has permits", async () => {
    const sem = new Semaphore(2);
    await sem.acquire();
    await sem.acquire();
    let third = false;
    const waiting = sem.acquire().then(() => {
      third = true;
    });

    await Promise.resolve();
    expect(third).toBe(false);
    sem.release();
    await waiting;
    expect(third).toBe(true);
  });
});
