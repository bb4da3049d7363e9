import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { describe, it } from "node:test";
import { KeyedMutex, Mutex, runWithConcurrency, Semaphore } from "../src/lib/concurrency.js";

describe("runWithConcurrency", () => {
  it("never exceeds the concurrency ceiling and keeps input order", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runWithConcurrency([30, 5, 20, 1, 10, 2], 2, async (ms, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(ms);
      inFlight -= 1;
      return `${index}:${ms}`;
    });

    assert.equal(peak, 2);
    assert.deepEqual(results, ["0:30", "1:5", "2:20", "3:1", "4:10", "5:2"]);
  });

  it("treats a ceiling below one as one", async () => {
    let inFlight = 0;
    let peak = 0;

    await runWithConcurrency([1, 2, 3], 0, async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(1);
      inFlight -= 1;
    });

    assert.equal(peak, 1);
  });

  it("returns an empty array for no items", async () => {
    assert.deepEqual(await runWithConcurrency([], 4, async () => 1), []);
  });
});

describe("Mutex", () => {
  it("runs callers one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    await Promise.all(
      ["a", "b", "c"].map((name, index) =>
        mutex.runExclusive(async () => {
          events.push(`start:${name}`);
          await delay(10 - index * 3);
          events.push(`end:${name}`);
        }),
      ),
    );

    assert.deepEqual(events, ["start:a", "end:a", "start:b", "end:b", "start:c", "end:c"]);
  });

  it("releases the lock when the callback throws", async () => {
    const mutex = new Mutex();

    await assert.rejects(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
      { message: "boom" },
    );
    assert.equal(await mutex.runExclusive(() => "next"), "next");
  });
});

describe("KeyedMutex", () => {
  it("serializes per key and lets other keys run", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const first = mutex.runExclusive("APP_1", async () => {
      events.push("start:APP_1#1");
      await delay(20);
      events.push("end:APP_1#1");
    });
    const second = mutex.runExclusive("APP_1", async () => {
      events.push("start:APP_1#2");
    });
    const other = mutex.runExclusive("APP_2", async () => {
      events.push("start:APP_2");
    });

    assert.equal(mutex.isLocked("APP_1"), true);
    await Promise.all([first, second, other]);

    assert.deepEqual(events, ["start:APP_1#1", "start:APP_2", "end:APP_1#1", "start:APP_1#2"]);
    assert.equal(mutex.isLocked("APP_1"), false);
    assert.equal(mutex.isLocked("APP_2"), false);
  });
});

describe("Semaphore", () => {
  it("holds callers past the permit count until a permit frees", async () => {
    const semaphore = new Semaphore(2);
    let inFlight = 0;
    let peak = 0;
    const observed: Array<[number, number]> = [];

    await Promise.all(
      [15, 5, 10, 1, 1].map((ms) =>
        semaphore.run(async () => {
          inFlight += 1;
          peak = Math.max(peak, inFlight);
          observed.push([semaphore.inUse, semaphore.waiting]);
          await delay(ms);
          inFlight -= 1;
        }),
      ),
    );

    assert.equal(peak, 2);
    // Every caller queues before the first callback runs.
    assert.deepEqual(observed.slice(0, 3), [
      [2, 3],
      [2, 3],
      [2, 2],
    ]);
    assert.equal(semaphore.inUse, 0);
    assert.equal(semaphore.waiting, 0);
  });

  it("gives the permit back when the callback throws", async () => {
    const semaphore = new Semaphore(1);

    await assert.rejects(
      semaphore.run(() => {
        throw new Error("boom");
      }),
      { message: "boom" },
    );
    assert.equal(semaphore.inUse, 0);
    assert.equal(await semaphore.run(() => "next"), "next");
  });
});
