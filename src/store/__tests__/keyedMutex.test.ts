import { describe, expect, test } from "vitest";
import { KeyedMutex } from "../keyedMutex";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  test("serializes sections for the same key", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.run("a", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = mutex.run("a", async () => {
      events.push("second:start");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  test("runs different keys concurrently", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const blocked = mutex.run("a", async () => {
      await gate.promise;
      events.push("a");
    });
    await mutex.run("b", async () => {
      events.push("b");
    });

    expect(events).toEqual(["b"]);
    gate.resolve();
    await blocked;
    expect(events).toEqual(["b", "a"]);
  });

  test("releases the key when a section throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.run("a", async () => {
        throw new Error("write failed");
      }),
    ).rejects.toThrow("write failed");
    await expect(mutex.run("a", async () => "next")).resolves.toBe("next");
  });
});
