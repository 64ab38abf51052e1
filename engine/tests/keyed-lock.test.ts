/**
 * Cellar Engine — Keyed Lock Tests
 */

import { describe, it, expect } from "vitest";
import { CancellationError } from "../src/errors";
import { KeyedLock } from "../src/utils/keyed-lock";

describe("KeyedLock", () => {
  it("grants waiters in FIFO order", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    const first = await lock.acquire("bottle");
    const second = lock.acquire("bottle").then((release) => {
      order.push("second");
      return release;
    });
    const third = lock.acquire("bottle").then((release) => {
      order.push("third");
      return release;
    });

    expect(lock.waiting("bottle")).toBe(2);
    first();
    (await second)();
    (await third)();

    expect(order).toEqual(["second", "third"]);
    expect(lock.isLocked("bottle")).toBe(false);
  });

  it("does not block distinct keys", async () => {
    const lock = new KeyedLock();
    const a = await lock.acquire("a");
    const b = await lock.acquire("b");
    expect(lock.isLocked("a")).toBe(true);
    expect(lock.isLocked("b")).toBe(true);
    a();
    b();
  });

  it("ignores a second release", async () => {
    const lock = new KeyedLock();
    const first = await lock.acquire("k");
    const second = lock.acquire("k");
    first();
    first();
    const release = await second;
    expect(lock.isLocked("k")).toBe(true);
    release();
    expect(lock.isLocked("k")).toBe(false);
  });

  it("removes an aborted waiter from the queue", async () => {
    const lock = new KeyedLock();
    const controller = new AbortController();
    const holder = await lock.acquire("k");
    const aborted = lock.acquire("k", controller.signal);
    const next = lock.acquire("k");

    controller.abort();
    await expect(aborted).rejects.toBeInstanceOf(CancellationError);
    expect(lock.waiting("k")).toBe(1);

    holder();
    const release = await next;
    release();
    expect(lock.isLocked("k")).toBe(false);
  });

  it("rejects immediately for an already aborted signal", async () => {
    const lock = new KeyedLock();
    const controller = new AbortController();
    controller.abort();
    await expect(lock.acquire("k", controller.signal)).rejects.toMatchObject({
      kind: "CancellationError",
      stage: "lease",
    });
    expect(lock.isLocked("k")).toBe(false);
  });

  it("releases after withLock even when the body throws", async () => {
    const lock = new KeyedLock();
    await expect(
      lock.withLock("k", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(lock.isLocked("k")).toBe(false);
  });
});
