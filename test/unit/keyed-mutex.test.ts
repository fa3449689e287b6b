import assert from "node:assert/strict";
import test from "node:test";

import { KeyedMutex } from "../../src/shared/keyed-mutex.js";

function tick(ms = 5): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

test("runs tasks for the same key one at a time", async () => {
  const mutex = new KeyedMutex();
  const order: string[] = [];
  let releaseFirst: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    releaseFirst = resolve;
  });

  const first = mutex.runExclusive("analyst-1", async () => {
    order.push("first:start");
    await gate;
    order.push("first:end");
    return 1;
  });
  const second = mutex.runExclusive("analyst-1", async () => {
    order.push("second:start");
    return 2;
  });

  await tick();
  assert.deepEqual(order, ["first:start"]);

  releaseFirst();
  assert.deepEqual(await Promise.all([first, second]), [1, 2]);
  assert.deepEqual(order, ["first:start", "first:end", "second:start"]);
  assert.equal(mutex.pendingKeys(), 0);
});

test("tasks under different keys do not wait for each other", async () => {
  const mutex = new KeyedMutex();
  let releaseA: () => void = () => {};
  const gateA = new Promise<void>((resolve) => {
    releaseA = resolve;
  });

  const a = mutex.runExclusive("analyst-a", async () => {
    await gateA;
    return "a";
  });
  const b = mutex.runExclusive("analyst-b", async () => {
    releaseA();
    return "b";
  });

  assert.deepEqual(await Promise.all([a, b]), ["a", "b"]);
});

test("a rejected task does not block the next one", async () => {
  const mutex = new KeyedMutex();

  const failing = mutex.runExclusive("analyst-1", async () => {
    throw new Error("store unavailable");
  });
  const following = mutex.runExclusive("analyst-1", async () => "recovered");

  await assert.rejects(failing, /store unavailable/);
  assert.equal(await following, "recovered");
  assert.equal(mutex.pendingKeys(), 0);
});
