import test from "node:test";
import assert from "node:assert/strict";
import { backoffDelay, sleep } from "./retry";

const policy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 500, jitterMs: 50 };

test("backoffDelay doubles per attempt and stops at the cap", () => {
  const noJitter = () => 0;
  assert.deepEqual(
    [1, 2, 3, 4, 5].map((n) => backoffDelay(n, policy, noJitter)),
    [100, 200, 400, 500, 500]
  );
});

test("backoffDelay adds jitter below jitterMs", () => {
  assert.equal(backoffDelay(1, policy, () => 0.5), 125);
  assert.equal(backoffDelay(1, policy, () => 0.999), 149);
});

test("sleep resolves early when aborted", async () => {
  const controller = new AbortController();
  const started = Date.now();
  const pending = sleep(60_000, controller.signal);
  controller.abort();
  await pending;
  assert.ok(Date.now() - started < 5_000);
});
