import test from "node:test";
import assert from "node:assert/strict";
import { TRIAL_RECHECK_MS, QuotaTracker } from "./quota";

test("a fresh tracker allows exactly one trial call", () => {
  const quota = new QuotaTracker();
  assert.deepEqual(quota.reserve("followers", 1_000), { ok: true });
  assert.deepEqual(quota.reserve("followers", 1_000), { ok: false, waitMs: TRIAL_RECHECK_MS });

  quota.settle("followers", { remaining: 2, resetAt: 60_000 });
  assert.deepEqual(quota.reserve("followers", 2_000), { ok: true });
  assert.deepEqual(quota.reserve("followers", 2_000), { ok: true });
  assert.deepEqual(quota.reserve("followers", 2_000), { ok: false, waitMs: 58_000 });
});

test("categories are budgeted independently", () => {
  const quota = new QuotaTracker();
  quota.observe("followers", 0, 90_000);
  assert.deepEqual(quota.reserve("followers", 0), { ok: false, waitMs: 90_000 });
  assert.deepEqual(quota.reserve("profiles", 0), { ok: true });
});

test("settle without headers releases the trial call", () => {
  const quota = new QuotaTracker();
  quota.reserve("profiles", 0);
  quota.settle("profiles");
  assert.equal(quota.snapshot("profiles").trialInFlight, false);
  assert.deepEqual(quota.reserve("profiles", 0), { ok: true });
});

test("the reported budget overrides local bookkeeping", () => {
  const quota = new QuotaTracker();
  quota.observe("lookup", 10, 5_000);
  quota.reserve("lookup", 0);
  quota.observe("lookup", 3.7, 6_000);
  assert.deepEqual(quota.snapshot("lookup"), { remaining: 3, resetAt: 6_000, trialInFlight: false });

  quota.observe("lookup", -2, 6_000);
  assert.equal(quota.snapshot("lookup").remaining, 0);
  // window over: one trial call again
  assert.deepEqual(quota.reserve("lookup", 6_000), { ok: true });
});
