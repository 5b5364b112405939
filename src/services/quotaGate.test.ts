import test from "node:test";
import assert from "node:assert/strict";
import type { FetchOutcome } from "./pageFetcher";
import { QuotaTracker } from "./quota";
import { QuotaGate, type Clock } from "./quotaGate";

class StepClock implements Clock {
  sleeps: number[] = [];
  constructor(public t = 1_000_000) {}
  now() {
    return this.t;
  }
  async sleep(ms: number) {
    this.sleeps.push(ms);
    this.t += ms;
  }
}

const retry = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 };

const scripted = <T>(outcomes: FetchOutcome<T>[]) => {
  const calledAt: number[] = [];
  return {
    calledAt,
    next: (clock: Clock) => async () => {
      calledAt.push(clock.now());
      const outcome = outcomes.shift();
      if (!outcome) throw new Error("no scripted outcome");
      return outcome;
    },
  };
};

test("429 without headers waits the fallback window plus grace", async () => {
  const clock = new StepClock();
  const quota = new QuotaTracker();
  const gate = new QuotaGate(quota, { retry, resetGraceMs: 2_000, rateLimitFallbackMs: 60_000 }, clock);
  const api = scripted<string>([{ kind: "rate_limited" }, { kind: "ok", value: "42" }]);

  const outcome = await gate.call("lookup", api.next(clock));

  assert.deepEqual(outcome, { kind: "ok", value: "42" });
  assert.deepEqual(clock.sleeps, [62_000]);
  assert.deepEqual(api.calledAt, [1_000_000, 1_062_000]);
  assert.equal(gate.rateLimitHits, 1);
});

test("transient failures are returned once attempts run out", async () => {
  const clock = new StepClock();
  const gate = new QuotaGate(new QuotaTracker(), { retry, resetGraceMs: 0 }, clock);
  const api = scripted<string>([
    { kind: "transient", detail: "ECONNRESET" },
    { kind: "transient", detail: "ECONNRESET" },
    { kind: "transient", detail: "ETIMEDOUT" },
  ]);

  const outcome = await gate.call("profiles", api.next(clock));

  assert.deepEqual(outcome, { kind: "transient", detail: "ETIMEDOUT" });
  assert.deepEqual(clock.sleeps, [100, 200]);
});

test("stop request skips the call", async () => {
  const clock = new StepClock();
  const gate = new QuotaGate(new QuotaTracker(), { retry, resetGraceMs: 0, shouldStop: () => true }, clock);
  const api = scripted<string>([{ kind: "ok", value: "never" }]);

  assert.equal(await gate.call("followers", api.next(clock)), undefined);
  assert.deepEqual(api.calledAt, []);
});
