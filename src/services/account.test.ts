import test from "node:test";
import assert from "node:assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import type { QueryParams, XReadTransport } from "../clients/xClient";
import { Store } from "../data/store";
import { FatalApiError } from "../utils/errors";
import { resolveAccountId } from "./account";
import { QuotaTracker } from "./quota";
import { QuotaGate, type Clock } from "./quotaGate";

const createTempStore = () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "follower-account-"));
  const store = new Store(path.join(dir, "test.db"));
  return {
    store,
    cleanup: () => {
      store.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
};

class StepClock implements Clock {
  sleeps: number[] = [];
  constructor(public t = 1_700_000_000_000) {}
  now() {
    return this.t;
  }
  async sleep(ms: number) {
    this.sleeps.push(ms);
    this.t += ms;
  }
}

class FakeTransport implements XReadTransport {
  calls: { path: string; at: number }[] = [];
  constructor(
    private clock: Clock,
    private replies: (() => { data: unknown })[]
  ) {}

  async getFull(path: string, _query: QueryParams) {
    this.calls.push({ path, at: this.clock.now() });
    const reply = this.replies.shift();
    if (!reply) throw new Error("no scripted reply");
    return reply();
  }
}

const retry = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 };

test("account lookup waits out a 429 under the lookup quota and caches the id", async () => {
  const { store, cleanup } = createTempStore();
  try {
    const clock = new StepClock();
    const reset = Math.floor(clock.t / 1000) + 900;
    const transport = new FakeTransport(clock, [
      () => {
        throw Object.assign(new Error("Too Many Requests"), {
          code: 429,
          rateLimit: { limit: 95, remaining: 0, reset },
        });
      },
      () => ({ data: { data: { id: "2244994945", username: "alice" } } }),
    ]);
    const quota = new QuotaTracker();
    const gate = new QuotaGate(quota, { retry, resetGraceMs: 2_000 }, clock);
    const account = store.bindAccount("@alice");

    const userId = await resolveAccountId(store, transport, gate, account);

    assert.equal(userId, "2244994945");
    assert.equal(store.getTrackedAccount()?.userId, "2244994945");
    assert.deepEqual(
      transport.calls.map((c) => c.path),
      ["users/by/username/alice", "users/by/username/alice"]
    );
    assert.ok(transport.calls[1].at >= reset * 1000);
    assert.equal(clock.sleeps.length, 1);
  } finally {
    cleanup();
  }
});

test("a cached user id skips the lookup", async () => {
  const { store, cleanup } = createTempStore();
  try {
    const clock = new StepClock();
    const transport = new FakeTransport(clock, []);
    store.bindAccount("alice");
    store.setAccountUserId("42");
    const account = store.getTrackedAccount();
    assert.ok(account);

    const gate = new QuotaGate(new QuotaTracker(), { retry, resetGraceMs: 0 }, clock);
    assert.equal(await resolveAccountId(store, transport, gate, account), "42");
    assert.deepEqual(transport.calls, []);
  } finally {
    cleanup();
  }
});

test("a missing account aborts with ACCOUNT_NOT_FOUND", async () => {
  const { store, cleanup } = createTempStore();
  try {
    const clock = new StepClock();
    const transport = new FakeTransport(clock, [
      () => ({ data: { errors: [{ title: "Not Found Error", detail: "Could not find user with username: [ghost]." }] } }),
    ]);
    const gate = new QuotaGate(new QuotaTracker(), { retry, resetGraceMs: 0 }, clock);
    const account = store.bindAccount("ghost");

    await assert.rejects(
      resolveAccountId(store, transport, gate, account),
      (err: unknown) => err instanceof FatalApiError && err.code === "ACCOUNT_NOT_FOUND"
    );
    assert.equal(store.getTrackedAccount()?.userId, undefined);
  } finally {
    cleanup();
  }
});
