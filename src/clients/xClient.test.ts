import test from "node:test";
import assert from "node:assert/strict";
import { TwitterApi } from "twitter-api-v2";
import { createXClient, describeFailure, getProxyAgent } from "./xClient";
import { ConfigError } from "../utils/errors";

test("describeFailure reads the HTTP status and rate limit", () => {
  const err = Object.assign(new Error("Request failed with code 429"), {
    code: 429,
    rateLimit: { limit: 15, remaining: 0, reset: 1_700_000_000 },
  });
  assert.deepEqual(describeFailure(err), {
    status: 429,
    network: false,
    rateLimit: { limit: 15, remaining: 0, reset: 1_700_000_000 },
    message: "Request failed with code 429",
  });
});

test("describeFailure treats system error codes as network failures", () => {
  const err = Object.assign(new Error("connect ETIMEDOUT"), { code: "ETIMEDOUT" });
  assert.deepEqual(describeFailure(err), { network: true, rateLimit: undefined, message: "connect ETIMEDOUT" });
});

test("describeFailure ignores a malformed rate limit", () => {
  const err = Object.assign(new Error("bad"), { code: 500, rateLimit: { remaining: "x" } });
  assert.deepEqual(describeFailure(err), { status: 500, network: false, rateLimit: undefined, message: "bad" });
});

test("describeFailure handles non-error values", () => {
  assert.deepEqual(describeFailure("boom"), { network: false, message: "boom" });
  assert.deepEqual(describeFailure(new Error("plain")), { network: false, rateLimit: undefined, message: "plain" });
});

test("createXClient requires credentials", () => {
  assert.throws(() => createXClient({}), ConfigError);
  assert.throws(() => createXClient({ X_API_KEY: "test-key" }), ConfigError);
});

test("createXClient accepts a bearer token", () => {
  assert.ok(createXClient({ X_BEARER_TOKEN: "test-secret" }) instanceof TwitterApi);
});

test("getProxyAgent is only built for a proxy url", () => {
  assert.equal(getProxyAgent(undefined), undefined);
  assert.ok(getProxyAgent("http://127.0.0.1:7890"));
});
