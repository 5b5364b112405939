import type { RetryPolicy } from "../data/types";
import { logger } from "../utils/logger";
import { backoffDelay, sleep } from "../utils/retry";
import type { FetchOutcome } from "./pageFetcher";
import { TRIAL_RECHECK_MS, type EndpointCategory, type QuotaTracker } from "./quota";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export function systemClock(signal?: AbortSignal): Clock {
  return { now: () => Date.now(), sleep: (ms) => sleep(ms, signal) };
}

export type Settled<T> = Exclude<FetchOutcome<T>, { kind: "rate_limited" }>;

export interface QuotaGateOptions {
  retry: RetryPolicy;
  resetGraceMs: number;
  /** Window assumed when a 429 arrives without rate-limit headers. */
  rateLimitFallbackMs?: number;
  shouldStop?: () => boolean;
}

const DEFAULT_RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000;

/**
 * Runs API calls against a QuotaTracker: waits for budget before each call,
 * retries the same request on 429 and on transient failures (with backoff)
 * until it settles.
 */
export class QuotaGate {
  private limitedCalls = 0;

  constructor(
    private quota: QuotaTracker,
    private options: QuotaGateOptions,
    private clock: Clock = systemClock(),
    private random: () => number = Math.random
  ) {}

  /** 429 responses seen so far. */
  get rateLimitHits(): number {
    return this.limitedCalls;
  }

  /** Returns undefined when a stop was requested before the call could be made. */
  async call<T>(
    category: EndpointCategory,
    call: () => Promise<FetchOutcome<T>>,
    context: Record<string, unknown> = {}
  ): Promise<Settled<T> | undefined> {
    let failures = 0;
    let limited = 0;
    for (;;) {
      if (!(await this.awaitQuota(category))) return undefined;
      const outcome = await call();

      if (outcome.kind === "rate_limited") {
        limited += 1;
        this.limitedCalls += 1;
        const now = this.clock.now();
        const reported =
          outcome.quota?.resetAt ?? now + (this.options.rateLimitFallbackMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS);
        // a reset at or before now (skewed clock, whole-second headers) still gets a growing pause
        const resetAt = Math.max(reported, now + backoffDelay(limited, this.options.retry, this.random));
        this.quota.observe(category, 0, resetAt);
        logger.warn({ category, resetAt: new Date(resetAt).toISOString(), ...context }, "触发限流，等待额度重置");
        continue;
      }
      this.quota.settle(category, outcome.quota);

      if (outcome.kind === "transient") {
        failures += 1;
        if (failures >= this.options.retry.maxAttempts) return outcome;
        const delay = backoffDelay(failures, this.options.retry, this.random);
        logger.warn({ category, attempt: failures, delay, detail: outcome.detail, ...context }, "请求暂时失败，退避后重试");
        await this.clock.sleep(delay);
        continue;
      }
      return outcome;
    }
  }

  private async awaitQuota(category: EndpointCategory): Promise<boolean> {
    for (;;) {
      if (this.options.shouldStop?.()) return false;
      const reservation = this.quota.reserve(category, this.clock.now());
      if (reservation.ok) return true;
      const waitMs = reservation.waitMs + this.options.resetGraceMs;
      if (reservation.waitMs > TRIAL_RECHECK_MS) {
        logger.info({ category, waitSeconds: Math.ceil(waitMs / 1000) }, "API 额度耗尽，休眠至重置时间");
      }
      await this.clock.sleep(waitMs);
    }
  }
}
