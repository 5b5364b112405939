import type { Store, StatusCounts } from "../data/store";
import type { CrawlCheckpoint, ListingCursor, RunOutcome } from "../data/types";
import { CrawlError, FatalApiError, StorageError, errorMessage, type CrawlErrorKind } from "../utils/errors";
import { logger } from "../utils/logger";
import { runPool } from "../utils/pool";
import type { PageFetcher } from "./pageFetcher";
import type { QuotaTracker } from "./quota";
import { QuotaGate, systemClock, type Clock, type QuotaGateOptions } from "./quotaGate";

export { systemClock, type Clock } from "./quotaGate";

export type CrawlPhase = "LISTING" | "ENRICHING" | "DONE" | "ABORTED";

export interface CrawlerOptions extends QuotaGateOptions {
  enrichBatchSize: number;
  concurrency: number;
}

export interface CrawlStats {
  pagesFetched: number;
  newFollowers: number;
  profilesFetched: number;
  profilesFailed: number;
  rateLimitHits: number;
}

export interface CrawlResult {
  state: RunOutcome;
  stats: CrawlStats;
  checkpoint?: CrawlCheckpoint;
  counts?: StatusCounts;
  error?: { kind: CrawlErrorKind; code: string; message: string };
}

export function exitCodeFor(state: RunOutcome): number {
  switch (state) {
    case "DONE":
      return 0;
    case "ABORTED":
      return 1;
    case "INTERRUPTED":
      return 2;
  }
}

/**
 * Drives one crawl of the store's tracked account:
 * LISTING (follower id pages) -> ENRICHING (profiles) -> DONE, or ABORTED.
 *
 * The phase is always recomputed from storage on start, so a new process
 * against the same store resumes where the previous one stopped.
 */
export class CrawlCoordinator {
  private current: CrawlPhase = "LISTING";
  private interrupted = false;
  private failure?: CrawlError;
  private stats: Omit<CrawlStats, "rateLimitHits"> = {
    pagesFetched: 0,
    newFollowers: 0,
    profilesFetched: 0,
    profilesFailed: 0,
  };
  private gate: QuotaGate;

  constructor(
    private store: Store,
    private fetcher: PageFetcher,
    quota: QuotaTracker,
    private options: CrawlerOptions,
    private clock: Clock = systemClock(),
    random: () => number = Math.random
  ) {
    this.gate = new QuotaGate(quota, { ...options, shouldStop: () => this.stopRequested() }, clock, random);
  }

  get phase(): CrawlPhase {
    return this.current;
  }

  resolveInitialPhase(): CrawlPhase {
    const checkpoint = this.store.loadCheckpoint();
    if (checkpoint.listing.state !== "complete") return "LISTING";
    return this.store.countPendingProfiles() > 0 ? "ENRICHING" : "DONE";
  }

  async run(): Promise<CrawlResult> {
    try {
      this.current = this.storage("resolve initial phase", () => this.resolveInitialPhase());
      logger.info({ phase: this.current }, "抓取任务启动");
      while (this.current === "LISTING" || this.current === "ENRICHING") {
        if (this.stopRequested()) return this.finish("INTERRUPTED");
        this.current = this.current === "LISTING" ? await this.listNextPage() : await this.enrichNextBatch();
      }
      return this.finish("DONE");
    } catch (err) {
      if (!(err instanceof CrawlError)) throw err;
      this.current = "ABORTED";
      return this.finish("ABORTED", err);
    }
  }

  private async listNextPage(): Promise<CrawlPhase> {
    const checkpoint = this.storage("load checkpoint", () => this.store.loadCheckpoint());
    if (checkpoint.listing.state === "complete") return "ENRICHING";
    const cursor = checkpoint.listing.state === "in_progress" ? checkpoint.listing.cursor : undefined;

    const outcome = await this.gate.call("followers", () => this.fetcher.fetchFollowerPage(cursor), { cursor });
    if (!outcome) return "LISTING";

    switch (outcome.kind) {
      case "ok": {
        const page = outcome.value;
        const listing: ListingCursor = page.done
          ? { state: "complete" }
          : { state: "in_progress", cursor: page.nextCursor };
        const added = this.storage("commit follower page", () =>
          this.store.commitFollowerPage(
            page.identifiers,
            { listing, pagesFetched: checkpoint.pagesFetched + 1 },
            this.clock.now()
          )
        );
        this.stats.pagesFetched += 1;
        this.stats.newFollowers += added;
        logger.info(
          { cursor, received: page.identifiers.length, added, done: page.done },
          "已保存一页粉丝 ID"
        );
        return page.done ? "ENRICHING" : "LISTING";
      }
      case "transient":
        throw new FatalApiError(
          `Follower listing failed after ${this.options.retry.maxAttempts} attempts: ${outcome.detail}`,
          "RETRIES_EXHAUSTED"
        );
      case "not_found":
        throw new FatalApiError(`Tracked account not found: ${outcome.detail}`, "ACCOUNT_NOT_FOUND");
      case "fatal":
        throw new FatalApiError(outcome.detail);
    }
  }

  private async enrichNextBatch(): Promise<CrawlPhase> {
    const batch = this.storage("load pending identifiers", () =>
      this.store.nextIdentifiersNeedingProfile(this.options.enrichBatchSize)
    );
    if (!batch.length) return "DONE";

    logger.info({ size: batch.length, concurrency: this.options.concurrency }, "开始补全一批粉丝资料");
    await runPool(batch, this.options.concurrency, (id) => this.enrichOne(id));
    if (this.failure) throw this.failure;
    return "ENRICHING";
  }

  private async enrichOne(identifier: string): Promise<void> {
    if (this.failure || this.stopRequested()) return;
    try {
      const outcome = await this.gate.call("profiles", () => this.fetcher.fetchProfile(identifier), {
        id: identifier,
      });
      if (!outcome) return;
      const now = this.clock.now();
      switch (outcome.kind) {
        case "ok":
          this.storage("record profile", () =>
            this.store.recordProfile(identifier, { kind: "fetched", profile: outcome.value, fetchedAt: now })
          );
          this.stats.profilesFetched += 1;
          return;
        case "not_found":
          this.storage("record profile failure", () =>
            this.store.recordProfile(identifier, {
              kind: "failed",
              reason: "not_found",
              detail: outcome.detail,
              failedAt: now,
            })
          );
          this.stats.profilesFailed += 1;
          logger.info({ id: identifier, detail: outcome.detail }, "粉丝账号不存在或已被封禁");
          return;
        case "transient":
          this.storage("record profile failure", () =>
            this.store.recordProfile(identifier, {
              kind: "failed",
              reason: "retries_exhausted",
              detail: outcome.detail,
              failedAt: now,
            })
          );
          this.stats.profilesFailed += 1;
          logger.warn({ id: identifier, detail: outcome.detail }, "粉丝资料多次重试失败，已标记");
          return;
        case "fatal":
          this.failure ??= new FatalApiError(outcome.detail);
          return;
      }
    } catch (err) {
      this.failure ??= err instanceof CrawlError ? err : new StorageError(errorMessage(err), err);
    }
  }

  private stopRequested(): boolean {
    if (!this.interrupted && this.options.shouldStop?.()) {
      this.interrupted = true;
    }
    return this.interrupted;
  }

  private storage<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(`${operation} failed: ${errorMessage(err)}`, err);
    }
  }

  private finish(state: RunOutcome, error?: CrawlError): CrawlResult {
    const result: CrawlResult = { state, stats: { ...this.stats, rateLimitHits: this.gate.rateLimitHits } };
    if (error) {
      result.error = { kind: error.kind, code: error.code, message: error.message };
    }
    try {
      this.store.recordRunOutcome(state, error ? `${error.kind}: ${error.message}` : undefined, this.clock.now());
      result.checkpoint = this.store.loadCheckpoint();
      result.counts = this.store.countByStatus();
    } catch (err) {
      logger.error({ error: errorMessage(err) }, "无法写入本次运行结果");
    }

    if (error) {
      logger.error(
        { kind: error.kind, code: error.code, error: error.message, checkpoint: result.checkpoint },
        "抓取已中止；排查后重新运行即可从检查点恢复"
      );
    } else if (state === "INTERRUPTED") {
      logger.warn({ stats: result.stats, checkpoint: result.checkpoint }, "抓取已中断，可稍后恢复");
    } else {
      logger.info({ stats: result.stats, counts: result.counts }, "抓取完成");
    }
    return result;
  }
}
