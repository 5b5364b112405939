#!/usr/bin/env node
import fs from "fs";
import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "../config";
import { createTransport, createXClient, getProxyAgent } from "../clients/xClient";
import { Store } from "../data/store";
import type { FetchStatus } from "../data/types";
import { resolveAccountId } from "../services/account";
import { CrawlCoordinator, exitCodeFor } from "../services/crawler";
import { holdLease, type LeaseHandle } from "../services/lease";
import { XPageFetcher } from "../services/pageFetcher";
import { QuotaTracker } from "../services/quota";
import { QuotaGate, systemClock } from "../services/quotaGate";
import { ConfigError, CrawlError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { truncate } from "../utils/text";

const STATUSES: readonly FetchStatus[] = ["discovered", "profile_fetched", "profile_failed"];

interface CrawlArgs {
  user?: string;
  db?: string;
  credentials?: string;
  concurrency?: number;
  exitMarker?: string;
}

async function crawl(args: CrawlArgs): Promise<number> {
  const { config, secrets } = loadConfig({ credentialsPath: args.credentials });
  const username = args.user ?? config.username;
  if (!username) {
    throw new ConfigError("缺少目标账号：请使用 --user 或在 config.json 中设置 username");
  }
  const exitMarker = path.resolve(args.exitMarker ?? config.exitMarker);
  const store = new Store(path.resolve(args.db ?? config.dbPath));

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "收到中断信号，当前请求结束后退出");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  let lease: LeaseHandle | undefined;
  try {
    const account = store.bindAccount(username);
    lease = holdLease(store, { staleAfterMs: config.lockStaleAfterMs, onLost: () => controller.abort() });

    const shouldStop = () => {
      if (controller.signal.aborted) return true;
      if (!fs.existsSync(exitMarker)) return false;
      logger.info({ exitMarker }, "发现退出标记文件，停止抓取");
      return true;
    };
    const clock = systemClock(controller.signal);
    const quota = new QuotaTracker();
    const transport = createTransport(createXClient(secrets, getProxyAgent(config.proxy)));

    let userId: string | undefined;
    try {
      const gate = new QuotaGate(quota, { retry: config.retry, resetGraceMs: config.resetGraceMs, shouldStop }, clock);
      userId = await resolveAccountId(store, transport, gate, account);
    } catch (err) {
      if (!(err instanceof CrawlError)) throw err;
      store.recordRunOutcome("ABORTED", `${err.kind}: ${err.message}`);
      logger.error({ kind: err.kind, code: err.code, error: err.message }, "无法解析目标账号，抓取已中止");
      return exitCodeFor("ABORTED");
    }
    if (!userId) {
      store.recordRunOutcome("INTERRUPTED");
      return exitCodeFor("INTERRUPTED");
    }

    const crawler = new CrawlCoordinator(
      store,
      new XPageFetcher(transport, userId, config.listingPageSize),
      quota,
      {
        enrichBatchSize: config.enrichBatchSize,
        concurrency: args.concurrency ?? config.concurrency,
        retry: config.retry,
        resetGraceMs: config.resetGraceMs,
        shouldStop,
      },
      clock
    );
    const result = await crawler.run();
    return exitCodeFor(result.state);
  } finally {
    lease?.release();
    store.close();
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

function status(dbPath: string, json: boolean) {
  const store = new Store(dbPath);
  try {
    const summary = {
      account: store.getTrackedAccount(),
      checkpoint: store.loadCheckpoint(),
      counts: store.countByStatus(),
      lastRun: store.getLastRunOutcome(),
      lease: store.getLease(),
    };
    if (json) {
      console.log(JSON.stringify(summary));
      return;
    }
    const { account, checkpoint, counts, lastRun, lease } = summary;
    console.log(`账号: ${account ? `@${account.username}${account.userId ? ` [${account.userId}]` : ""}` : "(未绑定)"}`);
    const listing = checkpoint.listing;
    console.log(
      `列表阶段: ${listing.state}${listing.state === "in_progress" ? ` (cursor ${listing.cursor})` : ""}, 已抓取 ${checkpoint.pagesFetched} 页`
    );
    console.log(
      `粉丝: 待补全 ${counts.discovered} / 已补全 ${counts.profile_fetched} / 失败 ${counts.profile_failed}`
    );
    if (lastRun) {
      console.log(`上次运行: ${lastRun.outcome} @ ${new Date(lastRun.at).toISOString()}${lastRun.error ? ` (${lastRun.error})` : ""}`);
    }
    if (lease) {
      console.log(`租约: ${lease.owner}, 心跳 ${new Date(lease.heartbeat_at).toISOString()}`);
    }
  } finally {
    store.close();
  }
}

function show(dbPath: string, opts: { status?: FetchStatus; limit: number; offset: number; json: boolean }) {
  const store = new Store(dbPath);
  try {
    const rows = store.listFollowers(opts);
    for (const r of rows) {
      if (opts.json) {
        console.log(JSON.stringify(r));
        continue;
      }
      const who = r.username ? `@${r.username}${r.display_name ? ` (${r.display_name})` : ""}` : "";
      console.log(`${r.id} [${r.status}] ${who} ${truncate(r.bio ?? r.failure_detail ?? "", 120)}`.trimEnd());
    }
  } finally {
    store.close();
  }
}

const dbPathOf = (db?: string) => path.resolve(db ?? loadConfig().config.dbPath);

async function bootstrap() {
  await yargs(hideBin(process.argv))
    .scriptName("follower-crawler")
    .command(
      "crawl",
      "开始或恢复抓取目标账号的全部粉丝",
      (y) =>
        y
          .option("user", { type: "string", describe: "目标账号用户名" })
          .option("db", { type: "string", describe: "SQLite 数据库路径" })
          .option("credentials", { type: "string", describe: "凭证 JSON 文件（默认读取 .env）" })
          .option("concurrency", { type: "number", describe: "资料补全并发数" })
          .option("exit-marker", { type: "string", describe: "存在即停止的退出标记文件" }),
      async (argv) => {
        const code = await crawl({
          user: argv.user,
          db: argv.db,
          credentials: argv.credentials,
          concurrency: argv.concurrency,
          exitMarker: argv["exit-marker"],
        });
        process.exit(code);
      }
    )
    .command(
      "status",
      "显示抓取进度",
      (y) =>
        y
          .option("db", { type: "string", describe: "SQLite 数据库路径" })
          .option("json", { type: "boolean", default: false, describe: "以 JSON 输出" }),
      (argv) => status(dbPathOf(argv.db), argv.json)
    )
    .command(
      "show",
      "在终端显示已存储的粉丝",
      (y) =>
        y
          .option("db", { type: "string", describe: "SQLite 数据库路径" })
          .option("status", { choices: STATUSES, describe: "按状态过滤" })
          .option("limit", { type: "number", default: 20, describe: "显示条数" })
          .option("offset", { type: "number", default: 0, describe: "跳过条数" })
          .option("json", { type: "boolean", default: false, describe: "以 JSON 行输出" }),
      (argv) =>
        show(dbPathOf(argv.db), {
          status: argv.status,
          limit: argv.limit,
          offset: argv.offset,
          json: argv.json,
        })
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

bootstrap().catch((e) => {
  logger.error({ error: errorMessage(e) }, "抓取失败");
  process.exit(1);
});
