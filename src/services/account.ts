import type { XReadTransport } from "../clients/xClient";
import type { Store } from "../data/store";
import type { TrackedAccount } from "../data/types";
import { FatalApiError } from "../utils/errors";
import { logger } from "../utils/logger";
import { lookupAccount } from "./pageFetcher";
import type { QuotaGate } from "./quotaGate";

/**
 * Returns the tracked account's user id, looking it up once under the `lookup`
 * quota and caching it in the store. Undefined when a stop came first.
 */
export async function resolveAccountId(
  store: Store,
  transport: XReadTransport,
  gate: QuotaGate,
  account: TrackedAccount
): Promise<string | undefined> {
  if (account.userId) return account.userId;

  const { username } = account;
  const outcome = await gate.call("lookup", () => lookupAccount(transport, username), { username });
  if (!outcome) return undefined;

  switch (outcome.kind) {
    case "ok":
      store.setAccountUserId(outcome.value.id);
      logger.info({ username, userId: outcome.value.id }, "已解析目标账号");
      return outcome.value.id;
    case "not_found":
      throw new FatalApiError(`Tracked account @${username} not found: ${outcome.detail}`, "ACCOUNT_NOT_FOUND");
    case "transient":
      throw new FatalApiError(`Account lookup kept failing: ${outcome.detail}`, "RETRIES_EXHAUSTED");
    case "fatal":
      throw new FatalApiError(outcome.detail);
  }
}
