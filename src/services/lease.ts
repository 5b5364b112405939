import os from "os";
import crypto from "crypto";
import type { Store } from "../data/store";
import { LeaseError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

export interface LeaseHandle {
  owner: string;
  release(): void;
}

export interface HoldLeaseOptions {
  owner?: string;
  staleAfterMs: number;
  now?: number;
  /** Called when the heartbeat finds the lease gone or cannot write it. */
  onLost?: () => void;
}

export const defaultLeaseOwner = () => `${os.hostname()}:${process.pid}:${crypto.randomUUID().slice(0, 8)}`;

/**
 * Takes the store's exclusive crawl lease and keeps it alive with a heartbeat
 * until `release()`. Throws LeaseError when another live process holds it.
 */
export function holdLease(store: Store, opts: HoldLeaseOptions): LeaseHandle {
  const owner = opts.owner ?? defaultLeaseOwner();
  const result = store.acquireLease(owner, { now: opts.now, staleAfterMs: opts.staleAfterMs });
  if (!result.acquired) {
    const since = new Date(result.holder.heartbeat_at).toISOString();
    throw new LeaseError(
      `Store is in use by ${result.holder.owner} (last heartbeat ${since})`,
      result.holder.owner
    );
  }
  logger.debug({ owner }, "已获取抓取租约");

  let lost = false;
  const heartbeat = () => {
    if (lost) return;
    try {
      if (store.renewLease(owner)) return;
      logger.error({ owner }, "抓取租约已被其他进程接管");
    } catch (err) {
      logger.error({ owner, error: errorMessage(err) }, "续租失败");
    }
    lost = true;
    opts.onLost?.();
  };
  const timer = setInterval(heartbeat, Math.max(1000, Math.floor(opts.staleAfterMs / 3)));
  timer.unref();

  return {
    owner,
    release: () => {
      clearInterval(timer);
      if (!lost) store.releaseLease(owner);
    },
  };
}
