import Database from "better-sqlite3";
import path from "path";
import { AccountMismatchError, StorageError } from "../utils/errors";
import type {
  CrawlCheckpoint,
  FetchStatus,
  FollowerRecord,
  ListingCursor,
  ProfileOutcome,
  RunOutcome,
  TrackedAccount,
} from "./types";

interface CheckpointRow {
  listing_state: string;
  listing_cursor: string | null;
  pages_fetched: number;
  updated_at: number;
  last_outcome: string | null;
  last_error: string | null;
  last_run_at: number | null;
}

interface AccountRow {
  username: string;
  user_id: string | null;
  created_at: number;
}

export interface LeaseRecord {
  owner: string;
  acquired_at: number;
  heartbeat_at: number;
}

export interface AcquireLeaseInput {
  now?: number;
  staleAfterMs?: number;
}

export type AcquireLeaseResult =
  | { acquired: true; lease: LeaseRecord }
  | { acquired: false; holder: LeaseRecord };

export interface RunOutcomeRecord {
  outcome: RunOutcome;
  error?: string;
  at: number;
}

export type StatusCounts = Record<FetchStatus, number>;

interface FetchedProfileParams {
  id: string;
  username: string;
  display_name: string | null;
  bio: string | null;
  location: string | null;
  url: string | null;
  profile_image_url: string | null;
  followers_count: number | null;
  following_count: number | null;
  tweet_count: number | null;
  listed_count: number | null;
  verified: number | null;
  protected: number | null;
  account_created_at: string | null;
  pinned_tweet_id: string | null;
  latest_post_id: string | null;
  latest_post_text: string | null;
  latest_post_created_at: string | null;
  latest_post_lang: string | null;
  raw_json: string | null;
  fetched_at: number;
}

interface RunOutcomeParams {
  outcome: RunOutcome;
  error: string | null;
  at: number;
}

interface FailedProfileParams {
  id: string;
  failure_reason: string;
  failure_detail: string | null;
  failed_at: number;
}

const FOLLOWER_COLUMNS = `
  seq, id, status, discovered_at, username, display_name, bio, location, url,
  profile_image_url, followers_count, following_count, tweet_count, listed_count,
  verified, protected, account_created_at, pinned_tweet_id,
  latest_post_id, latest_post_text, latest_post_created_at, latest_post_lang, raw_json,
  profile_fetched_at, failure_reason, failure_detail, updated_at
`;

// Columns added after the first release; older store files get them on open.
const LATE_FOLLOWER_COLUMNS = [
  "latest_post_id",
  "latest_post_text",
  "latest_post_created_at",
  "latest_post_lang",
] as const;

const toFlag = (value?: boolean) => (value === undefined ? null : value ? 1 : 0);

const isRunOutcome = (value: string | null): value is RunOutcome =>
  value === "DONE" || value === "ABORTED" || value === "INTERRUPTED";

export class Store {
  private db: Database.Database;
  private stmtInsertFollower!: Database.Statement<[string, number, number]>;
  private stmtRecordFetched!: Database.Statement<[FetchedProfileParams]>;
  private stmtRecordFailed!: Database.Statement<[FailedProfileParams]>;
  private stmtNextPending!: Database.Statement<[number], { id: string }>;
  private stmtCountPending!: Database.Statement<[], { count: number }>;
  private stmtCountByStatus!: Database.Statement<[], { status: FetchStatus; count: number }>;
  private stmtListFollowers!: Database.Statement<[number, number], FollowerRecord>;
  private stmtListFollowersByStatus!: Database.Statement<[FetchStatus, number, number], FollowerRecord>;
  private stmtGetFollower!: Database.Statement<[string], FollowerRecord>;
  private stmtGetCheckpoint!: Database.Statement<[], CheckpointRow>;
  private stmtSaveCheckpoint!: Database.Statement<[string, string | null, number, number]>;
  private stmtSaveRunOutcome!: Database.Statement<[RunOutcomeParams]>;
  private stmtGetAccount!: Database.Statement<[], AccountRow>;
  private stmtInsertAccount!: Database.Statement<[string, number]>;
  private stmtSetAccountUserId!: Database.Statement<[string]>;
  private stmtGetLease!: Database.Statement<[], LeaseRecord>;
  private stmtUpsertLease!: Database.Statement<[string, number, number]>;
  private stmtRenewLease!: Database.Statement<[number, string]>;
  private stmtReleaseLease!: Database.Statement<[string]>;

  constructor(dbPath = path.join(process.cwd(), "followers.db")) {
    this.db = new Database(dbPath);
    // WAL + FULL: a commit has reached disk once the call returns.
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = FULL");
    this.db.pragma("busy_timeout = 5000");
    this.setup();
    this.prepareStatements();
  }

  private setup() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS followers (
        seq INTEGER PRIMARY KEY,
        id TEXT NOT NULL UNIQUE,
        status TEXT NOT NULL DEFAULT 'discovered'
          CHECK (status IN ('discovered', 'profile_fetched', 'profile_failed')),
        discovered_at INTEGER NOT NULL,
        username TEXT,
        display_name TEXT,
        bio TEXT,
        location TEXT,
        url TEXT,
        profile_image_url TEXT,
        followers_count INTEGER,
        following_count INTEGER,
        tweet_count INTEGER,
        listed_count INTEGER,
        verified INTEGER,
        protected INTEGER,
        account_created_at TEXT,
        pinned_tweet_id TEXT,
        latest_post_id TEXT,
        latest_post_text TEXT,
        latest_post_created_at TEXT,
        latest_post_lang TEXT,
        raw_json TEXT,
        profile_fetched_at INTEGER,
        failure_reason TEXT,
        failure_detail TEXT,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS crawl_checkpoint (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        listing_state TEXT NOT NULL DEFAULT 'not_started',
        listing_cursor TEXT,
        pages_fetched INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL,
        last_outcome TEXT,
        last_error TEXT,
        last_run_at INTEGER
      );

      CREATE TABLE IF NOT EXISTS tracked_account (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        username TEXT NOT NULL,
        user_id TEXT,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS crawl_lease (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        owner TEXT NOT NULL,
        acquired_at INTEGER NOT NULL,
        heartbeat_at INTEGER NOT NULL
      );
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_followers_status_seq ON followers(status, seq);
    `);

    const followerCols = this.db.prepare<[], { name: string }>("PRAGMA table_info(followers)").all();
    for (const column of LATE_FOLLOWER_COLUMNS) {
      if (!followerCols.some((col) => col.name === column)) {
        this.db.exec(`ALTER TABLE followers ADD COLUMN ${column} TEXT`);
      }
    }
  }

  private prepareStatements() {
    this.stmtInsertFollower = this.db.prepare<[string, number, number]>(`
      INSERT INTO followers (id, status, discovered_at, updated_at)
      VALUES (?, 'discovered', ?, ?)
      ON CONFLICT(id) DO NOTHING
    `);
    this.stmtRecordFetched = this.db.prepare<FetchedProfileParams>(`
      INSERT INTO followers (
        id, status, discovered_at, username, display_name, bio, location, url,
        profile_image_url, followers_count, following_count, tweet_count, listed_count,
        verified, protected, account_created_at, pinned_tweet_id,
        latest_post_id, latest_post_text, latest_post_created_at, latest_post_lang, raw_json,
        profile_fetched_at, failure_reason, failure_detail, updated_at
      ) VALUES (
        @id, 'profile_fetched', @fetched_at, @username, @display_name, @bio, @location, @url,
        @profile_image_url, @followers_count, @following_count, @tweet_count, @listed_count,
        @verified, @protected, @account_created_at, @pinned_tweet_id,
        @latest_post_id, @latest_post_text, @latest_post_created_at, @latest_post_lang, @raw_json,
        @fetched_at, NULL, NULL, @fetched_at
      )
      ON CONFLICT(id) DO UPDATE SET
        status = 'profile_fetched',
        username = excluded.username,
        display_name = excluded.display_name,
        bio = excluded.bio,
        location = excluded.location,
        url = excluded.url,
        profile_image_url = excluded.profile_image_url,
        followers_count = excluded.followers_count,
        following_count = excluded.following_count,
        tweet_count = excluded.tweet_count,
        listed_count = excluded.listed_count,
        verified = excluded.verified,
        protected = excluded.protected,
        account_created_at = excluded.account_created_at,
        pinned_tweet_id = excluded.pinned_tweet_id,
        latest_post_id = excluded.latest_post_id,
        latest_post_text = excluded.latest_post_text,
        latest_post_created_at = excluded.latest_post_created_at,
        latest_post_lang = excluded.latest_post_lang,
        raw_json = excluded.raw_json,
        profile_fetched_at = excluded.profile_fetched_at,
        failure_reason = NULL,
        failure_detail = NULL,
        updated_at = excluded.updated_at
    `);
    this.stmtRecordFailed = this.db.prepare<FailedProfileParams>(`
      INSERT INTO followers (id, status, discovered_at, failure_reason, failure_detail, updated_at)
      VALUES (@id, 'profile_failed', @failed_at, @failure_reason, @failure_detail, @failed_at)
      ON CONFLICT(id) DO UPDATE SET
        status = 'profile_failed',
        failure_reason = excluded.failure_reason,
        failure_detail = excluded.failure_detail,
        updated_at = excluded.updated_at
    `);
    this.stmtNextPending = this.db.prepare<[number], { id: string }>(`
      SELECT id FROM followers
      WHERE status = 'discovered'
      ORDER BY seq ASC
      LIMIT ?
    `);
    this.stmtCountPending = this.db.prepare<[], { count: number }>(`
      SELECT COUNT(*) AS count FROM followers WHERE status = 'discovered'
    `);
    this.stmtCountByStatus = this.db.prepare<[], { status: FetchStatus; count: number }>(`
      SELECT status, COUNT(*) AS count FROM followers GROUP BY status
    `);
    this.stmtListFollowers = this.db.prepare<[number, number], FollowerRecord>(`
      SELECT ${FOLLOWER_COLUMNS} FROM followers
      ORDER BY seq ASC
      LIMIT ? OFFSET ?
    `);
    this.stmtListFollowersByStatus = this.db.prepare<[FetchStatus, number, number], FollowerRecord>(`
      SELECT ${FOLLOWER_COLUMNS} FROM followers
      WHERE status = ?
      ORDER BY seq ASC
      LIMIT ? OFFSET ?
    `);
    this.stmtGetFollower = this.db.prepare<[string], FollowerRecord>(`
      SELECT ${FOLLOWER_COLUMNS} FROM followers WHERE id = ?
    `);
    this.stmtGetCheckpoint = this.db.prepare<[], CheckpointRow>(`
      SELECT listing_state, listing_cursor, pages_fetched, updated_at, last_outcome, last_error, last_run_at
      FROM crawl_checkpoint
      WHERE id = 1
    `);
    this.stmtSaveCheckpoint = this.db.prepare<[string, string | null, number, number]>(`
      INSERT INTO crawl_checkpoint (id, listing_state, listing_cursor, pages_fetched, updated_at)
      VALUES (1, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        listing_state = excluded.listing_state,
        listing_cursor = excluded.listing_cursor,
        pages_fetched = excluded.pages_fetched,
        updated_at = excluded.updated_at
    `);
    this.stmtSaveRunOutcome = this.db.prepare<RunOutcomeParams>(`
      INSERT INTO crawl_checkpoint (id, listing_state, pages_fetched, updated_at, last_outcome, last_error, last_run_at)
      VALUES (1, 'not_started', 0, @at, @outcome, @error, @at)
      ON CONFLICT(id) DO UPDATE SET
        last_outcome = excluded.last_outcome,
        last_error = excluded.last_error,
        last_run_at = excluded.last_run_at
    `);
    this.stmtGetAccount = this.db.prepare<[], AccountRow>(`
      SELECT username, user_id, created_at FROM tracked_account WHERE id = 1
    `);
    this.stmtInsertAccount = this.db.prepare<[string, number]>(`
      INSERT INTO tracked_account (id, username, created_at) VALUES (1, ?, ?)
    `);
    this.stmtSetAccountUserId = this.db.prepare<[string]>(`
      UPDATE tracked_account SET user_id = ? WHERE id = 1
    `);
    this.stmtGetLease = this.db.prepare<[], LeaseRecord>(`
      SELECT owner, acquired_at, heartbeat_at FROM crawl_lease WHERE id = 1
    `);
    this.stmtUpsertLease = this.db.prepare<[string, number, number]>(`
      INSERT INTO crawl_lease (id, owner, acquired_at, heartbeat_at)
      VALUES (1, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        owner = excluded.owner,
        acquired_at = excluded.acquired_at,
        heartbeat_at = excluded.heartbeat_at
    `);
    this.stmtRenewLease = this.db.prepare<[number, string]>(`
      UPDATE crawl_lease SET heartbeat_at = ? WHERE id = 1 AND owner = ?
    `);
    this.stmtReleaseLease = this.db.prepare<[string]>(`
      DELETE FROM crawl_lease WHERE id = 1 AND owner = ?
    `);
  }

  /** Inserts unknown identifiers as `discovered`; known ones keep their status. */
  upsertFollowers(identifiers: string[], now = Date.now()): number {
    if (!identifiers.length) return 0;
    const txn = this.db.transaction((ids: string[]) => {
      let added = 0;
      for (const id of ids) {
        added += this.stmtInsertFollower.run(id, now, now).changes;
      }
      return added;
    });
    return txn(identifiers);
  }

  recordProfile(identifier: string, outcome: ProfileOutcome) {
    if (outcome.kind === "fetched") {
      const p = outcome.profile;
      this.stmtRecordFetched.run({
        id: identifier,
        username: p.username,
        display_name: p.displayName ?? null,
        bio: p.bio ?? null,
        location: p.location ?? null,
        url: p.url ?? null,
        profile_image_url: p.profileImageUrl ?? null,
        followers_count: p.followersCount ?? null,
        following_count: p.followingCount ?? null,
        tweet_count: p.tweetCount ?? null,
        listed_count: p.listedCount ?? null,
        verified: toFlag(p.verified),
        protected: toFlag(p.protected),
        account_created_at: p.accountCreatedAt ?? null,
        pinned_tweet_id: p.pinnedTweetId ?? null,
        latest_post_id: p.latestPost?.id ?? null,
        latest_post_text: p.latestPost?.text ?? null,
        latest_post_created_at: p.latestPost?.createdAt ?? null,
        latest_post_lang: p.latestPost?.lang ?? null,
        raw_json: p.rawJson ?? null,
        fetched_at: outcome.fetchedAt,
      });
      return;
    }
    this.stmtRecordFailed.run({
      id: identifier,
      failure_reason: outcome.reason,
      failure_detail: outcome.detail ?? null,
      failed_at: outcome.failedAt,
    });
  }

  loadCheckpoint(): CrawlCheckpoint {
    const row = this.stmtGetCheckpoint.get();
    if (!row) return { listing: { state: "not_started" }, pagesFetched: 0 };
    return {
      listing: this.toListingCursor(row),
      pagesFetched: row.pages_fetched,
      updatedAt: row.updated_at,
    };
  }

  saveCheckpoint(checkpoint: CrawlCheckpoint, now = Date.now()) {
    const cursor = checkpoint.listing.state === "in_progress" ? checkpoint.listing.cursor : null;
    this.stmtSaveCheckpoint.run(checkpoint.listing.state, cursor, checkpoint.pagesFetched, now);
  }

  /** Upsert then checkpoint, in one transaction: the checkpoint never outruns its page. */
  commitFollowerPage(identifiers: string[], checkpoint: CrawlCheckpoint, now = Date.now()): number {
    const txn = this.db.transaction(() => {
      const added = this.upsertFollowers(identifiers, now);
      this.saveCheckpoint(checkpoint, now);
      return added;
    });
    return txn();
  }

  nextIdentifiersNeedingProfile(limit: number): string[] {
    return this.stmtNextPending.all(limit).map((row) => row.id);
  }

  countPendingProfiles(): number {
    return this.stmtCountPending.get()?.count ?? 0;
  }

  countByStatus(): StatusCounts {
    const counts: StatusCounts = { discovered: 0, profile_fetched: 0, profile_failed: 0 };
    for (const row of this.stmtCountByStatus.all()) counts[row.status] = row.count;
    return counts;
  }

  getFollower(identifier: string): FollowerRecord | undefined {
    return this.stmtGetFollower.get(identifier);
  }

  listFollowers(opts: { status?: FetchStatus; limit?: number; offset?: number } = {}): FollowerRecord[] {
    const limit = opts.limit ?? 20;
    const offset = opts.offset ?? 0;
    return opts.status
      ? this.stmtListFollowersByStatus.all(opts.status, limit, offset)
      : this.stmtListFollowers.all(limit, offset);
  }

  recordRunOutcome(outcome: RunOutcome, error?: string, at = Date.now()) {
    this.stmtSaveRunOutcome.run({ outcome, error: error ?? null, at });
  }

  getLastRunOutcome(): RunOutcomeRecord | undefined {
    const row = this.stmtGetCheckpoint.get();
    if (!row || !isRunOutcome(row.last_outcome) || row.last_run_at === null) return undefined;
    return { outcome: row.last_outcome, error: row.last_error ?? undefined, at: row.last_run_at };
  }

  getTrackedAccount(): TrackedAccount | undefined {
    const row = this.stmtGetAccount.get();
    if (!row) return undefined;
    return { username: row.username, userId: row.user_id ?? undefined, createdAt: row.created_at };
  }

  /** Binds the store to `username` on first use; any other account is refused afterwards. */
  bindAccount(username: string, now = Date.now()): TrackedAccount {
    const clean = username.replace(/^@/, "").trim();
    const txn = this.db.transaction(() => {
      const existing = this.getTrackedAccount();
      if (existing) {
        if (existing.username.toLowerCase() !== clean.toLowerCase()) {
          throw new AccountMismatchError(existing.username, clean);
        }
        return existing;
      }
      this.stmtInsertAccount.run(clean, now);
      return { username: clean, createdAt: now };
    });
    return txn.immediate();
  }

  setAccountUserId(userId: string) {
    this.stmtSetAccountUserId.run(userId);
  }

  getLease(): LeaseRecord | undefined {
    return this.stmtGetLease.get();
  }

  acquireLease(owner: string, input: AcquireLeaseInput = {}): AcquireLeaseResult {
    const now = input.now ?? Date.now();
    const staleAfterMs = input.staleAfterMs ?? 5 * 60 * 1000;
    const txn = this.db.transaction((): AcquireLeaseResult => {
      const current = this.stmtGetLease.get();
      const heldByOther =
        current !== undefined && current.owner !== owner && current.heartbeat_at >= now - staleAfterMs;
      if (current && heldByOther) {
        return { acquired: false, holder: current };
      }
      this.stmtUpsertLease.run(owner, now, now);
      return { acquired: true, lease: { owner, acquired_at: now, heartbeat_at: now } };
    });
    // IMMEDIATE takes the write lock up front so two processes cannot both read "free".
    return txn.immediate();
  }

  renewLease(owner: string, now = Date.now()): boolean {
    return this.stmtRenewLease.run(now, owner).changes > 0;
  }

  releaseLease(owner: string) {
    this.stmtReleaseLease.run(owner);
  }

  close() {
    this.db.close();
  }

  private toListingCursor(row: CheckpointRow): ListingCursor {
    switch (row.listing_state) {
      case "not_started":
        return { state: "not_started" };
      case "complete":
        return { state: "complete" };
      case "in_progress":
        if (row.listing_cursor) return { state: "in_progress", cursor: row.listing_cursor };
        break;
    }
    throw new StorageError(
      `Corrupt checkpoint: listing_state=${row.listing_state} cursor=${row.listing_cursor ?? "null"}`
    );
  }
}
