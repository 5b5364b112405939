export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface AppConfig {
  username?: string;
  dbPath: string;
  proxy?: string; // http://127.0.0.1:7890
  listingPageSize: number; // max_results for users/:id/followers (<= 1000)
  enrichBatchSize: number;
  concurrency: number; // profile workers
  retry: RetryPolicy;
  resetGraceMs: number; // extra sleep past the reported reset time
  exitMarker: string;
  lockStaleAfterMs: number;
}

export interface EnvSecrets {
  X_BEARER_TOKEN?: string;
  X_API_KEY?: string;
  X_API_SECRET?: string;
  X_ACCESS_TOKEN?: string;
  X_ACCESS_SECRET?: string;
}

export type FetchStatus = "discovered" | "profile_fetched" | "profile_failed";

export type FailureReason = "not_found" | "retries_exhausted";

/** The follower's most recent post, present only when it is visible to us. */
export interface LatestPost {
  id: string;
  text: string;
  createdAt?: string;
  lang?: string;
}

export interface FollowerProfile {
  username: string;
  displayName?: string;
  bio?: string;
  location?: string;
  url?: string;
  profileImageUrl?: string;
  followersCount?: number;
  followingCount?: number;
  tweetCount?: number;
  listedCount?: number;
  verified?: boolean;
  protected?: boolean;
  accountCreatedAt?: string;
  pinnedTweetId?: string;
  latestPost?: LatestPost;
  rawJson?: string;
}

export type ProfileOutcome =
  | { kind: "fetched"; profile: FollowerProfile; fetchedAt: number }
  | { kind: "failed"; reason: FailureReason; detail?: string; failedAt: number };

export interface FollowerRecord {
  seq: number;
  id: string;
  status: FetchStatus;
  discovered_at: number;
  username?: string | null;
  display_name?: string | null;
  bio?: string | null;
  location?: string | null;
  url?: string | null;
  profile_image_url?: string | null;
  followers_count?: number | null;
  following_count?: number | null;
  tweet_count?: number | null;
  listed_count?: number | null;
  verified?: number | null;
  protected?: number | null;
  account_created_at?: string | null;
  pinned_tweet_id?: string | null;
  latest_post_id?: string | null;
  latest_post_text?: string | null;
  latest_post_created_at?: string | null;
  latest_post_lang?: string | null;
  raw_json?: string | null;
  profile_fetched_at?: number | null;
  failure_reason?: FailureReason | null;
  failure_detail?: string | null;
  updated_at: number;
}

export type ListingCursor =
  | { state: "not_started" }
  | { state: "in_progress"; cursor: string }
  | { state: "complete" };

export interface CrawlCheckpoint {
  listing: ListingCursor;
  pagesFetched: number;
  updatedAt?: number;
}

export type RunOutcome = "DONE" | "ABORTED" | "INTERRUPTED";

export interface TrackedAccount {
  username: string;
  userId?: string;
  createdAt: number;
}
