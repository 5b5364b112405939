import { z } from "zod";
import type { TwitterRateLimit } from "twitter-api-v2";
import { describeFailure, type FailureInfo, type QueryParams, type XReadTransport } from "../clients/xClient";
import type { FollowerProfile, LatestPost } from "../data/types";
import type { QuotaObservation } from "./quota";

export type FetchOutcome<T> =
  | { kind: "ok"; value: T; quota?: QuotaObservation }
  | { kind: "rate_limited"; quota?: QuotaObservation }
  | { kind: "not_found"; detail: string; quota?: QuotaObservation }
  | { kind: "transient"; detail: string; quota?: QuotaObservation }
  | { kind: "fatal"; detail: string; quota?: QuotaObservation };

export type FailedOutcome = Exclude<FetchOutcome<never>, { kind: "ok" }>;

export type FollowerPage =
  | { identifiers: string[]; done: true }
  | { identifiers: string[]; done: false; nextCursor: string };

/** What the crawl needs from the social network. Implementations never throw for API conditions. */
export interface PageFetcher {
  fetchFollowerPage(cursor?: string): Promise<FetchOutcome<FollowerPage>>;
  fetchProfile(identifier: string): Promise<FetchOutcome<FollowerProfile>>;
}

const PROFILE_FIELDS = [
  "created_at",
  "description",
  "location",
  "most_recent_tweet_id",
  "pinned_tweet_id",
  "profile_image_url",
  "protected",
  "public_metrics",
  "url",
  "verified",
].join(",");

const PROFILE_QUERY: QueryParams = {
  "user.fields": PROFILE_FIELDS,
  expansions: "most_recent_tweet_id",
  "tweet.fields": "created_at,lang",
};

const ApiErrorSchema = z
  .object({
    title: z.string().optional(),
    detail: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

const FollowersPayloadSchema = z.object({
  data: z.array(z.object({ id: z.string() }).passthrough()).optional(),
  meta: z
    .object({
      result_count: z.number().optional(),
      next_token: z.string().optional(),
    })
    .passthrough()
    .optional(),
  errors: z.array(ApiErrorSchema).optional(),
});

const UserSchema = z
  .object({
    id: z.string(),
    username: z.string(),
    name: z.string().optional(),
    description: z.string().optional(),
    location: z.string().optional(),
    url: z.string().optional(),
    profile_image_url: z.string().optional(),
    public_metrics: z
      .object({
        followers_count: z.number().optional(),
        following_count: z.number().optional(),
        tweet_count: z.number().optional(),
        listed_count: z.number().optional(),
      })
      .passthrough()
      .optional(),
    verified: z.boolean().optional(),
    protected: z.boolean().optional(),
    created_at: z.string().optional(),
    pinned_tweet_id: z.string().optional(),
    most_recent_tweet_id: z.string().optional(),
  })
  .passthrough();

const TweetSchema = z
  .object({
    id: z.string(),
    text: z.string(),
    created_at: z.string().optional(),
    lang: z.string().optional(),
  })
  .passthrough();

const UserPayloadSchema = z.object({
  data: UserSchema.optional(),
  includes: z.object({ tweets: z.array(TweetSchema).optional() }).passthrough().optional(),
  errors: z.array(ApiErrorSchema).optional(),
});

export type XUser = z.infer<typeof UserSchema>;
export type XTweet = z.infer<typeof TweetSchema>;

export interface AccountRef {
  id: string;
  username: string;
}

export function toQuota(rateLimit?: TwitterRateLimit): QuotaObservation | undefined {
  if (!rateLimit) return undefined;
  // X reports the reset as unix seconds
  return { remaining: rateLimit.remaining, resetAt: rateLimit.reset * 1000 };
}

export function classifyFailure(info: FailureInfo): FailedOutcome {
  const quota = toQuota(info.rateLimit);
  const detail = info.status ? `HTTP ${info.status}: ${info.message}` : info.message;
  if (info.status === 429) return { kind: "rate_limited", quota };
  if (info.status === 404) return { kind: "not_found", detail, quota };
  if (info.status !== undefined) {
    return info.status >= 500 ? { kind: "transient", detail, quota } : { kind: "fatal", detail, quota };
  }
  if (info.network) return { kind: "transient", detail, quota };
  return { kind: "fatal", detail, quota };
}

function toLatestPost(user: XUser, tweets: XTweet[] = []): LatestPost | undefined {
  // protected accounts list the id but the expansion comes back empty
  const tweet = tweets.find((t) => t.id === user.most_recent_tweet_id);
  if (!tweet) return undefined;
  return { id: tweet.id, text: tweet.text, createdAt: tweet.created_at, lang: tweet.lang };
}

export function toProfile(user: XUser, tweets?: XTweet[]): FollowerProfile {
  const metrics = user.public_metrics;
  return {
    username: user.username,
    displayName: user.name,
    bio: user.description,
    location: user.location,
    url: user.url,
    profileImageUrl: user.profile_image_url,
    followersCount: metrics?.followers_count,
    followingCount: metrics?.following_count,
    tweetCount: metrics?.tweet_count,
    listedCount: metrics?.listed_count,
    verified: user.verified,
    protected: user.protected,
    accountCreatedAt: user.created_at,
    pinnedTweetId: user.pinned_tweet_id,
    latestPost: toLatestPost(user, tweets),
    rawJson: JSON.stringify(user),
  };
}

const describeApiErrors = (errors?: z.infer<typeof ApiErrorSchema>[]) =>
  errors?.map((e) => e.detail ?? e.title ?? e.type ?? "unknown error").join("; ");

/** PageFetcher over X API v2 (`users/:id/followers`, `users/:id`). */
export class XPageFetcher implements PageFetcher {
  constructor(
    private transport: XReadTransport,
    private userId: string,
    private pageSize = 1000
  ) {}

  async fetchFollowerPage(cursor?: string): Promise<FetchOutcome<FollowerPage>> {
    const query: QueryParams = { max_results: Math.min(Math.max(this.pageSize, 1), 1000) };
    if (cursor) query.pagination_token = cursor;
    try {
      const res = await this.transport.getFull(`users/${this.userId}/followers`, query);
      const quota = toQuota(res.rateLimit);
      const parsed = FollowersPayloadSchema.safeParse(res.data);
      if (!parsed.success) {
        return { kind: "fatal", detail: `Malformed followers payload: ${parsed.error.message}`, quota };
      }
      const payload = parsed.data;
      // the tracked account itself is gone or hidden: nothing to resume against
      if (!payload.data && payload.errors?.length) {
        return { kind: "fatal", detail: describeApiErrors(payload.errors) ?? "followers unavailable", quota };
      }
      const identifiers = (payload.data ?? []).map((u) => u.id);
      const next = payload.meta?.next_token;
      const page: FollowerPage = next
        ? { identifiers, done: false, nextCursor: next }
        : { identifiers, done: true };
      return { kind: "ok", value: page, quota };
    } catch (err) {
      return classifyFailure(describeFailure(err));
    }
  }

  async fetchProfile(identifier: string): Promise<FetchOutcome<FollowerProfile>> {
    try {
      const res = await this.transport.getFull(`users/${identifier}`, PROFILE_QUERY);
      const quota = toQuota(res.rateLimit);
      const parsed = UserPayloadSchema.safeParse(res.data);
      if (!parsed.success) {
        return { kind: "fatal", detail: `Malformed user payload: ${parsed.error.message}`, quota };
      }
      // deleted or suspended accounts come back as 200 with only `errors`
      if (!parsed.data.data) {
        return { kind: "not_found", detail: describeApiErrors(parsed.data.errors) ?? "user not found", quota };
      }
      return { kind: "ok", value: toProfile(parsed.data.data, parsed.data.includes?.tweets), quota };
    } catch (err) {
      return classifyFailure(describeFailure(err));
    }
  }
}

/** Resolves a username to its account id (`users/by/username/:username`). */
export async function lookupAccount(transport: XReadTransport, username: string): Promise<FetchOutcome<AccountRef>> {
  const name = username.replace(/^@/, "");
  try {
    const res = await transport.getFull(`users/by/username/${encodeURIComponent(name)}`, {});
    const quota = toQuota(res.rateLimit);
    const parsed = UserPayloadSchema.safeParse(res.data);
    if (!parsed.success) {
      return { kind: "fatal", detail: `Malformed user payload: ${parsed.error.message}`, quota };
    }
    const user = parsed.data.data;
    if (!user) {
      return { kind: "not_found", detail: describeApiErrors(parsed.data.errors) ?? `@${name} not found`, quota };
    }
    return { kind: "ok", value: { id: user.id, username: user.username }, quota };
  } catch (err) {
    return classifyFailure(describeFailure(err));
  }
}
