import { ApiPartialResponseError, ApiRequestError, TwitterApi } from "twitter-api-v2";
import type { TwitterRateLimit } from "twitter-api-v2";
import type { Agent } from "http";
import { HttpsProxyAgent } from "https-proxy-agent";
import { z } from "zod";
import { logger } from "../utils/logger";
import { ConfigError } from "../utils/errors";
import { EnvSecrets } from "../data/types";

export type QueryParams = Record<string, string | number>;

/** The one call the crawler makes: a GET that also hands back the rate-limit headers. */
export interface XReadTransport {
  getFull(path: string, query: QueryParams): Promise<{ data: unknown; rateLimit?: TwitterRateLimit }>;
}

export function getProxyAgent(proxyUrl?: string): Agent | undefined {
  if (!proxyUrl) return undefined;
  return new HttpsProxyAgent(proxyUrl);
}

export function createXClient(secrets: EnvSecrets, agent?: Agent): TwitterApi {
  const settings = agent ? { httpAgent: agent } : undefined;

  // Prefer OAuth1.0a user-context if provided, else fallback to bearer token
  if (secrets.X_API_KEY && secrets.X_API_SECRET && secrets.X_ACCESS_TOKEN && secrets.X_ACCESS_SECRET) {
    logger.info("使用 OAuth1.0a 用户上下文初始化 X 客户端");
    return new TwitterApi(
      {
        appKey: secrets.X_API_KEY,
        appSecret: secrets.X_API_SECRET,
        accessToken: secrets.X_ACCESS_TOKEN,
        accessSecret: secrets.X_ACCESS_SECRET,
      },
      settings
    );
  }

  if (secrets.X_BEARER_TOKEN) {
    logger.info("使用 Bearer Token 初始化 X 客户端");
    return new TwitterApi(secrets.X_BEARER_TOKEN, settings);
  }

  throw new ConfigError("未提供有效的 X 授权信息：请在 .env 或 --credentials 文件中设置 OAuth1.0a 或 Bearer Token");
}

export function createTransport(client: TwitterApi): XReadTransport {
  return {
    getFull: (path, query) => client.v2.get<unknown>(path, query, { fullResponse: true }),
  };
}

const RateLimitSchema = z.object({
  limit: z.number(),
  remaining: z.number(),
  reset: z.number(),
});

export interface FailureInfo {
  status?: number;
  network: boolean;
  rateLimit?: TwitterRateLimit;
  message: string;
}

/**
 * Reads what matters out of a thrown client error. `ApiResponseError` carries a
 * numeric HTTP `code` and optionally `rateLimit`; request-level failures
 * (`ApiRequestError`, socket errors) carry a string system code or none.
 */
export function describeFailure(err: unknown): FailureInfo {
  const message = err instanceof Error ? err.message : String(err);
  if (typeof err !== "object" || err === null) {
    return { network: false, message };
  }
  const code = "code" in err ? err.code : undefined;
  const parsedLimit = "rateLimit" in err ? RateLimitSchema.safeParse(err.rateLimit) : undefined;
  const rateLimit = parsedLimit?.success ? parsedLimit.data : undefined;
  if (typeof code === "number") {
    return { status: code, network: false, rateLimit, message };
  }
  const network =
    typeof code === "string" || err instanceof ApiRequestError || err instanceof ApiPartialResponseError;
  return { network, rateLimit, message };
}
