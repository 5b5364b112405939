import fs from "fs";
import path from "path";
import { z } from "zod";
import dotenv from "dotenv";
import { AppConfig, EnvSecrets } from "../data/types";
import { ConfigError } from "../utils/errors";
import { logger } from "../utils/logger";
import { DEFAULT_RETRY_POLICY as DEFAULT_RETRY } from "../utils/retry";

dotenv.config();

const ConfigSchema = z.object({
  username: z.string().min(1).optional(),
  dbPath: z.string().min(1).default("followers.db"),
  proxy: z.string().optional(),
  listingPageSize: z.number().int().min(1).max(1000).default(1000),
  enrichBatchSize: z.number().int().min(1).max(10_000).default(100),
  concurrency: z.number().int().min(1).max(16).default(4),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).max(20).default(DEFAULT_RETRY.maxAttempts),
      baseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY.baseDelayMs),
      maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY.maxDelayMs),
      jitterMs: z.number().int().min(0).default(DEFAULT_RETRY.jitterMs),
    })
    .default({}),
  resetGraceMs: z.number().int().min(0).default(2000),
  exitMarker: z.string().min(1).default("exit_follower_crawler"),
  lockStaleAfterMs: z.number().int().min(10_000).default(5 * 60 * 1000),
});

// Accepts our env-style keys as well as the consumer_key/access_token_key
// layout of a classic Twitter app credentials file.
const CredentialsFileSchema = z
  .object({
    X_BEARER_TOKEN: z.string().optional(),
    X_API_KEY: z.string().optional(),
    X_API_SECRET: z.string().optional(),
    X_ACCESS_TOKEN: z.string().optional(),
    X_ACCESS_SECRET: z.string().optional(),
    bearer_token: z.string().optional(),
    consumer_key: z.string().optional(),
    consumer_secret: z.string().optional(),
    access_token_key: z.string().optional(),
    access_token_secret: z.string().optional(),
  })
  .transform(
    (c): EnvSecrets => ({
      X_BEARER_TOKEN: c.X_BEARER_TOKEN ?? c.bearer_token,
      X_API_KEY: c.X_API_KEY ?? c.consumer_key,
      X_API_SECRET: c.X_API_SECRET ?? c.consumer_secret,
      X_ACCESS_TOKEN: c.X_ACCESS_TOKEN ?? c.access_token_key,
      X_ACCESS_SECRET: c.X_ACCESS_SECRET ?? c.access_token_secret,
    })
  );

function resolveConfigPath(cwd: string): string | undefined {
  const configPath = path.join(cwd, "config.json");
  if (fs.existsSync(configPath)) return configPath;
  const fallback = path.join(cwd, "config.default.json");
  return fs.existsSync(fallback) ? fallback : undefined;
}

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`无法读取 ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function parseConfig(raw: unknown): AppConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error({ errors: parsed.error.format() }, "配置文件校验失败");
    throw new ConfigError("Invalid configuration");
  }
  const envProxy = process.env.HTTP_PROXY || process.env.HTTPS_PROXY;
  return { ...parsed.data, proxy: parsed.data.proxy ?? envProxy };
}

export function loadCredentials(credentialsPath?: string): EnvSecrets {
  if (credentialsPath) {
    const parsed = CredentialsFileSchema.safeParse(readJson(credentialsPath));
    if (!parsed.success) {
      throw new ConfigError(`凭证文件格式错误: ${credentialsPath}`);
    }
    return parsed.data;
  }
  return {
    X_BEARER_TOKEN: process.env.X_BEARER_TOKEN,
    X_API_KEY: process.env.X_API_KEY,
    X_API_SECRET: process.env.X_API_SECRET,
    X_ACCESS_TOKEN: process.env.X_ACCESS_TOKEN,
    X_ACCESS_SECRET: process.env.X_ACCESS_SECRET,
  };
}

export function loadConfig(opts: { cwd?: string; credentialsPath?: string } = {}): {
  config: AppConfig;
  secrets: EnvSecrets;
} {
  const configPath = resolveConfigPath(opts.cwd ?? process.cwd());
  const raw = configPath ? readJson(configPath) : {};
  return { config: parseConfig(raw), secrets: loadCredentials(opts.credentialsPath) };
}
