import pino from "pino";
import dotenv from "dotenv";

dotenv.config();

const level = process.env.LOG_LEVEL ?? "info";
const pretty = (process.env.LOG_PRETTY ?? "true") === "true";

export const logger = pino({
  level,
  // credentials only ever travel inside these keys
  redact: ["secrets", "credentials", "*.X_BEARER_TOKEN", "*.X_API_SECRET", "*.X_ACCESS_SECRET"],
  transport:
    pretty && level !== "silent"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
});

export type Logger = typeof logger;
