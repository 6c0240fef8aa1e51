import path from "node:path";
import { fileURLToPath } from "node:url";

import { config as loadEnv } from "dotenv";

const currentDir = path.dirname(fileURLToPath(import.meta.url));

loadEnv();

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

export const env = {
  port: Number.parseInt(process.env.PORT ?? "3000", 10),
  host: process.env.HOST ?? "0.0.0.0",
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  logFile: process.env.LOG_FILE || undefined,
  serverApiKey: process.env.SERVER_API_KEY ?? "",
  requestsFile:
    process.env.REQUESTS_FILE ??
    path.resolve(currentDir, "../../data/requests.json"),
};

export type Env = typeof env;
