import pino from "pino";
import { env } from "./config/env.js";

function createLogger(): pino.Logger {
  const level = env.logLevel;
  if (!env.logFile || level === "silent") {
    return pino({ level });
  }

  // Mirror every record into the run log file next to stdout.
  return pino(
    { level },
    pino.multistream([
      { level, stream: process.stdout },
      {
        level,
        stream: pino.destination({ dest: env.logFile, mkdir: true, sync: false }),
      },
    ]),
  );
}

/** Shared application logger instance. */
export const log = createLogger();
