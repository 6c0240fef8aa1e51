import { spawn } from "node:child_process";

import { log } from "../logger.js";

/** Re-authenticates an AWS profile by running the interactive SSO login. */
export type LoginRunner = (profile: string) => Promise<void>;

/**
 * Runs `aws sso login --profile <profile>` attached to the terminal, so the
 * operator sees the verification URL and code. Failures are logged and not
 * re-raised: the next credential validation decides whether login worked.
 */
export const runSsoLogin: LoginRunner = async (profile) => {
  log.info({ profile }, "Starting AWS SSO login");

  await new Promise<void>((resolve) => {
    const child = spawn("aws", ["sso", "login", "--profile", profile], {
      stdio: "inherit",
    });

    child.once("error", (error) => {
      log.error({ err: error, profile }, "AWS SSO login could not be started");
      resolve();
    });

    child.once("close", (code, signal) => {
      if (code === 0) {
        log.info({ profile }, "AWS SSO login finished");
      } else {
        log.error({ profile, exitCode: code, signal }, "AWS SSO login failed");
      }
      resolve();
    });
  });
};
