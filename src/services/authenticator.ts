/**
 * - Authenticator: acquire/refresh contract shared by both backends.
 * - SsoAuthenticator: resolves AWS profile credentials with a bounded login-and-retry loop.
 * - StaticSessionAuthenticator: hands out the fixed cookie of the HTTP backend.
 * - SessionHandle: the one place a run's session is replaced after it expires.
 */
import { fromIni } from "@aws-sdk/credential-providers";
import type { AwsCredentialIdentity } from "@aws-sdk/types";

import { log } from "../logger.js";
import { AuthExhaustedError, InvalidConfigError } from "../lib/errors.js";
import type { AwsSession, BackendSession, CookieSession } from "../types/audio.js";
import { runSsoLogin, type LoginRunner } from "./sso-login.js";

export interface Authenticator<S extends BackendSession = BackendSession> {
  acquire(): Promise<S>;
  /** Re-authenticates with the backend and returns a new session. */
  refresh(): Promise<S>;
}

export type CredentialResolver = (profile: string) => Promise<AwsCredentialIdentity>;

export const resolveProfileCredentials: CredentialResolver = async (profile) =>
  fromIni({ profile })();

export type SsoAuthenticatorOptions = {
  profile: string;
  region: string;
  maxAuthAttempts: number;
  resolveCredentials?: CredentialResolver;
  login?: LoginRunner;
};

export class SsoAuthenticator implements Authenticator<AwsSession> {
  private readonly resolveCredentials: CredentialResolver;
  private readonly login: LoginRunner;

  constructor(private readonly options: SsoAuthenticatorOptions) {
    if (!Number.isInteger(options.maxAuthAttempts) || options.maxAuthAttempts <= 0) {
      throw new InvalidConfigError(
        `maxAuthAttempts must be a positive integer, received ${options.maxAuthAttempts}`,
      );
    }
    this.resolveCredentials = options.resolveCredentials ?? resolveProfileCredentials;
    this.login = options.login ?? runSsoLogin;
  }

  async acquire(): Promise<AwsSession> {
    const { profile, region, maxAuthAttempts } = this.options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAuthAttempts; attempt += 1) {
      try {
        const credentials = await this.validate();
        log.debug({ profile, attempt }, "AWS credentials resolved");
        return { kind: "aws", profile, region, credentials, acquiredAt: new Date() };
      } catch (error) {
        lastError = error;
        log.warn(
          { err: error, profile, attempt, maxAuthAttempts },
          "AWS credentials unavailable or expired",
        );
        if (attempt < maxAuthAttempts) {
          await this.login(profile);
        }
      }
    }

    log.error({ profile, maxAuthAttempts }, "Max authentication attempts reached");
    throw new AuthExhaustedError(maxAuthAttempts, { cause: lastError });
  }

  async refresh(): Promise<AwsSession> {
    await this.login(this.options.profile);
    return this.acquire();
  }

  private async validate(): Promise<AwsCredentialIdentity> {
    const credentials = await this.resolveCredentials(this.options.profile);
    if (credentials.expiration && credentials.expiration.getTime() <= Date.now()) {
      throw new Error(`Credentials expired at ${credentials.expiration.toISOString()}`);
    }
    return credentials;
  }
}

/** The HTTP backend's cookie is fixed for the whole run; there is nothing to renew. */
export class StaticSessionAuthenticator implements Authenticator<CookieSession> {
  private readonly session: CookieSession;

  constructor(cookie: string) {
    this.session = { kind: "cookie", cookie, acquiredAt: new Date() };
  }

  async acquire(): Promise<CookieSession> {
    return this.session;
  }

  async refresh(): Promise<CookieSession> {
    return this.session;
  }
}

/** Holds the session shared by a run's synthesis calls. */
export class SessionHandle<S extends BackendSession> {
  private active: Promise<S> | undefined;

  constructor(private readonly authenticator: Authenticator<S>) {}

  current(): Promise<S> {
    return this.active ?? this.track(this.authenticator.acquire());
  }

  /**
   * Replaces `stale` with a refreshed session. Callers that report the same
   * stale session while a refresh is running share that refresh.
   */
  async renew(stale: S): Promise<S> {
    const pending = this.current();
    const active = await pending;
    if (active !== stale) {
      return active;
    }
    if (this.active === pending) {
      this.track(this.authenticator.refresh());
    }
    return this.current();
  }

  // A failed acquire or refresh is dropped so the next caller authenticates again.
  private track(pending: Promise<S>): Promise<S> {
    this.active = pending;
    void pending.catch(() => {
      if (this.active === pending) {
        this.active = undefined;
      }
    });
    return pending;
  }
}
