import type { BackendSession, SynthesisInput } from "../../types/audio.js";

/**
 * Turns one chunk of text into raw audio bytes using the session handed in.
 * Implementations never renew the session themselves; a rejected credential
 * surfaces as CredentialExpiredError so the caller can refresh and retry.
 */
export interface SynthesisClient<S extends BackendSession = BackendSession> {
  readonly name: string;
  synthesize(session: S, input: SynthesisInput): Promise<Buffer>;
}
