import { ok, type Result } from "./result";
import type { TokenSource } from "./upstream";
import type { AccessToken, UpstreamError } from "./types";

/** Tokens are dropped this long before the expiry the endpoint reports. */
const EXPIRY_SKEW_SECONDS = 30;

type TokenProviderOptions = {
  /** 0 disables caching: every call hits the token endpoint. */
  ttlSeconds: number;
  now?: () => number;
};

/**
 * Optional short-lived token cache in front of the token endpoint.
 *
 * Concurrent callers share one in-flight fetch. Failures are never cached.
 */
export class TokenProvider {
  private readonly fetchToken: TokenSource;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private cached: { token: AccessToken; expiresAt: number } | null = null;
  private inflight: Promise<Result<AccessToken, UpstreamError>> | null = null;

  constructor(fetchToken: TokenSource, { ttlSeconds, now = Date.now }: TokenProviderOptions) {
    this.fetchToken = fetchToken;
    this.ttlMs = Math.max(ttlSeconds, 0) * 1000;
    this.now = now;
  }

  get cachingEnabled(): boolean {
    return this.ttlMs > 0;
  }

  async get(): Promise<Result<AccessToken, UpstreamError>> {
    if (!this.cachingEnabled) return this.fetchToken();

    if (this.cached && this.now() < this.cached.expiresAt) {
      return ok(this.cached.token);
    }

    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  clear(): void {
    this.cached = null;
  }

  private async refresh(): Promise<Result<AccessToken, UpstreamError>> {
    const result = await this.fetchToken();
    if (!result.ok) return result;

    const lifetimeMs =
      result.value.expiresIn !== undefined
        ? Math.min(
            this.ttlMs,
            Math.max(result.value.expiresIn - EXPIRY_SKEW_SECONDS, 0) * 1000
          )
        : this.ttlMs;

    this.cached =
      lifetimeMs > 0
        ? { token: result.value, expiresAt: this.now() + lifetimeMs }
        : null;
    return result;
  }
}
