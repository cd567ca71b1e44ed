import type { AppConfig } from "./config";
import type { FetchLike, UpstreamRequest } from "./upstream";

export const TEST_URLS = {
  token: "https://token.test/oauth2",
  mcid: "https://mcid.test/search",
  medical: "https://medical.test/medical",
} as const;

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    tokenUrl: TEST_URLS.token,
    mcidUrl: TEST_URLS.mcid,
    medicalUrl: TEST_URLS.medical,
    clientId: "test-client",
    clientSecret: "test-secret",
    mcidApiUser: "test-user",
    medicalCallerId: "test-caller",
    mcidVerifyTls: false,
    medicalAuthFormats: ["bearer"],
    upstreamTimeoutMs: 1000,
    tokenTimeoutMs: 1000,
    tokenCacheTtlSeconds: 0,
    port: 8000,
    ...overrides,
  };
}

export type RecordedCall = { url: string; init: UpstreamRequest };

type Handler = (init: UpstreamRequest) => Response | Promise<Response>;

/**
 * In-process stand-in for the partner endpoints. Every call is recorded;
 * a URL with no handler fails like a refused connection.
 */
export function fakeUpstream(handlers: Partial<Record<keyof typeof TEST_URLS, Handler>>): {
  fetchImpl: FetchLike;
  calls: RecordedCall[];
  callsTo: (name: keyof typeof TEST_URLS) => RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const byUrl = new Map<string, Handler>();
  for (const name of ["token", "mcid", "medical"] as const) {
    const handler = handlers[name];
    if (handler) byUrl.set(TEST_URLS[name], handler);
  }

  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const handler = byUrl.get(url);
    if (!handler) throw new TypeError("fetch failed");
    return handler(init);
  };

  return {
    fetchImpl,
    calls,
    callsTo: (name) => calls.filter((c) => c.url === TEST_URLS[name]),
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export const tokenOk = (): Response =>
  jsonResponse({ access_token: "tok-123", token_type: "Bearer" });

/** Never answers; rejects once the request is aborted. */
export const hang: Handler = (init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal.addEventListener("abort", () =>
      reject(new DOMException("This operation was aborted", "AbortError"))
    );
  });
