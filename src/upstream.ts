/**
 * Client for the three partner endpoints: OAuth token, MCID search and
 * medical eligibility.
 *
 * Upstream failures come back as `Result` values. A non-200 answer from
 * MCID or medical is still an `ok` result carrying that status; only
 * transport failures (network, timeout) and token problems are errors.
 */
import { Agent, fetch as undiciFetch } from "undici";
import { z } from "zod";
import type { AppConfig } from "./config";
import { createLogger, type Logger } from "./logger";
import { err, errorMessage, ok, type Result } from "./result";
import {
  toMcidSearchRequest,
  toMedicalEligibilityRequest,
} from "./transform";
import type {
  AccessToken,
  AuthAttempt,
  AuthFormat,
  AuthFormatLabel,
  AuthProbeReport,
  ConnectionReport,
  HealthFlags,
  PersonRecord,
  UpstreamError,
  UpstreamResponse,
} from "./types";

export type UpstreamRequest = {
  method: "POST";
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
  /** When false the server certificate is not checked. */
  verifyTls: boolean;
};

export type UpstreamHttpResponse = {
  status: number;
  headers: {
    forEach(callback: (value: string, name: string) => void): void;
  };
  text(): Promise<string>;
};

function headerRecord(res: UpstreamHttpResponse): Record<string, string> {
  const out: Record<string, string> = {};
  res.headers.forEach((value, name) => {
    out[name] = value;
  });
  return out;
}

export type FetchLike = (
  url: string,
  init: UpstreamRequest
) => Promise<UpstreamHttpResponse>;

export type TokenSource = () => Promise<Result<AccessToken, UpstreamError>>;

let insecureAgent: Agent | null = null;

/**
 * Default transport on undici; skipping TLS verification needs its own
 * dispatcher.
 */
export const defaultFetch: FetchLike = (url, { verifyTls, ...init }) => {
  if (verifyTls) return undiciFetch(url, init);
  insecureAgent ??= new Agent({ connect: { rejectUnauthorized: false } });
  return undiciFetch(url, { ...init, dispatcher: insecureAgent });
};

export const NO_CONTENT = "No content";

/**
 * Parsed JSON when possible, raw text otherwise, `"No content"` for an
 * empty body.
 */
export async function readUpstreamBody(
  res: UpstreamHttpResponse
): Promise<unknown> {
  const text = await res.text();
  if (!text) return NO_CONTENT;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function formatAuthorization(format: AuthFormat, token: string): string {
  switch (format) {
    case "bearer":
      return `Bearer ${token}`;
    case "raw":
      return token;
    case "token":
      return `Token ${token}`;
    case "basic":
      return `Basic ${token}`;
  }
}

const authLabels: Record<AuthFormat, AuthFormatLabel> = {
  bearer: "Bearer",
  raw: "Raw",
  token: "Token",
  basic: "Basic",
};

export function authFormatLabel(format: AuthFormat): AuthFormatLabel {
  return authLabels[format];
}

/**
 * Every format the auth probe tries, in order.
 */
export const PROBE_AUTH_FORMATS: readonly AuthFormat[] = [
  "bearer",
  "raw",
  "token",
  "basic",
];

const PROBE_BODY_LIMIT = 500;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.union([z.number(), z.string()]).optional(),
});

export const ACCESS_TOKEN_NOT_FOUND = "Access token not found";

type UpstreamAnswer = {
  status: number;
  headers: Record<string, string>;
  data: unknown;
};

type UpstreamClientOptions = Pick<
  AppConfig,
  | "tokenUrl"
  | "mcidUrl"
  | "medicalUrl"
  | "clientId"
  | "clientSecret"
  | "mcidApiUser"
  | "medicalCallerId"
  | "mcidVerifyTls"
  | "medicalAuthFormats"
  | "upstreamTimeoutMs"
  | "tokenTimeoutMs"
> & {
  fetchImpl?: FetchLike;
  logger?: Logger;
};

export class UpstreamClient {
  private readonly opts: UpstreamClientOptions;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(opts: UpstreamClientOptions) {
    if (opts.medicalAuthFormats.length === 0) {
      throw new Error("medicalAuthFormats must not be empty");
    }
    this.opts = opts;
    this.fetchImpl = opts.fetchImpl ?? defaultFetch;
    this.log = opts.logger ?? createLogger("upstream");
  }

  /**
   * One POST with its own timeout. Throws on transport failure; the caller
   * decides how that maps to a result.
   */
  private async post(
    url: string,
    {
      headers,
      body,
      timeoutMs = this.opts.upstreamTimeoutMs,
      verifyTls = true,
    }: {
      headers: Record<string, string>;
      body: string;
      timeoutMs?: number;
      verifyTls?: boolean;
    }
  ): Promise<UpstreamAnswer> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const res = await this.fetchImpl(url, {
        method: "POST",
        headers,
        body,
        signal: controller.signal,
        verifyTls,
      });
      const data = await readUpstreamBody(res);
      return { status: res.status, headers: headerRecord(res), data };
    } catch (e) {
      if (controller.signal.aborted) {
        throw new Error(`Request to ${url} timed out after ${timeoutMs}ms`);
      }
      throw e;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Client-credentials grant. Never retried and never cached here.
   */
  async fetchAccessToken(): Promise<Result<AccessToken, UpstreamError>> {
    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
    });

    let res: UpstreamAnswer;
    try {
      res = await this.post(this.opts.tokenUrl, {
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: form.toString(),
        timeoutMs: this.opts.tokenTimeoutMs,
      });
    } catch (e) {
      const message = errorMessage(e);
      this.log.error(`token: request failed: ${message}`);
      return err({ status: 500, message });
    }

    if (res.status !== 200) {
      this.log.warn(`token: endpoint answered HTTP ${res.status}`);
      return err({
        status: res.status,
        message: `Token endpoint returned HTTP ${res.status}`,
      });
    }

    const parsed = tokenResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      this.log.warn("token: response carried no access_token");
      return err({
        status: 500,
        message: "Token response did not include an access_token",
      });
    }

    const expiresIn = Number(parsed.data.expires_in);
    return ok({
      accessToken: parsed.data.access_token,
      ...(parsed.data.token_type ? { tokenType: parsed.data.token_type } : {}),
      ...(Number.isFinite(expiresIn) && expiresIn > 0 ? { expiresIn } : {}),
    });
  }

  async searchMcid(
    person: PersonRecord
  ): Promise<Result<UpstreamResponse, UpstreamError>> {
    const payload = toMcidSearchRequest(person);
    const requestId = payload.requestID;

    try {
      const { status, data } = await this.post(this.opts.mcidUrl, {
        headers: {
          "Content-Type": "application/json",
          Apiuser: this.opts.mcidApiUser,
        },
        body: JSON.stringify(payload),
        verifyTls: this.opts.mcidVerifyTls,
      });
      this.log.info(`mcid: request ${requestId} answered HTTP ${status}`);
      return ok({ status, success: status === 200, data, requestId });
    } catch (e) {
      const message = errorMessage(e);
      this.log.error(`mcid: request ${requestId} failed: ${message}`);
      return err({ status: 500, message, requestId });
    }
  }

  private medicalHeaders(authorization: string): Record<string, string> {
    return {
      Authorization: authorization,
      "Content-Type": "application/json",
      Accept: "application/json",
    };
  }

  /**
   * Fetches a token, then posts the eligibility body once per configured
   * auth format until one is answered with HTTP 200. The last format's
   * outcome is returned whatever its status.
   */
  async submitMedicalEligibility(
    person: PersonRecord,
    getToken: TokenSource = () => this.fetchAccessToken()
  ): Promise<Result<UpstreamResponse, UpstreamError>> {
    const token = await getToken();
    if (!token.ok) {
      return err({ status: 500, message: ACCESS_TOKEN_NOT_FOUND });
    }

    const payload = toMedicalEligibilityRequest(
      person,
      this.opts.medicalCallerId
    );
    const requestId = payload.requestID;
    const body = JSON.stringify(payload);
    const formats = this.opts.medicalAuthFormats;

    let last: Result<UpstreamResponse, UpstreamError> = err({
      status: 500,
      message: "No authorization format was attempted",
      requestId,
    });

    for (const format of formats) {
      const label = authFormatLabel(format);
      try {
        const { status, data } = await this.post(this.opts.medicalUrl, {
          headers: this.medicalHeaders(
            formatAuthorization(format, token.value.accessToken)
          ),
          body,
        });
        this.log.info(
          `medical: request ${requestId} with ${label} auth answered HTTP ${status}`
        );
        last = ok({
          status,
          success: status === 200,
          data,
          requestId,
          authFormat: label,
        });
        if (status === 200) return last;
      } catch (e) {
        const message = errorMessage(e);
        this.log.warn(
          `medical: request ${requestId} with ${label} auth failed: ${message}`
        );
        last = err({ status: 500, message, requestId });
      }
    }

    return last;
  }

  /**
   * Tries every probe format in order, stopping at the first HTTP 200, and
   * reports each attempt.
   */
  async probeMedicalAuthFormats(
    person: PersonRecord,
    getToken: TokenSource = () => this.fetchAccessToken()
  ): Promise<Result<AuthProbeReport, UpstreamError>> {
    const token = await getToken();
    if (!token.ok) {
      return err({ status: 500, message: ACCESS_TOKEN_NOT_FOUND });
    }

    const payload = toMedicalEligibilityRequest(
      person,
      this.opts.medicalCallerId
    );
    const body = JSON.stringify(payload);
    const attempts: AuthAttempt[] = [];
    let successfulAuthFormat: AuthFormatLabel | null = null;

    for (const format of PROBE_AUTH_FORMATS) {
      const label = authFormatLabel(format);
      try {
        const { status, headers, data } = await this.post(
          this.opts.medicalUrl,
          {
            headers: this.medicalHeaders(
              formatAuthorization(format, token.value.accessToken)
            ),
            body,
          }
        );
        attempts.push({
          authFormat: label,
          status,
          success: status === 200,
          body:
            typeof data === "string" ? data.slice(0, PROBE_BODY_LIMIT) : data,
          headers,
        });
        if (status === 200) {
          successfulAuthFormat = label;
          break;
        }
      } catch (e) {
        attempts.push({
          authFormat: label,
          status: 500,
          success: false,
          error: errorMessage(e),
        });
      }
    }

    return ok({
      success: successfulAuthFormat !== null,
      attempts,
      payloadSent: payload,
      successfulAuthFormat,
      requestId: payload.requestID,
    });
  }

  /**
   * Token, MCID and medical side by side. The medical call gets its own
   * token from `getToken`; one part failing does not fail the others.
   */
  async runAll(
    person: PersonRecord,
    getToken: TokenSource = () => this.fetchAccessToken()
  ): Promise<{
    token: Result<AccessToken, UpstreamError>;
    mcid: Result<UpstreamResponse, UpstreamError>;
    medical: Result<UpstreamResponse, UpstreamError>;
  }> {
    const [token, mcid, medical] = await Promise.all([
      getToken(),
      this.searchMcid(person),
      this.submitMedicalEligibility(person, getToken),
    ]);
    return { token, mcid, medical };
  }

  /**
   * Runs the three calls with real data and reports what answered.
   * A 500 (including synthetic transport failures) counts as unreachable.
   */
  async testConnection(
    person: PersonRecord,
    getToken: TokenSource = () => this.fetchAccessToken()
  ): Promise<ConnectionReport> {
    const token = await getToken();
    const mcid = await this.searchMcid(person);
    const medical = await this.submitMedicalEligibility(person, getToken);

    const statusOf = (r: Result<UpstreamResponse, UpstreamError>) =>
      r.ok ? r.value.status : r.error.status;

    return {
      token: { reachable: token.ok, status: token.ok ? 200 : token.error.status },
      mcid: { reachable: statusOf(mcid) !== 500, status: statusOf(mcid) },
      medical: {
        reachable: statusOf(medical) !== 500,
        status: statusOf(medical),
      },
    };
  }

  /**
   * Lightweight reachability check: empty bodies to MCID and medical count
   * as reachable when answered with 200 or 400.
   */
  async checkConnectivity(): Promise<HealthFlags> {
    const probe = async (
      name: string,
      url: string,
      headers: Record<string, string>,
      verifyTls: boolean
    ): Promise<boolean> => {
      try {
        const { status } = await this.post(url, {
          headers: { "Content-Type": "application/json", ...headers },
          body: "{}",
          timeoutMs: this.opts.tokenTimeoutMs,
          verifyTls,
        });
        return status === 200 || status === 400;
      } catch (e) {
        this.log.error(`startup check: ${name} unreachable: ${errorMessage(e)}`);
        return false;
      }
    };

    const [token, mcid, medical] = await Promise.all([
      this.fetchAccessToken().then((r) => r.ok),
      probe(
        "mcid",
        this.opts.mcidUrl,
        { Apiuser: this.opts.mcidApiUser },
        this.opts.mcidVerifyTls
      ),
      probe("medical", this.opts.medicalUrl, { Authorization: "dummy" }, true),
    ]);

    return { token, mcid, medical };
  }
}
