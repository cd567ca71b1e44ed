import type { AppConfig } from "./config";
import type { Logger } from "./logger";
import type { Result } from "./result";
import { TokenProvider } from "./token-cache";
import { debugTransforms } from "./transform";
import { UpstreamClient, type FetchLike } from "./upstream";
import type {
  AccessToken,
  AllEnvelope,
  ConnectionEnvelope,
  ErrorEnvelope,
  HealthFlags,
  PersonRecord,
  ProbeEnvelope,
  TokenEnvelope,
  UpstreamEnvelope,
  UpstreamError,
  UpstreamResponse,
} from "./types";

function errorEnvelope(error: UpstreamError): ErrorEnvelope {
  return {
    success: false,
    status_code: error.status,
    error: error.message,
    ...(error.requestId ? { request_id: error.requestId } : {}),
  };
}

export function toUpstreamEnvelope(
  result: Result<UpstreamResponse, UpstreamError>
): UpstreamEnvelope {
  if (!result.ok) return errorEnvelope(result.error);

  const r = result.value;
  return {
    success: r.success,
    status_code: r.status,
    data: r.data,
    ...(r.requestId ? { request_id: r.requestId } : {}),
    ...(r.authFormat ? { auth_format_used: r.authFormat } : {}),
  };
}

export function toTokenEnvelope(
  result: Result<AccessToken, UpstreamError>
): TokenEnvelope {
  if (!result.ok) return errorEnvelope(result.error);

  const t = result.value;
  return {
    success: true,
    status_code: 200,
    access_token: t.accessToken,
    ...(t.tokenType ? { token_type: t.tokenType } : {}),
    ...(t.expiresIn !== undefined ? { expires_in: t.expiresIn } : {}),
  };
}

function unixSeconds(now: number): number {
  return Math.floor(now / 1000);
}

/**
 * Facade used by every inbound surface. Turns upstream results into the
 * JSON envelopes callers see and remembers the last connectivity check.
 */
export class EligibilityService {
  private readonly client: UpstreamClient;
  private readonly tokens: TokenProvider;
  private readonly callerId: string;
  private readonly now: () => number;
  private healthFlags: HealthFlags = { token: false, mcid: false, medical: false };

  constructor({
    client,
    tokens,
    callerId,
    now = Date.now,
  }: {
    client: UpstreamClient;
    tokens: TokenProvider;
    callerId: string;
    now?: () => number;
  }) {
    this.client = client;
    this.tokens = tokens;
    this.callerId = callerId;
    this.now = now;
  }

  static fromConfig(
    config: AppConfig,
    opts: { fetchImpl?: FetchLike; logger?: Logger; now?: () => number } = {}
  ): EligibilityService {
    const client = new UpstreamClient({
      ...config,
      fetchImpl: opts.fetchImpl,
      logger: opts.logger,
    });
    const tokens = new TokenProvider(() => client.fetchAccessToken(), {
      ttlSeconds: config.tokenCacheTtlSeconds,
      now: opts.now,
    });
    return new EligibilityService({
      client,
      tokens,
      callerId: config.medicalCallerId,
      now: opts.now,
    });
  }

  private readonly tokenSource = () => this.tokens.get();

  get health(): HealthFlags {
    return { ...this.healthFlags };
  }

  async getToken(): Promise<TokenEnvelope> {
    return toTokenEnvelope(await this.tokenSource());
  }

  async searchMcid(person: PersonRecord): Promise<UpstreamEnvelope> {
    return toUpstreamEnvelope(await this.client.searchMcid(person));
  }

  async submitMedical(person: PersonRecord): Promise<UpstreamEnvelope> {
    return toUpstreamEnvelope(
      await this.client.submitMedicalEligibility(person, this.tokenSource)
    );
  }

  async probeMedicalAuth(
    person: PersonRecord
  ): Promise<ProbeEnvelope | ErrorEnvelope> {
    const result = await this.client.probeMedicalAuthFormats(
      person,
      this.tokenSource
    );
    if (!result.ok) return errorEnvelope(result.error);

    const r = result.value;
    return {
      success: r.success,
      results: r.attempts.map((a) => ({
        auth_format: a.authFormat,
        status_code: a.status,
        success: a.success,
        ...(a.error !== undefined
          ? { error: a.error }
          : { body: a.body, headers: a.headers }),
      })),
      payload_sent: r.payloadSent,
      successful_auth_format: r.successfulAuthFormat,
      request_id: r.requestId,
    };
  }

  async runAll(person: PersonRecord): Promise<AllEnvelope> {
    const { token, mcid, medical } = await this.client.runAll(
      person,
      this.tokenSource
    );
    const mcidSearch = toUpstreamEnvelope(mcid);
    const submitMedical = toUpstreamEnvelope(medical);

    return {
      success: mcidSearch.success || submitMedical.success,
      get_token: toTokenEnvelope(token),
      mcid_search: mcidSearch,
      submit_medical: submitMedical,
      timestamp: unixSeconds(this.now()),
    };
  }

  debugTransforms(
    person: PersonRecord
  ): { success: true } & ReturnType<typeof debugTransforms> {
    return {
      success: true,
      ...debugTransforms(person, this.callerId, String(this.now())),
    };
  }

  async testConnection(person: PersonRecord): Promise<ConnectionEnvelope> {
    const report = await this.client.testConnection(person, this.tokenSource);
    return {
      success: true,
      token_api: report.token,
      mcid_api: report.mcid,
      medical_api: report.medical,
      timestamp: unixSeconds(this.now()),
    };
  }

  async checkConnectivity(): Promise<HealthFlags> {
    this.healthFlags = await this.client.checkConnectivity();
    return this.health;
  }
}
