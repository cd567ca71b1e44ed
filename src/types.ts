/**
 * Canonical person record accepted by every surface (HTTP, MCP, CLI).
 *
 * Built once per request by `normalizePerson` and never mutated afterwards.
 * Field contents are forwarded to the partner APIs as-is; only `gender` and
 * `zipCodes` are normalized.
 */
export type PersonRecord = Readonly<{
  firstName: string;
  lastName: string;
  ssn: string;
  /** `YYYY-MM-DD`, not validated. */
  dateOfBirth: string;
  gender: string;
  /** Never empty: defaults to `["00000"]`. */
  zipCodes: readonly string[];
}>;

/**
 * Loose input accepted before normalization.
 */
export type PersonInput = {
  firstName: string;
  lastName: string;
  ssn: string;
  dateOfBirth: string;
  gender: string;
  zipCodes?: ReadonlyArray<string | number>;
};

/**
 * Body of the MCID search call.
 */
export type McidSearchRequest = {
  requestID: string;
  processStatus: {
    completed: "false";
    isMemput: "false";
    errorCode: null;
    errorText: null;
  };
  consumer: [McidConsumer];
  searchSetting: {
    minScore: string;
    maxResult: string;
  };
};

export type McidConsumer = {
  firstName: string;
  lastName: string;
  middleName: null;
  sex: string;
  dob: string;
  addressList: [{ type: "P"; zip: string }];
  id: { ssn: string };
};

/**
 * Body of the medical eligibility call. Contact fields the partner may
 * expect are sent as empty strings.
 */
export type MedicalEligibilityRequest = {
  requestID: string;
  firstName: string;
  lastName: string;
  ssn: string;
  dateOfBirth: string;
  gender: string;
  zipCodes: string[];
  callerId: string;
  middleName: string;
  addressLine1: string;
  addressLine2: string;
  city: string;
  state: string;
  country: string;
  phoneNumber: string;
  email: string;
};

export type AccessToken = {
  accessToken: string;
  tokenType?: string;
  /** Seconds, when the token endpoint reports it. */
  expiresIn?: number;
};

export type AuthFormat = "bearer" | "raw" | "token" | "basic";

export type AuthFormatLabel = "Bearer" | "Raw" | "Token" | "Basic";

/**
 * An upstream exchange that completed at the HTTP level.
 *
 * `success` is only true for HTTP 200; any other status is still carried
 * here rather than turned into an error.
 */
export type UpstreamResponse = {
  status: number;
  success: boolean;
  data: unknown;
  requestId?: string;
  authFormat?: AuthFormatLabel;
};

/**
 * Transport failure, missing credential, or token rejection.
 */
export type UpstreamError = {
  status: number;
  message: string;
  requestId?: string;
};

export type AuthAttempt = {
  authFormat: AuthFormatLabel;
  status: number;
  success: boolean;
  body?: unknown;
  /** Response headers, lower-cased names. */
  headers?: Record<string, string>;
  error?: string;
};

export type AuthProbeReport = {
  success: boolean;
  attempts: AuthAttempt[];
  payloadSent: MedicalEligibilityRequest;
  successfulAuthFormat: AuthFormatLabel | null;
  requestId: string;
};

export type ConnectionReport = {
  token: { reachable: boolean; status: number };
  mcid: { reachable: boolean; status: number };
  medical: { reachable: boolean; status: number };
};

export type HealthFlags = {
  token: boolean;
  mcid: boolean;
  medical: boolean;
};

/**
 * Envelopes returned to inbound callers.
 *
 * The inbound HTTP status is 200 for all of these; callers inspect
 * `success` / `status_code`.
 */
export type SuccessEnvelope = {
  success: boolean;
  status_code: number;
  data: unknown;
  request_id?: string;
  auth_format_used?: AuthFormatLabel;
};

export type ErrorEnvelope = {
  success: false;
  status_code: number;
  error: string;
  request_id?: string;
};

export type UpstreamEnvelope = SuccessEnvelope | ErrorEnvelope;

export type TokenEnvelope =
  | {
      success: true;
      status_code: 200;
      access_token: string;
      token_type?: string;
      expires_in?: number;
    }
  | ErrorEnvelope;

export type AllEnvelope = {
  success: boolean;
  get_token: TokenEnvelope;
  mcid_search: UpstreamEnvelope;
  submit_medical: UpstreamEnvelope;
  /** Unix seconds. */
  timestamp: number;
};

export type ProbeEnvelope = {
  success: boolean;
  results: Array<{
    auth_format: AuthFormatLabel;
    status_code: number;
    success: boolean;
    body?: unknown;
    headers?: Record<string, string>;
    error?: string;
  }>;
  payload_sent: MedicalEligibilityRequest;
  successful_auth_format: AuthFormatLabel | null;
  request_id: string;
};

export type ConnectionEnvelope = {
  success: true;
  token_api: { reachable: boolean; status: number };
  mcid_api: { reachable: boolean; status: number };
  medical_api: { reachable: boolean; status: number };
  timestamp: number;
};
