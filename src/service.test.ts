import { describe, expect, test } from "vitest";
import { silentLogger } from "./logger";
import { normalizePerson } from "./person";
import { err, ok } from "./result";
import { EligibilityService, toTokenEnvelope, toUpstreamEnvelope } from "./service";
import { fakeUpstream, jsonResponse, testConfig, tokenOk } from "./test-support";
import type { AppConfig } from "./config";
import type { FetchLike } from "./upstream";

const NOW = 1_700_000_000_000;

const person = normalizePerson({
  firstName: "JANE",
  lastName: "DOE",
  ssn: "123456789",
  dateOfBirth: "1985-10-10",
  gender: "F",
  zipCodes: ["10001"],
});

function service(fetchImpl: FetchLike, overrides: Partial<AppConfig> = {}) {
  return EligibilityService.fromConfig(testConfig(overrides), {
    fetchImpl,
    logger: silentLogger,
    now: () => NOW,
  });
}

describe("envelopes", () => {
  test("success envelope embeds the upstream status", () => {
    expect(
      toUpstreamEnvelope(
        ok({ status: 403, success: false, data: "denied", requestId: "1", authFormat: "Bearer" })
      )
    ).toEqual({
      success: false,
      status_code: 403,
      data: "denied",
      request_id: "1",
      auth_format_used: "Bearer",
    });
  });

  test("error envelope carries the message", () => {
    expect(
      toUpstreamEnvelope(err({ status: 500, message: "fetch failed", requestId: "2" }))
    ).toEqual({
      success: false,
      status_code: 500,
      error: "fetch failed",
      request_id: "2",
    });
  });

  test("token envelope", () => {
    expect(toTokenEnvelope(ok({ accessToken: "t", expiresIn: 60 }))).toEqual({
      success: true,
      status_code: 200,
      access_token: "t",
      expires_in: 60,
    });
    expect(toTokenEnvelope(err({ status: 401, message: "no" }))).toEqual({
      success: false,
      status_code: 401,
      error: "no",
    });
  });
});

describe("EligibilityService", () => {
  test("runAll combines the three parts", async () => {
    const up = fakeUpstream({
      token: tokenOk,
      mcid: () => jsonResponse({ mcid: "M-1" }),
      medical: () => jsonResponse({ eligible: false }, 404),
    });

    const all = await service(up.fetchImpl).runAll(person);

    expect(all.success).toBe(true);
    expect(all.timestamp).toBe(1_700_000_000);
    expect(all.get_token).toEqual({
      success: true,
      status_code: 200,
      access_token: "tok-123",
      token_type: "Bearer",
    });
    expect(all.mcid_search).toMatchObject({ success: true, status_code: 200, data: { mcid: "M-1" } });
    expect(all.submit_medical).toMatchObject({
      success: false,
      status_code: 404,
      auth_format_used: "Bearer",
    });
  });

  test("runAll is unsuccessful when neither call succeeds", async () => {
    const up = fakeUpstream({ token: tokenOk });
    const all = await service(up.fetchImpl).runAll(person);
    expect(all.success).toBe(false);
    expect(all.get_token.success).toBe(true);
    expect(all.mcid_search).toMatchObject({ success: false, status_code: 500 });
  });

  test("a cached token is shared between calls", async () => {
    const up = fakeUpstream({
      token: tokenOk,
      medical: () => jsonResponse({}),
    });
    const svc = service(up.fetchImpl, { tokenCacheTtlSeconds: 60 });
    await svc.submitMedical(person);
    await svc.submitMedical(person);
    expect(up.callsTo("token")).toHaveLength(1);
  });

  test("probe envelope lists results", async () => {
    const up = fakeUpstream({
      token: tokenOk,
      medical: () => jsonResponse({ ok: true }),
    });
    const probe = await service(up.fetchImpl).probeMedicalAuth(person);
    expect(probe).toMatchObject({
      success: true,
      results: [
        {
          auth_format: "Bearer",
          status_code: 200,
          success: true,
          body: { ok: true },
          headers: { "content-type": "application/json" },
        },
      ],
      successful_auth_format: "Bearer",
    });
  });

  test("debugTransforms uses the clock for the request id", () => {
    const up = fakeUpstream({});
    const out = service(up.fetchImpl).debugTransforms(person);
    expect(out.success).toBe(true);
    expect(out.mcid_transformed.requestID).toBe(String(NOW));
    expect(out.medical_transformed.callerId).toBe("test-caller");
    expect(up.calls).toHaveLength(0);
  });

  test("checkConnectivity updates the health flags", async () => {
    const up = fakeUpstream({
      token: tokenOk,
      mcid: () => jsonResponse({}, 400),
      medical: () => jsonResponse({}, 400),
    });
    const svc = service(up.fetchImpl);
    expect(svc.health).toEqual({ token: false, mcid: false, medical: false });
    await svc.checkConnectivity();
    expect(svc.health).toEqual({ token: true, mcid: true, medical: true });
  });

  test("testConnection wraps the report", async () => {
    const up = fakeUpstream({
      token: tokenOk,
      mcid: () => jsonResponse({}),
      medical: () => jsonResponse({}),
    });
    expect(await service(up.fetchImpl).testConnection(person)).toEqual({
      success: true,
      token_api: { reachable: true, status: 200 },
      mcid_api: { reachable: true, status: 200 },
      medical_api: { reachable: true, status: 200 },
      timestamp: 1_700_000_000,
    });
  });
});
