import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, test } from "vitest";
import { silentLogger } from "./logger";
import { createMcpServer } from "./mcp";
import { EligibilityService } from "./service";
import { fakeUpstream, jsonResponse, testConfig, tokenOk } from "./test-support";

const JANE = {
  firstName: "JANE",
  lastName: "DOE",
  ssn: "123456789",
  dateOfBirth: "1985-10-10",
  gender: "f",
  zipCodes: [],
};

let client: Client | null = null;

afterEach(async () => {
  await client?.close();
  client = null;
});

async function connect(handlers: Parameters<typeof fakeUpstream>[0]) {
  const up = fakeUpstream(handlers);
  const service = EligibilityService.fromConfig(testConfig(), {
    fetchImpl: up.fetchImpl,
    logger: silentLogger,
  });
  const server = createMcpServer(service);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const c = new Client({ name: "test-client", version: "0.0.0" });
  await Promise.all([c.connect(clientTransport), server.connect(serverTransport)]);
  client = c;
  return { client: c, up };
}

async function callJson(c: Client, name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(
    await c.callTool({ name, arguments: args })
  );
  const [first] = result.content;
  if (first?.type !== "text") throw new Error("expected text content");
  return { isError: result.isError ?? false, payload: JSON.parse(first.text) };
}

/** Tool outcome, whether the SDK reports a failure as a result or a throw. */
async function callOutcome(
  c: Client,
  name: string,
  args: Record<string, unknown>
): Promise<{ isError: boolean; text: string }> {
  try {
    const result = CallToolResultSchema.parse(
      await c.callTool({ name, arguments: args })
    );
    const [first] = result.content;
    return {
      isError: result.isError ?? false,
      text: first?.type === "text" ? first.text : "",
    };
  } catch (e) {
    return { isError: true, text: e instanceof Error ? e.message : String(e) };
  }
}

describe("MCP server", () => {
  test("lists the tools", async () => {
    const { client: c } = await connect({});
    const { tools } = await c.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "debug_transforms",
      "get_auth_token",
      "get_both",
      "search_mcid",
      "submit_medical",
      "submit_medical_alt",
      "test_connection",
    ]);
  });

  test("debug_transforms normalizes the person", async () => {
    const { client: c } = await connect({});
    const { payload } = await callJson(c, "debug_transforms", JANE);
    expect(payload.original_input.gender).toBe("F");
    expect(payload.original_input.zipCodes).toEqual(["00000"]);
    expect(payload.mcid_transformed.consumer[0].dob).toBe("19851010");
  });

  test("search_mcid returns the envelope", async () => {
    const { client: c } = await connect({
      mcid: () => jsonResponse({ mcid: "M-1" }),
    });
    const { isError, payload } = await callJson(c, "search_mcid", JANE);
    expect(isError).toBe(false);
    expect(payload).toMatchObject({
      success: true,
      status_code: 200,
      data: { mcid: "M-1" },
    });
  });

  test("rejects an empty first name without calling upstream", async () => {
    const { client: c, up } = await connect({
      mcid: () => jsonResponse({ mcid: "M-1" }),
    });
    const { isError, text } = await callOutcome(c, "search_mcid", {
      ...JANE,
      firstName: "  ",
    });
    expect(isError).toBe(true);
    expect(text).toContain("firstName");
    expect(up.calls).toHaveLength(0);
  });

  test("rejects a person without ssn", async () => {
    const { client: c, up } = await connect({});
    const { ssn: _ssn, ...noSsn } = JANE;
    expect(await callOutcome(c, "search_mcid", noSsn)).toEqual({
      isError: true,
      text: "Invalid person record: ssn Required",
    });
    expect(up.calls).toHaveLength(0);
  });

  test("defaults missing zip codes", async () => {
    const { client: c, up } = await connect({
      mcid: () => jsonResponse({ mcid: "M-1" }),
    });
    const { zipCodes: _zips, ...noZips } = JANE;
    const { isError } = await callJson(c, "search_mcid", noZips);
    expect(isError).toBe(false);
    const sent = JSON.parse(up.callsTo("mcid")[0].init.body);
    expect(sent.consumer[0].addressList).toEqual([{ type: "P", zip: "00000" }]);
  });

  test("accepts the socialSecurityNumber alias and numeric zips", async () => {
    const { client: c, up } = await connect({
      mcid: () => jsonResponse({ mcid: "M-1" }),
    });
    const { ssn: _ssn, ...rest } = JANE;
    await callJson(c, "search_mcid", {
      ...rest,
      socialSecurityNumber: "987654321",
      zipCodes: [10001],
    });
    const sent = JSON.parse(up.callsTo("mcid")[0].init.body);
    expect(sent.consumer[0].id).toEqual({ ssn: "987654321" });
    expect(sent.consumer[0].addressList).toEqual([{ type: "P", zip: "10001" }]);
  });

  test("debug_transforms answers with success", async () => {
    const { client: c } = await connect({});
    const { payload } = await callJson(c, "debug_transforms", JANE);
    expect(payload.success).toBe(true);
  });

  test("get_auth_token takes no arguments", async () => {
    const { client: c } = await connect({ token: tokenOk });
    const { payload } = await callJson(c, "get_auth_token");
    expect(payload.access_token).toBe("tok-123");
  });

  test("exposes the lookup prompt", async () => {
    const { client: c } = await connect({});
    const prompt = await c.getPrompt({
      name: "eligibility-lookup",
      arguments: { query: "Jane Doe" },
    });
    const [message] = prompt.messages;
    expect(message.role).toBe("user");
    expect(message.content).toEqual({
      type: "text",
      text: "Use the get_both tool to retrieve the member identifier and medical eligibility for this person. Query: Jane Doe",
    });
  });
});
