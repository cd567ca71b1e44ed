import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { parsePerson, personFields, PersonValidationError } from "./person";
import type { EligibilityService } from "./service";
import type { PersonRecord } from "./types";

export const MCP_SERVER_NAME = "eligibility-gateway";

function jsonContent(payload: unknown) {
  return {
    content: [
      { type: "text" as const, text: JSON.stringify(payload, null, 2) },
    ],
  };
}

function errorContent(message: string) {
  return {
    content: [{ type: "text" as const, text: message }],
    isError: true,
  };
}

/**
 * Registers a tool taking a person. Arguments go through `parsePerson`,
 * the same validation and normalization HTTP bodies get.
 */
function personTool(
  server: McpServer,
  name: string,
  description: string,
  run: (person: PersonRecord) => unknown
): void {
  server.tool(name, description, personFields, async (args) => {
    let person: PersonRecord;
    try {
      person = parsePerson(args);
    } catch (e) {
      if (e instanceof PersonValidationError) return errorContent(e.message);
      throw e;
    }
    return jsonContent(await run(person));
  });
}

/**
 * MCP surface over the same service the HTTP routes use.
 */
export function createMcpServer(
  service: EligibilityService,
  version = "1.0.0"
): McpServer {
  const server = new McpServer({ name: MCP_SERVER_NAME, version });

  personTool(
    server,
    "search_mcid",
    "Search the MCID (member/consumer identifier) service for a person.",
    (person) => service.searchMcid(person)
  );

  personTool(
    server,
    "submit_medical",
    "Submit a medical eligibility request for a person.",
    (person) => service.submitMedical(person)
  );

  personTool(
    server,
    "submit_medical_alt",
    "Submit a medical eligibility request trying every authorization header format and report each attempt.",
    (person) => service.probeMedicalAuth(person)
  );

  personTool(
    server,
    "get_both",
    "Run the MCID search and the medical eligibility request for a person in parallel.",
    (person) => service.runAll(person)
  );

  server.tool(
    "get_auth_token",
    "Fetch an OAuth2 access token from the partner token endpoint.",
    async () => jsonContent(await service.getToken())
  );

  personTool(
    server,
    "debug_transforms",
    "Show how a person is reshaped for the MCID and medical APIs.",
    (person) => service.debugTransforms(person)
  );

  personTool(
    server,
    "test_connection",
    "Check that the token, MCID and medical APIs answer.",
    (person) => service.testConnection(person)
  );

  server.prompt(
    "eligibility-lookup",
    "Look up member identity and medical eligibility for a person.",
    { query: z.string().describe("Who to look up, in plain language") },
    ({ query }) => ({
      messages: [
        {
          role: "user",
          content: {
            type: "text",
            text: `Use the get_both tool to retrieve the member identifier and medical eligibility for this person. Query: ${query}`,
          },
        },
      ],
    })
  );

  return server;
}
