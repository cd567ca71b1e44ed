import samplePersonJson from "../data/sample-person.json";
import { parsePerson } from "./person";
import type { EligibilityService } from "./service";
import type { PersonRecord } from "./types";

export const TOOL_NAMES = [
  "get_token",
  "mcid_search",
  "submit_medical",
  "submit_medical_alt",
  "all",
  "debug_transforms",
  "test_connection",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((t) => t === name);
}

export class ToolNotFoundError extends Error {
  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = "ToolNotFoundError";
  }
}

/**
 * Person used by `all` when it is called without a body.
 */
export const samplePerson: PersonRecord = parsePerson(samplePersonJson);

function isEmptyBody(body: unknown): boolean {
  if (body === undefined || body === null) return true;
  return (
    typeof body === "object" &&
    !Array.isArray(body) &&
    Object.keys(body).length === 0
  );
}

/**
 * Runs a named tool. Throws `ToolNotFoundError` for unknown names and
 * `PersonValidationError` when a person body does not validate.
 */
export async function invokeTool(
  service: EligibilityService,
  name: string,
  body: unknown
): Promise<unknown> {
  if (!isToolName(name)) throw new ToolNotFoundError(name);

  switch (name) {
    case "get_token":
      return service.getToken();
    case "mcid_search":
      return service.searchMcid(parsePerson(body));
    case "submit_medical":
      return service.submitMedical(parsePerson(body));
    case "submit_medical_alt":
      return service.probeMedicalAuth(parsePerson(body));
    case "all":
      return service.runAll(isEmptyBody(body) ? samplePerson : parsePerson(body));
    case "debug_transforms":
      return service.debugTransforms(parsePerson(body));
    case "test_connection":
      return service.testConnection(parsePerson(body));
  }
}
