import { z } from "zod";
import type { PersonInput, PersonRecord } from "./types";

export const DEFAULT_ZIP_CODE = "00000";

/**
 * Person fields, shared by the HTTP body schema and the MCP tool
 * definitions. `socialSecurityNumber` is accepted in place of `ssn`.
 */
export const personFields = {
  firstName: z.string().trim().min(1).describe("Person's first name"),
  lastName: z.string().trim().min(1).describe("Person's last name"),
  ssn: z.string().optional().describe("Social Security Number"),
  socialSecurityNumber: z
    .string()
    .optional()
    .describe("Alias for ssn"),
  dateOfBirth: z.string().describe("Date of birth in YYYY-MM-DD format"),
  gender: z.string().describe('"M" or "F"'),
  zipCodes: z
    .array(z.union([z.string(), z.number()]))
    .optional()
    .describe("Zip codes, most relevant first; defaults to 00000"),
};

/**
 * Inbound person. Unknown keys are stripped; one of `ssn` or
 * `socialSecurityNumber` is required.
 */
export const personInputSchema = z
  .object(personFields)
  .refine((p) => p.ssn !== undefined || p.socialSecurityNumber !== undefined, {
    message: "Required",
    path: ["ssn"],
  });

export class PersonValidationError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(error: z.ZodError) {
    super(
      `Invalid person record: ${error.issues
        .map((i) => `${i.path.join(".") || "(root)"} ${i.message}`)
        .join("; ")}`
    );
    this.name = "PersonValidationError";
    this.issues = error.issues;
  }
}

/**
 * Builds the immutable canonical record.
 *
 * Gender is upper-cased but never rejected. An empty zip list becomes the
 * sentinel `["00000"]`.
 */
export function normalizePerson(input: PersonInput): PersonRecord {
  const zips = (input.zipCodes ?? []).map((z) => String(z).trim());

  return Object.freeze({
    firstName: input.firstName.trim(),
    lastName: input.lastName.trim(),
    ssn: input.ssn.trim(),
    dateOfBirth: input.dateOfBirth.trim(),
    gender: input.gender.trim().toUpperCase(),
    zipCodes: Object.freeze(zips.length > 0 ? zips : [DEFAULT_ZIP_CODE]),
  });
}

/**
 * Validates an untrusted body and normalizes it.
 * Throws `PersonValidationError` on shape errors.
 */
export function parsePerson(body: unknown): PersonRecord {
  const parsed = personInputSchema.safeParse(body);
  if (!parsed.success) throw new PersonValidationError(parsed.error);

  const { ssn, socialSecurityNumber, ...rest } = parsed.data;
  return normalizePerson({ ...rest, ssn: ssn ?? socialSecurityNumber ?? "" });
}
