import type {
  McidSearchRequest,
  MedicalEligibilityRequest,
  PersonRecord,
} from "./types";

export const MCID_MIN_SCORE = "100";
export const MCID_MAX_RESULT = "1";

/**
 * Request id sent to both partners: the wall-clock time in milliseconds.
 */
export function generateRequestId(now: number = Date.now()): string {
  return String(Math.trunc(now));
}

/**
 * Wraps the person as the single consumer of an MCID search.
 *
 * `dob` is `dateOfBirth` with dashes removed. Only the first zip code is
 * sent.
 */
export function toMcidSearchRequest(
  person: PersonRecord,
  requestId: string = generateRequestId()
): McidSearchRequest {
  return {
    requestID: requestId,
    processStatus: {
      completed: "false",
      isMemput: "false",
      errorCode: null,
      errorText: null,
    },
    consumer: [
      {
        firstName: person.firstName,
        lastName: person.lastName,
        middleName: null,
        sex: person.gender,
        dob: person.dateOfBirth.replace(/-/g, ""),
        addressList: [{ type: "P", zip: person.zipCodes[0] }],
        id: { ssn: person.ssn },
      },
    ],
    searchSetting: {
      minScore: MCID_MIN_SCORE,
      maxResult: MCID_MAX_RESULT,
    },
  };
}

export function toMedicalEligibilityRequest(
  person: PersonRecord,
  callerId: string,
  requestId: string = generateRequestId()
): MedicalEligibilityRequest {
  return {
    requestID: requestId,
    firstName: person.firstName,
    lastName: person.lastName,
    ssn: person.ssn,
    dateOfBirth: person.dateOfBirth,
    gender: person.gender,
    zipCodes: [...person.zipCodes],
    callerId,
    middleName: "",
    addressLine1: "",
    addressLine2: "",
    city: "",
    state: "",
    country: "US",
    phoneNumber: "",
    email: "",
  };
}

/**
 * Shows how one person is reshaped for each partner. Both bodies share a
 * request id.
 */
export function debugTransforms(
  person: PersonRecord,
  callerId: string,
  requestId: string = generateRequestId()
): {
  original_input: PersonRecord;
  mcid_transformed: McidSearchRequest;
  medical_transformed: MedicalEligibilityRequest;
} {
  return {
    original_input: person,
    mcid_transformed: toMcidSearchRequest(person, requestId),
    medical_transformed: toMedicalEligibilityRequest(
      person,
      callerId,
      requestId
    ),
  };
}
