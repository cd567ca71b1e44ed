import { describe, expect, test } from "vitest";
import { normalizePerson } from "./person";
import {
  debugTransforms,
  generateRequestId,
  toMcidSearchRequest,
  toMedicalEligibilityRequest,
} from "./transform";

const jane = normalizePerson({
  firstName: "JANE",
  lastName: "DOE",
  ssn: "123456789",
  dateOfBirth: "1985-10-10",
  gender: "f",
  zipCodes: [],
});

describe("generateRequestId", () => {
  test("is the millisecond timestamp as a string", () => {
    expect(generateRequestId(1700000000123)).toBe("1700000000123");
  });
});

describe("toMcidSearchRequest", () => {
  test("wraps the person as the only consumer", () => {
    expect(toMcidSearchRequest(jane, "42")).toEqual({
      requestID: "42",
      processStatus: {
        completed: "false",
        isMemput: "false",
        errorCode: null,
        errorText: null,
      },
      consumer: [
        {
          firstName: "JANE",
          lastName: "DOE",
          middleName: null,
          sex: "F",
          dob: "19851010",
          addressList: [{ type: "P", zip: "00000" }],
          id: { ssn: "123456789" },
        },
      ],
      searchSetting: { minScore: "100", maxResult: "1" },
    });
  });

  test("keeps only the first zip code", () => {
    const p = normalizePerson({ ...jane, zipCodes: ["23060", "23229"] });
    const req = toMcidSearchRequest(p, "1");
    expect(req.consumer).toHaveLength(1);
    expect(req.consumer[0].addressList).toEqual([{ type: "P", zip: "23060" }]);
  });

  test("strips every dash from the date of birth", () => {
    const p = normalizePerson({ ...jane, dateOfBirth: "1985-1-0-10" });
    expect(toMcidSearchRequest(p, "1").consumer[0].dob).toBe("19851010");
  });

  test("is deterministic for a fixed request id", () => {
    expect(toMcidSearchRequest(jane, "7")).toEqual(toMcidSearchRequest(jane, "7"));
  });
});

describe("toMedicalEligibilityRequest", () => {
  test("flattens the person and pads contact fields", () => {
    expect(toMedicalEligibilityRequest(jane, "caller-1", "42")).toEqual({
      requestID: "42",
      firstName: "JANE",
      lastName: "DOE",
      ssn: "123456789",
      dateOfBirth: "1985-10-10",
      gender: "F",
      zipCodes: ["00000"],
      callerId: "caller-1",
      middleName: "",
      addressLine1: "",
      addressLine2: "",
      city: "",
      state: "",
      country: "US",
      phoneNumber: "",
      email: "",
    });
  });

  test("sends every zip code", () => {
    const p = normalizePerson({ ...jane, zipCodes: ["23060", "23229", "23242"] });
    expect(toMedicalEligibilityRequest(p, "c", "1").zipCodes).toEqual([
      "23060",
      "23229",
      "23242",
    ]);
  });

  test("is deterministic for a fixed request id", () => {
    expect(toMedicalEligibilityRequest(jane, "c", "9")).toEqual(
      toMedicalEligibilityRequest(jane, "c", "9")
    );
  });
});

describe("debugTransforms", () => {
  test("shares one request id between both bodies", () => {
    const out = debugTransforms(jane, "caller-1", "55");
    expect(out.original_input).toBe(jane);
    expect(out.mcid_transformed.requestID).toBe("55");
    expect(out.medical_transformed.requestID).toBe("55");
    expect(out.medical_transformed.callerId).toBe("caller-1");
  });
});
