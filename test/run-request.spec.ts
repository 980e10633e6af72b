// test/run-request.spec.ts
import { describe, it, expect } from "vitest";
import {
  ValidationError,
  splitLineTokens,
  validateRunRequest,
} from "../src/services/run-request.service";

const LINES_MESSAGE = "lines must be comma-separated integers, e.g., '6,17'";
const COUNTRY_MESSAGE = "country must be ISO code like 'SG' or 'SGP'";

const valid = { from_date: "31AUG2019", lines: "6,17", country: "SG" };

function validationErrorOf(body: unknown): ValidationError {
  try {
    validateRunRequest(body);
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("validateRunRequest: dates", () => {
  it.each(["31AUG2019", "31aug2019", "1Aug2019", "29feb2020", "01JAN1999"])(
    "normalizes %j to its uppercase form",
    (text) => {
      const out = validateRunRequest({ ...valid, from_date: text, to_date: text });
      expect(out.from_date).toBe(text.toUpperCase());
      expect(out.to_date).toBe(text.toUpperCase());
    }
  );

  it("treats a missing, null or empty to_date as no previous date", () => {
    expect(validateRunRequest(valid).to_date).toBeNull();
    expect(validateRunRequest({ ...valid, to_date: null }).to_date).toBeNull();
    expect(validateRunRequest({ ...valid, to_date: "" }).to_date).toBeNull();
  });

  it("rejects an unparsable from_date", () => {
    const err = validationErrorOf({ ...valid, from_date: "2019-08-31" });
    expect(err.issues).toEqual([
      { field: "from_date", message: "from_date must be DDMMMYYYY, e.g., 31AUG2019" },
    ]);
  });

  it("rejects an unparsable to_date", () => {
    const err = validationErrorOf({ ...valid, to_date: "31JUN2019" });
    expect(err.issues).toEqual([
      { field: "to_date", message: "to_date must be DDMMMYYYY, e.g., 31JUL2019" },
    ]);
  });

  it("requires from_date", () => {
    const err = validationErrorOf({ lines: "6", country: "SG" });
    expect(err.issues).toEqual([{ field: "from_date", message: "from_date is required" }]);
  });
});

describe("validateRunRequest: lines", () => {
  it("trims tokens and drops blanks", () => {
    expect(validateRunRequest({ ...valid, lines: " 6, 17 ,," }).lines).toBe("6,17");
  });

  it("preserves order", () => {
    expect(validateRunRequest({ ...valid, lines: "17,6,1" }).lines).toBe("17,6,1");
  });

  it("accepts signed integers", () => {
    expect(validateRunRequest({ ...valid, lines: "+6,-3" }).lines).toBe("+6,-3");
  });

  it.each(["", " , ", "6,abc", "6.5", "6;17", "0x10", "6,9007199254740993", "1" + "0".repeat(400)])(
    "rejects %j",
    (lines) => {
      const err = validationErrorOf({ ...valid, lines });
      expect(err.issues).toEqual([{ field: "lines", message: LINES_MESSAGE }]);
    }
  );

  it("accepts the largest safe integer", () => {
    expect(validateRunRequest({ ...valid, lines: "9007199254740991" }).lines).toBe("9007199254740991");
  });

  it("rejects a non-string", () => {
    const err = validationErrorOf({ ...valid, lines: 6 });
    expect(err.issues).toEqual([{ field: "lines", message: "lines must be a string" }]);
  });
});

describe("validateRunRequest: country", () => {
  it("trims and uppercases", () => {
    expect(validateRunRequest({ ...valid, country: " sg " }).country).toBe("SG");
    expect(validateRunRequest({ ...valid, country: "sgp" }).country).toBe("SGP");
  });

  it.each(["", "S", "SGPX", "   "])("rejects %j", (country) => {
    const err = validationErrorOf({ ...valid, country });
    expect(err.issues).toEqual([{ field: "country", message: COUNTRY_MESSAGE }]);
  });
});

describe("validateRunRequest: whole body", () => {
  it("reports every failing field, joined in the message", () => {
    const err = validationErrorOf({ from_date: "bad", lines: "x", country: "S" });
    expect(err.issues.map((i) => i.field)).toEqual(["from_date", "lines", "country"]);
    expect(err.message).toBe(
      `from_date must be DDMMMYYYY, e.g., 31AUG2019; ${LINES_MESSAGE}; ${COUNTRY_MESSAGE}`
    );
  });

  it("rejects a body that is not an object", () => {
    const err = validationErrorOf(null);
    expect(err.issues).toEqual([{ field: "body", message: "Request body must be a JSON object" }]);
  });

  it("drops unknown keys", () => {
    expect(validateRunRequest({ ...valid, extra: true })).toEqual({
      from_date: "31AUG2019",
      to_date: null,
      lines: "6,17",
      country: "SG",
    });
  });
});

describe("splitLineTokens", () => {
  it("splits on commas and trims", () => {
    expect(splitLineTokens(" 6 ,, 17")).toEqual(["6", "17"]);
  });
});
