// ---------------------------------------------------------------------------
// Tests for ISBN normalisation, check digits, parsing and formatting
// ---------------------------------------------------------------------------

import { fileURLToPath } from "node:url";
import { describe, it, expect, beforeAll } from "vitest";

import {
  computeISBN10CheckDigit,
  computeISBN13CheckDigit,
  calcCheckDigit,
  validateCheckDigit,
} from "../../../src/domain/isbn/check-digit.js";
import {
  normalizeISBN,
  normalizeAndCheck,
} from "../../../src/domain/isbn/normalize.js";
import {
  ParsedISBN,
  parseISBN,
  parseISBNOrThrow,
} from "../../../src/domain/isbn/isbn.js";
import { RangeDataStore } from "../../../src/domain/ranges/range-store.js";
import {
  InvalidCharacterError,
  InvalidCheckDigitError,
  InvalidLengthError,
  ISBNValidationError,
  NoRangeDataError,
  RangeDataLoadError,
  isISBNParseError,
} from "../../../src/core/errors.js";
import { ISBNErrorKind } from "../../../src/core/types.js";

const RANGE_FILE = fileURLToPath(
  new URL("../../fixtures/RangeMessage.xml", import.meta.url),
);

// ── Normalisation ───────────────────────────────────────────────────────────

describe("normalizeISBN", () => {
  it("removes hyphens", () => {
    expect(normalizeISBN("978-0-306-40615-7")).toBe("9780306406157");
  });

  it("removes spaces and tabs", () => {
    expect(normalizeISBN(" 978 0 306\t40615 7 ")).toBe("9780306406157");
  });

  it("upper-cases a trailing x", () => {
    expect(normalizeISBN("089686281x")).toBe("089686281X");
  });
});

describe("normalizeAndCheck", () => {
  it("returns the normalised ISBN when it is well-formed", () => {
    expect(normalizeAndCheck("0-89686-281-x")).toBe("089686281X");
  });

  it("rejects an empty string as InvalidLength", () => {
    expect(() => normalizeAndCheck("")).toThrow(InvalidLengthError);
  });

  it("rejects 11 and 12 character strings", () => {
    expect(() => normalizeAndCheck("12345678901")).toThrow(InvalidLengthError);
    expect(() => normalizeAndCheck("123456789012")).toThrow(InvalidLengthError);
  });

  it("checks length before characters", () => {
    expect(() => normalizeAndCheck("9780590132053F")).toThrow(InvalidLengthError);
  });

  it("reports the offending character and its position", () => {
    try {
      normalizeAndCheck("9780590d32053");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidCharacterError);
      if (err instanceof InvalidCharacterError) {
        expect(err.character).toBe("D");
        expect(err.position).toBe(7);
        expect(err.kind).toBe(ISBNErrorKind.INVALID_CHARACTER);
      }
    }
  });

  it("allows X only in the last position", () => {
    expect(() => normalizeAndCheck("08968628X1")).toThrow(InvalidCharacterError);
  });

  it("does not allow X as an ISBN-13 body digit", () => {
    expect(() => normalizeAndCheck("978X590132053")).toThrow(InvalidCharacterError);
  });
});

// ── Check-digit computation ─────────────────────────────────────────────────

describe("computeISBN10CheckDigit", () => {
  it("computes correct check digit for a well-known ISBN-10", () => {
    expect(computeISBN10CheckDigit("030640615")).toBe("2");
  });

  it("returns X when the check digit is 10", () => {
    expect(computeISBN10CheckDigit("080442957")).toBe("X");
  });

  it("returns 0 when the remainder is 0", () => {
    expect(computeISBN10CheckDigit("100000006")).toBe("0");
  });

  it("throws for input that is not 9 digits", () => {
    expect(() => computeISBN10CheckDigit("12345")).toThrow(RangeError);
    expect(() => computeISBN10CheckDigit("12345678X")).toThrow(RangeError);
    expect(() => computeISBN10CheckDigit("1234567890")).toThrow(RangeError);
  });
});

describe("computeISBN13CheckDigit", () => {
  it("computes correct check digit for a well-known ISBN-13", () => {
    expect(computeISBN13CheckDigit("978030640615")).toBe("7");
  });

  it("computes check digit 0 correctly", () => {
    expect(computeISBN13CheckDigit("978000000004")).toBe("0");
  });

  it("agrees with the ISBN-10 form of the same book", () => {
    expect(computeISBN13CheckDigit("978054792824")).toBe("1");
    expect(computeISBN10CheckDigit("054792824")).toBe("6");
  });

  it("throws for input that is not 12 digits", () => {
    expect(() => computeISBN13CheckDigit("12345")).toThrow(RangeError);
    expect(() => computeISBN13CheckDigit("1234567890123")).toThrow(RangeError);
  });
});

describe("calcCheckDigit", () => {
  const cases: Array<[string, string]> = [
    ["88 04 47328 2", "2"],
    ["978-8804473282", "2"],
    ["0547928246", "6"],
    ["978-0547928241", "1"],
    ["978 0670013951", "1"],
    ["089686281x", "X"],
    ["9780822527602", "2"],
    ["978-8891230195", "5"],
    ["9780590732053", "5"],
    ["081666303x", "3"],
  ];

  it.each(cases)("calculates the check digit of %s as %s", (input, digit) => {
    expect(calcCheckDigit(input)).toBe(digit);
  });

  it("is deterministic", () => {
    expect(calcCheckDigit("0547928246")).toBe(calcCheckDigit("0547928246"));
  });

  it("throws InvalidCharacter for a letter in the body", () => {
    expect(() => calcCheckDigit("97805S0132053")).toThrow(InvalidCharacterError);
  });

  it("throws InvalidCharacter for a check digit other than 0-9 or X", () => {
    expect(() => calcCheckDigit("978-059013205F")).toThrow(InvalidCharacterError);
  });

  it("throws InvalidLength for an empty string", () => {
    expect(() => calcCheckDigit("")).toThrow(InvalidLengthError);
  });
});

describe("validateCheckDigit", () => {
  it("returns true for a valid ISBN-10", () => {
    expect(validateCheckDigit("0306406152")).toBe(true);
  });

  it("returns true for a lower-case x check digit", () => {
    expect(validateCheckDigit("0-89686-281-x")).toBe(true);
  });

  it("returns true for a valid ISBN-13", () => {
    expect(validateCheckDigit("978-0-306-40615-7")).toBe(true);
  });

  it("returns false for wrong check digit", () => {
    expect(validateCheckDigit("0306406153")).toBe(false);
    expect(validateCheckDigit("9780590732053")).toBe(false);
  });

  it("returns false instead of throwing for malformed input", () => {
    expect(validateCheckDigit("")).toBe(false);
    expect(validateCheckDigit("12345")).toBe(false);
    expect(validateCheckDigit("97805S0132053")).toBe(false);
  });
});

// ── Parsing ─────────────────────────────────────────────────────────────────

describe("parseISBN without range data", () => {
  it("fails with NoRangeData for a well-formed ISBN", () => {
    const result = new RangeDataStore().parse("0547928246");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NoRangeDataError);
      expect(result.error.kind).toBe(ISBNErrorKind.NO_RANGE_DATA);
    }
  });

  it("still reports structural errors first", () => {
    const result = parseISBN("", null);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidLengthError);
    }
  });
});

describe("isISBNParseError", () => {
  it("accepts each error a parse can end with", () => {
    expect(isISBNParseError(new InvalidLengthError("123", 3))).toBe(true);
    expect(isISBNParseError(new InvalidCharacterError("12345678Y0", "Y", 8))).toBe(true);
    expect(isISBNParseError(new InvalidCheckDigitError("0547928240", "6", "0"))).toBe(true);
    expect(isISBNParseError(new NoRangeDataError())).toBe(true);
  });

  it("rejects other errors", () => {
    expect(isISBNParseError(new ISBNValidationError("0547928246", "invalid_length", "x"))).toBe(
      false,
    );
    expect(isISBNParseError(new RangeDataLoadError("a.xml", "missing"))).toBe(false);
    expect(isISBNParseError(new Error("boom"))).toBe(false);
    expect(isISBNParseError("boom")).toBe(false);
  });
});

describe("parseISBN", () => {
  const store = new RangeDataStore();

  beforeAll(() => {
    store.load(RANGE_FILE);
  });

  function parsed(input: string): ParsedISBN {
    const table = store.current;
    return parseISBNOrThrow(input, table);
  }

  it("splits an ISBN-10 into its elements", () => {
    const isbn = parsed("0547928246");
    expect(isbn.prefix).toBe("978");
    expect(isbn.registrationGroup).toBe("0");
    expect(isbn.registrant).toBe("547");
    expect(isbn.publication).toBe("92824");
    expect(isbn.agency).toBe("English language");
    expect(isbn.checkDigit10).toBe("6");
    expect(isbn.checkDigit13).toBe("1");
    expect(isbn.isValid).toBe(true);
    expect(isbn.toISBN13()).toBe("9780547928241");
  });

  it("accepts a lower-case x and hyphens", () => {
    const isbn = parsed("0-89686-281-x");
    expect(isbn.toISBN13()).toBe("9780896862814");
    expect(isbn.toISBN10()).toBe("089686281X");
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(parsed("0547928246"))).toBe(true);
  });

  it("fails with InvalidCheckDigit and reports both digits", () => {
    const result = store.parse("9780590732053");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidCheckDigitError);
      if (result.error instanceof InvalidCheckDigitError) {
        expect(result.error.expected).toBe("5");
        expect(result.error.actual).toBe("3");
      }
    }
  });

  it("fails for an ISBN-10 whose check digit should be 3, not X", () => {
    expect(store.parse("081666303x").ok).toBe(false);
  });

  it("fails for trailing garbage after the check digit", () => {
    const result = store.parse("9780590132053F");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidLengthError);
    }
  });

  it("fails for an embedded letter", () => {
    const result = store.parse("9780590d32053");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidCharacterError);
    }
  });

  it("parseISBNOrThrow throws the parse error", () => {
    expect(() => parseISBNOrThrow("", store.current)).toThrow(InvalidLengthError);
  });

  const displayCases: Array<[string, string]> = [
    ["88 04 47328 2", "978-88-04-47328-2 (88-04-47328-2)"],
    ["978-8804473282", "978-88-04-47328-2 (88-04-47328-2)"],
    ["0547928246", "978-0-547-92824-1 (0-547-92824-6)"],
    ["978-0547928241", "978-0-547-92824-1 (0-547-92824-6)"],
    ["978 0670013951", "978-0-670-01395-1 (0-670-01395-1)"],
    ["089686281x", "978-0-89686-281-4 (0-89686-281-X)"],
    ["9780822527602", "978-0-8225-2760-2 (0-8225-2760-X)"],
    ["9780590132053", "978-0-590-13205-3 (0-590-13205-9)"],
    ["978-8891230195", "978-88-912-3019-5 (88-912-3019-7)"],
    ["9993612340", "978-99936-12-34-6 (99936-12-34-0)"],
    ["9791034304660", "979-10-343-0466-0"],
  ];

  it.each(displayCases)("displays %s as %s", (input, display) => {
    expect(parsed(input).display()).toBe(display);
    expect(String(parsed(input))).toBe(display);
  });

  const conversionCases: Array<[string, string, string]> = [
    ["88 04 47328 2", "9788804473282", "8804473282"],
    ["978-8804473282", "9788804473282", "8804473282"],
    ["0547928246", "9780547928241", "0547928246"],
    ["978-0547928241", "9780547928241", "0547928246"],
    ["978 0670013951", "9780670013951", "0670013951"],
    ["089686281x", "9780896862814", "089686281X"],
    ["9780822527602", "9780822527602", "082252760X"],
    ["9780590132053", "9780590132053", "0590132059"],
    ["978-8891230195", "9788891230195", "8891230197"],
    ["9791034304660", "9791034304660", ""],
  ];

  it.each(conversionCases)("converts %s to %s / %s", (input, want13, want10) => {
    const isbn = parsed(input);
    expect(isbn.toISBN13()).toBe(want13);
    expect(isbn.toISBN10()).toBe(want10);
  });

  it("round-trips 978 ISBN-13s through their ISBN-10", () => {
    for (const [, isbn13] of conversionCases) {
      if (!isbn13.startsWith("978")) continue;
      const isbn10 = parsed(isbn13).toISBN10();
      expect(parsed(isbn10).toISBN13()).toBe(isbn13);
    }
  });

  it("has no ISBN-10 check digit for the 979 prefix", () => {
    const isbn = parsed("9791034304660");
    expect(isbn.prefix).toBe("979");
    expect(isbn.registrationGroup).toBe("10");
    expect(isbn.agency).toBe("France");
    expect(isbn.checkDigit10).toBe("");
  });

  it("keeps the ISBN valid when the registrant is not in any range", () => {
    const isbn = parsed("8893123452");
    expect(isbn.isValid).toBe(true);
    expect(isbn.isResolved).toBe(false);
    expect(isbn.registrant).toBe("");
    expect(isbn.publication).toBe("9312345");
    expect(isbn.toISBN13()).toBe("9788893123457");
    expect(isbn.display()).toBe("978-88-9312345-7 (88-9312345-2)");
  });
});

// ── Value formatting ────────────────────────────────────────────────────────

describe("ParsedISBN", () => {
  const invalid = new ParsedISBN({
    prefix: "978",
    registrationGroup: "0",
    registrant: "547",
    publication: "92824",
    agency: "English language",
    checkDigit10: "6",
    checkDigit13: "1",
    isValid: false,
  });

  it("renders nothing when not valid", () => {
    expect(invalid.toISBN13()).toBe("");
    expect(invalid.toISBN10()).toBe("");
    expect(invalid.display()).toBe("");
  });

  it("serialises its elements and renderings to JSON", () => {
    const valid = new ParsedISBN({ ...invalid.toJSON(), isValid: true });
    expect(JSON.parse(JSON.stringify(valid))).toEqual({
      prefix: "978",
      registrationGroup: "0",
      registrant: "547",
      publication: "92824",
      agency: "English language",
      checkDigit10: "6",
      checkDigit13: "1",
      isValid: true,
      isbn13: "9780547928241",
      isbn10: "0547928246",
      display: "978-0-547-92824-1 (0-547-92824-6)",
    });
  });
});
