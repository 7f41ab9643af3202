// ---------------------------------------------------------------------------
// ISBN parsing, validation, conversion, and formatting
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  ISBN10,
  ISBN13,
  ISBNElements,
  RawISBN,
} from "../../core/types.js";
import {
  InvalidCheckDigitError,
  NoRangeDataError,
  isISBNParseError,
  type ISBNParseError,
} from "../../core/errors.js";
import type { RangeTable } from "../ranges/range-table.js";
import {
  computeISBN10CheckDigit,
  computeISBN13CheckDigit,
} from "./check-digit.js";
import { BOOKLAND_PREFIX, parseElements } from "./element-parser.js";
import { normalizeAndCheck } from "./normalize.js";

// ── Value ───────────────────────────────────────────────────────────────────

/**
 * An immutable, parsed ISBN:
 *
 *   [prefix]-[registration group]-[registrant]-[publication]-[check digit]
 */
export class ParsedISBN implements ISBNElements {
  readonly prefix: string;
  readonly registrationGroup: string;
  readonly registrant: string;
  readonly publication: string;
  readonly agency: string;
  readonly checkDigit10: string;
  readonly checkDigit13: string;
  readonly isValid: boolean;

  constructor(elements: ISBNElements) {
    this.prefix = elements.prefix;
    this.registrationGroup = elements.registrationGroup;
    this.registrant = elements.registrant;
    this.publication = elements.publication;
    this.agency = elements.agency;
    this.checkDigit10 = elements.checkDigit10;
    this.checkDigit13 = elements.checkDigit13;
    this.isValid = elements.isValid;
    Object.freeze(this);
  }

  /** Whether the registrant was found in the range table. */
  get isResolved(): boolean {
    return this.registrant !== "";
  }

  /** ISBN-13 form, or `""` when invalid. */
  toISBN13(): ISBN13 | "" {
    if (!this.isValid) return "";
    return (this.prefix +
      this.registrationGroup +
      this.registrant +
      this.publication +
      this.checkDigit13) as ISBN13;
  }

  /** ISBN-10 form, or `""` when invalid or outside the 978 prefix. */
  toISBN10(): ISBN10 | "" {
    if (!this.isValid || this.prefix !== BOOKLAND_PREFIX) return "";
    return (this.registrationGroup +
      this.registrant +
      this.publication +
      this.checkDigit10) as ISBN10;
  }

  /**
   * Hyphenated ISBN-13, followed by the hyphenated ISBN-10 in parentheses
   * when there is one, e.g. `978-0-670-01395-1 (0-670-01395-1)`.
   */
  display(): string {
    if (!this.isValid) return "";

    let out = hyphenate([
      this.prefix,
      this.registrationGroup,
      this.registrant,
      this.publication,
      this.checkDigit13,
    ]);

    if (this.prefix === BOOKLAND_PREFIX) {
      const isbn10 = hyphenate([
        this.registrationGroup,
        this.registrant,
        this.publication,
        this.checkDigit10,
      ]);
      out += ` (${isbn10})`;
    }
    return out;
  }

  toString(): string {
    return this.display();
  }

  toJSON(): ISBNElements & { isbn13: string; isbn10: string; display: string } {
    return {
      prefix: this.prefix,
      registrationGroup: this.registrationGroup,
      registrant: this.registrant,
      publication: this.publication,
      agency: this.agency,
      checkDigit10: this.checkDigit10,
      checkDigit13: this.checkDigit13,
      isValid: this.isValid,
      isbn13: this.toISBN13(),
      isbn10: this.toISBN10(),
      display: this.display(),
    };
  }
}

function hyphenate(elements: string[]): string {
  return elements.filter((e) => e !== "").join("-");
}

// ── Top-level parse ─────────────────────────────────────────────────────────

export type ISBNParseResult =
  | { ok: true; isbn: ParsedISBN }
  | { ok: false; raw: RawISBN; error: ISBNParseError };

/**
 * Parse an ISBN into its elements using `table`.
 *
 * Checks run in order (length, characters, check digit, range data) and the
 * first failure is returned.  Errors other than the documented ones
 * propagate.
 */
export function parseISBN(
  raw: RawISBN,
  table: RangeTable | null,
  logger?: Logger,
): ISBNParseResult {
  try {
    return { ok: true, isbn: parseISBNOrThrow(raw, table, logger) };
  } catch (err) {
    if (isISBNParseError(err)) {
      return { ok: false, raw, error: err };
    }
    throw err;
  }
}

/**
 * Like {@link parseISBN} but throws the {@link ISBNParseError} instead of
 * returning it.
 */
export function parseISBNOrThrow(
  raw: RawISBN,
  table: RangeTable | null,
  logger?: Logger,
): ParsedISBN {
  const isbn = normalizeAndCheck(raw);
  const body = isbn.slice(0, -1);
  const supplied = isbn.slice(-1);

  const expected =
    isbn.length === 10
      ? computeISBN10CheckDigit(body)
      : computeISBN13CheckDigit(body);
  if (supplied !== expected) {
    throw new InvalidCheckDigitError(raw, expected, supplied);
  }

  if (!table || table.isEmpty) {
    throw new NoRangeDataError();
  }

  const elements = parseElements(body, table, logger);

  let checkDigit10 = "";
  let checkDigit13 = "";
  if (isbn.length === 10) {
    checkDigit10 = supplied;
    checkDigit13 = computeISBN13CheckDigit(BOOKLAND_PREFIX + body);
  } else {
    checkDigit13 = supplied;
    if (elements.prefix === BOOKLAND_PREFIX) {
      checkDigit10 = computeISBN10CheckDigit(
        elements.registrationGroup + elements.registrant + elements.publication,
      );
    }
  }

  return new ParsedISBN({
    prefix: elements.prefix,
    registrationGroup: elements.registrationGroup,
    registrant: elements.registrant,
    publication: elements.publication,
    agency: elements.agency,
    checkDigit10,
    checkDigit13,
    isValid: true,
  });
}
