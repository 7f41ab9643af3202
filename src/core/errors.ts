// ---------------------------------------------------------------------------
// Error hierarchy for the ISBN range toolkit.
// ---------------------------------------------------------------------------

import { ISBNErrorKind } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all toolkit errors.
 */
export class ISBNToolkitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ISBNToolkitError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Validation errors ───────────────────────────────────────────────────────

/**
 * Base class for an ISBN string that failed structural or check-digit
 * validation.
 */
export class ISBNValidationError extends ISBNToolkitError {
  public readonly rawISBN: string;
  public readonly kind: ISBNErrorKind;

  constructor(
    rawISBN: string,
    kind: ISBNErrorKind,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid ISBN "${rawISBN}": ${reason}`, options);
    this.name = "ISBNValidationError";
    this.rawISBN = rawISBN;
    this.kind = kind;
  }
}

/** The normalized ISBN is neither 10 nor 13 characters long. */
export class InvalidLengthError extends ISBNValidationError {
  public readonly length: number;
  public readonly expected: readonly number[] = [10, 13];

  constructor(rawISBN: string, length: number, options?: ErrorOptions) {
    super(
      rawISBN,
      ISBNErrorKind.INVALID_LENGTH,
      `expected 10 or 13 characters, got ${length}`,
      options,
    );
    this.name = "InvalidLengthError";
    this.length = length;
  }
}

/** A character other than a digit (or a trailing X) was found. */
export class InvalidCharacterError extends ISBNValidationError {
  public readonly character: string;
  public readonly position: number;

  constructor(
    rawISBN: string,
    character: string,
    position: number,
    options?: ErrorOptions,
  ) {
    super(
      rawISBN,
      ISBNErrorKind.INVALID_CHARACTER,
      `invalid character "${character}" at position ${position}`,
      options,
    );
    this.name = "InvalidCharacterError";
    this.character = character;
    this.position = position;
  }
}

/** The supplied check digit does not match the computed one. */
export class InvalidCheckDigitError extends ISBNValidationError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(
    rawISBN: string,
    expected: string,
    actual: string,
    options?: ErrorOptions,
  ) {
    super(
      rawISBN,
      ISBNErrorKind.INVALID_CHECK_DIGIT,
      `check digit is ${actual}, expected ${expected}`,
      options,
    );
    this.name = "InvalidCheckDigitError";
    this.expected = expected;
    this.actual = actual;
  }
}

// ── Range data errors ───────────────────────────────────────────────────────

/** A parse was attempted before any range data was loaded. */
export class NoRangeDataError extends ISBNToolkitError {
  public readonly kind = ISBNErrorKind.NO_RANGE_DATA;

  constructor(options?: ErrorOptions) {
    super("No range data for parsing ISBNs (load a range message first)", options);
    this.name = "NoRangeDataError";
  }
}

/** The range message could not be read or is not a range message. */
export class RangeDataLoadError extends ISBNToolkitError {
  public readonly kind = ISBNErrorKind.RANGE_DATA_LOAD_FAILURE;
  public readonly source: string;

  constructor(source: string, reason: string, options?: ErrorOptions) {
    super(`Could not load range data from ${source}: ${reason}`, options);
    this.name = "RangeDataLoadError";
    this.source = source;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends ISBNToolkitError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Any error that ends a single parse. */
export type ISBNParseError =
  | InvalidLengthError
  | InvalidCharacterError
  | InvalidCheckDigitError
  | NoRangeDataError;

/** Narrow an unknown thrown value to an {@link ISBNParseError}. */
export function isISBNParseError(err: unknown): err is ISBNParseError {
  return (
    err instanceof InvalidLengthError ||
    err instanceof InvalidCharacterError ||
    err instanceof InvalidCheckDigitError ||
    err instanceof NoRangeDataError
  );
}
