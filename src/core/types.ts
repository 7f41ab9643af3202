// ---------------------------------------------------------------------------
// Core types for the ISBN range toolkit.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** A validated ISBN-10 string (9 digits + check digit). */
export type ISBN10 = string & { readonly __brand: "ISBN10" };

/** A validated ISBN-13 string (13 digits). */
export type ISBN13 = string & { readonly __brand: "ISBN13" };

/** Unvalidated ISBN input. */
export type RawISBN = string;

// ── Enums ───────────────────────────────────────────────────────────────────

export const ISBNErrorKind = {
  INVALID_LENGTH: "invalid_length",
  INVALID_CHARACTER: "invalid_character",
  INVALID_CHECK_DIGIT: "invalid_check_digit",
  NO_RANGE_DATA: "no_range_data",
  RANGE_DATA_LOAD_FAILURE: "range_data_load_failure",
} as const;
export type ISBNErrorKind = (typeof ISBNErrorKind)[keyof typeof ISBNErrorKind];

export const ISBNElement = {
  PREFIX: "prefix",
  REGISTRATION_GROUP: "registrationGroup",
  REGISTRANT: "registrant",
} as const;
export type ISBNElement = (typeof ISBNElement)[keyof typeof ISBNElement];

// ── Range data ──────────────────────────────────────────────────────────────

/**
 * One registrant range inside a registration group.  Bounds are already
 * truncated to `length` digits.
 */
export interface RangeRule {
  lower: number;
  upper: number;
  length: number;
}

export interface RegistrantRuleSet {
  agency: string;
  ranges: readonly RangeRule[];
}

/** A registration group as it goes into a range table. */
export interface RegistrationGroupEntry {
  prefix: string;
  group: string;
  agency: string;
  ranges: RangeRule[];
}

/** Header fields of a range message document. */
export interface RangeMessageInfo {
  source: string | null;
  serialNumber: string | null;
  date: string | null;
}

// ── Parsed ISBN ─────────────────────────────────────────────────────────────

/** Plain data carried by a parsed ISBN. */
export interface ISBNElements {
  prefix: string;
  registrationGroup: string;
  registrant: string;
  publication: string;
  agency: string;
  checkDigit10: string;
  checkDigit13: string;
  isValid: boolean;
}

// ── Configuration ───────────────────────────────────────────────────────────

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
}

export interface AppConfig {
  rangeFile: string | null;
  logging: LoggingConfig;
}
