// ---------------------------------------------------------------------------
// Check digits for both ISBN forms.
//
//   ISBN-10: sum of digit * position (1..9), mod 11; 10 is written "X"
//   ISBN-13: digits weighted 1, 3, 1, 3, ...; check = (10 - sum mod 10) mod 10
// ---------------------------------------------------------------------------

import type { RawISBN } from "../../core/types.js";
import { normalizeAndCheck, normalizeISBN } from "./normalize.js";

/** Digits of `body` as numbers; throws a RangeError unless it is `count` digits. */
function bodyDigits(body: string, count: number): number[] {
  if (!new RegExp(`^\\d{${count}}$`).test(body)) {
    throw new RangeError(`Check digit needs a ${count}-digit body, got "${body}"`);
  }
  return Array.from(body, Number);
}

/** Check digit (`0`-`9` or `X`) for the 9-digit body of an ISBN-10. */
export function computeISBN10CheckDigit(first9: string): string {
  const sum = bodyDigits(first9, 9).reduce((acc, d, i) => acc + d * (i + 1), 0);
  const check = sum % 11;
  return check === 10 ? "X" : String(check);
}

/** Check digit (`0`-`9`) for the 12-digit body of an ISBN-13. */
export function computeISBN13CheckDigit(first12: string): string {
  const sum = bodyDigits(first12, 12).reduce(
    (acc, d, i) => acc + (i % 2 === 0 ? d : 3 * d),
    0,
  );
  return String((10 - (sum % 10)) % 10);
}

/**
 * Calculate the check digit for a full-length ISBN (10 or 13 characters,
 * hyphens and spaces allowed).  The supplied last character is ignored.
 *
 * @throws InvalidLengthError | InvalidCharacterError
 */
export function calcCheckDigit(raw: RawISBN): string {
  const isbn = normalizeAndCheck(raw);
  return isbn.length === 10
    ? computeISBN10CheckDigit(isbn.slice(0, 9))
    : computeISBN13CheckDigit(isbn.slice(0, 12));
}

/**
 * Does the last character of `raw` match the calculated check digit?
 * Malformed input is reported as `false`.
 */
export function validateCheckDigit(raw: RawISBN): boolean {
  const isbn = normalizeISBN(raw);
  if (isbn.length === 0) return false;

  try {
    return isbn[isbn.length - 1] === calcCheckDigit(isbn);
  } catch {
    return false;
  }
}
