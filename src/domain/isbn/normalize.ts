// ---------------------------------------------------------------------------
// ISBN normalisation and structural validation
// ---------------------------------------------------------------------------

import type { RawISBN } from "../../core/types.js";
import {
  InvalidCharacterError,
  InvalidLengthError,
} from "../../core/errors.js";

/** Upper-case and strip every whitespace and hyphen character. */
export function normalizeISBN(raw: RawISBN): string {
  return raw.toUpperCase().replace(/[\s-]/g, "");
}

/** Throws {@link InvalidLengthError} unless `isbn` has 10 or 13 characters. */
export function checkLength(isbn: string, raw: RawISBN = isbn): void {
  if (isbn.length !== 10 && isbn.length !== 13) {
    throw new InvalidLengthError(raw, isbn.length);
  }
}

/**
 * Throws {@link InvalidCharacterError} unless every character but the last is
 * an ASCII digit and the last is a digit or `X`.
 */
export function checkCharacters(isbn: string, raw: RawISBN = isbn): void {
  const last = isbn.length - 1;
  for (let i = 0; i < isbn.length; i++) {
    const ch = isbn[i];
    if (ch >= "0" && ch <= "9") continue;
    if (i === last && ch === "X") continue;
    throw new InvalidCharacterError(raw, ch, i);
  }
}

/**
 * Normalise `raw` and run the length and character checks, in that order.
 * Returns the normalised string.
 */
export function normalizeAndCheck(raw: RawISBN): string {
  const isbn = normalizeISBN(raw);
  checkLength(isbn, raw);
  checkCharacters(isbn, raw);
  return isbn;
}
