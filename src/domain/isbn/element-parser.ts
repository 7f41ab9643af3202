// ---------------------------------------------------------------------------
// Range-driven ISBN element parser.
//
// Splits the digits in front of the check digit into prefix, registration
// group, registrant and publication.  The first three are variable-length
// and resolved by walking the range table one digit at a time:
//
//   8804473282     ->  [978] 88 | 04 | 47328 | 2
//   9780670013951  ->  978 | 0 | 670 | 01395 | 1
//
// Resolution is greedy and forward-only: the first key that matches wins and
// is never revisited.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { ISBNElement, RegistrantRuleSet } from "../../core/types.js";
import type { DigitTrieNode } from "../ranges/digit-trie.js";
import { matchRange, type GroupTrie, type RangeTable } from "../ranges/range-table.js";

/** Prefix assigned to every ISBN-10. */
export const BOOKLAND_PREFIX = "978";

export interface ParsedElements {
  prefix: string;
  registrationGroup: string;
  registrant: string;
  publication: string;
  agency: string;
  /** The first element that could not be resolved, if any. */
  unresolved: ISBNElement | null;
}

/**
 * Resolve the elements of `body`, the digits of an ISBN without its check
 * digit (9 for an ISBN-10, 12 for an ISBN-13).
 *
 * Digits left in the buffer of an element that never resolved are moved into
 * the publication so that the four elements always cover `body`.
 */
export function parseElements(
  body: string,
  table: RangeTable,
  logger?: Logger,
): ParsedElements {
  let prefix = body.length === 9 ? BOOKLAND_PREFIX : "";
  let group = "";
  let registrant = "";
  let publication = "";
  let agency = "";

  let pfxBuf = "";
  let grpBuf = "";
  let regBuf = "";

  // Trie cursors; `undefined` once the walk has left the trie.
  let pfxNode: DigitTrieNode<GroupTrie> | undefined = table.prefixRoot;
  let grpNode: DigitTrieNode<RegistrantRuleSet> | undefined =
    prefix !== "" ? table.groupRoot(prefix) : undefined;
  let ruleSet: RegistrantRuleSet | undefined;

  for (const digit of body) {
    if (prefix === "") {
      pfxBuf += digit;
      pfxNode = pfxNode?.child(digit);
      if (pfxNode?.value !== undefined) {
        prefix = pfxBuf;
        grpNode = table.groupRoot(prefix);
      }
    } else if (group === "") {
      grpBuf += digit;
      grpNode = grpNode?.child(digit);
      const found = grpNode?.value;
      if (found !== undefined) {
        group = grpBuf;
        ruleSet = found;
        agency = found.agency;
      }
    } else if (registrant === "") {
      regBuf += digit;
      if (ruleSet && matchRange(ruleSet, regBuf)) {
        registrant = regBuf;
      }
    } else {
      publication += digit;
    }
  }

  let unresolved: ISBNElement | null = null;
  if (prefix === "") {
    unresolved = "prefix";
    publication = pfxBuf;
  } else if (group === "") {
    unresolved = "registrationGroup";
    publication = grpBuf;
  } else if (registrant === "") {
    unresolved = "registrant";
    publication = regBuf;
  }

  if (unresolved) {
    logger?.debug({ body, unresolved }, "ISBN element could not be resolved");
  }

  return {
    prefix,
    registrationGroup: group,
    registrant,
    publication,
    agency,
    unresolved,
  };
}
