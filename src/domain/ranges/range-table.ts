// ---------------------------------------------------------------------------
// In-memory ISBN range table:  prefix -> registration group -> rule set.
// ---------------------------------------------------------------------------

import type {
  RangeMessageInfo,
  RangeRule,
  RegistrantRuleSet,
  RegistrationGroupEntry,
} from "../../core/types.js";
import {
  DigitTrie,
  type DigitTrieNode,
  type ReadonlyDigitTrie,
} from "./digit-trie.js";

/** Registration groups under one prefix, keyed by group digits. */
export type GroupTrie = ReadonlyDigitTrie<RegistrantRuleSet>;

/**
 * Immutable two-level range table.  Both levels are digit tries so the
 * element parser can resolve variable-length fields one digit at a time.
 */
export class RangeTable {
  readonly info: RangeMessageInfo | null;
  private readonly prefixTrie = new DigitTrie<DigitTrie<RegistrantRuleSet>>();
  private readonly groupCount: number;

  constructor(
    groups: Iterable<RegistrationGroupEntry>,
    info: RangeMessageInfo | null = null,
  ) {
    this.info = info ? Object.freeze({ ...info }) : null;

    for (const entry of groups) {
      let groupTrie = this.prefixTrie.get(entry.prefix);
      if (!groupTrie) {
        groupTrie = new DigitTrie<RegistrantRuleSet>();
        this.prefixTrie.set(entry.prefix, groupTrie);
      }
      groupTrie.set(entry.group, freezeRuleSet(entry.agency, entry.ranges));
    }

    let count = 0;
    for (const [, groupTrie] of this.prefixTrie.entries()) {
      count += groupTrie.size;
    }
    this.groupCount = count;

    Object.freeze(this);
  }

  /** An empty table (the state after an unload). */
  static empty(): RangeTable {
    return new RangeTable([]);
  }

  /** Number of registration groups across all prefixes. */
  get size(): number {
    return this.groupCount;
  }

  get isEmpty(): boolean {
    return this.groupCount === 0;
  }

  hasPrefix(prefix: string): boolean {
    return this.prefixTrie.has(prefix);
  }

  /** Prefix keys in ascending order. */
  prefixes(): string[] {
    return [...this.prefixTrie.entries()].map(([prefix]) => prefix);
  }

  /** Registration-group keys under `prefix`, in ascending order. */
  groups(prefix: string): string[] {
    const groupTrie = this.prefixTrie.get(prefix);
    return groupTrie ? [...groupTrie.entries()].map(([group]) => group) : [];
  }

  lookup(prefix: string, group: string): RegistrantRuleSet | undefined {
    return this.prefixTrie.get(prefix)?.get(group);
  }

  /** Root of the prefix level, for digit-at-a-time walks. */
  get prefixRoot(): DigitTrieNode<GroupTrie> {
    return this.prefixTrie.root;
  }

  /** Root of the group level under `prefix`, if the prefix is known. */
  groupRoot(prefix: string): DigitTrieNode<RegistrantRuleSet> | undefined {
    return this.prefixTrie.get(prefix)?.root;
  }
}

/**
 * First rule whose length equals the candidate's and whose bounds contain
 * its value.
 */
export function matchRange(
  ruleSet: RegistrantRuleSet,
  candidate: string,
): RangeRule | undefined {
  const value = Number(candidate);
  return ruleSet.ranges.find(
    (rule) =>
      rule.length === candidate.length &&
      value >= rule.lower &&
      value <= rule.upper,
  );
}

function freezeRuleSet(agency: string, ranges: RangeRule[]): RegistrantRuleSet {
  return Object.freeze({
    agency,
    ranges: Object.freeze(ranges.map((r) => Object.freeze({ ...r }))),
  });
}
