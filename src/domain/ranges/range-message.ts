// ---------------------------------------------------------------------------
// RangeMessage.xml loader.
//
// Parses the range message published by the International ISBN Agency and
// builds a RangeTable from its RegistrationGroups section.  Individual rules
// that cannot be read are skipped with a warning; only a document that is
// not a range message at all fails the load.
//
//   <ISBNRangeMessage>
//     <MessageSource>…</MessageSource>
//     <RegistrationGroups>
//       <Group>
//         <Prefix>978-0</Prefix>
//         <Agency>English language</Agency>
//         <Rules>
//           <Rule><Range>0000000-1999999</Range><Length>2</Length></Rule>
//           …
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";

import type {
  RangeMessageInfo,
  RangeRule,
  RegistrationGroupEntry,
} from "../../core/types.js";
import { RangeDataLoadError } from "../../core/errors.js";
import { RangeTable } from "./range-table.js";

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  // Keep "0", "978" and "0000000-1999999" as strings.
  parseTagValue: false,
  // Agency names carry &amp; and friends.
  processEntities: true,
  isArray: (name) => name === "Group" || name === "Rule" || name === "EAN.UCC",
});

// ── Zod schemas ─────────────────────────────────────────────────────────────

const TextSchema = z.string();

export const RuleSchema = z.object({
  Range: TextSchema,
  Length: TextSchema,
});

/** `<Rules/>` parses as an empty string. */
const RulesSchema = z.union([
  z.object({ Rule: z.array(z.unknown()).default([]) }),
  z.literal(""),
]);

export const GroupSchema = z.object({
  Prefix: TextSchema,
  Agency: TextSchema.default(""),
  Rules: RulesSchema.default(""),
});

export const RangeMessageSchema = z.object({
  ISBNRangeMessage: z.object({
    MessageSource: TextSchema.optional(),
    MessageSerialNumber: TextSchema.optional(),
    MessageDate: TextSchema.optional(),
    RegistrationGroups: z.object({
      Group: z.array(z.unknown()).min(1),
    }),
  }),
});

// ── Rule conversion ─────────────────────────────────────────────────────────

/**
 * Convert one `<Rule>`.  Returns `null` for rules that are deliberately
 * unused (length 0 or an upper bound of 0) and throws for malformed ones.
 */
export function toRangeRule(range: string, lengthText: string): RangeRule | null {
  if (!/^\d+$/.test(lengthText)) {
    throw new Error(`rule length "${lengthText}" is not a number`);
  }
  const length = Number(lengthText);
  if (length === 0) return null;

  const bounds = range.split("-");
  if (bounds.length !== 2) {
    throw new Error(`rule range "${range}" is not of the form <lower>-<upper>`);
  }

  const [lower, upper] = bounds.map((bound) => {
    const digits = bound.slice(0, length);
    if (digits.length < length || !/^\d+$/.test(digits)) {
      throw new Error(`rule range "${range}" has no ${length}-digit bound`);
    }
    return Number(digits);
  });

  if (upper === 0) return null;
  return { lower, upper, length };
}

// ── Public API ──────────────────────────────────────────────────────────────

export interface RangeMessageOptions {
  /** Where the document came from, for messages. */
  source?: string;
  logger?: Logger;
}

/**
 * Build a {@link RangeTable} from the text of a range message.
 *
 * @throws RangeDataLoadError if the text is not well-formed XML or has no
 *   registration groups.
 */
export function parseRangeMessage(
  xml: string,
  options: RangeMessageOptions = {},
): RangeTable {
  const source = options.source ?? "<string>";
  const logger = options.logger ?? pino({ level: "silent" });

  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new RangeDataLoadError(
      source,
      `${valid.err.msg} (line ${valid.err.line})`,
    );
  }

  let doc: z.infer<typeof RangeMessageSchema>;
  try {
    doc = RangeMessageSchema.parse(xmlParser.parse(xml));
  } catch (err) {
    throw new RangeDataLoadError(source, "document is not an ISBN range message", {
      cause: err,
    });
  }

  const message = doc.ISBNRangeMessage;
  const info: RangeMessageInfo = {
    source: message.MessageSource ?? null,
    serialNumber: message.MessageSerialNumber ?? null,
    date: message.MessageDate ?? null,
  };

  const groups: RegistrationGroupEntry[] = [];
  let skipped = 0;

  for (const rawGroup of message.RegistrationGroups.Group) {
    const parsed = GroupSchema.safeParse(rawGroup);
    if (!parsed.success) {
      logger.warn({ source, issues: parsed.error.issues }, "skipping malformed registration group");
      continue;
    }

    const group = parsed.data;
    const [prefix, groupDigits, ...extra] = group.Prefix.split("-");
    if (
      extra.length > 0 ||
      !/^\d+$/.test(prefix) ||
      groupDigits === undefined ||
      !/^\d+$/.test(groupDigits)
    ) {
      logger.warn({ source, prefix: group.Prefix }, "skipping registration group with malformed prefix");
      continue;
    }

    const ranges: RangeRule[] = [];
    const rawRules = group.Rules === "" ? [] : group.Rules.Rule;
    for (const rawRule of rawRules) {
      const rule = RuleSchema.safeParse(rawRule);
      if (!rule.success) {
        skipped++;
        logger.warn({ source, prefix: group.Prefix }, "skipping range rule without Range and Length");
        continue;
      }

      try {
        const converted = toRangeRule(rule.data.Range, rule.data.Length);
        if (converted) ranges.push(converted);
      } catch (err) {
        skipped++;
        const reason = err instanceof Error ? err.message : String(err);
        logger.warn({ source, prefix: group.Prefix, reason }, "skipping malformed range rule");
      }
    }

    groups.push({
      prefix,
      group: groupDigits,
      agency: group.Agency,
      ranges,
    });
  }

  const table = new RangeTable(groups, info);
  logger.info(
    {
      source,
      groups: table.size,
      prefixes: table.prefixes(),
      skippedRules: skipped,
      serialNumber: info.serialNumber,
      date: info.date,
    },
    "range message loaded",
  );
  return table;
}

/**
 * Read and parse a range message file.
 *
 * @throws RangeDataLoadError if the file cannot be read or parsed.
 */
export function readRangeMessage(filePath: string, logger?: Logger): RangeTable {
  let xml: string;
  try {
    xml = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RangeDataLoadError(filePath, reason, { cause: err });
  }
  return parseRangeMessage(xml, { source: filePath, logger });
}
