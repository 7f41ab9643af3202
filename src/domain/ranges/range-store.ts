// ---------------------------------------------------------------------------
// Range data store: owns the currently loaded RangeTable.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { Logger } from "pino";

import type { RawISBN } from "../../core/types.js";
import { parseISBN, type ISBNParseResult } from "../isbn/isbn.js";
import { RangeTable } from "./range-table.js";
import { parseRangeMessage, readRangeMessage } from "./range-message.js";

/**
 * Holds one immutable {@link RangeTable} at a time.
 *
 * A load builds the new table completely before swapping it in, so a parse
 * always sees either the old table or the new one.  A failed load leaves the
 * current table untouched.
 */
export class RangeDataStore {
  private table: RangeTable = RangeTable.empty();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? pino({ level: "silent" });
  }

  /** True when a non-empty table is loaded. */
  hasRangeData(): boolean {
    return !this.table.isEmpty;
  }

  /** The loaded table, or `null` when nothing is loaded. */
  get current(): RangeTable | null {
    return this.table.isEmpty ? null : this.table;
  }

  /**
   * Replace the table with the contents of a RangeMessage.xml file.
   *
   * @throws RangeDataLoadError
   */
  load(filePath: string): boolean {
    this.table = readRangeMessage(filePath, this.logger);
    return true;
  }

  /**
   * Replace the table with the contents of an in-memory range message.
   *
   * @throws RangeDataLoadError
   */
  loadFromString(xml: string, source?: string): boolean {
    this.table = parseRangeMessage(xml, { source, logger: this.logger });
    return true;
  }

  /** Install an already-built table. */
  use(table: RangeTable): void {
    this.table = table;
  }

  unload(): boolean {
    this.table = RangeTable.empty();
    this.logger.debug("range data unloaded");
    return !this.hasRangeData();
  }

  /** Parse `raw` against the current table. */
  parse(raw: RawISBN): ISBNParseResult {
    return parseISBN(raw, this.current, this.logger);
  }
}
