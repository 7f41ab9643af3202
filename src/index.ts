// ---------------------------------------------------------------------------
// Public API of the ISBN range toolkit.
// ---------------------------------------------------------------------------

export type {
  ISBN10,
  ISBN13,
  RawISBN,
  ISBNElements,
  RangeRule,
  RegistrantRuleSet,
  RegistrationGroupEntry,
  RangeMessageInfo,
  AppConfig,
  LoggingConfig,
} from "./core/types.js";
export { ISBNErrorKind, ISBNElement } from "./core/types.js";
export * from "./core/errors.js";

export {
  normalizeISBN,
  checkLength,
  checkCharacters,
} from "./domain/isbn/normalize.js";
export {
  calcCheckDigit,
  validateCheckDigit,
  computeISBN10CheckDigit,
  computeISBN13CheckDigit,
} from "./domain/isbn/check-digit.js";
export {
  parseElements,
  BOOKLAND_PREFIX,
  type ParsedElements,
} from "./domain/isbn/element-parser.js";
export {
  ParsedISBN,
  parseISBN,
  parseISBNOrThrow,
  type ISBNParseResult,
} from "./domain/isbn/isbn.js";

export { RangeTable, matchRange } from "./domain/ranges/range-table.js";
export { parseRangeMessage, readRangeMessage } from "./domain/ranges/range-message.js";
export { RangeDataStore } from "./domain/ranges/range-store.js";

export { loadConfig } from "./config/config.js";
export { createLogger, type Logger } from "./logging/logger.js";
