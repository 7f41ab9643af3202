// ---------------------------------------------------------------------------
// chk-isbn: calculate check digits, or parse and validate ISBNs.
//
// Usage:
//   chk-isbn [-c|-p] [--json] [-v] isbn [isbn ...]
//
// Options:
//   -h, --help      Show help
//   -c, --check     Calculate check digit(s) (does not parse/validate)
//   -p, --parse     Parse and validate ISBN(s) (default)
//   --json          Print one JSON object per input
//   -v, --verbose   Print the range message header after loading
//
// Parse mode reads the RangeMessage.xml path from ISBN_RANGE_FILE.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";
import type { Logger } from "pino";

import type { AppConfig } from "./core/types.js";
import { ISBNToolkitError } from "./core/errors.js";
import { loadConfig } from "./config/config.js";
import { createLogger } from "./logging/logger.js";
import { calcCheckDigit } from "./domain/isbn/check-digit.js";
import { normalizeISBN } from "./domain/isbn/normalize.js";
import { RangeDataStore } from "./domain/ranges/range-store.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export interface CliIO {
  /** Receives one result line at a time. */
  stdout: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  /** Defaults to a logger built from the configuration, writing to stderr. */
  logger?: Logger;
  programName?: string;
}

type Mode = "check" | "parse";

interface CliOptions {
  help: boolean;
  mode: Mode;
  json: boolean;
  verbose: boolean;
  inputs: string[];
}

// ── CLI argument parsing ─────────────────────────────────────────────────

/**
 * Parse the command line.  When both `-c` and `-p` are given the first one
 * wins.  Unrecognised flags are kept as inputs, so each one fails on its own
 * instead of ending the run.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { tokens } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean", short: "h" },
      check: { type: "boolean", short: "c" },
      parse: { type: "boolean", short: "p" },
      json: { type: "boolean" },
      verbose: { type: "boolean", short: "v" },
    },
    allowPositionals: true,
    strict: false,
    tokens: true,
  });

  const opts: CliOptions = {
    help: false,
    mode: "parse",
    json: false,
    verbose: false,
    inputs: [],
  };
  let modeChosen = false;

  for (const token of tokens) {
    if (token.kind === "positional") {
      opts.inputs.push(token.value);
      continue;
    }
    if (token.kind !== "option") continue;

    switch (token.name) {
      case "help":
        opts.help = true;
        break;
      case "check":
      case "parse":
        if (!modeChosen) {
          opts.mode = token.name === "check" ? "check" : "parse";
          modeChosen = true;
        }
        break;
      case "json":
        opts.json = true;
        break;
      case "verbose":
        opts.verbose = true;
        break;
      default:
        opts.inputs.push(
          token.inlineValue ? `${token.rawName}=${token.value ?? ""}` : token.rawName,
        );
    }
  }

  return opts;
}

export function helpText(programName: string): string {
  return `${programName}
  Usage [-c|-p] [--json] [-v] isbn [isbn [isbn ...]]

    -h, --help      Show help
    -c, --check     Calculate check-digit(s) (does not parse/validate)
    -p, --parse     Parse and validate ISBN(s) (default)
        --json      Print one JSON object per input
    -v, --verbose   Print the range message header after loading

  Parse mode reads the RangeMessage.xml path from ISBN_RANGE_FILE.`;
}

// ── Modes ────────────────────────────────────────────────────────────────

/** Returns false when the input failed. */
function checkDigitFor(
  input: string,
  opts: CliOptions,
  io: CliIO,
  logger: Logger,
): boolean {
  // Allow the check digit to be left off.
  let candidate = normalizeISBN(input);
  if (candidate.length === 9 || candidate.length === 12) {
    candidate += "0";
  }

  try {
    const digit = calcCheckDigit(candidate);
    io.stdout(
      opts.json
        ? JSON.stringify({ input, checkDigit: digit })
        : `Check-digit for ${input} is ${digit}`,
    );
    return true;
  } catch (err) {
    if (!(err instanceof ISBNToolkitError)) throw err;
    logger.warn({ input }, err.message);
    return false;
  }
}

function runParse(
  config: AppConfig,
  opts: CliOptions,
  io: CliIO,
  logger: Logger,
): number {
  if (!config.rangeFile) {
    logger.fatal("ISBN_RANGE_FILE environment variable not set");
    return EXIT_FATAL;
  }

  const store = new RangeDataStore(logger);
  try {
    store.load(config.rangeFile);
  } catch (err) {
    if (!(err instanceof ISBNToolkitError)) throw err;
    logger.fatal(err.message);
    return EXIT_FATAL;
  }

  const info = store.current?.info;
  if (opts.verbose && info) {
    io.stdout(
      `Range data: ${info.source ?? "unknown source"}, serial ${info.serialNumber ?? "-"}, ${info.date ?? "undated"}`,
    );
  }

  let failures = 0;
  for (const input of opts.inputs) {
    const result = store.parse(input);
    if (!result.ok) {
      failures++;
      logger.warn(
        { input, kind: result.error.kind },
        `ISBN is invalid (${result.error.message})`,
      );
      continue;
    }

    io.stdout(
      opts.json
        ? JSON.stringify({ input, ...result.isbn.toJSON() })
        : `ISBN is valid: ${result.isbn.display()}`,
    );
  }

  return failures > 0 ? EXIT_PARTIAL : EXIT_OK;
}

// ── Entry point ──────────────────────────────────────────────────────────

/** Report an error raised before a logger exists. */
function startupFailure(err: unknown, io: CliIO): number {
  const message = err instanceof Error ? err.message : String(err);
  if (io.logger) {
    io.logger.fatal(message);
  } else {
    console.error(`ERROR: ${message}`);
  }
  return EXIT_FATAL;
}

/**
 * Run the CLI and return the process exit code.
 */
export function runCli(argv: string[], io: CliIO): number {
  const programName = io.programName ?? "chk-isbn";

  let opts: CliOptions;
  try {
    opts = parseCliArgs(argv);
  } catch (err) {
    return startupFailure(err, io);
  }

  // Help needs no configuration.
  if (opts.help) {
    io.stdout(helpText(programName));
    return EXIT_OK;
  }

  let config: AppConfig;
  try {
    config = loadConfig(io.env ?? process.env);
  } catch (err) {
    return startupFailure(err, io);
  }

  const logger = io.logger ?? createLogger(config.logging, 2);

  if (opts.inputs.length === 0) {
    logger.fatal("No ISBN supplied");
    return EXIT_FATAL;
  }

  if (opts.mode === "check") {
    let failures = 0;
    for (const input of opts.inputs) {
      if (!checkDigitFor(input, opts, io, logger)) failures++;
    }
    return failures > 0 ? EXIT_PARTIAL : EXIT_OK;
  }

  return runParse(config, opts, io, logger);
}
