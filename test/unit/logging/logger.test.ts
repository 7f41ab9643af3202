// ---------------------------------------------------------------------------
// Tests for the pino logger factory.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { createLogger } from "../../../src/logging/logger.js";

describe("createLogger", () => {
  it("uses the configured level", () => {
    const logger = createLogger({ level: "error", prettyPrint: false }, 2);
    expect(logger.level).toBe("error");
    expect(logger.isLevelEnabled("warn")).toBe(false);
  });

  it("binds service and version", () => {
    const logger = createLogger({ level: "silent", prettyPrint: false });
    expect(logger.bindings()).toMatchObject({ service: "isbn-ranges" });
  });
});
