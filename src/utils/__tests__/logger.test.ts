/**
 * Tests for component loggers
 */

import { describe, it, expect } from "vitest";
import { createLogger } from "../logger.js";

describe("createLogger", () => {
  it("should name the component and honour an explicit level", () => {
    const logger = createLogger("merger", { level: "warn" });

    expect(logger.level).toBe("warn");
    expect(logger.bindings()).toMatchObject({ name: "merger" });
  });
});
