/**
 * Tests for Markdown include parsing
 */

import { describe, it, expect } from "vitest";
import { parseIncludes } from "../includes.js";

describe("parseIncludes", () => {
  it("should treat a file without headers as module documentation", () => {
    const result = parseIncludes(["Just some text.\n"]);

    expect(result.module).toBe("Just some text.");
    expect(result.packages.size).toBe(0);
  });

  it("should split module and package sections", () => {
    const result = parseIncludes([
      ["# Module core", "Core module.", "", "# Package core.io", "Input and output.", "# Package core.util", "Helpers."].join(
        "\n"
      ),
    ]);

    expect(result.module).toBe("Core module.");
    expect([...result.packages]).toEqual([
      ["core.io", "Input and output."],
      ["core.util", "Helpers."],
    ]);
  });

  it("should join sections for the same package across files", () => {
    const result = parseIncludes(["# Package a\nFirst part.", "# Package a\nSecond part."]);

    expect(result.packages.get("a")).toBe("First part.\n\nSecond part.");
    expect(result.module).toBeUndefined();
  });

  it("should skip empty sections", () => {
    const result = parseIncludes(["# Package empty\n\n# Package full\nText"]);

    expect(result.packages.has("empty")).toBe(false);
    expect(result.packages.get("full")).toBe("Text");
  });
});
