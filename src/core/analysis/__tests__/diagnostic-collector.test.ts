/**
 * Tests for the analysis message collector
 */

import { describe, it, expect } from "vitest";
import { DiagnosticCollector, formatDiagnostic } from "../diagnostic-collector.js";
import { CollectingDocumentationLogger } from "../../logging/documentation-logger.js";

describe("formatDiagnostic", () => {
  it("should prefix severity and location", () => {
    expect(
      formatDiagnostic({ module: "m", severity: "error", message: "boom", location: { path: "a.ts", line: 3, column: 5 } })
    ).toBe("ERROR: a.ts:3:5: boom");
  });

  it("should omit missing location parts", () => {
    expect(formatDiagnostic({ module: "m", severity: "warning", message: "careful", location: { path: "a.ts" } })).toBe(
      "WARNING: a.ts: careful"
    );
    expect(formatDiagnostic({ module: "m", severity: "info", message: "note" })).toBe("INFO: note");
  });
});

describe("DiagnosticCollector", () => {
  it("should record diagnostics and forward them at info level", () => {
    const logger = new CollectingDocumentationLogger();
    const collector = new DiagnosticCollector("core", logger);

    collector.report("warning", "unused", { path: "b.ts", line: 1 });

    expect(collector.diagnostics).toEqual([
      { module: "core", severity: "warning", message: "unused", location: { path: "b.ts", line: 1 } },
    ]);
    expect(logger.messagesAt("info")).toEqual(["WARNING: b.ts:1: unused"]);
    expect(logger.warningsCount).toBe(0);
  });

  it("should remember errors until cleared", () => {
    const collector = new DiagnosticCollector("core", new CollectingDocumentationLogger());

    collector.report("warning", "minor");
    expect(collector.hasErrors()).toBe(false);

    collector.report("error", "major");
    expect(collector.hasErrors()).toBe(true);

    collector.clear();
    expect(collector.hasErrors()).toBe(false);
    expect(collector.diagnostics).toHaveLength(2);
  });
});
