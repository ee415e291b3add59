/**
 * Tests for configuration validation
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  DocumentationConfigurationSchema,
  PassConfigurationSchema,
  SourceLinkSchema,
  formatZodError,
  loadConfiguration,
  parseConfiguration,
  safeValidate,
} from "../validation.js";
import { ConfigurationError, ErrorCode } from "../../core/errors.js";

describe("Configuration validation", () => {
  // ===========================================================================
  // Defaults
  // ===========================================================================

  describe("defaults", () => {
    it("should fill global defaults", () => {
      const configuration = parseConfiguration({ passes: [{ moduleName: "core" }] });

      expect(configuration).toMatchObject({
        outputDir: "build/docs",
        format: "json",
        generateIndexPages: false,
        skip: false,
      });
      expect(configuration.passes).toHaveLength(1);
    });

    it("should fill pass defaults", () => {
      const pass = PassConfigurationSchema.parse({ moduleName: "core" });

      expect(pass.platform).toBe("jvm");
      expect(pass.frontEnd).toBe("typescript");
      expect(pass.reportUndocumented).toBe(true);
      expect(pass.skipEmptyPackages).toBe(true);
      expect(pass.includeNonPublic).toBe(false);
      expect(pass.includeRootPackage).toBe(false);
      expect(pass.perPackageOptions).toEqual([]);
    });
  });

  // ===========================================================================
  // Rejections
  // ===========================================================================

  describe("rejections", () => {
    it("should reject Windows-style source link paths", () => {
      const result = safeValidate(SourceLinkSchema, { path: "src\\main", url: "https://example.com/src" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodError(result.error)).toEqual(["path: Incorrect path property, only Unix based path allowed."]);
      }
    });

    it("should require at least one pass", () => {
      const missing = safeValidate(DocumentationConfigurationSchema, {});
      const empty = safeValidate(DocumentationConfigurationSchema, { passes: [] });

      expect(missing.success).toBe(false);
      expect(empty.success).toBe(false);
      if (!empty.success) {
        expect(formatZodError(empty.error)).toEqual(["passes: At least one pass is required"]);
      }
    });

    it("should reject an unknown platform kind", () => {
      expect(() => parseConfiguration({ passes: [{ moduleName: "core", platform: "wasm" }] })).toThrow(
        ConfigurationError
      );
    });

    it("should name the offending field", () => {
      try {
        parseConfiguration({ passes: [{ moduleName: "" }] });
        expect.unreachable("configuration should be rejected");
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.code).toBe(ErrorCode.CONFIGURATION_INVALID);
          expect(error.message).toContain("passes.0.moduleName");
        }
      }
    });
  });

  // ===========================================================================
  // Files
  // ===========================================================================

  describe("loadConfiguration", () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "polydoc-config-test-"));
    });

    afterAll(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("should read a JSON configuration file", async () => {
      const file = path.join(tempDir, "polydoc.json");
      await fs.writeFile(file, JSON.stringify({ outputDir: "docs", passes: [{ moduleName: "core", platform: "js" }] }));

      const configuration = loadConfiguration(file);

      expect(configuration.outputDir).toBe("docs");
      expect(configuration.passes.map((pass) => pass.platform)).toEqual(["js"]);
    });

    it("should report unreadable files as configuration errors", () => {
      expect(() => loadConfiguration(path.join(tempDir, "missing.json"))).toThrow(/Cannot read configuration file/);
    });

    it("should report malformed JSON as configuration errors", async () => {
      const file = path.join(tempDir, "broken.json");
      await fs.writeFile(file, "{ not json");

      expect(() => loadConfiguration(file)).toThrow(ConfigurationError);
    });
  });
});
