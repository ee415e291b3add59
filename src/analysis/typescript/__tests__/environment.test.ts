/**
 * TypeScriptAnalysisEnvironment Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  TypeScriptAnalysisEnvironmentFactory,
  packageNameFor,
} from "../environment.js";
import { AnalysisError, ErrorCode } from "../../../core/errors.js";
import { DiagnosticCollector } from "../../../core/analysis/diagnostic-collector.js";
import { CollectingDocumentationLogger } from "../../../core/logging/documentation-logger.js";
import type { AnalyzedSymbol } from "../../../core/interfaces/IAnalysisEnvironment.js";
import { PassConfigurationSchema } from "../../../utils/validation.js";

function symbolNamed(symbols: readonly AnalyzedSymbol[], name: string): AnalyzedSymbol {
  const symbol = symbols.find((candidate) => candidate.name === name);
  if (!symbol) throw new Error(`symbol ${name} missing`);
  return symbol;
}

describe("TypeScriptAnalysisEnvironment", () => {
  let tempDir: string;
  let sourceRoot: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "polydoc-analysis-test-"));
    sourceRoot = path.join(tempDir, "src");
    await fs.mkdir(path.join(sourceRoot, "shapes"), { recursive: true });

    await fs.writeFile(
      path.join(sourceRoot, "shapes", "circle.ts"),
      `
/** A round shape */
export class Circle {
  /** Radius in units */
  readonly radius: number;
  private cache = 0;

  constructor(radius: number) {
    this.radius = radius;
  }

  /** Area of the circle */
  area(): number {
    return Math.PI * this.radius * this.radius;
  }
}

/**
 * Parses a circle
 * @deprecated use Circle directly
 */
export function parse(text: string): Circle;
/** Parses a circle from a radius */
export function parse(radius: number): Circle;
export function parse(value: string | number): Circle {
  return new Circle(Number(value));
}

export enum Unit {
  Metre,
  Foot,
}

export type Pair<T> = [T, T];

function helper(): void {}
`.trim()
    );
    await fs.writeFile(path.join(sourceRoot, "broken.ts"), `export const count: number = "three";\n`);
    await fs.writeFile(path.join(sourceRoot, "legacy.js"), `export function legacy(a, b) {\n  return a + b;\n}\n`);
    await fs.mkdir(path.join(tempDir, "sampled", "src"), { recursive: true });
    await fs.mkdir(path.join(tempDir, "sampled", "samples"), { recursive: true });
    await fs.writeFile(
      path.join(tempDir, "sampled", "src", "greeting.ts"),
      `
/**
 * Greets someone
 * @sample greetSample
 * @sample missingSample
 */
export function greet(name: string): string {
  return \`Hello \${name}\`;
}
`.trim()
    );
    await fs.writeFile(
      path.join(tempDir, "sampled", "samples", "greeting-samples.ts"),
      `function greetSample() {\n  greet("world");\n}\n`
    );
    await fs.writeFile(path.join(tempDir, "module.md"), "# Module geometry\nShapes and units.\n\n# Package shapes\nRound things.\n");
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function createEnvironment(input: Record<string, unknown> = {}) {
    const logger = new CollectingDocumentationLogger();
    const collector = new DiagnosticCollector("geometry", logger);
    const pass = PassConfigurationSchema.parse({
      moduleName: "geometry",
      sourceRoots: [sourceRoot],
      includes: [path.join(tempDir, "module.md")],
      ...input,
    });
    const environment = await new TypeScriptAnalysisEnvironmentFactory().create(pass, collector);
    return { environment, collector };
  }

  it("should group symbols by directory-derived package", async () => {
    const { environment } = await createEnvironment();

    const groups = await environment.symbolGroups();

    expect(groups.map((group) => group.packageName).sort()).toEqual(["", "shapes"]);
    const shapes = groups.find((group) => group.packageName === "shapes");
    expect(shapes?.documentation).toBe("Round things.");
    expect(shapes?.symbols.map((symbol) => `${symbol.kind} ${symbol.name}`)).toEqual([
      "class Circle",
      "function parse",
      "function parse",
      "enum Unit",
      "typeAlias Pair",
      "function helper",
    ]);
    expect(environment.moduleDocumentation).toBe("Shapes and units.");
  });

  it("should read class members with visibility and documentation", async () => {
    const { environment } = await createEnvironment();
    const shapes = (await environment.symbolGroups()).find((group) => group.packageName === "shapes");
    const circle = symbolNamed(shapes?.symbols ?? [], "Circle");

    expect(circle.documentation).toBe("A round shape");
    expect(circle.visibility).toBe("public");
    expect(circle.location?.line).toBe(2);
    expect(circle.members.map((member) => `${member.kind} ${member.name} ${member.visibility}`)).toEqual([
      "property radius public",
      "property cache private",
      "constructor constructor public",
      "function area public",
    ]);
    expect(symbolNamed(circle.members, "radius").documentation).toBe("Radius in units");
    expect(symbolNamed(circle.members, "radius").signature).toBe(": number");
    expect(symbolNamed(circle.members, "area").signature).toBe("(): number");
  });

  it("should keep each overload and skip the implementation", async () => {
    const { environment } = await createEnvironment();
    const shapes = (await environment.symbolGroups()).find((group) => group.packageName === "shapes");
    const overloads = (shapes?.symbols ?? []).filter((symbol) => symbol.name === "parse");

    expect(overloads.map((symbol) => symbol.signature)).toEqual(["(text: string): Circle", "(radius: number): Circle"]);
    expect(overloads.map((symbol) => symbol.deprecated)).toEqual([true, false]);
    expect(overloads[1]?.documentation).toBe("Parses a circle from a radius");
  });

  it("should mark non-exported declarations internal", async () => {
    const { environment } = await createEnvironment();
    const shapes = (await environment.symbolGroups()).find((group) => group.packageName === "shapes");

    expect(symbolNamed(shapes?.symbols ?? [], "helper").visibility).toBe("internal");
    expect(symbolNamed(shapes?.symbols ?? [], "Pair").signature).toBe("<T> = [T, T]");
    expect(symbolNamed(shapes?.symbols ?? [], "Unit").members.map((member) => member.name)).toEqual(["Metre", "Foot"]);
  });

  it("should report compiler errors to the collector", async () => {
    const { environment, collector } = await createEnvironment();

    await environment.symbolGroups();

    expect(collector.hasErrors()).toBe(true);
    const [diagnostic] = collector.diagnostics;
    expect(diagnostic?.severity).toBe("error");
    expect(diagnostic?.message).toContain("not assignable");
    expect(diagnostic?.location).toEqual({ path: path.join(sourceRoot, "broken.ts"), line: 1, column: 14 });
  });

  it("should analyze JavaScript sources file by file", async () => {
    const { environment } = await createEnvironment();

    const files = await environment.sourceFiles();

    expect(files).toHaveLength(1);
    expect(files[0]?.path).toBe(path.join(sourceRoot, "legacy.js"));
    expect(files[0]?.language).toBe("javascript");
    expect(files[0]?.symbols.map((symbol) => symbol.name)).toEqual(["legacy"]);
  });

  it("should warn about an unknown language version", async () => {
    const { collector } = await createEnvironment({ languageVersion: "es1999" });

    expect(collector.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "Unknown language version es1999, using ES2022",
    ]);
    expect(collector.hasErrors()).toBe(false);
  });

  it("should warn about an unknown API version", async () => {
    const { collector } = await createEnvironment({ apiVersion: "es1999" });

    expect(collector.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "Unknown API version es1999, using the default library",
    ]);
  });

  it("should attach the code of referenced samples", async () => {
    const sampled = path.join(tempDir, "sampled");
    const { environment, collector } = await createEnvironment({
      sourceRoots: [path.join(sampled, "src")],
      samples: [path.join(sampled, "samples")],
      includes: [],
    });

    const [group] = await environment.symbolGroups();
    const greet = symbolNamed(group?.symbols ?? [], "greet");

    expect(greet.documentation).toBe("Greets someone");
    expect(greet.samples).toEqual(['greet("world");']);
    expect(collector.diagnostics).toHaveLength(1);
    expect(collector.diagnostics[0]?.severity).toBe("warning");
    expect(collector.diagnostics[0]?.message).toBe("Unresolved sample missingSample");
    expect(collector.diagnostics[0]?.location).toEqual({
      path: path.join(sampled, "src", "greeting.ts"),
      line: 6,
      column: 1,
    });
  });

  it("should reject a missing source root", async () => {
    const error = await createEnvironment({ sourceRoots: [path.join(tempDir, "absent")] }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(AnalysisError);
    if (error instanceof AnalysisError) {
      expect(error.code).toBe(ErrorCode.ANALYSIS_SOURCE_ROOT_MISSING);
      expect(error.moduleName).toBe("geometry");
    }
  });

  it("should report an unreadable include file without failing", async () => {
    const { environment, collector } = await createEnvironment({ includes: [path.join(tempDir, "missing.md")] });

    expect(environment.moduleDocumentation).toBeUndefined();
    expect(collector.diagnostics[0]?.severity).toBe("error");
    expect(collector.diagnostics[0]?.location).toEqual({ path: path.join(tempDir, "missing.md") });
  });
});

describe("packageNameFor", () => {
  it("should dot-join directories below the source root", () => {
    const root = path.resolve("src");

    expect(packageNameFor(path.join(root, "a", "b", "c.ts"), root)).toBe("a.b");
    expect(packageNameFor(path.join(root, "c.ts"), root)).toBe("");
  });
});
