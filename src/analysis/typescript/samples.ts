/**
 * Sample sources. Every named top-level function of a sample file is a
 * sample that a `@sample <name>` documentation tag can refer to; its body is
 * the sample code.
 *
 * @module
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fsPromises from "node:fs/promises";
import { getErrorMessage } from "../../core/errors.js";
import type { MessageCollector } from "../../core/interfaces/IAnalysisEnvironment.js";
import { directoryExists, findFiles } from "../../utils/fs.js";

const SAMPLE_PATTERNS = ["**/*.ts", "**/*.tsx", "**/*.js", "**/*.jsx"];

export function parseSamples(fileName: string, text: string): Map<string, string> {
  const sourceFile = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true);
  const samples = new Map<string, string>();
  for (const statement of sourceFile.statements) {
    if (ts.isFunctionDeclaration(statement) && statement.name && statement.body) {
      const code = statement.body.statements.map((inner) => inner.getText(sourceFile)).join("\n");
      samples.set(statement.name.text, code);
    }
  }
  return samples;
}

/**
 * Samples of every file below the given paths. A later definition of a name
 * does not replace an earlier one.
 */
export async function loadSamples(
  paths: readonly string[],
  collector: MessageCollector
): Promise<Map<string, string>> {
  const samples = new Map<string, string>();
  for (const entry of paths) {
    const files = (await directoryExists(entry))
      ? await findFiles({ patterns: SAMPLE_PATTERNS, ignore: ["**/*.d.ts"], cwd: path.resolve(entry) })
      : [entry];
    for (const file of files) {
      let text: string;
      try {
        text = await fsPromises.readFile(file, "utf-8");
      } catch (error) {
        collector.report("error", `Cannot read sample file: ${getErrorMessage(error)}`, { path: file });
        continue;
      }
      for (const [name, code] of parseSamples(file, text)) {
        if (!samples.has(name)) samples.set(name, code);
      }
    }
  }
  return samples;
}

/**
 * Names referenced by the `@sample` tags of a declaration
 */
export function sampleReferences(node: ts.Node): string[] {
  return ts
    .getJSDocTags(node)
    .filter((tag) => tag.tagName.text === "sample")
    .flatMap((tag) => {
      const name = ts.getTextOfJSDocComment(tag.comment)?.trim().split(/\s+/)[0];
      return name ? [name] : [];
    });
}
