/**
 * Drops declarations located in a pass's suppressed files or directories
 *
 * @module
 */

import * as path from "node:path";
import type { ContainedDocumentable, PlatformFacts } from "../../model/documentable.js";
import type { PlatformData } from "../../model/platform.js";
import type { PassConfiguration } from "../../../utils/validation.js";
import { PlatformFilterTransformer } from "./platform-filter.js";

export function isSuppressedFile(filePath: string, suppressed: readonly string[]): boolean {
  const resolved = path.resolve(filePath);
  return suppressed.some((entry) => {
    const target = path.resolve(entry);
    return resolved === target || resolved.startsWith(`${target}${path.sep}`);
  });
}

export class SuppressedFilesFilter extends PlatformFilterTransformer {
  readonly name = "suppressed-files";

  protected keep(
    _node: ContainedDocumentable,
    _platform: PlatformData,
    facts: PlatformFacts,
    pass: PassConfiguration
  ): boolean {
    if (!facts.location || pass.suppressedFiles.length === 0) return true;
    return !isSuppressedFile(facts.location.path, pass.suppressedFiles);
  }
}

export function createSuppressedFilesFilter(): SuppressedFilesFilter {
  return new SuppressedFilesFilter();
}
