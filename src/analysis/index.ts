/**
 * Built-in analysis front ends
 *
 * @module
 */

import type { IAnalysisEnvironmentFactory } from "../core/interfaces/IAnalysisEnvironment.js";
import { createTypeScriptAnalysisEnvironmentFactory } from "./typescript/index.js";

export * from "./typescript/index.js";

export function createDefaultAnalysisFactories(): IAnalysisEnvironmentFactory[] {
  return [createTypeScriptAnalysisEnvironmentFactory()];
}
