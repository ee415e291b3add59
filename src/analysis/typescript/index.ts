/**
 * TypeScript analysis front end
 *
 * @module
 */

export {
  TypeScriptAnalysisEnvironment,
  TypeScriptAnalysisEnvironmentFactory,
  createTypeScriptAnalysisEnvironmentFactory,
  packageNameFor,
  TYPESCRIPT_FRONT_END,
} from "./environment.js";
export { SymbolExtractor } from "./symbol-extractor.js";
export { parseIncludes, type IncludeDocumentation } from "./includes.js";
