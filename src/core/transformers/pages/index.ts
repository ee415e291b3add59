/**
 * Default Page Transformers
 *
 * @module
 */

export {
  NavigationTransformer,
  createNavigationTransformer,
  navigationTree,
  NAVIGATION_PAGE_NAME,
  type NavigationEntry,
} from "./navigation.js";
export { IndexPagesTransformer, createIndexPagesTransformer, buildIndexPage, INDEX_PAGE_NAME } from "./index-pages.js";

import { createNavigationTransformer } from "./navigation.js";
import { createIndexPagesTransformer } from "./index-pages.js";
import type { PageTransformer } from "../../extensions.js";

/**
 * Default page transformers, in chain order
 */
export function createDefaultPageTransformers(): PageTransformer[] {
  return [createNavigationTransformer(), createIndexPagesTransformer()];
}
