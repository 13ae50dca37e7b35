export {
  type ArgumentKind,
  classifyArgument,
} from "./argument-kind";
export {
  buildContentQuery,
  type ContentQueryInput,
  runContentQuery,
  windowBounds,
} from "./content-query";
export {
  buildCountQuery,
  type CountQueryInput,
  runCountQuery,
} from "./count-query";
export { resolveDistinct } from "./distinct";
export { type QueryHookContext, type ResolverHooks } from "./hooks";
export {
  type PredicateTarget,
  resolvePredicate,
  resolvePredicates,
} from "./predicate-resolver";
export { createQueryResolver, type QueryResolver } from "./query-resolver";
export {
  assembleResult,
  computePageCount,
  type ResultEnvelope,
  type ResultParts,
  toFieldResult,
} from "./result-assembler";
export {
  analyzeSelection,
  type PageWindow,
  parsePageWindow,
  resolveDistinctFlag,
  type SelectionAnalysis,
  UNBOUNDED_WINDOW,
} from "./selection-analyzer";
