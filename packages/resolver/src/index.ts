/**
 * Entity Query Resolver: paged, filtered entity queries for query-language
 * fields.
 *
 * A request names a field, its arguments and the sub-selections the caller
 * asked for (`select`, `total`, `pages`). The resolver turns that into at
 * most one content query and one count query against a backend, then
 * assembles the result envelope.
 *
 * @example
 * ```typescript
 * import { sqliteTable, integer, text } from "drizzle-orm/sqlite-core";
 * import { createQueryResolver, defineEntity } from "entity-query-resolver";
 * import { createLocalSqliteBackend } from "entity-query-resolver/sqlite";
 *
 * const books = sqliteTable("books", {
 *   id: integer("id").primaryKey(),
 *   title: text("title").notNull(),
 * });
 *
 * const { backend } = createLocalSqliteBackend({
 *   entities: [defineEntity("Book", books)],
 * });
 * const resolver = createQueryResolver({ entityType: "Book" });
 *
 * const { records, total, pages } = await resolver.resolve(
 *   {
 *     name: "Books",
 *     arguments: [{ name: "page", value: { start: 1, limit: 10 } }],
 *     selections: [{ name: "select" }, { name: "total" }, { name: "pages" }],
 *   },
 *   backend,
 * );
 * ```
 */

// ============================================================
// Resolver
// ============================================================

export * from "./resolver";

// ============================================================
// Configuration
// ============================================================

export {
  DEFAULT_HINT_NAMES,
  DEFAULT_RESERVED_NAMES,
  FETCH_SIZE,
  type HintNames,
  type ReservedNames,
  resolveConfig,
  type ResolverConfig,
  type ResolverOptions,
} from "./config";

// ============================================================
// Requests
// ============================================================

export {
  findArgument,
  findSelection,
  isArgumentList,
  isArgumentObject,
  removeArgument,
} from "./request/arguments";
export {
  type ArgumentObject,
  type ArgumentValue,
  type Request,
  type RequestArgument,
  type Selection,
} from "./request/types";

// ============================================================
// Backend Contract
// ============================================================

export {
  type ContentQueryBuilder,
  type CountQueryBuilder,
  type HintValue,
  type PredicateCompiler,
  type PredicateContext,
  type QueryBackend,
} from "./backend/types";

// ============================================================
// Drizzle Backend
// ============================================================

export * from "./backend/drizzle";

// ============================================================
// Errors
// ============================================================

export {
  ArgumentError,
  type ArgumentErrorDetails,
  BackendError,
  ConfigurationError,
  type ErrorCategory,
  getErrorSuggestion,
  isResolverError,
  isSystemError,
  isUserRecoverable,
  PredicateError,
  type PredicateErrorDetails,
  ResolverError,
  type ResolverErrorOptions,
  type ValidationIssue,
} from "./errors";
export { validateArgument, validateOptions } from "./errors/validation";
