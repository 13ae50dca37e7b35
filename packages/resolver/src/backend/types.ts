/**
 * Query-backend collaborator interface.
 *
 * The resolver never talks to a database directly. It asks a backend for
 * query builders, feeds them compiled predicates and execution hints, and
 * runs them. The backend is supplied per call by the caller, which owns its
 * session lifecycle.
 *
 * Type parameters:
 * - `TEntity`: the row objects a content query returns
 * - `TPredicate`: the backend's compiled predicate type
 * - `TScope`: what predicate compilers resolve field names against
 *   (for SQL backends, the root entity of the query being built plus its joins)
 */
import {
  type ArgumentValue,
  type RequestArgument,
} from "../request/types";

// ============================================================
// Predicate Compilation
// ============================================================

/**
 * Context handed to a predicate compiler for one argument.
 */
export type PredicateContext<TScope> = Readonly<{
  /** Entity type of the query being built */
  entityType: string;
  /** Scope of the query the predicate will be added to */
  scope: TScope;
  /** The argument being compiled */
  argument: RequestArgument;
  /**
   * Argument names from the requested field down to the value being compiled.
   * Empty for field-level arguments, `[where]` for a where filter.
   */
  path: readonly string[];
}>;

/**
 * Compiles an argument value into a backend predicate.
 *
 * Returning `undefined` means the value contributes nothing to the query.
 */
export type PredicateCompiler<TScope, TPredicate> = Readonly<{
  compilePredicate: (
    context: PredicateContext<TScope>,
    value: ArgumentValue,
  ) => TPredicate | undefined;
}>;

// ============================================================
// Query Builders
// ============================================================

export type HintValue = string | number | boolean;

/**
 * Builder for the query that fetches entity rows.
 *
 * Predicates added are conjoined. Hint names the backend does not know
 * must be accepted and ignored.
 */
export type ContentQueryBuilder<TEntity, TPredicate, TScope> = Readonly<{
  scope: TScope;
  addPredicate: (predicate: TPredicate) => void;
  setDistinct: (distinct: boolean) => void;
  /** Names of the requested record fields, for backends that project */
  setSelection: (fields: readonly string[]) => void;
  setOffset: (offset: number) => void;
  setLimit: (limit: number) => void;
  setHint: (name: string, value: HintValue) => void;
  execute: () => Promise<readonly TEntity[]>;
}>;

/**
 * Builder for the query counting matching root entities.
 */
export type CountQueryBuilder<TPredicate, TScope> = Readonly<{
  scope: TScope;
  addPredicate: (predicate: TPredicate) => void;
  executeScalar: () => Promise<number>;
}>;

/**
 * A connected query backend for one logical request.
 */
export type QueryBackend<TEntity, TPredicate, TScope> = Readonly<{
  /** Compiles the reserved where-filter argument */
  filterCompiler: PredicateCompiler<TScope, TPredicate>;
  /** Compiles any other (field-match) argument */
  fieldCompiler: PredicateCompiler<TScope, TPredicate>;
  buildQuery: (
    entityType: string,
  ) => ContentQueryBuilder<TEntity, TPredicate, TScope>;
  buildCountQuery: (entityType: string) => CountQueryBuilder<TPredicate, TScope>;
}>;
