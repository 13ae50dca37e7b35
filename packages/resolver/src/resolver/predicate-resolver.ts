/**
 * Predicate resolution.
 *
 * Maps each request argument to a backend predicate, or to nothing. Control
 * arguments never reach a compiler, and an argument that yields nothing is
 * dropped rather than turned into an always-true predicate.
 */
import {
  type PredicateCompiler,
  type PredicateContext,
  type QueryBackend,
} from "../backend/types";
import { type ReservedNames } from "../config";
import { isResolverError, PredicateError } from "../errors";
import { type RequestArgument } from "../request/types";
import { classifyArgument } from "./argument-kind";

/**
 * Query the predicates are compiled for.
 */
export type PredicateTarget<TScope> = Readonly<{
  entityType: string;
  scope: TScope;
}>;

function compileWith<TScope, TPredicate>(
  compiler: PredicateCompiler<TScope, TPredicate>,
  context: PredicateContext<TScope>,
  argument: RequestArgument,
): TPredicate | undefined {
  try {
    return compiler.compilePredicate(context, argument.value);
  } catch (error) {
    if (isResolverError(error)) {
      throw error;
    }
    throw new PredicateError(
      `Failed to compile argument "${argument.name}" for ${context.entityType}`,
      { entityType: context.entityType, path: [argument.name] },
      { cause: error },
    );
  }
}

/**
 * Resolves one argument to a predicate, or `undefined` when it contributes
 * nothing to the query.
 */
export function resolvePredicate<TEntity, TPredicate, TScope>(
  argument: RequestArgument,
  backend: QueryBackend<TEntity, TPredicate, TScope>,
  target: PredicateTarget<TScope>,
  names: ReservedNames,
): TPredicate | undefined {
  const classified = classifyArgument(argument, names);

  switch (classified.kind) {
    case "logical":
    case "distinct": {
      return undefined;
    }
    case "where": {
      // Nested object filters resolve field names relative to the where argument
      return compileWith(
        backend.filterCompiler,
        {
          entityType: target.entityType,
          scope: target.scope,
          argument,
          path: [argument.name],
        },
        argument,
      );
    }
    case "field": {
      return compileWith(
        backend.fieldCompiler,
        {
          entityType: target.entityType,
          scope: target.scope,
          argument,
          path: [],
        },
        argument,
      );
    }
  }
}

/**
 * Resolves every argument, keeping only those that produced a predicate.
 */
export function resolvePredicates<TEntity, TPredicate, TScope>(
  arguments_: readonly RequestArgument[],
  backend: QueryBackend<TEntity, TPredicate, TScope>,
  target: PredicateTarget<TScope>,
  names: ReservedNames,
): TPredicate[] {
  const predicates: TPredicate[] = [];
  for (const argument of arguments_) {
    const predicate = resolvePredicate(argument, backend, target, names);
    if (predicate !== undefined) {
      predicates.push(predicate);
    }
  }
  return predicates;
}
