/**
 * Count query: counts matching root entities for the total and pages
 * sections. Never windowed.
 */
import { type CountQueryBuilder, type QueryBackend } from "../backend/types";
import { type ReservedNames } from "../config";
import { type Request } from "../request/types";
import { warnInDevelopment } from "../utils/env";
import { callBackend } from "./backend-call";
import { classifyArgument } from "./argument-kind";
import { resolvePredicates } from "./predicate-resolver";

export type CountQueryInput<TEntity, TPredicate, TScope> = Readonly<{
  backend: QueryBackend<TEntity, TPredicate, TScope>;
  entityType: string;
  names: ReservedNames;
  /** Request with the pagination argument already removed */
  request: Request;
  /** Whether the records section was selected in the same request */
  withRecords: boolean;
}>;

function hasFilterArguments(request: Request, names: ReservedNames): boolean {
  return request.arguments.some((argument) => {
    const { kind } = classifyArgument(argument, names);
    return kind === "where" || kind === "field";
  });
}

/**
 * Builds the count query without executing it.
 *
 * Predicates are rebuilt against the count query's own scope from the same
 * arguments the content query used. When records were not selected the
 * count runs with no predicates at all and so counts the whole entity set,
 * whatever filters the request carried.
 */
export function buildCountQuery<TEntity, TPredicate, TScope>(
  input: CountQueryInput<TEntity, TPredicate, TScope>,
): CountQueryBuilder<TPredicate, TScope> {
  const { backend, entityType, names, request } = input;
  const query = backend.buildCountQuery(entityType);

  if (!input.withRecords) {
    if (hasFilterArguments(request, names)) {
      warnInDevelopment(
        `Count for ${entityType} ignores filter arguments because "${names.records}" was not selected.`,
        { field: request.name },
      );
    }
    return query;
  }

  const predicates = resolvePredicates(
    request.arguments,
    backend,
    { entityType, scope: query.scope },
    names,
  );
  for (const predicate of predicates) {
    query.addPredicate(predicate);
  }

  return query;
}

/**
 * Builds and executes the count query.
 */
export async function runCountQuery<TEntity, TPredicate, TScope>(
  input: CountQueryInput<TEntity, TPredicate, TScope>,
): Promise<number> {
  const query = buildCountQuery(input);
  return callBackend("count", input.entityType, () => query.executeScalar());
}
