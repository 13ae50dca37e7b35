/**
 * Content query: fetches the entity rows for the records section.
 */
import {
  type ContentQueryBuilder,
  type QueryBackend,
} from "../backend/types";
import { FETCH_SIZE, type HintNames, type ReservedNames } from "../config";
import { type Request, type Selection } from "../request/types";
import { callBackend } from "./backend-call";
import { resolvePredicates } from "./predicate-resolver";
import { type PageWindow } from "./selection-analyzer";

export type ContentQueryInput<TEntity, TPredicate, TScope> = Readonly<{
  backend: QueryBackend<TEntity, TPredicate, TScope>;
  entityType: string;
  names: ReservedNames;
  hintNames: HintNames;
  /** Request with the pagination argument already removed */
  request: Request;
  recordsSelection: Selection | undefined;
  window: PageWindow;
  distinct: boolean;
}>;

/**
 * Offset and limit for an explicit window, `undefined` otherwise.
 */
export function windowBounds(
  window: PageWindow,
): Readonly<{ offset: number; limit: number }> | undefined {
  if (!window.explicit) {
    return undefined;
  }
  return {
    offset: (window.pageNumber - 1) * window.pageSize,
    limit: window.pageSize,
  };
}

/**
 * Builds the content query without executing it.
 */
export function buildContentQuery<TEntity, TPredicate, TScope>(
  input: ContentQueryInput<TEntity, TPredicate, TScope>,
): ContentQueryBuilder<TEntity, TPredicate, TScope> {
  const { backend, entityType, hintNames } = input;
  const query = backend.buildQuery(entityType);

  const predicates = resolvePredicates(
    input.request.arguments,
    backend,
    { entityType, scope: query.scope },
    input.names,
  );
  for (const predicate of predicates) {
    query.addPredicate(predicate);
  }

  if (input.recordsSelection?.selections !== undefined) {
    query.setSelection(
      input.recordsSelection.selections.map((selection) => selection.name),
    );
  }

  const bounds = windowBounds(input.window);
  if (bounds !== undefined) {
    query.setLimit(bounds.limit);
    query.setOffset(bounds.offset);
  }

  // Throughput tuning only; none of these change which rows come back
  query.setHint(hintNames.readOnly, true);
  query.setHint(hintNames.fetchSize, FETCH_SIZE);
  query.setHint(hintNames.cacheable, false);

  if (input.distinct) {
    // No SQL DISTINCT: duplicates are removed from the fetched rows
    query.setDistinct(true);
    query.setHint(hintNames.passDistinctThrough, false);
  }

  return query;
}

/**
 * Builds and executes the content query. Rows come back in backend order.
 */
export async function runContentQuery<TEntity, TPredicate, TScope>(
  input: ContentQueryInput<TEntity, TPredicate, TScope>,
): Promise<readonly TEntity[]> {
  const query = buildContentQuery(input);
  return callBackend("content", input.entityType, () => query.execute());
}
