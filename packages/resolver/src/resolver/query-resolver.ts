/**
 * Query resolver.
 *
 * Resolves one paged query field into a records list, a total count and a
 * page count, issuing at most one content query and one count query.
 *
 * @example
 * ```typescript
 * const resolver = createQueryResolver<Book>({ entityType: "Book" });
 *
 * const result = await resolver.resolve(
 *   {
 *     name: "Books",
 *     arguments: [
 *       { name: "page", value: { start: 1, limit: 20 } },
 *       { name: "where", value: { title: { LIKE: "%graph%" } } },
 *     ],
 *     selections: [{ name: "select" }, { name: "total" }, { name: "pages" }],
 *   },
 *   backend,
 * );
 * ```
 */
import { type QueryBackend } from "../backend/types";
import {
  resolveConfig,
  type ResolverConfig,
  type ResolverOptions,
} from "../config";
import { type Request } from "../request/types";
import { runContentQuery } from "./content-query";
import { runCountQuery } from "./count-query";
import { resolveDistinct } from "./distinct";
import { createOperationId, runWithHooks } from "./hooks";
import {
  assembleResult,
  type ResultEnvelope,
  toFieldResult,
} from "./result-assembler";
import { analyzeSelection } from "./selection-analyzer";

export type QueryResolver<TEntity> = Readonly<{
  config: ResolverConfig<TEntity>;
  /**
   * Resolves a request against a backend session owned by the caller.
   * The backend is used for this call only.
   */
  resolve: <TPredicate, TScope>(
    request: Request,
    backend: QueryBackend<TEntity, TPredicate, TScope>,
  ) => Promise<ResultEnvelope<TEntity>>;
  /**
   * Like `resolve`, keyed by the configured selection names.
   */
  resolveField: <TPredicate, TScope>(
    request: Request,
    backend: QueryBackend<TEntity, TPredicate, TScope>,
  ) => Promise<Readonly<Record<string, readonly TEntity[] | number>>>;
  /** Returns a resolver identical except for the default distinct mode. */
  withDefaultDistinct: (defaultDistinct: boolean) => QueryResolver<TEntity>;
}>;

/**
 * Creates a resolver for one entity type.
 *
 * @throws ConfigurationError when the options are invalid
 */
export function createQueryResolver<TEntity>(
  options: ResolverOptions<TEntity>,
): QueryResolver<TEntity> {
  const config = resolveConfig(options);
  const { entityType, names, hooks } = config;

  async function resolve<TPredicate, TScope>(
    request: Request,
    backend: QueryBackend<TEntity, TPredicate, TScope>,
  ): Promise<ResultEnvelope<TEntity>> {
    const analysis = analyzeSelection(request, names, config.defaultDistinct);
    const operationId = createOperationId();

    async function fetchRecords(): Promise<readonly TEntity[]> {
      const rows = await runWithHooks(
        hooks,
        { operationId, entityType, query: "content" },
        (fetched: readonly TEntity[]) => fetched.length,
        () =>
          runContentQuery({
            backend,
            entityType,
            names,
            hintNames: config.hintNames,
            request: analysis.strippedRequest,
            recordsSelection: analysis.recordsSelection,
            window: analysis.window,
            distinct: analysis.distinct,
          }),
      );
      return resolveDistinct(rows, analysis.distinct, config.entityKey);
    }

    function countRecords(): Promise<number> {
      return runWithHooks(
        hooks,
        { operationId, entityType, query: "count" },
        (total: number) => total,
        () =>
          runCountQuery({
            backend,
            entityType,
            names,
            request: analysis.strippedRequest,
            withRecords: analysis.wantsRecords,
          }),
      );
    }

    const wantsCount = analysis.wantsTotal || analysis.wantsPages;
    let records: readonly TEntity[] | undefined;
    let total: number | undefined;

    if (config.concurrentCount && analysis.wantsRecords && wantsCount) {
      [records, total] = await Promise.all([fetchRecords(), countRecords()]);
    } else {
      if (analysis.wantsRecords) {
        records = await fetchRecords();
      }
      if (wantsCount) {
        total = await countRecords();
      }
    }

    return assembleResult({
      records,
      total,
      window: analysis.window,
      wantsTotal: analysis.wantsTotal,
      wantsPages: analysis.wantsPages,
    });
  }

  return {
    config,
    resolve,
    async resolveField(request, backend) {
      return toFieldResult(await resolve(request, backend), names);
    },
    withDefaultDistinct(defaultDistinct) {
      return createQueryResolver({ ...options, defaultDistinct });
    },
  };
}
