/**
 * Resolver configuration.
 *
 * Reserved argument and selection names are injected here rather than
 * hard-coded, so one resolver implementation serves any schema naming.
 */
import { z } from "zod";

import { validateOptions } from "./errors/validation";
import { type ResolverHooks } from "./resolver/hooks";

// ============================================================
// Reserved Names
// ============================================================

/**
 * Names of the arguments and sub-selections the resolver interprets itself.
 */
export type ReservedNames = Readonly<{
  /** Pagination argument */
  page: string;
  /** Page number key inside the pagination argument */
  start: string;
  /** Page size key inside the pagination argument */
  limit: string;
  /** Boolean argument overriding the default distinct mode */
  distinct: string;
  /** Where-filter argument, compiled by the backend's filter compiler */
  where: string;
  /** Logical-grouping argument, handled structurally and never compiled */
  logical: string;
  /** Sub-selection holding the fetched records */
  records: string;
  /** Sub-selection holding the total count */
  total: string;
  /** Sub-selection holding the page count */
  pages: string;
}>;

export const DEFAULT_RESERVED_NAMES: ReservedNames = {
  page: "page",
  start: "start",
  limit: "limit",
  distinct: "distinct",
  where: "where",
  logical: "logical",
  records: "select",
  total: "total",
  pages: "pages",
};

/**
 * Names under which execution hints are handed to the backend.
 */
export type HintNames = Readonly<{
  readOnly: string;
  fetchSize: string;
  cacheable: string;
  passDistinctThrough: string;
}>;

export const DEFAULT_HINT_NAMES: HintNames = {
  readOnly: "readOnly",
  fetchSize: "fetchSize",
  cacheable: "cacheable",
  passDistinctThrough: "passDistinctThrough",
};

/** Streaming batch size requested from the backend for content queries. */
export const FETCH_SIZE = 1000;

// ============================================================
// Options
// ============================================================

export type ResolverOptions<TEntity> = Readonly<{
  /** Entity type both queries are scoped to */
  entityType: string;
  names?: Partial<ReservedNames>;
  hintNames?: Partial<HintNames>;
  /**
   * Distinct mode used when the request carries no distinct argument.
   * Defaults to `true`.
   */
  defaultDistinct?: boolean;
  /**
   * Identity used to de-duplicate records in distinct mode.
   * Defaults to object identity.
   */
  entityKey?: (entity: TEntity) => unknown;
  /**
   * Run the count query concurrently with the content query.
   * Defaults to `false`.
   */
  concurrentCount?: boolean;
  hooks?: ResolverHooks;
}>;

export type ResolverConfig<TEntity> = Readonly<{
  entityType: string;
  names: ReservedNames;
  hintNames: HintNames;
  defaultDistinct: boolean;
  entityKey: ((entity: TEntity) => unknown) | undefined;
  concurrentCount: boolean;
  hooks: ResolverHooks;
}>;

const nameSchema = z.string().trim().min(1);

function hasNoDuplicates(values: readonly string[]): boolean {
  return new Set(values).size === values.length;
}

const reservedNamesSchema = z
  .object({
    page: nameSchema,
    start: nameSchema,
    limit: nameSchema,
    distinct: nameSchema,
    where: nameSchema,
    logical: nameSchema,
    records: nameSchema,
    total: nameSchema,
    pages: nameSchema,
  })
  .refine(
    (names) =>
      hasNoDuplicates([names.page, names.distinct, names.where, names.logical]),
    { message: "Reserved argument names must be distinct" },
  )
  .refine((names) => hasNoDuplicates([names.start, names.limit]), {
    message: "Pagination keys must be distinct",
  })
  .refine(
    (names) => hasNoDuplicates([names.records, names.total, names.pages]),
    { message: "Reserved selection names must be distinct" },
  );

const hintNamesSchema = z
  .object({
    readOnly: nameSchema,
    fetchSize: nameSchema,
    cacheable: nameSchema,
    passDistinctThrough: nameSchema,
  })
  .refine(
    (hints) =>
      hasNoDuplicates([
        hints.readOnly,
        hints.fetchSize,
        hints.cacheable,
        hints.passDistinctThrough,
      ]),
    { message: "Hint names must be distinct" },
  );

const settingsSchema = z.object({
  entityType: nameSchema,
  names: reservedNamesSchema,
  hintNames: hintNamesSchema,
  defaultDistinct: z.boolean(),
  concurrentCount: z.boolean(),
});

/**
 * Applies defaults to resolver options and validates the result.
 *
 * @throws ConfigurationError when a name is empty or names collide
 */
export function resolveConfig<TEntity>(
  options: ResolverOptions<TEntity>,
): ResolverConfig<TEntity> {
  const settings = validateOptions(
    settingsSchema,
    {
      entityType: options.entityType,
      names: { ...DEFAULT_RESERVED_NAMES, ...options.names },
      hintNames: { ...DEFAULT_HINT_NAMES, ...options.hintNames },
      defaultDistinct: options.defaultDistinct ?? true,
      concurrentCount: options.concurrentCount ?? false,
    },
    "resolver options",
  );

  return {
    ...settings,
    entityKey: options.entityKey,
    hooks: options.hooks ?? {},
  };
}
