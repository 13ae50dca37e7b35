/**
 * Query backend over drizzle SQL.
 *
 * One backend wraps one connected database; hand a fresh one (or the same
 * one, if the connection is request-scoped) to each `resolve` call.
 */
import { type SQL } from "drizzle-orm";

import { type QueryBackend } from "../../backend/types";
import { DEFAULT_HINT_NAMES, type HintNames } from "../../config";
import {
  createEntityRegistry,
  type EntityDefinition,
  type EntityRecord,
  type EntityRegistry,
} from "./entities";
import { type SqlExecutionAdapter } from "./execution/types";
import { fieldMatchCompiler, whereFilterCompiler } from "./filter-compiler";
import {
  createContentQuery,
  createCountQuery,
  type DrizzleContentQuery,
  type DrizzleCountQuery,
} from "./query-builders";
import { type EntityScope } from "./scope";

export type DrizzleBackendOptions = Readonly<{
  /** Entity definitions, or a registry already built from them */
  entities: EntityRegistry | readonly EntityDefinition[];
  /**
   * Hint names, when the resolver was configured with custom ones.
   * Only the passDistinctThrough hint changes the generated SQL.
   */
  hintNames?: Partial<HintNames>;
}>;

export type DrizzleQueryBackend = Readonly<{
  entities: EntityRegistry;
  adapter: SqlExecutionAdapter;
  buildQuery: (entityType: string) => DrizzleContentQuery;
  buildCountQuery: (entityType: string) => DrizzleCountQuery;
}> &
  QueryBackend<EntityRecord, SQL, EntityScope>;

function isEntityList(
  entities: EntityRegistry | readonly EntityDefinition[],
): entities is readonly EntityDefinition[] {
  return Array.isArray(entities);
}

export function createDrizzleQueryBackend(
  adapter: SqlExecutionAdapter,
  options: DrizzleBackendOptions,
): DrizzleQueryBackend {
  const registry =
    isEntityList(options.entities) ?
      createEntityRegistry(options.entities)
    : options.entities;
  const hintNames: HintNames = { ...DEFAULT_HINT_NAMES, ...options.hintNames };

  return {
    entities: registry,
    adapter,
    filterCompiler: whereFilterCompiler,
    fieldCompiler: fieldMatchCompiler,
    buildQuery(entityType) {
      return createContentQuery({
        adapter,
        registry,
        entity: registry.get(entityType),
        hintNames,
      });
    },
    buildCountQuery(entityType) {
      return createCountQuery({
        adapter,
        registry,
        entity: registry.get(entityType),
        hintNames,
      });
    },
  };
}
