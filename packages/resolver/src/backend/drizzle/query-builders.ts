/**
 * Content and count query builders over drizzle SQL.
 */
import { and, type SQL, sql } from "drizzle-orm";

import {
  type ContentQueryBuilder,
  type CountQueryBuilder,
  type HintValue,
} from "../../backend/types";
import { type HintNames } from "../../config";
import { BackendError } from "../../errors";
import { type EntityDefinition, type EntityRecord, type EntityRegistry } from "./entities";
import { type SqlExecutionAdapter } from "./execution/types";
import { createRowMapper, type SelectedColumn } from "./row-mapper";
import { createQueryScope, type EntityScope } from "./scope";

export type DrizzleContentQuery = ContentQueryBuilder<
  EntityRecord,
  SQL,
  EntityScope
> &
  Readonly<{
    /** Hints received so far, by name */
    hints: ReadonlyMap<string, HintValue>;
    toSQL: () => SQL;
  }>;

export type DrizzleCountQuery = CountQueryBuilder<SQL, EntityScope> &
  Readonly<{
    toSQL: () => SQL;
  }>;

type BuilderContext = Readonly<{
  adapter: SqlExecutionAdapter;
  registry: EntityRegistry;
  entity: EntityDefinition;
  hintNames: HintNames;
}>;

function whereClause(predicates: readonly SQL[]): SQL {
  const condition = and(...predicates);
  return condition === undefined ? sql.empty() : sql` where ${condition}`;
}

function wrapFailure(
  operation: "content" | "count",
  entity: EntityDefinition,
  error: unknown,
): BackendError {
  return new BackendError(
    `Failed to execute ${operation} query for ${entity.name}`,
    { operation, entityType: entity.name },
    { cause: error },
  );
}

// ============================================================
// Content Query
// ============================================================

export function createContentQuery(
  context: BuilderContext,
): DrizzleContentQuery {
  const { adapter, entity, hintNames } = context;
  const queryScope = createQueryScope(context.registry, entity);
  const predicates: SQL[] = [];
  const hints = new Map<string, HintValue>();
  let distinct = false;
  let selection: readonly string[] | undefined;
  let offset: number | undefined;
  let limit: number | undefined;

  function selectedColumns(): SelectedColumn[] {
    const all = Object.entries(entity.columns).map(([key, column]) => ({
      key,
      column,
    }));
    if (selection === undefined) {
      return all;
    }
    const requested = new Set(selection);
    if (!all.some(({ key }) => requested.has(key))) {
      return all;
    }
    return all.filter(({ key }) => key === entity.key || requested.has(key));
  }

  function windowClause(): SQL {
    if (limit === undefined && offset === undefined) {
      return sql.empty();
    }
    const limitSql =
      limit !== undefined ? sql` limit ${limit}`
      : adapter.dialect === "sqlite" ? sql` limit -1`
      : sql.empty();
    const offsetSql = offset === undefined ? sql.empty() : sql` offset ${offset}`;
    return sql`${limitSql}${offsetSql}`;
  }

  function toSQL(columns: readonly SelectedColumn[] = selectedColumns()): SQL {
    const passDistinctThrough = hints.get(hintNames.passDistinctThrough) !== false;
    const distinctSql =
      distinct && passDistinctThrough ? sql`distinct ` : sql.empty();
    const columnList = sql.join(
      columns.map(({ column }) => sql`${column}`),
      sql`, `,
    );
    return sql`select ${distinctSql}${columnList} from ${entity.table}${sql.join([...queryScope.joins()])}${whereClause(predicates)}${windowClause()}`;
  }

  return {
    scope: queryScope.root,
    hints,
    addPredicate(predicate) {
      predicates.push(predicate);
    },
    setDistinct(value) {
      distinct = value;
    },
    setSelection(fields) {
      selection = fields;
    },
    setOffset(value) {
      offset = value;
    },
    setLimit(value) {
      limit = value;
    },
    setHint(name, value) {
      hints.set(name, value);
    },
    toSQL: () => toSQL(),
    async execute() {
      const columns = selectedColumns();
      let rows: readonly Readonly<Record<string, unknown>>[];
      try {
        rows = await adapter.execute<Readonly<Record<string, unknown>>>(
          toSQL(columns),
        );
      } catch (error) {
        throw wrapFailure("content", entity, error);
      }
      return rows.map(createRowMapper(entity, columns));
    },
  };
}

// ============================================================
// Count Query
// ============================================================

function toCount(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function createCountQuery(context: BuilderContext): DrizzleCountQuery {
  const { adapter, entity } = context;
  const queryScope = createQueryScope(context.registry, entity);
  const predicates: SQL[] = [];

  function toSQL(): SQL {
    return sql`select count(*) as ${sql.identifier("total")} from ${entity.table}${sql.join([...queryScope.joins()])}${whereClause(predicates)}`;
  }

  return {
    scope: queryScope.root,
    addPredicate(predicate) {
      predicates.push(predicate);
    },
    toSQL,
    async executeScalar() {
      let rows: readonly Readonly<{ total?: unknown }>[];
      try {
        rows = await adapter.execute<Readonly<{ total?: unknown }>>(toSQL());
      } catch (error) {
        throw wrapFailure("count", entity, error);
      }
      const total = toCount(rows[0]?.total);
      if (total === undefined) {
        throw new BackendError(
          `Count query for ${entity.name} returned no numeric total`,
          { operation: "count", entityType: entity.name },
        );
      }
      return total;
    },
  };
}
