/**
 * Query scopes: the entity a filter resolves field names against, plus
 * the relation joins the filter has pulled into the query.
 */
import { type SQL, sql } from "drizzle-orm";

import { PredicateError } from "../../errors";
import {
  type EntityDefinition,
  type EntityRegistry,
  findColumn,
  findRelation,
} from "./entities";

export type EntityScope = Readonly<{
  entity: EntityDefinition;
  /** Relation names from the query root down to this scope */
  path: readonly string[];
  /**
   * Scope of a related entity, joining it into the query on first use.
   * Joining the same relation path twice reuses the first join.
   */
  join: (relation: string) => EntityScope;
}>;

export type QueryScope = Readonly<{
  root: EntityScope;
  /** LEFT JOIN clauses in the order the relations were first joined */
  joins: () => readonly SQL[];
}>;

export function createQueryScope(
  registry: EntityRegistry,
  rootEntity: EntityDefinition,
): QueryScope {
  const scopes = new Map<string, EntityScope>();
  const joinedTables = new Map<string, string>([
    [rootEntity.tableName, rootEntity.name],
  ]);
  const clauses: SQL[] = [];

  function createScope(
    entity: EntityDefinition,
    path: readonly string[],
  ): EntityScope {
    const scope: EntityScope = {
      entity,
      path,
      join(relationName) {
        const relation = findRelation(entity, relationName);
        if (relation === undefined) {
          throw new PredicateError(
            `Unknown relation "${relationName}" on ${entity.name}`,
            { entityType: entity.name, path: [...path, relationName] },
          );
        }

        const childPath = [...path, relationName];
        const pathKey = childPath.join(".");
        const existing = scopes.get(pathKey);
        if (existing !== undefined) {
          return existing;
        }

        const target = registry.get(relation.target);
        const joinedBy = joinedTables.get(target.tableName);
        if (joinedBy !== undefined) {
          throw new PredicateError(
            `Relation "${pathKey}" joins table "${target.tableName}" which is already part of the query`,
            { entityType: rootEntity.name, path: childPath },
            {
              suggestion: `Filter on "${target.tableName}" through a single relation path per query.`,
            },
          );
        }

        const sourceColumn = findColumn(entity, relation.sourceKey);
        const targetColumn = findColumn(target, relation.targetKey);
        if (sourceColumn === undefined || targetColumn === undefined) {
          throw new PredicateError(
            `Relation "${pathKey}" references a missing column`,
            { entityType: rootEntity.name, path: childPath },
          );
        }

        joinedTables.set(target.tableName, pathKey);
        clauses.push(
          sql` left join ${target.table} on ${sourceColumn} = ${targetColumn}`,
        );

        const child = createScope(target, childPath);
        scopes.set(pathKey, child);
        return child;
      },
    };
    return scope;
  }

  return {
    root: createScope(rootEntity, []),
    joins: () => clauses,
  };
}
