/**
 * Entity definitions for the drizzle backend.
 *
 * An entity binds a query entity type to a drizzle table, names its key
 * column and declares the relations a where filter may traverse.
 *
 * @example
 * ```typescript
 * const authors = sqliteTable("authors", {
 *   id: integer("id").primaryKey(),
 *   name: text("name").notNull(),
 * });
 * const books = sqliteTable("books", {
 *   id: integer("id").primaryKey(),
 *   authorId: integer("author_id").notNull(),
 *   title: text("title").notNull(),
 * });
 *
 * const registry = createEntityRegistry([
 *   defineEntity("Author", authors, {
 *     relations: { books: hasMany("Book", { sourceKey: "id", targetKey: "authorId" }) },
 *   }),
 *   defineEntity("Book", books),
 * ]);
 * ```
 */
import {
  type Column,
  getTableColumns,
  getTableName,
  type Table,
} from "drizzle-orm";

import { ConfigurationError } from "../../errors";

// ============================================================
// Types
// ============================================================

export type RelationCardinality = "one" | "many";

export type RelationDefinition = Readonly<{
  /** Name of the related entity */
  target: string;
  cardinality: RelationCardinality;
  /** Column key on the owning entity */
  sourceKey: string;
  /** Column key on the related entity */
  targetKey: string;
}>;

export type EntityDefinition = Readonly<{
  name: string;
  table: Table;
  tableName: string;
  /** Column key of the identity column */
  key: string;
  columns: Readonly<Record<string, Column>>;
  relations: Readonly<Record<string, RelationDefinition>>;
}>;

export type DefineEntityOptions = Readonly<{
  /** Identity column key. Defaults to `"id"`. */
  key?: string;
  relations?: Readonly<Record<string, RelationDefinition>>;
}>;

/**
 * Row object returned by the drizzle backend, keyed by column key.
 */
export type EntityRecord = Readonly<Record<string, unknown>>;

// ============================================================
// Builders
// ============================================================

export function defineEntity(
  name: string,
  table: Table,
  options: DefineEntityOptions = {},
): EntityDefinition {
  const columns: Record<string, Column> = getTableColumns(table);
  return {
    name,
    table,
    tableName: getTableName(table),
    key: options.key ?? "id",
    columns,
    relations: options.relations ?? {},
  };
}

/**
 * Column of an entity by key. Only the entity's own keys match, never
 * inherited object members such as `constructor`.
 */
export function findColumn(
  entity: EntityDefinition,
  key: string,
): Column | undefined {
  return Object.hasOwn(entity.columns, key) ? entity.columns[key] : undefined;
}

export function findRelation(
  entity: EntityDefinition,
  name: string,
): RelationDefinition | undefined {
  return Object.hasOwn(entity.relations, name) ?
      entity.relations[name]
    : undefined;
}

type RelationKeys = Readonly<{ sourceKey: string; targetKey: string }>;

export function hasMany(target: string, keys: RelationKeys): RelationDefinition {
  return { target, cardinality: "many", ...keys };
}

export function hasOne(target: string, keys: RelationKeys): RelationDefinition {
  return { target, cardinality: "one", ...keys };
}

// ============================================================
// Registry
// ============================================================

export type EntityRegistry = Readonly<{
  get: (name: string) => EntityDefinition;
  has: (name: string) => boolean;
  names: readonly string[];
}>;

function validateEntity(
  entity: EntityDefinition,
  byName: ReadonlyMap<string, EntityDefinition>,
): void {
  if (findColumn(entity, entity.key) === undefined) {
    throw new ConfigurationError(
      `Entity "${entity.name}" has no key column "${entity.key}"`,
      { entity: entity.name, key: entity.key },
    );
  }

  for (const [relationName, relation] of Object.entries(entity.relations)) {
    if (findColumn(entity, relationName) !== undefined) {
      throw new ConfigurationError(
        `Relation "${relationName}" on "${entity.name}" shadows a column of the same name`,
        { entity: entity.name, relation: relationName },
      );
    }

    const target = byName.get(relation.target);
    if (target === undefined) {
      throw new ConfigurationError(
        `Relation "${relationName}" on "${entity.name}" targets unknown entity "${relation.target}"`,
        { entity: entity.name, relation: relationName, target: relation.target },
      );
    }
    if (findColumn(entity, relation.sourceKey) === undefined) {
      throw new ConfigurationError(
        `Relation "${relationName}" on "${entity.name}" uses unknown column "${relation.sourceKey}"`,
        { entity: entity.name, relation: relationName, column: relation.sourceKey },
      );
    }
    if (findColumn(target, relation.targetKey) === undefined) {
      throw new ConfigurationError(
        `Relation "${relationName}" on "${entity.name}" uses unknown column "${relation.targetKey}" of "${target.name}"`,
        { entity: entity.name, relation: relationName, column: relation.targetKey },
      );
    }
  }
}

/**
 * Indexes entity definitions by name and checks their relation wiring.
 *
 * @throws ConfigurationError on duplicate names, a missing key column or a
 *   relation pointing at an unknown entity or column
 */
export function createEntityRegistry(
  entities: readonly EntityDefinition[],
): EntityRegistry {
  const byName = new Map<string, EntityDefinition>();

  for (const entity of entities) {
    if (byName.has(entity.name)) {
      throw new ConfigurationError(`Duplicate entity "${entity.name}"`, {
        entity: entity.name,
      });
    }
    byName.set(entity.name, entity);
  }

  for (const entity of entities) {
    validateEntity(entity, byName);
  }

  return {
    get(name) {
      const entity = byName.get(name);
      if (entity === undefined) {
        throw new ConfigurationError(`Unknown entity type "${name}"`, {
          entity: name,
          known: [...byName.keys()],
        });
      }
      return entity;
    },
    has(name) {
      return byName.has(name);
    },
    names: [...byName.keys()],
  };
}
