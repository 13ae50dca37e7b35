import { type Column } from "drizzle-orm";

import {
  type EntityDefinition,
  type EntityRecord,
  findColumn,
} from "./entities";

export type SelectedColumn = Readonly<{ key: string; column: Column }>;

/**
 * Maps raw driver rows to entity records.
 *
 * Rows sharing an identity value map to the same record object, the first
 * one seen, so duplicate root rows produced by joins stay identical.
 */
export function createRowMapper(
  entity: EntityDefinition,
  columns: readonly SelectedColumn[],
): (row: Readonly<Record<string, unknown>>) => EntityRecord {
  const identityMap = new Map<unknown, EntityRecord>();
  const keyColumn = findColumn(entity, entity.key);

  function decode(column: Column, value: unknown): unknown {
    if (value === null || value === undefined) {
      return null;
    }
    return column.mapFromDriverValue(value);
  }

  return (row) => {
    const identity =
      keyColumn === undefined ? undefined : (
        decode(keyColumn, row[keyColumn.name])
      );
    if (identity !== undefined && identity !== null) {
      const existing = identityMap.get(identity);
      if (existing !== undefined) {
        return existing;
      }
    }

    const record: Record<string, unknown> = {};
    for (const { key, column } of columns) {
      record[key] = decode(column, row[column.name]);
    }

    if (identity !== undefined && identity !== null) {
      identityMap.set(identity, record);
    }
    return record;
  };
}
