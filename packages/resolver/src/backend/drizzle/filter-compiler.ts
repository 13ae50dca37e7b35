/**
 * Predicate compilers for the drizzle backend.
 *
 * The where compiler takes a filter tree:
 *
 * ```
 * {
 *   title: { LIKE: "%graph%" },
 *   OR: [{ year: { GE: 2000 } }, { year: { IS_NULL: true } }],
 *   NOT: { status: { EQ: "draft" } },
 *   author: { name: { EQ: "Ada" } },    // relation, scoped to the related entity
 * }
 * ```
 *
 * Keys of one object are conjoined, as are multiple operators on one field.
 * The field compiler handles plain arguments: `title: "Dune"` is equality,
 * `title: null` is `IS NULL`.
 */
import {
  and,
  between,
  type Column,
  eq,
  gt,
  gte,
  inArray,
  isNotNull,
  isNull,
  like,
  lt,
  lte,
  ne,
  not,
  notBetween,
  notInArray,
  or,
  type SQL,
} from "drizzle-orm";

import { type PredicateCompiler } from "../../backend/types";
import { PredicateError } from "../../errors";
import { isArgumentList, isArgumentObject } from "../../request/arguments";
import { type ArgumentValue } from "../../request/types";
import { findColumn, findRelation } from "./entities";
import { type EntityScope } from "./scope";

// ============================================================
// Operators
// ============================================================

export const FILTER_OPERATORS = [
  "EQ",
  "NE",
  "GT",
  "GE",
  "LT",
  "LE",
  "LIKE",
  "STARTS",
  "ENDS",
  "IN",
  "NIN",
  "BETWEEN",
  "NOT_BETWEEN",
  "IS_NULL",
  "NOT_NULL",
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

const LOGICAL_KEYS = { and: "AND", or: "OR", not: "NOT" } as const;

type Scalar = string | number | boolean;

type ColumnValue = Scalar | bigint | Date;

const INTEGER_PATTERN = /^-?\d+$/;

const OPERATOR_SET: ReadonlySet<string> = new Set(FILTER_OPERATORS);

function isFilterOperator(value: string): value is FilterOperator {
  return OPERATOR_SET.has(value);
}

function isScalar(value: ArgumentValue): value is Scalar {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function describeValue(value: ArgumentValue): string {
  if (value === null) return "null";
  if (isArgumentList(value)) return "list";
  return typeof value;
}

type OperandContext = Readonly<{
  entityType: string;
  path: readonly string[];
  operator: FilterOperator;
}>;

function operandError(
  context: OperandContext,
  expected: string,
  value: ArgumentValue,
): PredicateError {
  return new PredicateError(
    `Operator ${context.operator} on "${context.path.join(".")}" expects ${expected}, got ${describeValue(value)}`,
    {
      entityType: context.entityType,
      path: context.path,
      operator: context.operator,
    },
  );
}

/**
 * Checks a scalar operand against the column's data type, converting it
 * to the value the column encodes (a `Date` for date columns, a `bigint`
 * for bigint columns). Columns of other data types take any scalar.
 */
function toColumnValue(
  column: Column,
  context: OperandContext,
  value: Scalar,
): ColumnValue {
  switch (column.dataType) {
    case "string": {
      if (typeof value !== "string") {
        throw operandError(context, "a string", value);
      }
      return value;
    }
    case "number": {
      if (typeof value !== "number") {
        throw operandError(context, "a number", value);
      }
      return value;
    }
    case "boolean": {
      if (typeof value !== "boolean") {
        throw operandError(context, "a boolean", value);
      }
      return value;
    }
    case "bigint": {
      if (
        (typeof value === "number" && Number.isInteger(value)) ||
        (typeof value === "string" && INTEGER_PATTERN.test(value))
      ) {
        return BigInt(value);
      }
      throw operandError(context, "an integer", value);
    }
    case "date": {
      const date = typeof value === "boolean" ? undefined : new Date(value);
      if (date === undefined || Number.isNaN(date.getTime())) {
        throw operandError(context, "a date", value);
      }
      return date;
    }
    default: {
      return value;
    }
  }
}

function expectScalar(
  column: Column,
  context: OperandContext,
  value: ArgumentValue,
): ColumnValue {
  if (!isScalar(value)) {
    throw operandError(context, "a scalar", value);
  }
  return toColumnValue(column, context, value);
}

function expectString(context: OperandContext, value: ArgumentValue): string {
  if (typeof value !== "string") {
    throw operandError(context, "a string", value);
  }
  return value;
}

function expectBoolean(context: OperandContext, value: ArgumentValue): boolean {
  if (typeof value !== "boolean") {
    throw operandError(context, "a boolean", value);
  }
  return value;
}

function expectScalarList(
  column: Column,
  context: OperandContext,
  value: ArgumentValue,
): ColumnValue[] {
  if (!isArgumentList(value) || !value.every((item) => isScalar(item))) {
    throw operandError(context, "a list of scalars", value);
  }
  return value
    .filter(isScalar)
    .map((item) => toColumnValue(column, context, item));
}

function expectRange(
  column: Column,
  context: OperandContext,
  value: ArgumentValue,
): readonly [ColumnValue, ColumnValue] {
  const list =
    isArgumentList(value) ? expectScalarList(column, context, value) : [];
  const [low, high] = list;
  if (list.length !== 2 || low === undefined || high === undefined) {
    throw operandError(context, "a list of two scalars", value);
  }
  return [low, high];
}

function compileOperator(
  column: Column,
  context: OperandContext,
  operand: ArgumentValue,
): SQL {
  switch (context.operator) {
    case "EQ": {
      return operand === null ?
          isNull(column)
        : eq(column, expectScalar(column, context, operand));
    }
    case "NE": {
      return operand === null ?
          isNotNull(column)
        : ne(column, expectScalar(column, context, operand));
    }
    case "GT": {
      return gt(column, expectScalar(column, context, operand));
    }
    case "GE": {
      return gte(column, expectScalar(column, context, operand));
    }
    case "LT": {
      return lt(column, expectScalar(column, context, operand));
    }
    case "LE": {
      return lte(column, expectScalar(column, context, operand));
    }
    case "LIKE": {
      return like(column, expectString(context, operand));
    }
    case "STARTS": {
      return like(column, `${expectString(context, operand)}%`);
    }
    case "ENDS": {
      return like(column, `%${expectString(context, operand)}`);
    }
    case "IN": {
      return inArray(column, expectScalarList(column, context, operand));
    }
    case "NIN": {
      return notInArray(column, expectScalarList(column, context, operand));
    }
    case "BETWEEN": {
      const [low, high] = expectRange(column, context, operand);
      return between(column, low, high);
    }
    case "NOT_BETWEEN": {
      const [low, high] = expectRange(column, context, operand);
      return notBetween(column, low, high);
    }
    case "IS_NULL": {
      return expectBoolean(context, operand) ? isNull(column) : isNotNull(column);
    }
    case "NOT_NULL": {
      return expectBoolean(context, operand) ? isNotNull(column) : isNull(column);
    }
  }
}

// ============================================================
// Where Trees
// ============================================================

function compileFieldCriteria(
  scope: EntityScope,
  column: Column,
  criteria: ArgumentValue,
  path: readonly string[],
): SQL | undefined {
  if (!isArgumentObject(criteria)) {
    throw new PredicateError(
      `Filter on "${path.join(".")}" expects an operator object, got ${describeValue(criteria)}`,
      { entityType: scope.entity.name, path },
    );
  }

  const parts: SQL[] = [];
  for (const [operator, operand] of Object.entries(criteria)) {
    if (!isFilterOperator(operator)) {
      throw new PredicateError(
        `Unknown operator "${operator}" on "${path.join(".")}"`,
        { entityType: scope.entity.name, path, operator },
        { suggestion: `Use one of: ${FILTER_OPERATORS.join(", ")}.` },
      );
    }
    parts.push(
      compileOperator(
        column,
        { entityType: scope.entity.name, path, operator },
        operand,
      ),
    );
  }
  return and(...parts);
}

function compileWhereList(
  scope: EntityScope,
  value: ArgumentValue,
  path: readonly string[],
): SQL[] {
  const items = isArgumentList(value) ? value : [value];
  const compiled: SQL[] = [];
  for (const [index, item] of items.entries()) {
    const predicate = compileWhere(scope, item, [...path, String(index)]);
    if (predicate !== undefined) {
      compiled.push(predicate);
    }
  }
  return compiled;
}

/**
 * Compiles a where tree against a scope. Empty trees compile to nothing.
 */
export function compileWhere(
  scope: EntityScope,
  value: ArgumentValue,
  path: readonly string[],
): SQL | undefined {
  if (!isArgumentObject(value)) {
    throw new PredicateError(
      `Filter "${path.join(".")}" expects an object, got ${describeValue(value)}`,
      { entityType: scope.entity.name, path },
    );
  }

  const parts: SQL[] = [];

  for (const [key, operand] of Object.entries(value)) {
    const keyPath = [...path, key];

    if (key === LOGICAL_KEYS.and) {
      const predicate = and(...compileWhereList(scope, operand, keyPath));
      if (predicate !== undefined) parts.push(predicate);
      continue;
    }
    if (key === LOGICAL_KEYS.or) {
      const predicate = or(...compileWhereList(scope, operand, keyPath));
      if (predicate !== undefined) parts.push(predicate);
      continue;
    }
    if (key === LOGICAL_KEYS.not) {
      const predicate = compileWhere(scope, operand, keyPath);
      if (predicate !== undefined) parts.push(not(predicate));
      continue;
    }

    const column = findColumn(scope.entity, key);
    if (column !== undefined) {
      const predicate = compileFieldCriteria(scope, column, operand, keyPath);
      if (predicate !== undefined) parts.push(predicate);
      continue;
    }

    if (findRelation(scope.entity, key) !== undefined) {
      const predicate = compileWhere(scope.join(key), operand, keyPath);
      if (predicate !== undefined) parts.push(predicate);
      continue;
    }

    throw new PredicateError(
      `Unknown field "${key}" on ${scope.entity.name}`,
      { entityType: scope.entity.name, path: keyPath },
    );
  }

  return and(...parts);
}

// ============================================================
// Compilers
// ============================================================

export const whereFilterCompiler: PredicateCompiler<EntityScope, SQL> = {
  compilePredicate(context, value) {
    return compileWhere(context.scope, value, context.path);
  },
};

export const fieldMatchCompiler: PredicateCompiler<EntityScope, SQL> = {
  compilePredicate(context, value) {
    const { scope, argument } = context;
    const column = findColumn(scope.entity, argument.name);
    if (column === undefined) {
      throw new PredicateError(
        `Unknown field "${argument.name}" on ${scope.entity.name}`,
        { entityType: scope.entity.name, path: [argument.name] },
      );
    }
    if (value === null) {
      return isNull(column);
    }
    if (!isScalar(value)) {
      throw new PredicateError(
        `Argument "${argument.name}" expects a scalar, got ${describeValue(value)}`,
        { entityType: scope.entity.name, path: [argument.name] },
      );
    }
    return eq(
      column,
      toColumnValue(
        column,
        { entityType: scope.entity.name, path: [argument.name], operator: "EQ" },
        value,
      ),
    );
  },
};
