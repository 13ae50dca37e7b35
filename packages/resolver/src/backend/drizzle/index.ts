export {
  createDrizzleQueryBackend,
  type DrizzleBackendOptions,
  type DrizzleQueryBackend,
} from "./backend";
export {
  createEntityRegistry,
  defineEntity,
  type DefineEntityOptions,
  type EntityDefinition,
  type EntityRecord,
  type EntityRegistry,
  hasMany,
  hasOne,
  type RelationCardinality,
  type RelationDefinition,
} from "./entities";
export * from "./execution";
export {
  compileWhere,
  fieldMatchCompiler,
  FILTER_OPERATORS,
  type FilterOperator,
  whereFilterCompiler,
} from "./filter-compiler";
export {
  type DrizzleContentQuery,
  type DrizzleCountQuery,
} from "./query-builders";
export { type EntityScope } from "./scope";
