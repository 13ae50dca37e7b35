export {
  type AnyPgDatabase,
  createPostgresExecutionAdapter,
  type PostgresExecutionAdapter,
} from "./postgres-execution";
export {
  type AnySqliteDatabase,
  createSqliteExecutionAdapter,
  type SqliteExecutionAdapter,
  type SqliteExecutionAdapterOptions,
} from "./sqlite-execution";
export {
  type CompiledSqlQuery,
  compileQueryWithDialect,
  type SqlDialect,
  type SqlExecutionAdapter,
} from "./types";
