import { type SQL } from "drizzle-orm";

/**
 * SQL dialects the drizzle backend can emit.
 */
export type SqlDialect = "sqlite" | "postgres";

export type CompiledSqlQuery = Readonly<{
  params: readonly unknown[];
  sql: string;
}>;

/**
 * Runs drizzle SQL against one connected database.
 */
export type SqlExecutionAdapter = Readonly<{
  dialect: SqlDialect;
  compile: (query: SQL) => CompiledSqlQuery;
  execute: <TRow>(query: SQL) => Promise<readonly TRow[]>;
}>;

type SqlCompiler = Readonly<{
  sqlToQuery: (query: SQL) => CompiledSqlQuery;
}>;

type DatabaseWithCompiler = Readonly<{
  dialect?: SqlCompiler;
}>;

export function compileQueryWithDialect(
  db: unknown,
  query: SQL,
  backendName: string,
): CompiledSqlQuery {
  const databaseWithCompiler = db as DatabaseWithCompiler;
  const compiler = databaseWithCompiler.dialect;
  if (compiler === undefined) {
    throw new Error(`${backendName} backend is missing a SQL compiler`);
  }
  return compiler.sqlToQuery(query);
}
