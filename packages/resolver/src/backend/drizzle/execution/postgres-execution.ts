import { type SQL } from "drizzle-orm";
import { type PgDatabase, type PgQueryResultHKT } from "drizzle-orm/pg-core";

import {
  type CompiledSqlQuery,
  compileQueryWithDialect,
  type SqlExecutionAdapter,
} from "./types";

type PgQueryResult = Readonly<{
  rows: readonly unknown[];
}>;

type PgQueryClient = Readonly<{
  query: (sqlText: string, params: readonly unknown[]) => Promise<PgQueryResult>;
}>;

type PgClientCarrier = Readonly<{
  $client?: PgQueryClient;
}>;

export type AnyPgDatabase = PgDatabase<PgQueryResultHKT, Record<string, unknown>>;

export type PostgresExecutionAdapter = SqlExecutionAdapter;

function resolvePgClient(db: AnyPgDatabase): PgQueryClient | undefined {
  const databaseWithClient = db as PgClientCarrier;
  const pgClient = databaseWithClient.$client;
  if (pgClient?.query === undefined) {
    return undefined;
  }
  return pgClient;
}

async function executeDrizzleQuery<TRow>(
  db: AnyPgDatabase,
  query: SQL,
): Promise<readonly TRow[]> {
  const result = (await db.execute(query)) as Readonly<{
    rows: readonly TRow[];
  }>;
  return result.rows;
}

/**
 * Executes through the underlying `pg` client when drizzle exposes one,
 * which skips drizzle's result post-processing; otherwise through drizzle.
 */
export function createPostgresExecutionAdapter(
  db: AnyPgDatabase,
): PostgresExecutionAdapter {
  const pgClient = resolvePgClient(db);

  function compile(query: SQL): CompiledSqlQuery {
    return compileQueryWithDialect(db, query, "PostgreSQL");
  }

  if (pgClient === undefined) {
    return {
      dialect: "postgres",
      compile,
      async execute<TRow>(query: SQL): Promise<readonly TRow[]> {
        return executeDrizzleQuery<TRow>(db, query);
      },
    };
  }

  const pgQueryClient = pgClient;

  return {
    dialect: "postgres",
    compile,
    async execute<TRow>(query: SQL): Promise<readonly TRow[]> {
      const compiledQuery = compile(query);
      const result = await pgQueryClient.query(
        compiledQuery.sql,
        compiledQuery.params,
      );
      return result.rows as readonly TRow[];
    },
  };
}
