import { type SQL } from "drizzle-orm";
import { type BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

import {
  type CompiledSqlQuery,
  compileQueryWithDialect,
  type SqlExecutionAdapter,
} from "./types";

const DEFAULT_PREPARED_STATEMENT_CACHE_MAX = 256;

type PreparedAllStatement = Readonly<{
  all: (...params: readonly unknown[]) => readonly unknown[];
}>;

type SqliteClientWithPrepare = Readonly<{
  prepare: (sqlText: string) => PreparedAllStatement;
}>;

type SqliteClientCarrier = Readonly<{
  $client?: SqliteClientWithPrepare;
}>;

export type AnySqliteDatabase = BaseSQLiteDatabase<"sync" | "async", unknown>;

export type SqliteExecutionAdapterOptions = Readonly<{
  /**
   * Whether the driver runs statements synchronously (better-sqlite3).
   * Compiled statements are cached and reused only for sync drivers.
   * Defaults to detecting a `$client.prepare` on the database.
   */
  isSync?: boolean;
  statementCacheMax?: number;
}>;

export type SqliteExecutionAdapter = Readonly<
  SqlExecutionAdapter & {
    clearStatementCache: () => void;
    usesStatementCache: boolean;
  }
>;

function resolveSqliteClient(
  db: AnySqliteDatabase,
): SqliteClientWithPrepare | undefined {
  const databaseWithClient = db as SqliteClientCarrier;
  const sqliteClient = databaseWithClient.$client;
  if (sqliteClient?.prepare === undefined) {
    return undefined;
  }
  return sqliteClient;
}

function getOrCreatePreparedStatement(
  cache: Map<string, PreparedAllStatement>,
  sqliteClient: SqliteClientWithPrepare,
  sqlText: string,
  cacheMax: number,
): PreparedAllStatement {
  const cachedStatement = cache.get(sqlText);
  if (cachedStatement !== undefined) {
    // Promote to most-recently-used position for LRU eviction
    cache.delete(sqlText);
    cache.set(sqlText, cachedStatement);
    return cachedStatement;
  }

  const preparedStatement = sqliteClient.prepare(sqlText);
  cache.set(sqlText, preparedStatement);

  if (cache.size > cacheMax) {
    const oldestSqlText = cache.keys().next().value;
    if (typeof oldestSqlText === "string") {
      cache.delete(oldestSqlText);
    }
  }

  return preparedStatement;
}

async function executeDrizzleQuery<TRow>(
  db: AnySqliteDatabase,
  query: SQL,
): Promise<readonly TRow[]> {
  const rows = db.all(query);
  return (rows instanceof Promise ? await rows : rows) as readonly TRow[];
}

export function createSqliteExecutionAdapter(
  db: AnySqliteDatabase,
  options: SqliteExecutionAdapterOptions = {},
): SqliteExecutionAdapter {
  const statementCacheMax =
    options.statementCacheMax ?? DEFAULT_PREPARED_STATEMENT_CACHE_MAX;
  const sqliteClient = resolveSqliteClient(db);
  const isSync = options.isSync ?? sqliteClient !== undefined;

  const compile = (query: SQL): CompiledSqlQuery =>
    compileQueryWithDialect(db, query, "SQLite");

  if (isSync && sqliteClient !== undefined) {
    const client = sqliteClient;
    const statementCache = new Map<string, PreparedAllStatement>();

    return {
      dialect: "sqlite",
      clearStatementCache() {
        statementCache.clear();
      },
      compile,
      execute<TRow>(query: SQL): Promise<readonly TRow[]> {
        try {
          const compiledQuery = compile(query);
          const preparedStatement = getOrCreatePreparedStatement(
            statementCache,
            client,
            compiledQuery.sql,
            statementCacheMax,
          );
          const rows = preparedStatement.all(...compiledQuery.params);
          return Promise.resolve(rows as readonly TRow[]);
        } catch (error) {
          return Promise.reject(error);
        }
      },
      usesStatementCache: true,
    };
  }

  return {
    dialect: "sqlite",
    clearStatementCache() {
      // No-op: no statement cache for async drivers
    },
    compile,
    execute<TRow>(query: SQL): Promise<readonly TRow[]> {
      return executeDrizzleQuery<TRow>(db, query);
    },
    usesStatementCache: false,
  };
}
