/**
 * SQLite query backend.
 *
 * Works with any Drizzle SQLite database instance; better-sqlite3 gets
 * cached prepared statements.
 *
 * @example Local database (in-memory by default)
 * ```typescript
 * import { createLocalSqliteBackend } from "entity-query-resolver/sqlite";
 *
 * const { backend, close } = createLocalSqliteBackend({
 *   entities: [defineEntity("Book", books)],
 *   setup: ["CREATE TABLE books (id INTEGER PRIMARY KEY, title TEXT NOT NULL)"],
 * });
 * const result = await resolver.resolve(request, backend);
 * await close();
 * ```
 *
 * @example Existing drizzle database
 * ```typescript
 * import Database from "better-sqlite3";
 * import { drizzle } from "drizzle-orm/better-sqlite3";
 *
 * const db = drizzle(new Database("app.db"));
 * const backend = createSqliteQueryBackend(db, { entities });
 * ```
 */
import Database from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";

import { ConfigurationError } from "../../errors";
import {
  createDrizzleQueryBackend,
  type DrizzleBackendOptions,
  type DrizzleQueryBackend,
} from "../drizzle/backend";
import {
  type AnySqliteDatabase,
  createSqliteExecutionAdapter,
  type SqliteExecutionAdapterOptions,
} from "../drizzle/execution/sqlite-execution";

type NodeModuleVersionMismatch = Readonly<{
  compiled: number;
  required: number;
}>;

function getUnknownErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function parseNodeModuleVersionMismatchMessage(
  message: string,
): NodeModuleVersionMismatch | undefined {
  const regexp =
    /NODE_MODULE_VERSION (?<compiled>\d+)[\s\S]*?NODE_MODULE_VERSION (?<required>\d+)/;
  const match = regexp.exec(message);
  if (!match?.groups) return undefined;

  const compiled = Number(match.groups.compiled);
  const required = Number(match.groups.required);

  if (!Number.isFinite(compiled) || !Number.isFinite(required))
    return undefined;

  return { compiled, required };
}

function createDatabase(path: string): Database.Database {
  try {
    return new Database(path);
  } catch (error) {
    const message = getUnknownErrorMessage(error);
    const mismatch = parseNodeModuleVersionMismatchMessage(message);
    if (!mismatch) throw error;

    throw new ConfigurationError(
      [
        "Failed to load better-sqlite3 native addon.",
        `It was compiled for NODE_MODULE_VERSION ${mismatch.compiled}, but this Node.js runtime requires ${mismatch.required}.`,
        "Rebuild with: npm rebuild better-sqlite3.",
      ].join(" "),
      {
        nodeVersion: process.version,
        nodeModuleVersion: process.versions.modules,
        compiledNodeModuleVersion: mismatch.compiled,
        requiredNodeModuleVersion: mismatch.required,
      },
      { cause: error },
    );
  }
}

// ============================================================
// Types
// ============================================================

export type SqliteBackendOptions = DrizzleBackendOptions &
  Readonly<{
    execution?: SqliteExecutionAdapterOptions;
  }>;

export type LocalSqliteBackendOptions = SqliteBackendOptions &
  Readonly<{
    /**
     * Path to the SQLite database file.
     * Defaults to ":memory:" for an in-memory database.
     */
    path?: string;
    /** Statements run once after opening, e.g. CREATE TABLE */
    setup?: readonly string[];
  }>;

export type LocalSqliteBackendResult = Readonly<{
  backend: DrizzleQueryBackend;
  /** The underlying Drizzle database instance */
  db: BetterSQLite3Database & { $client: Database.Database };
  close: () => Promise<void>;
}>;

// ============================================================
// Factory Functions
// ============================================================

export function createSqliteQueryBackend(
  db: AnySqliteDatabase,
  options: SqliteBackendOptions,
): DrizzleQueryBackend {
  return createDrizzleQueryBackend(
    createSqliteExecutionAdapter(db, options.execution),
    options,
  );
}

/**
 * Opens a better-sqlite3 database and wraps it in a query backend.
 *
 * For production deployments, use createSqliteQueryBackend with your own
 * Drizzle database instance.
 */
export function createLocalSqliteBackend(
  options: LocalSqliteBackendOptions,
): LocalSqliteBackendResult {
  const sqlite = createDatabase(options.path ?? ":memory:");
  const db = drizzle(sqlite);

  for (const statement of options.setup ?? []) {
    sqlite.exec(statement);
  }

  const backend = createSqliteQueryBackend(db, {
    ...options,
    execution: { isSync: true, ...options.execution },
  });
  let isClosed = false;

  function close(): Promise<void> {
    if (isClosed) return Promise.resolve();
    isClosed = true;
    sqlite.close();
    return Promise.resolve();
  }

  return { backend, db, close };
}
