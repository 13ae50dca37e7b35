/**
 * PostgreSQL query backend.
 *
 * @example
 * ```typescript
 * import { Pool } from "pg";
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { createPostgresQueryBackend } from "entity-query-resolver/postgres";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const backend = createPostgresQueryBackend(drizzle(pool), { entities });
 * ```
 */
import {
  createDrizzleQueryBackend,
  type DrizzleBackendOptions,
  type DrizzleQueryBackend,
} from "../drizzle/backend";
import {
  type AnyPgDatabase,
  createPostgresExecutionAdapter,
} from "../drizzle/execution/postgres-execution";

export type PostgresBackendOptions = DrizzleBackendOptions;

export function createPostgresQueryBackend(
  db: AnyPgDatabase,
  options: PostgresBackendOptions,
): DrizzleQueryBackend {
  return createDrizzleQueryBackend(createPostgresExecutionAdapter(db), options);
}
