/**
 * Observability hooks for monitoring resolver round-trips.
 *
 * @example
 * ```typescript
 * const hooks: ResolverHooks = {
 *   onQueryStart: (ctx) => {
 *     console.log(`[${ctx.operationId}] ${ctx.query} query on ${ctx.entityType}`);
 *   },
 *   onQueryEnd: (ctx, result) => {
 *     console.log(`[${ctx.operationId}] ${result.rowCount} rows in ${result.durationMs}ms`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`[${ctx.operationId}] Error:`, error);
 *   },
 * };
 *
 * const resolver = createQueryResolver({ entityType: "Book", hooks });
 * ```
 */
import { generateId } from "../utils/id";

/**
 * Hook context for one backend round-trip.
 */
export type QueryHookContext = Readonly<{
  /** Unique ID shared by the content and count query of one resolve call */
  operationId: string;
  entityType: string;
  query: "content" | "count";
  startedAt: Date;
}>;

export type ResolverHooks = Readonly<{
  /** Called before a query is executed */
  onQueryStart?: (ctx: QueryHookContext) => void;
  /**
   * Called after a query completes successfully. For count queries
   * `rowCount` is the counted total.
   */
  onQueryEnd?: (
    ctx: QueryHookContext,
    result: Readonly<{ rowCount: number; durationMs: number }>,
  ) => void;
  /** Called when a query fails, before the error propagates */
  onError?: (ctx: QueryHookContext, error: Error) => void;
}>;

export function createOperationId(): string {
  return generateId();
}

/**
 * Runs one backend round-trip, reporting it through the hooks.
 */
export async function runWithHooks<T>(
  hooks: ResolverHooks,
  context: Omit<QueryHookContext, "startedAt">,
  measure: (result: T) => number,
  run: () => Promise<T>,
): Promise<T> {
  const ctx: QueryHookContext = { ...context, startedAt: new Date() };
  hooks.onQueryStart?.(ctx);

  try {
    const result = await run();
    hooks.onQueryEnd?.(ctx, {
      rowCount: measure(result),
      durationMs: Date.now() - ctx.startedAt.getTime(),
    });
    return result;
  } catch (error) {
    if (error instanceof Error) {
      hooks.onError?.(ctx, error);
    }
    throw error;
  }
}
