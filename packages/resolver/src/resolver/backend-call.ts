import { BackendError, isResolverError } from "../errors";

/**
 * Runs a backend execution, surfacing foreign failures as BackendError.
 * Resolver errors raised by the backend pass through unchanged.
 */
export async function callBackend<T>(
  operation: "content" | "count",
  entityType: string,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (isResolverError(error)) {
      throw error;
    }
    throw new BackendError(
      `${operation === "content" ? "Content" : "Count"} query for ${entityType} failed`,
      { operation, entityType },
      { cause: error },
    );
  }
}
