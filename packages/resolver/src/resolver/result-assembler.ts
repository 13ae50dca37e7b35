/**
 * Result assembly.
 */
import { type ReservedNames } from "../config";
import { type PageWindow } from "./selection-analyzer";

/**
 * Resolved sections of one request. A key is present only when its
 * section was selected, in the order records, total, pages.
 */
export type ResultEnvelope<TEntity> = Readonly<{
  records?: readonly TEntity[];
  total?: number;
  pages?: number;
}>;

/**
 * Number of pages needed to show `total` rows.
 *
 * Without an explicit window everything fits on one page, so the count is
 * 1 when any row exists and 0 otherwise.
 */
export function computePageCount(total: number, window: PageWindow): number {
  if (!window.explicit) {
    return total > 0 ? 1 : 0;
  }
  return Math.trunc(Math.ceil(total / window.pageSize));
}

export type ResultParts<TEntity> = Readonly<{
  records: readonly TEntity[] | undefined;
  total: number | undefined;
  window: PageWindow;
  wantsTotal: boolean;
  wantsPages: boolean;
}>;

export function assembleResult<TEntity>(
  parts: ResultParts<TEntity>,
): ResultEnvelope<TEntity> {
  const envelope: {
    records?: readonly TEntity[];
    total?: number;
    pages?: number;
  } = {};

  if (parts.records !== undefined) {
    envelope.records = parts.records;
  }
  if (parts.total !== undefined) {
    if (parts.wantsTotal) {
      envelope.total = parts.total;
    }
    if (parts.wantsPages) {
      envelope.pages = computePageCount(parts.total, parts.window);
    }
  }

  return envelope;
}

/**
 * Renders an envelope keyed by the schema's selection names.
 *
 * @example
 * ```typescript
 * toFieldResult({ records: [a], total: 1, pages: 1 }, DEFAULT_RESERVED_NAMES);
 * // { select: [a], total: 1, pages: 1 }
 * ```
 */
export function toFieldResult<TEntity>(
  envelope: ResultEnvelope<TEntity>,
  names: ReservedNames,
): Readonly<Record<string, readonly TEntity[] | number>> {
  const result: Record<string, readonly TEntity[] | number> = {};

  if (envelope.records !== undefined) {
    result[names.records] = envelope.records;
  }
  if (envelope.total !== undefined) {
    result[names.total] = envelope.total;
  }
  if (envelope.pages !== undefined) {
    result[names.pages] = envelope.pages;
  }

  return result;
}
