/**
 * Selection analysis.
 *
 * Works out which result sections a request asks for, reads and strips the
 * pagination argument, and settles the distinct mode.
 */
import { z } from "zod";

import { type ReservedNames } from "../config";
import { validateArgument } from "../errors/validation";
import {
  findArgument,
  findSelection,
  isArgumentObject,
  removeArgument,
} from "../request/arguments";
import {
  type ArgumentValue,
  type Request,
  type Selection,
} from "../request/types";

// ============================================================
// Types
// ============================================================

/**
 * Pagination window. `explicit` is false when the request carried no
 * pagination argument; such a window is never applied to a query.
 */
export type PageWindow = Readonly<{
  pageNumber: number;
  pageSize: number;
  explicit: boolean;
}>;

export const UNBOUNDED_WINDOW: PageWindow = {
  pageNumber: 1,
  pageSize: Number.POSITIVE_INFINITY,
  explicit: false,
};

export type SelectionAnalysis = Readonly<{
  wantsRecords: boolean;
  wantsTotal: boolean;
  wantsPages: boolean;
  /** The records sub-selection, when requested */
  recordsSelection: Selection | undefined;
  window: PageWindow;
  /** Copy of the request without the pagination argument */
  strippedRequest: Request;
  distinct: boolean;
}>;

// ============================================================
// Argument Parsing
// ============================================================

const positiveInt = z.number().int().min(1);

const windowSchema = z.object({
  start: positiveInt,
  limit: positiveInt,
});

/**
 * Re-keys the pagination value from the configured sub-key names to the
 * schema's `start` and `limit`. Non-object values are left for the schema
 * to reject.
 */
function toWindowInput(
  value: ArgumentValue,
  names: ReservedNames,
): unknown {
  if (!isArgumentObject(value)) {
    return value;
  }
  return {
    start: Object.hasOwn(value, names.start) ? value[names.start] : undefined,
    limit: Object.hasOwn(value, names.limit) ? value[names.limit] : undefined,
  };
}

/**
 * Reads the pagination argument into a window.
 *
 * @throws ArgumentError naming the missing or invalid sub-key
 */
export function parsePageWindow(
  value: ArgumentValue,
  names: ReservedNames,
): PageWindow {
  const parsed = validateArgument(
    windowSchema,
    toWindowInput(value, names),
    names.page,
    new Map([
      ["start", names.start],
      ["limit", names.limit],
    ]),
  );

  return { pageNumber: parsed.start, pageSize: parsed.limit, explicit: true };
}

/**
 * Settles distinct mode: an explicit argument wins over the configured default.
 *
 * @throws ArgumentError when the argument is not a boolean
 */
export function resolveDistinctFlag(
  request: Request,
  names: ReservedNames,
  defaultDistinct: boolean,
): boolean {
  const argument = findArgument(request, names.distinct);
  if (argument === undefined) {
    return defaultDistinct;
  }
  return validateArgument(z.boolean(), argument.value, names.distinct);
}

// ============================================================
// Analysis
// ============================================================

export function analyzeSelection(
  request: Request,
  names: ReservedNames,
  defaultDistinct: boolean,
): SelectionAnalysis {
  const recordsSelection = findSelection(request, names.records);
  const wantsTotal = findSelection(request, names.total) !== undefined;
  const wantsPages = findSelection(request, names.pages) !== undefined;

  const pageArgument = findArgument(request, names.page);
  const window =
    pageArgument === undefined ?
      UNBOUNDED_WINDOW
    : parsePageWindow(pageArgument.value, names);
  const strippedRequest = removeArgument(request, pageArgument);

  return {
    wantsRecords: recordsSelection !== undefined,
    wantsTotal,
    wantsPages,
    recordsSelection,
    window,
    strippedRequest,
    distinct: resolveDistinctFlag(strippedRequest, names, defaultDistinct),
  };
}
