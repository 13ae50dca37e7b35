import { type ReservedNames } from "../config";
import { type RequestArgument } from "../request/types";

/**
 * How an argument takes part in query building.
 *
 * - `logical`: logical-grouping control argument, handled structurally
 * - `distinct`: distinct-mode control argument, read by selection analysis
 * - `where`: where-filter tree, compiled by the backend's filter compiler
 * - `field`: any other argument, compiled as a field match
 */
export type ArgumentKind =
  | Readonly<{ kind: "logical"; argument: RequestArgument }>
  | Readonly<{ kind: "distinct"; argument: RequestArgument }>
  | Readonly<{ kind: "where"; argument: RequestArgument }>
  | Readonly<{ kind: "field"; argument: RequestArgument }>;

/**
 * Classifies an argument by name against the reserved names.
 *
 * The pagination argument is not classified: it is stripped from the
 * request before any argument reaches here.
 */
export function classifyArgument(
  argument: RequestArgument,
  names: ReservedNames,
): ArgumentKind {
  switch (argument.name) {
    case names.logical: {
      return { kind: "logical", argument };
    }
    case names.distinct: {
      return { kind: "distinct", argument };
    }
    case names.where: {
      return { kind: "where", argument };
    }
    default: {
      return { kind: "field", argument };
    }
  }
}
