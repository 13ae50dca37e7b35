/**
 * Request model consumed by the resolver.
 *
 * A request is the already-parsed field of a graph query: its name, its
 * argument values (variables resolved) and the names of the sub-fields that
 * were selected. Parsing the query text is the transport layer's job.
 */

/**
 * An argument value: a scalar, a list, or a nested mapping such as a
 * pagination window or a where-filter tree.
 */
export type ArgumentValue =
  | string
  | number
  | boolean
  | null
  | readonly ArgumentValue[]
  | ArgumentObject;

export type ArgumentObject = Readonly<{ [key: string]: ArgumentValue }>;

export type RequestArgument = Readonly<{
  name: string;
  value: ArgumentValue;
}>;

export type Selection = Readonly<{
  name: string;
  arguments?: readonly RequestArgument[];
  selections?: readonly Selection[];
}>;

/**
 * The requested field. Never mutated; derived copies are produced instead.
 */
export type Request = Readonly<{
  name: string;
  arguments: readonly RequestArgument[];
  selections: readonly Selection[];
}>;
