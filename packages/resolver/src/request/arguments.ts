import {
  type ArgumentObject,
  type ArgumentValue,
  type Request,
  type RequestArgument,
  type Selection,
} from "./types";

export function isArgumentObject(
  value: ArgumentValue | undefined,
): value is ArgumentObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isArgumentList(
  value: ArgumentValue | undefined,
): value is readonly ArgumentValue[] {
  return Array.isArray(value);
}

/**
 * Finds the first argument with the given name.
 */
export function findArgument(
  request: Request,
  name: string,
): RequestArgument | undefined {
  return request.arguments.find((argument) => argument.name === name);
}

/**
 * Returns a copy of the request without the given argument.
 * The request is returned as-is when the argument is absent.
 */
export function removeArgument(
  request: Request,
  argument: RequestArgument | undefined,
): Request {
  if (argument === undefined) {
    return request;
  }

  return {
    ...request,
    arguments: request.arguments.filter((it) => it !== argument),
  };
}

/**
 * Finds a direct child selection by name. Nested selections are not searched.
 */
export function findSelection(
  request: Request,
  name: string,
): Selection | undefined {
  return request.selections.find((selection) => selection.name === name);
}
