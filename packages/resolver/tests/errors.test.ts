/**
 * Unit tests for resolver error classes.
 */
import { describe, expect, it } from "vitest";
import { z } from "zod";

import {
  ArgumentError,
  BackendError,
  ConfigurationError,
  getErrorSuggestion,
  isResolverError,
  isSystemError,
  isUserRecoverable,
  PredicateError,
  ResolverError,
} from "../src/errors";
import { validateArgument, validateOptions } from "../src/errors/validation";

describe("ResolverError", () => {
  it("creates error with message, code, and options", () => {
    const error = new ResolverError("test message", "TEST_CODE", {
      category: "user",
    });
    expect(error.message).toBe("test message");
    expect(error.code).toBe("TEST_CODE");
    expect(error.name).toBe("ResolverError");
    expect(error.category).toBe("user");
  });

  it("defaults to empty details", () => {
    const error = new ResolverError("test", "CODE", { category: "user" });
    expect(error.details).toEqual({});
  });

  it("supports error cause chain", () => {
    const cause = new Error("root cause");
    const error = new ResolverError("wrapper", "CODE", {
      category: "system",
      cause,
    });
    expect(error.cause).toBe(cause);
  });

  it("formats user message with suggestion", () => {
    const error = new ResolverError("something went wrong", "CODE", {
      category: "user",
      suggestion: "try again later",
    });
    expect(error.toUserMessage()).toBe(
      "something went wrong\n\nSuggestion: try again later",
    );
  });

  it("formats user message without suggestion", () => {
    const error = new ResolverError("something went wrong", "CODE", {
      category: "user",
    });
    expect(error.toUserMessage()).toBe("something went wrong");
  });

  it("formats log string with code, category, details and cause", () => {
    const error = new ResolverError("broken", "CODE", {
      category: "system",
      details: { entityType: "Book" },
      cause: "socket closed",
    });
    expect(error.toLogString()).toBe(
      [
        "[CODE] broken",
        "  Category: system",
        '  Details: {"entityType":"Book"}',
        "  Cause: socket closed",
      ].join("\n"),
    );
  });
});

describe("ArgumentError", () => {
  it("is a user error naming the argument", () => {
    const error = new ArgumentError("bad page", {
      argument: "page",
      key: "limit",
      issues: [],
    });
    expect(error.code).toBe("ARGUMENT_ERROR");
    expect(error.category).toBe("user");
    expect(error.details.key).toBe("limit");
    expect(error.suggestion).toBe('Check the value of the "page" argument.');
  });
});

describe("PredicateError", () => {
  it("is a user error with a default suggestion", () => {
    const error = new PredicateError("bad filter", {
      entityType: "Book",
      path: ["where", "title"],
      operator: "EQ",
    });
    expect(error.code).toBe("PREDICATE_ERROR");
    expect(error.category).toBe("user");
    expect(error.details.path).toEqual(["where", "title"]);
    expect(error.suggestion).toBeDefined();
  });

  it("keeps an explicit suggestion", () => {
    const error = new PredicateError("bad", {}, { suggestion: "use EQ" });
    expect(error.suggestion).toBe("use EQ");
  });
});

describe("ConfigurationError", () => {
  it("is a user error", () => {
    const error = new ConfigurationError("bad names", { names: ["page"] });
    expect(error.code).toBe("CONFIGURATION_ERROR");
    expect(error.category).toBe("user");
    expect(error.details).toEqual({ names: ["page"] });
  });
});

describe("BackendError", () => {
  it("is a system error carrying the operation", () => {
    const cause = new Error("connection reset");
    const error = new BackendError(
      "Count query for Book failed",
      { operation: "count", entityType: "Book" },
      { cause },
    );
    expect(error.code).toBe("BACKEND_ERROR");
    expect(error.category).toBe("system");
    expect(error.details).toEqual({ operation: "count", entityType: "Book" });
    expect(error.cause).toBe(cause);
  });
});

describe("error guards", () => {
  const userError = new ArgumentError("bad", { argument: "page", issues: [] });
  const systemError = new BackendError("down", {
    operation: "content",
    entityType: "Book",
  });

  it("isResolverError recognizes resolver errors only", () => {
    expect(isResolverError(userError)).toBe(true);
    expect(isResolverError(new Error("plain"))).toBe(false);
    expect(isResolverError("text")).toBe(false);
  });

  it("isUserRecoverable and isSystemError split by category", () => {
    expect(isUserRecoverable(userError)).toBe(true);
    expect(isUserRecoverable(systemError)).toBe(false);
    expect(isSystemError(systemError)).toBe(true);
    expect(isSystemError(userError)).toBe(false);
  });

  it("getErrorSuggestion returns undefined for foreign errors", () => {
    expect(getErrorSuggestion(new Error("plain"))).toBeUndefined();
    expect(getErrorSuggestion(userError)).toBe(
      'Check the value of the "page" argument.',
    );
  });
});

describe("validateArgument", () => {
  const schema = z.object({ start: z.number(), limit: z.number() });

  it("returns the parsed value", () => {
    expect(validateArgument(schema, { start: 1, limit: 2 }, "page")).toEqual({
      start: 1,
      limit: 2,
    });
  });

  it("throws ArgumentError naming the first failing key", () => {
    let caught: unknown;
    try {
      validateArgument(schema, { start: 1 }, "page");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ArgumentError);
    if (!(caught instanceof ArgumentError)) return;
    expect(caught.details.argument).toBe("page");
    expect(caught.details.key).toBe("limit");
    expect(caught.details.issues[0]?.path).toBe("limit");
    expect(caught.message.startsWith('Invalid argument "page.limit": ')).toBe(
      true,
    );
  });

  it("omits the key when the whole value is invalid", () => {
    let caught: unknown;
    try {
      validateArgument(z.boolean(), "yes", "distinct");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ArgumentError);
    if (!(caught instanceof ArgumentError)) return;
    expect(caught.details.key).toBeUndefined();
    expect(caught.message.startsWith('Invalid argument "distinct": ')).toBe(
      true,
    );
  });
});

describe("validateOptions", () => {
  it("throws ConfigurationError listing issues", () => {
    const schema = z.object({ entityType: z.string().min(1) });
    expect(() => validateOptions(schema, { entityType: "" }, "options")).toThrow(
      ConfigurationError,
    );
    expect(() => validateOptions(schema, { entityType: "" }, "options")).toThrow(
      /^Invalid options: entityType: /,
    );
  });
});
