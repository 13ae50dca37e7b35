import { describe, expect, it } from "vitest";

import { DEFAULT_RESERVED_NAMES, resolveConfig } from "../src/config";
import { ArgumentError } from "../src/errors";
import {
  analyzeSelection,
  parsePageWindow,
  resolveDistinctFlag,
  UNBOUNDED_WINDOW,
} from "../src/resolver/selection-analyzer";
import { createRequest } from "./test-utils";

const names = DEFAULT_RESERVED_NAMES;

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("parsePageWindow", () => {
  it("reads start and limit", () => {
    expect(parsePageWindow({ start: 3, limit: 25 }, names)).toEqual({
      pageNumber: 3,
      pageSize: 25,
      explicit: true,
    });
  });

  it("ignores extra keys", () => {
    expect(parsePageWindow({ start: 1, limit: 5, sort: "title" }, names)).toEqual(
      { pageNumber: 1, pageSize: 5, explicit: true },
    );
  });

  it("reads configured key names", () => {
    const custom = resolveConfig({
      entityType: "Book",
      names: { start: "from", limit: "size" },
    }).names;
    expect(parsePageWindow({ from: 2, size: 10 }, custom)).toEqual({
      pageNumber: 2,
      pageSize: 10,
      explicit: true,
    });
  });

  it("reports configured key names in errors", () => {
    const custom = resolveConfig({
      entityType: "Book",
      names: { start: "from", limit: "size" },
    }).names;

    const error = catchError(() =>
      parsePageWindow({ from: 2, limit: 10 }, custom),
    );

    expect(error).toBeInstanceOf(ArgumentError);
    if (!(error instanceof ArgumentError)) return;
    expect(error.details.key).toBe("size");
    expect(error.details.issues).toEqual([
      expect.objectContaining({ path: "size" }),
    ]);
  });

  it("does not read a sub-key from the object prototype", () => {
    const custom = resolveConfig({
      entityType: "Book",
      names: { start: "from", limit: "valueOf" },
    }).names;

    const error = catchError(() => parsePageWindow({ from: 1 }, custom));

    expect(error).toBeInstanceOf(ArgumentError);
    if (!(error instanceof ArgumentError)) return;
    expect(error.details.key).toBe("valueOf");
  });

  it("names the missing limit key", () => {
    const error = catchError(() => parsePageWindow({ start: 1 }, names));
    expect(error).toBeInstanceOf(ArgumentError);
    if (!(error instanceof ArgumentError)) return;
    expect(error.details.argument).toBe("page");
    expect(error.details.key).toBe("limit");
  });

  it("names the missing start key", () => {
    const error = catchError(() => parsePageWindow({ limit: 10 }, names));
    expect(error).toBeInstanceOf(ArgumentError);
    if (!(error instanceof ArgumentError)) return;
    expect(error.details.key).toBe("start");
  });

  it.each([
    ["zero start", { start: 0, limit: 10 }, "start"],
    ["negative limit", { start: 1, limit: -5 }, "limit"],
    ["fractional limit", { start: 1, limit: 2.5 }, "limit"],
    ["string start", { start: "1", limit: 10 }, "start"],
  ])("rejects %s", (_label, value, key) => {
    const error = catchError(() => parsePageWindow(value, names));
    expect(error).toBeInstanceOf(ArgumentError);
    if (!(error instanceof ArgumentError)) return;
    expect(error.details.key).toBe(key);
  });

  it("rejects a non-object value", () => {
    const error = catchError(() => parsePageWindow(5, names));
    expect(error).toBeInstanceOf(ArgumentError);
    if (!(error instanceof ArgumentError)) return;
    expect(error.details.argument).toBe("page");
    expect(error.details.key).toBeUndefined();
  });
});

describe("resolveDistinctFlag", () => {
  it("falls back to the default", () => {
    expect(resolveDistinctFlag(createRequest(), names, true)).toBe(true);
    expect(resolveDistinctFlag(createRequest(), names, false)).toBe(false);
  });

  it("lets an explicit argument win", () => {
    const request = createRequest({
      arguments: [{ name: "distinct", value: false }],
    });
    expect(resolveDistinctFlag(request, names, true)).toBe(false);
  });

  it("rejects a non-boolean argument", () => {
    const request = createRequest({
      arguments: [{ name: "distinct", value: "yes" }],
    });
    expect(() => resolveDistinctFlag(request, names, true)).toThrow(
      ArgumentError,
    );
  });
});

describe("analyzeSelection", () => {
  it("reports the selected sections", () => {
    const analysis = analyzeSelection(
      createRequest({ selections: ["select", "pages"] }),
      names,
      true,
    );

    expect(analysis.wantsRecords).toBe(true);
    expect(analysis.wantsTotal).toBe(false);
    expect(analysis.wantsPages).toBe(true);
    expect(analysis.recordsSelection).toEqual({ name: "select" });
  });

  it("uses the unbounded window without a page argument", () => {
    const request = createRequest({ selections: ["total"] });
    const analysis = analyzeSelection(request, names, true);

    expect(analysis.window).toBe(UNBOUNDED_WINDOW);
    expect(analysis.strippedRequest).toBe(request);
  });

  it("strips the page argument and keeps the rest in order", () => {
    const request = createRequest({
      arguments: [
        { name: "genre", value: "poetry" },
        { name: "page", value: { start: 2, limit: 10 } },
        { name: "where", value: { year: 1990 } },
      ],
      selections: ["select"],
    });
    const analysis = analyzeSelection(request, names, true);

    expect(analysis.window).toEqual({
      pageNumber: 2,
      pageSize: 10,
      explicit: true,
    });
    expect(analysis.strippedRequest.arguments.map((arg) => arg.name)).toEqual([
      "genre",
      "where",
    ]);
    expect(request.arguments).toHaveLength(3);
  });

  it("only matches direct child selections", () => {
    const analysis = analyzeSelection(
      {
        name: "Books",
        arguments: [],
        selections: [
          { name: "meta", selections: [{ name: "total" }, { name: "select" }] },
        ],
      },
      names,
      true,
    );

    expect(analysis.wantsRecords).toBe(false);
    expect(analysis.wantsTotal).toBe(false);
  });

  it("settles distinct from the argument or the default", () => {
    expect(analyzeSelection(createRequest(), names, false).distinct).toBe(false);
    expect(
      analyzeSelection(
        createRequest({ arguments: [{ name: "distinct", value: true }] }),
        names,
        false,
      ).distinct,
    ).toBe(true);
  });

  it("validates the page argument even when only the total is selected", () => {
    const request = createRequest({
      arguments: [{ name: "page", value: { start: 1 } }],
      selections: ["total"],
    });
    expect(() => analyzeSelection(request, names, true)).toThrow(ArgumentError);
  });
});
