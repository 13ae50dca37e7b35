import { describe, expect, it } from "vitest";

import {
  DEFAULT_HINT_NAMES,
  DEFAULT_RESERVED_NAMES,
  resolveConfig,
} from "../src/config";
import { ConfigurationError } from "../src/errors";

describe("resolveConfig", () => {
  it("applies defaults", () => {
    const config = resolveConfig({ entityType: "Book" });

    expect(config.entityType).toBe("Book");
    expect(config.names).toEqual(DEFAULT_RESERVED_NAMES);
    expect(config.hintNames).toEqual(DEFAULT_HINT_NAMES);
    expect(config.defaultDistinct).toBe(true);
    expect(config.concurrentCount).toBe(false);
    expect(config.entityKey).toBeUndefined();
    expect(config.hooks).toEqual({});
  });

  it("uses the stock reserved names", () => {
    expect(DEFAULT_RESERVED_NAMES).toEqual({
      page: "page",
      start: "start",
      limit: "limit",
      distinct: "distinct",
      where: "where",
      logical: "logical",
      records: "select",
      total: "total",
      pages: "pages",
    });
  });

  it("merges partial name overrides and trims them", () => {
    const config = resolveConfig({
      entityType: "Book",
      names: { page: " paging ", records: "items" },
    });

    expect(config.names.page).toBe("paging");
    expect(config.names.records).toBe("items");
    expect(config.names.where).toBe("where");
  });

  it("keeps an explicit default distinct mode", () => {
    expect(
      resolveConfig({ entityType: "Book", defaultDistinct: false })
        .defaultDistinct,
    ).toBe(false);
  });

  it("rejects an empty entity type", () => {
    expect(() => resolveConfig({ entityType: "" })).toThrow(ConfigurationError);
  });

  it("rejects a blank reserved name", () => {
    expect(() =>
      resolveConfig({ entityType: "Book", names: { total: "   " } }),
    ).toThrow(/names\.total/);
  });

  it("rejects colliding argument names", () => {
    expect(() =>
      resolveConfig({ entityType: "Book", names: { where: "page" } }),
    ).toThrow(
      "Invalid resolver options: names: Reserved argument names must be distinct",
    );
  });

  it("rejects colliding pagination keys", () => {
    expect(() =>
      resolveConfig({ entityType: "Book", names: { limit: "start" } }),
    ).toThrow(
      "Invalid resolver options: names: Pagination keys must be distinct",
    );
  });

  it("rejects colliding selection names", () => {
    expect(() =>
      resolveConfig({ entityType: "Book", names: { pages: "total" } }),
    ).toThrow(
      "Invalid resolver options: names: Reserved selection names must be distinct",
    );
  });

  it("rejects colliding hint names", () => {
    expect(() =>
      resolveConfig({
        entityType: "Book",
        hintNames: { cacheable: "readOnly" },
      }),
    ).toThrow("Invalid resolver options: hintNames: Hint names must be distinct");
  });
});
