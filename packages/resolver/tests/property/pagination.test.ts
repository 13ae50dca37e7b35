import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { DEFAULT_RESERVED_NAMES } from "../../src/config";
import { ArgumentError } from "../../src/errors";
import { windowBounds } from "../../src/resolver/content-query";
import { createQueryResolver } from "../../src/resolver/query-resolver";
import { computePageCount } from "../../src/resolver/result-assembler";
import { parsePageWindow } from "../../src/resolver/selection-analyzer";
import { createMemoryBackend, createRequest, type MemoryRow } from "../test-utils";

// ============================================================
// Arbitraries
// ============================================================

const pageSizeArb = fc.integer({ min: 1, max: 500 });
const totalArb = fc.integer({ min: 0, max: 100_000 });

function explicitWindow(pageNumber: number, pageSize: number) {
  return { pageNumber, pageSize, explicit: true };
}

// ============================================================
// Property Tests - Page Count
// ============================================================

describe("Page Count Properties", () => {
  it("pages hold every row with less than one page to spare", () => {
    fc.assert(
      fc.property(totalArb, pageSizeArb, (total, pageSize) => {
        const pages = computePageCount(total, explicitWindow(1, pageSize));

        expect(pages * pageSize).toBeGreaterThanOrEqual(total);
        if (total > 0) {
          expect((pages - 1) * pageSize).toBeLessThan(total);
        } else {
          expect(pages).toBe(0);
        }
      }),
    );
  });

  it("does not depend on the page number", () => {
    fc.assert(
      fc.property(
        totalArb,
        pageSizeArb,
        fc.integer({ min: 1, max: 1000 }),
        (total, pageSize, pageNumber) => {
          expect(
            computePageCount(total, explicitWindow(pageNumber, pageSize)),
          ).toBe(computePageCount(total, explicitWindow(1, pageSize)));
        },
      ),
    );
  });
});

// ============================================================
// Property Tests - Window Bounds
// ============================================================

describe("Window Bounds Properties", () => {
  it("consecutive pages tile the row range without overlap", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 1000 }),
        pageSizeArb,
        (pageNumber, pageSize) => {
          const current = windowBounds(explicitWindow(pageNumber, pageSize));
          const next = windowBounds(explicitWindow(pageNumber + 1, pageSize));

          expect(current?.limit).toBe(pageSize);
          expect(next?.offset).toBe((current?.offset ?? 0) + pageSize);
        },
      ),
    );
  });

  it("rejects every non-positive page key", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -1000, max: 0 }),
        pageSizeArb,
        (invalid, valid) => {
          expect(() =>
            parsePageWindow(
              { start: invalid, limit: valid },
              DEFAULT_RESERVED_NAMES,
            ),
          ).toThrow(ArgumentError);
          expect(() =>
            parsePageWindow(
              { start: valid, limit: invalid },
              DEFAULT_RESERVED_NAMES,
            ),
          ).toThrow(ArgumentError);
        },
      ),
    );
  });
});

// ============================================================
// Property Tests - Resolution
// ============================================================

describe("Resolution Properties", () => {
  const resolver = createQueryResolver<MemoryRow>({ entityType: "Book" });

  it("walking every page returns each row exactly once", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 0, max: 40 }),
        fc.integer({ min: 1, max: 12 }),
        async (rowCount, pageSize) => {
          const rows = Array.from({ length: rowCount }, (_, index) => ({
            id: index + 1,
          }));
          const backend = createMemoryBackend(rows);

          const first = await resolver.resolve(
            createRequest({
              arguments: [{ name: "page", value: { start: 1, limit: pageSize } }],
              selections: ["select", "total", "pages"],
            }),
            backend,
          );
          const pages = first.pages ?? 0;
          const seen: MemoryRow[] = [...(first.records ?? [])];

          for (let page = 2; page <= pages; page++) {
            const next = await resolver.resolve(
              createRequest({
                arguments: [
                  { name: "page", value: { start: page, limit: pageSize } },
                ],
                selections: ["select"],
              }),
              backend,
            );
            seen.push(...(next.records ?? []));
          }

          expect(first.total).toBe(rowCount);
          expect(seen).toEqual(rows);
        },
      ),
      { numRuns: 50 },
    );
  });
});
