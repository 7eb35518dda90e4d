/**
 * Envelope helpers and the bulk tally.
 */
import { describe, test, expect } from "vitest";
import { z } from "zod";

import {
  BulkTally,
  aggregateSuccess,
  bulkFailure,
  chunk,
  entityFailure,
  errorDetails,
} from "../src/core/envelope.js";

describe("errorDetails", () => {
  test("zod issues are listed with their paths", () => {
    const result = z.object({ age: z.number(), name: z.string() }).safeParse({ age: "x" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(errorDetails(result.error)).toEqual([
        "age: Expected number, received string",
        "name: Required",
      ]);
    }
  });

  test("plain errors and other values", () => {
    expect(errorDetails(new Error("boom"))).toEqual(["boom"]);
    expect(errorDetails("odd")).toEqual(["odd"]);
  });
});

describe("envelopes", () => {
  test("entity failures name the action", () => {
    expect(entityFailure("get class", new Error("timeout"))).toEqual({
      success: false,
      message: "Failed to get class: timeout",
      errors: ["timeout"],
    });
  });

  test("bulk failures count every item as failed", () => {
    expect(bulkFailure("Bulk operation failed", 4, new Error("down"))).toEqual({
      success: false,
      message: "Bulk operation failed: down",
      totalProcessed: 4,
      successful: 0,
      failed: 4,
      errors: ["down"],
    });
  });

  test("aggregate success counts the rows", () => {
    const response = aggregateSuccess("ok", [{ a: 1 }, { a: 2 }], {
      queryType: "students",
      backend: "mongodb",
    });
    expect(response.count).toBe(2);
    expect(response.data?.results).toHaveLength(2);
  });
});

describe("BulkTally", () => {
  test("success means nothing failed", () => {
    const tally = new BulkTally(3);
    tally.recordAll([{ ok: true }, { ok: false, error: "bad" }, { ok: true }]);
    expect(tally.toResponse("done")).toEqual({
      success: false,
      message: "done",
      totalProcessed: 3,
      successful: 2,
      failed: 1,
      errors: ["bad"],
    });
  });

  test("an empty run succeeds", () => {
    expect(new BulkTally(0).toResponse("done")).toEqual({
      success: true,
      message: "done",
      totalProcessed: 0,
      successful: 0,
      failed: 0,
    });
  });
});

describe("chunk", () => {
  test("splits into batches of at most size", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });
});
