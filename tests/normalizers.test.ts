/**
 * Tests for document decoding and the results normalizer.
 */

import { describe, test, expect } from "vitest";
import { parseDocument } from "../scripts/pipeline/document";
import { MalformedDocument } from "../scripts/pipeline/errors";
import { normalizeResults } from "../scripts/pipeline/normalizers/results";
import type { JsonValue } from "../scripts/pipeline/types";
import { resultsDocument } from "./helpers";

function normalize(doc: unknown) {
  return normalizeResults(parseDocument(JSON.stringify(doc)));
}

// ---------- Document decoding ----------

describe("parseDocument", () => {
  test("decodes bytes into a JSON tree", () => {
    const doc: JsonValue = parseDocument(
      Buffer.from('{"a":[1,null,"x"],"b":{"c":true}}'),
    );
    expect(doc).toEqual({ a: [1, null, "x"], b: { c: true } });
  });

  test("a __proto__ key stays an ordinary field", () => {
    const doc = parseDocument('{"__proto__":{"polluted":1},"a":2}');
    expect(Object.getPrototypeOf(doc)).toBe(Object.prototype);
    expect(Object.keys(doc ?? {})).toEqual(["__proto__", "a"]);
    expect(Object.getOwnPropertyDescriptor(doc, "__proto__")?.value).toEqual({
      polluted: 1,
    });
  });

  test("invalid JSON is a malformed document", () => {
    expect(() => parseDocument(Buffer.from('{"races": ['))).toThrow(
      MalformedDocument,
    );
  });
});

// ---------- Results normalizer ----------

describe("results normalizer", () => {
  test("one record per reporting unit with every field copied", () => {
    const records = normalizeResults(
      parseDocument(
        resultsDocument([
          {
            updatedAt: "2020-11-04T10:00:00Z",
            units: [{ candidates: [["X", 100], ["Y", 80]] }],
          },
        ]),
      ),
    );
    expect(records).toEqual([
      {
        timestamp: new Date("2020-11-04T10:00:00.000Z"),
        groupKey: "Nevada",
        groupCode: "NV",
        weight: 6,
        entries: [
          { label: "X", count: 100 },
          { label: "Y", count: 80 },
        ],
        total: 180,
        expectedTotal: 1000,
        unitsTotal: 200,
        unitsReporting: 50,
        subGroups: {},
      },
    ]);
  });

  test("candidate order is kept as in the source", () => {
    const [r] = normalize({
      races: [
        {
          updated_at: "2020-11-04T10:00:00Z",
          reporting_units: [
            {
              name: "Ohio",
              candidates: [
                { nyt_id: "low", votes: { total: 5 } },
                { nyt_id: "high", votes: { total: 500 } },
              ],
            },
          ],
        },
      ],
    });
    expect(r.entries.map((e) => e.label)).toEqual(["low", "high"]);
  });

  test("missing and null fields take their defaults", () => {
    const records = normalize({
      races: [
        {
          updated_at: "2020-11-04T10:00:00Z",
          reporting_units: [
            {},
            { name: null, total_votes: null, candidates: [{ votes: { total: 3 } }] },
          ],
        },
      ],
    });
    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      timestamp: new Date("2020-11-04T10:00:00Z"),
      groupKey: "Unknown",
      groupCode: "Unknown",
      weight: 0,
      entries: [],
      total: 0,
      expectedTotal: 0,
      unitsTotal: 0,
      unitsReporting: 0,
      subGroups: {},
    });
    expect(records[1].groupKey).toBe("Unknown");
    expect(records[1].total).toBe(0);
    expect(records[1].entries).toEqual([{ label: "", count: 3 }]);
  });

  test("documents without races or units produce no records", () => {
    expect(normalize({})).toEqual([]);
    expect(normalize({ races: [] })).toEqual([]);
    expect(
      normalize({ races: [{ updated_at: "2020-11-04T10:00:00Z" }] }),
    ).toEqual([]);
  });

  test("a unit repeated across races is not deduplicated", () => {
    const records = normalizeResults(
      parseDocument(
        resultsDocument([
          { updatedAt: "2020-11-04T10:00:00Z", units: [{ candidates: [["X", 1]] }] },
          { updatedAt: "2020-11-04T09:00:00Z", units: [{ candidates: [["X", 2]] }] },
        ]),
      ),
    );
    expect(records.map((r) => r.groupKey)).toEqual(["Nevada", "Nevada"]);
    // document order, not time order
    expect(records.map((r) => r.total)).toEqual([1, 2]);
  });

  test("offset timestamps are read as instants", () => {
    const [r] = normalize({
      races: [
        {
          updated_at: "2020-11-04T05:00:00-05:00",
          reporting_units: [{ name: "Ohio" }],
        },
      ],
    });
    expect(r.timestamp.toISOString()).toBe("2020-11-04T10:00:00.000Z");
  });

  test("sub-millisecond digits are dropped", () => {
    const records = normalize({
      races: [
        {
          updated_at: "2020-11-04T10:00:00.123456Z",
          reporting_units: [{ name: "Ohio" }],
        },
        {
          updated_at: "2020-11-04T10:00:00.123999Z",
          reporting_units: [{ name: "Ohio" }],
        },
      ],
    });
    expect(records.map((r) => r.timestamp.toISOString())).toEqual([
      "2020-11-04T10:00:00.123Z",
      "2020-11-04T10:00:00.123Z",
    ]);
  });

  test("race without updated_at is malformed", () => {
    expect(() => normalize({ races: [{ reporting_units: [] }] })).toThrow(
      "$.races[0].updated_at is missing",
    );
  });

  test("timestamp without a zone is malformed", () => {
    expect(() =>
      normalize({ races: [{ updated_at: "2020-11-04T10:00:00" }] }),
    ).toThrow(MalformedDocument);
  });

  test("wrongly typed fields are malformed", () => {
    expect(() =>
      normalize({
        races: [
          {
            updated_at: "2020-11-04T10:00:00Z",
            reporting_units: [{ total_votes: "12" }],
          },
        ],
      }),
    ).toThrow("$.races[0].reporting_units[0].total_votes is not an integer");
    expect(() => normalize({ races: {} })).toThrow("$.races is not a list");
    expect(() => normalize([])).toThrow("$ is not an object");
  });

  test("candidate without a vote total is malformed", () => {
    expect(() =>
      normalize({
        races: [
          {
            updated_at: "2020-11-04T10:00:00Z",
            reporting_units: [{ candidates: [{ nyt_id: "X" }] }],
          },
        ],
      }),
    ).toThrow(
      "$.races[0].reporting_units[0].candidates[0].votes is not an object",
    );
  });
});
