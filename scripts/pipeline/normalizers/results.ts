/**
 * Results normalizer.
 *
 * Flattens one decoded results.json document into ResultRecords: one record
 * per reporting unit per race, candidates kept in source order. Records come
 * out in document order, not time order.
 *
 * Document shape:
 * {
 *   "races": [{
 *     "updated_at": "2020-11-04T10:00:00Z",
 *     "electoral_votes": 6,
 *     "reporting_units": [{
 *       "name": "Nevada", "state_abb": "NV",
 *       "total_votes": 180, "total_expected_vote": 1400000,
 *       "precincts_total": 2000, "precincts_reporting": 1200,
 *       "candidates": [{ "nyt_id": "biden", "votes": { "total": 100 } }]
 *     }]
 *   }]
 * }
 */

import { isJsonList, isJsonMap } from "../document";
import { MalformedDocument } from "../errors";
import type {
  CandidateEntry,
  JsonMap,
  JsonValue,
  ResultRecord,
} from "../types";

// Absent and null fields both take these values.
export const RECORD_DEFAULTS = {
  groupKey: "Unknown",
  groupCode: "Unknown",
  weight: 0,
  total: 0,
  expectedTotal: 0,
  unitsTotal: 0,
  unitsReporting: 0,
  label: "",
} as const;

const ZONED_ISO_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

// ---------- Field readers ----------

function isAbsent(value: JsonValue | undefined): value is null | undefined {
  return value === undefined || value === null;
}

function readString(
  map: JsonMap,
  key: string,
  fallback: string,
  where: string,
): string {
  const value = map[key];
  if (isAbsent(value)) return fallback;
  if (typeof value !== "string") {
    throw new MalformedDocument(`${where}.${key} is not a string`);
  }
  return value;
}

function readInteger(
  map: JsonMap,
  key: string,
  fallback: number | null,
  where: string,
): number {
  const value = map[key];
  if (isAbsent(value)) {
    if (fallback === null) {
      throw new MalformedDocument(`${where}.${key} is missing`);
    }
    return fallback;
  }
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new MalformedDocument(`${where}.${key} is not an integer`);
  }
  return value;
}

function readList(map: JsonMap, key: string, where: string): JsonValue[] {
  const value = map[key];
  if (isAbsent(value)) return [];
  if (!isJsonList(value)) {
    throw new MalformedDocument(`${where}.${key} is not a list`);
  }
  return value;
}

function asMap(value: JsonValue, where: string): JsonMap {
  if (!isJsonMap(value)) {
    throw new MalformedDocument(`${where} is not an object`);
  }
  return value;
}

export function parseTimestamp(value: string, where: string): Date {
  const date = new Date(value);
  if (!ZONED_ISO_TIMESTAMP.test(value) || Number.isNaN(date.getTime())) {
    throw new MalformedDocument(
      `${where} is not a timezone-qualified ISO timestamp: ${value}`,
    );
  }
  return date;
}

// ---------- Record construction ----------

interface RaceContext {
  timestamp: Date;
  weight: number;
}

function readEntries(unit: JsonMap, where: string): CandidateEntry[] {
  return readList(unit, "candidates", where).map((raw, i) => {
    const at = `${where}.candidates[${i}]`;
    const candidate = asMap(raw, at);
    const votes = asMap(candidate.votes ?? null, `${at}.votes`);
    return {
      label: readString(candidate, "nyt_id", RECORD_DEFAULTS.label, at),
      count: readInteger(votes, "total", null, `${at}.votes`),
    };
  });
}

/** Every record field, its source and its default, in one place. */
export function buildRecord(
  race: RaceContext,
  unit: JsonMap,
  where: string,
): ResultRecord {
  return {
    timestamp: race.timestamp,
    groupKey: readString(unit, "name", RECORD_DEFAULTS.groupKey, where),
    groupCode: readString(unit, "state_abb", RECORD_DEFAULTS.groupCode, where),
    weight: race.weight,
    entries: readEntries(unit, where),
    total: readInteger(unit, "total_votes", RECORD_DEFAULTS.total, where),
    expectedTotal: readInteger(
      unit,
      "total_expected_vote",
      RECORD_DEFAULTS.expectedTotal,
      where,
    ),
    unitsTotal: readInteger(
      unit,
      "precincts_total",
      RECORD_DEFAULTS.unitsTotal,
      where,
    ),
    unitsReporting: readInteger(
      unit,
      "precincts_reporting",
      RECORD_DEFAULTS.unitsReporting,
      where,
    ),
    subGroups: {},
  };
}

export function normalizeResults(document: JsonValue): ResultRecord[] {
  const root = asMap(document, "$");
  const records: ResultRecord[] = [];

  readList(root, "races", "$").forEach((rawRace, r) => {
    const where = `$.races[${r}]`;
    const race = asMap(rawRace, where);
    const updatedAt = race.updated_at;
    if (typeof updatedAt !== "string") {
      throw new MalformedDocument(`${where}.updated_at is missing`);
    }
    const context: RaceContext = {
      timestamp: parseTimestamp(updatedAt, `${where}.updated_at`),
      weight: readInteger(race, "electoral_votes", RECORD_DEFAULTS.weight, where),
    };

    readList(race, "reporting_units", where).forEach((rawUnit, u) => {
      const unitWhere = `${where}.reporting_units[${u}]`;
      records.push(buildRecord(context, asMap(rawUnit, unitWhere), unitWhere));
    });
  });

  return records;
}
