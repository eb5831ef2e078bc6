/**
 * Core types for the results history pipeline.
 *
 * A revision of results.json is decoded into a JsonValue tree, normalized
 * into ResultRecords, cached per revision, and finally grouped by state.
 */

// ---------- Revision types ----------

/** Git commit hash. Ordered by history, never by value. */
export type RevisionId = string;

// ---------- Decoded document (pre-normalization) ----------

export type JsonScalar = string | number | boolean | null;

export interface JsonMap {
  [key: string]: JsonValue;
}

export type JsonValue = JsonScalar | JsonValue[] | JsonMap;

// ---------- Normalized records ----------

export interface CandidateEntry {
  label: string;
  count: number;
}

export interface ResultRecord {
  timestamp: Date;
  groupKey: string;
  groupCode: string;
  weight: number;
  /** Source order; sort a copy when a leader is needed. */
  entries: CandidateEntry[];
  total: number;
  expectedTotal: number;
  unitsTotal: number;
  unitsReporting: number;
  subGroups: Record<string, number>;
}

// ---------- Cache types ----------

export type SerializedRecord = Omit<ResultRecord, "timestamp"> & {
  timestamp: string;
};

export interface CacheEntry {
  schema_version: number;
  rows: ResultRecord[];
}

export type CacheLookup =
  | { status: "hit"; entry: CacheEntry }
  | { status: "missing" }
  | { status: "corrupt"; reason: string }
  | { status: "stale"; version: number };

// ---------- Aggregated output ----------

export type GroupedSeries = Map<string, ResultRecord[]>;

export interface RevisionFailure {
  revision: RevisionId;
  reason: string;
}

export interface AggregateStats {
  revisions: number;
  cacheHits: number;
  fetched: number;
  skipped: number;
  failures: RevisionFailure[];
}

export interface AggregateResult {
  series: GroupedSeries;
  groups: string[];
  stats: AggregateStats;
}

// ---------- Collaborator types ----------

export interface RevisionHistory {
  listRevisions(filePath: string): RevisionId[];
  fetch(revision: RevisionId, filePath: string): Buffer;
}

export type PipelineLogger = Pick<Console, "log" | "warn" | "error">;
