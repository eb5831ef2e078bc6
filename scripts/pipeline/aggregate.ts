/**
 * Snapshot aggregation.
 *
 * Walks every revision of the tracked file, takes its records from the
 * revision cache or from git + the normalizer, then merges everything into
 * one time-ordered series per state.
 */

import { parseDocument } from "./document";
import { MalformedDocument, RevisionReadError } from "./errors";
import { normalizeResults } from "./normalizers/results";
import type { RevisionCache } from "./revision-cache";
import type {
  AggregateResult,
  AggregateStats,
  GroupedSeries,
  PipelineLogger,
  ResultRecord,
  RevisionHistory,
  RevisionId,
} from "./types";

export interface AggregatorOptions {
  history: RevisionHistory;
  cache: RevisionCache;
  trackedFile: string;
  logger?: PipelineLogger;
}

/** Stable sort by timestamp; ties keep insertion order. */
export function sortByTimestamp(records: ResultRecord[]): ResultRecord[] {
  return [...records].sort(
    (a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
  );
}

export function groupByKey(records: ResultRecord[]): GroupedSeries {
  const series: GroupedSeries = new Map();
  for (const record of records) {
    const group = series.get(record.groupKey);
    if (group) group.push(record);
    else series.set(record.groupKey, [record]);
  }
  return series;
}

export class SnapshotAggregator {
  private readonly history: RevisionHistory;
  private readonly cache: RevisionCache;
  private readonly trackedFile: string;
  private readonly logger: PipelineLogger;

  constructor(options: AggregatorOptions) {
    this.history = options.history;
    this.cache = options.cache;
    this.trackedFile = options.trackedFile;
    this.logger = options.logger ?? console;
  }

  /**
   * Read one revision from git and refresh its cache entry. Normalization
   * is a pure function of the file content, so an interrupted run just
   * repeats this next time.
   */
  private extract(revision: RevisionId): ResultRecord[] {
    const raw = this.history.fetch(revision, this.trackedFile);
    const records = normalizeResults(parseDocument(raw));
    this.cache.put(revision, records);
    return records;
  }

  aggregate(): AggregateResult {
    // HistoryUnavailable propagates: there is nothing to report without it
    const revisions = this.history.listRevisions(this.trackedFile);
    this.logger.log(
      `Found ${revisions.length} revisions of ${this.trackedFile}`,
    );

    const stats: AggregateStats = {
      revisions: revisions.length,
      cacheHits: 0,
      fetched: 0,
      skipped: 0,
      failures: [],
    };
    const all: ResultRecord[] = [];

    for (const revision of revisions) {
      const cached = this.cache.lookup(revision);
      if (cached.status === "hit") {
        stats.cacheHits++;
        all.push(...cached.entry.rows);
        continue;
      }
      if (cached.status === "corrupt") {
        this.logger.warn(
          `  ${revision}: discarding corrupt cache entry (${cached.reason})`,
        );
      } else if (cached.status === "stale") {
        this.logger.log(
          `  ${revision}: cache entry is version ${cached.version}, ` +
            `re-reading for version ${this.cache.schemaVersion}`,
        );
      }

      try {
        const records = this.extract(revision);
        stats.fetched++;
        all.push(...records);
      } catch (err) {
        if (
          !(err instanceof RevisionReadError) &&
          !(err instanceof MalformedDocument)
        ) {
          throw err;
        }
        stats.skipped++;
        stats.failures.push({ revision, reason: err.message });
        this.logger.warn(`  ${revision}: skipped (${err.message})`);
      }
    }

    const series = groupByKey(sortByTimestamp(all));
    this.logger.log(
      `  ${stats.cacheHits} cached, ${stats.fetched} read from git, ` +
        `${stats.skipped} skipped; ${all.length} snapshots in ${series.size} groups`,
    );

    return { series, groups: [...series.keys()], stats };
  }
}
