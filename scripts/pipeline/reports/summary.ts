/**
 * Per-snapshot summary shared by the text, RSS and HTML reports.
 */

import type { CandidateEntry, GroupedSeries, ResultRecord } from "../types";

export interface SnapshotSummary {
  timestamp: Date;
  leader: string;
  runnerUp: string;
  margin: number;
  votesRemaining: number | "Unknown";
  total: number;
  unitsReporting: string;
  // Placeholders until there is a hurdle/trend model
  hurdle: "Unknown";
  trend: "n/a";
}

export function rankEntries(entries: CandidateEntry[]): CandidateEntry[] {
  return [...entries].sort((a, b) => b.count - a.count);
}

export function summarizeRecord(record: ResultRecord): SnapshotSummary {
  const ranked = rankEntries(record.entries);
  const leading: CandidateEntry | undefined = ranked[0];
  const trailing: CandidateEntry | undefined = ranked[1];

  return {
    timestamp: record.timestamp,
    leader: leading?.label ?? "N/A",
    runnerUp: trailing?.label ?? "N/A",
    margin: leading && trailing ? leading.count - trailing.count : 0,
    votesRemaining:
      record.expectedTotal > 0
        ? record.expectedTotal - record.total
        : "Unknown",
    total: record.total,
    unitsReporting:
      record.unitsTotal > 0
        ? formatPercent(record.unitsReporting / record.unitsTotal)
        : "N/A",
    hurdle: "Unknown",
    trend: "n/a",
  };
}

// ---------- Formatting ----------

export function formatCount(value: number | string): string {
  return typeof value === "number" ? value.toLocaleString("en-US") : value;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

/** "YYYY-MM-DD HH:MM" (or with ":SS") in UTC. */
export function formatTimestamp(date: Date, withSeconds = false): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, withSeconds ? 19 : 16)}`;
}

export function sortedGroups(series: GroupedSeries): string[] {
  return [...series.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function escapeMarkup(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
