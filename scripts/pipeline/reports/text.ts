/**
 * Plain-text report: a header block, then one column-aligned table of
 * snapshot summaries per state.
 */

import type { GroupedSeries } from "../types";
import {
  formatCount,
  formatTimestamp,
  sortedGroups,
  summarizeRecord,
  type SnapshotSummary,
} from "./summary";

/**
 * Left-aligned columns separated by two spaces, framed by dash rules.
 */
export function formatTable(rows: string[][]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  const rule = widths.map((w) => "-".repeat(w)).join("  ");
  const lines = rows.map((row) =>
    row
      .map((cell, i) => cell.padEnd(widths[i] ?? 0))
      .join("  ")
      .trimEnd(),
  );
  return [rule, ...lines, rule].join("\n");
}

export function summaryRow(summary: SnapshotSummary): string[] {
  return [
    formatTimestamp(summary.timestamp),
    `${summary.leader} leading by ${formatCount(summary.margin)}`,
    `Votes remaining (est.): ${formatCount(summary.votesRemaining)}`,
    `Change: ${formatCount(summary.total)}`,
    `Precincts reporting: ${summary.unitsReporting}`,
    `Hurdle for trailing candidate: ${summary.hurdle}`,
    `Trend: ${summary.trend}`,
  ];
}

export interface TextReportOptions {
  now: Date;
  battlegrounds: string[];
  siteUrl: string;
}

export function renderText(
  series: GroupedSeries,
  options: TextReportOptions,
): string {
  const sections = [
    formatTable([
      ["Last updated:", `${formatTimestamp(options.now)} UTC`],
      ["Latest batch received:", `(${options.battlegrounds.join(", ")})`],
      ["Web version:", options.siteUrl],
    ]),
  ];

  for (const state of sortedGroups(series)) {
    const rows = (series.get(state) ?? []).map((record) =>
      summaryRow(summarizeRecord(record)),
    );
    sections.push(`\n${state} - Total Votes:\n${formatTable(rows)}`);
  }

  return sections.join("\n") + "\n";
}
