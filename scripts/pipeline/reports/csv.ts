/**
 * CSV export: one line per snapshot, prefixed with its state.
 */

import type { GroupedSeries, ResultRecord } from "../types";

export const CSV_COLUMNS = [
  "state",
  "timestamp",
  "group_key",
  "group_code",
  "weight",
  "entries",
  "total",
  "expected_total",
  "units_total",
  "units_reporting",
  "sub_groups",
] as const;

/**
 * Quote a CSV field per RFC 4180.
 * Fields containing commas, double quotes, or newlines are wrapped
 * in double quotes. Internal double quotes are escaped by doubling.
 */
export function csvQuote(value: string): string {
  if (
    value.includes(",") ||
    value.includes('"') ||
    value.includes("\n") ||
    value.includes("\r")
  ) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function csvFields(state: string, record: ResultRecord): string[] {
  return [
    state,
    record.timestamp.toISOString(),
    record.groupKey,
    record.groupCode,
    String(record.weight),
    JSON.stringify(record.entries),
    String(record.total),
    String(record.expectedTotal),
    String(record.unitsTotal),
    String(record.unitsReporting),
    JSON.stringify(record.subGroups),
  ];
}

export function renderCsv(series: GroupedSeries): string {
  const lines: string[] = [CSV_COLUMNS.join(",")];
  for (const [state, records] of series) {
    for (const record of records) {
      lines.push(csvFields(state, record).map(csvQuote).join(","));
    }
  }
  return lines.join("\n") + "\n";
}
