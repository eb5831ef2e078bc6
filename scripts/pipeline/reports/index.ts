/**
 * Writes every report artifact for one aggregated run.
 */

import { existsSync, mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { GroupedSeries } from "../types";
import { renderCsv } from "./csv";
import {
  ALL_STATES_PAGE,
  BATTLEGROUND_PAGE,
  renderHtmlPage,
} from "./html";
import { renderRss } from "./rss";
import { renderText } from "./text";

export interface ReportOptions {
  outputDir: string;
  siteUrl: string;
  battlegroundStates: string[];
  now: Date;
}

/** Allow-listed states, in allow-list order, that have data. */
export function filterGroups(
  series: GroupedSeries,
  allowList: string[],
): GroupedSeries {
  const filtered: GroupedSeries = new Map();
  for (const state of allowList) {
    const records = series.get(state);
    if (records) filtered.set(state, records);
  }
  return filtered;
}

/** Returns the paths written. */
export function writeReports(
  series: GroupedSeries,
  options: ReportOptions,
): string[] {
  const { outputDir, siteUrl, now } = options;
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const battlegrounds = filterGroups(series, options.battlegroundStates);
  const files: Array<[string, string]> = [
    [
      "battleground-state-changes.txt",
      renderText(series, {
        now,
        battlegrounds: options.battlegroundStates,
        siteUrl,
      }),
    ],
    ["battleground-state-changes.csv", renderCsv(series)],
    ["battleground-state-changes.xml", renderRss(series, { now, siteUrl })],
    [
      BATTLEGROUND_PAGE,
      renderHtmlPage(battlegrounds, {
        now,
        otherPageLink: `Data for all 50 states and DC is <a href="${ALL_STATES_PAGE}">also available</a>.`,
      }),
    ],
    [
      ALL_STATES_PAGE,
      renderHtmlPage(series, {
        now,
        otherPageLink: `View <a href="${BATTLEGROUND_PAGE}">battleground states only</a>.`,
      }),
    ],
  ];

  return files.map(([name, content]) => {
    const path = join(outputDir, name);
    writeFileSync(path, content, "utf-8");
    return path;
  });
}
