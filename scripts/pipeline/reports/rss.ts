/**
 * RSS 2.0 feed with one item per state: the leader and vote total of its
 * latest snapshot.
 */

import type { GroupedSeries } from "../types";
import { escapeMarkup, formatCount, summarizeRecord } from "./summary";

export interface RssOptions {
  now: Date;
  siteUrl: string;
}

export function renderRss(series: GroupedSeries, options: RssOptions): string {
  const lines = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<rss version="2.0">`,
    `<channel>`,
    `  <title>Election Results Feed</title>`,
    `  <link>${escapeMarkup(options.siteUrl)}</link>`,
    `  <description>Latest results</description>`,
    `  <lastBuildDate>${options.now.toUTCString()}</lastBuildDate>`,
  ];

  for (const [state, records] of series) {
    const latest = records[records.length - 1];
    if (!latest) continue;
    const summary = summarizeRecord(latest);
    const epochSeconds = Math.floor(latest.timestamp.getTime() / 1000);
    lines.push(
      `  <item>`,
      `    <description>${escapeMarkup(
        `${state}: ${summary.leader} +${formatCount(summary.total)}`,
      )}</description>`,
      `    <pubDate>${latest.timestamp.toUTCString()}</pubDate>`,
      `    <guid isPermaLink="false">${escapeMarkup(
        `${state}@${epochSeconds}`,
      )}</guid>`,
      `  </item>`,
    );
  }

  lines.push(`</channel>`, `</rss>`);
  return lines.join("\n") + "\n";
}
