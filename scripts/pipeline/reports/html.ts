/**
 * HTML report pages: one table per state, newest snapshot last.
 */

import type { GroupedSeries } from "../types";
import {
  escapeMarkup,
  formatCount,
  formatTimestamp,
  sortedGroups,
  summarizeRecord,
} from "./summary";

export const BATTLEGROUND_PAGE = "battleground-state-changes.html";
export const ALL_STATES_PAGE = "all-state-changes.html";

const COLUMNS = [
  "Timestamp",
  "Leading Candidate",
  "Vote Margin",
  "Votes Remaining (est.)",
  "Change",
  "Batch Breakdown",
  "Batch Trend",
  "Hurdle",
];

/** 'Alaska (3)' -> 'alaska', 'North Carolina' -> 'north-carolina' */
export function stateSlug(state: string): string {
  return state.split("(")[0].trim().replace(/ /g, "-").toLowerCase();
}

function cell(value: string): string {
  return `<td>${escapeMarkup(value)}</td>`;
}

export function renderStateTables(series: GroupedSeries): string[] {
  const html: string[] = [];

  for (const state of sortedGroups(series)) {
    const records = series.get(state) ?? [];
    if (records.length === 0) continue;

    html.push(
      `<div class='table-responsive'><table id='${escapeMarkup(stateSlug(state))}' class='table table-bordered'>`,
      `<thead class="thead-light">`,
      `<tr><th colspan="${COLUMNS.length}" style="text-align:left;">` +
        `<span>${escapeMarkup(state)}</span> - Electoral Votes: ${records[0].weight}</th></tr>`,
      `<tr>${COLUMNS.map((c) => `<th>${escapeMarkup(c)}</th>`).join("")}</tr>`,
      `</thead>`,
    );

    for (const record of records) {
      const s = summarizeRecord(record);
      html.push(
        "<tr>" +
          [
            formatTimestamp(s.timestamp, true),
            s.leader,
            formatCount(s.margin),
            formatCount(s.votesRemaining),
            formatCount(s.total),
            s.unitsReporting,
            s.trend,
            s.hurdle,
          ]
            .map(cell)
            .join("") +
          "</tr>",
      );
    }
    html.push("</table></div><hr>");
  }

  return html;
}

export interface HtmlPageOptions {
  now: Date;
  /** Pre-built HTML linking to the other page. */
  otherPageLink: string;
}

export function renderHtmlPage(
  series: GroupedSeries,
  options: HtmlPageOptions,
): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Election Results</title>
  <link rel="stylesheet" href="https://stackpath.bootstrapcdn.com/bootstrap/4.5.2/css/bootstrap.min.css">
</head>
<body>
  <div class="container">
    <h1>Election Results Summary</h1>
    <p>Last updated: ${formatTimestamp(options.now)} UTC</p>
    <p>${options.otherPageLink}</p>
    <div>
${renderStateTables(series).join("\n")}
    </div>
  </div>
</body>
</html>
`;
}
