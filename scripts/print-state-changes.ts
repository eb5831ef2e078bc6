/**
 * Full run: results.json history -> state change reports.
 *
 * Walks every git revision of the tracked results file, reuses cached
 * per-revision records where possible, and writes the text, CSV, RSS and
 * HTML reports into the output directory.
 *
 * Usage:
 *   tsx scripts/print-state-changes.ts [repo-dir] [output-dir] [cache-dir]
 */

import { SnapshotAggregator } from "./pipeline/aggregate";
import { resolveConfig } from "./pipeline/config";
import { HistoryUnavailable } from "./pipeline/errors";
import { GitHistory } from "./pipeline/git";
import { writeReports } from "./pipeline/reports/index";
import { RevisionCache } from "./pipeline/revision-cache";
import type { AggregateResult, AggregateStats } from "./pipeline/types";

function printSummary(stats: AggregateStats, elapsedMs: number): void {
  const elapsed = (elapsedMs / 1000).toFixed(1);
  console.log(`\n${"=".repeat(60)}`);
  console.log(`  Done in ${elapsed}s`);
  console.log(`  Revisions: ${stats.revisions}`);
  console.log(`  Cached:    ${stats.cacheHits}`);
  console.log(`  Read:      ${stats.fetched}`);
  console.log(`  Skipped:   ${stats.skipped}`);
  console.log(`${"=".repeat(60)}`);

  if (stats.failures.length > 0) {
    console.error(
      `\n\x1b[1m\x1b[31m  SKIPPED REVISIONS (${stats.failures.length}):\x1b[0m`,
    );
    for (const f of stats.failures) {
      console.error(`    \x1b[31m✗\x1b[0m ${f.revision}: ${f.reason}`);
    }
    console.error("");
  }
}

function main(): void {
  const config = resolveConfig(process.argv.slice(2), process.env);
  const startTime = Date.now();

  console.log(`Reading ${config.trackedFile} history in ${config.repoDir}`);
  const aggregator = new SnapshotAggregator({
    history: new GitHistory(config.repoDir),
    cache: new RevisionCache({
      cacheDir: config.cacheDir,
      schemaVersion: config.schemaVersion,
    }),
    trackedFile: config.trackedFile,
  });

  let result: AggregateResult;
  try {
    result = aggregator.aggregate();
  } catch (e) {
    if (e instanceof HistoryUnavailable) {
      console.error(`\x1b[1m\x1b[31m${e.message}\x1b[0m`);
      process.exitCode = 1;
      return;
    }
    throw e;
  }

  const written = writeReports(result.series, {
    outputDir: config.outputDir,
    siteUrl: config.siteUrl,
    battlegroundStates: config.battlegroundStates,
    now: new Date(),
  });
  for (const path of written) {
    console.log(`  wrote ${path}`);
  }

  printSummary(result.stats, Date.now() - startTime);
}

main();
