/**
 * Run configuration.
 *
 * Positional args: [repo-dir] [output-dir] [cache-dir]
 * Env overrides: RESULTS_FILE, RESULTS_CACHE_DIR, RESULTS_SCHEMA_VERSION,
 * RESULTS_SITE_URL.
 */

import { resolve } from "path";

// Bump whenever the ResultRecord shape or normalizer output changes.
export const SCHEMA_VERSION = 2;

export const BATTLEGROUND_STATES = [
  "Michigan",
  "Arizona",
  "Georgia",
  "North Carolina",
  "Nevada",
  "Pennsylvania",
  "Virginia",
  "Wisconsin",
];

export interface PipelineConfig {
  repoDir: string;
  trackedFile: string;
  cacheDir: string;
  schemaVersion: number;
  outputDir: string;
  siteUrl: string;
  battlegroundStates: string[];
}

function parseVersion(value: string | undefined): number {
  if (value === undefined || value === "") return SCHEMA_VERSION;
  const version = Number(value);
  if (!Number.isInteger(version)) {
    throw new Error(`RESULTS_SCHEMA_VERSION must be an integer, got "${value}"`);
  }
  return version;
}

export function resolveConfig(
  argv: string[],
  env: NodeJS.ProcessEnv,
): PipelineConfig {
  const repoDir = resolve(argv[0] || ".");
  const outputDir = resolve(argv[1] || ".");
  const cacheDir = resolve(
    repoDir,
    argv[2] || env.RESULTS_CACHE_DIR || "_cache",
  );

  return {
    repoDir,
    trackedFile: env.RESULTS_FILE || "results.json",
    cacheDir,
    schemaVersion: parseVersion(env.RESULTS_SCHEMA_VERSION),
    outputDir,
    siteUrl: env.RESULTS_SITE_URL || "https://example.com",
    battlegroundStates: BATTLEGROUND_STATES,
  };
}
