/**
 * Shared builders and stand-ins for the pipeline tests.
 */

import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { vi } from "vitest";
import { RevisionReadError } from "../scripts/pipeline/errors";
import type {
  PipelineLogger,
  ResultRecord,
  RevisionHistory,
} from "../scripts/pipeline/types";

// ---------- Documents ----------

export interface UnitFixture {
  name?: string;
  abbrev?: string;
  candidates: Array<[string, number]>;
  total?: number;
  expected?: number;
}

export function resultsDocument(
  races: Array<{ updatedAt: string; electoralVotes?: number; units: UnitFixture[] }>,
): string {
  return JSON.stringify({
    races: races.map((race) => ({
      updated_at: race.updatedAt,
      electoral_votes: race.electoralVotes ?? 6,
      reporting_units: race.units.map((unit) => ({
        name: unit.name ?? "Nevada",
        state_abb: unit.abbrev ?? "NV",
        total_votes:
          unit.total ?? unit.candidates.reduce((sum, [, n]) => sum + n, 0),
        total_expected_vote: unit.expected ?? 1000,
        precincts_total: 200,
        precincts_reporting: 50,
        candidates: unit.candidates.map(([id, total]) => ({
          nyt_id: id,
          votes: { total },
        })),
      })),
    })),
  });
}

export function record(overrides: Partial<ResultRecord> = {}): ResultRecord {
  return {
    timestamp: new Date("2020-11-04T10:00:00Z"),
    groupKey: "Nevada",
    groupCode: "NV",
    weight: 6,
    entries: [
      { label: "X", count: 100 },
      { label: "Y", count: 80 },
    ],
    total: 180,
    expectedTotal: 1000,
    unitsTotal: 200,
    unitsReporting: 50,
    subGroups: {},
    ...overrides,
  };
}

// ---------- Stand-ins ----------

/**
 * In-memory git history. A string value is the file content at that
 * revision; `null` means the file cannot be read there.
 */
export class FakeHistory implements RevisionHistory {
  fetches: string[] = [];

  constructor(private readonly revisions: Array<[string, string | null]>) {}

  listRevisions(): string[] {
    return this.revisions.map(([id]) => id);
  }

  fetch(revision: string, filePath: string): Buffer {
    this.fetches.push(revision);
    const content = this.revisions.find(([id]) => id === revision)?.[1];
    if (content === undefined || content === null) {
      throw new RevisionReadError(
        `path '${filePath}' does not exist in '${revision}'`,
        revision,
        filePath,
      );
    }
    return Buffer.from(content, "utf-8");
  }
}

export function silentLogger(): PipelineLogger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "results-history-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
