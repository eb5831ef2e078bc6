/**
 * Per-revision record cache.
 *
 * Normalized records for each revision of results.json are stored once in
 * `<cacheDir>/<first two chars of id>/<rest of id>.json` so later runs skip
 * git and the normalizer for history they have already seen. An entry whose
 * schema_version differs from the configured one, or which fails to decode,
 * reads as a miss and is replaced on the next put().
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "fs";
import { dirname, join } from "path";
import { z } from "zod";
import { CacheCorrupt, errorMessage } from "./errors";
import { parseTimestamp } from "./normalizers/results";
import type {
  CacheEntry,
  CacheLookup,
  ResultRecord,
  RevisionId,
  SerializedRecord,
} from "./types";

export interface RevisionCacheOptions {
  cacheDir: string;
  schemaVersion: number;
}

// ---- Entry schemas ----

const envelopeSchema = z.object({
  schema_version: z.number().int(),
  rows: z.unknown(),
});

const rowSchema = z.object({
  timestamp: z.string(),
  groupKey: z.string(),
  groupCode: z.string(),
  weight: z.number().int(),
  entries: z.array(
    z.object({ label: z.string(), count: z.number().int() }),
  ),
  total: z.number().int(),
  expectedTotal: z.number().int(),
  unitsTotal: z.number().int(),
  unitsReporting: z.number().int(),
  subGroups: z.record(z.number()),
});

const REVISION_ID = /^[0-9A-Za-z]{3,}$/;

// ---- Serialization ----

export function serializeRecord(record: ResultRecord): SerializedRecord {
  return { ...record, timestamp: record.timestamp.toISOString() };
}

type Envelope = z.infer<typeof envelopeSchema>;

function decodeEnvelope(text: string, cachePath: string): Envelope {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new CacheCorrupt(`unreadable JSON: ${errorMessage(err)}`, cachePath, {
      cause: err,
    });
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new CacheCorrupt(
      `bad envelope: ${envelope.error.issues[0]?.message ?? "invalid"}`,
      cachePath,
    );
  }
  return envelope.data;
}

function decodeRows(envelope: Envelope, cachePath: string): ResultRecord[] {
  const rows = z.array(rowSchema).safeParse(envelope.rows);
  if (!rows.success) {
    const issue = rows.error.issues[0];
    throw new CacheCorrupt(
      `bad row at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "invalid"}`,
      cachePath,
    );
  }

  try {
    return rows.data.map((row) => ({
      ...row,
      timestamp: parseTimestamp(row.timestamp, "timestamp"),
    }));
  } catch (err) {
    throw new CacheCorrupt(errorMessage(err), cachePath, { cause: err });
  }
}

// ---- Public API ----

export class RevisionCache {
  readonly cacheDir: string;
  readonly schemaVersion: number;

  constructor(options: RevisionCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.schemaVersion = options.schemaVersion;
  }

  pathFor(revision: RevisionId): string {
    if (!REVISION_ID.test(revision)) {
      throw new Error(`Invalid revision identifier: "${revision}"`);
    }
    return join(
      this.cacheDir,
      revision.slice(0, 2),
      `${revision.slice(2)}.json`,
    );
  }

  lookup(revision: RevisionId): CacheLookup {
    const cachePath = this.pathFor(revision);
    if (!existsSync(cachePath)) return { status: "missing" };

    try {
      const text = readFileSync(cachePath, "utf-8");
      const envelope = decodeEnvelope(text, cachePath);
      // Version is checked before rows, so an older row shape reads as stale.
      if (envelope.schema_version !== this.schemaVersion) {
        return { status: "stale", version: envelope.schema_version };
      }
      return {
        status: "hit",
        entry: {
          schema_version: envelope.schema_version,
          rows: decodeRows(envelope, cachePath),
        },
      };
    } catch (err) {
      // CacheCorrupt, or a file that cannot be read at all
      return { status: "corrupt", reason: errorMessage(err) };
    }
  }

  get(revision: RevisionId): CacheEntry | undefined {
    const result = this.lookup(revision);
    return result.status === "hit" ? result.entry : undefined;
  }

  /**
   * Replace the entry for `revision`. The file is written beside its final
   * name and renamed into place, so readers see the old entry or the new
   * one, never a partial file. A failed write removes its temporary file.
   */
  put(revision: RevisionId, records: ResultRecord[]): void {
    const cachePath = this.pathFor(revision);
    const dir = dirname(cachePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const body = JSON.stringify({
      schema_version: this.schemaVersion,
      rows: records.map(serializeRecord),
    });
    const tmpPath = `${cachePath}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, body);
      renameSync(tmpPath, cachePath);
    } catch (err) {
      rmSync(tmpPath, { force: true });
      throw err;
    }
  }
}
