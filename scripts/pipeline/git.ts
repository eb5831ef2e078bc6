/**
 * Git access for the tracked results file.
 *
 * Thin synchronous wrappers over `git log` and `git show`. Every call blocks
 * until git exits; a hung git blocks the pipeline.
 */

import { execFileSync } from "child_process";
import { HistoryUnavailable, RevisionReadError, errorMessage } from "./errors";
import type { RevisionHistory, RevisionId } from "./types";

// results.json snapshots can run to tens of megabytes
const MAX_BUFFER = 512 * 1024 * 1024;

export type GitRunner = (args: string[], cwd: string) => Buffer;

export const runGit: GitRunner = (args, cwd) =>
  execFileSync("git", args, {
    cwd,
    maxBuffer: MAX_BUFFER,
    stdio: ["ignore", "pipe", "pipe"],
  });

function describeFailure(err: unknown): string {
  if (err instanceof Error && "stderr" in err) {
    const stderr = err.stderr;
    if (Buffer.isBuffer(stderr) && stderr.length > 0) {
      return stderr.toString("utf-8").trim();
    }
  }
  return errorMessage(err);
}

export class GitHistory implements RevisionHistory {
  constructor(
    private readonly repoDir: string,
    private readonly run: GitRunner = runGit,
  ) {}

  /** Commits that touched `filePath`, oldest first. */
  listRevisions(filePath: string): RevisionId[] {
    let output: Buffer;
    try {
      output = this.run(
        ["log", "--reverse", "--format=%H", "--", filePath],
        this.repoDir,
      );
    } catch (err) {
      throw new HistoryUnavailable(
        `Cannot list revisions of ${filePath}: ${describeFailure(err)}`,
        filePath,
        { cause: err },
      );
    }

    const revisions = output
      .toString("utf-8")
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);

    if (revisions.length === 0) {
      throw new HistoryUnavailable(
        `${filePath} has no history in ${this.repoDir}`,
        filePath,
      );
    }
    return revisions;
  }

  fetch(revision: RevisionId, filePath: string): Buffer {
    try {
      return this.run(["show", `${revision}:${filePath}`], this.repoDir);
    } catch (err) {
      throw new RevisionReadError(
        `Cannot read ${filePath} at ${revision}: ${describeFailure(err)}`,
        revision,
        filePath,
        { cause: err },
      );
    }
  }
}
