/**
 * Version-control port.
 *
 * The orchestrator and the metadata reader only talk to this interface, so
 * the git subprocess backend can be replaced by an embedded store without
 * touching them. Mutating operations must be called with the repository lock
 * held; implementations never lock on their own.
 */

export type PushOutcome =
  | { ok: true }
  | { ok: false; error: string };

export interface VersionControl {
  /** True when the working directory is inside a repository. */
  isRepository(): Promise<boolean>;
  /** Stage exactly `paths`, commit with `subject`, return the 12-char short id. */
  commit(paths: string[], subject: string): Promise<string>;
  /** Publish HEAD to `remote`. Failures are reported, not thrown. */
  push(remote: string): Promise<PushOutcome>;
  /** Short id of the most recent commit touching `path`, or '' if none. */
  lastCommitFor(path: string): Promise<string>;
  /** Move HEAD back one commit, keeping the index (soft reset). */
  undoLastCommit(): Promise<void>;
  /** Unstage everything. */
  resetIndex(): Promise<void>;
}

export const SHORT_COMMIT_LEN = 12;
