/**
 * Commit Orchestrator.
 *
 * Commits a written draft and applies the push policy. The caller must hold
 * the repository lock for the whole call.
 *
 * Strict mode compensates a failed push by undoing the commit and deleting
 * the draft's files. Each compensating step is attempted regardless of the
 * others and failures are only logged: this is cleanup on an error path, not
 * a guaranteed rollback.
 */

import { rm } from 'fs/promises';
import { errorMessage, internal } from '../domain/errors';
import { CommitResult, PasteDraft, PushMode } from '../domain/paste';
import { Logger, logger as rootLogger } from '../logger';
import { VersionControl } from './version-control';

export interface CommitOptions {
  pushMode: PushMode;
  remote: string;
  logger?: Logger;
}

export async function commitPaste(
  vcs: VersionControl,
  draft: PasteDraft,
  options: CommitOptions,
): Promise<CommitResult> {
  const log = (options.logger ?? rootLogger).child({ pasteId: draft.id });

  // A failure here leaves the draft files untracked on disk.
  const commit = await vcs.commit([draft.relPath, draft.metaRelPath], draft.subject);

  switch (options.pushMode) {
    case PushMode.Off:
      return { commit, pushed: false };

    case PushMode.BestEffort: {
      const outcome = await vcs.push(options.remote);
      if (outcome.ok) return { commit, pushed: true };
      return { commit, pushed: false, pushError: outcome.error };
    }

    case PushMode.Strict: {
      const outcome = await vcs.push(options.remote);
      if (outcome.ok) return { commit, pushed: true };

      await compensate(vcs, draft, log);
      throw internal(`push failed in strict mode: ${outcome.error}`, {
        remote: options.remote,
        commit,
      });
    }
  }
}

async function compensate(vcs: VersionControl, draft: PasteDraft, log: Logger): Promise<void> {
  const steps: Array<[string, () => Promise<void>]> = [
    ['undo commit', () => vcs.undoLastCommit()],
    ['remove content', () => rm(draft.absPath, { force: true })],
    ['remove metadata', () => rm(draft.metaPath, { force: true })],
    ['reset index', () => vcs.resetIndex()],
  ];
  for (const [step, run] of steps) {
    try {
      await run();
    } catch (err) {
      log.warn('Strict push compensation step failed', { step, error: errorMessage(err) });
    }
  }
}
