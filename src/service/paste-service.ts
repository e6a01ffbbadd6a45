/**
 * Paste Service: the write and read paths used by the HTTP layer.
 *
 * Creates run one at a time: an in-process mutex queues concurrent requests,
 * then the repository lock file is taken so a second process writing to the
 * same storage root fails fast with Conflict instead of interleaving.
 * Idempotency lookups and records happen inside the lock.
 */

import { AppPaths } from '../config';
import { CreateOutcome } from '../domain/idempotency';
import {
  errorMessage,
  idempotencyMismatch,
  isPasteError,
  serviceUnavailable,
  tooLarge,
} from '../domain/errors';
import { contentHash, requestFingerprint } from '../domain/naming';
import {
  CreatePasteInput,
  createResponseFor,
  PasteMetadata,
  PushMode,
  RecentItem,
  toRecentItem,
} from '../domain/paste';
import { Logger, logger as rootLogger } from '../logger';
import { AsyncMutex } from '../shared/async-mutex';
import { commitPaste } from '../storage/commit-orchestrator';
import { buildDraft } from '../storage/draft-builder';
import { IdempotencyLedger } from '../storage/idempotency-ledger';
import { MetadataReader } from '../storage/metadata-reader';
import { acquireLock, withLock } from '../storage/repository-lock';
import { VersionControl } from '../storage/version-control';

export const DEFAULT_RECENT_LIMIT = 50;
export const MAX_RECENT_LIMIT = 500;

export interface PasteServiceOptions {
  paths: AppPaths;
  vcs: VersionControl;
  pushMode: PushMode;
  remote: string;
  maxBytes: number;
  logger?: Logger;
  /** Clock for draft timestamps. */
  now?: () => Date;
}

export class PasteService {
  readonly reader: MetadataReader;
  private readonly ledger: IdempotencyLedger;
  private readonly writes = new AsyncMutex();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: PasteServiceOptions) {
    this.log = (options.logger ?? rootLogger).child({ module: 'paste-service' });
    this.reader = new MetadataReader(options.paths.repo, options.vcs, this.log);
    this.ledger = new IdempotencyLedger(options.paths.idempotency);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Store a paste. With an idempotency key, a repeat of the same request
   * returns the first response without committing again, and a different
   * request under the same key fails with Conflict.
   */
  async create(input: CreatePasteInput, idempotencyKey?: string): Promise<CreateOutcome> {
    const { paths, vcs, pushMode, remote, maxBytes } = this.options;
    if (input.bytes.length > maxBytes) throw tooLarge(input.bytes.length, maxBytes);

    const fingerprint = idempotencyKey === undefined
      ? undefined
      : requestFingerprint({
          name: input.name,
          tag: input.tag,
          contentType: input.contentType,
          sha256: contentHash(input.bytes),
        });

    return this.writes.runExclusive(() =>
      withLock(paths.gitLock, async (): Promise<CreateOutcome> => {
        if (idempotencyKey !== undefined && fingerprint !== undefined) {
          const record = await this.ledger.read(idempotencyKey);
          if (record) {
            if (record.request_fingerprint !== fingerprint) {
              throw idempotencyMismatch();
            }
            return { status: 'replayed', response: record.response };
          }
        }

        const draft = await buildDraft(paths.repo, input, this.now());
        const result = await commitPaste(vcs, draft, { pushMode, remote, logger: this.log });
        if (result.pushError !== undefined) {
          this.log.warn('Best-effort push failed', { pasteId: draft.id, remote, error: result.pushError });
        }

        const response = createResponseFor(draft.id, draft.relPath, result.commit);
        if (idempotencyKey !== undefined && fingerprint !== undefined) {
          await this.ledger.write(idempotencyKey, {
            request_fingerprint: fingerprint,
            response,
            created_at: this.now().toISOString(),
          });
        }

        this.log.info('Paste created', { pasteId: draft.id, commit: result.commit, size: draft.size });
        return result.pushError !== undefined
          ? { status: 'created', response, pushError: result.pushError }
          : { status: 'created', response };
      }, { logger: this.log }),
    );
  }

  getMeta(id: string): Promise<PasteMetadata> {
    return this.reader.readOne(id);
  }

  async getContent(id: string): Promise<{ meta: PasteMetadata; bytes: Buffer }> {
    const meta = await this.reader.readOne(id);
    return { meta, bytes: await this.reader.readContent(meta) };
  }

  async recent(limit: number = DEFAULT_RECENT_LIMIT, tag?: string): Promise<RecentItem[]> {
    const capped = Math.min(Math.max(0, limit), MAX_RECENT_LIMIT);
    const records = await this.reader.readRecent(capped, tag);
    return records.map(toRecentItem);
  }

  /**
   * Ready when the repository exists and the repository lock can be taken.
   * Queues behind in-process writes so a probe never steals the lock from one.
   */
  async ready(): Promise<void> {
    const { vcs, paths } = this.options;
    if (!(await vcs.isRepository())) throw serviceUnavailable('repo not ready');

    await this.writes.runExclusive(async () => {
      try {
        const lock = await acquireLock(paths.gitLock, { logger: this.log });
        await lock.release();
      } catch (err) {
        const reason = isPasteError(err) ? err.typedError.message : errorMessage(err);
        throw serviceUnavailable(`repository lock unavailable: ${reason}`);
      }
    });
  }
}
