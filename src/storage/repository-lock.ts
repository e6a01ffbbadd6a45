/**
 * Exclusive lock files.
 *
 * A lock is a file created with `wx`. While held, its owner touches the file
 * every `updateMs`, so a live lock always has a recent mtime. Acquisition
 * never waits: a lock file younger than `staleMs` fails the call with
 * Conflict. An older one belongs to an owner that died without releasing, and
 * is reclaimed whatever pid it names or whether it was ever written.
 *
 * Reclaiming is done by one acquirer at a time: it must first create
 * `<path>.reclaim` with `wx`, then re-check the lock's age before removing it.
 * A competing acquirer that finds the guard taken fails with Conflict.
 *
 * Two locks exist per storage root: `run/git.lock`, held around every
 * repository mutation, and `run/daemon.lock`, held for the lifetime of the
 * serving process.
 */

import { mkdir, stat, unlink, utimes, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { errorMessage, internal, lockHeld } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

export const DEFAULT_STALE_MS = 10_000;

export interface LockOptions {
  /** Age after which an unrefreshed lock file is treated as abandoned. */
  staleMs?: number;
  /** Heartbeat interval; defaults to half of `staleMs`. */
  updateMs?: number;
  logger?: Logger;
}

interface LockFileContents {
  pid: number;
  acquiredAt: string;
}

export class RepositoryLock {
  #released = false;
  readonly #heartbeat: NodeJS.Timeout;

  constructor(
    readonly path: string,
    updateMs: number,
    private readonly logger: Logger,
  ) {
    this.#heartbeat = setInterval(() => {
      this.touch().catch((err: unknown) => {
        this.logger.warn('Lock refresh failed', { lock: this.path, error: errorMessage(err) });
      });
    }, updateMs);
    this.#heartbeat.unref();
  }

  get released(): boolean {
    return this.#released;
  }

  /** Stop refreshing and remove the lock file. Safe to call more than once. */
  async release(): Promise<void> {
    if (this.#released) return;
    this.#released = true;
    clearInterval(this.#heartbeat);
    await removeIfPresent(this.path);
  }

  private async touch(): Promise<void> {
    if (this.#released) return;
    const now = new Date();
    await utimes(this.path, now, now);
  }
}

export async function acquireLock(path: string, options: LockOptions = {}): Promise<RepositoryLock> {
  const staleMs = options.staleMs ?? DEFAULT_STALE_MS;
  const updateMs = options.updateMs ?? Math.max(1, Math.floor(staleMs / 2));
  const logger = options.logger ?? rootLogger;
  const held = () => new RepositoryLock(path, updateMs, logger);

  try {
    await mkdir(dirname(path), { recursive: true });
  } catch (err) {
    throw internal(`create lock parent: ${errorMessage(err)}`);
  }

  if (await tryCreate(path)) return held();
  if (!isStale(await lockAge(path), staleMs)) throw lockHeld();

  const guard = `${path}.reclaim`;
  if (!(await tryCreate(guard))) {
    const guardAge = await lockAge(guard);
    if (guardAge !== null && guardAge >= staleMs) {
      // Left by an acquirer that died mid-reclaim; the next attempt may proceed.
      await removeIfPresent(guard);
    }
    throw lockHeld();
  }

  try {
    // Another acquirer may have reclaimed and re-created the lock since the first check.
    if (!isStale(await lockAge(path), staleMs)) throw lockHeld();
    logger.warn('Reclaiming stale lock', { lock: path });
    await removeIfPresent(path);
    if (await tryCreate(path)) return held();
    throw lockHeld();
  } finally {
    await removeIfPresent(guard);
  }
}

/** Run `fn` while holding the lock at `path`; the lock is released on every exit path. */
export async function withLock<T>(path: string, fn: () => Promise<T>, options: LockOptions = {}): Promise<T> {
  const lock = await acquireLock(path, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

async function tryCreate(path: string): Promise<boolean> {
  const contents: LockFileContents = { pid: process.pid, acquiredAt: new Date().toISOString() };
  try {
    await writeFile(path, JSON.stringify(contents), { flag: 'wx' });
    return true;
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') return false;
    throw internal(`open lock: ${errorMessage(err)}`);
  }
}

/** Milliseconds since `path` was last touched, or null when it does not exist. */
async function lockAge(path: string): Promise<number | null> {
  try {
    const stats = await stat(path);
    return Date.now() - stats.mtimeMs;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw internal(`stat lock: ${errorMessage(err)}`);
  }
}

function isStale(ageMs: number | null, staleMs: number): boolean {
  return ageMs === null || ageMs >= staleMs;
}

async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT') throw internal(`remove lock: ${errorMessage(err)}`);
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
