/**
 * Metadata Index / Reader.
 *
 * Reads `meta/*.json` records without taking the repository lock. A record
 * written by an in-flight create may not have a commit yet; its empty
 * `commit` field is filled from history on every read and never cached.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { errorMessage, internal, notFound } from '../domain/errors';
import { PasteMetadata, PasteMetadataSchema } from '../domain/paste';
import { Logger, logger as rootLogger } from '../logger';
import { META_DIR } from './draft-builder';
import { errnoCode } from './repository-lock';
import { VersionControl } from './version-control';

const ID_PATTERN = /^[A-Za-z0-9-]+$/;

export class MetadataReader {
  private readonly log: Logger;

  constructor(
    readonly repoDir: string,
    private readonly vcs: VersionControl,
    logger: Logger = rootLogger,
  ) {
    this.log = logger.child({ module: 'metadata-reader' });
  }

  async readOne(id: string): Promise<PasteMetadata> {
    if (!ID_PATTERN.test(id)) throw notFound('paste', id);

    let raw: string;
    try {
      raw = await readFile(join(this.repoDir, META_DIR, `${id}.json`), 'utf8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') throw notFound('paste', id);
      throw internal(`read meta: ${errorMessage(err)}`);
    }

    const meta = parseMeta(raw);
    if (!meta.ok) throw internal(`parse meta: ${meta.error}`);
    return this.hydrate(meta.value);
  }

  /** Newest first, optionally restricted to an exact tag. Unreadable records are skipped. */
  async readRecent(limit: number, tag?: string): Promise<PasteMetadata[]> {
    const metaDir = join(this.repoDir, META_DIR);
    let names: string[];
    try {
      names = await readdir(metaDir);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw internal(`read meta dir: ${errorMessage(err)}`);
    }

    const records: PasteMetadata[] = [];
    for (const name of names) {
      if (!name.endsWith('.json')) continue;
      let raw: string;
      try {
        raw = await readFile(join(metaDir, name), 'utf8');
      } catch (err) {
        throw internal(`read meta file: ${errorMessage(err)}`);
      }
      const meta = parseMeta(raw);
      if (!meta.ok) {
        this.log.debug('Skipping unreadable metadata record', { file: name, error: meta.error });
        continue;
      }
      if (tag !== undefined && meta.value.tag !== tag) continue;
      records.push(meta.value);
    }

    records.sort(newestFirst);
    // One history lookup at a time: a page can hold hundreds of records.
    const page: PasteMetadata[] = [];
    for (const meta of records.slice(0, Math.max(0, limit))) {
      page.push(await this.hydrate(meta));
    }
    return page;
  }

  async readContent(meta: PasteMetadata): Promise<Buffer> {
    try {
      return await readFile(join(this.repoDir, meta.path));
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') throw notFound('paste content', meta.id);
      throw internal(`read paste: ${errorMessage(err)}`);
    }
  }

  private async hydrate(meta: PasteMetadata): Promise<PasteMetadata> {
    if (meta.commit) return meta;
    return { ...meta, commit: await this.vcs.lastCommitFor(meta.path) };
  }
}

type ParseResult = { ok: true; value: PasteMetadata } | { ok: false; error: string };

function parseMeta(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
  const parsed = PasteMetadataSchema.safeParse(json);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: parsed.error.message };
}

function newestFirst(a: PasteMetadata, b: PasteMetadata): number {
  const byTime = Date.parse(b.created_at) - Date.parse(a.created_at);
  if (byTime !== 0) return byTime;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}
