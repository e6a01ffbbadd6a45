/**
 * Paste Draft Builder.
 *
 * Writes a paste's content and metadata files into the working tree and
 * describes what was written. Nothing is staged or committed here.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { monotonicFactory } from 'ulid';
import { toPasteError } from '../domain/errors';
import {
  chooseExtension,
  contentHash,
  datePath,
  DEFAULT_SLUG,
  resolveContentType,
  sanitizeName,
} from '../domain/naming';
import { CreatePasteInput, PasteDraft, PasteMetadata } from '../domain/paste';

export const PASTES_DIR = 'pastes';
export const META_DIR = 'meta';

/** ULIDs stamped with the paste's creation time; strictly increasing within a process. */
const nextId = monotonicFactory();

export function metaRelPathFor(id: string): string {
  return `${META_DIR}/${id}.json`;
}

export function commitSubject(id: string, slug: string, tag?: string, message?: string): string {
  if (message !== undefined) return message;
  const subject = `paste: ${id} ${slug}`;
  return tag !== undefined ? `${subject} [tag:${tag}]` : subject;
}

/**
 * Build and write a draft. Invalid names fail before anything touches the
 * disk; a filesystem failure fails the whole draft even if some files landed.
 */
export async function buildDraft(
  repoDir: string,
  input: CreatePasteInput,
  now: Date = new Date(),
): Promise<PasteDraft> {
  const slug = sanitizeName(input.name ?? DEFAULT_SLUG);
  const ext = chooseExtension(input.name, input.contentType);
  const id = nextId(now.getTime());

  const relPath = `${PASTES_DIR}/${datePath(now)}/${id}__${slug}.${ext}`;
  const absPath = join(repoDir, relPath);
  const metaRelPath = metaRelPathFor(id);
  const metaPath = join(repoDir, metaRelPath);

  const sha256 = contentHash(input.bytes);
  const contentType = resolveContentType(ext, input.contentType);

  const meta: PasteMetadata = {
    id,
    created_at: now.toISOString(),
    path: relPath,
    size: input.bytes.length,
    content_type: contentType,
    commit: '',
    sha256,
    tag: input.tag,
    client_ip: input.clientIp,
    user_agent: input.userAgent,
  };

  try {
    await mkdir(dirname(absPath), { recursive: true });
    await mkdir(join(repoDir, META_DIR), { recursive: true });
    await writeFile(absPath, input.bytes);
    await writeFile(metaPath, `${JSON.stringify(meta, null, 2)}\n`);
  } catch (err) {
    throw toPasteError(err, 'write paste draft');
  }

  return {
    id,
    relPath,
    absPath,
    metaRelPath,
    metaPath,
    contentType,
    size: input.bytes.length,
    sha256,
    subject: commitSubject(id, slug, input.tag, input.message),
    meta,
  };
}
