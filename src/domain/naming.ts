/**
 * Fingerprinting and naming.
 *
 * Derives slugs, extensions, content hashes and request fingerprints from an
 * inbound paste. Pure functions, no I/O.
 */

import { createHash } from 'crypto';
import { invalidInput } from './errors';

export const MAX_SLUG_LEN = 80;
export const DEFAULT_SLUG = 'paste';

export const MARKDOWN_CONTENT_TYPE = 'text/markdown; charset=utf-8';
export const PLAIN_CONTENT_TYPE = 'text/plain; charset=utf-8';

export type PasteExtension = 'md' | 'txt';

/**
 * Turn a user-supplied name into a filesystem-safe slug.
 *
 * Names with path separators, `..`, or a leading dot are rejected outright.
 */
export function sanitizeName(name: string): string {
  if (name.includes('/') || name.includes('\\') || name.includes('..') || name.startsWith('.')) {
    throw invalidInput('invalid name', { name });
  }

  let slug = name
    .trim()
    .replace(/[^A-Za-z0-9._-]/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');

  if (slug.length > MAX_SLUG_LEN) {
    slug = slug.slice(0, MAX_SLUG_LEN).replace(/-+$/, '');
  }
  return slug || DEFAULT_SLUG;
}

export function chooseExtension(name?: string, contentType?: string): PasteExtension {
  const markdownType = contentType?.toLowerCase().includes('text/markdown') ?? false;
  const markdownName = name?.toLowerCase().endsWith('.md') ?? false;
  return markdownType || markdownName ? 'md' : 'txt';
}

/** Markdown is always stored with the canonical markdown type. */
export function resolveContentType(ext: PasteExtension, contentType?: string): string {
  if (ext === 'md') return MARKDOWN_CONTENT_TYPE;
  return contentType ?? PLAIN_CONTENT_TYPE;
}

export function contentHash(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export interface FingerprintInput {
  name?: string;
  tag?: string;
  contentType?: string;
  sha256: string;
}

/**
 * Stable digest of a request's semantic content. Transport headers never
 * participate, so a byte-identical retry always fingerprints the same.
 */
export function requestFingerprint(input: FingerprintInput): string {
  const fields = [input.name ?? '', input.tag ?? '', input.contentType ?? '', input.sha256];
  return createHash('sha256').update(fields.join('\0')).digest('hex');
}

/** UTC `YYYY/MM/DD` bucket for a timestamp. */
export function datePath(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}/${month}/${day}`;
}
