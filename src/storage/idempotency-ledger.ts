/**
 * Idempotency Ledger.
 *
 * One JSON file per key, named by the SHA-256 of the key so arbitrary
 * caller strings map to safe file names. Records are created once and never
 * rewritten; there is no expiry.
 */

import { createHash } from 'crypto';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { errorMessage, idempotencyMismatch, internal, invalidInput } from '../domain/errors';
import { IdempotencyRecord, IdempotencyRecordSchema } from '../domain/idempotency';
import { errnoCode } from './repository-lock';

export class IdempotencyLedger {
  constructor(readonly dir: string) {}

  pathFor(key: string): string {
    const normalized = normalizeKey(key);
    const digest = createHash('sha256').update(normalized).digest('hex');
    return join(this.dir, `${digest}.json`);
  }

  async read(key: string): Promise<IdempotencyRecord | null> {
    const path = this.pathFor(key);
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw internal(`read idempotency record: ${errorMessage(err)}`);
    }
    return parseRecord(raw);
  }

  /**
   * Persist `record` under `key`. Writing the same fingerprint again is a
   * no-op; a different fingerprint under an existing key is a Conflict.
   */
  async write(key: string, record: IdempotencyRecord): Promise<void> {
    const path = this.pathFor(key);
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(path, `${JSON.stringify(record, null, 2)}\n`, { flag: 'wx' });
      return;
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') {
        throw internal(`write idempotency record: ${errorMessage(err)}`);
      }
    }

    const existing = await this.read(key);
    if (existing && existing.request_fingerprint !== record.request_fingerprint) {
      throw idempotencyMismatch();
    }
  }
}

function normalizeKey(key: string): string {
  const trimmed = key.trim();
  if (!trimmed) throw invalidInput('idempotency key must not be empty');
  return trimmed;
}

function parseRecord(raw: string): IdempotencyRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw internal(`parse idempotency record: ${errorMessage(err)}`);
  }
  const parsed = IdempotencyRecordSchema.safeParse(json);
  if (!parsed.success) {
    throw internal(`parse idempotency record: ${parsed.error.message}`);
  }
  return parsed.data;
}
