import { createHash } from 'crypto';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { IdempotencyRecord } from '../../src/domain/idempotency';
import { createResponseFor } from '../../src/domain/paste';
import { IdempotencyLedger } from '../../src/storage/idempotency-ledger';
import { makeTempDir, removeDir } from '../helpers/fixtures';

function record(fingerprint: string, id = 'id-1'): IdempotencyRecord {
  return {
    request_fingerprint: fingerprint,
    response: createResponseFor(id, `pastes/2024/01/01/${id}__paste.txt`, 'abcdef123456'),
    created_at: '2024-01-01T00:00:00.000Z',
  };
}

describe('IdempotencyLedger', () => {
  let dir: string;
  let ledger: IdempotencyLedger;

  beforeEach(async () => {
    dir = await makeTempDir();
    ledger = new IdempotencyLedger(join(dir, 'idempotency'));
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  test('unknown key reads as null', async () => {
    expect(await ledger.read('missing')).toBeNull();
  });

  test('write then read round-trips the record', async () => {
    await ledger.write('key-1', record('fp-a'));
    expect(await ledger.read('key-1')).toEqual(record('fp-a'));
  });

  test('file is named by the sha256 of the trimmed key', async () => {
    await ledger.write('  key-1 ', record('fp-a'));
    const digest = createHash('sha256').update('key-1').digest('hex');
    expect(ledger.pathFor('key-1')).toBe(join(dir, 'idempotency', `${digest}.json`));
    const stored = JSON.parse(await readFile(ledger.pathFor('key-1'), 'utf8'));
    expect(stored.request_fingerprint).toBe('fp-a');
  });

  test('same fingerprint rewrite is a no-op', async () => {
    await ledger.write('key-1', record('fp-a', 'first'));
    await ledger.write('key-1', record('fp-a', 'second'));
    expect((await ledger.read('key-1'))?.response.id).toBe('first');
  });

  test('different fingerprint under the same key is a conflict', async () => {
    await ledger.write('key-1', record('fp-a'));
    await expect(ledger.write('key-1', record('fp-b'))).rejects.toMatchObject({
      kind: 'conflict',
      code: 'IDEMPOTENCY.FINGERPRINT_MISMATCH',
    });
    expect((await ledger.read('key-1'))?.request_fingerprint).toBe('fp-a');
  });

  test('empty key is invalid input', async () => {
    await expect(ledger.read('   ')).rejects.toMatchObject({ kind: 'invalid_input' });
    await expect(ledger.write('', record('fp'))).rejects.toMatchObject({ kind: 'invalid_input' });
  });

  test('corrupt record is internal', async () => {
    await mkdir(join(dir, 'idempotency'), { recursive: true });
    await writeFile(ledger.pathFor('key-1'), '{not json');
    await expect(ledger.read('key-1')).rejects.toMatchObject({ kind: 'internal' });
  });
});
