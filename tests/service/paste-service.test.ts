import { existsSync } from 'fs';
import { readdir, writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { AppPaths, resolvePaths } from '../../src/config';
import { CreatePasteInput, PushMode } from '../../src/domain/paste';
import { PasteService } from '../../src/service/paste-service';
import { FakeVersionControl } from '../helpers/fake-version-control';
import { captureLogs, makeTempDir, removeDir } from '../helpers/fixtures';

const NOW = new Date('2024-05-10T08:00:00.000Z');

function input(body: string, extra: Partial<CreatePasteInput> = {}): CreatePasteInput {
  return { name: 'note', bytes: Buffer.from(body), ...extra };
}

describe('PasteService', () => {
  let base: string;
  let paths: AppPaths;
  let vcs: FakeVersionControl;
  let logs: ReturnType<typeof captureLogs>;

  function service(pushMode = PushMode.Off, maxBytes = 1024): PasteService {
    return new PasteService({ paths, vcs, pushMode, remote: 'origin', maxBytes, now: () => NOW });
  }

  beforeEach(async () => {
    base = await makeTempDir();
    paths = resolvePaths(base);
    vcs = new FakeVersionControl();
    logs = captureLogs();
  });

  afterEach(async () => {
    logs.restore();
    await removeDir(base);
  });

  test('create stores, commits and returns links', async () => {
    const svc = service();
    const outcome = await svc.create(input('hello', { tag: 'demo' }));

    expect(outcome.status).toBe('created');
    const { response } = outcome;
    expect(response.commit).toBe('000000000001');
    expect(response.path).toBe(`pastes/2024/05/10/${response.id}__note.txt`);
    expect(response.raw_url).toBe(`/api/v1/p/${response.id}/raw`);
    expect(response.view_url).toBe(`/p/${response.id}`);
    expect(response.meta_url).toBe(`/api/v1/p/${response.id}`);
    expect(vcs.commits[0].subject).toBe(`paste: ${response.id} note [tag:demo]`);
    expect(existsSync(paths.gitLock)).toBe(false);
  });

  test('round trip: content, metadata and hydrated commit', async () => {
    const svc = service();
    const { response } = await svc.create(input('round trip body'));

    const { meta, bytes } = await svc.getContent(response.id);
    expect(bytes.toString()).toBe('round trip body');
    expect(meta.commit).toBe(response.commit);
    expect(meta.size).toBe(15);
    expect((await svc.getMeta(response.id)).path).toBe(response.path);
  });

  test('oversized body is rejected before anything is written', async () => {
    const svc = service(PushMode.Off, 4);
    await expect(svc.create(input('12345'))).rejects.toMatchObject({ kind: 'too_large' });
    expect(vcs.events).toEqual([]);
    expect(existsSync(paths.repo)).toBe(false);
  });

  describe('idempotency', () => {
    test('same key and payload replays the first response', async () => {
      const svc = service();
      const first = await svc.create(input('same'), 'key-1');
      const second = await svc.create(input('same'), 'key-1');

      expect(first.status).toBe('created');
      expect(second).toEqual({ status: 'replayed', response: first.response });
      expect(vcs.commits).toHaveLength(1);
    });

    test('same key with a different payload conflicts', async () => {
      const svc = service();
      await svc.create(input('one'), 'key-1');
      await expect(svc.create(input('two'), 'key-1')).rejects.toMatchObject({
        kind: 'conflict',
        message: 'idempotency key reuse with different payload',
      });
      expect(vcs.commits).toHaveLength(1);
    });

    test('transport details do not change the fingerprint', async () => {
      const svc = service();
      const first = await svc.create(input('same', { clientIp: '10.0.0.1', userAgent: 'a' }), 'key-1');
      const second = await svc.create(input('same', { clientIp: '10.0.0.2', userAgent: 'b' }), 'key-1');
      expect(second.response).toEqual(first.response);
    });

    test('without a key every request creates', async () => {
      const svc = service();
      const a = await svc.create(input('same'));
      const b = await svc.create(input('same'));
      expect(a.response.id).not.toBe(b.response.id);
      expect(vcs.commits).toHaveLength(2);
    });

    test('failed creates are not recorded', async () => {
      vcs.pushError = 'rejected';
      const strict = service(PushMode.Strict);
      await expect(strict.create(input('x'), 'key-1')).rejects.toMatchObject({ kind: 'internal' });

      vcs.pushError = undefined;
      const retried = await strict.create(input('x'), 'key-1');
      expect(retried.status).toBe('created');
    });
  });

  test('concurrent creates are serialized', async () => {
    const svc = service();
    const outcomes = await Promise.all(
      Array.from({ length: 5 }, (_, i) => svc.create(input(`body ${i}`))),
    );

    expect(vcs.events).toEqual(Array.from({ length: 5 }, () => ['commit:start', 'commit:end']).flat());
    expect(new Set(outcomes.map((o) => o.response.id)).size).toBe(5);
    expect(new Set(outcomes.map((o) => o.response.commit)).size).toBe(5);
    expect(await readdir(join(paths.repo, 'meta'))).toHaveLength(5);
  });

  test('a lock held by another live process fails fast with conflict', async () => {
    await mkdir(paths.run, { recursive: true });
    await writeFile(paths.gitLock, JSON.stringify({ pid: process.ppid, acquiredAt: NOW.toISOString() }));

    await expect(service().create(input('x'))).rejects.toMatchObject({
      kind: 'conflict',
      message: 'already running',
    });
    expect(vcs.events).toEqual([]);
  });

  test('strict push failure leaves no paste behind', async () => {
    vcs.pushError = 'remote rejected';
    const svc = service(PushMode.Strict);

    await expect(svc.create(input('x'))).rejects.toMatchObject({
      kind: 'internal',
      message: 'push failed in strict mode: remote rejected',
    });
    expect(vcs.commits).toHaveLength(0);
    expect(await svc.recent()).toEqual([]);
    expect(existsSync(paths.gitLock)).toBe(false);
  });

  test('best-effort push failure still creates and logs a warning', async () => {
    vcs.pushError = 'remote unreachable';
    const svc = service(PushMode.BestEffort);

    const outcome = await svc.create(input('x'));
    expect(outcome).toMatchObject({ status: 'created', pushError: 'remote unreachable' });
    expect((await svc.getMeta(outcome.response.id)).commit).toBe(outcome.response.commit);

    const warning = logs.entries.find((e) => e.message === 'Best-effort push failed');
    expect(warning?.context).toMatchObject({ remote: 'origin', error: 'remote unreachable' });
  });

  describe('recent', () => {
    test('newest first with tag filter', async () => {
      const svc = service();
      const a = await svc.create(input('a', { tag: 'ops' }));
      const b = await svc.create(input('b'));
      const c = await svc.create(input('c', { tag: 'ops' }));

      expect((await svc.recent()).map((r) => r.id)).toEqual([c, b, a].map((o) => o.response.id));
      expect((await svc.recent(50, 'ops')).map((r) => r.id)).toEqual([c, a].map((o) => o.response.id));
      expect(await svc.recent(1)).toEqual([
        {
          id: c.response.id,
          created_at: NOW.toISOString(),
          path: c.response.path,
          commit: c.response.commit,
          tag: 'ops',
          size: 1,
          content_type: 'text/plain; charset=utf-8',
        },
      ]);
    });

    test('empty store', async () => {
      expect(await service().recent()).toEqual([]);
    });
  });

  describe('ready', () => {
    test('ready when the repository exists and the lock is free', async () => {
      await expect(service().ready()).resolves.toBeUndefined();
      expect(existsSync(paths.gitLock)).toBe(false);
    });

    test('not a repository is service unavailable', async () => {
      vcs.repository = false;
      await expect(service().ready()).rejects.toMatchObject({
        kind: 'service_unavailable',
        message: 'repo not ready',
      });
    });

    test('a held lock is service unavailable', async () => {
      await mkdir(paths.run, { recursive: true });
      await writeFile(paths.gitLock, JSON.stringify({ pid: process.ppid, acquiredAt: NOW.toISOString() }));
      await expect(service().ready()).rejects.toMatchObject({
        kind: 'service_unavailable',
        message: 'repository lock unavailable: already running',
      });
    });
  });
});
