import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { LogEntry, resetLogHandler, setLogHandler } from '../../src/logger';

export async function makeTempDir(prefix = 'lanpaste-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Route log output into an array for the duration of a test. */
export function captureLogs(): { entries: LogEntry[]; restore(): void } {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => entries.push(entry));
  return { entries, restore: resetLogHandler };
}
