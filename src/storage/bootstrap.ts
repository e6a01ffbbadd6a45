/**
 * Preflight and one-time repository bootstrap.
 *
 * Runs before the server accepts requests: verifies git, creates the runtime
 * directories, probes that they are writable and makes sure the repository
 * exists with its initial commit. Every step is idempotent.
 */

import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { AppPaths } from '../config';
import { errorMessage, internal } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { META_DIR, PASTES_DIR } from './draft-builder';
import { GitAdapter } from './git-adapter';
import { errnoCode } from './repository-lock';

const README = '# LAN Paste\n\nGit-backed LAN paste store.\n';

const REQUIRED_GITIGNORE_LINES = [
  '# common temp/intermediate',
  '*.tmp',
  '*.swp',
  '*.bak',
  '*.part',
  '*.lock',
  '*.log',
  '',
  '# OS/editor noise',
  '.DS_Store',
  'Thumbs.db',
  '.idea/',
  '.vscode/',
];

const INITIAL_COMMIT_SUBJECT = 'init lanpaste repository';

async function ensureDir(path: string, what: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (err) {
    throw internal(`create ${what}: ${errorMessage(err)}`);
  }
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw internal(`read ${path}: ${errorMessage(err)}`);
  }
}

/** Append any required line that is missing; existing content is kept. */
export function mergeGitignore(existing: string, required: string[] = REQUIRED_GITIGNORE_LINES): string {
  const present = new Set(existing.split('\n'));
  if (required.every((line) => line === '' || present.has(line))) return existing;
  let content = existing;
  if (content.length > 0 && !content.endsWith('\n')) content += '\n';
  for (const line of required) {
    if (line !== '' && present.has(line)) continue;
    content += `${line}\n`;
  }
  return content;
}

export async function bootstrapRepository(git: GitAdapter, logger: Logger = rootLogger): Promise<void> {
  const repo = git.repoDir;
  await ensureDir(repo, 'repo');

  if (!(await git.isRepository())) {
    await git.init();
    logger.info('Initialized repository', { repo });
  }

  for (const dir of [PASTES_DIR, META_DIR]) {
    await ensureDir(join(repo, dir), dir);
    const keep = join(repo, dir, '.gitkeep');
    if ((await readOptional(keep)) === null) await writeFile(keep, '');
  }

  const readmePath = join(repo, 'README.md');
  if ((await readOptional(readmePath)) === null) {
    await writeFile(readmePath, README);
  }

  const gitignorePath = join(repo, '.gitignore');
  const existing = (await readOptional(gitignorePath)) ?? '';
  const merged = mergeGitignore(existing);
  if (merged !== existing) await writeFile(gitignorePath, merged);

  if (!(await git.hasCommits())) {
    await git.run(['add', 'README.md', '.gitignore', `${PASTES_DIR}/.gitkeep`, `${META_DIR}/.gitkeep`]);
    await git.run(['commit', '-m', INITIAL_COMMIT_SUBJECT]);
    logger.info('Created initial commit', { repo });
  }
}

export async function runPreflight(paths: AppPaths, git: GitAdapter, logger: Logger = rootLogger): Promise<void> {
  await git.checkInstalled();

  await ensureDir(paths.run, 'run dir');
  await ensureDir(paths.idempotency, 'idempotency dir');
  await ensureDir(paths.tmp, 'tmp dir');
  await ensureDir(paths.repo, 'repo dir');

  const probe = join(paths.run, '.write_test');
  try {
    await writeFile(probe, 'ok');
    await rm(probe);
  } catch (err) {
    throw internal(`storage root is not writable: ${errorMessage(err)}`);
  }

  await bootstrapRepository(git, logger);
}
