/**
 * Git backend for the VersionControl port.
 *
 * Every operation runs the `git` executable as a subprocess (no shell) in the
 * repository directory, with a fixed author/committer identity. There is no
 * timeout: a hung git process stalls the caller.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { internal, serviceUnavailable } from '../domain/errors';
import { PushOutcome, SHORT_COMMIT_LEN, VersionControl } from './version-control';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface GitIdentity {
  name: string;
  email: string;
}

export interface GitAdapterOptions {
  repoDir: string;
  identity: GitIdentity;
  /** Executable to run. Defaults to `git` on PATH. */
  binary?: string;
}

interface ExecFailure {
  code?: number | string;
  stderr?: string;
  message: string;
}

function asExecFailure(err: unknown): ExecFailure {
  if (typeof err !== 'object' || err === null) return { message: String(err) };
  const code = 'code' in err && (typeof err.code === 'number' || typeof err.code === 'string') ? err.code : undefined;
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : undefined;
  const message = err instanceof Error ? err.message : String(err);
  return { code, stderr, message };
}

export class GitAdapter implements VersionControl {
  readonly repoDir: string;
  private readonly identity: GitIdentity;
  private readonly binary: string;

  constructor(options: GitAdapterOptions) {
    this.repoDir = options.repoDir;
    this.identity = options.identity;
    this.binary = options.binary ?? 'git';
  }

  /** Run git with `args`; resolves to trimmed stdout. */
  async run(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.binary, args, {
        cwd: this.repoDir,
        env: this.environment(),
        encoding: 'utf8',
        maxBuffer: MAX_OUTPUT_BYTES,
      });
      return stdout.trim();
    } catch (err) {
      const failure = asExecFailure(err);
      if (typeof failure.code === 'number') {
        throw internal(`git ${args.join(' ')}: ${failure.stderr?.trim() || failure.message}`, {
          args,
          exitCode: failure.code,
        });
      }
      throw internal(`git ${args.join(' ')} failed: ${failure.message}`, { args });
    }
  }

  /** Preflight: the executable must exist and run. */
  async checkInstalled(): Promise<void> {
    try {
      await execFileAsync(this.binary, ['--version'], { encoding: 'utf8' });
    } catch (err) {
      const failure = asExecFailure(err);
      const missing = failure.code === 'ENOENT';
      throw serviceUnavailable(
        missing ? 'git is required' : `git is not usable: ${failure.message}`,
        [
          {
            type: 'INSTALL_GIT',
            params: {},
            description:
              'Debian/Ubuntu `sudo apt-get install git`, Fedora `sudo dnf install git`, ' +
              'Arch `sudo pacman -S git`, macOS `xcode-select --install`',
          },
        ],
      );
    }
  }

  async isRepository(): Promise<boolean> {
    try {
      return (await this.run(['rev-parse', '--is-inside-work-tree'])) === 'true';
    } catch {
      return false;
    }
  }

  async init(): Promise<void> {
    await this.run(['init']);
  }

  /** True once the repository has at least one commit. */
  async hasCommits(): Promise<boolean> {
    try {
      await this.run(['rev-parse', '--verify', 'HEAD']);
      return true;
    } catch {
      return false;
    }
  }

  async commit(paths: string[], subject: string): Promise<string> {
    await this.run(['add', ...paths]);
    await this.run(['commit', '-m', subject]);
    return this.run(['rev-parse', `--short=${SHORT_COMMIT_LEN}`, 'HEAD']);
  }

  async push(remote: string): Promise<PushOutcome> {
    try {
      await this.run(['push', remote, 'HEAD']);
      return { ok: true };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  async lastCommitFor(path: string): Promise<string> {
    const full = await this.run(['log', '-n1', '--format=%H', '--', path]);
    return full.slice(0, SHORT_COMMIT_LEN);
  }

  async undoLastCommit(): Promise<void> {
    await this.run(['reset', '--soft', 'HEAD~1']);
  }

  async resetIndex(): Promise<void> {
    await this.run(['reset']);
  }

  private environment(): NodeJS.ProcessEnv {
    return {
      ...process.env,
      GIT_AUTHOR_NAME: this.identity.name,
      GIT_AUTHOR_EMAIL: this.identity.email,
      GIT_COMMITTER_NAME: this.identity.name,
      GIT_COMMITTER_EMAIL: this.identity.email,
    };
  }
}
