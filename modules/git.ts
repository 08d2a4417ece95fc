import { cloneRepository } from '@adapters/github/clone-repository.js';
import { pushBranch } from '@adapters/github/push-branch.js';
import type { GitHubAuth } from '@adapters/github/types.js';
import { execFileCommand } from '@modules/exec.js';

export interface GitSignature {
  name: string;
  email: string;
  date: Date;
}

export interface GitCloneOptions {
  serverUrl: string;
  owner: string;
  repo: string;
  directory: string;
  depth: number;
  auth: GitHubAuth;
}

export interface GitPushOptions {
  remote: string;
  branch: string;
  auth: GitHubAuth;
}

/**
 * The git operations a Workspace needs. Every method rejects with an Error whose
 * message is safe to surface (credentials already redacted).
 */
export interface GitBackend {
  clone(options: GitCloneOptions): Promise<void>;
  revParse(directory: string, rev: string): Promise<string>;
  createBranch(directory: string, branch: string, startPoint: string): Promise<void>;
  checkout(directory: string, branch: string): Promise<void>;
  stageAll(directory: string): Promise<void>;
  commit(directory: string, message: string, author: GitSignature): Promise<string>;
  updateRef(directory: string, ref: string, sha: string): Promise<void>;
  push(directory: string, options: GitPushOptions): Promise<void>;
}

//NOTE: Production backend, shells out to the git CLI
export class GitCli implements GitBackend {
  async clone(options: GitCloneOptions): Promise<void> {
    const result = await cloneRepository({
      serverUrl: options.serverUrl,
      owner: options.owner,
      repo: options.repo,
      targetDir: options.directory,
      depth: options.depth,
      auth: options.auth,
    });
    if (!result.success) {
      throw new Error(result.error);
    }
  }

  async revParse(directory: string, rev: string): Promise<string> {
    const stdout = await this.run(directory, ['rev-parse', '--verify', `${rev}^{commit}`]);
    return stdout.trim();
  }

  async createBranch(directory: string, branch: string, startPoint: string): Promise<void> {
    await this.run(directory, ['branch', '--no-track', branch, startPoint]);
  }

  async checkout(directory: string, branch: string): Promise<void> {
    await this.run(directory, ['checkout', branch]);
  }

  async stageAll(directory: string): Promise<void> {
    await this.run(directory, ['add', '--all']);
  }

  //NOTE: The author doubles as committer, both stamped with the same date
  async commit(directory: string, message: string, author: GitSignature): Promise<string> {
    //NOTE: Raw git date format, seconds since the epoch in UTC
    const date = `@${Math.floor(author.date.getTime() / 1000)} +0000`;
    await this.run(directory, ['commit', '--no-verify', '--cleanup=verbatim', '-m', message], {
      GIT_CONFIG_COUNT: '1',
      GIT_CONFIG_KEY_0: 'commit.gpgsign',
      GIT_CONFIG_VALUE_0: 'false',
      GIT_AUTHOR_NAME: author.name,
      GIT_AUTHOR_EMAIL: author.email,
      GIT_AUTHOR_DATE: date,
      GIT_COMMITTER_NAME: author.name,
      GIT_COMMITTER_EMAIL: author.email,
      GIT_COMMITTER_DATE: date,
    });
    return this.revParse(directory, 'HEAD');
  }

  async updateRef(directory: string, ref: string, sha: string): Promise<void> {
    await this.run(directory, ['update-ref', ref, sha]);
  }

  async push(directory: string, options: GitPushOptions): Promise<void> {
    const result = await pushBranch({
      workspacePath: directory,
      remote: options.remote,
      branch: options.branch,
      auth: options.auth,
    });
    if (!result.success) {
      throw new Error(result.error);
    }
  }

  private async run(directory: string, args: string[], env: Record<string, string> = {}): Promise<string> {
    const result = await execFileCommand('git', args, {
      cwd: directory,
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0', ...env },
    });
    if (!result.success) {
      throw new Error(result.error ?? `git ${args[0]} failed`);
    }
    return result.stdout ?? '';
  }
}
