import { mkdtempSync, existsSync } from 'fs';
import { rm } from 'fs/promises';
import { join, resolve } from 'path';
import type { GitHubAuth } from '@adapters/github/types.js';
import {
  CLONE_DEPTH,
  DEFAULT_GITHUB_SERVER_URL,
  ORIGIN_REMOTE,
  WORKSPACE_DIR_PREFIX,
} from '@common/config.js';
import { formatError, isEmpty } from '@common/strings.js';
import {
  CloneError,
  CommitError,
  MutationError,
  PushError,
  TeardownError,
} from '@modules/errors.js';
import { GitCli, type GitBackend } from '@modules/git.js';
import { logger } from '@modules/logger.js';
import { formatRepository, type RepositoryIdentity } from '@modules/repository.js';

export interface Author {
  name: string;
  email: string;
  //NOTE: Missing, invalid or epoch dates are replaced with the commit time
  date?: Date;
}

export interface CommitDetails {
  message: string;
  author: Author;
}

export interface Worktree {
  path: string;
  branch: string;
}

export type MutateFn = (worktree: Worktree) => CommitDetails | Promise<CommitDetails>;

export interface PushedBranch {
  branch: string;
  sha: string;
}

export interface WorkspaceOptions {
  git?: GitBackend;
  //NOTE: Parent of the temporary directory; defaults to the process cwd
  baseDir?: string;
  serverUrl?: string;
  now?: () => Date;
}

export function isZeroDate(date: Date | undefined): boolean {
  return date === undefined || Number.isNaN(date.getTime()) || date.getTime() === 0;
}

/**
 * A private clone of one repository in a freshly created temporary directory.
 * The directory exists from construction until {@link Workspace.teardown}.
 */
export class Workspace {
  readonly path: string;
  private readonly git: GitBackend;
  private readonly serverUrl: string;
  private readonly now: () => Date;
  private baseSha: string | null = null;
  private removal: Promise<void> | null = null;

  constructor(
    readonly repository: RepositoryIdentity,
    private readonly auth: GitHubAuth,
    options: WorkspaceOptions = {}
  ) {
    this.git = options.git ?? new GitCli();
    this.serverUrl = options.serverUrl ?? DEFAULT_GITHUB_SERVER_URL;
    this.now = options.now ?? (() => new Date());
    this.path = mkdtempSync(join(resolve(options.baseDir ?? process.cwd()), WORKSPACE_DIR_PREFIX));
    logger.debug('Created workspace directory', { path: this.path });
  }

  get isCloned(): boolean {
    return this.baseSha !== null;
  }

  async clone(): Promise<string> {
    const name = formatRepository(this.repository);
    try {
      await this.git.clone({
        serverUrl: this.serverUrl,
        owner: this.repository.owner,
        repo: this.repository.repo,
        directory: this.path,
        depth: CLONE_DEPTH,
        auth: this.auth,
      });
      this.baseSha = await this.git.revParse(this.path, 'HEAD');
    } catch (err) {
      throw new CloneError(`failed to clone ${name}: ${formatError(err)}`, { cause: err });
    }
    logger.info('Cloned repository', { repository: name, path: this.path, head: this.baseSha });
    return this.baseSha;
  }

  async commitAndPush(branchName: string, mutate: MutateFn): Promise<PushedBranch> {
    const baseSha = this.baseSha;
    if (baseSha === null) {
      throw new CloneError('repository has not been cloned');
    }
    if (isEmpty(branchName)) {
      throw new CommitError('branch name must not be empty');
    }

    //NOTE: Branch is a local ref copy of HEAD; nothing touches the network until the push
    try {
      await this.git.createBranch(this.path, branchName, baseSha);
      await this.git.checkout(this.path, branchName);
    } catch (err) {
      throw new CommitError(`failed to create branch ${branchName}: ${formatError(err)}`, { cause: err });
    }

    let details: CommitDetails;
    try {
      details = await mutate({ path: this.path, branch: branchName });
    } catch (err) {
      throw new MutationError(formatError(err), { cause: err });
    }

    const date = isZeroDate(details.author.date) ? this.now() : details.author.date ?? this.now();

    let sha: string;
    try {
      await this.git.stageAll(this.path);
      sha = await this.git.commit(this.path, details.message, {
        name: details.author.name,
        email: details.author.email,
        date,
      });
    } catch (err) {
      throw new CommitError(`failed to commit on ${branchName}: ${formatError(err)}`, { cause: err });
    }

    //NOTE: Tracking ref starts at the fork point; a successful push advances it to the new tip
    try {
      await this.git.updateRef(this.path, `refs/remotes/${ORIGIN_REMOTE}/${branchName}`, baseSha);
      await this.git.push(this.path, { remote: ORIGIN_REMOTE, branch: branchName, auth: this.auth });
    } catch (err) {
      throw new PushError(`failed to push ${branchName}: ${formatError(err)}`, { cause: err });
    }

    logger.info('Pushed branch', { branch: branchName, sha });
    return { branch: branchName, sha };
  }

  //NOTE: Safe to call any number of times, from any state
  teardown(): Promise<void> {
    if (!this.removal) {
      this.removal = this.remove();
    }
    return this.removal;
  }

  private async remove(): Promise<void> {
    try {
      await rm(this.path, { recursive: true, force: true });
    } catch (err) {
      //NOTE: Allow a later teardown() to try again
      this.removal = null;
      throw new TeardownError(`failed to remove ${this.path}: ${formatError(err)}`, this.path, { cause: err });
    }
    if (existsSync(this.path)) {
      this.removal = null;
      throw new TeardownError(`failed to remove ${this.path}`, this.path);
    }
    logger.debug('Removed workspace directory', { path: this.path });
  }
}
