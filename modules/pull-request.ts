import type { GitHubMergeResult, GitHubPullRequest, GitHubResult } from '@adapters/github/types.js';
import { MERGE_METHOD } from '@common/config.js';
import { formatError } from '@common/strings.js';
import {
  MergeError,
  NotMergeableError,
  PRCreateError,
  PRFetchError,
} from '@modules/errors.js';
import type { PullRequestApi } from '@modules/github-api.js';
import { logger } from '@modules/logger.js';
import { formatRepository, type RepositoryIdentity } from '@modules/repository.js';

export interface PullRequestRecord {
  readonly number: number;
  headSha: string;
  //NOTE: Non-null only after a successful merge call
  mergeSha: string | null;
  url: string;
}

export interface PullRequestState {
  number: number;
  headSha: string;
  //NOTE: null while GitHub is still computing mergeability
  mergeable: boolean | null;
}

export interface CreatePullRequestInput {
  head: string;
  base: string;
  title: string;
  body?: string;
}

export class PullRequestController {
  private current: PullRequestRecord | null = null;

  constructor(
    private readonly api: PullRequestApi,
    private readonly repository: RepositoryIdentity
  ) {}

  get record(): PullRequestRecord | null {
    return this.current;
  }

  async create(input: CreatePullRequestInput): Promise<PullRequestRecord> {
    if (this.current) {
      throw new PRCreateError(`pull request #${this.current.number} was already created`);
    }

    const failure = `failed to create pull request ${input.head} → ${input.base}`;
    let result: GitHubResult<GitHubPullRequest>;
    try {
      result = await this.api.createPullRequest({
        owner: this.repository.owner,
        repo: this.repository.repo,
        title: input.title,
        body: input.body ?? '',
        head: input.head,
        base: input.base,
      });
    } catch (err) {
      throw new PRCreateError(`${failure}: ${formatError(err)}`, { cause: err });
    }

    if (!result.success) {
      throw new PRCreateError(`${failure}: ${result.error}`);
    }

    this.current = {
      number: result.data.number,
      headSha: result.data.head.sha,
      mergeSha: null,
      url: result.data.html_url,
    };
    logger.info('Created pull request', {
      repository: formatRepository(this.repository),
      number: this.current.number,
      url: this.current.url,
    });
    return this.current;
  }

  async fetch(): Promise<PullRequestState> {
    const record = this.current;
    if (!record) {
      throw new PRFetchError('no pull request has been created');
    }

    let result: GitHubResult<GitHubPullRequest>;
    try {
      result = await this.api.getPullRequest({
        owner: this.repository.owner,
        repo: this.repository.repo,
        pull_number: record.number,
      });
    } catch (err) {
      throw new PRFetchError(`failed to fetch pull request #${record.number}: ${formatError(err)}`, { cause: err });
    }

    if (!result.success) {
      throw new PRFetchError(`failed to fetch pull request #${record.number}: ${result.error}`);
    }

    record.headSha = result.data.head.sha;
    return {
      number: record.number,
      headSha: result.data.head.sha,
      mergeable: result.data.mergeable ?? null,
    };
  }

  async merge(): Promise<string> {
    const state = await this.fetch();
    const record = this.current;
    if (!record) {
      throw new PRFetchError('no pull request has been created');
    }

    if (state.mergeable !== true) {
      throw new NotMergeableError(`pull request #${state.number} is not mergeable`, state.mergeable);
    }

    let result: GitHubResult<GitHubMergeResult>;
    try {
      //NOTE: Pinning the head sha makes GitHub refuse the merge if the branch moved after fetch
      result = await this.api.mergePullRequest({
        owner: this.repository.owner,
        repo: this.repository.repo,
        pull_number: state.number,
        sha: state.headSha,
        merge_method: MERGE_METHOD,
      });
    } catch (err) {
      throw new MergeError(`failed to merge pull request #${state.number}: ${formatError(err)}`, { cause: err });
    }

    if (!result.success) {
      throw new MergeError(`failed to merge pull request #${state.number}: ${result.error}`);
    }
    if (!result.data.merged) {
      throw new MergeError(`pull request #${state.number} was not merged: ${result.data.message}`);
    }

    record.mergeSha = result.data.sha;
    logger.info('Merged pull request', { number: state.number, mergeSha: record.mergeSha });
    return record.mergeSha;
  }
}
