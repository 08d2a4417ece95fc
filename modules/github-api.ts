import { createClient } from '@adapters/github/authenticate.js';
import { createPullRequest, type CreatePullRequestParams } from '@adapters/github/create-pull-request.js';
import { getPullRequest, type GetPullRequestParams } from '@adapters/github/get-pull-request.js';
import { listCommitStatuses, type ListCommitStatusesParams } from '@adapters/github/list-commit-statuses.js';
import { mergePullRequest, type MergePullRequestParams } from '@adapters/github/merge-pull-request.js';
import type {
  GitHubAuth,
  GitHubCommitStatus,
  GitHubMergeResult,
  GitHubPullRequest,
  GitHubResult,
} from '@adapters/github/types.js';

/**
 * The pull-request and status calls the lifecycle makes. {@link createGitHubApi}
 * is the REST variant; tests supply in-memory variants.
 */
export interface PullRequestApi {
  createPullRequest(params: CreatePullRequestParams): Promise<GitHubResult<GitHubPullRequest>>;
  getPullRequest(params: GetPullRequestParams): Promise<GitHubResult<GitHubPullRequest>>;
  mergePullRequest(params: MergePullRequestParams): Promise<GitHubResult<GitHubMergeResult>>;
  listCommitStatuses(
    params: ListCommitStatusesParams,
    signal?: AbortSignal
  ): Promise<GitHubResult<GitHubCommitStatus[]>>;
}

export interface GitHubApiOptions {
  auth: GitHubAuth;
  apiUrl?: string;
}

export function createGitHubApi(options: GitHubApiOptions): PullRequestApi {
  const client = createClient(options.auth, options.apiUrl);

  return {
    createPullRequest: params => createPullRequest(client, params),
    getPullRequest: params => getPullRequest(client, params),
    mergePullRequest: params => mergePullRequest(client, params),
    listCommitStatuses: (params, signal) => listCommitStatuses({ ...client, signal }, params),
  };
}
