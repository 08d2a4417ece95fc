import type {
  ValidatedCommitStatus,
  ValidatedMergeResult,
  ValidatedPullRequest,
} from '@common/schemas.js';

export interface GitHubAuth {
  readonly username: string;
  readonly token: string;
}

//NOTE: Everything an adapter needs to reach one GitHub installation
export interface GitHubClient {
  auth: GitHubAuth;
  apiUrl: string;
  signal?: AbortSignal;
}

export type GitHubPullRequest = ValidatedPullRequest;

export type GitHubMergeResult = ValidatedMergeResult;

export type GitHubCommitStatus = ValidatedCommitStatus;

export type GitHubMergeMethod = 'merge' | 'squash' | 'rebase';

export type GitHubResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; status?: number };
