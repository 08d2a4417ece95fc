import { getAuthHeaders } from '@adapters/github/authenticate.js';
import type { GitHubClient, GitHubPullRequest, GitHubResult } from '@adapters/github/types.js';
import { PullRequestSchema, parseResponse } from '@common/schemas.js';
import { githubFetch } from './rate-limit.js';
import { readErrorMessage } from './response.js';

export interface GetPullRequestParams {
  owner: string;
  repo: string;
  pull_number: number;
}

export async function getPullRequest(
  client: GitHubClient,
  params: GetPullRequestParams
): Promise<GitHubResult<GitHubPullRequest>> {
  try {
    const response = await githubFetch(
      `${client.apiUrl}/repos/${params.owner}/${params.repo}/pulls/${params.pull_number}`,
      {
        headers: getAuthHeaders(client.auth),
        signal: client.signal,
      }
    );

    if (!response.ok) {
      const error = await readErrorMessage(response, `Failed to get pull request: ${response.status}`);
      return { success: false, error, status: response.status };
    }

    return parseResponse(PullRequestSchema, await response.json(), 'pull request');
  } catch (error) {
    return { success: false, error: String(error) };
  }
}
