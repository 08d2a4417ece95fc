import { getAuthHeaders } from '@adapters/github/authenticate.js';
import type { GitHubClient, GitHubPullRequest, GitHubResult } from '@adapters/github/types.js';
import { PullRequestSchema, parseResponse } from '@common/schemas.js';
import { githubFetch } from './rate-limit.js';
import { readErrorMessage } from './response.js';

export interface CreatePullRequestParams {
  owner: string;
  repo: string;
  title: string;
  body?: string;
  head: string;
  base: string;
}

export async function createPullRequest(
  client: GitHubClient,
  params: CreatePullRequestParams
): Promise<GitHubResult<GitHubPullRequest>> {
  try {
    const response = await githubFetch(
      `${client.apiUrl}/repos/${params.owner}/${params.repo}/pulls`,
      {
        method: 'POST',
        headers: getAuthHeaders(client.auth),
        body: JSON.stringify({
          title: params.title,
          body: params.body,
          head: params.head,
          base: params.base,
        }),
        signal: client.signal,
      }
    );

    if (!response.ok) {
      const error = await readErrorMessage(response, `Failed to create pull request: ${response.status}`);
      return { success: false, error, status: response.status };
    }

    return parseResponse(PullRequestSchema, await response.json(), 'pull request');
  } catch (error) {
    return { success: false, error: String(error) };
  }
}
