import { getAuthHeaders } from '@adapters/github/authenticate.js';
import type {
  GitHubClient,
  GitHubMergeMethod,
  GitHubMergeResult,
  GitHubResult,
} from '@adapters/github/types.js';
import { MergeResultSchema, parseResponse } from '@common/schemas.js';
import { githubFetch } from './rate-limit.js';
import { readErrorMessage } from './response.js';

export interface MergePullRequestParams {
  owner: string;
  repo: string;
  pull_number: number;
  //NOTE: When set, GitHub refuses the merge (409) if the head moved since it was fetched
  sha?: string;
  merge_method?: GitHubMergeMethod;
}

export async function mergePullRequest(
  client: GitHubClient,
  params: MergePullRequestParams
): Promise<GitHubResult<GitHubMergeResult>> {
  try {
    const response = await githubFetch(
      `${client.apiUrl}/repos/${params.owner}/${params.repo}/pulls/${params.pull_number}/merge`,
      {
        method: 'PUT',
        headers: getAuthHeaders(client.auth),
        body: JSON.stringify({
          sha: params.sha,
          merge_method: params.merge_method || 'merge',
        }),
        signal: client.signal,
      }
    );

    if (!response.ok) {
      const error = await readErrorMessage(response, `Failed to merge pull request: ${response.status}`);
      return { success: false, error, status: response.status };
    }

    return parseResponse(MergeResultSchema, await response.json(), 'merge');
  } catch (error) {
    return { success: false, error: String(error) };
  }
}
