import { getAuthHeaders } from '@adapters/github/authenticate.js';
import type { GitHubClient, GitHubCommitStatus, GitHubResult } from '@adapters/github/types.js';
import { CommitStatusListSchema, parseResponse } from '@common/schemas.js';
import { STATUS_PAGE_SIZE } from '@common/config.js';
import { githubFetch } from './rate-limit.js';
import { readErrorMessage } from './response.js';

export interface ListCommitStatusesParams {
  owner: string;
  repo: string;
  ref: string;
  per_page?: number;
  page?: number;
}

//NOTE: GitHub returns statuses newest first, so page 1 holds the latest entry for every context
export async function listCommitStatuses(
  client: GitHubClient,
  params: ListCommitStatusesParams
): Promise<GitHubResult<GitHubCommitStatus[]>> {
  const query = new URLSearchParams({
    per_page: String(params.per_page ?? STATUS_PAGE_SIZE),
    page: String(params.page ?? 1),
  });

  try {
    const response = await githubFetch(
      `${client.apiUrl}/repos/${params.owner}/${params.repo}/commits/${encodeURIComponent(params.ref)}/statuses?${query}`,
      {
        headers: getAuthHeaders(client.auth),
        signal: client.signal,
      }
    );

    if (!response.ok) {
      const error = await readErrorMessage(response, `Failed to list commit statuses: ${response.status}`);
      return { success: false, error, status: response.status };
    }

    return parseResponse(CommitStatusListSchema, await response.json(), 'commit status');
  } catch (error) {
    return { success: false, error: String(error) };
  }
}
