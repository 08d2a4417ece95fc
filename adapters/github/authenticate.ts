import type { GitHubAuth, GitHubClient } from '@adapters/github/types.js';
import { DEFAULT_GITHUB_API_URL, GITHUB_API_VERSION } from '@common/config.js';

export function createAuth(username: string, token: string): GitHubAuth {
  return Object.freeze({ username, token });
}

export function createClient(auth: GitHubAuth, apiUrl: string = DEFAULT_GITHUB_API_URL): GitHubClient {
  return { auth, apiUrl: apiUrl.replace(/\/+$/, '') };
}

export function getAuthHeaders(auth: GitHubAuth): Record<string, string> {
  return {
    'Authorization': `Bearer ${auth.token}`,
    'Accept': 'application/vnd.github.v3+json',
    'Content-Type': 'application/json',
    'X-GitHub-Api-Version': GITHUB_API_VERSION,
  };
}

//NOTE: Basic-auth form used by the git transport (username + token as password)
export function getBasicAuthUrl(serverUrl: string, owner: string, repo: string, auth: GitHubAuth): string {
  const url = new URL(`${serverUrl.replace(/\/+$/, '')}/${owner}/${repo}.git`);
  url.username = auth.username;
  url.password = auth.token;
  return url.toString();
}
