import { getBasicAuthUrl } from '@adapters/github/authenticate.js';
import type { GitHubAuth, GitHubResult } from '@adapters/github/types.js';
import { execFileCommand } from '@modules/exec.js';

export interface CloneRepositoryParams {
  serverUrl: string;
  owner: string;
  repo: string;
  targetDir: string;
  auth: GitHubAuth;
  depth?: number;
}

export interface CloneRepositoryResponse {
  path: string;
}

//NOTE: Validate git-safe string (owner and repo end up in a URL path)
function isValidGitParam(value: string): boolean {
  return /^[a-zA-Z0-9_.\-]+$/.test(value) && value !== '.' && value !== '..';
}

export async function cloneRepository(
  params: CloneRepositoryParams
): Promise<GitHubResult<CloneRepositoryResponse>> {
  if (!isValidGitParam(params.owner)) {
    return { success: false, error: `Invalid owner: ${params.owner}` };
  }
  if (!isValidGitParam(params.repo)) {
    return { success: false, error: `Invalid repo: ${params.repo}` };
  }

  //NOTE: Credentials ride in the origin URL so the later push authenticates the same way
  const cloneUrl = getBasicAuthUrl(params.serverUrl, params.owner, params.repo, params.auth);

  const args: string[] = ['clone'];
  if (params.depth) {
    args.push('--depth', String(params.depth));
  }
  args.push('--', cloneUrl, params.targetDir);

  const result = await execFileCommand('git', args, {
    env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    secrets: [params.auth.token],
  });

  if (!result.success) {
    return { success: false, error: result.error ?? 'git clone failed' };
  }

  return { success: true, data: { path: params.targetDir } };
}
