import type { GitHubAuth, GitHubResult } from '@adapters/github/types.js';
import { execFileCommand } from '@modules/exec.js';

export interface PushBranchParams {
  workspacePath: string;
  remote: string;
  branch: string;
  auth: GitHubAuth;
}

export interface PushBranchResponse {
  ref: string;
}

//NOTE: Pushes exactly one ref; the origin URL already carries the credentials from the clone
export async function pushBranch(
  params: PushBranchParams
): Promise<GitHubResult<PushBranchResponse>> {
  const ref = `refs/heads/${params.branch}`;

  const result = await execFileCommand('git', ['push', '--porcelain', params.remote, `${ref}:${ref}`], {
    cwd: params.workspacePath,
    env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    secrets: [params.auth.token],
  });

  if (!result.success) {
    return { success: false, error: result.error ?? 'git push failed' };
  }

  return { success: true, data: { ref } };
}
