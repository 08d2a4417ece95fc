import { createAuth } from '@adapters/github/authenticate.js';
import { DEFAULT_GITHUB_API_URL, DEFAULT_GITHUB_SERVER_URL } from '@common/config.js';
import { formatError } from '@common/strings.js';
import {
  CloneError,
  LifecycleError,
  MergeError,
  PRCreateError,
  PRFetchError,
  PushError,
  StatusTransportError,
  TeardownError,
  isLifecycleError,
} from '@modules/errors.js';
import type { GitBackend } from '@modules/git.js';
import { createGitHubApi, type PullRequestApi } from '@modules/github-api.js';
import { logger } from '@modules/logger.js';
import {
  createLoggingObserver,
  notify,
  type LifecycleObserver,
  type LifecycleState,
} from '@modules/observer.js';
import { PullRequestController, type PullRequestRecord } from '@modules/pull-request.js';
import { parseRepository, type RepositoryIdentity } from '@modules/repository.js';
import { waitForStatus } from '@modules/status-waiter.js';
import { Workspace, type MutateFn } from '@modules/workspace.js';

export interface Credentials {
  readonly username: string;
  readonly token: string;
}

export interface LifecycleOptions {
  //NOTE: <owner>/<repository>
  repository: string;
  credentials: Credentials;
  branch: string;
  base: string;
  title: string;
  body?: string;
  pullRequestContext: string;
  mergeContext: string;
  mutate: MutateFn;
}

export interface LifecycleDependencies {
  git?: GitBackend;
  api?: PullRequestApi;
  observer?: LifecycleObserver;
  baseDir?: string;
  serverUrl?: string;
  apiUrl?: string;
  pollIntervalMs?: number;
  timeoutMs?: number;
}

export type LifecycleOutcome =
  | {
      success: true;
      state: 'merge-status-resolved';
      pullRequest: PullRequestRecord;
      teardownError?: TeardownError;
    }
  | {
      success: false;
      //NOTE: Last state reached before the failure
      state: LifecycleState;
      error: LifecycleError;
      pullRequest: PullRequestRecord | null;
      teardownError?: TeardownError;
    };

type StepErrorClass = new (message: string, options?: { cause?: unknown }) => LifecycleError;

//NOTE: Error class of the step that runs after each state
const NEXT_STEP_ERROR: Record<LifecycleState, StepErrorClass> = {
  'initialized': CloneError,
  'cloned': PushError,
  'branch-pushed': PRCreateError,
  'pr-created': PRFetchError,
  'pr-status-resolved': MergeError,
  'merged': StatusTransportError,
  'merge-status-resolved': StatusTransportError,
};

//NOTE: Anything unexpected thrown mid-run still surfaces as a lifecycle error
function toLifecycleError(err: unknown, state: LifecycleState): LifecycleError {
  if (isLifecycleError(err)) {
    return err;
  }
  const ErrorClass = NEXT_STEP_ERROR[state];
  return new ErrorClass(formatError(err), { cause: err });
}

/**
 * Clone → push branch → open PR → wait for `pullRequestContext` on the head →
 * merge → wait for `mergeContext` on the merge commit. Stops at the first
 * failure; the workspace is removed on every path and a removal failure is
 * reported as `teardownError` rather than replacing the run's result.
 */
export async function runPullRequestLifecycle(
  options: LifecycleOptions,
  dependencies: LifecycleDependencies = {}
): Promise<LifecycleOutcome> {
  const observer = dependencies.observer ?? createLoggingObserver(logger);
  const advance = (next: LifecycleState, detail?: Record<string, unknown>): LifecycleState => {
    notify(observer, { type: 'state', state: next, detail });
    return next;
  };
  let state: LifecycleState = 'initialized';

  //NOTE: Malformed input fails before anything touches the filesystem or network
  let repository: RepositoryIdentity;
  try {
    repository = parseRepository(options.repository);
  } catch (err) {
    return { success: false, state, error: toLifecycleError(err, state), pullRequest: null };
  }

  const auth = createAuth(options.credentials.username, options.credentials.token);
  const api = dependencies.api ?? createGitHubApi({
    auth,
    apiUrl: dependencies.apiUrl ?? DEFAULT_GITHUB_API_URL,
  });
  const pullRequests = new PullRequestController(api, repository);
  let workspace: Workspace;
  try {
    workspace = new Workspace(repository, auth, {
      git: dependencies.git,
      baseDir: dependencies.baseDir,
      serverUrl: dependencies.serverUrl ?? DEFAULT_GITHUB_SERVER_URL,
    });
  } catch (err) {
    const error = new CloneError(`failed to create workspace: ${formatError(err)}`, { cause: err });
    return { success: false, state, error, pullRequest: null };
  }
  const wait = { pollIntervalMs: dependencies.pollIntervalMs, timeoutMs: dependencies.timeoutMs };

  let error: LifecycleError | null = null;
  try {
    await workspace.clone();
    state = advance('cloned', { path: workspace.path });

    const pushed = await workspace.commitAndPush(options.branch, options.mutate);
    state = advance('branch-pushed', { branch: pushed.branch, sha: pushed.sha });

    const created = await pullRequests.create({
      head: options.branch,
      base: options.base,
      title: options.title,
      body: options.body,
    });
    state = advance('pr-created', { number: created.number, url: created.url });

    const { headSha, number } = await pullRequests.fetch();
    notify(observer, { type: 'head-sha', pullNumber: number, sha: headSha });
    await waitForStatus(api, {
      owner: repository.owner,
      repo: repository.repo,
      sha: headSha,
      context: options.pullRequestContext,
      ...wait,
    }, observer);
    state = advance('pr-status-resolved', { context: options.pullRequestContext });

    const mergeSha = await pullRequests.merge();
    state = advance('merged', { sha: mergeSha });

    await waitForStatus(api, {
      owner: repository.owner,
      repo: repository.repo,
      sha: mergeSha,
      context: options.mergeContext,
      ...wait,
    }, observer);
    state = advance('merge-status-resolved', { context: options.mergeContext });
  } catch (err) {
    error = toLifecycleError(err, state);
    logger.error('Pull request lifecycle failed', { state, code: error.code, error: error.message });
  }

  let teardownError: TeardownError | undefined;
  try {
    await workspace.teardown();
  } catch (err) {
    teardownError = err instanceof TeardownError
      ? err
      : new TeardownError(formatError(err), workspace.path, { cause: err });
    notify(observer, { type: 'teardown-failed', path: workspace.path, error: formatError(err) });
  }

  const pullRequest = pullRequests.record;
  const extra = teardownError ? { teardownError } : {};
  if (error) {
    return { success: false, state, error, pullRequest, ...extra };
  }
  if (!pullRequest) {
    return {
      success: false,
      state,
      error: new MergeError('lifecycle finished without a pull request'),
      pullRequest: null,
      ...extra,
    };
  }
  return { success: true, state: 'merge-status-resolved', pullRequest, ...extra };
}
