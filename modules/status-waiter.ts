import { STATUS_PAGE_SIZE, STATUS_POLL_INTERVAL_MS, STATUS_TIMEOUT_MS } from '@common/config.js';
import type { GitHubCommitStatus, GitHubResult } from '@adapters/github/types.js';
import { formatError } from '@common/strings.js';
import {
  StatusCancelledError,
  StatusFailedError,
  StatusTimeoutError,
  StatusTransportError,
} from '@modules/errors.js';
import type { PullRequestApi } from '@modules/github-api.js';
import { logger } from '@modules/logger.js';
import { notify, silentObserver, type LifecycleObserver } from '@modules/observer.js';

export type StatusVerdict = 'pending' | 'success' | 'failure' | 'error' | 'timed-out';

export interface WaitForStatusParams {
  owner: string;
  repo: string;
  sha: string;
  context: string;
  pollIntervalMs?: number;
  timeoutMs?: number;
  //NOTE: Aborting from outside ends the wait with StatusCancelledError
  signal?: AbortSignal;
}

//NOTE: 'timed-out' is never reported by GitHub; it is produced locally by the deadline
export function classifyStatus(state: string): Exclude<StatusVerdict, 'timed-out'> {
  switch (state) {
    case 'success':
    case 'failure':
    case 'error':
      return state;
    default:
      return 'pending';
  }
}

//NOTE: First entry in page order wins; GitHub lists newest first, so this is the latest report
export function findStatus(
  statuses: ReadonlyArray<GitHubCommitStatus>,
  context: string
): GitHubCommitStatus | undefined {
  return statuses.find(status => status.context === context);
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

type PollOutcome = { kind: 'success' } | { kind: 'cancelled' };

async function pollUntilTerminal(
  api: PullRequestApi,
  params: WaitForStatusParams,
  pollIntervalMs: number,
  signal: AbortSignal,
  observer: LifecycleObserver
): Promise<PollOutcome> {
  while (!signal.aborted) {
    await sleep(pollIntervalMs, signal);
    if (signal.aborted) break;

    let result: GitHubResult<GitHubCommitStatus[]>;
    try {
      result = await api.listCommitStatuses(
        { owner: params.owner, repo: params.repo, ref: params.sha, per_page: STATUS_PAGE_SIZE, page: 1 },
        signal
      );
    } catch (err) {
      if (signal.aborted) break;
      throw new StatusTransportError(`failed to list statuses for ${params.sha}: ${formatError(err)}`, { cause: err });
    }
    //NOTE: A request cut short by cancellation is not a transport failure
    if (signal.aborted) break;

    if (!result.success) {
      throw new StatusTransportError(
        `failed to list statuses for ${params.sha}: ${result.error}`
      );
    }

    const match = findStatus(result.data, params.context);
    const verdict = match ? classifyStatus(match.state) : 'missing';
    notify(observer, { type: 'status-poll', sha: params.sha, context: params.context, verdict });

    if (verdict === 'success') {
      return { kind: 'success' };
    }
    if (verdict === 'failure' || verdict === 'error') {
      throw new StatusFailedError(
        `status check ${params.context} on ${params.sha} is in a ${verdict} state, aborting`,
        params.context,
        verdict
      );
    }
  }
  return { kind: 'cancelled' };
}

/**
 * Polls the statuses of `sha` until the check named `context` reaches a terminal
 * state or the deadline passes. Resolves on success; rejects with
 * StatusFailedError, StatusTransportError, StatusTimeoutError or
 * StatusCancelledError. The polling task is always stopped before this settles.
 */
export async function waitForStatus(
  api: PullRequestApi,
  params: WaitForStatusParams,
  observer: LifecycleObserver = silentObserver
): Promise<void> {
  const pollIntervalMs = params.pollIntervalMs ?? STATUS_POLL_INTERVAL_MS;
  const timeoutMs = params.timeoutMs ?? STATUS_TIMEOUT_MS;

  if (params.signal?.aborted) {
    throw new StatusCancelledError(`wait for ${params.context} on ${params.sha} was cancelled`);
  }

  const controller = new AbortController();
  const onExternalAbort = (): void => controller.abort();
  params.signal?.addEventListener('abort', onExternalAbort, { once: true });

  let deadlineTimer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<'timed-out'>(resolve => {
    deadlineTimer = setTimeout(() => resolve('timed-out'), timeoutMs);
  });

  notify(observer, { type: 'waiting-for-status', sha: params.sha, context: params.context });

  const poller = pollUntilTerminal(api, params, pollIntervalMs, controller.signal, observer);

  try {
    const winner = await Promise.race([poller, deadline]);

    if (winner === 'timed-out') {
      notify(observer, { type: 'status-poll', sha: params.sha, context: params.context, verdict: 'timed-out' });
      throw new StatusTimeoutError(
        `timed out after ${timeoutMs}ms waiting for ${params.context} on ${params.sha}`,
        params.context,
        timeoutMs
      );
    }
    if (winner.kind === 'cancelled') {
      throw new StatusCancelledError(`wait for ${params.context} on ${params.sha} was cancelled`);
    }
    logger.info('Status check succeeded', { sha: params.sha, context: params.context });
  } finally {
    clearTimeout(deadlineTimer);
    params.signal?.removeEventListener('abort', onExternalAbort);
    controller.abort();
    //NOTE: Wait for the poller to observe the abort so no request outlives the call
    await poller.catch((err: unknown) => {
      logger.debug('Status poller settled after wait ended', { error: String(err) });
    });
  }
}
