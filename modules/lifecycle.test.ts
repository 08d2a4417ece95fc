import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

vi.mock('@modules/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return { ...actual, rm: vi.fn(actual.rm) };
});

import { rm } from 'fs/promises';
import { runPullRequestLifecycle, type LifecycleOptions } from '@modules/lifecycle.js';
import {
  InputValidationError,
  MutationError,
  NotMergeableError,
  StatusFailedError,
  StatusTransportError,
  TeardownError,
} from '@modules/errors.js';
import type { LifecycleEvent, LifecycleObserver } from '@modules/observer.js';
import type { MutateFn } from '@modules/workspace.js';
import {
  FakeApi,
  FakeGit,
  HEAD_SHA,
  MERGE_SHA,
  makePullRequest,
  makeStatus,
  type FakeApiOptions,
} from '@modules/testing/fakes.js';

let baseDir: string;
let git: FakeGit;
let events: LifecycleEvent[];
const observer: LifecycleObserver = { onEvent: event => { events.push(event); } };

const writeVersion: MutateFn = (worktree) => {
  fs.writeFileSync(path.join(worktree.path, 'VERSION'), '2.0.0\n');
  return { message: 'Bump version', author: { name: 'Update Bot', email: 'bot@example.com' } };
};

function options(overrides: Partial<LifecycleOptions> = {}): LifecycleOptions {
  return {
    repository: 'octocat/Hello-World',
    credentials: { username: 'update-bot', token: 'test-secret' },
    branch: 'bump-version',
    base: 'main',
    title: 'Bump version',
    body: 'Automated update',
    pullRequestContext: 'ci',
    mergeContext: 'deploy',
    mutate: writeVersion,
    ...overrides,
  };
}

//NOTE: Both checks pass unless a test overrides the feed
function greenApi(overrides: FakeApiOptions = {}): FakeApi {
  return new FakeApi({
    statuses: sha => ({
      success: true,
      data: [sha === MERGE_SHA ? makeStatus('deploy', 'success') : makeStatus('ci', 'success')],
    }),
    ...overrides,
  });
}

function run(api: FakeApi, overrides: Partial<LifecycleOptions> = {}) {
  return runPullRequestLifecycle(options(overrides), {
    git,
    api,
    observer,
    baseDir,
    serverUrl: 'https://github.example.com',
    pollIntervalMs: 5,
    timeoutMs: 1_000,
  });
}

function stateEvents(): string[] {
  return events.flatMap(event => (event.type === 'state' ? [event.state] : []));
}

beforeEach(() => {
  baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lifecycle-test-'));
  git = new FakeGit();
  events = [];
});

afterEach(() => {
  fs.rmSync(baseDir, { recursive: true, force: true });
});

describe('runPullRequestLifecycle', () => {
  it('lands the change and removes the workspace', async () => {
    const api = greenApi();

    const outcome = await run(api);

    expect(outcome).toEqual({
      success: true,
      state: 'merge-status-resolved',
      pullRequest: {
        number: 7,
        headSha: HEAD_SHA,
        mergeSha: MERGE_SHA,
        url: 'https://github.com/octocat/Hello-World/pull/7',
      },
    });
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it('walks every state in order', async () => {
    await run(greenApi());

    expect(stateEvents()).toEqual([
      'cloned',
      'branch-pushed',
      'pr-created',
      'pr-status-resolved',
      'merged',
      'merge-status-resolved',
    ]);
    expect(events).toContainEqual({ type: 'head-sha', pullNumber: 7, sha: HEAD_SHA });
  });

  it('waits on the head for the PR check and on the merge commit for the merge check', async () => {
    const api = greenApi();

    await run(api);

    expect(api.statusRequests.map(request => request.ref)).toEqual([HEAD_SHA, MERGE_SHA]);
    expect(events.filter(event => event.type === 'waiting-for-status')).toEqual([
      { type: 'waiting-for-status', sha: HEAD_SHA, context: 'ci' },
      { type: 'waiting-for-status', sha: MERGE_SHA, context: 'deploy' },
    ]);
  });

  it('opens the pull request from the pushed branch', async () => {
    const api = greenApi();

    await run(api);

    expect(git.pushes).toEqual([
      { remote: 'origin', branch: 'bump-version', auth: { username: 'update-bot', token: 'test-secret' } },
    ]);
    expect(api.created).toEqual([
      {
        owner: 'octocat',
        repo: 'Hello-World',
        title: 'Bump version',
        body: 'Automated update',
        head: 'bump-version',
        base: 'main',
      },
    ]);
  });

  it('rejects a malformed repository before touching anything', async () => {
    const api = greenApi();

    const outcome = await run(api, { repository: 'octocat' });

    expect(outcome.success).toBe(false);
    expect(outcome.state).toBe('initialized');
    expect(!outcome.success && outcome.error).toBeInstanceOf(InputValidationError);
    expect(outcome.pullRequest).toBeNull();
    expect(git.calls).toEqual([]);
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it('stops after clone when the mutation fails', async () => {
    const api = greenApi();

    const outcome = await run(api, {
      mutate: () => { throw new Error('template rendering failed'); },
    });

    expect(outcome).toMatchObject({ success: false, state: 'cloned', pullRequest: null });
    expect(!outcome.success && outcome.error).toBeInstanceOf(MutationError);
    expect(git.pushes).toEqual([]);
    expect(api.created).toEqual([]);
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it('does not merge when the PR check fails', async () => {
    const api = greenApi({
      statuses: () => ({ success: true, data: [makeStatus('ci', 'failure')] }),
    });

    const outcome = await run(api);

    expect(outcome).toMatchObject({
      success: false,
      state: 'pr-created',
      pullRequest: { number: 7, mergeSha: null },
    });
    expect(!outcome.success && outcome.error).toBeInstanceOf(StatusFailedError);
    expect(api.merged).toEqual([]);
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it('fails with NotMergeableError when GitHub reports a conflict', async () => {
    const api = greenApi({
      getResult: { success: true, data: makePullRequest({ mergeable: false }) },
    });

    const outcome = await run(api);

    expect(outcome).toMatchObject({ success: false, state: 'pr-status-resolved' });
    expect(!outcome.success && outcome.error).toBeInstanceOf(NotMergeableError);
    expect(api.merged).toEqual([]);
  });

  it('reports a failed merge check after the merge has landed', async () => {
    const api = greenApi({
      statuses: sha => ({
        success: true,
        data: [sha === MERGE_SHA ? makeStatus('deploy', 'error') : makeStatus('ci', 'success')],
      }),
    });

    const outcome = await run(api);

    expect(outcome).toMatchObject({
      success: false,
      state: 'merged',
      pullRequest: { mergeSha: MERGE_SHA },
    });
    expect(!outcome.success && outcome.error).toMatchObject({ name: 'StatusFailedError', context: 'deploy' });
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it('reports a rejected status request as a status transport failure', async () => {
    const api = greenApi({ rejections: { listCommitStatuses: new TypeError('fetch failed') } });

    const outcome = await run(api);

    expect(outcome).toMatchObject({ success: false, state: 'pr-created' });
    expect(!outcome.success && outcome.error).toBeInstanceOf(StatusTransportError);
    expect(api.merged).toEqual([]);
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it('reports a rejected create as a pull request creation failure', async () => {
    const api = greenApi({ rejections: { createPullRequest: new TypeError('fetch failed') } });

    const outcome = await run(api);

    expect(outcome).toMatchObject({ success: false, state: 'branch-pushed', pullRequest: null });
    expect(!outcome.success && outcome.error).toMatchObject({
      name: 'PRCreateError',
      message: 'failed to create pull request bump-version → main: fetch failed',
    });
  });

  it('attaches a teardown failure without changing the result', async () => {
    vi.mocked(rm).mockRejectedValueOnce(new Error('EBUSY: resource busy or locked'));

    const outcome = await run(greenApi());

    expect(outcome.success).toBe(true);
    expect(outcome.state).toBe('merge-status-resolved');
    expect(outcome.teardownError).toBeInstanceOf(TeardownError);
    expect(outcome.teardownError?.message).toContain('EBUSY: resource busy or locked');
    expect(events.filter(event => event.type === 'teardown-failed')).toHaveLength(1);
  });

  it('keeps the original failure when teardown also fails', async () => {
    vi.mocked(rm).mockRejectedValueOnce(new Error('EACCES: permission denied'));

    const outcome = await run(greenApi(), {
      mutate: () => { throw new Error('template rendering failed'); },
    });

    expect(!outcome.success && outcome.error).toBeInstanceOf(MutationError);
    expect(outcome.teardownError).toBeInstanceOf(TeardownError);
  });

  it('ignores an observer that throws', async () => {
    const outcome = await runPullRequestLifecycle(options(), {
      git,
      api: greenApi(),
      observer: { onEvent: () => { throw new Error('display closed'); } },
      baseDir,
      serverUrl: 'https://github.example.com',
      pollIntervalMs: 5,
      timeoutMs: 1_000,
    });

    expect(outcome.success).toBe(true);
  });
});
