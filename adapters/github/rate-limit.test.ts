import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@modules/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import {
  _resetRateLimitForTesting,
  getGitHubRateLimitStatus,
  githubFetch,
} from '@adapters/github/rate-limit.js';

const URL_UNDER_TEST = 'https://api.github.example.com/repos/octocat/Hello-World/pulls/1';

let responses: Response[];
let calls: number;

function respond(status: number, headers: Record<string, string> = {}): void {
  responses.push(new Response(JSON.stringify({ message: `status ${status}` }), { status, headers }));
}

async function fakeFetch(): Promise<Response> {
  calls += 1;
  const next = responses.shift();
  if (!next) {
    throw new TypeError('fetch failed');
  }
  return next;
}

beforeEach(() => {
  responses = [];
  calls = 0;
  _resetRateLimitForTesting();
  vi.stubGlobal('fetch', fakeFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('githubFetch', () => {
  it('records the budget from response headers', async () => {
    respond(200, {
      'x-ratelimit-remaining': '4321',
      'x-ratelimit-limit': '5000',
      'x-ratelimit-reset': '1700000000',
    });

    const response = await githubFetch(URL_UNDER_TEST);

    expect(response.status).toBe(200);
    expect(getGitHubRateLimitStatus()).toEqual({
      remaining: 4321,
      limit: 5000,
      resetAt: new Date(1_700_000_000_000),
    });
  });

  it('answers with a synthetic 503 while the budget is nearly spent', async () => {
    const reset = String(Math.floor(Date.now() / 1000) + 600);
    respond(200, { 'x-ratelimit-remaining': '3', 'x-ratelimit-reset': reset });
    await githubFetch(URL_UNDER_TEST);

    const response = await githubFetch(URL_UNDER_TEST);

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ message: 'Rate limit budget low, skipping request' });
    expect(calls).toBe(1);
  });

  it('sends requests again once the reset time has passed', async () => {
    const reset = String(Math.floor(Date.now() / 1000) - 1);
    respond(200, { 'x-ratelimit-remaining': '3', 'x-ratelimit-reset': reset });
    respond(200);
    await githubFetch(URL_UNDER_TEST);

    const response = await githubFetch(URL_UNDER_TEST);

    expect(response.status).toBe(200);
    expect(calls).toBe(2);
  });

  it('retries a 429 once after a short retry-after', async () => {
    respond(429, { 'retry-after': '0' });
    respond(200);

    const response = await githubFetch(URL_UNDER_TEST);

    expect(response.status).toBe(200);
    expect(calls).toBe(2);
  });

  it('retries a 403 only when the budget is exhausted', async () => {
    respond(403, { 'x-ratelimit-remaining': '0', 'retry-after': '0' });
    respond(200);
    expect((await githubFetch(URL_UNDER_TEST)).status).toBe(200);
    expect(calls).toBe(2);

    _resetRateLimitForTesting();
    calls = 0;
    respond(403, { 'x-ratelimit-remaining': '4000' });
    expect((await githubFetch(URL_UNDER_TEST)).status).toBe(403);
    expect(calls).toBe(1);
  });

  it('hands back a 429 whose retry-after is too long', async () => {
    respond(429, { 'retry-after': '120' });

    const response = await githubFetch(URL_UNDER_TEST);

    expect(response.status).toBe(429);
    expect(calls).toBe(1);
  });
});
