import { logger } from '@modules/logger.js';
import { GITHUB_LOW_BUDGET_THRESHOLD, GITHUB_MAX_RETRY_AFTER_S } from '@common/config.js';

// Module-level singleton state, shared by every client in the process
let rateLimitRemaining = 5000;
let rateLimitReset = 0;       // Unix epoch seconds
let rateLimitLimit = 5000;

function readRateLimitHeaders(response: Response): void {
  const remaining = response.headers.get('x-ratelimit-remaining');
  const reset = response.headers.get('x-ratelimit-reset');
  const limit = response.headers.get('x-ratelimit-limit');

  if (remaining !== null) rateLimitRemaining = parseInt(remaining, 10);
  if (reset !== null) rateLimitReset = parseInt(reset, 10);
  if (limit !== null) rateLimitLimit = parseInt(limit, 10);
}

function sleep(ms: number, signal?: AbortSignal | null): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

function retryAfterSeconds(response: Response): number {
  const retryAfter = response.headers.get('retry-after');
  const parsed = retryAfter ? parseInt(retryAfter, 10) : NaN;
  return Number.isNaN(parsed) ? 60 : parsed;
}

async function retryOnce(
  url: string | URL,
  options: RequestInit | undefined,
  retrySeconds: number
): Promise<Response> {
  await sleep(retrySeconds * 1000, options?.signal);
  const retryResponse = await fetch(url, options);
  readRateLimitHeaders(retryResponse);
  return retryResponse;
}

export async function githubFetch(url: string | URL, options?: RequestInit): Promise<Response> {
  // Pre-request budget check
  if (rateLimitRemaining < GITHUB_LOW_BUDGET_THRESHOLD && rateLimitReset * 1000 > Date.now()) {
    const resetDate = new Date(rateLimitReset * 1000);
    logger.warn('GitHub rate limit low, returning synthetic 503', {
      remaining: rateLimitRemaining,
      resetAt: resetDate.toISOString(),
    });
    return new Response(JSON.stringify({ message: 'Rate limit budget low, skipping request' }), {
      status: 503,
      statusText: 'Service Unavailable (rate limit budget low)',
      headers: { 'Content-Type': 'application/json' },
    });
  }

  const response = await fetch(url, options);

  // Read rate limit headers from every response
  readRateLimitHeaders(response);

  // 429 Too Many Requests, or 403 with an exhausted budget
  const limited = response.status === 429 || (response.status === 403 && rateLimitRemaining === 0);
  if (!limited) {
    return response;
  }

  const retrySeconds = retryAfterSeconds(response);
  if (retrySeconds <= GITHUB_MAX_RETRY_AFTER_S) {
    logger.warn('GitHub rate limited, short retry', { status: response.status, retrySeconds });
    return retryOnce(url, options, retrySeconds);
  }

  logger.warn('GitHub rate limited, retry-after too long, returning as-is', {
    status: response.status,
    retrySeconds,
  });
  return response;
}

export function getGitHubRateLimitStatus(): { remaining: number; limit: number; resetAt: Date } {
  return {
    remaining: rateLimitRemaining,
    limit: rateLimitLimit,
    resetAt: new Date(rateLimitReset * 1000),
  };
}

export function _resetRateLimitForTesting(): void {
  rateLimitRemaining = 5000;
  rateLimitReset = 0;
  rateLimitLimit = 5000;
}
