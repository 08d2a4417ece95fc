//NOTE: Tunable constants for the pull-request lifecycle in one place.
//NOTE: Environment overrides are read in modules/config.ts; these are the defaults.

// ─── GitHub Endpoints ────────────────────────────────────────────────────────

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';
export const DEFAULT_GITHUB_SERVER_URL = 'https://github.com';
export const GITHUB_API_VERSION = '2022-11-28';

// ─── Status Polling ──────────────────────────────────────────────────────────

export const STATUS_POLL_INTERVAL_MS = 2_000; // 2s between status page requests
export const STATUS_TIMEOUT_MS = 60 * 60 * 1000; // 60m before giving up on a check
export const STATUS_PAGE_SIZE = 20; // only the most recent page is inspected

// ─── Rate Limiting (API-level) ───────────────────────────────────────────────

export const GITHUB_LOW_BUDGET_THRESHOLD = 10;
export const GITHUB_MAX_RETRY_AFTER_S = 30; // longer waits are returned to the caller as-is

// ─── Workspace ───────────────────────────────────────────────────────────────

export const CLONE_DEPTH = 1;
export const WORKSPACE_DIR_PREFIX = 'repo_';
export const ORIGIN_REMOTE = 'origin';

// ─── Pull Request Defaults ───────────────────────────────────────────────────

export const DEFAULT_BASE_BRANCH = 'main';
export const DEFAULT_STATUS_CONTEXT = 'ci';
export const MERGE_METHOD = 'merge';
