import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
dotenvConfig();

import { DEFAULT_BASE_BRANCH, DEFAULT_STATUS_CONTEXT } from '@common/config.js';
import { getConfig, ConfigError, type Config } from '@modules/config.js';
import { initLogger, logger } from '@modules/logger.js';
import { runPullRequestLifecycle } from '@modules/lifecycle.js';
import type { MutateFn } from '@modules/workspace.js';

const USAGE = `Usage: pr-autoland <owner/repo> --branch <name> --overlay <dir> [options]

Options:
  --base <branch>           Branch to merge into (default: ${DEFAULT_BASE_BRANCH})
  --title <text>            Pull request title (default: the commit message)
  --body <text>             Pull request body
  --message <text>          Commit message (default: "Update files from <dir>")
  --pr-context <name>       Status check to wait for on the PR head (default: ${DEFAULT_STATUS_CONTEXT})
  --merge-context <name>    Status check to wait for on the merge commit (default: --pr-context)
`;

interface CliArgs {
  repository: string;
  branch: string;
  overlay: string;
  base: string;
  title?: string;
  body: string;
  message?: string;
  prContext: string;
  mergeContext?: string;
}

//NOTE: Parse command line arguments
export function parseArgs(argv: string[]): CliArgs | { error: string } {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      return { error: `Missing value for ${arg}` };
    }
    flags.set(arg.slice(2), value);
    i++;
  }

  if (positional.length !== 1) {
    return { error: 'Expected exactly one <owner/repo> argument' };
  }
  const branch = flags.get('branch');
  const overlay = flags.get('overlay');
  if (!branch) return { error: 'Missing --branch' };
  if (!overlay) return { error: 'Missing --overlay' };

  return {
    repository: positional[0],
    branch,
    overlay: path.resolve(overlay),
    base: flags.get('base') ?? DEFAULT_BASE_BRANCH,
    title: flags.get('title'),
    body: flags.get('body') ?? '',
    message: flags.get('message'),
    prContext: flags.get('pr-context') ?? DEFAULT_STATUS_CONTEXT,
    mergeContext: flags.get('merge-context'),
  };
}

//NOTE: Copies the overlay directory over the worktree, skipping any .git directory it contains
export function overlayDirectory(
  source: string,
  message: string,
  author: { name: string; email: string }
): MutateFn {
  return (worktree) => {
    if (!fs.existsSync(source) || !fs.statSync(source).isDirectory()) {
      throw new Error(`Overlay directory not found: ${source}`);
    }
    fs.cpSync(source, worktree.path, {
      recursive: true,
      force: true,
      filter: (src) => path.basename(src) !== '.git',
    });
    return { message, author };
  };
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if ('error' in args) {
    console.error(`${args.error}\n\n${USAGE}`);
    return 2;
  }

  let config: Config;
  try {
    config = getConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 2;
    }
    throw err;
  }

  initLogger({
    logDir: config.paths.logs ?? undefined,
    level: config.logLevel,
    secrets: [config.github.token],
  });

  const message = args.message ?? `Update files from ${path.basename(args.overlay)}`;
  const outcome = await runPullRequestLifecycle(
    {
      repository: args.repository,
      credentials: { username: config.github.username, token: config.github.token },
      branch: args.branch,
      base: args.base,
      title: args.title ?? message,
      body: args.body,
      pullRequestContext: args.prContext,
      mergeContext: args.mergeContext ?? args.prContext,
      mutate: overlayDirectory(args.overlay, message, config.author),
    },
    {
      baseDir: config.paths.workspaces,
      serverUrl: config.github.serverUrl,
      apiUrl: config.github.apiUrl,
      pollIntervalMs: config.status.pollIntervalMs,
      timeoutMs: config.status.timeoutMs,
    }
  );

  if (outcome.teardownError) {
    logger.warn('Workspace cleanup failed', { error: outcome.teardownError.message });
  }

  if (!outcome.success) {
    console.error(`✗ ${outcome.error.code}: ${outcome.error.message}`);
    return 1;
  }

  console.log(`✓ Merged #${outcome.pullRequest.number} as ${outcome.pullRequest.mergeSha}`);
  return 0;
}

const isEntryPoint = process.argv[1] !== undefined &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  main()
    .then((code) => { process.exitCode = code; })
    .catch((err: unknown) => {
      logger.error('Fatal error', { error: String(err) });
      process.exitCode = 1;
    });
}
