//NOTE: Zod runtime validation schemas for GitHub REST response boundaries
//NOTE: Every response body the adapters hand to the domain flows through parseResponse() from here.
//NOTE: Schemas only name the fields the lifecycle reads; unknown fields are dropped.

import { z } from 'zod';

// ─── Pull Request Schema ────────────────────────────────────────────────────

export const PullRequestSchema = z.object({
  id: z.number(),
  number: z.number().int().positive(),
  title: z.string(),
  body: z.string().nullable().optional(),
  state: z.enum(['open', 'closed']),
  html_url: z.string(),
  merged: z.boolean().optional(),
  //NOTE: null while GitHub has not computed mergeability yet
  mergeable: z.boolean().nullable().optional(),
  merge_commit_sha: z.string().nullable().optional(),
  head: z.object({
    ref: z.string(),
    sha: z.string(),
  }),
  base: z.object({
    ref: z.string(),
    sha: z.string(),
  }),
});

export type ValidatedPullRequest = z.infer<typeof PullRequestSchema>;

// ─── Merge Result Schema ────────────────────────────────────────────────────

export const MergeResultSchema = z.object({
  sha: z.string(),
  merged: z.boolean(),
  message: z.string(),
});

export type ValidatedMergeResult = z.infer<typeof MergeResultSchema>;

// ─── Commit Status Schema ───────────────────────────────────────────────────

//NOTE: `state` stays a plain string so unexpected values keep polling instead of failing validation
export const CommitStatusSchema = z.object({
  id: z.number(),
  context: z.string(),
  state: z.string(),
  description: z.string().nullable().optional(),
  target_url: z.string().nullable().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export const CommitStatusListSchema = z.array(CommitStatusSchema);

export type ValidatedCommitStatus = z.infer<typeof CommitStatusSchema>;

// ─── Error Body Schema ──────────────────────────────────────────────────────

export const GitHubErrorSchema = z.object({
  message: z.string(),
  errors: z.array(z.object({ message: z.string().optional() }).passthrough()).optional(),
});

// ─── Helpers ────────────────────────────────────────────────────────────────

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): ParseResult<T> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const issues = result.error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return { success: false, error: `Unexpected ${label} response: ${issues}` };
}

//NOTE: GitHub error bodies put the useful detail in errors[].message (e.g. "No commits between main and x")
export function describeGitHubError(raw: unknown, fallback: string): string {
  const result = GitHubErrorSchema.safeParse(raw);
  if (!result.success) {
    return fallback;
  }
  const details = (result.data.errors ?? [])
    .map(e => e.message)
    .filter((m): m is string => typeof m === 'string' && m.length > 0);
  return details.length > 0 ? `${result.data.message}: ${details.join(', ')}` : result.data.message;
}
