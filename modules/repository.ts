import { InputValidationError } from '@modules/errors.js';

export interface RepositoryIdentity {
  readonly owner: string;
  readonly repo: string;
}

//NOTE: <owner>/<repository>: exactly one slash, both sides non-empty
const REPOSITORY_PATTERN = /^([^/]+)\/([^/]+)$/;

export function parseRepository(input: string): RepositoryIdentity {
  const match = REPOSITORY_PATTERN.exec(input);
  if (!match) {
    throw new InputValidationError(`invalid repository name supplied: "${input}" (expected <owner>/<repository>)`);
  }
  const [, owner, repo] = match;
  return Object.freeze({ owner, repo });
}

export function formatRepository(identity: RepositoryIdentity): string {
  return `${identity.owner}/${identity.repo}`;
}
