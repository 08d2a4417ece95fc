import { describe, it, expect } from 'vitest';
import { parseRepository, formatRepository } from '@modules/repository.js';
import { InputValidationError } from '@modules/errors.js';

describe('parseRepository', () => {
  it('splits owner and repository', () => {
    expect(parseRepository('octocat/Hello-World')).toEqual({ owner: 'octocat', repo: 'Hello-World' });
  });

  it('keeps dots and dashes inside components', () => {
    expect(parseRepository('my.org/repo.name-2')).toEqual({ owner: 'my.org', repo: 'repo.name-2' });
  });

  it.each([
    ['no slash', 'octocat'],
    ['two slashes', 'a/b/c'],
    ['empty owner', '/repo'],
    ['empty repository', 'owner/'],
    ['only a slash', '/'],
    ['empty string', ''],
  ])('rejects %s', (_label, input) => {
    expect(() => parseRepository(input)).toThrow(InputValidationError);
  });

  it('reports the offending input', () => {
    expect(() => parseRepository('a/b/c')).toThrow('invalid repository name supplied: "a/b/c"');
  });

  it('returns a frozen identity', () => {
    expect(Object.isFrozen(parseRepository('o/r'))).toBe(true);
  });
});

describe('formatRepository', () => {
  it('joins owner and repository', () => {
    expect(formatRepository({ owner: 'octocat', repo: 'Hello-World' })).toBe('octocat/Hello-World');
  });
});
