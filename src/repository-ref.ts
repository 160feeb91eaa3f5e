import { InvalidArgumentFormatError } from './errors.js';
import type { RepositoryReference } from './types.js';

export const LATEST_VERSION = 'latest';

/**
 * Parse an `owner/repo[@version]` argument.
 *
 * Accepted forms are `owner/repo` (version "latest"), `owner/repo@latest`
 * and `owner/repo@<tag>`.
 *
 * @throws InvalidArgumentFormatError for any other shape
 */
export function parseRepositoryReference(input: string): RepositoryReference {
  const parts = input.split('@');
  if (parts.length > 2) {
    throw new InvalidArgumentFormatError(input, 'expected owner/repo[@version]');
  }

  const [ownerRepo = '', version] = parts;
  if (version === '') {
    throw new InvalidArgumentFormatError(input, "missing version after '@'");
  }

  const segments = ownerRepo.split('/');
  const [owner = '', repo = ''] = segments;
  if (segments.length !== 2 || owner === '' || repo === '') {
    throw new InvalidArgumentFormatError(input, 'expected owner/repo or owner/repo@version');
  }

  for (const [label, value] of [['owner', owner], ['repo', repo]] as const) {
    if (value.includes('/') || value.includes('@')) {
      throw new InvalidArgumentFormatError(input, `invalid characters in ${label} '${value}'`);
    }
  }

  return { owner, repo, version: version ?? LATEST_VERSION };
}

export function formatRepositoryReference(ref: RepositoryReference): string {
  return `${ref.owner}/${ref.repo}@${ref.version}`;
}
