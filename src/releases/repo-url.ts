import { ParseError } from '../common/errors.js';
import type { RepoCoordinates } from '../common/types.js';

const GIT_SUFFIX_RE = /\.git$/i;

/**
 * Parse `https://<host>/<owner>/<name>` into owner/name.
 * Trailing slashes and a `.git` suffix are stripped; extra path segments
 * such as `/tree/main` are ignored.
 */
export function parseRepositoryUrl(input: string, host = 'github.com'): RepoCoordinates {
  const raw = (input ?? '').trim();
  if (!raw) throw new ParseError('Repository URL is required');

  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ParseError(`Invalid repository URL: ${raw}`);
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ParseError(`Unsupported URL scheme "${url.protocol}" in ${raw}`);
  }
  if (url.hostname.toLowerCase() !== host.toLowerCase()) {
    throw new ParseError(`Expected a ${host} repository URL, got host "${url.hostname}"`);
  }

  const parts = url.pathname.split('/').filter(Boolean);
  if (parts.length < 2) {
    throw new ParseError(`Repository URL must look like https://${host}/<owner>/<name>: ${raw}`);
  }

  const owner = parts[0];
  const name = parts[1].replace(GIT_SUFFIX_RE, '');
  if (!name) throw new ParseError(`Repository name is empty in ${raw}`);

  return { owner, name };
}
