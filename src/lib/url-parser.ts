import type { ParsedRemoteUrl } from '../types/index.js';

function stripGitSuffix(segment: string): string {
  return segment.endsWith('.git') ? segment.slice(0, -4) : segment;
}

/**
 * Parse a remote URL (SSH or HTTPS) into its components
 *
 * Supports:
 * - SSH: git@github.com:owner/repo.git
 * - HTTPS: https://github.com/owner/repo.git
 * - HTTPS without .git: https://github.com/owner/repo
 */
export function parseRemoteUrl(url: string): ParsedRemoteUrl {
  const trimmed = url.trim();

  // SSH format: git@host:owner/repo.git
  const sshMatch = trimmed.match(/^git@([^:/\s]+):([^\s]+)$/);
  if (sshMatch) {
    const [, host, rawPath] = sshMatch;
    const segments = rawPath.split(/[?#]/)[0].split('/').filter(Boolean);

    if (segments.length !== 2) {
      throw new Error(`expected git@host:owner/repo, got ${trimmed}`);
    }

    const owner = segments[0];
    const name = stripGitSuffix(segments[1]);
    if (name.length === 0) {
      throw new Error(`missing repository name in ${trimmed}`);
    }

    return { host, owner, name, httpsUrl: `https://${host}/${owner}/${name}.git` };
  }

  if (!/^https?:\/\//.test(trimmed)) {
    throw new Error(`unsupported scheme in ${trimmed} (use https:// or git@host:owner/repo)`);
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new Error(`could not parse ${trimmed}`);
  }

  const segments = parsed.pathname.split('/').filter(Boolean);
  if (segments.length !== 2) {
    throw new Error(`expected ${parsed.protocol}//host/owner/repo, got ${trimmed}`);
  }

  const owner = segments[0];
  const name = stripGitSuffix(segments[1]);
  if (name.length === 0) {
    throw new Error(`missing repository name in ${trimmed}`);
  }

  return {
    host: parsed.host,
    owner,
    name,
    httpsUrl: `${parsed.protocol}//${parsed.host}/${owner}/${name}.git`,
  };
}

/**
 * Key used to compare two remote URLs for uniqueness.
 * SSH and HTTPS forms of the same repository share a key.
 */
export function remoteUrlKey(url: string): string {
  try {
    const { host, owner, name } = parseRemoteUrl(url);
    return `${host}/${owner}/${name}`.toLowerCase();
  } catch {
    return url.trim().toLowerCase();
  }
}

/**
 * Embed a token in an HTTPS remote URL for authenticated git calls
 */
export function withToken(httpsUrl: string, token: string): string {
  const parsed = new URL(httpsUrl);
  parsed.username = 'x-access-token';
  parsed.password = token;
  return parsed.toString();
}
