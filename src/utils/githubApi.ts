import { Octokit } from '@octokit/rest';
import { retry } from '@octokit/plugin-retry';

import { LogLevel, logger } from '../logger';

import { ConfigurationError } from './errors';
import { getPackage } from './version';

/** Default REST API endpoint for github.com */
export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

/**
 * Statuses the retry plugin must leave alone. 403 and 429 are rate limit
 * signals, which are waited out by `withRateLimitRetry`.
 */
const DO_NOT_RETRY_STATUSES = [400, 401, 403, 404, 422, 429];

/**
 * A GitHub repository, identified by owner and name
 */
export interface GitHubRepo {
  /** GitHub owner */
  owner: string;
  /** GitHub repository name */
  repo: string;
}

/**
 * Parses an "owner/repo" identifier
 *
 * @param slug Repository identifier, e.g. "octocat/hello-world"
 * @throws ConfigurationError if the identifier is malformed
 */
export function parseRepository(slug: string): GitHubRepo {
  const parts = slug.trim().split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigurationError(
      `Invalid repository "${slug}": expected the "owner/repo" format.`
    );
  }
  return { owner: parts[0], repo: parts[1] };
}

/**
 * Formats a repository as "owner/repo"
 */
export function formatRepository({ owner, repo }: GitHubRepo): string {
  return `${owner}/${repo}`;
}

/** Options for {@link getGitHubClient} */
export interface GitHubClientOptions {
  /** GitHub authentication token */
  token: string;
  /** REST API base URL, for GitHub Enterprise installations */
  baseUrl?: string;
}

const _GitHubClientCache: Record<string, Octokit> = {};

/**
 * Gets an authenticated GitHub client object
 *
 * Clients are cached per token and base URL.
 *
 * @returns GitHub client
 */
export function getGitHubClient({
  token,
  baseUrl = DEFAULT_GITHUB_API_URL,
}: GitHubClientOptions): Octokit {
  const cacheKey = `${baseUrl}\n${token}`;

  if (!_GitHubClientCache[cacheKey]) {
    // Silence debug logs, as they do not provide any useful information
    // about the requests, yet they are very noisy and make it difficult
    // to track what's going on.
    const log =
      logger.level >= LogLevel.Debug
        ? {
            debug: () => undefined,
            info: (message: string) => logger.debug(message),
            warn: (message: string) => logger.warn(message),
            error: (message: string) => logger.error(message),
          }
        : undefined;

    const { name, version } = getPackage();
    const OctokitWithRetries = Octokit.plugin(retry);
    _GitHubClientCache[cacheKey] = new OctokitWithRetries({
      auth: `token ${token}`,
      baseUrl,
      userAgent: `${name}/${version}`,
      log,
      retry: { doNotRetry: DO_NOT_RETRY_STATUSES },
    });
  }

  return _GitHubClientCache[cacheKey];
}
