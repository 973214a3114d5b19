import { Octokit } from '@octokit/rest';

import { logger } from '../logger';

import { formatLogin, parseCoAuthors } from './coAuthors';
import { hasStatus } from './errors';
import { formatRepository, GitHubRepo } from './githubApi';
import { parseRateLimitRetries, withRateLimitRetry } from './rateLimit';

/**
 * Words in a PR title that mark it as a release PR (version bumps and
 * changelog updates) rather than the PR that introduced a change
 */
export const RELEASE_PR_KEYWORDS = [
  'release',
  'changeset',
  'version bump',
  'bump version',
];

/** Matches the first PR reference in a commit message, e.g. "(#1234)" */
const PR_REFERENCE_REGEX = /#(\d+)/;

/** Number of search results to look through for the original PR */
const SEARCH_RESULTS_LIMIT = 30;

/**
 * Commit details needed for release notes
 */
export interface CommitInfo {
  /** Commit hash as given in the changeset */
  hash: string;
  /** "@login" of the linked GitHub account, else the git author name */
  author?: string;
  /** Identities from "Co-authored-by" trailers, in message order */
  coAuthors: string[];
  /** Full commit message */
  message: string;
}

/**
 * Pull request details needed for release notes
 */
export interface PullRequestInfo {
  number: number;
  title: string;
  body: string | null;
  /** "@login" of the PR author */
  author?: string;
}

/**
 * A commit with the pull request it was resolved to, if any
 */
export interface ResolvedCommit {
  commit: CommitInfo;
  pullRequest: PullRequestInfo | null;
}

/** Options for {@link PullRequestResolver} */
export interface PullRequestResolverOptions {
  /** Maximum number of rate limit retries per commit, unlimited by default */
  maxRateLimitRetries?: number;
}

/**
 * Checks if a PR title looks like a release PR
 *
 * This is a keyword heuristic and can misclassify PRs that merely mention
 * a release.
 */
export function isReleasePullRequest(title: string): boolean {
  const normalized = title.toLowerCase();
  return RELEASE_PR_KEYWORDS.some(keyword => normalized.includes(keyword));
}

/**
 * Finds the pull requests that introduced commits
 *
 * Release tooling often merges a single "release" PR that contains many
 * commits, so the PR GitHub associates with a commit first is not always
 * the interesting one. The lookup tries, in order:
 *
 * 1. a "#123" reference in the commit message
 * 2. the search API, earliest non-release PR mentioning the commit
 * 3. the commit's associated PRs, release PRs only as a last resort
 */
export class PullRequestResolver {
  private readonly repoSlug: string;

  private readonly maxRateLimitRetries: number | undefined;

  public constructor(
    private readonly github: Octokit,
    private readonly repository: GitHubRepo,
    options: PullRequestResolverOptions = {}
  ) {
    this.repoSlug = formatRepository(repository);
    this.maxRateLimitRetries = parseRateLimitRetries(
      options.maxRateLimitRetries
    );
  }

  /**
   * Resolves a commit hash to the commit details and its original PR
   *
   * Rate limits are waited out. Any other failure is logged and results in
   * `null`, as does a commit that does not exist in the repository.
   *
   * @param hash Commit hash (abbreviated or full)
   */
  public async resolveCommit(hash: string): Promise<ResolvedCommit | null> {
    try {
      return await withRateLimitRetry(() => this.resolveCommitOnce(hash), {
        maxRetries: this.maxRateLimitRetries,
      });
    } catch (e) {
      logger.error(
        `Error fetching data from GitHub for commit ${hash}: ${
          e instanceof Error ? e.message : String(e)
        }`
      );
      return null;
    }
  }

  private async resolveCommitOnce(hash: string): Promise<ResolvedCommit | null> {
    const commit = await this.getCommit(hash);
    if (!commit) {
      return null;
    }

    const pullRequest =
      (await this.findReferencedPullRequest(commit)) ??
      (await this.searchOriginalPullRequest(hash)) ??
      (await this.findAssociatedPullRequest(hash));

    if (!pullRequest) {
      logger.warn(`No pull request found for commit ${hash}`);
    }
    return { commit, pullRequest };
  }

  /**
   * Fetches commit details
   *
   * @returns The commit, or null if it does not exist in the repository
   */
  public async getCommit(hash: string): Promise<CommitInfo | null> {
    logger.debug(`Fetching commit ${hash} from ${this.repoSlug}`);
    try {
      const { data } = await this.github.repos.getCommit({
        ...this.repository,
        ref: hash,
      });
      const login =
        data.author && 'login' in data.author ? data.author.login : undefined;
      const message = data.commit.message;
      return {
        hash,
        author: login ? formatLogin(login) : data.commit.author?.name || undefined,
        coAuthors: parseCoAuthors(message),
        message,
      };
    } catch (e) {
      if (hasStatus(e, 404)) {
        logger.warn(`Commit ${hash} not found in repository ${this.repoSlug}`);
        return null;
      }
      throw e;
    }
  }

  /**
   * Fetches a pull request by number
   *
   * @returns The PR, or null if there is no PR with that number
   */
  public async getPullRequest(
    pullNumber: number
  ): Promise<PullRequestInfo | null> {
    try {
      const { data } = await this.github.pulls.get({
        ...this.repository,
        pull_number: pullNumber,
      });
      return {
        number: data.number,
        title: data.title,
        body: data.body,
        author: data.user?.login ? formatLogin(data.user.login) : undefined,
      };
    } catch (e) {
      if (hasStatus(e, 404)) {
        logger.debug(`#${pullNumber} is not a pull request in ${this.repoSlug}`);
        return null;
      }
      throw e;
    }
  }

  /**
   * Looks up the PR referenced as "#123" in the commit message
   */
  public async findReferencedPullRequest(
    commit: CommitInfo
  ): Promise<PullRequestInfo | null> {
    const match = PR_REFERENCE_REGEX.exec(commit.message);
    if (!match) {
      logger.debug(`Commit ${commit.hash} does not reference a pull request`);
      return null;
    }
    const pullRequest = await this.getPullRequest(Number(match[1]));
    if (pullRequest) {
      logger.info(
        `Found PR #${pullRequest.number} referenced by commit ${commit.hash}`
      );
    }
    return pullRequest;
  }

  /**
   * Searches for the earliest non-release PR mentioning the commit
   */
  public async searchOriginalPullRequest(
    hash: string
  ): Promise<PullRequestInfo | null> {
    logger.debug(`Searching pull requests mentioning ${hash}`);
    let items: Array<{ number: number; title: string }>;
    try {
      ({
        data: { items },
      } = await this.github.search.issuesAndPullRequests({
        q: `${hash} repo:${this.repoSlug} is:pr`,
        sort: 'created',
        order: 'asc',
        per_page: SEARCH_RESULTS_LIMIT,
      }));
    } catch (e) {
      // The search API rejects queries it cannot run, such as for
      // repositories it cannot see
      if (hasStatus(e, 422)) {
        logger.debug(`Pull request search rejected for ${hash}`);
        return null;
      }
      throw e;
    }

    const original = items.find(item => {
      if (isReleasePullRequest(item.title)) {
        logger.debug(`Skipping release PR #${item.number}: ${item.title}`);
        return false;
      }
      return true;
    });
    if (!original) {
      logger.debug(`Search found no original pull request for ${hash}`);
      return null;
    }

    const pullRequest = await this.getPullRequest(original.number);
    if (pullRequest) {
      logger.info(`Found PR #${pullRequest.number} for commit ${hash} by search`);
    }
    return pullRequest;
  }

  /**
   * Looks up the PRs GitHub associates with the commit
   *
   * Release PRs are skipped unless they are the only candidates, in which
   * case the first one is used.
   */
  public async findAssociatedPullRequest(
    hash: string
  ): Promise<PullRequestInfo | null> {
    logger.debug(`Listing pull requests associated with ${hash}`);
    const { data: pulls } =
      await this.github.repos.listPullRequestsAssociatedWithCommit({
        ...this.repository,
        commit_sha: hash,
      });
    if (pulls.length === 0) {
      return null;
    }

    let pull = pulls.find(candidate => !isReleasePullRequest(candidate.title));
    if (pull) {
      logger.info(`Found PR #${pull.number} associated with commit ${hash}`);
    } else {
      pull = pulls[0];
      logger.warn(
        `Only release pull requests are associated with commit ${hash}, ` +
          `using PR #${pull.number} anyway: ${pull.title}`
      );
    }

    return {
      number: pull.number,
      title: pull.title,
      body: pull.body,
      author: pull.user?.login ? formatLogin(pull.user.login) : undefined,
    };
  }
}
